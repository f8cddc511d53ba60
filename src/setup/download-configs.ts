/**
 * download_configs.json: per-artifact download settings shipped with the
 * prebuilts. Embedded into MODULE.bazel as a compact JSON string.
 */

import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { z } from "zod";
import { SetupError, errorMessage, hasErrorCode } from "../errors.js";

export const DOWNLOAD_CONFIGS_FILE = "download_configs.json";

export const DownloadConfigEntry = z
  .object({
    mandatory: z.boolean().optional(),
    remote_filename_fmt: z.string().optional(),
  })
  .passthrough();

/** Artifact file name → settings. */
export const DownloadConfigs = z.record(DownloadConfigEntry);
export type DownloadConfigs = z.infer<typeof DownloadConfigs>;

/**
 * Read and validate `<prebuiltsDir>/download_configs.json`.
 * Returns the JSON without whitespace, as a Starlark string literal.
 */
export async function readDownloadConfigs(prebuiltsDir: string): Promise<string> {
  const path = join(prebuiltsDir, DOWNLOAD_CONFIGS_FILE);

  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) {
      throw new SetupError(`${path} is missing; it is required to declare local prebuilts.`, { cause: error });
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (error) {
    throw new SetupError(`Invalid JSON in ${path}: ${errorMessage(error)}`, { cause: error });
  }

  const result = DownloadConfigs.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new SetupError(`Invalid ${DOWNLOAD_CONFIGS_FILE}${where}: ${issue?.message ?? "unknown error"}`);
  }

  // Serialize the raw value: zod would reorder passthrough keys.
  return toStarlarkString(JSON.stringify(raw));
}

/** JSON string escaping is valid Starlark string syntax. */
export function toStarlarkString(value: string): string {
  return JSON.stringify(value);
}
