/**
 * Setup options, with their YAML options file and flag merging.
 *
 * Options come from command-line flags and, optionally, a YAML file passed
 * with `--config`. Flags win over file values. Every path must be absolute.
 */

import { readFile } from "node:fs/promises";
import { isAbsolute } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import { SetupError, errorMessage } from "../errors.js";

export const DEFAULT_BUILD_TARGET = "kernel_aarch64";

const AbsolutePath = z
  .string()
  .min(1)
  .refine((p) => isAbsolute(p), (p) => ({ message: `${p} is not an absolute path.` }));

export const SetupOptions = z
  .object({
    /** CI build id to download artifacts from, e.g. 6148204. */
    buildId: z.string().min(1).optional(),
    /** CI build target, e.g. kernel_aarch64. */
    buildTarget: z.string().min(1).default(DEFAULT_BUILD_TARGET),
    /** DDK workspace root. */
    ddkWorkspace: AbsolutePath.optional(),
    /** Use a local source tree containing Kleaf. */
    local: z.boolean().default(false),
    /** Kleaf repository directory. */
    kleafRepo: AbsolutePath.optional(),
    /** Local GKI prebuilts, usually inside the workspace. */
    prebuiltsDir: AbsolutePath.optional(),
    /** URL format for CI downloads; placeholders {build_id}, {build_target}, {filename}. */
    urlFmt: z.string().min(1).optional(),
    /** Executable invoked as `<helper> <url> <out_file>` to fetch artifacts. */
    downloadHelper: AbsolutePath.optional(),
  })
  .strict()
  .superRefine((opts, ctx) => {
    if (opts.local && !opts.kleafRepo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["kleafRepo"],
        message: "--local requires --kleaf_repo",
      });
    }
  });
export type SetupOptions = z.infer<typeof SetupOptions>;
export type SetupOptionsInput = z.input<typeof SetupOptions>;

/**
 * Validate raw options. Throws SetupError listing every issue.
 */
export function parseSetupOptions(raw: unknown, source = "options"): SetupOptions {
  const result = SetupOptions.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues.map((i) => {
      const path = i.path.length > 0 ? `${i.path.join(".")}: ` : "";
      return `  ${path}${i.message}`;
    });
    throw new SetupError(`Invalid ${source}:\n${details.join("\n")}`);
  }
  return result.data;
}

/**
 * Read a YAML options file. Keys use the same camelCase names as SetupOptions.
 */
export async function loadOptionsFile(path: string): Promise<Record<string, unknown>> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (error) {
    throw new SetupError(`Cannot read options file ${path}: ${errorMessage(error)}`, { cause: error });
  }

  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (error) {
    throw new SetupError(`Invalid YAML in ${path}: ${errorMessage(error)}`, { cause: error });
  }

  // An empty file parses to null.
  if (raw === null || raw === undefined) return {};
  if (typeof raw !== "object" || Array.isArray(raw)) {
    throw new SetupError(`Options file ${path} must contain a mapping`);
  }
  return Object.fromEntries(Object.entries(raw));
}

/**
 * Merge file values with flag values (flags win, undefined flags are ignored)
 * and validate the result.
 */
export async function resolveSetupOptions(
  flags: Partial<SetupOptionsInput>,
  configPath?: string,
): Promise<SetupOptions> {
  const fromFile = configPath ? await loadOptionsFile(configPath) : {};
  const merged: Record<string, unknown> = { ...fromFile };
  for (const [key, value] of Object.entries(flags)) {
    if (value !== undefined) merged[key] = value;
  }
  return parseSetupOptions(merged, configPath ? `options (${configPath})` : "options");
}
