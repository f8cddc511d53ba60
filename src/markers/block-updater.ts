/**
 * Marker block updater: rewrites the generated section of a file on disk.
 *
 * The file is read whole, transformed in memory, and written back with
 * write-file-atomic (temp file in the same directory, then rename), so an
 * interrupted run never leaves it truncated. Concurrent writers on the same
 * path are not coordinated: the last rename wins.
 */

import { readFile } from "node:fs/promises";
import writeFileAtomic from "write-file-atomic";
import { hasErrorCode } from "../errors.js";
import { silentLogger, type Logger } from "../logging/index.js";
import { applyMarkedBlock, DEFAULT_MARKERS, type MarkerPair } from "./marked-block.js";

export interface MarkerUpdateOptions {
  markers?: MarkerPair;
  logger?: Logger;
}

export interface MarkerUpdateResult {
  path: string;
  /** The file did not exist before the call. */
  created: boolean;
  /** The content on disk changed. */
  changed: boolean;
}

/**
 * Ensure `path` holds exactly one generated section containing `replacementText`.
 * Creates the file when missing. Unchanged content is not rewritten.
 */
export async function updateMarkedBlock(
  path: string,
  replacementText: string,
  opts: MarkerUpdateOptions = {},
): Promise<MarkerUpdateResult> {
  const { markers = DEFAULT_MARKERS, logger = silentLogger } = opts;

  const existing = await readIfExists(path);
  logger.info(existing === undefined ? `Creating file ${path}.` : `Updating file ${path}.`);

  const next = applyMarkedBlock(existing ?? "", replacementText, { markers, source: path });
  if (next === existing) {
    logger.debug(`${path} is already up to date.`);
    return { path, created: false, changed: false };
  }

  await writeFileAtomic(path, next, "utf-8");
  return { path, created: existing === undefined, changed: true };
}

async function readIfExists(path: string): Promise<string | undefined> {
  try {
    return await readFile(path, "utf-8");
  } catch (error) {
    if (hasErrorCode(error, "ENOENT")) return undefined;
    throw error;
  }
}
