/**
 * Workspace-relative path rendering for generated build files.
 */

import { isAbsolute, join, relative, sep } from "node:path";
import type { Logger } from "../logging/index.js";

export const TOOLS_BAZEL = join("tools", "bazel");
export const MODULE_BAZEL_FILE = "MODULE.bazel";
export const DEVICE_BAZELRC = "device.bazelrc";

/** Placeholder Bazel expands to the workspace root inside .bazelrc files. */
export const BAZELRC_WORKSPACE = "%workspace%";

/**
 * `path` relative to `workspace` when it lies inside it; otherwise `path`
 * unchanged, with a warning.
 */
export function relativeToWorkspace(path: string, workspace: string, logger: Logger): string {
  const rel = relative(workspace, path);
  if (rel === "") return ".";
  if (rel === ".." || rel.startsWith(`..${sep}`) || isAbsolute(rel)) {
    logger.warn(`Path ${path} is not relative to DDK workspace ${workspace}, using absolute path.`);
    return path;
  }
  return rel;
}

/** Root of the Kleaf repo as written in device.bazelrc. */
export function bazelrcRepoRoot(repoPath: string): string {
  if (isAbsolute(repoPath)) return repoPath;
  return join(BAZELRC_WORKSPACE, repoPath);
}
