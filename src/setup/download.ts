/**
 * Remote artifact downloads through an external helper command.
 *
 * The helper is invoked as `<command> ...args <url> <out_file>` and must
 * either populate `out_file` or exit nonzero. Missing inputs (no URL format,
 * no build id, no helper) are logged and the download is skipped.
 */

import { execFileSync } from "node:child_process";
import { join } from "node:path";
import type { Logger } from "../logging/index.js";

export interface CommandRunner {
  run(command: string, args: string[]): Promise<void>;
}

/** Runs commands synchronously with inherited stdio. Nonzero exit throws. */
export function createExecFileRunner(): CommandRunner {
  return {
    async run(command, args) {
      execFileSync(command, args, { stdio: "inherit" });
    },
  };
}

export interface HelperCommand {
  command: string;
  args: string[];
}

/** Helper script location inside a Kleaf checkout. */
export const KLEAF_DOWNLOAD_HELPER = join("build", "kernel", "init", "init_download.py");

/**
 * The explicit helper if given, else the script in the Kleaf repo run with
 * python3, else nothing.
 */
export function resolveHelperCommand(
  downloadHelper: string | undefined,
  kleafRepo: string | undefined,
): HelperCommand | undefined {
  if (downloadHelper) return { command: downloadHelper, args: [] };
  if (kleafRepo) return { command: "python3", args: [join(kleafRepo, KLEAF_DOWNLOAD_HELPER)] };
  return undefined;
}

export interface UrlParams {
  buildId?: string;
  buildTarget: string;
  filename: string;
}

/**
 * Fill `{build_id}`, `{build_target}` and `{filename}` in `urlFmt`.
 * `{{` and `}}` stand for literal braces; unknown placeholders are kept.
 * The file name is percent-encoded, `/` and `!'()*` included.
 * Returns undefined when the format needs a build id and none was given.
 */
export function formatDownloadUrl(urlFmt: string, params: UrlParams): string | undefined {
  const values: Record<string, string> = {
    build_id: params.buildId ?? "",
    build_target: params.buildTarget,
    filename: encodeFilename(params.filename),
  };

  let needsBuildId = false;
  const url = urlFmt.replace(/\{\{|\}\}|\{(\w+)\}/g, (match: string, key: string | undefined) => {
    if (match === "{{") return "{";
    if (match === "}}") return "}";
    if (key === undefined) return match;
    if (key === "build_id") needsBuildId = true;
    return values[key] ?? match;
  });

  if (needsBuildId && !params.buildId) return undefined;
  return url;
}

/** Percent-encode everything but unreserved characters (`A-Za-z0-9-._~`). */
export function encodeFilename(filename: string): string {
  return encodeURIComponent(filename).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

export type DownloadOutcome =
  | { status: "downloaded"; url: string; outFile: string }
  | { status: "skipped"; reason: string };

export interface DownloadContext {
  urlFmt?: string;
  buildId?: string;
  buildTarget: string;
  helper?: HelperCommand;
  runner: CommandRunner;
  logger: Logger;
}

/**
 * Fetch `remoteFilename` into `outFile`. Unreachable downloads are skipped;
 * a failing helper command propagates.
 */
export async function downloadArtifact(
  ctx: DownloadContext,
  remoteFilename: string,
  outFile: string,
): Promise<DownloadOutcome> {
  const skip = (reason: string): DownloadOutcome => {
    ctx.logger.error(reason);
    return { status: "skipped", reason };
  };

  if (!ctx.urlFmt) {
    return skip(`Unable to download file ${remoteFilename} because --url_fmt was not set.`);
  }
  const url = formatDownloadUrl(ctx.urlFmt, {
    buildId: ctx.buildId,
    buildTarget: ctx.buildTarget,
    filename: remoteFilename,
  });
  if (!url) {
    return skip(`Unable to download ${remoteFilename} file because --build_id is missing.`);
  }
  if (!ctx.helper) {
    return skip(`Unable to download ${remoteFilename} because no download helper is available; pass --download_helper or --kleaf_repo.`);
  }

  ctx.logger.info(`Downloading ${url} to ${outFile}`);
  await ctx.runner.run(ctx.helper.command, [...ctx.helper.args, url, outFile]);
  return { status: "downloaded", url, outFile };
}
