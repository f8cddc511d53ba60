/**
 * Register the `ddk-init init` command (also the default command).
 */

import type { Command } from "commander";
import { DEFAULT_BUILD_TARGET } from "../../config/index.js";
import { init } from "../init.js";

/** Raw flag values as commander hands them over. */
interface InitFlags {
  build_id?: string;
  build_target?: string;
  ddk_workspace?: string;
  local?: boolean;
  kleaf_repo?: string;
  prebuilts_dir?: string;
  url_fmt?: string;
  download_helper?: string;
  config?: string;
  verbose?: boolean;
}

export function registerInitCommand(program: Command): void {
  program
    .command("init", { isDefault: true })
    .description("Configure the project layout to build DDK modules")
    .option("--build_id <id>", "the build id to download the build for, e.g. 6148204")
    .option("--build_target <target>", `the build target to download (default: "${DEFAULT_BUILD_TARGET}")`)
    .option("--ddk_workspace <path>", "Absolute path to DDK workspace root")
    .option("--local", "Whether to use a local source tree containing Kleaf")
    .option("--kleaf_repo <path>", "Absolute path to Kleaf's repo dir")
    .option("--prebuilts_dir <path>", "Absolute path to local GKI prebuilts, usually within the workspace")
    .option("--url_fmt <format>", "URL format endpoint for CI downloads")
    .option("--download_helper <path>", "Absolute path to the download helper (default: the one in --kleaf_repo)")
    .option("--config <file>", "YAML file with default option values")
    .option("-v, --verbose", "Print debug output")
    .action(async (flags: InitFlags) => {
      process.exitCode = await init({
        buildId: flags.build_id,
        buildTarget: flags.build_target,
        ddkWorkspace: flags.ddk_workspace,
        local: flags.local,
        kleafRepo: flags.kleaf_repo,
        prebuiltsDir: flags.prebuilts_dir,
        urlFmt: flags.url_fmt,
        downloadHelper: flags.download_helper,
        config: flags.config,
        verbose: flags.verbose,
      });
    });
}
