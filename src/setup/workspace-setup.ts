/**
 * Workspace setup: lays out a DDK workspace for building modules with Kleaf.
 *
 * Steps, in order:
 *   1. Create the workspace, Kleaf repo and prebuilts directories.
 *   2. Fetch download_configs.json when a build id is given.
 *   3. Link <workspace>/tools/bazel to the Kleaf repo's launcher.
 *   4. Update the generated section of MODULE.bazel.
 *   5. Update the generated section of device.bazelrc.
 *
 * Each step is skipped when the options it needs are absent.
 */

import { mkdir, rm, symlink } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { SetupOptions } from "../config/index.js";
import type { Logger } from "../logging/index.js";
import { updateMarkedBlock, type MarkerPair, type MarkerUpdateResult } from "../markers/index.js";
import { DOWNLOAD_CONFIGS_FILE, readDownloadConfigs } from "./download-configs.js";
import {
  downloadArtifact,
  resolveHelperCommand,
  type CommandRunner,
  type DownloadContext,
} from "./download.js";
import {
  DEVICE_BAZELRC,
  MODULE_BAZEL_FILE,
  TOOLS_BAZEL,
  bazelrcRepoRoot,
  relativeToWorkspace,
} from "./paths.js";
import { joinBlocks, renderBazelrc, renderKleafDependency, renderLocalPrebuilts } from "./templates.js";

export interface SetupDependencies {
  logger: Logger;
  runner: CommandRunner;
  /** Override the generated-section markers (tests only, in practice). */
  markers?: MarkerPair;
}

export interface SetupResult {
  /** Directories and files that did not exist before. */
  created: string[];
  /** Existing files whose content changed. */
  updated: string[];
  /** Symbolic links written. */
  linked: string[];
  downloaded: string[];
  warnings: string[];
}

export class WorkspaceSetup {
  private readonly result: SetupResult = {
    created: [],
    updated: [],
    linked: [],
    downloaded: [],
    warnings: [],
  };

  constructor(
    private readonly options: SetupOptions,
    private readonly deps: SetupDependencies,
  ) {}

  async run(): Promise<SetupResult> {
    await this.prepareDirectories();
    await this.fetchRemoteArtifacts();
    await this.linkToolsBazel();
    await this.generateModuleBazel();
    await this.generateBazelrc();
    return this.result;
  }

  private get logger(): Logger {
    return this.deps.logger;
  }

  private async prepareDirectories(): Promise<void> {
    const { ddkWorkspace, kleafRepo, prebuiltsDir } = this.options;
    if (ddkWorkspace) await this.ensureDir(ddkWorkspace);
    // TODO: sync the Kleaf git checkout here once a source manifest is supported.
    if (kleafRepo) await this.ensureDir(kleafRepo);
    if (ddkWorkspace && prebuiltsDir) await this.ensureDir(prebuiltsDir);
  }

  private async ensureDir(path: string): Promise<void> {
    const first = await mkdir(path, { recursive: true });
    if (first !== undefined) {
      this.logger.debug(`Created directory ${path}`);
      this.result.created.push(path);
    }
  }

  private async fetchRemoteArtifacts(): Promise<void> {
    const { buildId, ddkWorkspace, prebuiltsDir } = this.options;
    if (!buildId || !ddkWorkspace || !prebuiltsDir) return;

    const ctx: DownloadContext = {
      urlFmt: this.options.urlFmt,
      buildId,
      buildTarget: this.options.buildTarget,
      helper: resolveHelperCommand(this.options.downloadHelper, this.options.kleafRepo),
      runner: this.deps.runner,
      logger: this.logger,
    };
    const outcome = await downloadArtifact(ctx, DOWNLOAD_CONFIGS_FILE, join(prebuiltsDir, DOWNLOAD_CONFIGS_FILE));
    if (outcome.status === "downloaded") {
      this.result.downloaded.push(outcome.outFile);
    } else {
      this.result.warnings.push(outcome.reason);
    }
  }

  private async linkToolsBazel(): Promise<void> {
    const { ddkWorkspace, kleafRepo } = this.options;
    if (!ddkWorkspace || !kleafRepo) return;

    const link = join(ddkWorkspace, TOOLS_BAZEL);
    const target = join(kleafRepo, TOOLS_BAZEL);
    await mkdir(dirname(link), { recursive: true });
    await rm(link, { force: true });
    await symlink(target, link);
    this.logger.info(`Linked ${link} -> ${target}`);
    this.result.linked.push(link);
  }

  private async generateModuleBazel(): Promise<void> {
    const { ddkWorkspace, kleafRepo, prebuiltsDir } = this.options;
    if (!ddkWorkspace) return;

    const moduleBazel = join(ddkWorkspace, MODULE_BAZEL_FILE);
    const blocks: string[] = [];
    if (kleafRepo) {
      blocks.push(renderKleafDependency(relativeToWorkspace(kleafRepo, ddkWorkspace, this.logger)));
    }
    if (prebuiltsDir) {
      const downloadConfigs = await readDownloadConfigs(prebuiltsDir);
      blocks.push(
        renderLocalPrebuilts(downloadConfigs, relativeToWorkspace(prebuiltsDir, ddkWorkspace, this.logger)),
      );
    }

    const content = joinBlocks(blocks);
    if (!content) {
      this.logger.info(`Nothing to update in ${moduleBazel}`);
      return;
    }
    this.record(await this.update(moduleBazel, content));
  }

  private async generateBazelrc(): Promise<void> {
    const { ddkWorkspace, kleafRepo } = this.options;
    if (!ddkWorkspace || !kleafRepo) return;

    const repoRoot = bazelrcRepoRoot(relativeToWorkspace(kleafRepo, ddkWorkspace, this.logger));
    const bazelrc = join(ddkWorkspace, DEVICE_BAZELRC);
    this.record(await this.update(bazelrc, renderBazelrc(repoRoot)));
  }

  private update(path: string, content: string): Promise<MarkerUpdateResult> {
    return updateMarkedBlock(path, content, { markers: this.deps.markers, logger: this.logger });
  }

  private record(update: MarkerUpdateResult): void {
    if (update.created) {
      this.result.created.push(update.path);
    } else if (update.changed) {
      this.result.updated.push(update.path);
    }
  }
}

/** Run the whole setup once. */
export function runWorkspaceSetup(options: SetupOptions, deps: SetupDependencies): Promise<SetupResult> {
  return new WorkspaceSetup(options, deps).run();
}
