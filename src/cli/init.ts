/**
 * ddk-init: configures a project layout to build DDK modules.
 */

import { resolveSetupOptions, type SetupOptionsInput } from "../config/index.js";
import { MarkerError, SetupError } from "../errors.js";
import { createConsoleLogger, type Logger } from "../logging/index.js";
import { createExecFileRunner, type CommandRunner } from "../setup/download.js";
import { runWorkspaceSetup, type SetupResult } from "../setup/workspace-setup.js";

export interface InitOptions extends Partial<SetupOptionsInput> {
  /** YAML options file; flags override its values */
  config?: string;
  /** Print debug output and stack traces */
  verbose?: boolean;
}

export interface InitDependencies {
  logger?: Logger;
  runner?: CommandRunner;
}

/**
 * Run the setup. Resolves to the process exit code: 1 for setup and marker
 * errors, 0 otherwise. Filesystem errors reject.
 */
export async function init(options: InitOptions, deps: InitDependencies = {}): Promise<number> {
  const { config, verbose = false, ...flags } = options;
  const logger = deps.logger ?? createConsoleLogger({ level: verbose ? "debug" : "info" });
  const runner = deps.runner ?? createExecFileRunner();

  let result: SetupResult;
  try {
    const setupOptions = await resolveSetupOptions(flags, config);
    result = await runWorkspaceSetup(setupOptions, { logger, runner });
  } catch (error) {
    if (error instanceof SetupError || error instanceof MarkerError) {
      logger.error(error.message, error);
      return 1;
    }
    throw error;
  }

  printSummary(result, logger);
  return 0;
}

function printSummary(result: SetupResult, logger: Logger): void {
  for (const path of result.created) logger.debug(`created ${path}`);
  for (const path of result.updated) logger.debug(`updated ${path}`);

  const total = result.created.length + result.updated.length + result.linked.length + result.downloaded.length;
  if (total === 0) {
    logger.info("Workspace already up to date.");
    return;
  }
  logger.info(
    `Setup complete: ${result.created.length} created, ${result.updated.length} updated, ` +
      `${result.linked.length} linked, ${result.downloaded.length} downloaded.`,
  );
  if (result.warnings.length > 0) {
    logger.warn(`${result.warnings.length} step(s) skipped, see errors above.`);
  }
}
