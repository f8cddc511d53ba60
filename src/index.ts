/**
 * ddk-workspace-init
 *
 * Prepares a driver-module workspace for Bazel builds with Kleaf.
 * Generated sections in MODULE.bazel and device.bazelrc are maintained
 * between marker lines; hand-written content around them is preserved.
 */

export * from "./errors.js";
export * from "./logging/index.js";
export * from "./markers/index.js";
export * from "./config/index.js";
export * from "./setup/index.js";
export { init, type InitOptions, type InitDependencies } from "./cli/init.js";
