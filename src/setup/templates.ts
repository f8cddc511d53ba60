/**
 * Replacement blocks for the generated sections of MODULE.bazel and
 * device.bazelrc. Every block ends with a line break.
 */

/** Kleaf module dependency, overridden to a local checkout. */
export function renderKleafDependency(kleafRepoPath: string): string {
  return [
    '"""Kleaf: Build Android kernels with Bazel."""',
    'bazel_dep(name = "kleaf")',
    "local_path_override(",
    '    module_name = "kleaf",',
    `    path = "${kleafRepoPath}",`,
    ")",
    "",
  ].join("\n");
}

/**
 * Local GKI prebuilts declaration.
 *
 * @param downloadConfigs - Starlark string literal holding the compact JSON configs
 * @param prebuiltsPath - prebuilts directory, relative to the workspace when possible
 */
export function renderLocalPrebuilts(downloadConfigs: string, prebuiltsPath: string): string {
  return [
    "kernel_prebuilt_ext = use_extension(",
    '    "@kleaf//build/kernel/kleaf:kernel_prebuilt_ext.bzl",',
    '    "kernel_prebuilt_ext",',
    ")",
    "kernel_prebuilt_ext.declare_kernel_prebuilts(",
    '    name = "gki_prebuilts",',
    `    download_configs = ${downloadConfigs},`,
    `    local_artifact_path = "${prebuiltsPath}",`,
    ")",
    'use_repo(kernel_prebuilt_ext, "gki_prebuilts")',
    "",
  ].join("\n");
}

export function renderBazelrc(repoRoot: string): string {
  return [
    "common --config=internet",
    `common --registry=file://${repoRoot}/external/bazelbuild-bazel-central-registry`,
    "",
  ].join("\n");
}

/** Blocks are separated by one blank line. */
export function joinBlocks(blocks: string[]): string {
  return blocks.filter((b) => b.length > 0).join("\n");
}
