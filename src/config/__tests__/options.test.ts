import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { SetupError } from "../../errors.js";
import { parseSetupOptions, loadOptionsFile, resolveSetupOptions, DEFAULT_BUILD_TARGET } from "../options.js";

describe("parseSetupOptions", () => {
  it("applies defaults", () => {
    const opts = parseSetupOptions({});
    expect(opts).toEqual({ buildTarget: DEFAULT_BUILD_TARGET, local: false });
  });

  it("accepts absolute paths", () => {
    const opts = parseSetupOptions({ ddkWorkspace: "/work/ddk", kleafRepo: "/work/kleaf" });
    expect(opts.ddkWorkspace).toBe("/work/ddk");
    expect(opts.kleafRepo).toBe("/work/kleaf");
  });

  it("rejects relative paths", () => {
    expect(() => parseSetupOptions({ ddkWorkspace: "ddk" })).toThrow(SetupError);
    expect(() => parseSetupOptions({ prebuiltsDir: "out/prebuilts" })).toThrow(
      "Invalid options:\n  prebuiltsDir: out/prebuilts is not an absolute path.",
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseSetupOptions({ workspace: "/x" })).toThrow(SetupError);
  });

  it("requires a Kleaf repo in local mode", () => {
    expect(() => parseSetupOptions({ local: true })).toThrow(
      "Invalid options:\n  kleafRepo: --local requires --kleaf_repo",
    );
    expect(parseSetupOptions({ local: true, kleafRepo: "/k" }).local).toBe(true);
  });
});

describe("options file", () => {
  let tmpDir: string;
  let configPath: string;

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "ddk-options-test-"));
    configPath = join(tmpDir, "ddk-init.yaml");
  });

  afterEach(async () => {
    await rm(tmpDir, { recursive: true, force: true });
  });

  it("loads a YAML mapping", async () => {
    await writeFile(configPath, "ddkWorkspace: /work/ddk\nbuildTarget: kernel_x86_64\n", "utf-8");
    expect(await loadOptionsFile(configPath)).toEqual({
      ddkWorkspace: "/work/ddk",
      buildTarget: "kernel_x86_64",
    });
  });

  it("treats an empty file as no options", async () => {
    await writeFile(configPath, "", "utf-8");
    expect(await loadOptionsFile(configPath)).toEqual({});
  });

  it("rejects a non-mapping document", async () => {
    await writeFile(configPath, "- a\n- b\n", "utf-8");
    await expect(loadOptionsFile(configPath)).rejects.toThrow(`Options file ${configPath} must contain a mapping`);
  });

  it("rejects invalid YAML", async () => {
    await writeFile(configPath, "key: [unclosed\n", "utf-8");
    await expect(loadOptionsFile(configPath)).rejects.toBeInstanceOf(SetupError);
  });

  it("reports a missing file as a setup error", async () => {
    await expect(loadOptionsFile(join(tmpDir, "missing.yaml"))).rejects.toBeInstanceOf(SetupError);
  });

  it("lets flags override file values and ignores undefined flags", async () => {
    await writeFile(configPath, "ddkWorkspace: /from/file\nbuildId: \"100\"\nlocal: true\nkleafRepo: /k\n", "utf-8");

    const opts = await resolveSetupOptions({ buildId: "200", ddkWorkspace: undefined, local: undefined }, configPath);

    expect(opts).toEqual({
      ddkWorkspace: "/from/file",
      buildId: "200",
      buildTarget: DEFAULT_BUILD_TARGET,
      local: true,
      kleafRepo: "/k",
    });
  });

  it("resolves flags alone without a file", async () => {
    const opts = await resolveSetupOptions({ urlFmt: "https://ci/{build_id}" });
    expect(opts.urlFmt).toBe("https://ci/{build_id}");
  });
});
