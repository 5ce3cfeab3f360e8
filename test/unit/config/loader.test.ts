import os from "os";
import path from "path";
import fs from "fs/promises";
import { deepMerge, loadConfig, resolveConfig } from "../../../src/config/loader.js";
import { DEFAULT_CONFIG } from "../../../src/config/schema.js";
import { SnapshotError, SnapshotErrorCode } from "../../../src/shared/errors.js";

describe("deepMerge", () => {
  it("merges nested mappings and lets overrides win", () => {
    expect(deepMerge({ a: { x: 1, y: 2 }, b: 3 }, { a: { y: 5 }, c: 4 })).toEqual({ a: { x: 1, y: 5 }, b: 3, c: 4 });
  });

  it("replaces arrays instead of merging them", () => {
    expect(deepMerge({ list: [1, 2] }, { list: [3] })).toEqual({ list: [3] });
  });

  it("ignores undefined overrides", () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe("resolveConfig", () => {
  it("returns the defaults for an empty document", () => {
    expect(resolveConfig(null, "cfg.yaml")).toEqual(DEFAULT_CONFIG);
  });

  it("keeps defaults for keys the document omits", () => {
    const config = resolveConfig({ output: { indent: 4 } }, "cfg.yaml");
    expect(config.output).toEqual({ ...DEFAULT_CONFIG.output, indent: 4 });
    expect(config.commands).toEqual(DEFAULT_CONFIG.commands);
  });

  it("rejects a document that is not a mapping", () => {
    expect(() => resolveConfig(["apt"], "cfg.yaml")).toThrow("Config cfg.yaml must be a mapping");
  });

  it("names the offending key on a schema violation", () => {
    expect(() => resolveConfig({ output: { compression_level: 12 } }, "cfg.yaml")).toThrow(
      /^Invalid config cfg\.yaml: output\.compression_level: /,
    );
  });

  it("rejects an unknown package manager", () => {
    try {
      resolveConfig({ package_manager: "dnf" }, "cfg.yaml");
      throw new Error("expected resolveConfig to throw");
    } catch (err) {
      expect(err).toBeInstanceOf(SnapshotError);
      expect(err).toMatchObject({ code: SnapshotErrorCode.INVALID_CONFIG, context: { configPath: "cfg.yaml" } });
    }
  });
});

describe("loadConfig", () => {
  let tmpDir: string;
  const savedEnv = process.env.PACKAGE_SNAPSHOT_CONFIG;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "package-snapshot-config-"));
  });

  afterEach(async () => {
    if (savedEnv === undefined) delete process.env.PACKAGE_SNAPSHOT_CONFIG;
    else process.env.PACKAGE_SNAPSHOT_CONFIG = savedEnv;
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("loads and merges an explicit file", async () => {
    const file = path.join(tmpDir, "config.yaml");
    await fs.writeFile(
      file,
      ["commands:", "  detail_timeout_seconds: 5", "output:", "  directory: /var/lib/snapshots", "package_manager: pacman", ""].join(
        "\n",
      ),
    );
    const result = loadConfig(file);
    expect(result.fromFile).toBe(true);
    expect(result.configPath).toBe(file);
    expect(result.config).toEqual({
      commands: { list_timeout_seconds: 120, detail_timeout_seconds: 5 },
      output: { ...DEFAULT_CONFIG.output, directory: "/var/lib/snapshots" },
      package_manager: "pacman",
    });
  });

  it("uses PACKAGE_SNAPSHOT_CONFIG when no path is given", async () => {
    const file = path.join(tmpDir, "env.yaml");
    await fs.writeFile(file, "output:\n  validate: false\n");
    process.env.PACKAGE_SNAPSHOT_CONFIG = file;
    expect(loadConfig().config.output.validate).toBe(false);
  });

  it("falls back to defaults without creating the file", async () => {
    const file = path.join(tmpDir, "missing.yaml");
    process.env.PACKAGE_SNAPSHOT_CONFIG = file;
    expect(loadConfig()).toEqual({ config: DEFAULT_CONFIG, configPath: file, fromFile: false });
    expect(await fs.readdir(tmpDir)).toEqual([]);
  });

  it("fails when an explicit file is missing", () => {
    const file = path.join(tmpDir, "missing.yaml");
    expect(() => loadConfig(file)).toThrow(`Cannot read config ${file}:`);
  });

  it("fails on malformed YAML", async () => {
    const file = path.join(tmpDir, "broken.yaml");
    await fs.writeFile(file, "output: [unclosed\n");
    expect(() => loadConfig(file)).toThrow(`Cannot parse config ${file}:`);
  });
});
