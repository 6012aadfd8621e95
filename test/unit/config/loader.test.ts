import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG, deepMerge, loadConfig } from "../../../src/config/loader.js";
import { silentLogger } from "../../../src/logger.js";
import { PreconditionError } from "../../../src/shared/errors.js";

let tmpDir: string;
let configPath: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "ws-config-"));
  configPath = path.join(tmpDir, "etc", "config.yaml");
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

describe("loadConfig", () => {
  it("writes the defaults on first run", () => {
    const result = loadConfig(silentLogger(), configPath);

    expect(result).toEqual({ config: DEFAULT_CONFIG, configPath, firstRun: true });
    expect(fs.existsSync(configPath)).toBe(true);
  });

  it("reads back the generated file as the defaults", () => {
    loadConfig(silentLogger(), configPath);

    const second = loadConfig(silentLogger(), configPath);

    expect(second.firstRun).toBe(false);
    expect(second.config).toEqual(DEFAULT_CONFIG);
  });

  it("merges partial files over the defaults", () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "run:\n  dry_run: true\nvariables:\n  node_major: 20\ndistro:\n  family: debian\n  codename: bookworm\n");

    const { config } = loadConfig(silentLogger(), configPath);

    expect(config.run).toEqual({ ...DEFAULT_CONFIG.run, dry_run: true });
    expect(config.variables).toEqual({ node_major: "20", php_version: "8.3" });
    expect(config.distro).toEqual({ family: "debian", codename: "bookworm" });
    expect(config.paths).toEqual(DEFAULT_CONFIG.paths);
  });

  it("rejects values that fail validation, listing every issue", () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "run:\n  dry_run: yes\npaths:\n  apt_sources_dir: ''\n");

    expect(() => loadConfig(silentLogger(), configPath)).toThrow(PreconditionError);
    expect(() => loadConfig(silentLogger(), configPath)).toThrow(
      `Invalid config ${configPath}: run.dry_run: Expected boolean, received string; ` +
        "paths.apt_sources_dir: String must contain at least 1 character(s)",
    );
  });

  it("rejects a file that is not valid YAML", () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "run: [unclosed\n");

    expect(() => loadConfig(silentLogger(), configPath)).toThrow(PreconditionError);
    expect(() => loadConfig(silentLogger(), configPath)).toThrow(`Cannot read config ${configPath}: `);
  });

  it("leaves a missing file alone when asked not to write defaults", () => {
    const result = loadConfig(silentLogger(), configPath, { writeDefault: false });

    expect(result).toEqual({ config: DEFAULT_CONFIG, configPath, firstRun: true });
    expect(fs.existsSync(configPath)).toBe(false);
  });

  it("treats an empty file as the defaults", () => {
    fs.mkdirSync(path.dirname(configPath), { recursive: true });
    fs.writeFileSync(configPath, "");

    expect(loadConfig(silentLogger(), configPath).config).toEqual(DEFAULT_CONFIG);
  });
});

describe("deepMerge", () => {
  it("overrides leaves and keeps siblings", () => {
    expect(deepMerge({ a: { b: 1, c: 2 }, d: [1] }, { a: { c: 3 }, d: [2, 3] })).toEqual({ a: { b: 1, c: 3 }, d: [2, 3] });
  });

  it("keeps the default when the override is undefined", () => {
    expect(deepMerge({ a: 1 }, undefined)).toEqual({ a: 1 });
  });
});
