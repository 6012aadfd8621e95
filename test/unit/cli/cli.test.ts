import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { USAGE, applyCliOverrides, catalogVariables, isAffirmative, main, parseCliArgs } from "../../../src/cli.js";
import { BOOKWORM, TUMBLEWEED, testConfig } from "../../helpers/context.js";

describe("parseCliArgs", () => {
  it("defaults to a confirmed, real run of every step", () => {
    expect(parseCliArgs([])).toEqual({
      command: "run",
      yes: false,
      dryRun: false,
      only: [],
      configPath: undefined,
      catalogPath: undefined,
      reportPath: undefined,
      strict: false,
      allowUntested: false,
      logLevel: undefined,
    });
  });

  it("reads commands, repeated --only and short flags", () => {
    expect(parseCliArgs(["list", "--only", "php", "--only", "perl", "-y", "-n", "--log-level", "debug"])).toMatchObject({
      command: "list",
      only: ["php", "perl"],
      yes: true,
      dryRun: true,
      logLevel: "debug",
    });
  });

  it("lets --help win over the command", () => {
    expect(parseCliArgs(["list", "--help"]).command).toBe("help");
  });

  it("rejects unknown commands, extra arguments and bad levels", () => {
    expect(() => parseCliArgs(["deploy"])).toThrow("Unknown command: deploy");
    expect(() => parseCliArgs(["run", "extra"])).toThrow("Unexpected arguments: extra");
    expect(() => parseCliArgs(["--log-level", "loud"])).toThrow("Invalid log level: loud");
    expect(() => parseCliArgs(["--bogus"])).toThrow();
  });
});

describe("applyCliOverrides", () => {
  it("sets only what the flags name and leaves the input alone", () => {
    const config = testConfig();
    const options = parseCliArgs(["-y", "--strict", "--catalog", "/srv/catalog.yaml"]);

    const next = applyCliOverrides(config, options);

    expect(next.run).toEqual({ ...config.run, non_interactive: true, strict_exit_code: true });
    expect(next.catalog_path).toBe("/srv/catalog.yaml");
    expect(config.run.non_interactive).toBe(false);
    expect(config.catalog_path).toBeNull();
  });

  it("takes the log level from the flag, then LOG_LEVEL, then the file", () => {
    const config = testConfig();

    expect(applyCliOverrides(config, parseCliArgs(["--log-level", "warn"]), { LOG_LEVEL: "debug" }).logging.level).toBe("warn");
    expect(applyCliOverrides(config, parseCliArgs([]), { LOG_LEVEL: "debug" }).logging.level).toBe("debug");
    expect(applyCliOverrides(config, parseCliArgs([]), { LOG_LEVEL: "chatty" }).logging.level).toBe("info");
    expect(applyCliOverrides(config, parseCliArgs([]), {}).logging.level).toBe("info");
  });
});

describe("catalogVariables", () => {
  it("adds the instructions directory and the codename when known", () => {
    const config = testConfig();
    expect(catalogVariables(config, BOOKWORM)).toEqual({ node_major: "22", php_version: "8.3", instructions_dir: "/root", codename: "bookworm" });
    expect(catalogVariables(config, TUMBLEWEED)).toEqual({ node_major: "22", php_version: "8.3", instructions_dir: "/root" });
  });
});

describe("isAffirmative", () => {
  it.each([
    ["", true],
    ["y", true],
    ["Yes", true],
    ["n", false],
    [" NO ", false],
  ])("%j → %s", (answer, expected) => {
    expect(isAffirmative(answer)).toBe(expected);
  });
});

describe("main", () => {
  it("returns 1 on a bad argument", async () => {
    const spy = jest.spyOn(console, "error").mockImplementation(() => undefined);
    try {
      expect(await main(["deploy"])).toBe(1);
      expect(spy).toHaveBeenCalledWith(`ws-provision: Unknown command: deploy\n\n${USAGE}`);
    } finally {
      spy.mockRestore();
    }
  });

  it("exits 1 without running anything when the config is invalid", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ws-cli-"));
    const configPath = path.join(dir, "config.yaml");
    fs.writeFileSync(configPath, "run:\n  dry_run: yes\n");
    const spy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      expect(await main(["--config", configPath, "--log-level", "fatal", "--yes"])).toBe(1);
      expect(spy).not.toHaveBeenCalled();
    } finally {
      spy.mockRestore();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("does not write a default config file for list", async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "ws-cli-"));
    const configPath = path.join(dir, "config.yaml");
    const spy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      await main(["list", "--config", configPath, "--log-level", "fatal"]);
      expect(fs.existsSync(configPath)).toBe(false);
    } finally {
      spy.mockRestore();
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it("prints usage for help", async () => {
    const spy = jest.spyOn(console, "log").mockImplementation(() => undefined);
    try {
      expect(await main(["--help"])).toBe(0);
      expect(spy).toHaveBeenCalledWith(USAGE);
    } finally {
      spy.mockRestore();
    }
  });
});
