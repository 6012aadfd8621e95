import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { DEFAULT_CATALOG_PATH, expandVariables, loadCatalog, parseCatalog } from "../../../src/catalog/loader.js";
import { ProvisionError } from "../../../src/shared/errors.js";
import { silentLogger } from "../../../src/logger.js";

const variables = { node_major: "22", php_version: "8.3", instructions_dir: "/root", codename: "bookworm" };

function parse(text: string, family: "debian" | "tumbleweed" = "debian", vars: Record<string, string> = variables) {
  return parseCatalog(text, { family, variables: vars, baseDir: "/nonexistent" });
}

describe("expandVariables", () => {
  it("replaces placeholders in nested strings", () => {
    expect(expandVariables({ a: ["php{php_version}-fpm", 3], b: { c: "{codename}" } }, variables)).toEqual({
      a: ["php8.3-fpm", 3],
      b: { c: "bookworm" },
    });
  });

  it("defers placeholders the registry resolves", () => {
    expect(expandVariables("[arch={arch} signed-by={keyring}]", variables)).toBe("[arch={arch} signed-by={keyring}]");
  });

  it("defers {codename} only when no codename is known", () => {
    expect(expandVariables("{codename}", { php_version: "8.3" })).toBe("{codename}");
  });

  it("rejects unknown placeholders", () => {
    expect(() => expandVariables("{nope}", variables)).toThrow("Unknown catalog variable {nope}");
  });
});

describe("parseCatalog", () => {
  it("resolves the action list for the detected family and fills defaults", () => {
    const steps = parse(`
version: 1
steps:
  - id: tools
    title: Tools
    notes:
      - shared note
      - { text: debian note, family: debian }
      - { text: suse note, family: tumbleweed }
    debian:
      - kind: install
        packages: [git]
    tumbleweed:
      - kind: install
        packages: [git-core]
  - id: debian-only
    title: Only on Debian
    debian:
      - kind: refresh
`);

    expect(steps).toEqual([
      {
        name: "tools",
        title: "Tools",
        fatal: false,
        actions: [{ kind: "install", packages: ["git"], no_recommends: false, pattern: false, allow_downgrade: false }],
        notes: ["shared note", "debian note"],
      },
      { name: "debian-only", title: "Only on Debian", fatal: false, actions: [{ kind: "refresh" }], notes: [] },
    ]);
  });

  it("leaves out steps without actions for the family", () => {
    const steps = parse(
      `
version: 1
steps:
  - id: debian-only
    title: Only on Debian
    debian:
      - kind: refresh
`,
      "tumbleweed",
    );
    expect(steps).toEqual([]);
  });

  it("maps repository and pin blocks", () => {
    const [step] = parse(`
version: 1
steps:
  - id: repo
    title: Repo
    debian:
      - kind: repo-add
        repo:
          id: example
          entry: "deb [signed-by={keyring}] https://example.com/repo {codename} main"
          signing_key: { url: "https://example.com/key.gpg", keyring: example.gpg }
          pin: { id: example-pin, packages: [tool], release: "{codename}", priority: 600 }
`);

    expect(step.actions).toEqual([
      {
        kind: "repo-add",
        repo: {
          id: "example",
          entry: "deb [signed-by={keyring}] https://example.com/repo bookworm main",
          signingKey: { url: "https://example.com/key.gpg", keyring: "example.gpg", dearmor: true },
          pin: { id: "example-pin", packages: ["tool"], release: "bookworm", priority: 600, perPackage: false, header: undefined },
        },
      },
    ]);
  });

  it("rejects apt-only actions under tumbleweed", () => {
    expect(() =>
      parse(`
version: 1
steps:
  - id: repo
    title: Repo
    tumbleweed:
      - kind: repo-dedupe
`),
    ).toThrow("Invalid catalog: steps.0.tumbleweed.0.kind: 'repo-dedupe' actions are only available on debian");
  });

  it("rejects duplicate step ids", () => {
    expect(() =>
      parse(`
version: 1
steps:
  - { id: a, title: A, debian: [{ kind: refresh }] }
  - { id: a, title: Again, debian: [{ kind: refresh }] }
`),
    ).toThrow("Invalid catalog: steps.1.id: duplicate step id 'a'");
  });

  it("rejects unknown action fields", () => {
    expect(() =>
      parse(`
version: 1
steps:
  - { id: a, title: A, debian: [{ kind: refresh, packages: [git] }] }
`),
    ).toThrow(ProvisionError);
  });

  it("reports YAML syntax errors", () => {
    expect(() => parse("version: [1")).toThrow(/^Catalog is not valid YAML: /);
  });

  it("needs exactly one of content or source for file-write", () => {
    expect(() =>
      parse(`
version: 1
steps:
  - { id: a, title: A, debian: [{ kind: file-write, path: /tmp/x }] }
`),
    ).toThrow("file-write /tmp/x needs exactly one of content or source");
  });
});

describe("loadCatalog", () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "ws-catalog-"));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it("reads file-write sources relative to the catalog", async () => {
    await fs.mkdir(path.join(tmpDir, "files"));
    await fs.writeFile(path.join(tmpDir, "files", "hello.txt"), "hello\n");
    const file = path.join(tmpDir, "catalog.yaml");
    await fs.writeFile(
      file,
      "version: 1\nsteps:\n  - id: a\n    title: A\n    debian:\n      - kind: file-write\n        path: /etc/hello\n        source: files/hello.txt\n        mode: 0o644\n",
    );

    const [step] = loadCatalog(file, { family: "debian", variables }, silentLogger());

    expect(step.actions).toEqual([{ kind: "file-write", path: "/etc/hello", content: "hello\n", mode: 0o644 }]);
  });

  it("fails on a missing catalog file", () => {
    expect(() => loadCatalog(path.join(tmpDir, "none.yaml"), { family: "debian", variables }, silentLogger())).toThrow(
      /^Cannot read catalog /,
    );
  });
});

describe("bundled catalog", () => {
  it("resolves every step for Debian with the dependency repair first", () => {
    const steps = loadCatalog(DEFAULT_CATALOG_PATH, { family: "debian", variables }, silentLogger());

    expect(steps).toHaveLength(21);
    expect(steps[0]).toMatchObject({ name: "fix-dependencies", fatal: true });
    expect(steps.filter((s) => s.fatal).map((s) => s.name)).toEqual(["fix-dependencies"]);
    expect(steps.find((s) => s.name === "nodejs")?.title).toBe("Node.js 22.x LTS + Global Tools");

    const containers = steps.find((s) => s.name === "containers");
    expect(containers?.actions[1]).toEqual({
      kind: "repo-add",
      repo: {
        id: "docker",
        entry: "deb [arch={arch} signed-by={keyring}] https://download.docker.com/linux/debian bookworm stable",
        signingKey: { url: "https://download.docker.com/linux/debian/gpg", keyring: "docker.gpg", dearmor: true },
        pin: undefined,
      },
    });
  });

  it("resolves every step for Tumbleweed without apt-only actions", () => {
    const suseVariables = { node_major: "22", php_version: "8.3", instructions_dir: "/root" };
    const steps = loadCatalog(DEFAULT_CATALOG_PATH, { family: "tumbleweed", variables: suseVariables }, silentLogger());

    expect(steps).toHaveLength(21);
    const kinds = new Set(steps.flatMap((s) => s.actions.map((a) => a.kind)));
    expect(kinds.has("repo-add")).toBe(false);
    expect(kinds.has("pin")).toBe(false);
  });

  it("inlines the Composer instructions for both families", () => {
    for (const family of ["debian", "tumbleweed"] as const) {
      const php = loadCatalog(DEFAULT_CATALOG_PATH, { family, variables }, silentLogger()).find((s) => s.name === "php");
      const write = php?.actions.find((a) => a.kind === "file-write");
      expect(write).toMatchObject({ kind: "file-write", path: "/root/COMPOSER_INSTALL.md" });
    }
  });
});
