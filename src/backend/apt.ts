import type { Command } from "../types/command.js";
import { NONINTERACTIVE_ENV } from "../execution/executor.js";
import type { InstallOptions } from "./interface.js";
import { BaseBackend } from "./base.js";

/** Debian backend over apt-get, apt-mark, dpkg and dpkg-query. */
export class AptBackend extends BaseBackend {
  readonly family = "debian" as const;

  private aptGet(...args: string[]): Command {
    return { argv: ["apt-get", ...args], env: NONINTERACTIVE_ENV };
  }

  installCommand(names: readonly string[], options?: InstallOptions): Command {
    const args = ["install", "-y"];
    if (options?.flags?.has("no-recommends")) args.push("--no-install-recommends");
    if (options?.allowDowngrade) args.push("--allow-downgrades");
    if (options?.targetRelease) args.push("-t", options.targetRelease);
    return this.aptGet(...args, ...names);
  }

  async refresh(): Promise<void> {
    await this.runner.run(this.aptGet("update", "-y"), "slow");
  }

  async install(names: readonly string[], options?: InstallOptions): Promise<void> {
    if (names.length === 0) return;
    this.logger.info({ count: names.length, targetRelease: options?.targetRelease }, "apt-get install");
    await this.runner.run(this.installCommand(names, options), "long_running", [...names]);
  }

  async upgrade(options?: { full?: boolean }): Promise<void> {
    await this.runner.run(this.aptGet("upgrade", "-y"), "long_running");
    if (options?.full) await this.runner.run(this.aptGet("dist-upgrade", "-y"), "long_running");
    await this.runner.run(this.aptGet("autoremove", "-y"), "slow");
    await this.runner.run(this.aptGet("autoclean", "-y"), "normal");
  }

  async repair(): Promise<void> {
    this.logger.info("Configuring partially installed packages");
    await this.runner.run({ argv: ["dpkg", "--configure", "-a"], env: NONINTERACTIVE_ENV }, "long_running");
    this.logger.info("Fixing broken installs");
    await this.runner.run(this.aptGet("install", "-f", "-y"), "long_running");
    await this.runner.run(this.aptGet("autoremove", "-y"), "slow");
    await this.runner.run(this.aptGet("autoclean", "-y"), "normal");
  }

  async isInstalled(name: string): Promise<boolean> {
    const r = await this.runner.query(["dpkg-query", "-W", "-f=${Status}", name]);
    return r.exitCode === 0 && r.stdout.includes("install ok installed");
  }

  async installedVersion(name: string): Promise<string | null> {
    const r = await this.runner.query(["dpkg-query", "-W", "-f=${Version}", name]);
    const version = r.stdout.trim();
    return r.exitCode === 0 && version ? version : null;
  }

  async heldPackages(): Promise<Set<string>> {
    const r = await this.runner.query(["dpkg", "--get-selections"]);
    const held = new Set<string>();
    for (const line of r.stdout.split("\n")) {
      const [name, state] = line.trim().split(/\s+/);
      if (name && state === "hold") held.add(name);
    }
    return held;
  }

  async releaseHolds(names: readonly string[]): Promise<void> {
    if (names.length === 0) return;
    await this.runner.run({ argv: ["apt-mark", "unhold", ...names] }, "quick", [...names]);
  }

  protected versionListingArgv(): string[] {
    return ["dpkg-query", "-W", "-f=${Package} ${Version}\\n"];
  }

  async primaryArchitecture(): Promise<string> {
    const r = await this.runner.query(["dpkg", "--print-architecture"], "instant");
    return r.stdout.trim() || "amd64";
  }

  async foreignArchitectures(): Promise<Set<string>> {
    const r = await this.runner.query(["dpkg", "--print-foreign-architectures"], "instant");
    return new Set(r.stdout.split("\n").map((l) => l.trim()).filter(Boolean));
  }

  async addArchitecture(arch: string): Promise<void> {
    await this.runner.run({ argv: ["dpkg", "--add-architecture", arch] }, "quick");
    await this.refresh();
  }
}
