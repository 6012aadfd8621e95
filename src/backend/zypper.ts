import type { Command } from "../types/command.js";
import type { InstallOptions } from "./interface.js";
import { BaseBackend } from "./base.js";

/** openSUSE Tumbleweed backend over zypper and rpm. */
export class ZypperBackend extends BaseBackend {
  readonly family = "tumbleweed" as const;

  private zypper(...args: string[]): Command {
    return { argv: ["zypper", "--non-interactive", ...args] };
  }

  installCommand(names: readonly string[], options?: InstallOptions): Command {
    const args = ["install", "-y"];
    if (options?.flags?.has("no-recommends")) args.push("--no-recommends");
    if (options?.allowDowngrade) args.push("--oldpackage");
    if (options?.flags?.has("pattern")) args.push("-t", "pattern");
    return this.zypper(...args, ...names);
  }

  async refresh(): Promise<void> {
    await this.runner.run(this.zypper("refresh"), "slow");
  }

  async install(names: readonly string[], options?: InstallOptions): Promise<void> {
    if (names.length === 0) return;
    this.logger.info({ count: names.length }, "zypper install");
    await this.runner.run(this.installCommand(names, options), "long_running", [...names]);
  }

  async upgrade(options?: { full?: boolean }): Promise<void> {
    await this.runner.run(this.zypper("refresh"), "slow");
    const cmd = options?.full ? this.zypper("dist-upgrade", "--allow-vendor-change") : this.zypper("update");
    await this.runner.run(cmd, "long_running");
  }

  async repair(): Promise<void> {
    this.logger.info("Running zypper verify to check package integrity");
    const verify = await this.runner.query(["zypper", "--non-interactive", "verify", "--dry-run"], "slow");
    if (verify.exitCode !== 0) {
      // A real verify run installs missing dependencies; do it only when the dry-run reports problems.
      await this.runner.run(this.zypper("verify"), "long_running");
    }
    await this.runner.run(this.zypper("clean", "--all"), "normal");
    await this.refresh();
  }

  async isInstalled(name: string): Promise<boolean> {
    const r = await this.runner.query(["rpm", "-q", name]);
    return r.exitCode === 0;
  }

  async installedVersion(name: string): Promise<string | null> {
    const r = await this.runner.query(["rpm", "-q", "--queryformat", "%{VERSION}-%{RELEASE}", name]);
    const version = r.stdout.trim();
    return r.exitCode === 0 && version ? version : null;
  }

  /** Parse the `zypper locks` table: "# | Name | Type | Repository". */
  async heldPackages(): Promise<Set<string>> {
    const r = await this.runner.query(["zypper", "--non-interactive", "locks"]);
    const held = new Set<string>();
    for (const line of r.stdout.split("\n")) {
      const cols = line.split("|").map((c) => c.trim());
      if (cols.length >= 2 && /^\d+$/.test(cols[0]) && cols[1]) held.add(cols[1]);
    }
    return held;
  }

  async releaseHolds(names: readonly string[]): Promise<void> {
    if (names.length === 0) return;
    await this.runner.run(this.zypper("removelock", ...names), "quick", [...names]);
  }

  protected versionListingArgv(): string[] {
    return ["rpm", "-qa", "--queryformat", "%{NAME} %{VERSION}-%{RELEASE}\\n"];
  }

  async primaryArchitecture(): Promise<string> {
    const r = await this.runner.query(["uname", "-m"], "instant");
    return r.stdout.trim() || "x86_64";
  }

  /** rpm installs -32bit packages side by side; there is no architecture to enable. */
  async foreignArchitectures(): Promise<Set<string>> {
    return new Set();
  }

  async addArchitecture(arch: string): Promise<void> {
    this.logger.debug({ arch }, "zypper needs no foreign architecture registration");
  }
}
