import type { DistroFamily } from "../types/distro.js";
import type { Logger } from "../logger.js";
import type { InstallOptions, PackageBackend } from "./interface.js";
import type { CommandRunner } from "./runner.js";
import { foreignMarkers, isForeignVersion } from "./release-markers.js";

/**
 * Behaviour shared by both backends: systemd units and foreign-release
 * scanning over a "<name> <version>" listing.
 */
export abstract class BaseBackend implements PackageBackend {
  abstract readonly family: DistroFamily;

  constructor(protected readonly runner: CommandRunner, protected readonly logger: Logger) {}

  abstract refresh(): Promise<void>;
  abstract install(names: readonly string[], options?: InstallOptions): Promise<void>;
  abstract upgrade(options?: { full?: boolean }): Promise<void>;
  abstract repair(): Promise<void>;
  abstract isInstalled(name: string): Promise<boolean>;
  abstract installedVersion(name: string): Promise<string | null>;
  abstract heldPackages(): Promise<Set<string>>;
  abstract releaseHolds(names: readonly string[]): Promise<void>;
  abstract primaryArchitecture(): Promise<string>;
  abstract foreignArchitectures(): Promise<Set<string>>;
  abstract addArchitecture(arch: string): Promise<void>;

  /** argv printing one "<name> <version>" line per installed package. */
  protected abstract versionListingArgv(): string[];

  async foreignReleasePackages(localReleaseTag: string): Promise<Set<string>> {
    const r = await this.runner.query(this.versionListingArgv(), "normal");
    const markers = foreignMarkers(this.family, localReleaseTag);
    const foreign = new Set<string>();
    for (const line of r.stdout.split("\n")) {
      const [name, version] = line.trim().split(/\s+/);
      if (name && version && isForeignVersion(version, markers)) foreign.add(name);
    }
    return foreign;
  }

  async enableService(unit: string, options?: { now?: boolean }): Promise<void> {
    const argv = ["systemctl", "enable"];
    if (options?.now) argv.push("--now");
    argv.push(unit);
    await this.runner.run({ argv }, "normal");
  }

  async startService(unit: string, timeoutMs?: number): Promise<void> {
    await this.runner.run({ argv: ["systemctl", "start", unit] }, "normal", [], timeoutMs);
  }
}
