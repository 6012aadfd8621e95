import type { DistroFamily } from "../types/distro.js";

/** Install modifiers understood by both backends. */
export type InstallFlag = "no-recommends" | "pattern";

export interface InstallOptions {
  /** Permit installing an older version than the one present (pin-driven downgrade). */
  allowDowngrade?: boolean;
  flags?: ReadonlySet<InstallFlag>;
  /** apt `-t <release>`; ignored by zypper. */
  targetRelease?: string;
}

/**
 * Distro-specific package manager capability.
 * Steps express intent through these methods; implementations translate
 * to apt/dpkg or zypper/rpm commands and classify failures into the
 * ProvisionError taxonomy. Stateless: safe to share between components.
 */
export interface PackageBackend {
  readonly family: DistroFamily;

  /** Re-synchronize the package index. Throws TransientNetworkError when unreachable. */
  refresh(): Promise<void>;
  install(names: readonly string[], options?: InstallOptions): Promise<void>;
  upgrade(options?: { full?: boolean }): Promise<void>;
  /** Configure half-installed packages, fix broken dependencies, clean caches. */
  repair(): Promise<void>;

  isInstalled(name: string): Promise<boolean>;
  installedVersion(name: string): Promise<string | null>;
  heldPackages(): Promise<Set<string>>;
  releaseHolds(names: readonly string[]): Promise<void>;
  /** Installed packages whose version marks them as coming from another release channel. */
  foreignReleasePackages(localReleaseTag: string): Promise<Set<string>>;

  primaryArchitecture(): Promise<string>;
  foreignArchitectures(): Promise<Set<string>>;
  addArchitecture(arch: string): Promise<void>;

  enableService(unit: string, options?: { now?: boolean }): Promise<void>;
  startService(unit: string, timeoutMs?: number): Promise<void>;
}
