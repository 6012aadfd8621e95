/** Distribution family supported by the provisioner. */
export type DistroFamily = "debian" | "tumbleweed";

/** Package manager resolved from distro family. */
export type PackageManager = "apt" | "zypper";

/**
 * Runtime distro context populated at startup.
 * Consumed by the backend factory, the catalog loader and the preconditions.
 */
export interface DistroContext {
  readonly id: string;
  readonly family: DistroFamily;
  readonly name: string;
  readonly version: string;
  readonly codename: string | null;
  readonly package_manager: PackageManager;
  /** True when the release is the one the catalog targets (Debian 12, Tumbleweed). */
  readonly target_release: boolean;
}
