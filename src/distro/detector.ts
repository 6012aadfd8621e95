import { readFileSync } from "node:fs";
import type { DistroContext, DistroFamily, PackageManager } from "../types/distro.js";
import type { ProvisionConfig } from "../types/config.js";
import { PreconditionError } from "../shared/errors.js";
import type { Logger } from "../logger.js";

/** Parse /etc/os-release into key-value pairs. */
export function parseOsRelease(content: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const line of content.split("\n")) {
    const match = line.match(/^([A-Z_]+)=(.*)$/);
    if (match) {
      result[match[1]] = match[2].replace(/^["']|["']$/g, "");
    }
  }
  return result;
}

/** Resolve distro family from os-release fields, or null when unsupported. */
export function resolveFamily(osRelease: Record<string, string>): DistroFamily | null {
  const id = (osRelease.ID ?? "").toLowerCase();
  if (id === "debian") return "debian";
  if (id.startsWith("opensuse")) return "tumbleweed";
  return null;
}

const PACKAGE_MANAGERS: Record<DistroFamily, PackageManager> = {
  debian: "apt",
  tumbleweed: "zypper",
};

/** Build a DistroContext from parsed os-release fields. */
export function buildDistroContext(
  osRelease: Record<string, string>,
  overrides?: ProvisionConfig["distro"],
): DistroContext {
  const id = (osRelease.ID ?? "").toLowerCase();
  const name = overrides?.name ?? osRelease.NAME ?? (id || "Unknown");
  const family = overrides?.family ?? resolveFamily(osRelease);
  if (!family) {
    throw new PreconditionError(`Unsupported distribution: ${name} (${id || "unknown id"}). Supported: Debian 12 | openSUSE Tumbleweed`, { id });
  }
  const version = overrides?.version ?? osRelease.VERSION_ID ?? "unknown";
  const codename = overrides?.codename !== undefined ? overrides.codename : osRelease.VERSION_CODENAME ?? null;

  const targetRelease = family === "debian"
    ? version === "12"
    : id === "opensuse-tumbleweed" || overrides?.family === "tumbleweed";

  return {
    id,
    family,
    name,
    version,
    codename,
    package_manager: PACKAGE_MANAGERS[family],
    target_release: targetRelease,
  };
}

/**
 * Detect the local distro and populate DistroContext.
 * Throws PreconditionError when the distribution is unsupported.
 */
export function detectDistro(logger: Logger, overrides?: ProvisionConfig["distro"], osReleasePath = "/etc/os-release"): DistroContext {
  let osRelease: Record<string, string> = {};
  try {
    osRelease = parseOsRelease(readFileSync(osReleasePath, "utf-8"));
  } catch {
    if (!overrides?.family) {
      throw new PreconditionError(`${osReleasePath} not found — cannot detect distribution`);
    }
    logger.warn({ osReleasePath }, "Could not read os-release — relying on configured distro override");
  }

  const context = buildDistroContext(osRelease, overrides);
  logger.info({ distro: context }, "Distro detection complete");
  return context;
}

/** Root check: package managers and /etc/apt writes need uid 0. */
export function isPrivileged(): boolean {
  return typeof process.getuid === "function" && process.getuid() === 0;
}
