import type { DistroFamily } from "../types/distro.js";

/** Debian codenames by major version. */
export const DEBIAN_RELEASES: Record<string, number> = {
  buster: 10,
  bullseye: 11,
  bookworm: 12,
  trixie: 13,
  forky: 14,
};

/**
 * Version-string markers that identify packages built for a newer release
 * than the local one. Debian: `debN`, `bpoN` and the codename of every newer
 * release; backports of the local release are not foreign. An unknown local
 * release has no newer releases to look for.
 * Tumbleweed: Leap/Backports build markers (`lpNNN`, `bpNNN`).
 */
export function foreignMarkers(family: DistroFamily, localReleaseTag: string): RegExp[] {
  if (family === "tumbleweed") return [/\b(?:lp|bp)\d{3}/];

  const local = DEBIAN_RELEASES[localReleaseTag.toLowerCase()];
  if (local === undefined) return [];

  const markers: RegExp[] = [];
  for (const [codename, major] of Object.entries(DEBIAN_RELEASES)) {
    if (major <= local) continue;
    markers.push(new RegExp(`deb${major}(?!\\d)`), new RegExp(`bpo${major}(?!\\d)`), new RegExp(codename));
  }
  return markers;
}

/**
 * Markers for a package that should come back to the pinned release:
 * the foreign markers plus any backport, local ones included.
 */
export function downgradeMarkers(family: DistroFamily, localReleaseTag: string): RegExp[] {
  const markers = foreignMarkers(family, localReleaseTag);
  return family === "debian" ? [/~bpo\d+/, ...markers] : markers;
}

export function isForeignVersion(version: string, markers: readonly RegExp[]): boolean {
  return markers.some((m) => m.test(version));
}
