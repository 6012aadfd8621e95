import { downgradeMarkers, foreignMarkers, isForeignVersion } from "../../../src/backend/release-markers.js";

describe("foreignMarkers", () => {
  const bookworm = foreignMarkers("debian", "bookworm");

  it.each([
    ["7.88.1-10+deb12u5", false],
    ["2.36.1-8+deb11u1", false],
    ["8.5.0-2~bpo12+1", false],
    ["6.10.6-1~bpo12+1", false],
    ["1.0-1+deb13u1", true],
    ["1.0-1+deb130", false],
    ["2.0-3~trixie1", true],
    ["3.0-1~bpo13+1", true],
    ["3.0-1~bpo14+1", true],
    ["22.1.0-1nodesource1", false],
  ])("bookworm: %s foreign=%s", (version, expected) => {
    expect(isForeignVersion(version, bookworm)).toBe(expected);
  });

  it("has nothing to look for on an unknown release", () => {
    expect(foreignMarkers("debian", "sid")).toEqual([]);
  });

  it("looks for Leap and Backports builds on Tumbleweed", () => {
    const markers = foreignMarkers("tumbleweed", "tumbleweed");
    expect(isForeignVersion("1.2-lp156.3.1", markers)).toBe(true);
    expect(isForeignVersion("1.2-1.1", markers)).toBe(false);
  });
});

describe("downgradeMarkers", () => {
  it.each([
    ["8.5.0-2~bpo12+1", true],
    ["8.5.0-2~bpo11+1", true],
    ["8.6.0-1+deb13u1", true],
    ["7.88.1-10+deb12u5", false],
  ])("bookworm: %s downgrade=%s", (version, expected) => {
    expect(isForeignVersion(version, downgradeMarkers("debian", "bookworm"))).toBe(expected);
  });

  it("treats any backport as suspect on an unknown release", () => {
    const markers = downgradeMarkers("debian", "sid");
    expect(isForeignVersion("1.0-1~bpo11+1", markers)).toBe(true);
    expect(isForeignVersion("1.0-1", markers)).toBe(false);
  });

  it("matches the foreign markers on Tumbleweed", () => {
    expect(downgradeMarkers("tumbleweed", "tumbleweed")).toEqual(foreignMarkers("tumbleweed", "tumbleweed"));
  });
});
