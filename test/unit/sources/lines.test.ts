import { entryFields, isActiveLine, joinLines, normalizeLine, splitLines } from "../../../src/sources/lines.js";

describe("isActiveLine", () => {
  it.each([
    ["deb http://deb.debian.org/debian bookworm main", true],
    ["deb\thttp://deb.debian.org/debian bookworm main", true],
    ["deb [arch=amd64] https://example.com/repo bookworm stable", true],
    ["deb-src http://deb.debian.org/debian bookworm main", false],
    ["# deb http://deb.debian.org/debian bookworm main", false],
    [" deb http://deb.debian.org/debian bookworm main", false],
    ["deb", false],
    ["", false],
  ])("%j → %s", (line, expected) => {
    expect(isActiveLine(line)).toBe(expected);
  });
});

describe("normalizeLine", () => {
  it("collapses whitespace runs and trims the ends", () => {
    expect(normalizeLine("deb   https://example.com/repo\tbookworm  main  ")).toBe("deb https://example.com/repo bookworm main");
  });

  it("keeps field order and case", () => {
    expect(normalizeLine("deb https://Example.com/repo bookworm contrib main")).toBe("deb https://Example.com/repo bookworm contrib main");
  });
});

describe("splitLines / joinLines", () => {
  it("remembers the trailing newline", () => {
    expect(splitLines("a\nb\n")).toEqual({ lines: ["a", "b"], trailingNewline: true });
    expect(splitLines("a\nb")).toEqual({ lines: ["a", "b"], trailingNewline: false });
  });

  it("treats empty content as no lines", () => {
    expect(splitLines("")).toEqual({ lines: [], trailingNewline: false });
    expect(joinLines({ lines: [], trailingNewline: true })).toBe("");
  });

  it("reassembles the original text", () => {
    for (const text of ["a\nb\n", "a\nb", "# only\n", "\n"]) {
      expect(joinLines(splitLines(text))).toBe(text);
    }
  });
});

describe("entryFields", () => {
  it("stops at the comment marker", () => {
    expect(entryFields("deb [arch=amd64] http://x.example bookworm main # note")).toEqual([
      "deb",
      "[arch=amd64]",
      "http://x.example",
      "bookworm",
      "main",
    ]);
  });
});
