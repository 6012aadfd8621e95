/** Keyword that opens an active one-line apt entry. */
export const ENTRY_KEYWORD = "deb";

const ACTIVE_LINE = new RegExp(`^${ENTRY_KEYWORD}[ \\t]`);

/**
 * A line is active iff it starts with the entry keyword followed by whitespace.
 * Comments, blanks, `deb-src` and malformed lines are never active.
 */
export function isActiveLine(line: string): boolean {
  return ACTIVE_LINE.test(line);
}

/**
 * Comparison form of an entry: whitespace runs collapsed, ends trimmed.
 * Field order and case are kept (literal-line semantics).
 */
export function normalizeLine(line: string): string {
  return line.replace(/[ \t]+/g, " ").trim();
}

export interface SplitContent {
  lines: string[];
  trailingNewline: boolean;
}

export function splitLines(content: string): SplitContent {
  if (content === "") return { lines: [], trailingNewline: false };
  const lines = content.split("\n");
  const trailingNewline = lines[lines.length - 1] === "";
  if (trailingNewline) lines.pop();
  return { lines, trailingNewline };
}

export function joinLines({ lines, trailingNewline }: SplitContent): string {
  if (lines.length === 0) return "";
  return lines.join("\n") + (trailingNewline ? "\n" : "");
}

/** Whitespace-separated fields of an entry, excluding any trailing comment. */
export function entryFields(line: string): string[] {
  const hashAt = line.indexOf("#");
  const body = hashAt >= 0 ? line.slice(0, hashAt) : line;
  return body.trim().split(/\s+/).filter(Boolean);
}
