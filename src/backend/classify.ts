import type { Command } from "../types/command.js";
import type { ExecResult } from "../execution/executor.js";
import {
  CommandError,
  PackageConflictError,
  PackageNotFoundError,
  TimeoutError,
  TransientNetworkError,
  type ProvisionError,
} from "../shared/errors.js";

// ── Failure classification ─────────────────────────────────────────

interface FailureContext {
  command: string;
  stderr: string;
  exitCode: number;
  packages: string[];
}

interface ErrorPattern {
  test: (stderr: string) => boolean;
  build: (ctx: FailureContext) => ProvisionError;
}

// Order matters: lock contention first, since apt prints "Unable to..." lines for locks too.
const ERROR_PATTERNS: ErrorPattern[] = [
  { test: (s) => s.includes("could not get lock") || s.includes("dpkg frontend lock") || s.includes("system management is locked") || s.includes("rpm.lock"),
    build: ({ stderr, packages }) => new PackageConflictError(packages, firstLine(stderr) || "Package manager is locked by another process", { locked: true }) },
  { test: (s) => s.includes("unable to locate package") || s.includes("has no installation candidate") || s.includes("not found in package names") || s.includes("no provider of"),
    build: ({ stderr, packages }) => {
      const missing = extractMissingPackages(stderr);
      return new PackageNotFoundError(missing.length ? missing : packages, firstLine(stderr) || "Package not found");
    } },
  { test: (s) => s.includes("unmet dependencies") || s.includes("held broken packages") || s.includes("dependency problems") || s.includes("conflicts with"),
    build: ({ stderr, packages }) => new PackageConflictError(packages, firstLine(stderr) || "Dependency conflict") },
  { test: (s) => s.includes("could not resolve") || s.includes("failed to fetch") || s.includes("temporary failure resolving") || s.includes("connection timed out") || s.includes("network is unreachable") || s.includes("download (curl) error") || s.includes("curl: ("),
    build: ({ stderr }) => new TransientNetworkError(firstLine(stderr) || "Network failure") },
  { test: (s) => s.includes("no space left on device"),
    build: ({ command, exitCode, stderr }) => new CommandError(command, exitCode, stderr, "resource") },
  { test: (s) => s.includes("permission denied") || s.includes("are you root?") || s.includes("root privileges"),
    build: ({ command, exitCode, stderr }) => new CommandError(command, exitCode, stderr, "privilege") },
];

/**
 * Map a failed command to the ProvisionError taxonomy.
 * `packages` names the packages the command was about, for error context.
 */
export function classifyFailure(command: Command, result: ExecResult, timeoutMs: number, packages: string[] = []): ProvisionError {
  const commandLine = command.argv.join(" ");
  if (result.timedOut) return new TimeoutError(commandLine, timeoutMs);

  const lower = result.stderr.toLowerCase();
  const ctx: FailureContext = { command: commandLine, stderr: result.stderr, exitCode: result.exitCode, packages };
  for (const p of ERROR_PATTERNS) {
    if (p.test(lower)) return p.build(ctx);
  }
  return new CommandError(commandLine, result.exitCode, result.stderr);
}

function firstLine(stderr: string): string {
  return stderr.split("\n").map((l) => l.trim()).find(Boolean) ?? "";
}

/** Pull package names out of apt/zypper "not found" messages. */
export function extractMissingPackages(stderr: string): string[] {
  const names = new Set<string>();
  for (const m of stderr.matchAll(/Unable to locate package (\S+)/gi)) names.add(m[1]);
  for (const m of stderr.matchAll(/Package '?([^\s']+)'? has no installation candidate/gi)) names.add(m[1]);
  for (const m of stderr.matchAll(/'([^']+)' not found in package names/gi)) names.add(m[1]);
  for (const m of stderr.matchAll(/No provider of '([^']+)' found/gi)) names.add(m[1]);
  return [...names];
}
