// Command execution layer: every backend command passes through this module.
// LocalExecutor.execute() is the hard boundary between the engine and the OS;
// DryRunExecutor wraps another executor and only lets read-only queries through.
import execa from "execa";
import type { Command } from "../types/command.js";
import type { Logger } from "../logger.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
  readonly timedOut: boolean;
}

export interface Executor {
  /** Aborting `signal` kills the child; the result then reports a timeout. */
  execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult>;
}

/** Environment that keeps apt/debconf from prompting. */
export const NONINTERACTIVE_ENV: Record<string, string> = {
  DEBIAN_FRONTEND: "noninteractive",
  DEBCONF_NONINTERACTIVE_SEEN: "true",
};

export class LocalExecutor implements Executor {
  constructor(private readonly logger: Logger) {}

  async execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (signal?.aborted) {
      return { stdout: "", stderr: "Cancelled before start", exitCode: 124, durationMs: 0, timedOut: true };
    }
    this.logger.debug({ argv: command.argv, timeoutMs }, "exec");

    let cancel: (() => void) | undefined;
    try {
      const child = execa(cmd, args, {
        env: command.env,
        extendEnv: true,
        input: command.stdin,
        timeout: timeoutMs,
        // 10MB ceiling: package listings stay well below this.
        maxBuffer: 10 * 1024 * 1024,
        reject: false,
        stripFinalNewline: false,
      });
      cancel = () => child.cancel();
      signal?.addEventListener("abort", cancel, { once: true });
      const result = await child;
      return {
        stdout: result.stdout ?? "",
        stderr: result.stderr ?? "",
        exitCode: result.exitCode ?? (result.timedOut || result.isCanceled ? 124 : 1),
        durationMs: Math.round(performance.now() - start),
        timedOut: result.timedOut || result.isCanceled,
      };
    } catch (err) {
      // Spawn failures (ENOENT etc.) surface as exit 127 like a shell would report.
      return {
        stdout: "",
        stderr: err instanceof Error ? err.message : String(err),
        exitCode: 127,
        durationMs: Math.round(performance.now() - start),
        timedOut: false,
      };
    } finally {
      if (cancel) signal?.removeEventListener("abort", cancel);
    }
  }
}

/** Recorded mutating command skipped under dry-run. */
export interface PlannedCommand {
  readonly argv: string[];
  readonly stdin?: string;
}

export class DryRunExecutor implements Executor {
  readonly planned: PlannedCommand[] = [];

  constructor(private readonly inner: Executor, private readonly logger: Logger) {}

  async execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult> {
    if (command.readOnly) return this.inner.execute(command, timeoutMs, signal);
    this.planned.push({ argv: command.argv, stdin: command.stdin });
    this.logger.info({ command: command.argv.join(" ") }, "[dry-run] would run");
    return { stdout: "", stderr: "", exitCode: 0, durationMs: 0, timedOut: false };
  }
}

