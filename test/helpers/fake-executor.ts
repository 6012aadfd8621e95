import type { Command } from "../../src/types/command.js";
import type { Executor, ExecResult } from "../../src/execution/executor.js";

export interface ScriptedResponse {
  stdout?: string;
  stderr?: string;
  exitCode?: number;
  timedOut?: boolean;
  /** Answer only after this long; an abort cuts the wait short and reports a timeout. */
  delayMs?: number;
}

type Matcher = (argv: readonly string[]) => boolean;

/** Resolves true when `signal` aborts first, false once `ms` have passed. */
function pause(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(true);
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve(false);
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * In-process stand-in for the package managers: records every command and
 * answers from scripted rules. Unmatched commands succeed with empty output.
 */
export class FakeExecutor implements Executor {
  readonly calls: Array<{ command: Command; timeoutMs: number; signal?: AbortSignal }> = [];
  private readonly rules: Array<{ match: Matcher; response: ScriptedResponse }> = [];

  /** Answer commands whose argv starts with `prefix`. Later rules win. */
  on(prefix: readonly string[] | Matcher, response: ScriptedResponse): this {
    const match: Matcher = typeof prefix === "function"
      ? prefix
      : (argv) => prefix.every((part, i) => argv[i] === part);
    this.rules.push({ match, response });
    return this;
  }

  async execute(command: Command, timeoutMs: number, signal?: AbortSignal): Promise<ExecResult> {
    this.calls.push(signal ? { command, timeoutMs, signal } : { command, timeoutMs });
    const rule = [...this.rules].reverse().find((r) => r.match(command.argv));
    const response = rule?.response ?? {};
    if (response.delayMs !== undefined && (await pause(response.delayMs, signal))) {
      return { stdout: "", stderr: "", exitCode: 124, durationMs: 0, timedOut: true };
    }
    return {
      stdout: response.stdout ?? "",
      stderr: response.stderr ?? "",
      exitCode: response.exitCode ?? 0,
      durationMs: 0,
      timedOut: response.timedOut ?? false,
    };
  }

  /** Command lines in execution order. */
  lines(): string[] {
    return this.calls.map((c) => c.command.argv.join(" "));
  }
}
