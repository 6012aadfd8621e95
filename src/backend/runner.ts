import type { Command } from "../types/command.js";
import type { DurationCategory } from "../types/timeouts.js";
import { DURATION_TIMEOUTS } from "../types/timeouts.js";
import type { Executor, ExecResult } from "../execution/executor.js";
import type { Logger } from "../logger.js";
import { classifyFailure } from "./classify.js";

/**
 * Runs backend commands with a bounded wait per duration category
 * and turns non-zero exits into classified ProvisionErrors.
 */
export class CommandRunner {
  /** Cancels in-flight commands of the current action; see withSignal(). */
  private signal?: AbortSignal;

  constructor(
    private readonly executor: Executor,
    private readonly logger: Logger,
    /** Seconds; 0 disables the ceiling. */
    private readonly timeoutCeiling = 0,
  ) {}

  timeoutFor(duration: DurationCategory): number {
    return this.timeoutCeiling > 0
      ? Math.min(DURATION_TIMEOUTS[duration], this.timeoutCeiling * 1000)
      : DURATION_TIMEOUTS[duration];
  }

  /**
   * Run `work` with every command it issues bound to `signal`: aborting it
   * kills the running child and fails the commands that follow.
   * Actions run one at a time, so a single active signal suffices.
   */
  async withSignal<T>(signal: AbortSignal, work: () => Promise<T>): Promise<T> {
    const previous = this.signal;
    this.signal = signal;
    try {
      return await work();
    } finally {
      this.signal = previous;
    }
  }

  /** Execute and throw on failure. */
  async run(command: Command, duration: DurationCategory, packages: string[] = [], timeoutMs?: number): Promise<ExecResult> {
    const timeout = timeoutMs ?? this.timeoutFor(duration);
    const result = await this.executor.execute(command, timeout, this.signal);
    if (result.exitCode !== 0 || result.timedOut) {
      const err = classifyFailure(command, result, timeout, packages);
      this.logger.debug({ argv: command.argv, exitCode: result.exitCode, code: err.code }, "Command failed");
      throw err;
    }
    return result;
  }

  /** Execute a read-only query; the caller interprets the exit code. */
  async query(argv: string[], duration: DurationCategory = "quick"): Promise<ExecResult> {
    return this.executor.execute({ argv, readOnly: true }, this.timeoutFor(duration), this.signal);
  }
}
