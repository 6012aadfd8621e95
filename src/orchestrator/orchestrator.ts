// Orchestrator: runs the resolved steps strictly in order and owns the RunReport.
// State machine: not_started → running(i) → completed | aborted.
// Preconditions are checked once before running(0); cancellation is observed
// only between steps; every action runs under a deadline that kills its commands
// on expiry, and is never retried.
import type { ProvisionContext } from "../context.js";
import type { Action, RunOutcome, RunReport, RunState, Step, StepResult, StepStatus } from "../types/step.js";
import { ConfigWriteError, PreconditionError, describeError } from "../shared/errors.js";
import { withDeadline } from "../shared/deadline.js";
import { describeAction, executeAction, type ActionOutcome } from "./actions.js";

/** A check that must hold before any step runs; throws PreconditionError otherwise. */
export interface Precondition {
  readonly name: string;
  check(): void | Promise<void>;
}

/** `signal` aborts when the action's deadline passes. */
export type ActionExecutor = (action: Action, ctx: ProvisionContext, signal: AbortSignal) => Promise<ActionOutcome>;

export interface OrchestratorOptions {
  /** Step names to run; everything else is left out. Order still follows the catalog. */
  readonly only?: readonly string[];
  readonly signal?: AbortSignal;
  readonly preconditions?: readonly Precondition[];
  /** Replaces the built-in action handlers; used by tests. */
  readonly executeAction?: ActionExecutor;
}

export const EXIT_OK = 0;
export const EXIT_ABORTED = 1;
export const EXIT_WARNINGS = 2;

/** Standard checks: supported release (or the override) and root privilege. */
export function standardPreconditions(ctx: ProvisionContext, privileged: () => boolean): Precondition[] {
  const { distro, config } = ctx;
  return [
    {
      name: "tested-release",
      check() {
        if (distro.target_release) return;
        if (config.run.allow_untested_release) {
          ctx.logger.warn({ distro: distro.name, version: distro.version }, "Untested release — continuing because the override is set");
          return;
        }
        throw new PreconditionError(
          `${distro.name} ${distro.version} is not a tested release (Debian 12 | openSUSE Tumbleweed); pass --allow-untested to continue`,
          { id: distro.id, version: distro.version },
        );
      },
    },
    {
      name: "privilege",
      check() {
        // A dry run only reads system state.
        if (ctx.dryRun || privileged()) return;
        throw new PreconditionError("Must be run as root");
      },
    },
  ];
}

export class Orchestrator {
  private runState: RunState = { kind: "not_started" };

  constructor(
    private readonly ctx: ProvisionContext,
    private readonly steps: readonly Step[],
    private readonly options: OrchestratorOptions = {},
  ) {}

  get state(): RunState {
    return this.runState;
  }

  /** Steps selected for this run, in catalog order. */
  selectedSteps(): Step[] {
    const only = this.options.only;
    if (!only || only.length === 0) return [...this.steps];
    const known = new Set(this.steps.map((s) => s.name));
    const unknown = only.filter((name) => !known.has(name));
    if (unknown.length > 0) {
      throw new PreconditionError(`Unknown step(s): ${unknown.join(", ")}`, { unknown });
    }
    const wanted = new Set(only);
    return this.steps.filter((s) => wanted.has(s.name));
  }

  async run(): Promise<RunReport> {
    const startedAt = new Date().toISOString();
    const { logger } = this.ctx;

    let selected: Step[];
    try {
      for (const precondition of this.options.preconditions ?? []) await precondition.check();
      selected = this.selectedSteps();
    } catch (err) {
      const reason = describeError(err);
      logger.error({ error: reason }, "Precondition failed — nothing was changed");
      this.runState = { kind: "aborted", reason };
      return this.report(startedAt, []);
    }

    const results: StepResult[] = [];
    for (const [index, step] of selected.entries()) {
      if (this.options.signal?.aborted) {
        const reason = `Cancelled before step ${step.name}`;
        logger.warn({ step: step.name }, "Run cancelled");
        this.runState = { kind: "aborted", reason };
        return this.report(startedAt, results);
      }

      this.runState = { kind: "running", index };
      logger.info({ step: step.name, index: index + 1, total: selected.length }, `── ${step.title} ──`);
      const { result, abort } = await this.runStep(step);
      results.push(result);

      if (abort) {
        const reason = `Fatal step ${step.name} failed`;
        logger.error({ step: step.name }, "Fatal step failed — aborting run");
        this.runState = { kind: "aborted", reason };
        return this.report(startedAt, results);
      }
    }

    this.runState = { kind: "completed" };
    return this.report(startedAt, results);
  }

  private async runStep(step: Step): Promise<{ result: StepResult; abort: boolean }> {
    const { logger } = this.ctx;
    const execute = this.options.executeAction ?? executeAction;
    const timeoutMs = this.ctx.config.timeouts.action_timeout * 1000;
    const start = performance.now();
    const messages: string[] = [];
    let status: StepStatus = "ok";
    let abort = false;

    const raise = (to: StepStatus): void => {
      if (to === "failed" || (to === "warning" && status === "ok")) status = to;
    };

    for (const action of step.actions) {
      const label = describeAction(action);
      try {
        const outcome = await withDeadline(`${step.name}: ${label}`, timeoutMs, (signal) =>
          this.ctx.runner.withSignal(signal, () => execute(action, this.ctx, signal)),
        );
        logger.info({ step: step.name, action: label, skipped: outcome.skipped }, outcome.detail);
        for (const warning of outcome.warnings) {
          logger.warn({ step: step.name, action: label }, warning);
          messages.push(`${label}: ${warning}`);
          raise("warning");
        }
      } catch (err) {
        const message = `${label}: ${describeError(err)}`;
        messages.push(message);
        if (action.optional) {
          logger.warn({ step: step.name, action: label, error: describeError(err) }, "Optional action failed — continuing");
          raise("warning");
          continue;
        }
        logger.error({ step: step.name, action: label, error: describeError(err) }, "Action failed");
        if (step.fatal) {
          raise("failed");
          abort = true;
        } else {
          raise(err instanceof ConfigWriteError ? "failed" : "warning");
        }
        // Later actions in a step build on earlier ones.
        break;
      }
    }

    return {
      result: { name: step.name, title: step.title, status, messages, durationMs: Math.round(performance.now() - start) },
      abort,
    };
  }

  private report(startedAt: string, steps: StepResult[]): RunReport {
    const aborted = this.runState.kind === "aborted";
    const clean = steps.every((s) => s.status === "ok");
    const outcome: RunOutcome = aborted ? "aborted" : clean ? "clean" : "warnings";
    const exitCode = aborted
      ? EXIT_ABORTED
      : outcome === "warnings" && this.ctx.config.run.strict_exit_code ? EXIT_WARNINGS : EXIT_OK;

    const ran = new Set(steps.map((s) => s.name));
    const notes = this.steps.filter((s) => ran.has(s.name)).flatMap((s) => s.notes);

    return {
      distro: this.ctx.distro,
      dryRun: this.ctx.dryRun,
      startedAt,
      finishedAt: new Date().toISOString(),
      state: this.runState,
      outcome,
      exitCode,
      steps,
      notes,
    };
  }
}
