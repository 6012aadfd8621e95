import type { DistroContext } from "./distro.js";
import type { DurationCategory } from "./timeouts.js";
import type { PinRule, RepoSource } from "./sources.js";

/** Skip an action when the system already provides what it would install. */
export type SkipGuard =
  | { readonly command_exists: string }
  | { readonly path_exists: string };

interface ActionBase {
  /** Failure is recorded and the step carries on with its next action. */
  readonly optional?: boolean;
  readonly skip_if?: SkipGuard;
}

export type ToolManager = "npm" | "pip" | "cpanm";

export type Action = ActionBase & (
  | { readonly kind: "refresh" }
  | { readonly kind: "upgrade"; readonly full: boolean }
  | { readonly kind: "repair" }
  | { readonly kind: "release-holds" }
  | {
      readonly kind: "install";
      readonly packages: readonly string[];
      readonly no_recommends: boolean;
      readonly pattern: boolean;
      readonly allow_downgrade: boolean;
      readonly target_release?: string;
    }
  | { readonly kind: "tool-install"; readonly manager: ToolManager; readonly packages: readonly string[]; readonly args: readonly string[] }
  | { readonly kind: "repo-add"; readonly repo: RepoSource }
  | { readonly kind: "repo-remove"; readonly repo: RepoSource }
  | { readonly kind: "repo-dedupe" }
  | {
      readonly kind: "pin";
      readonly pin: PinRule;
      /** When `package` is installed from a foreign release, downgrade to these specs after pinning. */
      readonly downgrade_if_foreign?: { readonly package: string; readonly install: readonly string[] };
    }
  | { readonly kind: "pin-foreign"; readonly id: string; readonly priority: number; readonly header: readonly string[] }
  | { readonly kind: "enable-component"; readonly component: string }
  | { readonly kind: "remove-redundant-source"; readonly file: string; readonly component: string }
  | { readonly kind: "add-architecture"; readonly arch: string }
  | {
      readonly kind: "service";
      readonly unit: string;
      readonly now: boolean;
      /** Separate bounded `systemctl start` after enabling (seconds). */
      readonly start_timeout?: number;
    }
  | { readonly kind: "file-write"; readonly path: string; readonly content: string; readonly mode?: number }
  | { readonly kind: "symlink"; readonly target: string; readonly link: string }
  | {
      readonly kind: "command";
      readonly argv: readonly string[];
      readonly stdin?: string;
      readonly env?: Readonly<Record<string, string>>;
      readonly duration: DurationCategory;
    }
);

export type ActionKind = Action["kind"];

/** A resolved provisioning step for the detected distribution. */
export interface Step {
  readonly name: string;
  readonly title: string;
  readonly fatal: boolean;
  readonly actions: readonly Action[];
  /** Follow-up hints printed after the run. */
  readonly notes: readonly string[];
}

// ── Run report ──────────────────────────────────────────────────

export type StepStatus = "ok" | "warning" | "failed";

export interface StepResult {
  readonly name: string;
  readonly title: string;
  readonly status: StepStatus;
  /** Message of every error or warning raised while the step ran. */
  readonly messages: readonly string[];
  readonly durationMs: number;
}

export type RunState =
  | { readonly kind: "not_started" }
  | { readonly kind: "running"; readonly index: number }
  | { readonly kind: "completed" }
  | { readonly kind: "aborted"; readonly reason: string };

export type RunOutcome = "clean" | "warnings" | "aborted";

export interface RunReport {
  readonly distro: DistroContext | null;
  readonly dryRun: boolean;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly state: RunState;
  readonly outcome: RunOutcome;
  readonly exitCode: number;
  readonly steps: readonly StepResult[];
  readonly notes: readonly string[];
}
