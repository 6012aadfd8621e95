export type { Command } from "./types/command.js";
export type { DistroContext, DistroFamily, PackageManager } from "./types/distro.js";
export type { ProvisionConfig } from "./types/config.js";
export type { AddRepoResult, ApplyPinResult, DedupResult, PinRule, RemoveRepoResult, RepoSource, SigningKey } from "./types/sources.js";
export type { Action, ActionKind, RunOutcome, RunReport, RunState, SkipGuard, Step, StepResult, StepStatus } from "./types/step.js";
export { DURATION_TIMEOUTS, type DurationCategory } from "./types/timeouts.js";

export * from "./shared/errors.js";
export { withDeadline } from "./shared/deadline.js";
export { createLogger, silentLogger, type Logger } from "./logger.js";
export { loadConfig, DEFAULT_CONFIG, DEFAULT_CONFIG_PATH } from "./config/loader.js";
export { detectDistro, buildDistroContext, parseOsRelease } from "./distro/detector.js";
export { LocalExecutor, DryRunExecutor, type Executor, type ExecResult } from "./execution/executor.js";

export type { PackageBackend, InstallOptions, InstallFlag } from "./backend/interface.js";
export { AptBackend } from "./backend/apt.js";
export { ZypperBackend } from "./backend/zypper.js";
export { CommandRunner } from "./backend/runner.js";
export { createBackend } from "./backend/factory.js";

export { SourceRegistry, renderPin, type SourceLayout } from "./sources/registry.js";
export { loadCatalog, parseCatalog, DEFAULT_CATALOG_PATH } from "./catalog/loader.js";
export { createProvisionContext, type ProvisionContext } from "./context.js";
export { Orchestrator, standardPreconditions, type Precondition } from "./orchestrator/orchestrator.js";
export { formatSummary, formatStepList } from "./report/summary.js";
export { renderMarkdownReport, writeMarkdownReport } from "./report/markdown.js";
