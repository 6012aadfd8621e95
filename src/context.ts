import type { ProvisionConfig } from "./types/config.js";
import type { DistroContext } from "./types/distro.js";
import type { Logger } from "./logger.js";
import type { PackageBackend } from "./backend/interface.js";
import { createBackend } from "./backend/factory.js";
import { CommandRunner } from "./backend/runner.js";
import { DryRunExecutor, LocalExecutor, type Executor } from "./execution/executor.js";
import { SourceRegistry } from "./sources/registry.js";

/**
 * Shared provisioning context: the glue between all components.
 * Created once at startup and handed to the orchestrator and every action.
 */
export interface ProvisionContext {
  readonly config: ProvisionConfig;
  readonly distro: DistroContext;
  readonly logger: Logger;
  readonly executor: Executor;
  readonly runner: CommandRunner;
  readonly backend: PackageBackend;
  /** apt source management; null where the family has no apt configuration. */
  readonly sources: SourceRegistry | null;
  readonly dryRun: boolean;
}

export interface ContextOptions {
  config: ProvisionConfig;
  distro: DistroContext;
  logger: Logger;
  /** Defaults to a LocalExecutor; wrapped in a DryRunExecutor when config.run.dry_run is set. */
  executor?: Executor;
}

export function createProvisionContext(options: ContextOptions): ProvisionContext {
  const { config, distro, logger } = options;
  const dryRun = config.run.dry_run;
  const base = options.executor ?? new LocalExecutor(logger);
  const executor = dryRun ? new DryRunExecutor(base, logger) : base;
  const runner = new CommandRunner(executor, logger, config.timeouts.command_timeout_ceiling);
  const backend = createBackend(distro, runner, logger);

  const sources = distro.family === "debian"
    ? new SourceRegistry({
        layout: {
          sourcesList: config.paths.apt_sources_list,
          sourcesDir: config.paths.apt_sources_dir,
          preferencesDir: config.paths.apt_preferences_dir,
          keyringsDir: config.paths.apt_keyrings_dir,
        },
        backend,
        runner,
        logger,
        codename: distro.codename,
        dryRun,
      })
    : null;

  return { config, distro, logger, executor, runner, backend, sources, dryRun };
}
