#!/usr/bin/env node

import { parseArgs } from "node:util";
import { createInterface } from "node:readline/promises";
import { createLogger } from "./logger.js";
import { loadConfig, type ConfigResult } from "./config/loader.js";
import { detectDistro, isPrivileged } from "./distro/detector.js";
import { DEFAULT_CATALOG_PATH, loadCatalog } from "./catalog/loader.js";
import { createProvisionContext } from "./context.js";
import { EXIT_ABORTED, EXIT_OK, Orchestrator, standardPreconditions } from "./orchestrator/orchestrator.js";
import { formatStepList, formatSummary } from "./report/summary.js";
import { writeMarkdownReport } from "./report/markdown.js";
import { describeError } from "./shared/errors.js";
import type { ProvisionConfig } from "./types/config.js";
import type { DistroContext } from "./types/distro.js";
import type { Step } from "./types/step.js";

export const USAGE = `ws-provision — provision a Debian 12 / openSUSE Tumbleweed development workstation

Usage:
  ws-provision [run] [options]     Run the provisioning steps (requires root)
  ws-provision list [options]      Print the steps resolved for this distribution

Options:
  -y, --yes               Do not ask for confirmation
  -n, --dry-run           Show what would change without changing anything
      --only <step>       Run only this step (repeatable)
      --config <path>     Configuration file (default /etc/workstation-provision/config.yaml)
      --catalog <path>    Step catalog (default: bundled catalog/workstation.yaml)
      --report <path>     Also write a markdown report
      --strict            Exit 2 when the run completes with warnings
      --allow-untested    Continue on a release other than Debian 12 / Tumbleweed
      --log-level <level> fatal | error | warn | info | debug | trace
  -h, --help              This message`;

const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace"] as const;
type LogLevel = ProvisionConfig["logging"]["level"];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface CliOptions {
  command: "run" | "list" | "help";
  yes: boolean;
  dryRun: boolean;
  only: string[];
  configPath?: string;
  catalogPath?: string;
  reportPath?: string;
  strict: boolean;
  allowUntested: boolean;
  logLevel?: LogLevel;
}

/** Parse argv (without node and script). Throws on unknown options or commands. */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      yes: { type: "boolean", short: "y", default: false },
      "dry-run": { type: "boolean", short: "n", default: false },
      only: { type: "string", multiple: true, default: [] },
      config: { type: "string" },
      catalog: { type: "string" },
      report: { type: "string" },
      strict: { type: "boolean", default: false },
      "allow-untested": { type: "boolean", default: false },
      "log-level": { type: "string" },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (positionals.length > 1) throw new Error(`Unexpected arguments: ${positionals.slice(1).join(" ")}`);
  const [command = "run"] = positionals;
  if (command !== "run" && command !== "list" && command !== "help") throw new Error(`Unknown command: ${command}`);

  const logLevel = values["log-level"];
  if (logLevel !== undefined && !isLogLevel(logLevel)) throw new Error(`Invalid log level: ${logLevel}`);

  return {
    command: values.help ? "help" : command,
    yes: values.yes ?? false,
    dryRun: values["dry-run"] ?? false,
    only: values.only ?? [],
    configPath: values.config,
    catalogPath: values.catalog,
    reportPath: values.report,
    strict: values.strict ?? false,
    allowUntested: values["allow-untested"] ?? false,
    logLevel,
  };
}

/**
 * Flags win over the configuration file; unset flags leave it alone.
 * The log level comes from --log-level, then LOG_LEVEL, then the file.
 */
export function applyCliOverrides(config: ProvisionConfig, options: CliOptions, env: NodeJS.ProcessEnv = process.env): ProvisionConfig {
  const next = structuredClone(config);
  if (options.yes) next.run.non_interactive = true;
  if (options.dryRun) next.run.dry_run = true;
  if (options.strict) next.run.strict_exit_code = true;
  if (options.allowUntested) next.run.allow_untested_release = true;
  if (options.catalogPath) next.catalog_path = options.catalogPath;
  const envLevel = env.LOG_LEVEL;
  if (options.logLevel) next.logging.level = options.logLevel;
  else if (envLevel !== undefined && isLogLevel(envLevel)) next.logging.level = envLevel;
  return next;
}

/** Variables available to catalog placeholders. */
export function catalogVariables(config: ProvisionConfig, distro: DistroContext): Record<string, string> {
  const variables: Record<string, string> = { ...config.variables, instructions_dir: config.paths.instructions_dir };
  if (distro.codename) variables.codename = distro.codename;
  return variables;
}

/** Empty input accepts, like the default of `[Y/n]`. */
export function isAffirmative(answer: string): boolean {
  const a = answer.trim().toLowerCase();
  return a !== "n" && a !== "no";
}

async function confirm(question: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return isAffirmative(await rl.question(question));
  } finally {
    rl.close();
  }
}

export async function main(argv: string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    console.error(`ws-provision: ${describeError(err)}\n\n${USAGE}`);
    return EXIT_ABORTED;
  }
  if (options.command === "help") {
    console.log(USAGE);
    return EXIT_OK;
  }

  // ── Phase 1: Load config ──────────────────────────────────────
  const bootstrap = createLogger({ level: options.logLevel });
  let loaded: ConfigResult;
  try {
    // Only a run may write the first-run default file.
    loaded = loadConfig(bootstrap, options.configPath ?? process.env.WS_PROVISION_CONFIG, {
      writeDefault: options.command === "run",
    });
  } catch (err) {
    bootstrap.error({ error: describeError(err) }, "Cannot start");
    return EXIT_ABORTED;
  }
  const config = applyCliOverrides(loaded.config, options);
  const logger = createLogger({ level: config.logging.level, pretty: config.logging.pretty });
  logger.info({ configPath: loaded.configPath, firstRun: loaded.firstRun }, "Configuration loaded");

  // ── Phase 2: Detect distro and resolve the catalog ────────────
  let distro: DistroContext;
  let steps: Step[];
  try {
    distro = detectDistro(logger, config.distro);
    steps = loadCatalog(
      config.catalog_path ?? DEFAULT_CATALOG_PATH,
      { family: distro.family, variables: catalogVariables(config, distro) },
      logger,
    );
  } catch (err) {
    logger.error({ error: describeError(err) }, "Cannot start");
    return EXIT_ABORTED;
  }

  if (options.command === "list") {
    console.log(formatStepList(steps));
    return EXIT_OK;
  }

  // ── Phase 3: Confirm ──────────────────────────────────────────
  if (!config.run.non_interactive && !(await confirm(`Provision ${distro.name} ${distro.version} (${steps.length} steps). Proceed? [Y/n] `))) {
    logger.info("Aborted by user");
    return EXIT_OK;
  }

  // ── Phase 4: Run ──────────────────────────────────────────────
  const ctx = createProvisionContext({ config, distro, logger });
  const controller = new AbortController();
  const onSigint = (): void => {
    logger.warn("Cancellation requested — stopping after the current step");
    controller.abort();
  };
  process.once("SIGINT", onSigint);

  try {
    const orchestrator = new Orchestrator(ctx, steps, {
      only: options.only,
      signal: controller.signal,
      preconditions: standardPreconditions(ctx, isPrivileged),
    });
    const report = await orchestrator.run();
    console.log(formatSummary(report));

    if (options.reportPath) {
      try {
        await writeMarkdownReport(options.reportPath, report);
        logger.info({ report: options.reportPath }, "Report written");
      } catch (err) {
        logger.error({ error: describeError(err) }, "Could not write report");
      }
    }
    return report.exitCode;
  } finally {
    process.removeListener("SIGINT", onSigint);
  }
}

if (require.main === module) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(`ws-provision: fatal: ${describeError(err)}`);
      process.exitCode = EXIT_ABORTED;
    },
  );
}
