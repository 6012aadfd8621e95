// Config loader: reads /etc/workstation-provision/config.yaml and deep-merges with defaults.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// deepMerge lets users override only the keys they specify; unset keys inherit defaults.
// The merged document is validated with zod; a file that fails to parse or validate
// stops the run. Add new fields to src/types/config.ts, ConfigSchema and DEFAULT_CONFIG together.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { parse as parseYaml } from "yaml";
import { z } from "zod";
import type { ProvisionConfig } from "../types/config.js";
import type { Logger } from "../logger.js";
import { PreconditionError, describeError } from "../shared/errors.js";

const DEFAULT_CONFIG_DIR = "/etc/workstation-provision";
export const DEFAULT_CONFIG_PATH = join(DEFAULT_CONFIG_DIR, "config.yaml");

export const DEFAULT_CONFIG: ProvisionConfig = {
  catalog_path: null,
  variables: { node_major: "22", php_version: "8.3" },
  run: {
    non_interactive: false,
    dry_run: false,
    strict_exit_code: false,
    allow_untested_release: false,
    release_holds: true,
  },
  timeouts: { command_timeout_ceiling: 0, action_timeout: 3600 },
  paths: {
    apt_sources_list: "/etc/apt/sources.list",
    apt_sources_dir: "/etc/apt/sources.list.d",
    apt_preferences_dir: "/etc/apt/preferences.d",
    apt_keyrings_dir: "/etc/apt/keyrings",
    instructions_dir: "/root",
  },
  logging: { level: "info", pretty: true },
};

const DEFAULT_CONFIG_YAML = `# workstation-provision — Configuration
# Generated automatically on first run. All values shown are defaults.

# Step catalog (null = bundled catalog/workstation.yaml)
catalog_path: null

# Substituted for {name} placeholders in the catalog
variables:
  node_major: "22"
  php_version: "8.3"

run:
  non_interactive: false
  dry_run: false
  strict_exit_code: false
  allow_untested_release: false
  release_holds: true

timeouts:
  command_timeout_ceiling: 0
  action_timeout: 3600

paths:
  apt_sources_list: /etc/apt/sources.list
  apt_sources_dir: /etc/apt/sources.list.d
  apt_preferences_dir: /etc/apt/preferences.d
  apt_keyrings_dir: /etc/apt/keyrings
  instructions_dir: /root

logging:
  level: info
  pretty: true

# Distro override (auto-detected if omitted)
# distro:
#   family: debian
#   codename: bookworm
`;

const ConfigSchema = z.object({
  catalog_path: z.string().nullable(),
  variables: z.record(z.coerce.string()),
  run: z.object({
    non_interactive: z.boolean(),
    dry_run: z.boolean(),
    strict_exit_code: z.boolean(),
    allow_untested_release: z.boolean(),
    release_holds: z.boolean(),
  }),
  timeouts: z.object({
    command_timeout_ceiling: z.number().nonnegative(),
    action_timeout: z.number().positive(),
  }),
  paths: z.object({
    apt_sources_list: z.string().min(1),
    apt_sources_dir: z.string().min(1),
    apt_preferences_dir: z.string().min(1),
    apt_keyrings_dir: z.string().min(1),
    instructions_dir: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace"]),
    pretty: z.boolean(),
  }),
  distro: z
    .object({
      family: z.enum(["debian", "tumbleweed"]),
      name: z.string(),
      version: z.string(),
      codename: z.string().nullable(),
    })
    .partial()
    .optional(),
});

export interface ConfigResult {
  config: ProvisionConfig;
  configPath: string;
  firstRun: boolean;
}

export interface LoadConfigOptions {
  /** Write the commented default file when none exists. Off for read-only commands. */
  writeDefault?: boolean;
}

/** Throws PreconditionError when the file cannot be parsed or fails validation. */
export function loadConfig(logger: Logger, explicitPath?: string, options: LoadConfigOptions = {}): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    if (options.writeDefault ?? true) {
      logger.info({ configPath }, "No config file found — generating defaults (first run)");
      try {
        mkdirSync(dirname(configPath), { recursive: true });
        writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
      } catch (err) {
        logger.warn({ configPath, error: err }, "Could not write default config file");
      }
    }
    return { config: structuredClone(DEFAULT_CONFIG), configPath, firstRun: true };
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(readFileSync(configPath, "utf-8"));
  } catch (err) {
    throw new PreconditionError(`Cannot read config ${configPath}: ${describeError(err)}`, { configPath });
  }

  const result = ConfigSchema.safeParse(deepMerge(DEFAULT_CONFIG, parsed ?? {}));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new PreconditionError(`Invalid config ${configPath}: ${issues.join("; ")}`, { configPath, issues });
  }
  const config: ProvisionConfig = result.data;
  return { config, configPath, firstRun: false };
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

/** Deep merge b into a (a provides defaults, b overrides). */
export function deepMerge(a: unknown, b: unknown): unknown {
  if (!isPlainObject(a) || !isPlainObject(b)) {
    return b === undefined ? a : b;
  }
  const result: Record<string, unknown> = { ...a };
  for (const key of Object.keys(b)) {
    const aVal = a[key];
    const bVal = b[key];
    if (isPlainObject(aVal) && isPlainObject(bVal)) {
      result[key] = deepMerge(aVal, bVal);
    } else if (bVal !== undefined) {
      result[key] = bVal;
    }
  }
  return result;
}
