// Catalog loader: reads the step catalog, expands {variable} placeholders,
// validates it with zod and resolves the action list for one distro family.
// Steps without actions for the family are left out of the resolved list.
import { readFileSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import type { DistroFamily } from "../types/distro.js";
import type { Action, Step } from "../types/step.js";
import type { Logger } from "../logger.js";
import { ProvisionError, ProvisionErrorCode, describeError } from "../shared/errors.js";
import { CatalogSchema, type CatalogAction } from "./schema.js";

/** Bundled catalog, shipped next to dist/. */
export const DEFAULT_CATALOG_PATH = join(__dirname, "..", "..", "catalog", "workstation.yaml");

/** Placeholders the source registry fills in at apply time. */
const DEFERRED_PLACEHOLDERS = new Set(["arch", "keyring"]);

const PLACEHOLDER = /\{([a-z_][a-z0-9_]*)\}/g;

export interface CatalogContext {
  readonly family: DistroFamily;
  /** Values for {name} placeholders (config variables, codename, instructions_dir). */
  readonly variables: Readonly<Record<string, string>>;
  /** Directory that file-write `source` paths are relative to. */
  readonly baseDir: string;
}

function invalid(message: string, context?: Record<string, unknown>): ProvisionError {
  return new ProvisionError(ProvisionErrorCode.CATALOG_INVALID, "config", message, context);
}

/** Replace known placeholders in every string of a parsed YAML tree. */
export function expandVariables(value: unknown, variables: Readonly<Record<string, string>>): unknown {
  if (typeof value === "string") {
    return value.replace(PLACEHOLDER, (match, key: string) => {
      const replacement = variables[key];
      if (replacement !== undefined) return replacement;
      if (DEFERRED_PLACEHOLDERS.has(key) || (key === "codename" && !("codename" in variables))) return match;
      throw invalid(`Unknown catalog variable {${key}}`, { value });
    });
  }
  if (Array.isArray(value)) return value.map((item) => expandVariables(item, variables));
  if (value !== null && typeof value === "object") {
    const out: Record<string, unknown> = {};
    for (const [key, item] of Object.entries(value)) out[key] = expandVariables(item, variables);
    return out;
  }
  return value;
}

function toAction(action: CatalogAction, baseDir: string): Action {
  if (action.kind !== "file-write") return action;
  const { source, content, ...rest } = action;
  if ((source === undefined) === (content === undefined)) {
    throw invalid(`file-write ${action.path} needs exactly one of content or source`);
  }
  if (content !== undefined) return { ...rest, content };
  const file = resolve(baseDir, source ?? "");
  try {
    return { ...rest, content: readFileSync(file, "utf-8") };
  } catch (err) {
    throw invalid(`file-write ${action.path}: cannot read ${file}: ${describeError(err)}`);
  }
}

/** Parse catalog text and resolve the steps for `ctx.family`. */
export function parseCatalog(text: string, ctx: CatalogContext): Step[] {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw invalid(`Catalog is not valid YAML: ${describeError(err)}`);
  }

  const result = CatalogSchema.safeParse(expandVariables(raw, ctx.variables));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
    throw invalid(`Invalid catalog: ${issues.join("; ")}`, { issues });
  }

  const steps: Step[] = [];
  for (const step of result.data.steps) {
    const actions = step[ctx.family];
    if (!actions || actions.length === 0) continue;
    steps.push({
      name: step.id,
      title: step.title,
      fatal: step.fatal,
      actions: actions.map((a) => toAction(a, ctx.baseDir)),
      notes: step.notes.flatMap((n) => (typeof n === "string" ? [n] : n.family === ctx.family ? [n.text] : [])),
    });
  }
  return steps;
}

export function loadCatalog(file: string, ctx: Omit<CatalogContext, "baseDir">, logger: Logger): Step[] {
  let text: string;
  try {
    text = readFileSync(file, "utf-8");
  } catch (err) {
    throw invalid(`Cannot read catalog ${file}: ${describeError(err)}`);
  }
  const steps = parseCatalog(text, { ...ctx, baseDir: dirname(file) });
  logger.info({ catalog: file, family: ctx.family, steps: steps.length }, "Catalog loaded");
  return steps;
}
