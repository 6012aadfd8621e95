// Catalog schema: the YAML shape of catalog/workstation.yaml.
// Keys are snake_case like the config file; repository and pin blocks are
// mapped onto the registry's RepoSource / PinRule while parsing.
import { z } from "zod";
import type { ActionKind } from "../types/step.js";

const name = z.string().min(1);
const packageList = z.array(name).min(1);

const SkipGuardSchema = z.union([
  z.object({ command_exists: name }).strict(),
  z.object({ path_exists: name }).strict(),
]);

const base = {
  optional: z.boolean().optional(),
  skip_if: SkipGuardSchema.optional(),
};

export const PinSchema = z
  .object({
    id: name.regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "pin id must be a plain file name"),
    packages: packageList,
    release: name,
    priority: z.number().int(),
    per_package: z.boolean().default(false),
    header: z.array(z.string()).optional(),
  })
  .strict()
  .transform((p) => ({
    id: p.id,
    packages: p.packages,
    release: p.release,
    priority: p.priority,
    perPackage: p.per_package,
    header: p.header,
  }));

export const RepoSchema = z
  .object({
    id: name.regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/, "repository id must be a plain file name"),
    entry: name,
    signing_key: z
      .object({ url: z.string().url(), keyring: name, dearmor: z.boolean().default(true) })
      .strict()
      .optional(),
    pin: PinSchema.optional(),
  })
  .strict()
  .transform((r) => ({
    id: r.id,
    entry: r.entry,
    signingKey: r.signing_key,
    pin: r.pin,
  }));

const durations = z.enum(["instant", "quick", "normal", "slow", "long_running"]);

export const ActionSchema = z.discriminatedUnion("kind", [
  z.object({ ...base, kind: z.literal("refresh") }).strict(),
  z.object({ ...base, kind: z.literal("upgrade"), full: z.boolean().default(false) }).strict(),
  z.object({ ...base, kind: z.literal("repair") }).strict(),
  z.object({ ...base, kind: z.literal("release-holds") }).strict(),
  z
    .object({
      ...base,
      kind: z.literal("install"),
      packages: packageList,
      no_recommends: z.boolean().default(false),
      pattern: z.boolean().default(false),
      allow_downgrade: z.boolean().default(false),
      target_release: name.optional(),
    })
    .strict(),
  z
    .object({
      ...base,
      kind: z.literal("tool-install"),
      manager: z.enum(["npm", "pip", "cpanm"]),
      packages: packageList,
      args: z.array(z.string()).default([]),
    })
    .strict(),
  z.object({ ...base, kind: z.literal("repo-add"), repo: RepoSchema }).strict(),
  z.object({ ...base, kind: z.literal("repo-remove"), repo: RepoSchema }).strict(),
  z.object({ ...base, kind: z.literal("repo-dedupe") }).strict(),
  z
    .object({
      ...base,
      kind: z.literal("pin"),
      pin: PinSchema,
      downgrade_if_foreign: z.object({ package: name, install: packageList }).strict().optional(),
    })
    .strict(),
  z
    .object({
      ...base,
      kind: z.literal("pin-foreign"),
      id: name.regex(/^[A-Za-z0-9][A-Za-z0-9._-]*$/),
      priority: z.number().int(),
      header: z.array(z.string()).default([]),
    })
    .strict(),
  z.object({ ...base, kind: z.literal("enable-component"), component: name }).strict(),
  z.object({ ...base, kind: z.literal("remove-redundant-source"), file: name.endsWith(".list"), component: name }).strict(),
  z.object({ ...base, kind: z.literal("add-architecture"), arch: name }).strict(),
  z
    .object({
      ...base,
      kind: z.literal("service"),
      unit: name,
      now: z.boolean().default(true),
      start_timeout: z.number().positive().optional(),
    })
    .strict(),
  z
    .object({
      ...base,
      kind: z.literal("file-write"),
      path: name.startsWith("/", "file-write path must be absolute"),
      content: z.string().optional(),
      /** Path relative to the catalog file; read at load time. */
      source: name.optional(),
      mode: z.number().int().nonnegative().optional(),
    })
    .strict(),
  z.object({ ...base, kind: z.literal("symlink"), target: name, link: name }).strict(),
  z
    .object({
      ...base,
      kind: z.literal("command"),
      argv: z.array(z.string()).min(1),
      stdin: z.string().optional(),
      env: z.record(z.string()).optional(),
      duration: durations.default("normal"),
    })
    .strict(),
]);

export type CatalogAction = z.infer<typeof ActionSchema>;

/** Action kinds that edit apt configuration; there is no zypper counterpart. */
export const DEBIAN_ONLY_KINDS: ReadonlySet<ActionKind> = new Set<ActionKind>([
  "repo-add",
  "repo-remove",
  "repo-dedupe",
  "pin",
  "pin-foreign",
  "enable-component",
  "remove-redundant-source",
]);

const NoteSchema = z.union([
  z.string(),
  z.object({ text: z.string(), family: z.enum(["debian", "tumbleweed"]) }).strict(),
]);

export const StepSchema = z
  .object({
    id: name.regex(/^[a-z0-9][a-z0-9-]*$/, "step id must be kebab-case"),
    title: name,
    fatal: z.boolean().default(false),
    notes: z.array(NoteSchema).default([]),
    debian: z.array(ActionSchema).optional(),
    tumbleweed: z.array(ActionSchema).optional(),
  })
  .strict()
  .superRefine((step, ctx) => {
    for (const [i, action] of (step.tumbleweed ?? []).entries()) {
      if (DEBIAN_ONLY_KINDS.has(action.kind)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["tumbleweed", i, "kind"],
          message: `'${action.kind}' actions are only available on debian`,
        });
      }
    }
  });

// Other top-level keys are allowed: they hold YAML anchors shared by steps.
export const CatalogSchema = z
  .object({
    version: z.literal(1),
    steps: z.array(StepSchema).min(1),
  })
  .superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    for (const [i, step] of catalog.steps.entries()) {
      if (seen.has(step.id)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: ["steps", i, "id"], message: `duplicate step id '${step.id}'` });
      }
      seen.add(step.id);
    }
  });

export type CatalogDocument = z.infer<typeof CatalogSchema>;
