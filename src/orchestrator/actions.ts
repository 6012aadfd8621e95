// Action handlers: translate one catalog action into backend / registry calls.
// Handlers throw ProvisionErrors on failure; problems that should not fail the
// action (a downgrade that did not go through, a service that did not start in
// time) come back as warnings on the outcome.
import fs from "node:fs/promises";
import path from "node:path";
import type { ProvisionContext } from "../context.js";
import type { Action, SkipGuard, ToolManager } from "../types/step.js";
import type { InstallFlag } from "../backend/interface.js";
import type { SourceRegistry } from "../sources/registry.js";
import { downgradeMarkers, isForeignVersion } from "../backend/release-markers.js";
import { ConfigWriteError, ProvisionError, ProvisionErrorCode, describeError } from "../shared/errors.js";

export interface ActionOutcome {
  readonly detail: string;
  /** Non-fatal problems surfaced as step warnings. */
  readonly warnings: readonly string[];
  readonly skipped: boolean;
}

const TOOL_COMMANDS: Record<ToolManager, readonly string[]> = {
  npm: ["npm", "install", "-g"],
  pip: ["pip3", "install"],
  cpanm: ["cpanm"],
};

function done(detail: string, warnings: readonly string[] = []): ActionOutcome {
  return { detail, warnings, skipped: false };
}

/** Short label used in logs and report messages. */
export function describeAction(action: Action): string {
  switch (action.kind) {
    case "install":
    case "tool-install":
      return `${action.kind} (${action.packages.length} package${action.packages.length === 1 ? "" : "s"})`;
    case "repo-add":
    case "repo-remove":
      return `${action.kind} ${action.repo.id}`;
    case "pin": return `pin ${action.pin.id}`;
    case "pin-foreign": return `pin-foreign ${action.id}`;
    case "enable-component": return `enable-component ${action.component}`;
    case "remove-redundant-source": return `remove-redundant-source ${action.file}`;
    case "add-architecture": return `add-architecture ${action.arch}`;
    case "service": return `service ${action.unit}`;
    case "file-write": return `file-write ${action.path}`;
    case "symlink": return `symlink ${action.link}`;
    case "command": return `command ${action.argv.join(" ")}`;
    default: return action.kind;
  }
}

function requireSources(ctx: ProvisionContext, action: Action): SourceRegistry {
  if (!ctx.sources) {
    throw new ProvisionError(
      ProvisionErrorCode.CATALOG_INVALID,
      "config",
      `'${action.kind}' needs apt source management, which ${ctx.distro.family} does not have`,
    );
  }
  return ctx.sources;
}

function localReleaseTag(ctx: ProvisionContext): string {
  return ctx.distro.codename ?? ctx.distro.version;
}

async function pathExists(p: string): Promise<boolean> {
  try {
    await fs.lstat(p);
    return true;
  } catch {
    return false;
  }
}

async function guardSatisfied(guard: SkipGuard, ctx: ProvisionContext): Promise<string | null> {
  if ("command_exists" in guard) {
    const r = await ctx.runner.query(["sh", "-c", 'command -v "$1" >/dev/null 2>&1', "sh", guard.command_exists], "instant");
    return r.exitCode === 0 ? `${guard.command_exists} already available` : null;
  }
  return (await pathExists(guard.path_exists)) ? `${guard.path_exists} already exists` : null;
}

/** Write a whole file, leaving it untouched when the content already matches. */
async function writeManagedFile(ctx: ProvisionContext, file: string, content: string, mode?: number): Promise<"written" | "unchanged"> {
  let current: string | null = null;
  try {
    current = await fs.readFile(file, "utf-8");
  } catch {
    current = null;
  }
  if (current === content) return "unchanged";
  if (ctx.dryRun) {
    ctx.logger.info({ file }, "[dry-run] would write");
    return "written";
  }
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, content, "utf-8");
    if (mode !== undefined) await fs.chmod(file, mode);
  } catch (err) {
    throw new ConfigWriteError(file, err);
  }
  return "written";
}

export async function executeAction(action: Action, ctx: ProvisionContext): Promise<ActionOutcome> {
  if (action.skip_if) {
    const reason = await guardSatisfied(action.skip_if, ctx);
    if (reason) return { detail: reason, warnings: [], skipped: true };
  }

  const { backend, logger } = ctx;

  switch (action.kind) {
    case "refresh":
      await backend.refresh();
      return done("package index refreshed");

    case "upgrade":
      await backend.upgrade({ full: action.full });
      return done(action.full ? "full upgrade complete" : "upgrade complete");

    case "repair":
      await backend.repair();
      return done("package database repaired");

    case "release-holds": {
      const held = [...(await backend.heldPackages())].sort();
      if (held.length === 0) return done("no held packages");
      if (!ctx.config.run.release_holds) {
        logger.warn({ held }, "Held packages left as-is — conflicts may occur later");
        return done(`${held.length} held package(s) left as-is`);
      }
      logger.warn({ held }, "Releasing held packages");
      await backend.releaseHolds(held);
      return done(`released ${held.length} held package(s)`);
    }

    case "install": {
      const flags = new Set<InstallFlag>();
      if (action.no_recommends) flags.add("no-recommends");
      if (action.pattern) flags.add("pattern");
      await backend.install(action.packages, {
        allowDowngrade: action.allow_downgrade,
        flags,
        targetRelease: action.target_release,
      });
      return done(`${action.packages.length} package(s) installed`);
    }

    case "tool-install": {
      const argv = [...TOOL_COMMANDS[action.manager], ...action.args, ...action.packages];
      await ctx.runner.run({ argv }, "long_running", [...action.packages]);
      return done(`${action.packages.length} ${action.manager} package(s) installed`);
    }

    case "repo-add": {
      const result = await requireSources(ctx, action).addRepo(action.repo);
      return done(`${action.repo.id}: ${result.status}`);
    }

    case "repo-remove": {
      const result = await requireSources(ctx, action).removeRepo(action.repo);
      return done(`${action.repo.id}: ${result}`);
    }

    case "repo-dedupe": {
      const result = await requireSources(ctx, action).deduplicateAll();
      return done(`${result.removed} duplicate line(s) removed, ${result.deleted.length} file(s) deleted`);
    }

    case "pin": {
      const sources = requireSources(ctx, action);
      const written = await sources.applyPin(action.pin);
      const warnings: string[] = [];
      const downgrade = action.downgrade_if_foreign;
      if (downgrade) {
        const version = await backend.installedVersion(downgrade.package);
        const markers = downgradeMarkers(ctx.distro.family, localReleaseTag(ctx));
        if (version && isForeignVersion(version, markers)) {
          logger.warn({ package: downgrade.package, version }, "Package comes from another release — downgrading to the pinned release");
          try {
            await backend.refresh();
            await backend.install(downgrade.install, { allowDowngrade: true });
          } catch (err) {
            warnings.push(`Could not downgrade ${downgrade.package} ${version}; pin ${action.pin.id} still active: ${describeError(err)}`);
          }
        }
      }
      return done(`${action.pin.id}: ${written}`, warnings);
    }

    case "pin-foreign": {
      const sources = requireSources(ctx, action);
      const codename = ctx.distro.codename;
      if (!codename) {
        throw new ProvisionError(ProvisionErrorCode.PRECONDITION_FAILED, "state", "Release codename unknown — cannot pin foreign-release packages");
      }
      const foreign = [...(await backend.foreignReleasePackages(codename))].sort();
      if (foreign.length === 0) return done("no foreign-release packages");
      await sources.applyPin({
        id: action.id,
        packages: foreign,
        release: codename,
        priority: action.priority,
        perPackage: true,
        header: action.header,
      });
      const file = path.join(ctx.config.paths.apt_preferences_dir, action.id);
      return done(`${foreign.length} foreign-release package(s) pinned`, [
        `Packages from another release may cause dependency conflicts (${foreign.join(", ")}); review ${file}`,
      ]);
    }

    case "enable-component": {
      const { updated } = await requireSources(ctx, action).enableForeignReleaseComponent(action.component);
      return done(`${updated} source line(s) updated`);
    }

    case "remove-redundant-source": {
      const result = await requireSources(ctx, action).removeRedundantSource(action.file, action.component);
      return done(`${action.file}: ${result}`);
    }

    case "add-architecture": {
      if ((await backend.foreignArchitectures()).has(action.arch)) return done(`${action.arch} already enabled`);
      await backend.addArchitecture(action.arch);
      return done(`${action.arch} enabled`);
    }

    case "service": {
      await backend.enableService(action.unit, { now: action.now });
      if (action.start_timeout === undefined) return done(`${action.unit} enabled`);
      try {
        await backend.startService(action.unit, action.start_timeout * 1000);
      } catch (err) {
        return done(`${action.unit} enabled`, [
          `${action.unit} did not start: ${describeError(err)}; start it manually with systemctl start ${action.unit}`,
        ]);
      }
      return done(`${action.unit} enabled and started`);
    }

    case "file-write": {
      const result = await writeManagedFile(ctx, action.path, action.content, action.mode);
      return done(`${action.path}: ${result}`);
    }

    case "symlink": {
      if (await pathExists(action.link)) return done(`${action.link} already exists`);
      if (!(await pathExists(action.target))) return done(`${action.target} missing — link not created`);
      if (ctx.dryRun) {
        logger.info({ link: action.link, target: action.target }, "[dry-run] would link");
        return done(`${action.link} -> ${action.target}`);
      }
      try {
        await fs.symlink(action.target, action.link);
      } catch (err) {
        throw new ConfigWriteError(action.link, err);
      }
      return done(`${action.link} -> ${action.target}`);
    }

    case "command":
      await ctx.runner.run({ argv: [...action.argv], stdin: action.stdin, env: action.env }, action.duration);
      return done("command succeeded");

    default: {
      const unreachable: never = action;
      throw new ProvisionError(ProvisionErrorCode.CATALOG_INVALID, "config", `Unhandled action ${JSON.stringify(unreachable)}`);
    }
  }
}
