// SourceRegistry: sole owner of writes under the apt configuration directories.
// Every operation is idempotent: re-running converges on the same files and
// reports "already satisfied" through its return value rather than a silent no-op.
// Processing order for cross-file checks is fixed: the primary sources.list first,
// then sources.list.d/*.list in lexicographic order.
import fs from "node:fs/promises";
import path from "node:path";
import type { PackageBackend } from "../backend/interface.js";
import type { CommandRunner } from "../backend/runner.js";
import type { Logger } from "../logger.js";
import type {
  AddRepoResult,
  ApplyPinResult,
  DedupResult,
  PinRule,
  RemoveRepoResult,
  RepoSource,
  SigningKey,
} from "../types/sources.js";
import { ConfigWriteError, ProvisionError, ProvisionErrorCode } from "../shared/errors.js";
import { entryFields, isActiveLine, joinLines, normalizeLine, splitLines } from "./lines.js";

export interface SourceLayout {
  readonly sourcesList: string;
  readonly sourcesDir: string;
  readonly preferencesDir: string;
  readonly keyringsDir: string;
}

export interface SourceRegistryOptions {
  readonly layout: SourceLayout;
  readonly backend: PackageBackend;
  /** Runs the key download; shares the backend's executor and timeouts. */
  readonly runner: CommandRunner;
  readonly logger: Logger;
  /** Release codename substituted for {codename}. */
  readonly codename: string | null;
  readonly dryRun?: boolean;
}

/** Components that are always enabled together with the key component. */
export const COMPONENT_COMPANIONS: Record<string, readonly string[]> = {
  "non-free": ["non-free-firmware"],
};

export class SourceRegistry {
  private readonly layout: SourceLayout;
  private readonly logger: Logger;
  private readonly dryRun: boolean;

  constructor(private readonly options: SourceRegistryOptions) {
    this.layout = options.layout;
    this.logger = options.logger;
    this.dryRun = options.dryRun ?? false;
  }

  // ── Repositories ─────────────────────────────────────────────────

  async addRepo(source: RepoSource, opts: { refresh?: boolean } = {}): Promise<AddRepoResult> {
    const line = await this.resolveEntry(source);
    if (!isActiveLine(line)) {
      throw new ProvisionError(ProvisionErrorCode.CATALOG_INVALID, "config", `Repository '${source.id}' entry is not an active line: ${line}`);
    }
    const wanted = normalizeLine(line);

    for (const file of await this.sourceFiles()) {
      const { lines } = splitLines(await readIfExists(file));
      if (lines.some((l) => isActiveLine(l) && normalizeLine(l) === wanted)) {
        this.logger.info({ repo: source.id, file }, "Repository already configured — skipping");
        if (source.pin) await this.applyPin(source.pin);
        return { status: "already_present", file, line };
      }
    }

    if (source.signingKey) await this.installKey(source.signingKey);

    const file = this.repoFile(source);
    const existing = await readIfExists(file);
    const prefix = existing === "" || existing.endsWith("\n") ? existing : `${existing}\n`;
    await this.write(file, `${prefix}${line}\n`);
    this.logger.info({ repo: source.id, file }, "Repository added");

    if (source.pin) await this.applyPin(source.pin);
    if (opts.refresh !== false) await this.options.backend.refresh();
    return { status: "added", file, line };
  }

  async removeRepo(source: RepoSource): Promise<RemoveRepoResult> {
    const targets = [this.repoFile(source)];
    if (source.signingKey) targets.push(this.keyringPath(source.signingKey));
    if (source.pin) targets.push(this.pinPath(source.pin));

    let removed = false;
    for (const target of targets) {
      if (await exists(target)) {
        await this.remove(target);
        removed = true;
      }
    }
    this.logger.info({ repo: source.id, removed }, "Repository removal");
    return removed ? "removed" : "absent";
  }

  /**
   * Drop repeated active lines across all repository files, keeping the first
   * occurrence in processing order. Supplementary files left without any active
   * line are deleted; the primary file is only ever rewritten.
   */
  async deduplicateAll(): Promise<DedupResult> {
    const seen = new Set<string>();
    const rewritten: string[] = [];
    const deleted: string[] = [];
    let removed = 0;

    for (const file of await this.sourceFiles()) {
      if (!(await exists(file))) continue;
      const content = splitLines(await fs.readFile(file, "utf-8"));
      const kept: string[] = [];
      let activeKept = 0;
      let changed = false;

      for (const line of content.lines) {
        if (!isActiveLine(line)) {
          kept.push(line);
          continue;
        }
        const norm = normalizeLine(line);
        if (seen.has(norm)) {
          this.logger.warn({ file, entry: norm }, "Duplicate source removed");
          removed++;
          changed = true;
          continue;
        }
        seen.add(norm);
        kept.push(line);
        activeKept++;
      }

      if (file !== this.layout.sourcesList && activeKept === 0) {
        this.logger.info({ file }, "Removing empty/inactive source file");
        await this.remove(file);
        deleted.push(file);
        continue;
      }
      if (changed) {
        await this.write(file, joinLines({ lines: kept, trailingNewline: content.trailingNewline }));
        rewritten.push(file);
      }
    }

    if (removed === 0) this.logger.info("No duplicate apt sources found");
    else this.logger.info({ removed }, "Duplicate source line(s) removed");
    return { removed, rewritten, deleted };
  }

  // ── Pins ─────────────────────────────────────────────────────────

  /** Overwrite preferences.d/<id>. Independent of installed versions, so safe to apply preventively. */
  async applyPin(pin: PinRule): Promise<ApplyPinResult> {
    const file = this.pinPath(pin);
    const content = renderPin(pin);
    if ((await readIfExists(file)) === content) return "unchanged";
    await this.write(file, content);
    this.logger.info({ pin: pin.id, file }, "Pin applied");
    return "written";
  }

  // ── Components ───────────────────────────────────────────────────

  /**
   * Append `component` (and its companions) to every active line of the
   * primary sources.list that lacks them. Edits in place so the same
   * component is never declared in a second file.
   */
  async enableForeignReleaseComponent(component: string): Promise<{ updated: number }> {
    const wanted = [component, ...(COMPONENT_COMPANIONS[component] ?? [])];
    const file = this.layout.sourcesList;
    const content = splitLines(await readIfExists(file));
    let updated = 0;

    const lines = content.lines.map((line) => {
      if (!isActiveLine(line)) return line;
      const fields = entryFields(line);
      const missing = wanted.filter((c) => !fields.includes(c));
      if (missing.length === 0) return line;
      updated++;
      const hashAt = line.indexOf("#");
      const body = (hashAt >= 0 ? line.slice(0, hashAt) : line).trimEnd();
      const comment = hashAt >= 0 ? ` ${line.slice(hashAt)}` : "";
      return `${body} ${missing.join(" ")}${comment}`;
    });

    if (updated > 0) {
      await this.write(file, joinLines({ lines, trailingNewline: content.trailingNewline }));
      this.logger.info({ component, updated, file }, "Components enabled");
    }
    return { updated };
  }

  /**
   * Delete a legacy supplementary file once the primary file already carries
   * `component`, which would otherwise be configured twice.
   */
  async removeRedundantSource(fileName: string, component: string): Promise<"removed" | "kept" | "absent"> {
    const file = path.join(this.layout.sourcesDir, fileName);
    if (!(await exists(file))) return "absent";
    const { lines } = splitLines(await readIfExists(this.layout.sourcesList));
    const covered = lines.some((l) => isActiveLine(l) && entryFields(l).includes(component));
    if (!covered) return "kept";
    this.logger.info({ file, component }, "Removing redundant source file");
    await this.remove(file);
    return "removed";
  }

  // ── Internals ────────────────────────────────────────────────────

  /** Primary file first, then *.list in the supplementary directory, lexicographically. */
  async sourceFiles(): Promise<string[]> {
    let entries: string[] = [];
    try {
      entries = await fs.readdir(this.layout.sourcesDir);
    } catch {
      entries = [];
    }
    const supplementary = entries
      .filter((name) => name.endsWith(".list"))
      .sort()
      .map((name) => path.join(this.layout.sourcesDir, name));
    return [this.layout.sourcesList, ...supplementary];
  }

  private repoFile(source: RepoSource): string {
    return path.join(this.layout.sourcesDir, `${source.id}.list`);
  }

  private keyringPath(key: SigningKey): string {
    return path.join(this.layout.keyringsDir, key.keyring);
  }

  private pinPath(pin: PinRule): string {
    if (pin.id.includes("/") || pin.id.startsWith(".")) {
      throw new ProvisionError(ProvisionErrorCode.CATALOG_INVALID, "config", `Invalid pin id: ${pin.id}`);
    }
    return path.join(this.layout.preferencesDir, pin.id);
  }

  private async resolveEntry(source: RepoSource): Promise<string> {
    let line = source.entry;
    if (line.includes("{arch}")) line = line.split("{arch}").join(await this.options.backend.primaryArchitecture());
    if (line.includes("{codename}")) {
      if (!this.options.codename) {
        throw new ProvisionError(ProvisionErrorCode.CATALOG_INVALID, "config", `Repository '${source.id}' needs a release codename`);
      }
      line = line.split("{codename}").join(this.options.codename);
    }
    if (line.includes("{keyring}") && source.signingKey) {
      line = line.split("{keyring}").join(this.keyringPath(source.signingKey));
    }
    return line;
  }

  /** Download the key (when missing) into the keyrings directory. */
  private async installKey(key: SigningKey): Promise<void> {
    const target = this.keyringPath(key);
    if (await exists(target)) return;
    await this.mkdir(this.layout.keyringsDir);
    const script = key.dearmor
      ? `curl -fsSL ${shellQuote(key.url)} | gpg --yes --dearmor -o ${shellQuote(target)}`
      : `curl -fsSL -o ${shellQuote(target)} ${shellQuote(key.url)}`;
    // pipefail so a curl failure is not masked by gpg's exit status
    await this.options.runner.run({ argv: ["bash", "-o", "pipefail", "-c", script] }, "normal");
    await this.options.runner.run({ argv: ["chmod", "a+r", target] }, "instant");
    this.logger.info({ keyring: target }, "Signing key installed");
  }

  private async write(file: string, content: string): Promise<void> {
    if (this.dryRun) {
      this.logger.info({ file }, "[dry-run] would write");
      return;
    }
    try {
      await fs.mkdir(path.dirname(file), { recursive: true });
      await fs.writeFile(file, content, "utf-8");
    } catch (err) {
      throw new ConfigWriteError(file, err);
    }
  }

  private async remove(file: string): Promise<void> {
    if (this.dryRun) {
      this.logger.info({ file }, "[dry-run] would delete");
      return;
    }
    try {
      await fs.rm(file, { force: true });
    } catch (err) {
      throw new ConfigWriteError(file, err);
    }
  }

  private async mkdir(dir: string): Promise<void> {
    if (this.dryRun) return;
    try {
      await fs.mkdir(dir, { recursive: true, mode: 0o755 });
    } catch (err) {
      throw new ConfigWriteError(dir, err);
    }
  }
}

/** Stanza format: Package / Pin / Pin-Priority, blank-line separated. */
export function renderPin(pin: PinRule): string {
  const stanza = (packages: readonly string[]): string[] => [
    `Package: ${packages.join(" ")}`,
    `Pin: release n=${pin.release}`,
    `Pin-Priority: ${pin.priority}`,
  ];
  const blocks = pin.perPackage ? pin.packages.map((p) => stanza([p])) : [stanza(pin.packages)];
  const lines: string[] = (pin.header ?? []).map((h) => `# ${h}`);
  for (const block of blocks) {
    if (lines.length > 0) lines.push("");
    lines.push(...block);
  }
  return `${lines.join("\n")}\n`;
}

async function readIfExists(file: string): Promise<string> {
  try {
    return await fs.readFile(file, "utf-8");
  } catch {
    return "";
  }
}

async function exists(file: string): Promise<boolean> {
  try {
    await fs.access(file);
    return true;
  } catch {
    return false;
  }
}

function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}
