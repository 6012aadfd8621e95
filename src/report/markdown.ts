import fs from "node:fs/promises";
import path from "node:path";
import type { RunReport } from "../types/step.js";
import { ConfigWriteError } from "../shared/errors.js";
import { countStatuses, headline } from "./summary.js";

function cell(text: string): string {
  return text.replace(/\|/g, "\\|").replace(/\n/g, " ");
}

export function renderMarkdownReport(report: RunReport): string {
  const counts = countStatuses(report);
  const lines: string[] = [
    `# Provisioning Report`,
    ``,
    `**Distribution:** ${report.distro ? `${report.distro.name} ${report.distro.version}` : "unknown"}`,
    `**Dry run:** ${report.dryRun ? "yes" : "no"}`,
    `**Started:** ${report.startedAt}`,
    `**Ended:** ${report.finishedAt}`,
    `**Outcome:** ${report.outcome}`,
    `**Exit code:** ${report.exitCode}`,
    ``,
    `## Steps`,
    ``,
    `| Steps | OK | Warning | Failed |`,
    `|-------|----|---------|--------|`,
    `| ${report.steps.length} | ${counts.ok} | ${counts.warning} | ${counts.failed} |`,
    ``,
    `| Step | Title | Status | Duration (ms) |`,
    `|------|-------|--------|---------------|`,
    ...report.steps.map((s) => `| ${s.name} | ${cell(s.title)} | ${s.status} | ${s.durationMs} |`),
    ``,
  ];

  const withMessages = report.steps.filter((s) => s.messages.length > 0);
  if (withMessages.length > 0) {
    lines.push(`## Problems`, ``);
    for (const step of withMessages) {
      lines.push(`### ${step.name}`, ``, ...step.messages.map((m) => `- ${m}`), ``);
    }
  }

  if (report.notes.length > 0) {
    lines.push(`## Post-install checklist`, ``, ...report.notes.map((n) => `- ${n}`), ``);
  }

  lines.push(`## Status`, ``, `${headline(report)}.`);
  return `${lines.join("\n")}\n`;
}

export async function writeMarkdownReport(file: string, report: RunReport): Promise<void> {
  try {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, renderMarkdownReport(report), "utf-8");
  } catch (err) {
    throw new ConfigWriteError(file, err);
  }
}
