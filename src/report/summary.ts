import type { RunReport, Step, StepStatus } from "../types/step.js";

const STATUS_LABEL: Record<StepStatus, string> = {
  ok: "[OK]  ",
  warning: "[WARN]",
  failed: "[FAIL]",
};

function seconds(ms: number): string {
  return `${(ms / 1000).toFixed(1)}s`;
}

export function countStatuses(report: RunReport): Record<StepStatus, number> {
  const counts: Record<StepStatus, number> = { ok: 0, warning: 0, failed: 0 };
  for (const step of report.steps) counts[step.status]++;
  return counts;
}

export function headline(report: RunReport): string {
  if (report.state.kind === "aborted") return `Run aborted: ${report.state.reason}`;
  return report.outcome === "clean" ? "Run completed" : "Run completed with warnings";
}

/** Itemized end-of-run summary printed to stdout. */
export function formatSummary(report: RunReport): string {
  const counts = countStatuses(report);
  const lines: string[] = [
    "",
    `${headline(report)}${report.dryRun ? " (dry run)" : ""}`,
    `Steps: ${report.steps.length} (${counts.ok} ok, ${counts.warning} warning, ${counts.failed} failed)`,
  ];
  if (report.distro) lines.push(`Distribution: ${report.distro.name} ${report.distro.version}`);
  lines.push("");

  for (const step of report.steps) {
    lines.push(`${STATUS_LABEL[step.status]} ${step.name} — ${step.title} (${seconds(step.durationMs)})`);
    for (const message of step.messages) lines.push(`       - ${message}`);
  }

  if (report.notes.length > 0) {
    lines.push("", "Post-install checklist:");
    for (const note of report.notes) lines.push(`  ${note}`);
  }
  lines.push("", `Exit code: ${report.exitCode}`);
  return lines.join("\n");
}

/** Output of `ws-provision list`. */
export function formatStepList(steps: readonly Step[]): string {
  const width = Math.max(0, ...steps.map((s) => s.name.length));
  return steps
    .map((step, i) => {
      const index = String(i + 1).padStart(2, " ");
      const fatal = step.fatal ? " [fatal]" : "";
      return `${index}. ${step.name.padEnd(width, " ")}  ${step.title} (${step.actions.length} action${step.actions.length === 1 ? "" : "s"})${fatal}`;
    })
    .join("\n");
}
