/**
 * Markdown run report, written to the job summary.
 */

import type { PipelineRun, StepStatus } from "./types.js";

const STATUS_ICON: Record<StepStatus, string> = {
  pending: "⏳",
  succeeded: "✅",
  failed: "❌",
  skipped: "⏭️",
};

function fence(lines: string[]): string[] {
  return ["```", ...lines, "```"];
}

export function formatRunReport(run: PipelineRun): string {
  const lines = [
    `## policy-gate ${run.trigger}: ${run.state}`,
    "",
    `Driver \`${run.driver}\`, run \`${run.id}\``,
    "",
    "| Step | Status | Duration |",
    "| --- | --- | --- |",
  ];
  for (const step of run.steps) {
    const duration = step.durationMs !== undefined ? `${step.durationMs} ms` : "";
    lines.push(`| ${step.name} | ${STATUS_ICON[step.status]} ${step.status} | ${duration} |`);
  }

  if (run.plan) {
    const p = run.plan;
    lines.push(
      "",
      p.totalChanges === 0
        ? "**Plan:** no changes."
        : `**Plan:** ${p.creates} to add, ${p.updates} to change, ${p.deletes} to destroy, ${p.replaces} to replace.`,
    );
  }

  if (run.error) {
    lines.push("", `### ${run.error.step} failed (${run.error.kind})`, "", ...fence(run.error.message.split("\n")));
  }

  for (const step of run.steps) {
    if (step.output.length === 0) continue;
    lines.push("", `<details><summary>${step.name} output</summary>`, "", ...fence(step.output), "", "</details>");
  }

  return lines.join("\n") + "\n";
}
