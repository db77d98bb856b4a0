/**
 * Run report formatting.
 */

import type { OperationResult, RunReport, RunStatus } from "../types.js";

const STATUS_LABELS: Record<RunStatus, string> = {
  applied: "applied",
  "partially-applied": "PARTIALLY APPLIED",
  cancelled: "CANCELLED",
};

/** Human-readable run outcome, listing every failed operation with its provider error. */
export function formatRunReport(report: RunReport): string {
  const count = (status: OperationResult["status"]) => report.operations.filter((o) => o.status === status).length;

  const lines = [
    `Run ${report.runId} (plan ${report.planId}) on scope "${report.scope}": ${STATUS_LABELS[report.status]}`,
    `  ${count("succeeded")} succeeded, ${count("failed")} failed, ${count("skipped")} skipped in ${report.totalDurationMs}ms`,
  ];
  if (report.finalVersion !== undefined) {
    lines.push(`  State version: ${report.finalVersion}`);
  }

  if (report.failures.length > 0) {
    lines.push("", "Failed operations:");
    for (const f of report.failures) {
      const attempts = f.attempts === 1 ? "1 attempt" : `${f.attempts} attempts`;
      lines.push(`  - ${f.kind} ${f.address} (wave ${f.wave}, ${attempts}): [${f.error?.kind ?? "Error"}] ${f.error?.message ?? ""}`);
    }
  }

  if (report.status !== "applied") {
    lines.push("", "Re-run apply to act on the remaining changes.");
  }
  return lines.join("\n");
}
