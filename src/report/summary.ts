import type { RunReport } from "./run-report.js";
import type { RollupStatus } from "./types.js";

/** 0 = OK, 1 = WARNING or FAILED. Configuration errors (2) are decided by the caller. */
export function exitCodeFor(status: RollupStatus): 0 | 1 {
  return status === "OK" ? 0 : 1;
}

export const EXIT_CONFIG_ERROR = 2;

export function formatSummary(report: RunReport): string[] {
  const counts = report.countByStatus();
  const lines = [
    `Goal ${report.goal}: ${report.status}`,
    `  ok=${counts.OK} changed=${counts.CHANGED} warning=${counts.WARNING} failed=${counts.FAILED} skipped=${counts.SKIPPED}`,
  ];

  const failedHosts = [...new Set(report.withStatus("FAILED").map((r) => r.hostId))];
  if (failedHosts.length > 0) lines.push(`  failed hosts: ${failedHosts.join(", ")}`);

  if (report.abort) {
    const verb = report.abort.reason === "cancelled" ? "Cancelled" : "Halted";
    lines.push(`  ${verb} at step ${report.abort.stepIndex + 1} (${report.abort.taskName}): ${report.abort.message}`);
  }

  if (report.durationMs !== undefined) lines.push(`  completed in ${report.durationMs}ms`);
  return lines;
}
