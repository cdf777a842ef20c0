import type { PlanStep } from "../registry/registry.js";
import type { TaskStatus } from "../tasks/types.js";
import type { RunReport } from "./run-report.js";
import { formatSummary } from "./summary.js";
import type { TaskResult } from "./types.js";

/** The operator-facing surface. Diagnostic detail goes to the logger instead. */
export interface Reporter {
  stepStarted?(step: PlanStep, hostIds: readonly string[]): void;
  taskFinished(result: TaskResult): void;
  runFinished?(report: RunReport): void;
}

const LABELS: Record<TaskStatus, string> = {
  OK: "[ok]",
  CHANGED: "[changed]",
  WARNING: "[warn]",
  SKIPPED: "[skip]",
  FAILED: "[FAIL]",
};

export function formatResultLine(result: TaskResult): string {
  return `${LABELS[result.status].padEnd(9)} ${result.hostId} ${result.taskName}: ${result.message}`;
}

export type ConsoleReporterOptions = {
  /** Hide per-task lines; step headers and the summary still print. */
  quiet?: boolean;
  write?: (line: string) => void;
};

export class ConsoleReporter implements Reporter {
  private quiet: boolean;
  private write: (line: string) => void;

  constructor(opts: ConsoleReporterOptions = {}) {
    this.quiet = opts.quiet ?? false;
    this.write = opts.write ?? ((line) => console.log(line));
  }

  stepStarted(step: PlanStep, hostIds: readonly string[]): void {
    const hosts = hostIds.length > 0 ? hostIds.join(", ") : "no hosts";
    this.write(`\nStep ${step.index + 1}: ${step.group} (${hosts})`);
  }

  taskFinished(result: TaskResult): void {
    if (this.quiet) return;
    this.write(`  ${formatResultLine(result)}`);
  }

  runFinished(report: RunReport): void {
    this.write("");
    for (const line of formatSummary(report)) this.write(line);
  }
}

export const silentReporter: Reporter = {
  taskFinished: () => {},
};
