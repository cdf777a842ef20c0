import type { Goal, HostGroup } from "../registry/goals.js";
import type { AbortRecord, RollupStatus, RunReportSnapshot, TaskResult } from "../report/types.js";

export type RunSummary = Pick<RunReportSnapshot, "runId" | "goal" | "status" | "startedAt" | "finishedAt" | "sealed"> & {
  results: number;
  aborted: boolean;
};

// --- SSE Event Types ---

export type ServerEvent =
  | { type: "run:started"; runId: string; goal: Goal }
  | { type: "step:started"; runId: string; stepIndex: number; group: HostGroup; hosts: string[] }
  | { type: "task:started"; runId: string; stepIndex: number; taskName: string; hosts: string[] }
  | { type: "task:ended"; runId: string; result: TaskResult }
  | { type: "step:ended"; runId: string; stepIndex: number }
  | { type: "run:aborted"; runId: string; abort: AbortRecord }
  | { type: "run:complete"; runId: string; status: RollupStatus; durationMs: number }
  | { type: "run:error"; runId: string; error: string }
  | { type: "run:deleted"; runId: string };
