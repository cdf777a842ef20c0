import type { Goal, HostGroup } from "../registry/goals.js";
import type { TaskStatus } from "../tasks/types.js";

export type ErrorKind = "TASK_EXECUTION" | "CONNECTION" | "TIMEOUT" | "IDEMPOTENCY_VIOLATION";

export type TaskResult = {
  status: TaskStatus;
  message: string;
  hostId: string;
  taskName: string;
  group: HostGroup;
  stepIndex: number;
  changed: boolean;
  startedAt: number;
  finishedAt: number;
  durationMs: number;
  errorKind?: ErrorKind;
};

export type RollupStatus = "OK" | "WARNING" | "FAILED";

export type AbortRecord = {
  reason: "failure" | "cancelled";
  stepIndex: number;
  taskName: string;
  message: string;
};

export type RunReportSnapshot = {
  runId: string;
  goal: Goal;
  status: RollupStatus;
  results: TaskResult[];
  abort?: AbortRecord;
  startedAt: number;
  finishedAt?: number;
  durationMs?: number;
  sealed: boolean;
};
