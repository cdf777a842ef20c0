import type { Goal, HostGroup } from "../registry/goals.js";
import type { ExecutionPlan, PlanStep } from "../registry/registry.js";
import type { RunReport } from "../report/run-report.js";
import type { AbortRecord, TaskResult } from "../report/types.js";
import type { AppSettings } from "../schemas.js";
import type { TargetSelector } from "../inventory/types.js";
import type { Task } from "../tasks/types.js";

export type RunOptions = {
  /** Keep walking the plan after a failed Task. */
  continueOnError?: boolean;
  targetFilter?: TargetSelector;
  /** Falls back to `config.timeouts.task`. 0 disables. */
  perTaskTimeoutMs?: number;
  /** Falls back to `config.limits.maxConcurrency`. */
  maxConcurrency?: number;
  expectNoChanges?: boolean;
  /** Cooperative: checked before each Task starts; running Tasks are never interrupted. */
  signal?: AbortSignal;
  runTimeoutMs?: number;
  settings?: AppSettings;
  runId?: string;
};

export type RunCallbacks = {
  onRunStart?: (report: RunReport, plan: ExecutionPlan) => void;
  onStepStart?: (step: PlanStep, hostIds: string[]) => void;
  onTaskStart?: (step: PlanStep, task: Task, hostIds: string[]) => void;
  /** Fires as each host completes, before the barrier. */
  onTaskEnd?: (result: TaskResult) => void;
  onStepEnd?: (step: PlanStep) => void;
  onAbort?: (abort: AbortRecord) => void;
  onFinish?: (report: RunReport) => void;
};

export type PlanPreviewStep = {
  index: number;
  group: HostGroup;
  tasks: string[];
  hosts: string[];
};

export type PlanPreview = {
  goal: Goal;
  steps: PlanPreviewStep[];
};
