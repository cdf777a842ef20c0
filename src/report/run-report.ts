import { randomUUID } from "node:crypto";
import { InvariantError } from "../errors.js";
import type { Goal } from "../registry/goals.js";
import type { TaskStatus } from "../tasks/types.js";
import type { AbortRecord, RollupStatus, RunReportSnapshot, TaskResult } from "./types.js";

/** FAILED if any result failed, else WARNING if any warned, else OK. */
export function rollup(results: readonly TaskResult[]): RollupStatus {
  if (results.some((r) => r.status === "FAILED")) return "FAILED";
  if (results.some((r) => r.status === "WARNING")) return "WARNING";
  return "OK";
}

/**
 * Results of one goal run, in completion order. Appends come from the fan-out
 * lanes of the current task; once sealed the report is frozen.
 */
export class RunReport {
  readonly runId: string;
  readonly goal: Goal;
  readonly startedAt: number;
  private _results: TaskResult[] = [];
  private _finishedAt?: number;
  private _abort?: AbortRecord;
  private _sealed = false;

  constructor(goal: Goal, runId: string = randomUUID(), startedAt: number = Date.now()) {
    this.goal = goal;
    this.runId = runId;
    this.startedAt = startedAt;
  }

  append(result: TaskResult): void {
    if (this._sealed) {
      throw new InvariantError(`Run ${this.runId} is sealed; cannot record "${result.taskName}" on ${result.hostId}`);
    }
    this._results.push(Object.freeze({ ...result }));
  }

  seal(abort?: AbortRecord, finishedAt: number = Date.now()): this {
    if (this._sealed) throw new InvariantError(`Run ${this.runId} is already sealed`);
    this._abort = abort ? Object.freeze({ ...abort }) : undefined;
    this._finishedAt = finishedAt;
    this._sealed = true;
    Object.freeze(this._results);
    return this;
  }

  get sealed(): boolean {
    return this._sealed;
  }

  get results(): readonly TaskResult[] {
    return this._results;
  }

  get status(): RollupStatus {
    return rollup(this._results);
  }

  get abort(): AbortRecord | undefined {
    return this._abort;
  }

  get aborted(): boolean {
    return this._abort !== undefined;
  }

  get finishedAt(): number | undefined {
    return this._finishedAt;
  }

  get durationMs(): number | undefined {
    return this._finishedAt === undefined ? undefined : this._finishedAt - this.startedAt;
  }

  forHost(hostId: string): TaskResult[] {
    return this._results.filter((r) => r.hostId === hostId);
  }

  forTask(taskName: string): TaskResult[] {
    return this._results.filter((r) => r.taskName === taskName);
  }

  withStatus(status: TaskStatus): TaskResult[] {
    return this._results.filter((r) => r.status === status);
  }

  countByStatus(): Record<TaskStatus, number> {
    const counts: Record<TaskStatus, number> = { OK: 0, CHANGED: 0, WARNING: 0, FAILED: 0, SKIPPED: 0 };
    for (const r of this._results) counts[r.status]++;
    return counts;
  }

  get changedCount(): number {
    return this._results.filter((r) => r.changed).length;
  }

  toJSON(): RunReportSnapshot {
    return {
      runId: this.runId,
      goal: this.goal,
      status: this.status,
      results: [...this._results],
      abort: this._abort,
      startedAt: this.startedAt,
      finishedAt: this._finishedAt,
      durationMs: this.durationMs,
      sealed: this._sealed,
    };
  }
}
