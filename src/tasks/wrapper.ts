import type { ExecutionBackend, InvocationScope, RawOutcome } from "../backends/types.js";
import { ConnectionError, TaskTimeoutError, errorMessage } from "../errors.js";
import type { Host } from "../inventory/types.js";
import type { HostGroup } from "../registry/goals.js";
import type { Reporter } from "../report/reporter.js";
import type { ErrorKind, TaskResult } from "../report/types.js";
import { log as defaultLog, type Logger } from "../utils/logger.js";
import { truncate } from "../utils/shell.js";
import type { Task, TaskStatus } from "./types.js";

export type WrapperHarness = {
  /** Per-invocation bound in ms, counted from when the backend starts the task body; 0 disables it. */
  timeoutMs: number;
  /** Treat any reported change as an idempotency violation. */
  expectNoChanges: boolean;
  reporter: Reporter;
  outputTruncation: number;
  log?: Logger;
};

export type Invocation = {
  stepIndex: number;
  group: HostGroup;
  scope: Omit<InvocationScope, "signal" | "begin">;
};

export type WrappedTask = (host: Host, backend: ExecutionBackend, invocation: Invocation) => Promise<TaskResult>;

type Verdict = {
  status: TaskStatus;
  message: string;
  changed: boolean;
  errorKind?: ErrorKind;
};

function failure(err: unknown): Verdict {
  if (err instanceof ConnectionError) {
    return { status: "FAILED", message: err.message, changed: false, errorKind: "CONNECTION" };
  }
  if (err instanceof TaskTimeoutError) {
    return { status: "FAILED", message: err.message, changed: false, errorKind: "TIMEOUT" };
  }
  return {
    status: "FAILED",
    message: `System error: ${errorMessage(err)}`,
    changed: false,
    errorKind: "TASK_EXECUTION",
  };
}

function judge(raw: RawOutcome, expectNoChanges: boolean): Verdict {
  if (!raw.ok) return failure(raw.error);

  const { status, message } = raw.outcome;
  const changed = raw.outcome.changed ?? status === "CHANGED";
  if (status === "FAILED") return { status, message, changed, errorKind: "TASK_EXECUTION" };
  if (expectNoChanges && changed) {
    return {
      status: "WARNING",
      message: `Expected no changes but the task changed state: ${message}`,
      changed,
      errorKind: "IDEMPOTENCY_VIOLATION",
    };
  }
  return { status, message, changed };
}

/**
 * Races `start` against a timer. The timer is armed by the `begin` callback the
 * backend fires once the host is free, so time spent queued behind another
 * task on the same host does not count.
 */
function withTimeout(
  start: (begin: () => void) => Promise<RawOutcome>,
  taskName: string,
  timeoutMs: number,
  controller: AbortController,
): Promise<RawOutcome> {
  if (timeoutMs <= 0) return start(() => {});
  let timer: ReturnType<typeof setTimeout> | undefined;
  let expire: (err: TaskTimeoutError) => void = () => {};
  const expired = new Promise<never>((_, reject) => {
    expire = reject;
  });
  const begin = () => {
    if (timer !== undefined) return;
    timer = setTimeout(() => {
      controller.abort();
      expire(new TaskTimeoutError(taskName, timeoutMs));
    }, timeoutMs);
  };
  return Promise.race([start(begin), expired]).finally(() => clearTimeout(timer));
}

/**
 * Harness around one Task. The returned function never rejects: whatever the
 * backend or the Task does ends up as a TaskResult, and every invocation emits
 * one operator line plus one diagnostic record.
 */
export function wrapTask(task: Task, harness: WrapperHarness): WrappedTask {
  const logger = harness.log ?? defaultLog;

  return async (host, backend, invocation) => {
    const startedAt = Date.now();
    const controller = new AbortController();

    let verdict: Verdict;
    let stack: string | undefined;
    try {
      const raw = await withTimeout(
        (begin) => backend.execute(task, host, { ...invocation.scope, signal: controller.signal, begin }),
        task.name,
        harness.timeoutMs,
        controller,
      );
      verdict = judge(raw, harness.expectNoChanges);
      if (!raw.ok && raw.error instanceof Error) stack = raw.error.stack;
    } catch (err) {
      verdict = failure(err);
      if (err instanceof Error) stack = err.stack;
    }

    const finishedAt = Date.now();
    const result: TaskResult = {
      status: verdict.status,
      message: truncate(verdict.message, harness.outputTruncation),
      hostId: host.id,
      taskName: task.name,
      group: invocation.group,
      stepIndex: invocation.stepIndex,
      changed: verdict.changed,
      startedAt,
      finishedAt,
      durationMs: finishedAt - startedAt,
      ...(verdict.errorKind ? { errorKind: verdict.errorKind } : {}),
    };

    harness.reporter.taskFinished(result);
    const record = {
      runId: invocation.scope.runId,
      host: host.id,
      task: task.name,
      step: invocation.stepIndex,
      status: result.status,
      changed: result.changed,
      durationMs: result.durationMs,
      errorKind: result.errorKind,
      message: verdict.message,
    };
    if (result.status === "FAILED") {
      logger.warn(`[${host.id}] ${task.name} failed`, record);
      if (stack) logger.debug(`[${host.id}] ${task.name} stack`, { stack });
    } else {
      logger.info(`[${host.id}] ${task.name} ${result.status}`, record);
    }
    return result;
  };
}
