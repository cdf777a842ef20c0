import type { Host } from "../inventory/types.js";
import type { HostGroup } from "../registry/goals.js";
import type { AppSettings } from "../schemas.js";
import type { Logger } from "../utils/logger.js";

export const TASK_STATUSES = ["OK", "CHANGED", "WARNING", "FAILED", "SKIPPED"] as const;
export type TaskStatus = (typeof TASK_STATUSES)[number];

/** What a Task body returns. The wrapper turns it into a TaskResult. */
export type TaskOutcome = {
  status: TaskStatus;
  message: string;
  /** Defaults to `status === "CHANGED"`. */
  changed?: boolean;
  data?: unknown;
};

export type CommandResult = {
  exitCode: number;
  stdout: string;
  stderr: string;
};

export type ExecOptions = {
  /** Prefix with `sudo -n`. */
  sudo?: boolean;
  env?: Record<string, string>;
};

export type WriteFileOptions = {
  mode?: string;
  sudo?: boolean;
};

/** Run-scoped scratch space shared by every task of one run (facts, join tokens, …). */
export interface SharedState {
  get<T>(key: string, guard: (value: unknown) => value is T): T | undefined;
  set(key: string, value: unknown): void;
  has(key: string): boolean;
}

export interface TaskContext {
  readonly runId: string;
  readonly host: Host;
  readonly settings?: AppSettings;
  readonly shared: SharedState;
  /** Aborted when the task times out; check it between commands. */
  readonly signal: AbortSignal;
  readonly log: Logger;

  exec(command: string, opts?: ExecOptions): Promise<CommandResult>;
  /** Write `content` to `path` unless it already matches. Resolves to whether it changed. */
  writeFile(path: string, content: string, opts?: WriteFileOptions): Promise<boolean>;
  /** Put a transient file on the host for this task; removed once the task ends. */
  stageFile(content: string, opts?: { mode?: string }): Promise<string>;
  /**
   * Pull `remotePath` back to `localPath` on the control machine and delete the
   * remote copy. Remote hosts do this when their session closes.
   */
  collect(remotePath: string, localPath: string): Promise<void>;
  /** Stage `content` (0600) and collect it to `localPath`. The staged copy is removed if the hand-off fails. */
  exportFile(content: string, localPath: string): Promise<void>;
  /** Trace a sub-step at info level, prefixed with host and task. */
  step(message: string): void;
}

export interface Task {
  readonly name: string;
  readonly description: string;
  readonly groups: readonly HostGroup[];
  run(ctx: TaskContext): Promise<TaskOutcome>;
}
