import type { Host } from "../inventory/types.js";
import type { AppSettings } from "../schemas.js";
import type { CommandResult, SharedState, Task, TaskOutcome } from "../tasks/types.js";

/** Success carries the task's own outcome; failure carries whatever stopped it. */
export type RawOutcome = { ok: true; outcome: TaskOutcome } | { ok: false; error: unknown };

/** Per-invocation inputs a backend threads into the task context. */
export type InvocationScope = {
  runId: string;
  settings?: AppSettings;
  shared: SharedState;
  signal: AbortSignal;
  /** Called by the backend once the host is free and the task body is about to run; the time limit starts here. */
  begin(): void;
};

export type BackendKind = "local" | "remote";

export interface ExecutionBackend {
  readonly kind: BackendKind;
  /** Never rejects for task failures; those come back as `{ ok: false }`. */
  execute(task: Task, host: Host, scope: InvocationScope): Promise<RawOutcome>;
  /** Release everything the backend holds for the run. */
  close(): Promise<void>;
}

export type ChannelExecOptions = {
  /** Aborting stops the command where the channel can. */
  signal?: AbortSignal;
};

/** The one primitive a backend must supply; file helpers are built on top of it. */
export interface CommandChannel {
  exec(command: string, opts?: ChannelExecOptions): Promise<CommandResult>;
}

export type BackendSet = {
  local: ExecutionBackend;
  remote: ExecutionBackend;
};

export function backendFor(backends: BackendSet, host: Host): ExecutionBackend {
  return host.connection === "local" ? backends.local : backends.remote;
}
