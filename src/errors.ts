export type ErrorCode =
  | "UNKNOWN_GOAL"
  | "INVALID_REGISTRATION"
  | "INVALID_INVENTORY"
  | "INVALID_SETTINGS"
  | "INVALID_CONFIG"
  | "VALIDATION_FAILED"
  | "CONNECTION_FAILED"
  | "TASK_FAILED"
  | "TASK_TIMEOUT"
  | "INVARIANT_VIOLATION";

export class ConductorError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConductorError";
    this.code = code;
  }
}

/** Raised before any Task runs: unresolvable goal, bad registry entry, bad input files. */
export class ConfigError extends ConductorError {
  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(code, message, options);
    this.name = "ConfigError";
  }
}

export class ValidationError extends ConductorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("VALIDATION_FAILED", message, options);
    this.name = "ValidationError";
  }
}

export class ConnectionError extends ConductorError {
  readonly hostId: string;

  constructor(hostId: string, message: string, options?: { cause?: unknown }) {
    super("CONNECTION_FAILED", message, options);
    this.name = "ConnectionError";
    this.hostId = hostId;
  }
}

export class TaskExecutionError extends ConductorError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("TASK_FAILED", message, options);
    this.name = "TaskExecutionError";
  }
}

export class TaskTimeoutError extends ConductorError {
  readonly timeoutMs: number;

  constructor(taskName: string, timeoutMs: number) {
    super("TASK_TIMEOUT", `Task "${taskName}" timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

/** Internal contract broken (e.g. empty plan for a registered goal, append to a sealed report). */
export class InvariantError extends ConductorError {
  constructor(message: string) {
    super("INVARIANT_VIOLATION", message);
    this.name = "InvariantError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
