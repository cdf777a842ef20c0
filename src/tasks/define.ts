import { TaskExecutionError } from "../errors.js";
import type { AppSettings } from "../schemas.js";
import { tail } from "../utils/shell.js";
import type { ExecOptions, Task, TaskContext, TaskOutcome } from "./types.js";

export function defineTask(task: Task): Task {
  return Object.freeze({ ...task, groups: Object.freeze([...task.groups]) });
}

export const outcome = {
  ok: (message: string, data?: unknown): TaskOutcome => ({ status: "OK", message, data }),
  changed: (message: string, data?: unknown): TaskOutcome => ({ status: "CHANGED", message, data }),
  warning: (message: string): TaskOutcome => ({ status: "WARNING", message }),
  skipped: (message: string): TaskOutcome => ({ status: "SKIPPED", message }),
  failed: (message: string): TaskOutcome => ({ status: "FAILED", message }),
};

/** `ok` when nothing changed, otherwise `changed`. */
export function settle(changed: boolean, message: string): TaskOutcome {
  return changed ? outcome.changed(message) : outcome.ok(message);
}

/**
 * Run a command and return its stdout; a non-zero exit throws with `what` and
 * the stderr tail. `what` is also traced as a sub-step.
 */
export async function mustExec(ctx: TaskContext, command: string, what: string, opts?: ExecOptions): Promise<string> {
  ctx.step(what);
  const res = await ctx.exec(command, opts);
  if (res.exitCode !== 0) {
    throw new TaskExecutionError(`${what} failed (exit ${res.exitCode}): ${tail(res.stderr || res.stdout)}`);
  }
  return res.stdout;
}

export async function succeeds(ctx: TaskContext, command: string, opts?: ExecOptions): Promise<boolean> {
  return (await ctx.exec(command, opts)).exitCode === 0;
}

export function commandExists(ctx: TaskContext, name: string): Promise<boolean> {
  return succeeds(ctx, `command -v ${name} >/dev/null 2>&1`);
}

export function requireSettings(ctx: TaskContext, taskName: string): AppSettings {
  if (!ctx.settings) throw new TaskExecutionError(`${taskName} needs settings (azure and k8s sections)`);
  return ctx.settings;
}

/** Display name used for hostname, kubeadm node name and the Arc cluster name. */
export function nodeName(ctx: TaskContext): string {
  return ctx.host.vars.hostname ?? ctx.host.id;
}
