import { createHash, randomBytes } from "node:crypto";
import type { CommandChannel, InvocationScope, RawOutcome } from "../backends/types.js";
import { TaskExecutionError, errorMessage } from "../errors.js";
import type { Host } from "../inventory/types.js";
import type { AppSettings } from "../schemas.js";
import { log as defaultLog, type Logger } from "../utils/logger.js";
import { quote, tail, withEnv } from "../utils/shell.js";
import type {
  CommandResult,
  ExecOptions,
  SharedState,
  Task,
  TaskContext,
  WriteFileOptions,
} from "./types.js";

export class SharedStore implements SharedState {
  private values = new Map<string, unknown>();

  get<T>(key: string, guard: (value: unknown) => value is T): T | undefined {
    const value = this.values.get(key);
    return guard(value) ? value : undefined;
  }

  set(key: string, value: unknown): void {
    this.values.set(key, value);
  }

  has(key: string): boolean {
    return this.values.has(key);
  }
}

export type ContextOptions = {
  channel: CommandChannel;
  host: Host;
  scope: InvocationScope;
  collect: (remotePath: string, localPath: string) => Promise<void>;
  /** Prefix for `step` lines. */
  taskName?: string;
  log?: Logger;
};

/**
 * TaskContext over a bare command channel. Both backends use it, so file
 * writes, staging and sudo handling behave the same locally and over SSH.
 */
export class ChannelTaskContext implements TaskContext {
  readonly runId: string;
  readonly host: Host;
  readonly settings?: AppSettings;
  readonly shared: SharedState;
  readonly signal: AbortSignal;
  readonly log: Logger;

  private channel: CommandChannel;
  private collectFn: ContextOptions["collect"];
  private taskName: string;
  private staged: string[] = [];

  constructor(opts: ContextOptions) {
    this.channel = opts.channel;
    this.host = opts.host;
    this.runId = opts.scope.runId;
    this.settings = opts.scope.settings;
    this.shared = opts.scope.shared;
    this.signal = opts.scope.signal;
    this.collectFn = opts.collect;
    this.taskName = opts.taskName ?? "task";
    this.log = opts.log ?? defaultLog;
  }

  async exec(command: string, opts: ExecOptions = {}): Promise<CommandResult> {
    if (this.signal.aborted) {
      throw new TaskExecutionError(`Task on ${this.host.id} was aborted; refusing to run "${command}"`);
    }
    const inner = withEnv(command, opts.env);
    const full = opts.sudo ? `sudo -n sh -c ${quote(inner)}` : inner;
    this.log.debug(`[${this.host.id}] $ ${opts.sudo ? "sudo " : ""}${command}`);

    const result = await this.channel.exec(full, { signal: this.signal });
    if (opts.sudo && result.exitCode !== 0 && result.stderr.includes("a password is required")) {
      const user = this.host.username ?? "the SSH user";
      throw new TaskExecutionError(
        `Sudo privileges missing: configure NOPASSWD for ${user} in /etc/sudoers on ${this.host.address}`,
      );
    }
    return result;
  }

  async writeFile(path: string, content: string, opts: WriteFileOptions = {}): Promise<boolean> {
    const digest = createHash("sha256").update(content).digest("hex");
    const current = await this.exec(`sha256sum ${quote(path)} 2>/dev/null || true`, { sudo: opts.sudo });
    if (current.stdout.trim().split(/\s+/)[0] === digest) return false;

    const encoded = Buffer.from(content, "utf-8").toString("base64");
    let command = `printf '%s' ${quote(encoded)} | base64 -d > ${quote(path)}`;
    if (opts.mode) command += ` && chmod ${opts.mode} ${quote(path)}`;
    const res = await this.exec(command, { sudo: opts.sudo });
    if (res.exitCode !== 0) {
      throw new TaskExecutionError(`Failed to write ${path} on ${this.host.id}: ${tail(res.stderr)}`);
    }
    return true;
  }

  async stageFile(content: string, opts: { mode?: string } = {}): Promise<string> {
    const path = `/tmp/conductor-${this.runId.slice(0, 8)}-${randomBytes(4).toString("hex")}`;
    this.staged.push(path);
    await this.writeFile(path, content, { mode: opts.mode ?? "600" });
    return path;
  }

  collect(remotePath: string, localPath: string): Promise<void> {
    return this.collectFn(remotePath, localPath);
  }

  async exportFile(content: string, localPath: string): Promise<void> {
    const path = await this.stageFile(content);
    await this.collect(path, localPath);
    // Handed off: the collector deletes it from here on.
    this.staged = this.staged.filter((p) => p !== path);
  }

  step(message: string): void {
    this.log.info(`[${this.host.id}] ${this.taskName}: ${message}`);
  }

  /** Remove staged files. Runs after every task, whatever its outcome. */
  async cleanup(): Promise<void> {
    const paths = this.staged.splice(0);
    if (paths.length === 0) return;
    try {
      const res = await this.channel.exec(`rm -f ${paths.map(quote).join(" ")}`);
      if (res.exitCode !== 0) {
        this.log.warn(`[${this.host.id}] Could not remove staged files`, { paths, stderr: tail(res.stderr) });
      }
    } catch (err) {
      this.log.warn(`[${this.host.id}] Could not remove staged files`, { paths, error: errorMessage(err) });
    }
  }
}

/** Run a task against a channel and fold any throw into a raw failure. */
export async function runInContext(task: Task, opts: ContextOptions): Promise<RawOutcome> {
  const ctx = new ChannelTaskContext({ taskName: task.name, ...opts });
  try {
    opts.scope.begin();
    return { ok: true, outcome: await task.run(ctx) };
  } catch (error) {
    return { ok: false, error };
  } finally {
    await ctx.cleanup();
  }
}
