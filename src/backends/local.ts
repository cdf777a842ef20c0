import { execFile } from "node:child_process";
import { copyFile, mkdir, rm } from "node:fs/promises";
import { dirname, resolve } from "node:path";
import { promisify } from "node:util";
import type { Host } from "../inventory/types.js";
import { runInContext } from "../tasks/context.js";
import type { CommandResult, Task } from "../tasks/types.js";
import { KeyedLanes } from "../utils/lanes.js";
import { log } from "../utils/logger.js";
import type { ChannelExecOptions, CommandChannel, ExecutionBackend, InvocationScope, RawOutcome } from "./types.js";

const execFileAsync = promisify(execFile);

export type LocalBackendOptions = {
  shell?: string;
  maxBuffer?: number;
  /** Max wait for running tasks in `close()`. */
  drainMs?: number;
};

type ExecFailure = { code: number; stdout: string; stderr: string };

function isExecFailure(err: unknown): err is ExecFailure {
  return (
    typeof err === "object" &&
    err !== null &&
    "code" in err &&
    typeof err.code === "number" &&
    "stdout" in err &&
    "stderr" in err
  );
}

/** Runs commands on the control machine through `sh -c`. */
export class LocalChannel implements CommandChannel {
  private shell: string;
  private maxBuffer: number;

  constructor(opts: LocalBackendOptions = {}) {
    this.shell = opts.shell ?? "/bin/sh";
    this.maxBuffer = opts.maxBuffer ?? 50 * 1024 * 1024;
  }

  async exec(command: string, opts: ChannelExecOptions = {}): Promise<CommandResult> {
    try {
      const { stdout, stderr } = await execFileAsync(this.shell, ["-c", command], {
        maxBuffer: this.maxBuffer,
        encoding: "utf-8",
        signal: opts.signal,
      });
      return { exitCode: 0, stdout, stderr };
    } catch (err: unknown) {
      // Non-zero exit is an answer, not an error; spawn failures and aborts still throw.
      if (isExecFailure(err)) {
        return { exitCode: err.code, stdout: String(err.stdout), stderr: String(err.stderr) };
      }
      throw err;
    }
  }
}

export class LocalBackend implements ExecutionBackend {
  readonly kind = "local" as const;
  private channel: CommandChannel;
  private drainMs: number;
  /** Tasks for one host run one at a time, as they do over SSH. */
  private lanes = new KeyedLanes();

  constructor(opts: LocalBackendOptions & { channel?: CommandChannel } = {}) {
    this.channel = opts.channel ?? new LocalChannel(opts);
    this.drainMs = opts.drainMs ?? 30_000;
  }

  execute(task: Task, host: Host, scope: InvocationScope): Promise<RawOutcome> {
    return this.lanes.run(host.id, () => {
      log.debug(`[local] Running "${task.name}" on ${host.id}`);
      return runInContext(task, {
        channel: this.channel,
        host,
        scope,
        collect: collectLocally,
      });
    });
  }

  async close(): Promise<void> {
    if (await this.lanes.drain(this.drainMs)) {
      log.warn(`Closing local backend while tasks are still running (waited ${this.drainMs}ms)`);
    }
  }
}

/** On the control machine a collected file is simply moved into place. */
async function collectLocally(sourcePath: string, localPath: string): Promise<void> {
  if (resolve(sourcePath) === resolve(localPath)) return;
  await mkdir(dirname(localPath), { recursive: true });
  await copyFile(sourcePath, localPath);
  await rm(sourcePath, { force: true });
}
