import type { ExecutionBackend, BackendKind, CommandChannel, InvocationScope, RawOutcome } from "../src/backends/types.js";
import type { Host } from "../src/inventory/types.js";
import type { HostGroup } from "../src/registry/goals.js";
import { AppSettingsSchema, type AppSettings } from "../src/schemas.js";
import { ChannelTaskContext, SharedStore, runInContext } from "../src/tasks/context.js";
import type { CommandResult, SharedState, Task, TaskContext, TaskOutcome } from "../src/tasks/types.js";
import type { Logger } from "../src/utils/logger.js";

export function makeHost(id: string, groups: HostGroup[], overrides: Partial<Host> = {}): Host {
  return {
    id,
    address: `10.0.0.${id.length}`,
    port: 22,
    groups,
    connection: groups.includes("local_machine") ? "local" : "ssh",
    vars: {},
    ...overrides,
  };
}

export function makeTask(
  name: string,
  groups: HostGroup[],
  run: (ctx: TaskContext) => Promise<TaskOutcome> = async () => ({ status: "OK", message: "ok" }),
): Task {
  return { name, description: name, groups, run };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

type Rule = [RegExp, Partial<CommandResult>];

/** Answers commands by the first matching pattern; anything unmatched exits 0 with no output. */
export class ScriptedChannel implements CommandChannel {
  readonly commands: string[] = [];
  private rules: Rule[];

  constructor(rules: Rule[] = []) {
    this.rules = rules;
  }

  async exec(command: string): Promise<CommandResult> {
    this.commands.push(command);
    const rule = this.rules.find(([pattern]) => pattern.test(command));
    return { exitCode: 0, stdout: "", stderr: "", ...(rule ? rule[1] : {}) };
  }
}

/** Runs tasks through the real context over a scripted channel and records every call. */
export class RecordingBackend implements ExecutionBackend {
  readonly kind: BackendKind;
  readonly calls: string[] = [];
  closed = 0;
  channel: CommandChannel;

  constructor(kind: BackendKind = "local", channel: CommandChannel = new ScriptedChannel()) {
    this.kind = kind;
    this.channel = channel;
  }

  async execute(task: Task, host: Host, scope: InvocationScope): Promise<RawOutcome> {
    this.calls.push(`${task.name}@${host.id}`);
    return runInContext(task, {
      channel: this.channel,
      host,
      scope,
      collect: async () => {},
    });
  }

  async close(): Promise<void> {
    this.closed++;
  }
}

export function testSettings(flux: Record<string, unknown> = {}): AppSettings {
  return AppSettingsSchema.parse({
    azure: { subscriptionId: "sub-123", location: "westeurope", resourceGroup: "rg-test" },
    k8s: { version: "1.30", flux },
  });
}

export type ContextExtras = {
  settings?: AppSettings;
  shared?: SharedState;
  signal?: AbortSignal;
  runId?: string;
  collect?: (remotePath: string, localPath: string) => Promise<void>;
  taskName?: string;
  log?: Logger;
};

/** A real task context over a scripted channel. */
export function makeContext(host: Host, channel: CommandChannel, extras: ContextExtras = {}): ChannelTaskContext {
  return new ChannelTaskContext({
    channel,
    host,
    scope: {
      runId: extras.runId ?? "run-test-0001",
      settings: extras.settings,
      shared: extras.shared ?? new SharedStore(),
      signal: extras.signal ?? new AbortController().signal,
      begin: () => {},
    },
    collect: extras.collect ?? (async () => {}),
    taskName: extras.taskName,
    log: extras.log,
  });
}
