import { createHash } from "node:crypto";
import { describe, expect, it, vi } from "vitest";
import { LocalBackend } from "../../src/backends/local.js";
import { createConfig } from "../../src/config.js";
import { Engine } from "../../src/engine/engine.js";
import { ConfigError, InvariantError } from "../../src/errors.js";
import { StaticInventory } from "../../src/inventory/inventory.js";
import { createDefaultRegistry } from "../../src/registry/default-registry.js";
import { TaskRegistry, defineRegistry, type ExecutionPlan } from "../../src/registry/registry.js";
import type { TaskResult } from "../../src/report/types.js";
import type { CommandResult, TaskContext, TaskOutcome } from "../../src/tasks/types.js";
import type { Logger } from "../../src/utils/logger.js";
import { RecordingBackend, ScriptedChannel, makeHost, makeTask, sleep } from "../helpers.js";

const quiet: Logger = { debug: () => {}, info: () => {}, warn: () => {}, error: () => {} };

const inventory = new StaticInventory([
  makeHost("controller", ["local_machine"]),
  makeHost("cp-1", ["control_plane"]),
  makeHost("w-1", ["workers"]),
  makeHost("w-2", ["workers"]),
]);

function engineWith(registry: TaskRegistry, backend = new RecordingBackend()) {
  const factory = vi.fn(() => ({ local: backend, remote: backend }));
  const engine = new Engine({ registry, backends: factory, log: quiet, config: createConfig() });
  return { engine, backend, factory };
}

/** A task that records when it starts and ends on each host. */
function traced(name: string, events: string[], outcomeFor: (hostId: string) => TaskOutcome = () => ({ status: "OK", message: "ok" }), delayFor: (hostId: string) => number = () => 5) {
  return makeTask(name, ["local_machine", "control_plane", "workers"], async (ctx: TaskContext) => {
    events.push(`start ${name}@${ctx.host.id}`);
    await sleep(delayFor(ctx.host.id));
    events.push(`end ${name}@${ctx.host.id}`);
    return outcomeFor(ctx.host.id);
  });
}

describe("Engine.run", () => {
  it("walks steps in order and joins every task at a barrier", async () => {
    const events: string[] = [];
    const a = traced("a", events);
    const b = traced("b", events);
    const c = traced("c", events);
    const { engine } = engineWith(
      defineRegistry((r) => r.goal("INIT").on("control_plane", [a]).on("workers", [b, c])),
    );

    const report = await engine.run("INIT", inventory);

    expect(report.status).toBe("OK");
    expect(report.sealed).toBe(true);
    expect(report.results.map((r) => [r.taskName, r.stepIndex])).toEqual([
      ["a", 0],
      ["b", 1],
      ["b", 1],
      ["c", 1],
      ["c", 1],
    ]);
    const lastEndOfB = Math.max(events.indexOf("end b@w-1"), events.indexOf("end b@w-2"));
    const firstStartOfC = Math.min(events.indexOf("start c@w-1"), events.indexOf("start c@w-2"));
    expect(lastEndOfB).toBeLessThan(firstStartOfC);
    expect(events.indexOf("end a@cp-1")).toBeLessThan(events.indexOf("start b@w-1"));
  });

  it("halts after the task that failed and lets its siblings finish", async () => {
    const events: string[] = [];
    const flaky = traced(
      "flaky",
      events,
      (id) => (id === "w-1" ? { status: "FAILED", message: "nope" } : { status: "OK", message: "ok" }),
      (id) => (id === "w-2" ? 30 : 1),
    );
    const next = traced("next", events);
    const { engine, backend } = engineWith(defineRegistry((r) => r.goal("INIT").on("workers", [flaky, next])));
    const onAbort = vi.fn();

    const report = await engine.run("INIT", inventory, {}, { onAbort });

    expect(report.status).toBe("FAILED");
    expect(report.results.map((r) => `${r.taskName}@${r.hostId}:${r.status}`)).toEqual([
      "flaky@w-1:FAILED",
      "flaky@w-2:OK",
    ]);
    expect(report.abort).toEqual({ reason: "failure", stepIndex: 0, taskName: "flaky", message: "1 host(s) failed: w-1" });
    expect(onAbort).toHaveBeenCalledWith(report.abort);
    expect(backend.calls).not.toContain("next@w-1");
    expect(backend.closed).toBe(1);
  });

  it("keeps going past failures with continueOnError", async () => {
    const fails = makeTask("fails", ["workers"], async () => ({ status: "FAILED", message: "x" }));
    const after = makeTask("after", ["control_plane"]);
    const { engine } = engineWith(defineRegistry((r) => r.goal("INIT").on("workers", [fails]).on("control_plane", [after])));

    const report = await engine.run("INIT", inventory, { continueOnError: true });

    expect(report.status).toBe("FAILED");
    expect(report.aborted).toBe(false);
    expect(report.forTask("after")).toHaveLength(1);
  });

  it("records each host as it completes, independent of slower siblings", async () => {
    const events: string[] = [];
    const task = traced("t", events, () => ({ status: "OK", message: "ok" }), (id) => (id === "w-1" ? 40 : 1));
    const { engine } = engineWith(defineRegistry((r) => r.goal("VERIFY").on("workers", [task])));
    const ended: TaskResult[] = [];

    const report = await engine.run("VERIFY", inventory, {}, { onTaskEnd: (r) => ended.push(r) });

    expect(ended.map((r) => r.hostId)).toEqual(["w-2", "w-1"]);
    expect(report.results.map((r) => r.hostId)).toEqual(["w-2", "w-1"]);
  });

  it("respects maxConcurrency", async () => {
    let running = 0;
    let peak = 0;
    const task = makeTask("t", ["workers"], async () => {
      running++;
      peak = Math.max(peak, running);
      await sleep(5);
      running--;
      return { status: "OK", message: "ok" };
    });
    const many = new StaticInventory(["a", "b", "c", "d", "e"].map((id) => makeHost(id, ["workers"])));
    const { engine } = engineWith(defineRegistry((r) => r.goal("VERIFY").on("workers", [task])));

    const report = await engine.run("VERIFY", many, { maxConcurrency: 2 });

    expect(report.results).toHaveLength(5);
    expect(peak).toBe(2);
  });

  it("skips steps whose group has no hosts", async () => {
    const t = makeTask("t", ["workers", "control_plane"]);
    const { engine, backend } = engineWith(defineRegistry((r) => r.goal("INIT").on("workers", [t]).on("control_plane", [t])));
    const stepStarts: Array<[number, string[]]> = [];

    const report = await engine.run("INIT", inventory, { targetFilter: "cp" }, {
      onStepStart: (step, hosts) => stepStarts.push([step.index, hosts]),
    });

    expect(stepStarts).toEqual([
      [0, []],
      [1, ["cp-1"]],
    ]);
    expect(backend.calls).toEqual(["t@cp-1"]);
    expect(report.status).toBe("OK");
  });

  it("turns changes into warnings when no changes are expected", async () => {
    const t = makeTask("t", ["workers"], async () => ({ status: "CHANGED", message: "edited" }));
    const { engine } = engineWith(defineRegistry((r) => r.goal("VERIFY").on("workers", [t])));

    const report = await engine.run("VERIFY", inventory, { expectNoChanges: true });

    expect(report.status).toBe("WARNING");
    expect(report.results.every((r) => r.errorKind === "IDEMPOTENCY_VIOLATION")).toBe(true);
    expect(report.aborted).toBe(false);
  });

  it("shares run-scoped state between tasks", async () => {
    const produce = makeTask("produce", ["control_plane"], async (ctx) => {
      ctx.shared.set("token", `from-${ctx.host.id}`);
      return { status: "OK", message: "set" };
    });
    const consume = makeTask("consume", ["workers"], async (ctx) => ({
      status: "OK",
      message: ctx.shared.get("token", (v): v is string => typeof v === "string") ?? "missing",
    }));
    const { engine } = engineWith(defineRegistry((r) => r.goal("INIT").on("control_plane", [produce]).on("workers", [consume])));

    const report = await engine.run("INIT", inventory);

    expect(report.forTask("consume").map((r) => r.message)).toEqual(["from-cp-1", "from-cp-1"]);
  });

  it("stops before the next task once cancelled", async () => {
    const controller = new AbortController();
    const first = makeTask("first", ["workers"], async () => {
      controller.abort();
      return { status: "OK", message: "ok" };
    });
    const second = makeTask("second", ["workers"]);
    const { engine, backend } = engineWith(defineRegistry((r) => r.goal("INIT").on("workers", [first, second])));

    const report = await engine.run("INIT", inventory, { signal: controller.signal });

    expect(report.forTask("first")).toHaveLength(2);
    expect(report.forTask("second")).toHaveLength(0);
    expect(report.abort).toEqual({ reason: "cancelled", stepIndex: 0, taskName: "second", message: "Run cancelled" });
    expect(backend.closed).toBe(1);
  });

  it("cancels when the run time limit passes", async () => {
    const slow = makeTask("slow", ["workers"], async () => {
      await sleep(40);
      return { status: "OK", message: "ok" };
    });
    const { engine } = engineWith(defineRegistry((r) => r.goal("INIT").on("workers", [slow, slow])));

    const report = await engine.run("INIT", inventory, { runTimeoutMs: 10 });

    expect(report.results).toHaveLength(2);
    expect(report.abort).toMatchObject({ reason: "cancelled", taskName: "slow", message: "Run exceeded its 10ms time limit" });
  });

  it("fails a task that outlives its timeout and halts", async () => {
    const hang = makeTask("hang", ["control_plane"], (ctx) =>
      new Promise<TaskOutcome>((resolve) => ctx.signal.addEventListener("abort", () => resolve({ status: "OK", message: "late" }))),
    );
    const { engine } = engineWith(defineRegistry((r) => r.goal("INIT").on("control_plane", [hang])));

    const report = await engine.run("INIT", inventory, { perTaskTimeoutMs: 15 });

    expect(report.results[0]).toMatchObject({ status: "FAILED", errorKind: "TIMEOUT" });
    expect(report.abort?.reason).toBe("failure");
  });

  it("rejects an unknown goal before any backend is created", async () => {
    const { engine, factory } = engineWith(defineRegistry((r) => r.goal("VERIFY").on("workers", [makeTask("t", ["workers"])])));

    await expect(engine.run("DESTROY", inventory)).rejects.toBeInstanceOf(ConfigError);
    expect(factory).not.toHaveBeenCalled();
  });

  it("treats an empty plan as an invariant violation", async () => {
    class EmptyRegistry extends TaskRegistry {
      override resolve(): ExecutionPlan {
        return { goal: "VERIFY", steps: [] };
      }
    }
    const { engine } = engineWith(new EmptyRegistry());
    await expect(engine.run("VERIFY", inventory)).rejects.toBeInstanceOf(InvariantError);
  });

  it("fires callbacks in lifecycle order", async () => {
    const calls: string[] = [];
    const { engine } = engineWith(defineRegistry((r) => r.goal("VERIFY").on("control_plane", [makeTask("t", ["control_plane"])])));

    await engine.run("VERIFY", inventory, {}, {
      onRunStart: () => calls.push("run"),
      onStepStart: () => calls.push("step"),
      onTaskStart: () => calls.push("task"),
      onTaskEnd: () => calls.push("end"),
      onStepEnd: () => calls.push("stepEnd"),
      onFinish: (report) => calls.push(`finish:${report.sealed}`),
    });

    expect(calls).toEqual(["run", "step", "task", "end", "stepEnd", "finish:true"]);
  });
});

/** Remembers what `writeFile` put where, so a second run sees the first run's state. */
class FileSystemChannel extends ScriptedChannel {
  readonly files = new Map<string, string>();

  async exec(command: string): Promise<CommandResult> {
    this.commands.push(command);
    const sum = /^sha256sum '([^']+)'/.exec(command);
    if (sum) {
      const content = this.files.get(sum[1]);
      const stdout = content === undefined ? "" : `${createHash("sha256").update(content).digest("hex")}  ${sum[1]}\n`;
      return { exitCode: 0, stdout, stderr: "" };
    }
    const write = /^printf '%s' '([^']*)' \| base64 -d > '([^']+)'/.exec(command);
    if (write) this.files.set(write[2], Buffer.from(write[1], "base64").toString("utf-8"));
    return { exitCode: 0, stdout: "", stderr: "" };
  }
}

describe("Engine.run scenarios", () => {
  it("runs local checks before fanning out and rolls a worker failure up to FAILED", async () => {
    const events: string[] = [];
    const checkNetwork = traced("check-network", events);
    const checkAuth = traced("check-auth", events, () => ({ status: "WARNING", message: "token expiring" }));
    const ping = traced(
      "ping",
      events,
      (id) => (id === "w-2" ? { status: "FAILED", message: "unreachable" } : { status: "OK", message: "pong" }),
      (id) => (id === "w-1" ? 15 : 1),
    );
    const { engine } = engineWith(
      defineRegistry((r) => r.goal("VERIFY").on("local_machine", [checkNetwork, checkAuth]).on("workers", [ping])),
    );

    const report = await engine.run("VERIFY", inventory);

    expect(report.results.map((r) => `${r.taskName}@${r.hostId}:${r.status}:${r.message}`)).toEqual([
      "check-network@controller:OK:ok",
      "check-auth@controller:WARNING:token expiring",
      "ping@w-2:FAILED:unreachable",
      "ping@w-1:OK:pong",
    ]);
    expect(report.status).toBe("FAILED");
    expect(events.indexOf("end check-auth@controller")).toBeLessThan(events.indexOf("start ping@w-1"));
    expect(events.indexOf("end check-auth@controller")).toBeLessThan(events.indexOf("start ping@w-2"));
  });

  it("changes nothing when the same goal runs again", async () => {
    const channel = new FileSystemChannel();
    const configure = makeTask("configure", ["workers"], async (ctx) => {
      const changed = await ctx.writeFile(`/etc/conductor/${ctx.host.id}.conf`, `node=${ctx.host.id}\n`);
      return changed ? { status: "CHANGED", message: "written" } : { status: "OK", message: "up to date" };
    });
    const { engine } = engineWith(
      defineRegistry((r) => r.goal("INIT").on("workers", [configure])),
      new RecordingBackend("local", channel),
    );

    const first = await engine.run("INIT", inventory);
    const second = await engine.run("INIT", inventory, { expectNoChanges: true });

    expect(first.changedCount).toBe(2);
    expect(channel.files.get("/etc/conductor/w-1.conf")).toBe("node=w-1\n");
    expect(second.status).toBe("OK");
    expect(second.results.map((r) => [r.hostId, r.status, r.changed])).toEqual(
      expect.arrayContaining([
        ["w-1", "OK", false],
        ["w-2", "OK", false],
      ]),
    );
    expect(second.results).toHaveLength(2);
  });

  it("records a failing host while its sibling is still running and starts the next task after both", async () => {
    const events: string[] = [];
    let release = () => {};
    const gate = new Promise<void>((resolve) => {
      release = () => resolve();
    });
    const fanOut = makeTask("fan-out", ["workers"], async (ctx) => {
      events.push(`start fan-out@${ctx.host.id}`);
      if (ctx.host.id === "w-2") return { status: "FAILED", message: "disk full" };
      await gate;
      events.push(`end fan-out@${ctx.host.id}`);
      return { status: "OK", message: "ok" };
    });
    const after = traced("after", events);
    const { engine } = engineWith(defineRegistry((r) => r.goal("INIT").on("workers", [fanOut, after])));

    const report = await engine.run(
      "INIT",
      inventory,
      { continueOnError: true },
      {
        onTaskEnd: (r) => {
          events.push(`recorded ${r.taskName}@${r.hostId}`);
          if (r.hostId === "w-2") release();
        },
      },
    );

    expect(events.indexOf("recorded fan-out@w-2")).toBeLessThan(events.indexOf("end fan-out@w-1"));
    expect(report.results.slice(0, 2).map((r) => `${r.hostId}:${r.status}`)).toEqual(["w-2:FAILED", "w-1:OK"]);
    const bothDone = Math.max(events.indexOf("recorded fan-out@w-1"), events.indexOf("recorded fan-out@w-2"));
    expect(events.indexOf("start after@w-1")).toBeGreaterThan(bothDone);
    expect(events.indexOf("start after@w-2")).toBeGreaterThan(bothDone);
    expect(report.forTask("after")).toHaveLength(2);
    expect(report.status).toBe("FAILED");
  });
});

describe("Engine.run on the local backend", () => {
  it("does not overlap tasks on the control machine when one outlives its timeout", async () => {
    let running = 0;
    let peak = 0;
    const slow = (name: string) =>
      makeTask(name, ["local_machine"], async () => {
        running++;
        peak = Math.max(peak, running);
        await sleep(80);
        running--;
        return { status: "OK", message: "late" };
      });
    const local = new LocalBackend();
    const engine = new Engine({
      registry: defineRegistry((r) => r.goal("INIT").on("local_machine", [slow("t1"), slow("t2")])),
      backends: () => ({ local, remote: new RecordingBackend("remote") }),
      log: quiet,
      config: createConfig(),
    });

    const report = await engine.run("INIT", inventory, { perTaskTimeoutMs: 20, continueOnError: true });

    expect(report.results.map((r) => `${r.taskName}:${r.errorKind}`)).toEqual(["t1:TIMEOUT", "t2:TIMEOUT"]);
    expect(peak).toBe(1);
    expect(running).toBe(0);
  });
});

describe("VERIFY against a healthy environment", () => {
  it("reports OK on every host", async () => {
    const channel = new ScriptedChannel([
      [/^ping /, { stdout: "rtt min/avg/max/mdev = 10.1/12.5/14.9/2.4 ms\n" }],
      [/cat \/etc\/os-release/, { stdout: 'ID=ubuntu\nVERSION_ID="22.04"\nVERSION_CODENAME=jammy\n' }],
      [/dpkg --print-architecture/, { stdout: "amd64\n" }],
      [/az account show/, { stdout: "sub-123\n" }],
      [/kubectl get nodes/, { stdout: "cp-1   Ready   control-plane   5d   v1.30.2\nw-1   Ready   <none>   5d   v1.30.2\n" }],
    ]);
    const backend = new RecordingBackend("local", channel);
    const engine = new Engine({
      registry: createDefaultRegistry(),
      backends: () => ({ local: backend, remote: backend }),
      log: quiet,
    });

    const report = await engine.run("VERIFY", inventory);

    expect(report.goal).toBe("VERIFY");
    expect(report.status).toBe("OK");
    expect(report.results).toHaveLength(4 + 3 + 2 * 2);
    expect(report.forHost("controller").map((r) => r.message)).toEqual([
      "Connectivity to 1.1.1.1 verified (latency 12.5ms)",
      "OS verified: ubuntu 22.04 (jammy) on amd64",
      "Azure CLI already installed",
      "Azure session active (sub-123)",
    ]);
    expect(report.forTask("check-cluster")[0].message).toBe("2/2 nodes Ready");
    expect(report.changedCount).toBe(0);
  });
});

describe("Engine.plan", () => {
  it("lists steps with their tasks and target hosts", () => {
    const engine = new Engine({ registry: createDefaultRegistry(), log: quiet });
    const preview = engine.plan("DESTROY", inventory, { targetFilter: "workers" });
    expect(preview).toEqual({
      goal: "DESTROY",
      steps: [
        { index: 0, group: "local_machine", tasks: ["ensure-azure-cli", "disconnect-arc"], hosts: [] },
        { index: 1, group: "workers", tasks: ["reset-node"], hosts: ["w-1", "w-2"] },
        { index: 2, group: "control_plane", tasks: ["reset-node"], hosts: [] },
      ],
    });
  });
});
