import { createHash } from "node:crypto";
import { describe, expect, it, vi } from "vitest";
import { TaskExecutionError } from "../../src/errors.js";
import { SharedStore, runInContext } from "../../src/tasks/context.js";
import type { Logger } from "../../src/utils/logger.js";
import { quote } from "../../src/utils/shell.js";
import { ScriptedChannel, makeContext, makeHost, makeTask } from "../helpers.js";

const host = makeHost("w-1", ["workers"]);

describe("ChannelTaskContext.exec", () => {
  it("passes plain commands through", async () => {
    const channel = new ScriptedChannel([[/^uname -r$/, { stdout: "6.8.0\n" }]]);
    const res = await makeContext(host, channel).exec("uname -r");
    expect(res).toEqual({ exitCode: 0, stdout: "6.8.0\n", stderr: "" });
    expect(channel.commands).toEqual(["uname -r"]);
  });

  it("wraps sudo commands in a non-interactive shell with their environment", async () => {
    const channel = new ScriptedChannel();
    await makeContext(host, channel).exec("id -u", { sudo: true, env: { MODE: "fast" } });
    expect(channel.commands).toEqual([`sudo -n sh -c 'export MODE='\\''fast'\\''; id -u'`]);
  });

  it("explains a missing NOPASSWD rule", async () => {
    const channel = new ScriptedChannel([[/^sudo /, { exitCode: 1, stderr: "sudo: a password is required\n" }]]);
    const run = makeContext(host, channel).exec("id -u", { sudo: true });
    await expect(run).rejects.toBeInstanceOf(TaskExecutionError);
    await expect(run).rejects.toThrow(
      "Sudo privileges missing: configure NOPASSWD for the SSH user in /etc/sudoers on 10.0.0.3",
    );
  });

  it("refuses to run once the task is aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const channel = new ScriptedChannel();
    await expect(makeContext(host, channel, { signal: controller.signal }).exec("ls")).rejects.toThrow(
      'Task on w-1 was aborted; refusing to run "ls"',
    );
    expect(channel.commands).toEqual([]);
  });
});

describe("ChannelTaskContext.writeFile", () => {
  it("leaves a file alone when its checksum matches", async () => {
    const digest = createHash("sha256").update("hello\n").digest("hex");
    const channel = new ScriptedChannel([[/^sha256sum /, { stdout: `${digest}  /etc/motd\n` }]]);

    const changed = await makeContext(host, channel).writeFile("/etc/motd", "hello\n");

    expect(changed).toBe(false);
    expect(channel.commands).toEqual(["sha256sum '/etc/motd' 2>/dev/null || true"]);
  });

  it("writes through base64 and applies the mode", async () => {
    const channel = new ScriptedChannel();

    const changed = await makeContext(host, channel).writeFile("/etc/x", "hi\n", { mode: "644" });

    expect(changed).toBe(true);
    expect(channel.commands[1]).toBe("printf '%s' 'aGkK' | base64 -d > '/etc/x' && chmod 644 '/etc/x'");
  });

  it("fails with the stderr tail when the write fails", async () => {
    const channel = new ScriptedChannel([[/^printf /, { exitCode: 1, stderr: "Read-only file system\n" }]]);
    await expect(makeContext(host, channel).writeFile("/etc/x", "hi\n")).rejects.toThrow(
      "Failed to write /etc/x on w-1: Read-only file system",
    );
  });
});

describe("runInContext", () => {
  const scope = (begin: () => void = () => {}) => ({
    runId: "run-abcdef",
    shared: new SharedStore(),
    signal: new AbortController().signal,
    begin,
  });

  it("removes staged files after the task, even when it throws", async () => {
    const channel = new ScriptedChannel();
    let staged = "";
    const task = makeTask("stage", ["workers"], async (ctx) => {
      staged = await ctx.stageFile("kind: Config\n");
      throw new Error("after staging");
    });

    const raw = await runInContext(task, { channel, host, scope: scope(), collect: async () => {} });

    expect(raw).toEqual({ ok: false, error: new Error("after staging") });
    expect(staged).toMatch(/^\/tmp\/conductor-run-abcd-[0-9a-f]{8}$/);
    expect(channel.commands.at(-1)).toBe(`rm -f ${quote(staged)}`);
  });

  it("issues no cleanup when nothing was staged", async () => {
    const channel = new ScriptedChannel();
    await runInContext(makeTask("noop", ["workers"]), { channel, host, scope: scope(), collect: async () => {} });
    expect(channel.commands).toEqual([]);
  });

  it("signals begin before the task body runs", async () => {
    const events: string[] = [];
    const task = makeTask("ordered", ["workers"], async () => {
      events.push("body");
      return { status: "OK", message: "" };
    });
    await runInContext(task, {
      channel: new ScriptedChannel(),
      host,
      scope: scope(() => events.push("begin")),
      collect: async () => {},
    });
    expect(events).toEqual(["begin", "body"]);
  });

  it("prefixes sub-step lines with the host and task name", async () => {
    const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const task = makeTask("init-control-plane", ["workers"], async (ctx) => {
      ctx.step("running kubeadm init");
      return { status: "OK", message: "" };
    });
    await runInContext(task, { channel: new ScriptedChannel(), host, scope: scope(), collect: async () => {}, log });
    expect(log.info).toHaveBeenCalledWith("[w-1] init-control-plane: running kubeadm init");
  });
});

describe("ChannelTaskContext.exportFile", () => {
  it("hands the staged file to the collector and leaves its removal to it", async () => {
    const channel = new ScriptedChannel();
    const handedOff: Array<[string, string]> = [];
    const ctx = makeContext(host, channel, {
      collect: async (remotePath, localPath) => {
        handedOff.push([remotePath, localPath]);
      },
    });

    await ctx.exportFile("kind: Config\n", "/home/op/.kube/config");
    await ctx.cleanup();

    expect(handedOff).toHaveLength(1);
    expect(handedOff[0][0]).toMatch(/^\/tmp\/conductor-run-test-[0-9a-f]{8}$/);
    expect(handedOff[0][1]).toBe("/home/op/.kube/config");
    expect(channel.commands.some((c) => c.startsWith("rm -f"))).toBe(false);
  });

  it("removes the staged copy when the hand-off fails", async () => {
    const channel = new ScriptedChannel();
    let staged = "";
    const ctx = makeContext(host, channel, {
      collect: async (remotePath) => {
        staged = remotePath;
        throw new Error("disk full");
      },
    });

    await expect(ctx.exportFile("kind: Config\n", "/home/op/.kube/config")).rejects.toThrow("disk full");
    await ctx.cleanup();

    expect(channel.commands.at(-1)).toBe(`rm -f ${quote(staged)}`);
  });

  it("removes the staged copy when writing it fails", async () => {
    const channel = new ScriptedChannel([[/^printf /, { exitCode: 1, stderr: "No space left on device\n" }]]);
    const ctx = makeContext(host, channel);

    await expect(ctx.exportFile("kind: Config\n", "/home/op/.kube/config")).rejects.toThrow(
      "No space left on device",
    );
    await ctx.cleanup();

    expect(channel.commands.at(-1)).toMatch(/^rm -f '\/tmp\/conductor-run-test-[0-9a-f]{8}'$/);
  });
});
