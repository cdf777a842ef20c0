import { describe, expect, it } from "vitest";
import { gatherFacts, factsKey, isOsFacts, parseOsRelease } from "../../../src/tasks/builtin/facts.js";
import { ensureHostsEntries, setHostname } from "../../../src/tasks/builtin/hostname.js";
import { parseAverageLatency, checkNetwork } from "../../../src/tasks/builtin/network.js";
import { patchContainerdConfig } from "../../../src/tasks/builtin/containerd.js";
import { prepareNode, resetNode } from "../../../src/tasks/builtin/node.js";
import { SharedStore } from "../../../src/tasks/context.js";
import { quote } from "../../../src/utils/shell.js";
import { ScriptedChannel, makeContext, makeHost } from "../../helpers.js";

const host = makeHost("w-1", ["workers"]);

describe("parseOsRelease", () => {
  it("reads key/value pairs and strips quotes", () => {
    expect(parseOsRelease('NAME="Debian GNU/Linux"\nID=debian\n# comment\nVERSION_ID="12"\n')).toEqual({
      NAME: "Debian GNU/Linux",
      ID: "debian",
      VERSION_ID: "12",
    });
  });
});

describe("gather-facts", () => {
  it("records facts for later tasks", async () => {
    const shared = new SharedStore();
    const channel = new ScriptedChannel([
      [/os-release/, { stdout: "ID=debian\nVERSION_ID=\"12\"\nVERSION_CODENAME=bookworm\n" }],
      [/dpkg/, { stdout: "arm64\n" }],
    ]);

    const result = await gatherFacts.run(makeContext(host, channel, { shared }));

    expect(result.status).toBe("OK");
    expect(result.message).toBe("OS verified: debian 12 (bookworm) on arm64");
    expect(shared.get(factsKey("w-1"), isOsFacts)).toEqual({
      id: "debian",
      versionId: "12",
      codename: "bookworm",
      arch: "arm64",
    });
  });

  it("fails on an unsupported distribution", async () => {
    const channel = new ScriptedChannel([[/os-release/, { stdout: "ID=centos\nVERSION_ID=\"9\"\n" }]]);
    const result = await gatherFacts.run(makeContext(host, channel));
    expect(result).toEqual({ status: "FAILED", message: "Unsupported OS: centos. Only ubuntu, debian are supported" });
  });
});

describe("check-network", () => {
  it("parses the average round trip", () => {
    expect(parseAverageLatency("rtt min/avg/max/mdev = 10.1/12.5/14.9/2.4 ms")).toBe("12.5");
    expect(parseAverageLatency("round-trip min/avg/max = 1.0/2.0/3.0 ms")).toBe("2.0");
    expect(parseAverageLatency("no summary")).toBeUndefined();
  });

  it("fails when the target is unreachable", async () => {
    const channel = new ScriptedChannel([[/^ping /, { exitCode: 1 }]]);
    await expect(checkNetwork.run(makeContext(host, channel))).resolves.toEqual({
      status: "FAILED",
      message: "Unreachable: 1.1.1.1. Check network/DNS",
    });
  });

  it("omits the latency when ping prints no summary", async () => {
    const result = await checkNetwork.run(makeContext(host, new ScriptedChannel()));
    expect(result.message).toBe("Connectivity to 1.1.1.1 verified");
  });
});

describe("ensureHostsEntries", () => {
  it("replaces the first 127.0.1.1 line and drops later ones", () => {
    expect(ensureHostsEntries("127.0.0.1 localhost\n127.0.1.1 old\n::1 ip6-localhost\n127.0.1.1 dup\n", "node-a")).toBe(
      "127.0.0.1 localhost\n127.0.1.1 node-a\n::1 ip6-localhost\n",
    );
  });

  it("adds both entries to an empty file", () => {
    expect(ensureHostsEntries("", "node-a")).toBe("127.0.0.1 localhost\n127.0.1.1 node-a\n");
  });

  it("leaves a correct file unchanged", () => {
    const hosts = "127.0.0.1 localhost\n127.0.1.1 node-a\n";
    expect(ensureHostsEntries(hosts, "node-a")).toBe(hosts);
  });
});

describe("set-hostname", () => {
  it("renames the host and rewrites /etc/hosts", async () => {
    const channel = new ScriptedChannel([
      [/^hostname$/, { stdout: "ubuntu\n" }],
      [/^cat \/etc\/hosts$/, { stdout: "127.0.0.1 localhost\n" }],
    ]);

    const result = await setHostname.run(makeContext(host, channel));

    expect(result).toEqual({
      status: "CHANGED",
      message: "Hostname changed: ubuntu -> w-1; /etc/hosts updated",
      data: undefined,
    });
    expect(channel.commands).toContain(`sudo -n sh -c ${quote(`hostnamectl set-hostname ${quote("w-1")}`)}`);
  });

  it("uses the hostname var over the host id", async () => {
    const named = makeHost("w-1", ["workers"], { vars: { hostname: "k8s-worker-1" } });
    const channel = new ScriptedChannel([[/^hostname$/, { stdout: "k8s-worker-1\n" }]]);

    const result = await setHostname.run(makeContext(named, channel));

    expect(result.message).toBe("Hostname is k8s-worker-1; /etc/hosts updated");
    expect(channel.commands.some((c) => c.includes("hostnamectl"))).toBe(false);
  });
});

describe("patchContainerdConfig", () => {
  it("enables the systemd cgroup driver and re-enables CRI", () => {
    const input = [
      'disabled_plugins = ["cri", "zfs"]',
      '[plugins."io.containerd.grpc.v1.cri".containerd.runtimes.runc.options]',
      "  SystemdCgroup = false",
    ].join("\n");
    expect(patchContainerdConfig(input)).toBe(
      [
        'disabled_plugins = ["zfs"]',
        '[plugins."io.containerd.grpc.v1.cri".containerd.runtimes.runc.options]',
        "  SystemdCgroup = true",
      ].join("\n"),
    );
  });

  it("is a no-op on a patched config", () => {
    const text = "disabled_plugins = []\n  SystemdCgroup = true\n";
    expect(patchContainerdConfig(text)).toBe(text);
  });
});

describe("prepare-node", () => {
  it("disables active swap and comments it out of fstab", async () => {
    const channel = new ScriptedChannel([[/^swapon /, { stdout: "/swap.img file 2G 0B -2\n" }]]);

    const result = await prepareNode.run(makeContext(host, channel));

    expect(result.status).toBe("CHANGED");
    expect(result.message).toBe("Node prepared (modules, sysctl, swap, fstab)");
    expect(channel.commands).toContain(`sudo -n sh -c ${quote("swapoff -a")}`);
  });
});

describe("reset-node", () => {
  it("does nothing on a node outside any cluster", async () => {
    const channel = new ScriptedChannel([[/^test -f/, { exitCode: 1 }]]);
    await expect(resetNode.run(makeContext(host, channel))).resolves.toEqual({
      status: "OK",
      message: "Node is not part of a cluster",
      data: undefined,
    });
    expect(channel.commands).toHaveLength(1);
  });
});
