import { defineTask, mustExec, outcome, settle, succeeds } from "../define.js";

export const KERNEL_MODULES = ["overlay", "br_netfilter"];

export const SYSCTL_PARAMS: Record<string, string> = {
  "net.bridge.bridge-nf-call-iptables": "1",
  "net.bridge.bridge-nf-call-ip6tables": "1",
  "net.ipv4.ip_forward": "1",
};

const ACTIVE_SWAP_IN_FSTAB = String.raw`^[^#].*\sswap\s`;

export const prepareNode = defineTask({
  name: "prepare-node",
  description: "Kernel modules, sysctl and swap settings for Kubernetes",
  groups: ["control_plane", "workers"],
  async run(ctx) {
    const changes: string[] = [];

    if (await ctx.writeFile("/etc/modules-load.d/k8s.conf", KERNEL_MODULES.join("\n") + "\n", { mode: "644", sudo: true })) {
      changes.push("modules");
    }
    await mustExec(ctx, KERNEL_MODULES.map((m) => `modprobe ${m}`).join(" && "), "Loading kernel modules", {
      sudo: true,
    });

    const sysctl = Object.entries(SYSCTL_PARAMS)
      .map(([k, v]) => `${k} = ${v}`)
      .join("\n");
    if (await ctx.writeFile("/etc/sysctl.d/k8s.conf", sysctl + "\n", { mode: "644", sudo: true })) {
      await mustExec(ctx, "sysctl --system", "Reloading sysctl", { sudo: true });
      changes.push("sysctl");
    }

    const activeSwap = await mustExec(ctx, "swapon --show --noheadings", "Listing swap");
    if (activeSwap.trim() !== "") {
      await mustExec(ctx, "swapoff -a", "Disabling swap", { sudo: true });
      changes.push("swap");
    }
    if (await succeeds(ctx, `grep -Eq '${ACTIVE_SWAP_IN_FSTAB}' /etc/fstab`)) {
      await mustExec(ctx, String.raw`sed -i -E 's/^([^#].*\sswap\s.*)$/# \1/' /etc/fstab`, "Disabling swap in fstab", {
        sudo: true,
      });
      changes.push("fstab");
    }

    return settle(changes.length > 0, changes.length > 0 ? `Node prepared (${changes.join(", ")})` : "Node already prepared");
  },
});

export const resetNode = defineTask({
  name: "reset-node",
  description: "Tear the node out of the cluster with kubeadm reset",
  groups: ["control_plane", "workers"],
  async run(ctx) {
    const joined = await succeeds(ctx, "test -f /etc/kubernetes/kubelet.conf || test -f /etc/kubernetes/admin.conf");
    if (!joined) return outcome.ok("Node is not part of a cluster");

    await mustExec(ctx, "kubeadm reset -f", "kubeadm reset", { sudo: true });
    await mustExec(ctx, "rm -rf /etc/cni/net.d", "Removing CNI config", { sudo: true });
    await mustExec(ctx, `rm -rf "$HOME/.kube"`, "Removing user kubeconfig");
    return outcome.changed("Node reset");
  },
});
