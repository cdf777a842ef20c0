import { commandExists, defineTask, mustExec, outcome, requireSettings } from "../define.js";
import { addAptRepository, aptInstall } from "./apt.js";
import { requireFacts } from "./facts.js";

const PACKAGES = ["kubelet", "kubeadm", "kubectl"];

export const installKubeTools = defineTask({
  name: "install-kube-tools",
  description: "Install and pin kubelet, kubeadm and kubectl",
  groups: ["control_plane", "workers"],
  async run(ctx) {
    const minor = `v${requireSettings(ctx, "install-kube-tools").k8s.version}`;

    if (await commandExists(ctx, "kubeadm")) {
      const res = await ctx.exec("kubeadm version -o short");
      const installed = res.stdout.trim();
      if (res.exitCode === 0 && installed.startsWith(`${minor}.`)) {
        return outcome.ok(`Kubernetes tools already at ${installed}`);
      }
    }

    const facts = requireFacts(ctx);
    const keyPath = "/etc/apt/keyrings/kubernetes-apt-keyring.gpg";
    const repoBase = `https://pkgs.k8s.io/core:/stable:/${minor}/deb/`;
    await aptInstall(ctx, ["apt-transport-https", "ca-certificates", "curl", "gpg"]);
    await addAptRepository(ctx, {
      name: "kubernetes",
      line: `deb [arch=${facts.arch} signed-by=${keyPath}] ${repoBase} /`,
      keyUrl: `${repoBase}Release.key`,
      keyPath,
    });
    await mustExec(ctx, `apt-mark unhold ${PACKAGES.join(" ")} || true`, "Unpinning packages", { sudo: true });
    await aptInstall(ctx, PACKAGES);
    await mustExec(ctx, `apt-mark hold ${PACKAGES.join(" ")}`, "Pinning packages", { sudo: true });
    await mustExec(ctx, "systemctl enable kubelet", "Enabling kubelet", { sudo: true });
    return outcome.changed(`Installed ${PACKAGES.join(", ")} from ${minor}`);
  },
});
