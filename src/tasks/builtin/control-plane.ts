import { TaskExecutionError } from "../../errors.js";
import { quote } from "../../utils/shell.js";
import { defineTask, mustExec, nodeName, outcome, requireSettings, settle, succeeds } from "../define.js";
import type { TaskContext } from "../types.js";

export const ADMIN_CONF = "/etc/kubernetes/admin.conf";
export const JOIN_COMMAND_KEY = "cluster:join-command";

const asAdmin = { sudo: true, env: { KUBECONFIG: ADMIN_CONF } };

export function kubeadmConfig(name: string, podSubnet: string): string {
  return [
    "apiVersion: kubeadm.k8s.io/v1beta4",
    "kind: InitConfiguration",
    "nodeRegistration:",
    `  name: "${name}"`,
    "---",
    "apiVersion: kubeadm.k8s.io/v1beta4",
    "kind: ClusterConfiguration",
    "networking:",
    `  podSubnet: "${podSubnet}"`,
    "",
  ].join("\n");
}

function isString(value: unknown): value is string {
  return typeof value === "string";
}

async function homeDir(ctx: TaskContext): Promise<string> {
  return (await mustExec(ctx, `printf '%s' "$HOME"`, "Resolving home directory")).trim();
}

export const initControlPlane = defineTask({
  name: "init-control-plane",
  description: "kubeadm init, CNI, kubeconfig for the user and the control machine",
  groups: ["control_plane"],
  async run(ctx) {
    const { k8s } = requireSettings(ctx, "init-control-plane");
    const name = nodeName(ctx);
    const changes: string[] = [];

    if (!(await succeeds(ctx, `test -f ${ADMIN_CONF}`, { sudo: true }))) {
      const config = await ctx.stageFile(kubeadmConfig(name, k8s.podNetworkCidr));
      await mustExec(ctx, `kubeadm init --config ${quote(config)} --upload-certs`, "kubeadm init", { sudo: true });
      changes.push("cluster initialized");
    }

    const adminConf = await mustExec(ctx, `cat ${ADMIN_CONF}`, "Reading admin kubeconfig", { sudo: true });
    const home = await homeDir(ctx);
    await mustExec(ctx, `mkdir -p ${quote(`${home}/.kube`)}`, "Creating ~/.kube");
    if (await ctx.writeFile(`${home}/.kube/config`, adminConf, { mode: "600" })) changes.push("user kubeconfig");

    const applied = await mustExec(ctx, `kubectl apply -f ${quote(k8s.cniManifestUrl)}`, "Applying CNI", asAdmin);
    if (/\b(created|configured)\b/.test(applied)) changes.push("CNI applied");

    await mustExec(
      ctx,
      `kubectl taint nodes ${quote(name)} node-role.kubernetes.io/control-plane:NoSchedule- || true`,
      "Untainting control plane",
      asAdmin,
    );

    const join = await mustExec(ctx, "kubeadm token create --print-join-command", "Creating join token", {
      sudo: true,
    });
    ctx.shared.set(JOIN_COMMAND_KEY, join.trim());

    ctx.step(`Exporting admin kubeconfig to ${k8s.localKubeconfigPath}`);
    await ctx.exportFile(adminConf, k8s.localKubeconfigPath);

    return settle(
      changes.length > 0,
      changes.length > 0 ? `Control plane ${name}: ${changes.join(", ")}` : `Control plane ${name} already initialized`,
    );
  },
});

export const joinCluster = defineTask({
  name: "join-cluster",
  description: "Join a worker to the cluster with the control plane's join command",
  groups: ["workers"],
  async run(ctx) {
    if (await succeeds(ctx, "test -f /etc/kubernetes/kubelet.conf", { sudo: true })) {
      return outcome.ok("Node already joined");
    }
    const join = ctx.shared.get(JOIN_COMMAND_KEY, isString);
    if (!join) return outcome.failed("No join command available; init-control-plane must succeed first");
    if (!join.startsWith("kubeadm join ")) throw new TaskExecutionError("Join command has an unexpected shape");

    await mustExec(ctx, `${join} --node-name ${quote(nodeName(ctx))}`, "kubeadm join", { sudo: true });
    return outcome.changed(`Joined as ${nodeName(ctx)}`);
  },
});

export const checkCluster = defineTask({
  name: "check-cluster",
  description: "Report node readiness from the control plane",
  groups: ["control_plane"],
  async run(ctx) {
    if (!(await succeeds(ctx, `test -f ${ADMIN_CONF}`, { sudo: true }))) {
      return outcome.warning("Control plane not initialized");
    }
    const out = await mustExec(ctx, "kubectl get nodes --no-headers", "Listing nodes", asAdmin);
    const rows = out
      .split("\n")
      .map((l) => l.trim().split(/\s+/))
      .filter((cols) => cols.length >= 2 && cols[0] !== "");
    const notReady = rows.filter((cols) => cols[1] !== "Ready").map((cols) => cols[0]);
    const summary = `${rows.length - notReady.length}/${rows.length} nodes Ready`;
    return notReady.length > 0 ? outcome.warning(`${summary}; not ready: ${notReady.join(", ")}`) : outcome.ok(summary);
  },
});
