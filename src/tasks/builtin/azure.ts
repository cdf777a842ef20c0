import { access } from "node:fs/promises";
import { resolve } from "node:path";
import type { AppSettings } from "../../schemas.js";
import { quote } from "../../utils/shell.js";
import { commandExists, defineTask, mustExec, outcome, requireSettings, settle, succeeds } from "../define.js";
import type { TaskContext } from "../types.js";
import { addAptRepository, aptInstall } from "./apt.js";
import { requireFacts } from "./facts.js";

export const ARC_PROVIDERS = [
  "Microsoft.Kubernetes",
  "Microsoft.KubernetesConfiguration",
  "Microsoft.ExtendedLocation",
];

export function arcClusterName(settings: AppSettings): string {
  return settings.azure.clusterName ?? `${settings.azure.resourceGroup}-${settings.environment}`;
}

async function activeSubscription(ctx: TaskContext): Promise<string | undefined> {
  const res = await ctx.exec("az account show --query id -o tsv");
  return res.exitCode === 0 ? res.stdout.trim() : undefined;
}

function arcArgs(settings: AppSettings): string {
  return `--name ${quote(arcClusterName(settings))} --resource-group ${quote(settings.azure.resourceGroup)}`;
}

async function exists(path: string): Promise<boolean> {
  try {
    await access(path);
    return true;
  } catch {
    return false;
  }
}

export const ensureAzureCli = defineTask({
  name: "ensure-azure-cli",
  description: "Install the Azure CLI if it is missing",
  groups: ["local_machine"],
  async run(ctx) {
    if (await commandExists(ctx, "az")) return outcome.ok("Azure CLI already installed");

    const facts = requireFacts(ctx);
    const keyPath = "/etc/apt/keyrings/microsoft.gpg";
    await addAptRepository(ctx, {
      name: "azure-cli",
      line: `deb [arch=${facts.arch} signed-by=${keyPath}] https://packages.microsoft.com/repos/azure-cli/ ${facts.codename} main`,
      keyUrl: "https://packages.microsoft.com/keys/microsoft.asc",
      keyPath,
    });
    await aptInstall(ctx, ["azure-cli"]);
    return outcome.changed("Azure CLI installed");
  },
});

export const checkAzureLogin = defineTask({
  name: "check-azure-login",
  description: "Report whether an Azure session is active on the configured subscription",
  groups: ["local_machine"],
  async run(ctx) {
    const current = await activeSubscription(ctx);
    if (!current) return outcome.warning("Not logged in to Azure; run 'az login'");
    const wanted = ctx.settings?.azure.subscriptionId;
    if (wanted && wanted !== current) {
      return outcome.warning(`Active subscription ${current} differs from configured ${wanted}`);
    }
    return outcome.ok(`Azure session active (${current})`);
  },
});

export const ensureAzureLogin = defineTask({
  name: "ensure-azure-login",
  description: "Select the subscription, add connectedk8s and register the Arc providers",
  groups: ["local_machine"],
  async run(ctx) {
    const { azure } = requireSettings(ctx, "ensure-azure-login");
    const current = await activeSubscription(ctx);
    if (!current) return outcome.failed("Not logged in to Azure; run 'az login' first");

    const changes: string[] = [];
    if (current !== azure.subscriptionId) {
      await mustExec(ctx, `az account set --subscription ${quote(azure.subscriptionId)}`, "Selecting subscription");
      changes.push("subscription");
    }

    if (!(await succeeds(ctx, "az extension show --name connectedk8s"))) {
      await mustExec(ctx, "az extension add --name connectedk8s --yes", "Adding connectedk8s extension");
      changes.push("connectedk8s");
    }

    for (const ns of ARC_PROVIDERS) {
      const state = await ctx.exec(`az provider show --namespace ${ns} --query registrationState -o tsv`);
      if (state.exitCode === 0 && state.stdout.trim() === "Registered") continue;
      await mustExec(ctx, `az provider register --namespace ${ns} --wait`, `Registering ${ns}`);
      changes.push(ns);
    }

    return settle(
      changes.length > 0,
      changes.length > 0 ? `Azure prepared (${changes.join(", ")})` : `Azure ready on ${azure.subscriptionId}`,
    );
  },
});

export const connectArc = defineTask({
  name: "connect-arc",
  description: "Onboard the cluster to Azure Arc",
  groups: ["local_machine"],
  async run(ctx) {
    const settings = requireSettings(ctx, "connect-arc");
    const name = arcClusterName(settings);
    if (await succeeds(ctx, `az connectedk8s show ${arcArgs(settings)}`)) {
      return outcome.ok(`Cluster ${name} already connected to Arc`);
    }

    const kubeconfig = resolve(settings.k8s.localKubeconfigPath);
    if (!(await exists(kubeconfig))) {
      return outcome.failed(`Kubeconfig ${kubeconfig} not found; run INIT first`);
    }
    await mustExec(
      ctx,
      `az connectedk8s connect ${arcArgs(settings)} --location ${quote(settings.azure.location)} --yes`,
      "Connecting to Arc",
      { env: { KUBECONFIG: kubeconfig } },
    );
    return outcome.changed(`Cluster ${name} connected to Arc in ${settings.azure.location}`);
  },
});

export const disconnectArc = defineTask({
  name: "disconnect-arc",
  description: "Remove the cluster's Azure Arc resource",
  groups: ["local_machine"],
  async run(ctx) {
    const settings = requireSettings(ctx, "disconnect-arc");
    const name = arcClusterName(settings);
    if (!(await succeeds(ctx, `az connectedk8s show ${arcArgs(settings)}`))) {
      return outcome.ok(`Cluster ${name} is not connected to Arc`);
    }

    const kubeconfig = resolve(settings.k8s.localKubeconfigPath);
    const env = (await exists(kubeconfig)) ? { KUBECONFIG: kubeconfig } : undefined;
    await mustExec(ctx, `az connectedk8s delete ${arcArgs(settings)} --yes`, "Disconnecting from Arc", { env });
    return outcome.changed(`Cluster ${name} disconnected from Arc`);
  },
});
