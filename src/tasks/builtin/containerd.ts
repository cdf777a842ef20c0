import { defineTask, commandExists, mustExec, settle, succeeds } from "../define.js";
import { addAptRepository, aptInstall } from "./apt.js";
import { requireFacts } from "./facts.js";

const CONFIG_PATH = "/etc/containerd/config.toml";

/** Turn on the systemd cgroup driver and make sure the CRI plugin is not disabled. */
export function patchContainerdConfig(text: string): string {
  return text
    .replace(/(\bSystemdCgroup\s*=\s*)false/g, "$1true")
    .replace(/^(\s*disabled_plugins\s*=\s*\[)([^\]]*)\]/m, (_match, head: string, items: string) => {
      const kept = items
        .split(",")
        .map((s) => s.trim())
        .filter((s) => s !== "" && s !== `"cri"`);
      return `${head}${kept.join(", ")}]`;
    });
}

export const installContainerd = defineTask({
  name: "install-containerd",
  description: "Install containerd and enable the systemd cgroup driver",
  groups: ["control_plane", "workers"],
  async run(ctx) {
    let installed = false;
    if (!(await commandExists(ctx, "containerd"))) {
      const facts = requireFacts(ctx);
      await aptInstall(ctx, ["ca-certificates", "curl", "gnupg"]);
      const keyPath = "/etc/apt/keyrings/docker.gpg";
      await addAptRepository(ctx, {
        name: "docker",
        line: `deb [arch=${facts.arch} signed-by=${keyPath}] https://download.docker.com/linux/${facts.id} ${facts.codename} stable`,
        keyUrl: `https://download.docker.com/linux/${facts.id}/gpg`,
        keyPath,
      });
      await aptInstall(ctx, ["containerd.io"]);
      installed = true;
    }

    const hasConfig = await succeeds(ctx, `test -f ${CONFIG_PATH}`, { sudo: true });
    const current = hasConfig
      ? await mustExec(ctx, `cat ${CONFIG_PATH}`, "Reading containerd config", { sudo: true })
      : await mustExec(ctx, "containerd config default", "Generating containerd config");
    await mustExec(ctx, "mkdir -p /etc/containerd", "Creating /etc/containerd", { sudo: true });
    const configChanged = await ctx.writeFile(CONFIG_PATH, patchContainerdConfig(current), { mode: "644", sudo: true });

    if (installed || configChanged) {
      await mustExec(ctx, "systemctl restart containerd && systemctl enable containerd", "Restarting containerd", {
        sudo: true,
      });
    } else if (!(await succeeds(ctx, "systemctl is-active --quiet containerd"))) {
      await mustExec(ctx, "systemctl enable --now containerd", "Starting containerd", { sudo: true });
      return settle(true, "containerd started");
    }

    if (installed) return settle(true, "containerd installed and configured (SystemdCgroup=true)");
    return settle(configChanged, configChanged ? "containerd config patched (SystemdCgroup=true)" : "containerd already configured");
  },
});
