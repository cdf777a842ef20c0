import { defineTask, mustExec, nodeName, settle } from "../define.js";
import { quote } from "../../utils/shell.js";

/**
 * Make sure `/etc/hosts` has `127.0.0.1 localhost` and exactly one
 * `127.0.1.1 <name>` line. Other lines keep their order.
 */
export function ensureHostsEntries(hosts: string, name: string): string {
  const trimmed = hosts.replace(/\n+$/, "");
  const lines = trimmed === "" ? [] : trimmed.split("\n");
  const resolution = `127.0.1.1 ${name}`;

  const out: string[] = [];
  let hasLocalhost = false;
  let hasResolution = false;
  for (const line of lines) {
    if (/^127\.0\.0\.1\s+localhost\b/.test(line)) hasLocalhost = true;
    if (/^127\.0\.1\.1\s+/.test(line)) {
      if (!hasResolution) out.push(resolution);
      hasResolution = true;
      continue;
    }
    out.push(line);
  }
  if (!hasLocalhost) out.unshift("127.0.0.1 localhost");
  if (!hasResolution) out.push(resolution);

  return out.join("\n") + "\n";
}

export const setHostname = defineTask({
  name: "set-hostname",
  description: "Set the system hostname and its /etc/hosts entries",
  groups: ["control_plane", "workers"],
  async run(ctx) {
    const name = nodeName(ctx);
    const current = (await mustExec(ctx, "hostname", "Reading hostname")).trim();

    let renamed = false;
    if (current !== name) {
      await mustExec(ctx, `hostnamectl set-hostname ${quote(name)}`, "Setting hostname", { sudo: true });
      renamed = true;
    }

    const hosts = await mustExec(ctx, "cat /etc/hosts", "Reading /etc/hosts");
    const hostsChanged = await ctx.writeFile("/etc/hosts", ensureHostsEntries(hosts, name), {
      mode: "644",
      sudo: true,
    });

    const what = renamed ? `Hostname changed: ${current} -> ${name}` : `Hostname is ${name}`;
    return settle(renamed || hostsChanged, `${what}; /etc/hosts ${hostsChanged ? "updated" : "verified"}`);
  },
});
