import { defineTask, outcome } from "../define.js";

const PROBE = "1.1.1.1";

/** Average round trip from the `rtt min/avg/max/mdev = a/b/c/d ms` summary line. */
export function parseAverageLatency(output: string): string | undefined {
  return /=\s*[\d.]+\/([\d.]+)\//.exec(output)?.[1];
}

export const checkNetwork = defineTask({
  name: "check-network",
  description: `Verify outbound connectivity (ping ${PROBE})`,
  groups: ["local_machine", "control_plane", "workers"],
  async run(ctx) {
    const res = await ctx.exec(`ping -c 2 -W 3 ${PROBE}`);
    if (res.exitCode !== 0) return outcome.failed(`Unreachable: ${PROBE}. Check network/DNS`);

    const avg = parseAverageLatency(res.stdout);
    return outcome.ok(`Connectivity to ${PROBE} verified${avg ? ` (latency ${avg}ms)` : ""}`);
  },
});
