import { TaskExecutionError } from "../../errors.js";
import { defineTask, mustExec, outcome } from "../define.js";
import type { TaskContext } from "../types.js";

export type OsFacts = {
  id: string;
  versionId: string;
  codename: string;
  arch: string;
};

const SUPPORTED = ["ubuntu", "debian"];

export function isOsFacts(value: unknown): value is OsFacts {
  return (
    typeof value === "object" &&
    value !== null &&
    "id" in value &&
    typeof value.id === "string" &&
    "versionId" in value &&
    typeof value.versionId === "string" &&
    "codename" in value &&
    typeof value.codename === "string" &&
    "arch" in value &&
    typeof value.arch === "string"
  );
}

export const factsKey = (hostId: string): string => `facts:${hostId}`;

/** Facts recorded by gather-facts earlier in the run. */
export function requireFacts(ctx: TaskContext): OsFacts {
  const facts = ctx.shared.get(factsKey(ctx.host.id), isOsFacts);
  if (!facts) throw new TaskExecutionError(`No OS facts for ${ctx.host.id}; gather-facts must run first`);
  return facts;
}

export function parseOsRelease(text: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const line of text.split("\n")) {
    const eq = line.indexOf("=");
    if (eq <= 0) continue;
    out[line.slice(0, eq).trim()] = line.slice(eq + 1).trim().replace(/^"|"$/g, "");
  }
  return out;
}

export const gatherFacts = defineTask({
  name: "gather-facts",
  description: "Detect distribution, codename and architecture",
  groups: ["local_machine", "control_plane", "workers"],
  async run(ctx) {
    const release = parseOsRelease(await mustExec(ctx, "cat /etc/os-release", "Reading /etc/os-release"));
    const arch = (await mustExec(ctx, "dpkg --print-architecture", "Detecting architecture")).trim();

    const facts: OsFacts = {
      id: (release.ID ?? "unknown").toLowerCase(),
      versionId: release.VERSION_ID ?? "unknown",
      codename: release.VERSION_CODENAME ?? "unknown",
      arch,
    };
    if (!SUPPORTED.includes(facts.id)) {
      return outcome.failed(`Unsupported OS: ${facts.id}. Only ${SUPPORTED.join(", ")} are supported`);
    }

    ctx.shared.set(factsKey(ctx.host.id), facts);
    return outcome.ok(`OS verified: ${facts.id} ${facts.versionId} (${facts.codename}) on ${facts.arch}`, facts);
  },
});
