export const GOALS = ["VERIFY", "INIT", "ARC_CONNECT", "DESTROY"] as const;
export type Goal = (typeof GOALS)[number];

export const HOST_GROUPS = ["local_machine", "control_plane", "workers"] as const;
export type HostGroup = (typeof HOST_GROUPS)[number];

const GROUP_ALIASES: Record<string, HostGroup> = {
  local: "local_machine",
  cp: "control_plane",
  "control-plane": "control_plane",
  worker: "workers",
};

export function isGoal(value: string): value is Goal {
  return GOALS.some((g) => g === value);
}

export function isHostGroup(value: string): value is HostGroup {
  return HOST_GROUPS.some((g) => g === value);
}

/** Accepts `init`, `arc-connect`, `ARC_CONNECT`. Returns undefined for anything else. */
export function parseGoal(input: string): Goal | undefined {
  const normalized = input.trim().toUpperCase().replace(/-/g, "_");
  return isGoal(normalized) ? normalized : undefined;
}

/** Accepts a group name or one of its CLI aliases (`local`, `cp`, `workers`). */
export function parseHostGroup(input: string): HostGroup | undefined {
  const normalized = input.trim().toLowerCase();
  if (isHostGroup(normalized)) return normalized;
  return GROUP_ALIASES[normalized];
}
