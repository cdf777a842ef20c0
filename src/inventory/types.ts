import type { HostGroup } from "../registry/goals.js";

export type ConnectionKind = "local" | "ssh";

export type Host = {
  id: string;
  address: string;
  port: number;
  username?: string;
  /** Opaque reference handed to the credential resolver; never the secret itself. */
  credentialRef?: string;
  groups: readonly HostGroup[];
  connection: ConnectionKind;
  vars: Readonly<Record<string, string>>;
};

/** Host id, group name, or group alias (`local`, `cp`, `workers`). */
export type TargetSelector = string;

export interface Inventory {
  all(): readonly Host[];
  get(id: string): Host | undefined;
  inGroup(group: HostGroup): readonly Host[];
  filter(selector: TargetSelector): Inventory;
}
