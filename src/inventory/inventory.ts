import { readFile } from "node:fs/promises";
import { ConfigError, errorMessage } from "../errors.js";
import { parseHostGroup, type HostGroup } from "../registry/goals.js";
import { InventoryFileSchema, parseOrThrow, type InventoryFile } from "../schemas.js";
import type { Host, Inventory, TargetSelector } from "./types.js";

/** Immutable, in-memory inventory. `filter` returns a narrowed view. */
export class StaticInventory implements Inventory {
  private hosts: readonly Host[];
  private byId: Map<string, Host>;

  constructor(hosts: readonly Host[]) {
    this.byId = new Map();
    for (const host of hosts) {
      if (this.byId.has(host.id)) {
        throw new ConfigError("INVALID_INVENTORY", `Duplicate host id "${host.id}"`);
      }
      this.byId.set(host.id, Object.freeze({ ...host, groups: Object.freeze([...host.groups]) }));
    }
    this.hosts = Object.freeze([...this.byId.values()]);
  }

  all(): readonly Host[] {
    return this.hosts;
  }

  get(id: string): Host | undefined {
    return this.byId.get(id);
  }

  inGroup(group: HostGroup): readonly Host[] {
    return this.hosts.filter((h) => h.groups.includes(group));
  }

  /** Narrow to a host id, else a group name or alias. Unknown selectors match nothing. */
  filter(selector: TargetSelector): StaticInventory {
    const host = this.byId.get(selector);
    if (host) return new StaticInventory([host]);
    const group = parseHostGroup(selector);
    if (group) return new StaticInventory(this.inGroup(group));
    return new StaticInventory([]);
  }
}

/** Build an inventory from the parsed file shape (already validated). */
export function inventoryFromFile(file: InventoryFile): StaticInventory {
  const hosts: Host[] = Object.entries(file.hosts).map(([id, entry]) => ({
    id,
    address: entry.address,
    port: entry.port,
    username: entry.username,
    credentialRef: entry.credentialRef,
    groups: entry.groups,
    connection: entry.connection ?? (entry.groups.includes("local_machine") ? "local" : "ssh"),
    vars: entry.vars,
  }));
  return new StaticInventory(hosts);
}

export function parseInventory(raw: unknown): StaticInventory {
  return inventoryFromFile(parseOrThrow(InventoryFileSchema, raw, "INVALID_INVENTORY"));
}

export async function loadInventory(path: string): Promise<StaticInventory> {
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError("INVALID_INVENTORY", `Cannot read inventory ${path}: ${errorMessage(err)}`, { cause: err });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("INVALID_INVENTORY", `Inventory ${path} is not valid JSON`, { cause: err });
  }
  return parseInventory(raw);
}
