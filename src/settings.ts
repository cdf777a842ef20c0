import { readFile } from "node:fs/promises";
import { ConfigError, errorMessage } from "./errors.js";
import { AppSettingsSchema, parseOrThrow, type AppSettings } from "./schemas.js";

type Env = Record<string, string | undefined>;

/** Env var → settings path. Env wins over the file. */
const ENV_OVERRIDES: Array<[string, (raw: SettingsDraft, value: string) => void]> = [
  ["AZURE_SUBSCRIPTION_ID", (s, v) => (section(s, "azure").subscriptionId = v)],
  ["AZURE_TENANT_ID", (s, v) => (section(s, "azure").tenantId = v)],
  ["AZURE_LOCATION", (s, v) => (section(s, "azure").location = v)],
  ["AZURE_RESOURCE_GROUP", (s, v) => (section(s, "azure").resourceGroup = v)],
  ["K8S_VERSION", (s, v) => (section(s, "k8s").version = v)],
  ["ENV", (s, v) => (s.environment = v)],
];

type SettingsDraft = Record<string, unknown>;

function isRecord(val: unknown): val is Record<string, unknown> {
  return typeof val === "object" && val !== null && !Array.isArray(val);
}

function section(draft: SettingsDraft, key: string): Record<string, unknown> {
  const existing = draft[key];
  if (isRecord(existing)) return existing;
  const created: Record<string, unknown> = {};
  draft[key] = created;
  return created;
}

/** Merge env overrides into a raw settings object and validate it. */
export function resolveSettings(fileContents: unknown, env: Env = process.env): AppSettings {
  const draft: SettingsDraft = isRecord(fileContents) ? structuredClone(fileContents) : {};
  for (const [name, apply] of ENV_OVERRIDES) {
    const value = env[name]?.trim();
    if (value) apply(draft, value);
  }
  return parseOrThrow(AppSettingsSchema, draft, "INVALID_SETTINGS");
}

/** Read a JSON settings file (optional) and overlay the environment. */
export async function loadSettings(path?: string, env: Env = process.env): Promise<AppSettings> {
  if (!path) return resolveSettings({}, env);
  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError("INVALID_SETTINGS", `Cannot read settings ${path}: ${errorMessage(err)}`, { cause: err });
  }
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError("INVALID_SETTINGS", `Settings ${path} is not valid JSON`, { cause: err });
  }
  return resolveSettings(raw, env);
}
