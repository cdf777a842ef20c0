import { ValidationError } from "../errors.js";

/** Single-quote a value for POSIX sh. */
export function quote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/** `export A='x' B='y'; <command>` so env survives both local sh and SSH exec. */
export function withEnv(command: string, env?: Record<string, string>): string {
  const entries = Object.entries(env ?? {});
  if (entries.length === 0) return command;
  for (const [key] of entries) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(key)) throw new ValidationError(`Invalid environment variable name "${key}"`);
  }
  return `export ${entries.map(([k, v]) => `${k}=${quote(v)}`).join(" ")}; ${command}`;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max) + "...(truncated)" : text;
}

/** Last `max` characters, for showing the tail of a failing command. */
export function tail(text: string, max = 200): string {
  const trimmed = text.trim();
  return trimmed.length > max ? "…" + trimmed.slice(-max) : trimmed;
}
