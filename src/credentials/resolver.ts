/**
 * Resolves a host's credential reference into SSH auth material.
 * Secrets live only in memory for the duration of the connect call; nothing
 * here is ever copied into a report or a log record.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { ValidationError, errorMessage } from "../errors.js";

export type SshAuth = {
  privateKey?: Buffer;
  passphrase?: string;
  password?: string;
  /** Path of an ssh-agent socket. */
  agent?: string;
};

export interface CredentialResolver {
  /** `undefined` means "use the agent". */
  resolve(ref: string | undefined): Promise<SshAuth>;
}

type Env = Record<string, string | undefined>;

function expandHome(path: string): string {
  return path === "~" || path.startsWith("~/") ? join(homedir(), path.slice(1)) : path;
}

function fromEnv(env: Env, name: string, ref: string): string {
  const val = env[name];
  if (!val || val.trim() === "") {
    throw new ValidationError(`Credential ${ref} refers to an unset environment variable`);
  }
  return val;
}

/**
 * Supported refs:
 * - `agent` (or none): ssh-agent via SSH_AUTH_SOCK
 * - `file:<path>`: private key file; passphrase from SSH_KEY_PASSPHRASE if set
 * - `env:<VAR>`: private key contents in an environment variable
 * - `password-env:<VAR>`: password in an environment variable
 */
export function createDefaultCredentialResolver(env: Env = process.env): CredentialResolver {
  return {
    async resolve(ref: string | undefined): Promise<SshAuth> {
      if (!ref || ref === "agent") {
        const agent = env.SSH_AUTH_SOCK;
        if (!agent) throw new ValidationError("No credential reference given and SSH_AUTH_SOCK is not set");
        return { agent };
      }

      const sep = ref.indexOf(":");
      const scheme = sep === -1 ? ref : ref.slice(0, sep);
      const value = sep === -1 ? "" : ref.slice(sep + 1);
      const passphrase = env.SSH_KEY_PASSPHRASE || undefined;

      switch (scheme) {
        case "file": {
          const path = expandHome(value);
          try {
            return { privateKey: await readFile(path), passphrase };
          } catch (err) {
            throw new ValidationError(`Cannot read key file ${path}: ${errorMessage(err)}`, { cause: err });
          }
        }
        case "env":
          return { privateKey: Buffer.from(fromEnv(env, value, ref)), passphrase };
        case "password-env":
          return { password: fromEnv(env, value, ref) };
        default:
          throw new ValidationError(`Unsupported credential reference scheme "${scheme}"`);
      }
    },
  };
}
