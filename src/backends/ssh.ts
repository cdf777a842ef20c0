import { userInfo } from "node:os";
import ssh2 from "ssh2";
import type { Client as SshClient, ConnectConfig } from "ssh2";
import type { CredentialResolver, SshAuth } from "../credentials/resolver.js";
import { ConnectionError, errorMessage } from "../errors.js";
import type { Host } from "../inventory/types.js";
import type { CommandResult } from "../tasks/types.js";
import { log } from "../utils/logger.js";
import type { RemoteSession, SessionConnector } from "./session-pool.js";
import type { ChannelExecOptions } from "./types.js";

export type SshConnectorOptions = {
  credentials: CredentialResolver;
  readyTimeoutMs: number;
};

export class SshSession implements RemoteSession {
  private client: SshClient;
  private hostId: string;
  private ended = false;
  private lastError?: Error;

  constructor(client: SshClient, hostId: string) {
    this.client = client;
    this.hostId = hostId;
    client.on("error", (err: Error) => {
      this.lastError = err;
      log.warn(`[${hostId}] SSH error`, { error: err.message });
    });
    client.on("close", () => {
      this.ended = true;
    });
  }

  exec(command: string, opts: ChannelExecOptions = {}): Promise<CommandResult> {
    if (this.ended) {
      const reason = this.lastError ? `: ${this.lastError.message}` : "";
      return Promise.reject(new ConnectionError(this.hostId, `SSH session to ${this.hostId} is closed${reason}`));
    }
    return new Promise((resolve, reject) => {
      this.client.exec(command, (err, stream) => {
        if (err) {
          reject(new ConnectionError(this.hostId, `exec failed on ${this.hostId}: ${err.message}`, { cause: err }));
          return;
        }
        const stdout: Buffer[] = [];
        const stderr: Buffer[] = [];
        let exitCode = -1;
        // Closing the channel hangs up the remote command; the session stays usable.
        const hangUp = () => stream.close();
        opts.signal?.addEventListener("abort", hangUp, { once: true });
        stream.on("data", (chunk: Buffer) => stdout.push(chunk));
        stream.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));
        stream.on("exit", (...args: unknown[]) => {
          if (typeof args[0] === "number") exitCode = args[0];
        });
        stream.on("close", () => {
          opts.signal?.removeEventListener("abort", hangUp);
          resolve({
            exitCode,
            stdout: Buffer.concat(stdout).toString("utf-8"),
            stderr: Buffer.concat(stderr).toString("utf-8"),
          });
        });
      });
    });
  }

  close(): Promise<void> {
    if (this.ended) return Promise.resolve();
    return new Promise((resolve) => {
      this.client.once("close", () => resolve());
      this.client.end();
    });
  }
}

/** Opens an authenticated ssh2 session for a host. */
export function createSshConnector(opts: SshConnectorOptions): SessionConnector {
  return async (host: Host) => {
    let auth: SshAuth;
    try {
      auth = await opts.credentials.resolve(host.credentialRef);
    } catch (err) {
      throw new ConnectionError(host.id, `Credentials for ${host.id} unavailable: ${errorMessage(err)}`, {
        cause: err,
      });
    }

    const config: ConnectConfig = {
      host: host.address,
      port: host.port,
      username: host.username ?? userInfo().username,
      readyTimeout: opts.readyTimeoutMs,
      ...auth,
    };

    const client = new ssh2.Client();
    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error) => reject(err);
      client.once("error", onError);
      client.once("ready", () => {
        client.removeListener("error", onError);
        resolve();
      });
      client.connect(config);
    });
    return new SshSession(client, host.id);
  };
}
