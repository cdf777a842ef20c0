import { mkdir, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { ConnectionError, InvariantError, errorMessage } from "../errors.js";
import type { Host } from "../inventory/types.js";
import { KeyedLanes } from "../utils/lanes.js";
import { log } from "../utils/logger.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import { quote, tail } from "../utils/shell.js";
import type { CommandChannel } from "./types.js";

export interface RemoteSession extends CommandChannel {
  close(): Promise<void>;
}

export type SessionConnector = (host: Host) => Promise<RemoteSession>;

export type SessionLease = {
  session: RemoteSession;
  /** Queue a file to be pulled back and deleted remotely when the session closes. */
  collect(remotePath: string, localPath: string): void;
};

export type SessionPoolOptions = {
  connect: SessionConnector;
  retry?: Omit<RetryOptions, "shouldRetry" | "onRetry">;
  /** Max wait for busy lanes when closing; after that sessions are closed anyway. */
  drainMs?: number;
};

export type PoolCloseSummary = {
  closed: string[];
  collected: Array<{ hostId: string; localPath: string }>;
  errors: Array<{ hostId: string; message: string }>;
};

type Slot = {
  host: Host;
  session?: RemoteSession;
  failure?: ConnectionError;
  artifacts: Array<{ remotePath: string; localPath: string }>;
};

/**
 * One SSH session per host for the lifetime of a run. Sessions open lazily on
 * first use, are reused by later tasks on the same host, and are closed by
 * `closeAll` on every exit path of the run.
 */
export class SessionPool {
  private connect: SessionConnector;
  private retry: SessionPoolOptions["retry"];
  private drainMs: number;
  private slots = new Map<string, Slot>();
  /** Work on one host never overlaps. */
  private lanes = new KeyedLanes();
  private closed = false;

  constructor(opts: SessionPoolOptions) {
    this.connect = opts.connect;
    this.retry = opts.retry;
    this.drainMs = opts.drainMs ?? 30_000;
  }

  /** Scoped acquisition: `fn` runs with exclusive use of the host's session. */
  withSession<T>(host: Host, fn: (lease: SessionLease) => Promise<T>): Promise<T> {
    if (this.closed) {
      return Promise.reject(new InvariantError(`Session pool is closed; cannot run on ${host.id}`));
    }
    const slot = this.slotFor(host);
    return this.lanes.run(host.id, async () => {
      const session = await this.open(slot);
      return fn({
        session,
        collect: (remotePath, localPath) => {
          slot.artifacts.push({ remotePath, localPath });
        },
      });
    });
  }

  /** Host ids with an open session. */
  openHosts(): string[] {
    return [...this.slots.values()].filter((s) => s.session).map((s) => s.host.id);
  }

  async closeAll(): Promise<PoolCloseSummary> {
    this.closed = true;
    const summary: PoolCloseSummary = { closed: [], collected: [], errors: [] };
    const slots = [...this.slots.values()];

    if (await this.lanes.drain(this.drainMs)) {
      log.warn(`Closing sessions while tasks are still running (waited ${this.drainMs}ms)`);
    }

    await Promise.all(
      slots.map(async (slot) => {
        const session = slot.session;
        if (!session) return;
        try {
          for (const artifact of slot.artifacts.splice(0)) {
            try {
              await pullBack(session, artifact.remotePath, artifact.localPath);
              summary.collected.push({ hostId: slot.host.id, localPath: artifact.localPath });
            } catch (err) {
              summary.errors.push({ hostId: slot.host.id, message: errorMessage(err) });
            }
          }
        } finally {
          try {
            await session.close();
            summary.closed.push(slot.host.id);
          } catch (err) {
            summary.errors.push({ hostId: slot.host.id, message: `close failed: ${errorMessage(err)}` });
          }
          slot.session = undefined;
        }
      }),
    );

    for (const e of summary.errors) log.error(`[${e.hostId}] Session teardown problem`, { error: e.message });
    return summary;
  }

  private slotFor(host: Host): Slot {
    let slot = this.slots.get(host.id);
    if (!slot) {
      slot = { host, artifacts: [] };
      this.slots.set(host.id, slot);
    }
    return slot;
  }

  private async open(slot: Slot): Promise<RemoteSession> {
    if (slot.failure) throw slot.failure;
    if (slot.session) return slot.session;

    const host = slot.host;
    try {
      slot.session = await withRetry(() => this.connect(host), {
        ...this.retry,
        onRetry: (err, attempt, delayMs) =>
          log.warn(`[${host.id}] Connection attempt ${attempt} failed, retrying in ${delayMs}ms`, {
            error: errorMessage(err),
          }),
      });
      log.debug(`[${host.id}] Session opened`, { address: host.address, port: host.port });
      return slot.session;
    } catch (err) {
      // Remembered for the rest of the run so later tasks on this host fail fast.
      slot.failure =
        err instanceof ConnectionError
          ? err
          : new ConnectionError(host.id, `Cannot connect to ${host.id} (${host.address}:${host.port}): ${errorMessage(err)}`, {
              cause: err,
            });
      throw slot.failure;
    }
  }
}

/** Copy a remote file to the control machine (0600), then delete the remote copy. */
async function pullBack(session: RemoteSession, remotePath: string, localPath: string): Promise<void> {
  try {
    const res = await session.exec(`base64 < ${quote(remotePath)}`);
    if (res.exitCode !== 0) {
      throw new Error(`Cannot read ${remotePath}: ${tail(res.stderr)}`);
    }
    await mkdir(dirname(localPath), { recursive: true });
    await writeFile(localPath, Buffer.from(res.stdout.replace(/\s+/g, ""), "base64"), { mode: 0o600 });
  } finally {
    const rm = await session.exec(`rm -f ${quote(remotePath)}`);
    if (rm.exitCode !== 0) log.warn(`Could not delete remote copy ${remotePath}`, { stderr: tail(rm.stderr) });
  }
}
