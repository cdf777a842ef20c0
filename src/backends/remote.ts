import { ConnectionError } from "../errors.js";
import type { Host } from "../inventory/types.js";
import { runInContext } from "../tasks/context.js";
import type { Task } from "../tasks/types.js";
import { log } from "../utils/logger.js";
import type { SessionPool } from "./session-pool.js";
import type { ExecutionBackend, InvocationScope, RawOutcome } from "./types.js";

/** Runs tasks on remote hosts over pooled sessions. */
export class RemoteBackend implements ExecutionBackend {
  readonly kind = "remote" as const;
  private pool: SessionPool;

  constructor(pool: SessionPool) {
    this.pool = pool;
  }

  async execute(task: Task, host: Host, scope: InvocationScope): Promise<RawOutcome> {
    log.debug(`[remote] Running "${task.name}" on ${host.id}`);
    try {
      return await this.pool.withSession(host, (lease) =>
        runInContext(task, {
          channel: lease.session,
          host,
          scope,
          collect: async (remotePath, localPath) => lease.collect(remotePath, localPath),
        }),
      );
    } catch (error) {
      if (error instanceof ConnectionError) return { ok: false, error };
      throw error;
    }
  }

  async close(): Promise<void> {
    const summary = await this.pool.closeAll();
    if (summary.closed.length > 0) log.debug("Closed remote sessions", { hosts: summary.closed });
  }
}
