import Database from "better-sqlite3";
import { mkdirSync } from "node:fs";
import { dirname, join } from "node:path";
import { z } from "zod";
import type { ConductorConfig } from "../config.js";
import { InvariantError } from "../errors.js";
import { GOALS, HOST_GROUPS } from "../registry/goals.js";
import type { RunReportSnapshot } from "../report/types.js";
import { TASK_STATUSES } from "../tasks/types.js";

const TaskResultSchema = z.object({
  status: z.enum(TASK_STATUSES),
  message: z.string(),
  hostId: z.string(),
  taskName: z.string(),
  group: z.enum(HOST_GROUPS),
  stepIndex: z.number(),
  changed: z.boolean(),
  startedAt: z.number(),
  finishedAt: z.number(),
  durationMs: z.number(),
  errorKind: z.enum(["TASK_EXECUTION", "CONNECTION", "TIMEOUT", "IDEMPOTENCY_VIOLATION"]).optional(),
});

const AbortRecordSchema = z.object({
  reason: z.enum(["failure", "cancelled"]),
  stepIndex: z.number(),
  taskName: z.string(),
  message: z.string(),
});

const RunRowSchema = z.object({
  run_id: z.string(),
  goal: z.enum(GOALS),
  status: z.enum(["OK", "WARNING", "FAILED"]),
  results: z.string(),
  abort: z.string().nullable(),
  started_at: z.number(),
  finished_at: z.number(),
  duration_ms: z.number(),
});

type RunRow = z.infer<typeof RunRowSchema>;

export function defaultStorePath(config: ConductorConfig): string {
  return join(config.paths.dataDir, "runs.db");
}

/** Sealed run reports, newest first. */
export class RunStore {
  private db: Database.Database;

  /** Pass ":memory:" for a throwaway store. */
  constructor(dbPath: string) {
    if (dbPath !== ":memory:") mkdirSync(dirname(dbPath), { recursive: true });
    this.db = new Database(dbPath);
    this.db.pragma("journal_mode = WAL");
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS runs (
        run_id      TEXT PRIMARY KEY,
        goal        TEXT NOT NULL,
        status      TEXT NOT NULL,
        results     TEXT NOT NULL DEFAULT '[]',
        abort       TEXT,
        started_at  INTEGER NOT NULL,
        finished_at INTEGER NOT NULL,
        duration_ms INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_runs_started ON runs(started_at DESC);
    `);
  }

  insert(report: RunReportSnapshot): void {
    if (!report.sealed || report.finishedAt === undefined || report.durationMs === undefined) {
      throw new InvariantError(`Run ${report.runId} must be sealed before it is stored`);
    }
    this.db
      .prepare(
        `INSERT OR REPLACE INTO runs (run_id, goal, status, results, abort, started_at, finished_at, duration_ms)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
      )
      .run(
        report.runId,
        report.goal,
        report.status,
        JSON.stringify(report.results),
        report.abort ? JSON.stringify(report.abort) : null,
        report.startedAt,
        report.finishedAt,
        report.durationMs,
      );
  }

  get(runId: string): RunReportSnapshot | undefined {
    const row: unknown = this.db.prepare("SELECT * FROM runs WHERE run_id = ?").get(runId);
    return row === undefined ? undefined : rowToSnapshot(RunRowSchema.parse(row));
  }

  list(limit = 50): RunReportSnapshot[] {
    const rows: unknown[] = this.db.prepare("SELECT * FROM runs ORDER BY started_at DESC LIMIT ?").all(limit);
    return rows.map((row) => rowToSnapshot(RunRowSchema.parse(row)));
  }

  delete(runId: string): boolean {
    return this.db.prepare("DELETE FROM runs WHERE run_id = ?").run(runId).changes > 0;
  }

  deleteOlderThan(timestamp: number): number {
    return this.db.prepare("DELETE FROM runs WHERE started_at < ?").run(timestamp).changes;
  }

  close(): void {
    this.db.close();
  }
}

function rowToSnapshot(row: RunRow): RunReportSnapshot {
  return {
    runId: row.run_id,
    goal: row.goal,
    status: row.status,
    results: z.array(TaskResultSchema).parse(JSON.parse(row.results)),
    abort: row.abort ? AbortRecordSchema.parse(JSON.parse(row.abort)) : undefined,
    startedAt: row.started_at,
    finishedAt: row.finished_at,
    durationMs: row.duration_ms,
    sealed: true,
  };
}
