import { randomUUID } from "node:crypto";
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import type { Engine } from "../engine/engine.js";
import { errorMessage } from "../errors.js";
import type { Inventory } from "../inventory/types.js";
import type { RunStore } from "../persistence/store.js";
import type { RunReport } from "../report/run-report.js";
import type { RunReportSnapshot } from "../report/types.js";
import { type AppSettings, SubmitRunRequestSchema, type SubmitRunRequest } from "../schemas.js";
import { log } from "../utils/logger.js";
import type { RunSummary, ServerEvent } from "./types.js";

export type ReportServerOptions = {
  engine: Engine;
  inventory: Inventory;
  settings?: AppSettings;
  runStore?: RunStore;
  port?: number;
  host?: string;
};

function summarize(snapshot: RunReportSnapshot): RunSummary {
  return {
    runId: snapshot.runId,
    goal: snapshot.goal,
    status: snapshot.status,
    startedAt: snapshot.startedAt,
    finishedAt: snapshot.finishedAt,
    sealed: snapshot.sealed,
    results: snapshot.results.length,
    aborted: snapshot.abort !== undefined,
  };
}

/**
 * HTTP front for the engine: submit goal runs, read their reports, and follow
 * task results live over SSE. One run at a time, since runs share the inventory.
 */
export class ReportServer {
  private engine: Engine;
  private inventory: Inventory;
  private settings?: AppSettings;
  private runStore?: RunStore;
  private port: number;
  private host: string;
  private maxRuns: number;
  private server: Server | null = null;
  private runs = new Map<string, RunReport>();
  private active: { runId: string; controller: AbortController; done: Promise<void> } | null = null;
  private sseClients = new Set<ServerResponse>();

  constructor(opts: ReportServerOptions) {
    this.engine = opts.engine;
    this.inventory = opts.inventory;
    this.settings = opts.settings;
    this.runStore = opts.runStore;
    this.port = opts.port ?? opts.engine.config.server.port;
    this.host = opts.host ?? opts.engine.config.server.host;
    this.maxRuns = opts.engine.config.limits.maxRuns;
  }

  start(): Promise<{ port: number; host: string }> {
    const server = createServer((req, res) => {
      this.handleRequest(req, res).catch((err) => {
        log.error("Request handler error", { error: errorMessage(err) });
        if (!res.headersSent) json(res, 500, { error: "Internal server error" });
      });
    });
    this.server = server;

    return new Promise((resolve, reject) => {
      server.once("error", reject);
      server.listen(this.port, this.host, () => {
        const addr = server.address();
        if (addr && typeof addr === "object") {
          this.port = addr.port;
          this.host = addr.address;
        }
        log.info(`Report server listening at http://${this.host}:${this.port}`);
        resolve({ port: this.port, host: this.host });
      });
    });
  }

  /** Cancel the active run, wait for it to seal, then close every connection. */
  async stop(): Promise<void> {
    if (this.active) {
      this.active.controller.abort();
      await this.active.done;
    }
    for (const client of this.sseClients) client.end();
    this.sseClients.clear();

    const server = this.server;
    this.server = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const pathname = url.pathname;
    const method = req.method ?? "GET";

    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, DELETE, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (method === "GET" && pathname === "/api/health") {
      json(res, 200, { ok: true, goals: this.engine.registry.goals(), activeRun: this.active?.runId ?? null });
      return;
    }

    if (method === "GET" && pathname === "/api/events") {
      return this.handleSSE(req, res);
    }

    if (method === "GET" && pathname === "/api/runs") {
      return this.handleListRuns(res);
    }

    if (method === "POST" && pathname === "/api/runs") {
      return this.handleSubmitRun(req, res);
    }

    const runMatch = pathname.match(/^\/api\/runs\/([^/]+)$/);
    if (runMatch && method === "GET") {
      return this.handleGetRun(res, runMatch[1]);
    }
    if (runMatch && method === "DELETE") {
      return this.handleDeleteRun(res, runMatch[1]);
    }

    json(res, 404, { error: "Not found" });
  }

  private handleSSE(req: IncomingMessage, res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(":\n\n");

    this.sseClients.add(res);
    req.on("close", () => {
      this.sseClients.delete(res);
    });
  }

  private handleListRuns(res: ServerResponse): void {
    const byId = new Map<string, RunSummary>();
    for (const snapshot of this.runStore?.list(this.maxRuns) ?? []) byId.set(snapshot.runId, summarize(snapshot));
    for (const report of this.runs.values()) byId.set(report.runId, summarize(report.toJSON()));
    json(
      res,
      200,
      [...byId.values()].sort((a, b) => b.startedAt - a.startedAt),
    );
  }

  private handleGetRun(res: ServerResponse, runId: string): void {
    const run = this.runs.get(runId)?.toJSON() ?? this.runStore?.get(runId);
    if (!run) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    json(res, 200, run);
  }

  private handleDeleteRun(res: ServerResponse, runId: string): void {
    if (this.active?.runId === runId) {
      json(res, 409, { error: "Run is still in progress" });
      return;
    }
    const inMemory = this.runs.delete(runId);
    const fromStore = this.runStore?.delete(runId) ?? false;
    if (!inMemory && !fromStore) {
      json(res, 404, { error: "Run not found" });
      return;
    }
    this.broadcastSSE({ type: "run:deleted", runId });
    json(res, 200, { deleted: true, runId });
  }

  private async handleSubmitRun(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const body = await readBody(req);
    let raw: unknown;
    try {
      raw = JSON.parse(body);
    } catch {
      json(res, 400, { error: "Invalid JSON body" });
      return;
    }

    const result = SubmitRunRequestSchema.safeParse(raw);
    if (!result.success) {
      json(res, 400, { error: result.error.issues.map((i) => i.message).join("; ") });
      return;
    }
    const request = result.data;

    if (!this.engine.registry.has(request.goal)) {
      json(res, 400, { error: `Goal ${request.goal} is not registered` });
      return;
    }
    if (this.active) {
      json(res, 409, { error: `Run ${this.active.runId} is still in progress` });
      return;
    }

    const runId = randomUUID();
    const controller = new AbortController();
    const done = this.executeRun(runId, request, controller.signal).finally(() => {
      this.active = null;
    });
    this.active = { runId, controller, done };
    json(res, 201, { runId, goal: request.goal });
  }

  private remember(report: RunReport): void {
    if (this.runs.size >= this.maxRuns) {
      const oldest = this.runs.keys().next();
      if (!oldest.done) this.runs.delete(oldest.value);
    }
    this.runs.set(report.runId, report);
  }

  private persistRun(report: RunReport): void {
    try {
      this.runStore?.insert(report.toJSON());
    } catch (err) {
      log.error("Failed to persist run", { runId: report.runId, error: errorMessage(err) });
    }
  }

  private async executeRun(runId: string, request: SubmitRunRequest, signal: AbortSignal): Promise<void> {
    try {
      await this.engine.run(
        request.goal,
        this.inventory,
        {
          runId,
          signal,
          settings: this.settings,
          continueOnError: request.continueOnError,
          targetFilter: request.target,
          expectNoChanges: request.expectNoChanges,
        },
        {
          onRunStart: (report) => {
            this.remember(report);
            this.broadcastSSE({ type: "run:started", runId, goal: report.goal });
          },
          onStepStart: (step, hosts) =>
            this.broadcastSSE({ type: "step:started", runId, stepIndex: step.index, group: step.group, hosts }),
          onTaskStart: (step, task, hosts) =>
            this.broadcastSSE({ type: "task:started", runId, stepIndex: step.index, taskName: task.name, hosts }),
          onTaskEnd: (result) => this.broadcastSSE({ type: "task:ended", runId, result }),
          onStepEnd: (step) => this.broadcastSSE({ type: "step:ended", runId, stepIndex: step.index }),
          onAbort: (abort) => this.broadcastSSE({ type: "run:aborted", runId, abort }),
          onFinish: (report) => {
            this.persistRun(report);
            this.broadcastSSE({ type: "run:complete", runId, status: report.status, durationMs: report.durationMs ?? 0 });
          },
        },
      );
    } catch (err) {
      log.error("Run execution error", { runId, error: errorMessage(err) });
      this.broadcastSSE({ type: "run:error", runId, error: errorMessage(err) });
    }
  }

  private broadcastSSE(event: ServerEvent): void {
    const data = `data: ${JSON.stringify(event)}\n\n`;
    for (const client of this.sseClients) {
      client.write(data);
    }
  }
}

function json(res: ServerResponse, status: number, body: unknown): void {
  res.writeHead(status, { "Content-Type": "application/json" });
  res.end(JSON.stringify(body));
}

function readBody(req: IncomingMessage): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => resolve(Buffer.concat(chunks).toString("utf-8")));
    req.on("error", reject);
  });
}
