import { LocalBackend } from "../backends/local.js";
import { RemoteBackend } from "../backends/remote.js";
import { SessionPool } from "../backends/session-pool.js";
import { createSshConnector } from "../backends/ssh.js";
import { backendFor, type BackendSet } from "../backends/types.js";
import { defaults, type ConductorConfig } from "../config.js";
import { createDefaultCredentialResolver, type CredentialResolver } from "../credentials/resolver.js";
import { InvariantError, errorMessage } from "../errors.js";
import type { Inventory } from "../inventory/types.js";
import type { TaskRegistry } from "../registry/registry.js";
import { silentReporter, type Reporter } from "../report/reporter.js";
import { RunReport } from "../report/run-report.js";
import type { AbortRecord } from "../report/types.js";
import { SharedStore } from "../tasks/context.js";
import { wrapTask, type WrapperHarness } from "../tasks/wrapper.js";
import { log as defaultLog, type Logger } from "../utils/logger.js";
import { mapWithConcurrency } from "../utils/pool.js";
import type { PlanPreview, RunCallbacks, RunOptions } from "./types.js";

export type BackendFactory = (config: ConductorConfig, credentials: CredentialResolver) => BackendSet;

export type EngineOptions = {
  registry: TaskRegistry;
  config?: ConductorConfig;
  /** Called once per run; the set is closed when the run ends. */
  backends?: BackendFactory;
  credentials?: CredentialResolver;
  reporter?: Reporter;
  log?: Logger;
};

export const createDefaultBackends: BackendFactory = (config, credentials) => ({
  local: new LocalBackend({ drainMs: config.timeouts.sessionDrain }),
  remote: new RemoteBackend(
    new SessionPool({
      connect: createSshConnector({ credentials, readyTimeoutMs: config.timeouts.sshReady }),
      retry: {
        maxAttempts: config.retry.connectAttempts,
        baseDelayMs: config.retry.baseDelayMs,
        maxDelayMs: config.retry.maxDelayMs,
      },
      drainMs: config.timeouts.sessionDrain,
    }),
  ),
});

type Cancellation = {
  signal: AbortSignal;
  reason(): string;
  dispose(): void;
};

function linkCancellation(outer: AbortSignal | undefined, runTimeoutMs: number | undefined): Cancellation {
  const controller = new AbortController();
  let reason = "Run cancelled";
  let timer: ReturnType<typeof setTimeout> | undefined;

  const onOuterAbort = () => controller.abort();
  if (outer?.aborted) controller.abort();
  else outer?.addEventListener("abort", onOuterAbort, { once: true });

  if (runTimeoutMs && runTimeoutMs > 0) {
    timer = setTimeout(() => {
      reason = `Run exceeded its ${runTimeoutMs}ms time limit`;
      controller.abort();
    }, runTimeoutMs);
  }

  return {
    signal: controller.signal,
    reason: () => reason,
    dispose: () => {
      clearTimeout(timer);
      outer?.removeEventListener("abort", onOuterAbort);
    },
  };
}

/**
 * Walks a goal's plan step by step. Each Task fans out to every host of the
 * step's group and the next Task starts only once all of them have reported.
 */
export class Engine {
  readonly registry: TaskRegistry;
  readonly config: ConductorConfig;
  private createBackends: BackendFactory;
  private credentials: CredentialResolver;
  private reporter: Reporter;
  private log: Logger;

  constructor(opts: EngineOptions) {
    this.registry = opts.registry;
    this.config = opts.config ?? defaults;
    this.createBackends = opts.backends ?? createDefaultBackends;
    this.credentials = opts.credentials ?? createDefaultCredentialResolver();
    this.reporter = opts.reporter ?? silentReporter;
    this.log = opts.log ?? defaultLog;
  }

  /**
   * Configuration problems (unknown goal) throw before any Task runs. Task
   * failures never throw; they land in the returned report.
   */
  async run(goal: string, inventory: Inventory, opts: RunOptions = {}, callbacks: RunCallbacks = {}): Promise<RunReport> {
    const plan = this.registry.resolve(goal);
    if (plan.steps.length === 0) {
      throw new InvariantError(`Goal ${plan.goal} resolved to an empty plan`);
    }

    const targets = opts.targetFilter ? inventory.filter(opts.targetFilter) : inventory;
    const report = new RunReport(plan.goal, opts.runId);
    const concurrency = opts.maxConcurrency ?? this.config.limits.maxConcurrency;
    const harness: WrapperHarness = {
      timeoutMs: opts.perTaskTimeoutMs ?? this.config.timeouts.task,
      expectNoChanges: opts.expectNoChanges ?? false,
      reporter: this.reporter,
      outputTruncation: this.config.limits.outputTruncation,
      log: this.log,
    };
    const scope = { runId: report.runId, settings: opts.settings, shared: new SharedStore() };

    this.log.info(`Run ${report.runId} started`, {
      goal: plan.goal,
      steps: plan.steps.length,
      hosts: targets.all().length,
    });
    callbacks.onRunStart?.(report, plan);

    const cancellation = linkCancellation(opts.signal, opts.runTimeoutMs);
    const backends = this.createBackends(this.config, this.credentials);
    let abort: AbortRecord | undefined;

    try {
      steps: for (const step of plan.steps) {
        const hosts = targets.inGroup(step.group);
        const hostIds = hosts.map((h) => h.id);
        this.reporter.stepStarted?.(step, hostIds);
        callbacks.onStepStart?.(step, hostIds);

        if (hosts.length === 0) {
          this.log.info(`Step ${step.index}: no hosts in ${step.group}, skipping`);
          callbacks.onStepEnd?.(step);
          continue;
        }

        for (const task of step.tasks) {
          if (cancellation.signal.aborted) {
            abort = { reason: "cancelled", stepIndex: step.index, taskName: task.name, message: cancellation.reason() };
            break steps;
          }

          callbacks.onTaskStart?.(step, task, hostIds);
          const invoke = wrapTask(task, harness);
          const results = await mapWithConcurrency(hosts, concurrency, async (host) => {
            const result = await invoke(host, backendFor(backends, host), {
              stepIndex: step.index,
              group: step.group,
              scope,
            });
            report.append(result);
            callbacks.onTaskEnd?.(result);
            return result;
          });

          const failed = results.filter((r) => r.status === "FAILED").map((r) => r.hostId);
          if (failed.length > 0 && !opts.continueOnError) {
            abort = {
              reason: "failure",
              stepIndex: step.index,
              taskName: task.name,
              message: `${failed.length} host(s) failed: ${failed.join(", ")}`,
            };
            break steps;
          }
        }

        callbacks.onStepEnd?.(step);
      }
    } finally {
      cancellation.dispose();
      await this.closeBackends(backends);
    }

    if (abort) {
      this.log.warn(`Run ${report.runId} aborted at step ${abort.stepIndex} (${abort.taskName})`, {
        reason: abort.reason,
        message: abort.message,
      });
      callbacks.onAbort?.(abort);
    }

    report.seal(abort);
    this.log.info(`Run ${report.runId} finished`, { status: report.status, durationMs: report.durationMs });
    this.reporter.runFinished?.(report);
    callbacks.onFinish?.(report);
    return report;
  }

  /** Dry run: what `run` would execute, and where. */
  plan(goal: string, inventory: Inventory, opts: Pick<RunOptions, "targetFilter"> = {}): PlanPreview {
    const plan = this.registry.resolve(goal);
    const targets = opts.targetFilter ? inventory.filter(opts.targetFilter) : inventory;
    return {
      goal: plan.goal,
      steps: plan.steps.map((step) => ({
        index: step.index,
        group: step.group,
        tasks: step.tasks.map((t) => t.name),
        hosts: targets.inGroup(step.group).map((h) => h.id),
      })),
    };
  }

  private async closeBackends(backends: BackendSet): Promise<void> {
    const settled = await Promise.allSettled([backends.local.close(), backends.remote.close()]);
    for (const outcome of settled) {
      if (outcome.status === "rejected") {
        this.log.error("Backend teardown failed", { error: errorMessage(outcome.reason) });
      }
    }
  }
}
