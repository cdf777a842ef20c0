#!/usr/bin/env node

import { Command, InvalidArgumentError } from "commander";
import { createConfig, type ConductorConfig } from "./config.js";
import { Engine } from "./engine/engine.js";
import { ConfigError, InvariantError, errorMessage } from "./errors.js";
import { loadInventory } from "./inventory/inventory.js";
import { RunStore, defaultStorePath } from "./persistence/store.js";
import { createDefaultRegistry } from "./registry/default-registry.js";
import { parseGoal } from "./registry/goals.js";
import { ConsoleReporter } from "./report/reporter.js";
import { EXIT_CONFIG_ERROR, exitCodeFor } from "./report/summary.js";
import type { AppSettings } from "./schemas.js";
import { loadSettings } from "./settings.js";
import { ReportServer } from "./ui/server.js";
import { setLogFile, setLogLevel } from "./utils/logger.js";

process.on("unhandledRejection", (reason) => {
  console.error("Unhandled rejection:", errorMessage(reason));
  process.exitCode = 1;
});

type GlobalOptions = {
  inventory: string;
  settings?: string;
  dataDir?: string;
  logFile?: string;
  debug?: boolean;
  verbose?: boolean;
};

type RunCliOptions = {
  target?: string;
  continueOnError?: boolean;
  taskTimeout?: number;
  runTimeout?: number;
  concurrency?: number;
  expectNoChanges?: boolean;
  quiet?: boolean;
  store: boolean;
};

const SETTINGS_ENV = ["AZURE_SUBSCRIPTION_ID", "AZURE_TENANT_ID", "AZURE_LOCATION", "AZURE_RESOURCE_GROUP", "K8S_VERSION"];

function nonNegativeInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) throw new InvalidArgumentError("Expected a non-negative integer.");
  return n;
}

function positiveInt(value: string): number {
  const n = nonNegativeInt(value);
  if (n === 0) throw new InvalidArgumentError("Expected a positive integer.");
  return n;
}

const program = new Command();

program
  .name("cluster-conductor")
  .description("Provision Kubernetes nodes and Azure Arc from goal-driven plans")
  .version("0.1.0")
  .option("-i, --inventory <path>", "Inventory JSON file", "inventory/hosts.json")
  .option("-s, --settings <path>", "Settings JSON file (environment variables override it)")
  .option("--data-dir <path>", "Directory for the run store")
  .option("--log-file <path>", "Write a diagnostic log of every task to this file")
  .option("-v, --verbose", "Trace each task's sub-steps")
  .option("--debug", "Enable debug logging");

program.hook("preAction", (_cmd, actionCmd) => {
  const opts = actionCmd.optsWithGlobals<GlobalOptions>();
  setLogLevel(opts.debug ? "debug" : opts.verbose ? "info" : "error");
  const logFile = opts.logFile ?? buildConfig(opts).paths.logFile;
  if (logFile) setLogFile(logFile);
});

function buildConfig(opts: GlobalOptions): ConductorConfig {
  return createConfig({ paths: { dataDir: opts.dataDir, logFile: opts.logFile } });
}

/** Settings are optional until a task needs them; an explicit file or AZURE_* / K8S_* vars load them. */
async function maybeLoadSettings(opts: GlobalOptions): Promise<AppSettings | undefined> {
  if (opts.settings || SETTINGS_ENV.some((name) => process.env[name])) return loadSettings(opts.settings);
  return undefined;
}

function buildEngine(config: ConductorConfig, quiet = false): Engine {
  return new Engine({
    registry: createDefaultRegistry(),
    config,
    reporter: new ConsoleReporter({ quiet }),
  });
}

/** Configuration problems exit 2; anything else unexpected exits 1. */
function fail(err: unknown): void {
  console.error(`Error: ${errorMessage(err)}`);
  process.exitCode = err instanceof ConfigError || err instanceof InvariantError ? EXIT_CONFIG_ERROR : 1;
}

// --- run ---
program
  .command("run")
  .description("Run a goal (verify, init, arc-connect, destroy) against the inventory")
  .argument("<goal>", "Goal to run")
  .option("-t, --target <selector>", "Limit to a host id or group (local, cp, workers)")
  .option("--continue-on-error", "Keep going after a task fails")
  .option("--task-timeout <ms>", "Per-task time limit in ms (0 = none)", nonNegativeInt)
  .option("--run-timeout <ms>", "Cancel the run after this many ms", positiveInt)
  .option("-c, --concurrency <n>", "Max hosts a task runs on at once", positiveInt)
  .option("--expect-no-changes", "Report any change as an idempotency warning")
  .option("-q, --quiet", "Only print step headers and the summary")
  .option("--no-store", "Do not record the run in the run store")
  .action(async (goal: string, opts: RunCliOptions, cmd: Command) => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    const controller = new AbortController();
    const onSigint = () => {
      if (controller.signal.aborted) process.exit(130);
      console.error("\nCancelling: running tasks will finish, nothing new starts. Press Ctrl+C again to force quit.");
      controller.abort();
    };
    process.on("SIGINT", onSigint);

    try {
      const config = buildConfig(globals);
      const inventory = await loadInventory(globals.inventory);
      const settings = await maybeLoadSettings(globals);
      const engine = buildEngine(config, opts.quiet);

      const report = await engine.run(parseGoal(goal) ?? goal, inventory, {
        targetFilter: opts.target,
        continueOnError: opts.continueOnError,
        perTaskTimeoutMs: opts.taskTimeout,
        runTimeoutMs: opts.runTimeout,
        maxConcurrency: opts.concurrency,
        expectNoChanges: opts.expectNoChanges,
        signal: controller.signal,
        settings,
      });

      if (opts.store) {
        const store = new RunStore(defaultStorePath(config));
        try {
          store.insert(report.toJSON());
        } catch (err) {
          console.error(`Could not record run: ${errorMessage(err)}`);
        } finally {
          store.close();
        }
      }
      // Cancelled runs exit 1 even when nothing failed.
      process.exitCode = report.abort?.reason === "cancelled" ? 1 : exitCodeFor(report.status);
    } catch (err) {
      fail(err);
    } finally {
      process.off("SIGINT", onSigint);
    }
  });

// --- plan ---
program
  .command("plan")
  .description("Show the steps, tasks and hosts a goal would run (dry-run)")
  .argument("<goal>", "Goal to preview")
  .option("-t, --target <selector>", "Limit to a host id or group")
  .action(async (goal: string, opts: { target?: string }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    try {
      const inventory = await loadInventory(globals.inventory);
      const preview = buildEngine(buildConfig(globals)).plan(parseGoal(goal) ?? goal, inventory, {
        targetFilter: opts.target,
      });
      console.log(`Goal ${preview.goal}`);
      for (const step of preview.steps) {
        const hosts = step.hosts.length > 0 ? step.hosts.join(", ") : "no hosts, skipped";
        console.log(`\n  Step ${step.index + 1}: ${step.group} (${hosts})`);
        for (const task of step.tasks) console.log(`    - ${task}`);
      }
    } catch (err) {
      fail(err);
    }
  });

// --- goals ---
program
  .command("goals")
  .description("List the registered goals and their steps")
  .action(() => {
    const registry = createDefaultRegistry();
    for (const goal of registry.goals()) {
      const steps = registry.resolve(goal).steps.map((s) => `${s.group}[${s.tasks.length}]`);
      console.log(`${goal.padEnd(12)} ${steps.join(" -> ")}`);
    }
  });

// --- hosts ---
program
  .command("hosts")
  .description("List inventory hosts")
  .option("-t, --target <selector>", "Limit to a host id or group")
  .action(async (opts: { target?: string }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    try {
      const inventory = await loadInventory(globals.inventory);
      const hosts = (opts.target ? inventory.filter(opts.target) : inventory).all();
      if (hosts.length === 0) {
        console.log("No hosts.");
        return;
      }
      for (const h of hosts) {
        console.log(`${h.id.padEnd(16)} ${`${h.address}:${h.port}`.padEnd(22)} ${h.connection.padEnd(5)} ${h.groups.join(",")}`);
      }
    } catch (err) {
      fail(err);
    }
  });

// --- runs ---
program
  .command("runs")
  .description("List recorded runs, or show one run's results")
  .argument("[runId]", "Run to show")
  .option("-n, --limit <n>", "How many runs to list", positiveInt, 20)
  .action((runId: string | undefined, opts: { limit: number }, cmd: Command) => {
    const store = new RunStore(defaultStorePath(buildConfig(cmd.optsWithGlobals<GlobalOptions>())));
    try {
      if (runId) {
        const run = store.get(runId);
        if (!run) {
          console.error(`Run ${runId} not found`);
          process.exitCode = 1;
          return;
        }
        console.log(JSON.stringify(run, null, 2));
        return;
      }
      const runs = store.list(opts.limit);
      if (runs.length === 0) console.log("No runs recorded.");
      for (const run of runs) {
        const when = new Date(run.startedAt).toISOString();
        console.log(`${run.runId}  ${when}  ${run.goal.padEnd(11)} ${run.status.padEnd(7)} ${run.results.length} results`);
      }
    } finally {
      store.close();
    }
  });

// --- serve ---
program
  .command("serve")
  .description("Serve run reports over HTTP with a live SSE event stream")
  .option("-p, --port <port>", "Port", nonNegativeInt)
  .option("--host <host>", "Host to bind")
  .option("--no-store", "Keep runs in memory only")
  .action(async (opts: { port?: number; host?: string; store: boolean }, cmd: Command) => {
    const globals = cmd.optsWithGlobals<GlobalOptions>();
    try {
      const config = buildConfig(globals);
      const inventory = await loadInventory(globals.inventory);
      const settings = await maybeLoadSettings(globals);
      const runStore = opts.store ? new RunStore(defaultStorePath(config)) : undefined;
      const server = new ReportServer({
        engine: buildEngine(config, true),
        inventory,
        settings,
        runStore,
        port: opts.port,
        host: opts.host,
      });

      const addr = await server.start();
      console.log(`Report server: http://${addr.host}:${addr.port}`);
      console.log("Press Ctrl+C to stop.\n");

      process.once("SIGINT", () => {
        server
          .stop()
          .catch((err: unknown) => console.error(`Shutdown error: ${errorMessage(err)}`))
          .finally(() => {
            runStore?.close();
            process.exit(0);
          });
      });
    } catch (err) {
      fail(err);
    }
  });

program.parseAsync().catch((err: unknown) => {
  fail(err);
});
