// Config
export { createConfig, defaults } from "./config.js";
export type { ConductorConfig, ConductorConfigInput } from "./config.js";
export { loadSettings, resolveSettings } from "./settings.js";

// Errors
export {
  ConductorError,
  ConfigError,
  ValidationError,
  ConnectionError,
  TaskExecutionError,
  TaskTimeoutError,
  InvariantError,
  errorMessage,
} from "./errors.js";
export type { ErrorCode } from "./errors.js";

// Schemas
export {
  parseOrThrow,
  AppSettingsSchema,
  InventoryFileSchema,
  HostEntrySchema,
  SubmitRunRequestSchema,
} from "./schemas.js";
export type { AppSettings, InventoryFile, HostEntry, SubmitRunRequest } from "./schemas.js";

// Inventory
export { StaticInventory, inventoryFromFile, parseInventory, loadInventory } from "./inventory/inventory.js";
export type { Host, Inventory, ConnectionKind, TargetSelector } from "./inventory/types.js";

// Registry
export { GOALS, HOST_GROUPS, parseGoal, parseHostGroup, isGoal, isHostGroup } from "./registry/goals.js";
export type { Goal, HostGroup } from "./registry/goals.js";
export { TaskRegistry, defineRegistry } from "./registry/registry.js";
export type { ExecutionPlan, PlanStep, GoalRegistration } from "./registry/registry.js";
export { createDefaultRegistry } from "./registry/default-registry.js";

// Tasks
export { defineTask, outcome, settle, mustExec, succeeds, commandExists } from "./tasks/define.js";
export { wrapTask } from "./tasks/wrapper.js";
export type { WrapperHarness, WrappedTask, Invocation } from "./tasks/wrapper.js";
export { SharedStore } from "./tasks/context.js";
export type {
  Task,
  TaskContext,
  TaskOutcome,
  TaskStatus,
  CommandResult,
  ExecOptions,
  SharedState,
} from "./tasks/types.js";
export * as builtinTasks from "./tasks/builtin/index.js";

// Backends
export { LocalBackend, LocalChannel } from "./backends/local.js";
export { RemoteBackend } from "./backends/remote.js";
export { SessionPool } from "./backends/session-pool.js";
export type { RemoteSession, SessionConnector, SessionLease } from "./backends/session-pool.js";
export { SshSession, createSshConnector } from "./backends/ssh.js";
export type {
  ExecutionBackend,
  BackendSet,
  RawOutcome,
  InvocationScope,
  CommandChannel,
  ChannelExecOptions,
} from "./backends/types.js";
export { createDefaultCredentialResolver } from "./credentials/resolver.js";
export type { CredentialResolver, SshAuth } from "./credentials/resolver.js";

// Engine
export { Engine, createDefaultBackends } from "./engine/engine.js";
export type { EngineOptions, BackendFactory } from "./engine/engine.js";
export type { RunOptions, RunCallbacks, PlanPreview } from "./engine/types.js";

// Reporting
export { RunReport, rollup } from "./report/run-report.js";
export { ConsoleReporter, silentReporter, formatResultLine } from "./report/reporter.js";
export type { Reporter } from "./report/reporter.js";
export { formatSummary, exitCodeFor, EXIT_CONFIG_ERROR } from "./report/summary.js";
export type { TaskResult, ErrorKind, RollupStatus, AbortRecord, RunReportSnapshot } from "./report/types.js";

// Persistence
export { RunStore, defaultStorePath } from "./persistence/store.js";

// UI
export { ReportServer } from "./ui/server.js";
export type { ReportServerOptions } from "./ui/server.js";
export type { ServerEvent, RunSummary } from "./ui/types.js";

// Utils
export { log, setLogLevel, setLogFile } from "./utils/logger.js";
export { withRetry } from "./utils/retry.js";
