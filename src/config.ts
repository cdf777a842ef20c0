import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

const DEFAULT_DATA_DIR = join(homedir(), ".cluster-conductor");

const ConductorConfigSchema = z.object({
  timeouts: z
    .object({
      /** Per-task bound in ms; 0 disables it. */
      task: z.number().int().nonnegative().default(0),
      sshReady: z.number().int().positive().default(20_000),
      /** How long closing the session pool waits for busy host lanes. */
      sessionDrain: z.number().int().nonnegative().default(30_000),
    })
    .default({}),
  retry: z
    .object({
      connectAttempts: z.number().int().positive().default(3),
      baseDelayMs: z.number().int().nonnegative().default(500),
      maxDelayMs: z.number().int().nonnegative().default(5_000),
    })
    .default({}),
  limits: z
    .object({
      maxConcurrency: z.number().int().positive().default(8),
      maxRuns: z.number().int().positive().default(50),
      outputTruncation: z.number().int().positive().default(2_000),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().nonnegative().default(3000),
      host: z.string().default("127.0.0.1"),
    })
    .default({}),
  paths: z
    .object({
      dataDir: z.string().default(DEFAULT_DATA_DIR),
      logFile: z.string().optional(),
    })
    .default({}),
});

export type ConductorConfig = z.infer<typeof ConductorConfigSchema>;
export type ConductorConfigInput = z.input<typeof ConductorConfigSchema>;

/**
 * Build a config value from the defaults plus overrides. The result is handed to
 * the engine and its collaborators explicitly; nothing reads config ambiently.
 */
export function createConfig(overrides: ConductorConfigInput = {}): ConductorConfig {
  const result = ConductorConfigSchema.safeParse(overrides);
  if (!result.success) {
    const msg = result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new ConfigError("INVALID_CONFIG", `Invalid config: ${msg}`);
  }
  return result.data;
}

/** The default config values (frozen). */
export const defaults: Readonly<ConductorConfig> = Object.freeze(createConfig());
