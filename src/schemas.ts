import { z } from "zod";
import { ConfigError, ValidationError, type ErrorCode } from "./errors.js";
import { GOALS, HOST_GROUPS } from "./registry/goals.js";

/**
 * Parse `data` with `schema`, throwing a ValidationError (or a ConfigError with
 * `code` when given) that lists every issue.
 */
export function parseOrThrow<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, data: unknown, code?: ErrorCode): T {
  const result = schema.safeParse(data);
  if (result.success) return result.data;
  const msg = result.error.issues
    .map((i) => (i.path.length > 0 ? `${i.path.join(".")}: ${i.message}` : i.message))
    .join("; ");
  throw code ? new ConfigError(code, msg) : new ValidationError(msg);
}

// ---------------------------------------------------------------------------
// Inventory
// ---------------------------------------------------------------------------

export const HostEntrySchema = z.object({
  address: z.string().trim().min(1, "address is required"),
  port: z.number().int().positive().max(65_535).default(22),
  username: z.string().min(1).optional(),
  credentialRef: z.string().min(1).optional(),
  groups: z.array(z.enum(HOST_GROUPS)).min(1, "host must belong to at least one group"),
  connection: z.enum(["local", "ssh"]).optional(),
  vars: z.record(z.string()).default({}),
});

export const InventoryFileSchema = z.object({
  hosts: z.record(HostEntrySchema),
});

export type HostEntry = z.infer<typeof HostEntrySchema>;
export type InventoryFile = z.infer<typeof InventoryFileSchema>;

// ---------------------------------------------------------------------------
// Settings
// ---------------------------------------------------------------------------

export const FluxSettingsSchema = z.object({
  enabled: z.boolean().default(false),
  githubUrl: z.string().default(""),
  branch: z.string().default("main"),
  clusterPath: z.string().default("clusters/default"),
  localKeyPath: z.string().default(""),
});

export const AppSettingsSchema = z.object({
  azure: z.object({
    subscriptionId: z.string().min(1, "azure.subscriptionId is required"),
    tenantId: z.string().optional(),
    location: z.string().min(1, "azure.location is required"),
    resourceGroup: z.string().min(1, "azure.resourceGroup is required"),
    /** Arc resource name; defaults to `<resourceGroup>-<environment>`. */
    clusterName: z.string().min(1).optional(),
  }),
  k8s: z.object({
    version: z.string().regex(/^\d+\.\d+$/, "k8s.version must look like 1.30"),
    podNetworkCidr: z.string().default("10.244.0.0/16"),
    cniManifestUrl: z
      .string()
      .default("https://github.com/flannel-io/flannel/releases/latest/download/kube-flannel.yml"),
    localKubeconfigPath: z.string().default("inventory/kubeconfig_admin.yaml"),
    flux: FluxSettingsSchema.default({}),
  }),
  environment: z.string().min(1).default("dev"),
});

export type AppSettings = z.infer<typeof AppSettingsSchema>;

// ---------------------------------------------------------------------------
// Report server
// ---------------------------------------------------------------------------

export const SubmitRunRequestSchema = z.object({
  goal: z
    .string({ required_error: "goal is required", invalid_type_error: "goal must be a string" })
    .trim()
    .min(1, "goal must not be empty")
    .transform((g) => g.toUpperCase().replace(/-/g, "_"))
    .pipe(z.enum(GOALS, { errorMap: () => ({ message: `goal must be one of ${GOALS.join(", ")}` }) })),
  continueOnError: z.boolean().optional(),
  target: z.string().trim().min(1).optional(),
  expectNoChanges: z.boolean().optional(),
});

export type SubmitRunRequest = z.infer<typeof SubmitRunRequestSchema>;
