/**
 * Monitor Settings - JSON configuration validated with zod
 *
 * Loaded once at startup (and again on SIGHUP). Any schema violation is a
 * ConfigError; nothing is guessed at runtime.
 */

import * as fs from "fs";
import { fileURLToPath } from "url";
import { z } from "zod";

/** Field of the status response that no target may shadow */
export const RESERVED_TARGET_NAME = "all_critical_ok";

const TARGET_NAME_PATTERN = /^[a-zA-Z0-9_.-]+$/;

// ============================================================================
// Errors
// ============================================================================

/**
 * Raised for malformed or inconsistent configuration. Fatal at startup.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

// ============================================================================
// Schemas
// ============================================================================

const credentialsSchema = z
  .object({
    username: z.string().min(1),
    password: z.string().optional(),
    passwordEnv: z.string().min(1).optional(),
  })
  .refine((c) => (c.password === undefined) !== (c.passwordEnv === undefined), {
    message: "exactly one of password or passwordEnv is required",
  });

const targetName = z
  .string()
  .regex(TARGET_NAME_PATTERN, "target names may only contain letters, digits, '_', '.', '-'")
  .refine((name) => name !== RESERVED_TARGET_NAME, {
    message: `'${RESERVED_TARGET_NAME}' is reserved`,
  });

const targetBase = {
  name: targetName,
  intervalMs: z.number().int().positive().default(60000),
  timeoutMs: z.number().int().positive().optional(),
  failureThreshold: z.number().int().min(1).default(3),
  successThreshold: z.number().int().min(1).default(2),
  critical: z.boolean().default(false),
};

const tcpTargetSchema = z.object({
  ...targetBase,
  kind: z.literal("TCP"),
  host: z.string().min(1),
  port: z.number().int().min(1).max(65535),
});

const httpTargetSchema = z.object({
  ...targetBase,
  kind: z.literal("HTTP"),
  url: z.string().url(),
  credentials: credentialsSchema.optional(),
  expectedStatus: z.array(z.number().int().min(100).max(599)).nonempty().optional(),
});

const nativeDriverTargetSchema = z.object({
  ...targetBase,
  kind: z.literal("NATIVE_DRIVER"),
  driver: z.enum(["redis", "neo4j", "qdrant"]),
  url: z.string().url(),
  credentials: credentialsSchema.optional(),
});

export const targetDefinitionSchema = z.discriminatedUnion("kind", [
  tcpTargetSchema,
  httpTargetSchema,
  nativeDriverTargetSchema,
]);

export const recoveryBindingSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("docker_restart"), container: z.string().min(1) }),
  z.object({
    action: z.literal("webhook"),
    url: z.string().url(),
    headers: z.record(z.string()).optional(),
  }),
  z.object({ action: z.literal("manual"), message: z.string().optional() }),
  z.object({ action: z.literal("noop") }),
]);

const brokerSchema = z
  .object({
    url: z.string().min(1).default("redis://localhost:6379"),
    exchange: z.string().min(1).default("metrics"),
    storageQueue: z.string().min(1).default("metrics.storage"),
    scrapeQueue: z.string().min(1).default("metrics.scrape"),
    deadLetter: z.string().min(1).default("metrics.dead"),
    maxLength: z.number().int().positive().default(100000),
    blockMs: z.number().int().positive().default(5000),
    redeliveryBaseMs: z.number().int().positive().default(1000),
    redeliveryMaxMs: z.number().int().positive().default(60000),
  })
  .default({});

const sinkSchema = z
  .object({
    url: z.string().min(1).optional(),
    keyPrefix: z.string().min(1).default("metrics:doc:"),
    alertKeyPrefix: z.string().min(1).default("metrics:alert:"),
    ttlSeconds: z.number().int().positive().default(7 * 24 * 3600),
  })
  .default({});

const schedulerSchema = z
  .object({
    jitterRatio: z.number().min(0).max(1).default(0.1),
  })
  .default({});

const controlPlaneSchema = z
  .object({
    gracePeriodMs: z.number().int().positive().default(60000),
    maxRetries: z.number().int().min(1).default(3),
    actionTimeoutMs: z.number().int().positive().optional(),
  })
  .default({});

const collectorSchema = z.object({
  type: z.literal("node_exporter"),
  url: z.string().url(),
  labels: z.record(z.string()).optional(),
});

const thresholdSchema = z.union([
  z.number(),
  z
    .object({
      above: z.number().optional(),
      below: z.number().optional(),
      equals: z.number().optional(),
    })
    .strict()
    .refine((b) => b.above !== undefined || b.below !== undefined || b.equals !== undefined, {
      message: "a threshold needs above, below or equals",
    }),
]);

const producerSchema = z
  .object({
    enabled: z.boolean().default(true),
    intervalMs: z.number().int().positive().default(60000),
    bufferCapacity: z.number().int().positive().default(1000),
    backoffBaseMs: z.number().int().positive().default(1000),
    backoffMaxMs: z.number().int().positive().default(60000),
    collectors: z.array(collectorSchema).default([]),
    /** Series selector -> bound; breaching samples are published as alerts */
    anomalyThresholds: z.record(thresholdSchema).default({}),
  })
  .default({});

const consumerSchema = z
  .object({
    enabled: z.boolean().default(true),
    batchSize: z.number().int().positive().default(10),
    maxRetries: z.number().int().min(1).default(5),
    backoffBaseMs: z.number().int().positive().default(1000),
    backoffMaxMs: z.number().int().positive().default(30000),
    dedupWindowMs: z.number().int().positive().default(3600000),
    dedupMaxEntries: z.number().int().positive().default(100000),
  })
  .default({});

const alertsSchema = z
  .object({
    channels: z.array(z.enum(["log", "slack", "webhook", "telegram"])).default(["log"]),
    cooldownMs: z.number().int().nonnegative().default(300000),
    maxHistory: z.number().int().positive().default(1000),
    slack: z
      .object({
        webhookUrl: z.string().url(),
        channel: z.string().optional(),
        username: z.string().optional(),
      })
      .optional(),
    webhook: z
      .object({
        url: z.string().url(),
        method: z.enum(["POST", "PUT"]).optional(),
        headers: z.record(z.string()).optional(),
      })
      .optional(),
    telegram: z
      .object({
        botToken: z.string().min(1),
        chatId: z.string().min(1),
      })
      .optional(),
  })
  .default({});

const serverSchema = z
  .object({
    port: z.number().int().min(0).max(65535).default(8000),
  })
  .default({});

export const settingsSchema = z.object({
  targets: z.array(targetDefinitionSchema).min(1),
  recovery: z.record(recoveryBindingSchema).default({}),
  broker: brokerSchema,
  sink: sinkSchema,
  scheduler: schedulerSchema,
  controlPlane: controlPlaneSchema,
  producer: producerSchema,
  consumer: consumerSchema,
  alerts: alertsSchema,
  server: serverSchema,
});

export type MonitorSettings = z.infer<typeof settingsSchema>;
export type TargetDefinition = z.infer<typeof targetDefinitionSchema>;
export type RecoveryBinding = z.infer<typeof recoveryBindingSchema>;
export type AlertSettings = MonitorSettings["alerts"];
export type BrokerSettings = MonitorSettings["broker"];
export type CollectorSettings = z.infer<typeof collectorSchema>;
export type ThresholdSetting = z.infer<typeof thresholdSchema>;

// ============================================================================
// Loading
// ============================================================================

type Env = Record<string, string | undefined>;

/**
 * Validate a parsed JSON document and apply environment overrides
 */
export function parseSettings(raw: unknown, env: Env = process.env): MonitorSettings {
  const result = settingsSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new ConfigError("Invalid monitor settings", issues);
  }

  const settings = result.data;
  const targetNames = new Set(settings.targets.map((t) => t.name));
  const unknownBindings = Object.keys(settings.recovery).filter((name) => !targetNames.has(name));
  if (unknownBindings.length > 0) {
    throw new ConfigError(
      "Recovery bindings reference unknown targets",
      unknownBindings.map((name) => `recovery.${name}`)
    );
  }

  return applyEnvOverrides(settings, env);
}

function applyEnvOverrides(settings: MonitorSettings, env: Env): MonitorSettings {
  const overridden: MonitorSettings = {
    ...settings,
    broker: { ...settings.broker },
    server: { ...settings.server },
  };

  if (env.REDIS_URL) {
    overridden.broker.url = env.REDIS_URL;
  }

  if (env.PORT) {
    const port = parseInt(env.PORT, 10);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
      throw new ConfigError(`Invalid PORT: ${env.PORT}`);
    }
    overridden.server.port = port;
  }

  return overridden;
}

/**
 * Default settings file location (monitor/config/monitor-settings.json)
 */
export function defaultSettingsPath(env: Env = process.env): string {
  return env.MONITOR_SETTINGS ?? fileURLToPath(new URL("../../config/monitor-settings.json", import.meta.url));
}

/**
 * Read and validate the settings file
 */
export function loadSettings(filePath: string = defaultSettingsPath(), env: Env = process.env): MonitorSettings {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`Cannot read settings file ${filePath}: ${reason}`);
  }
  return parseSettings(raw, env);
}
