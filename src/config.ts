import { z } from "zod";
import { MAX_TIMER_DELAY_MS } from "./control/timeout-guard.js";

const positiveInt = z.coerce.number().int().positive();
const delayMs = positiveInt.max(MAX_TIMER_DELAY_MS);
const nonNegativeInt = z.coerce.number().int().min(0);
const weight = z.coerce.number().min(0).max(1);

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

export const configSchema = z.object({
  http: z.object({
    host: z.string().min(1).default("0.0.0.0"),
    port: z.coerce.number().int().min(0).max(65_535).default(8787),
    adminToken: z.string().min(1).default("admin-dev"),
  }),
  logging: z.object({
    level: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).default("info"),
    pretty: booleanFlag.default("false"),
  }),
  scheduler: z.object({
    maxConcurrentTasks: positiveInt.default(10),
    laneDepthLimit: positiveInt.default(1_000),
    defaultTimeoutMs: delayMs.default(30_000),
    defaultMaxRetries: nonNegativeInt.default(3),
  }),
  retry: z.object({
    baseDelayMs: delayMs.default(1_000),
    maxDelayMs: delayMs.default(60_000),
    jitterRatio: z.coerce.number().min(0).max(0.5).default(0),
  }),
  routing: z.object({
    confidenceWeight: weight.default(0.7),
    latencyWeight: weight.default(0.3),
  }),
  health: z.object({
    probeIntervalMs: delayMs.default(30_000),
    probeTimeoutMs: delayMs.default(5_000),
    unreachableAfter: positiveInt.default(3),
    maxBackoffMs: delayMs.default(300_000),
    latencyEmaWeight: weight.default(0.3),
  }),
  discovery: z.object({
    urls: z
      .string()
      .default("")
      .transform((raw) =>
        raw
          .split(",")
          .map((s) => s.trim())
          .filter((s) => s.length > 0)
      ),
  }),
});

export type TaskMeshConfig = z.output<typeof configSchema>;

type Env = Record<string, string | undefined>;

/** Reads TASKMESH_* variables; anything unset falls back to the schema default. */
export function loadConfig(env: Env = process.env): TaskMeshConfig {
  const raw = {
    http: {
      host: env.TASKMESH_HOST,
      port: env.TASKMESH_PORT,
      adminToken: env.TASKMESH_ADMIN_TOKEN,
    },
    logging: {
      level: env.TASKMESH_LOG_LEVEL,
      pretty: env.TASKMESH_LOG_PRETTY?.toLowerCase(),
    },
    scheduler: {
      maxConcurrentTasks: env.TASKMESH_MAX_CONCURRENT_TASKS,
      laneDepthLimit: env.TASKMESH_LANE_DEPTH_LIMIT,
      defaultTimeoutMs: env.TASKMESH_DEFAULT_TIMEOUT_MS,
      defaultMaxRetries: env.TASKMESH_DEFAULT_MAX_RETRIES,
    },
    retry: {
      baseDelayMs: env.TASKMESH_RETRY_BASE_DELAY_MS,
      maxDelayMs: env.TASKMESH_RETRY_MAX_DELAY_MS,
      jitterRatio: env.TASKMESH_RETRY_JITTER_RATIO,
    },
    routing: {
      confidenceWeight: env.TASKMESH_ROUTER_CONFIDENCE_WEIGHT,
      latencyWeight: env.TASKMESH_ROUTER_LATENCY_WEIGHT,
    },
    health: {
      probeIntervalMs: env.TASKMESH_PROBE_INTERVAL_MS,
      probeTimeoutMs: env.TASKMESH_PROBE_TIMEOUT_MS,
      unreachableAfter: env.TASKMESH_UNREACHABLE_AFTER,
      maxBackoffMs: env.TASKMESH_PROBE_MAX_BACKOFF_MS,
      latencyEmaWeight: env.TASKMESH_LATENCY_EMA_WEIGHT,
    },
    discovery: {
      urls: env.TASKMESH_DISCOVERY_URLS,
    },
  };

  const parsed = configSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Configuration validation failed: ${detail}`);
  }
  return parsed.data;
}
