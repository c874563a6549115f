import { z } from "zod";
import type { LevelWithSilentOrString } from "pino";

const seconds = (fallback: number) =>
  z.coerce.number().nonnegative().default(fallback);

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const nonNegativeInt = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const flag = (fallback: boolean) =>
  z
    .preprocess(
      (value) => (typeof value === "string" ? value.trim().toLowerCase() : value),
      z
        .enum(["true", "false", "1", "0", "yes", "no"])
        .default(fallback ? "true" : "false")
    )
    .transform((value) => value === "true" || value === "1" || value === "yes");

/**
 * Environment variables read by the ingestor. Durations are in seconds.
 */
export const EnvConfigSchema = z
  .object({
    RPC_URL: z.string().url("RPC_URL must be an http(s) URL"),
    BATCH_RPC_REQUESTS: flag(false),
    GENESIS_HEIGHT: nonNegativeInt(0),

    API_TIMEOUT: seconds(12),
    BLOCK_FETCH_DELAY: seconds(0.5),
    MAX_RETRIES: nonNegativeInt(3),
    RETRY_INITIAL_INTERVAL: seconds(1),
    RETRY_BACKOFF: z.coerce.number().min(1).default(2),
    RETRY_MAX_INTERVAL: seconds(60),
    RETRY_JITTER: seconds(0.25),

    BATCH_SIZE: positiveInt(100),
    NUM_WORKERS: positiveInt(4),
    RUN_GAP_DETECTION: flag(true),
    SHUTDOWN_TIMEOUT: seconds(30),

    ENABLE_DB_STORAGE: flag(true),
    DATABASE_URL: z.string().min(1).optional(),
    DB_POOL_SIZE: positiveInt(10),
    ENABLE_FILE_STORAGE: flag(false),
    DATA_DIR: z.string().min(1).default("./data/blocks"),
    ADD_JSON_EXTENSION: flag(false),
    PRETTY_PRINT_JSON: flag(true),
    STORAGE_RETRY_ROUNDS: nonNegativeInt(2),

    MAX_GAP_ATTEMPTS: nonNegativeInt(3),
    GAP_RETRY_DELAY: seconds(5),
    GAP_DETECTION_INTERVAL: seconds(60),
    GAP_LEASE: seconds(300),
    GAP_DEQUEUE_TIMEOUT: seconds(5),
    MAX_GAPS_TO_FIX: positiveInt(1000),
    GAP_CHUNK_SIZE: positiveInt(100),

    POLL_INTERVAL: seconds(2),

    REDIS_HOST: z.string().min(1).default("localhost"),
    REDIS_PORT: positiveInt(6379),
    REDIS_DB: nonNegativeInt(0),
    REDIS_PASSWORD: z.string().min(1).optional(),
    REDIS_KEY_PREFIX: z.string().default("ingest:"),

    LOG_LEVEL: z
      .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
      .default("info"),
  })
  .refine((env) => env.ENABLE_DB_STORAGE || env.ENABLE_FILE_STORAGE, {
    message:
      "At least one of ENABLE_DB_STORAGE or ENABLE_FILE_STORAGE must be true",
  })
  .refine((env) => !env.ENABLE_DB_STORAGE || env.DATABASE_URL != null, {
    message: "DATABASE_URL is required when ENABLE_DB_STORAGE is true",
    path: ["DATABASE_URL"],
  });

export type EnvConfig = z.infer<typeof EnvConfigSchema>;

export type RetryConfig = {
  maxRetries: number;
  initialIntervalMs: number;
  expFactor: number;
  maxIntervalMs: number;
  jitterMs: number;
};

/**
 * Immutable configuration shared by every component
 */
export type IngestConfig = Readonly<{
  rpc: Readonly<{
    url: string;
    batchRequests: boolean;
    timeoutMs: number;
    // Delay between consecutive fetches of a single worker or collector
    delayMs: number;
  }>;
  genesisHeight: number;
  retry: Readonly<RetryConfig>;
  batch: Readonly<{
    batchSize: number;
    numWorkers: number;
    runGapReconciliation: boolean;
    shutdownTimeoutMs: number;
  }>;
  storage: Readonly<{
    db: Readonly<{ enabled: boolean; url: string | null; poolSize: number }>;
    file: Readonly<{
      enabled: boolean;
      dataDir: string;
      addJsonExtension: boolean;
      prettyPrint: boolean;
    }>;
    // Extra rounds of writes to failed backends for an already fetched block
    retryRounds: number;
  }>;
  gaps: Readonly<{
    // Failed repair attempts tolerated before a range becomes stuck
    maxAttempts: number;
    retryDelayMs: number;
    detectionIntervalMs: number;
    leaseMs: number;
    dequeueTimeoutMs: number;
    maxRangesPerPass: number;
    // Heights per enqueued range at most, longer gaps are split
    maxRangeSize: number;
  }>;
  collector: Readonly<{ pollIntervalMs: number }>;
  broker: Readonly<{
    host: string;
    port: number;
    db: number;
    password: string | null;
    keyPrefix: string;
  }>;
  logLevel: LevelWithSilentOrString;
}>;

const toMs = (value: number) => Math.round(value * 1000);

function deepFreeze<T extends object>(value: T): T {
  for (const nested of Object.values(value)) {
    if (typeof nested === "object" && nested !== null) {
      deepFreeze(nested);
    }
  }
  return Object.freeze(value);
}

/**
 * Maps validated environment variables onto the configuration value
 */
export function toIngestConfig(env: EnvConfig): IngestConfig {
  return deepFreeze({
    rpc: {
      url: env.RPC_URL,
      batchRequests: env.BATCH_RPC_REQUESTS,
      timeoutMs: toMs(env.API_TIMEOUT),
      delayMs: toMs(env.BLOCK_FETCH_DELAY),
    },
    genesisHeight: env.GENESIS_HEIGHT,
    retry: {
      maxRetries: env.MAX_RETRIES,
      initialIntervalMs: toMs(env.RETRY_INITIAL_INTERVAL),
      expFactor: env.RETRY_BACKOFF,
      maxIntervalMs: toMs(env.RETRY_MAX_INTERVAL),
      jitterMs: toMs(env.RETRY_JITTER),
    },
    batch: {
      batchSize: env.BATCH_SIZE,
      numWorkers: env.NUM_WORKERS,
      runGapReconciliation: env.RUN_GAP_DETECTION,
      shutdownTimeoutMs: toMs(env.SHUTDOWN_TIMEOUT),
    },
    storage: {
      db: {
        enabled: env.ENABLE_DB_STORAGE,
        url: env.DATABASE_URL ?? null,
        poolSize: env.DB_POOL_SIZE,
      },
      file: {
        enabled: env.ENABLE_FILE_STORAGE,
        dataDir: env.DATA_DIR,
        addJsonExtension: env.ADD_JSON_EXTENSION,
        prettyPrint: env.PRETTY_PRINT_JSON,
      },
      retryRounds: env.STORAGE_RETRY_ROUNDS,
    },
    gaps: {
      maxAttempts: env.MAX_GAP_ATTEMPTS,
      retryDelayMs: toMs(env.GAP_RETRY_DELAY),
      detectionIntervalMs: toMs(env.GAP_DETECTION_INTERVAL),
      leaseMs: toMs(env.GAP_LEASE),
      dequeueTimeoutMs: toMs(env.GAP_DEQUEUE_TIMEOUT),
      maxRangesPerPass: env.MAX_GAPS_TO_FIX,
      maxRangeSize: env.GAP_CHUNK_SIZE,
    },
    collector: {
      pollIntervalMs: toMs(env.POLL_INTERVAL),
    },
    broker: {
      host: env.REDIS_HOST,
      port: env.REDIS_PORT,
      db: env.REDIS_DB,
      password: env.REDIS_PASSWORD ?? null,
      keyPrefix: env.REDIS_KEY_PREFIX,
    },
    logLevel: env.LOG_LEVEL,
  });
}

/**
 * Validates the environment and builds the configuration
 * @param env Environment variables, process.env by default
 * @throws Error listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env
): IngestConfig {
  const result = EnvConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "env"}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${issues}`);
  }
  return toIngestConfig(result.data);
}
