import type Redis from "ioredis";
import { CometHttpClient } from "./clients/cometHttpClient";
import type { CreateFetcherFunction, Fetcher } from "./clients/fetcher";
import type { IngestConfig } from "./modules/config";
import { describeError } from "./modules/errors";
import { FileBackend } from "./modules/fileBackend";
import type { JobQueue } from "./modules/jobQueue";
import { createLogger } from "./modules/logger";
import { MemoryJobQueue } from "./modules/memoryJobQueue";
import { MemorySequenceStore } from "./modules/memorySequenceStore";
import { Metrics } from "./modules/metrics";
import { Persister } from "./modules/persister";
import { PostgresBackend } from "./modules/postgresBackend";
import { connectBroker, createRedisClient } from "./modules/redisClient";
import { RedisJobQueue } from "./modules/redisJobQueue";
import { RedisSequenceStore } from "./modules/redisSequenceStore";
import { createConfiguredRetrier, type Retrier } from "./modules/retry";
import type { SequenceStore } from "./modules/sequenceStore";
import type { StorageBackend, StorageStats } from "./modules/storageBackend";
import type { BlockRange } from "./types/BlockRange";
import { formatRanges, rangeKey } from "./utils/formatRanges";

const logger = createLogger("runtime");

/**
 * Components wired from one configuration
 */
export type Runtime = {
  config: IngestConfig;
  retrier: Retrier;
  persister: Persister;
  store: SequenceStore;
  queue: JobQueue;
  createFetcher: CreateFetcherFunction;
  metrics: Metrics;
  close: () => Promise<void>;
};

/**
 * Prebuilt collaborators used in place of the configured ones
 */
export type RuntimeDependencies = {
  backends?: StorageBackend[];
  redis?: Redis;
};

export type StorageReport = Record<
  string,
  StorageStats & { gaps: BlockRange[] }
>;

/**
 * Builds every enabled storage backend
 */
export function createBackends(
  config: IngestConfig,
  retrier: Retrier
): StorageBackend[] {
  const backends: StorageBackend[] = [];
  if (config.storage.db.enabled) {
    backends.push(PostgresBackend.fromConfig(config.storage.db, retrier));
  }
  if (config.storage.file.enabled) {
    backends.push(new FileBackend(config.storage.file));
  }
  return backends;
}

export function createFetcherFactory(
  config: IngestConfig,
  retrier: Retrier,
  metrics: Metrics | null = null
): CreateFetcherFunction {
  return () =>
    CometHttpClient.create(config.rpc.url, retrier, {
      timeoutMs: config.rpc.timeoutMs,
      shouldBatchRequests: config.rpc.batchRequests,
      metrics,
    });
}

/**
 * Compares the gaps each backend holds with those of the sequence store,
 * below the store's highest height
 * @returns Names of the backends that disagree with the store
 */
export async function crossCheckGaps(
  persister: Persister,
  store: SequenceStore
): Promise<string[]> {
  const maxHeight = await store.maxHeight();
  if (maxHeight == null) {
    return [];
  }

  const expected = await store.detectGaps(maxHeight);
  const expectedKeys = expected.map(rangeKey).join(",");
  const disagreeing: string[] = [];
  for (const [backend, gaps] of Object.entries(
    await persister.detectGaps(maxHeight)
  )) {
    if (gaps.map(rangeKey).join(",") !== expectedKeys) {
      logger.warn(
        `${backend} has gaps [${formatRanges(gaps)}] where the sequence store has [${formatRanges(expected)}]`
      );
      disagreeing.push(backend);
    }
  }
  return disagreeing;
}

/**
 * Stored height count, bounds and gaps of every backend
 */
export async function createStorageReport(
  persister: Persister
): Promise<StorageReport> {
  const stats = await persister.stats();
  const latest = Math.max(
    -1,
    ...Object.values(stats).map(({ latest }) => latest ?? -1)
  );
  const gaps = await persister.detectGaps(latest);
  return Object.fromEntries(
    Object.entries(stats).map(([backend, backendStats]) => [
      backend,
      { ...backendStats, gaps: gaps[backend] ?? [] },
    ])
  );
}

/**
 * Checks the source and every backend answer
 * @throws Error listing every failed check
 */
export async function checkHealth(
  persister: Persister,
  fetcher: Fetcher
): Promise<void> {
  const problems = await persister.healthCheck();
  try {
    const latestHeight = await fetcher.getLatestHeight();
    logger.info(`Source is at block ${latestHeight}`);
  } catch (error) {
    problems.source = describeError(error);
  }

  const failed = Object.entries(problems);
  if (failed.length > 0) {
    throw new Error(
      `Health check failed: ${failed
        .map(([component, problem]) => `${component}: ${problem}`)
        .join("; ")}`
    );
  }
  logger.info(`Health check passed for ${persister.backendNames.join(", ")}`);
}

/**
 * Wires the single-process runtime. The sequence store is seeded with the
 * heights already durable in every backend.
 * Backends are disconnected again if wiring fails.
 */
export async function createBatchRuntime(
  config: IngestConfig,
  { backends }: RuntimeDependencies = {}
): Promise<Runtime> {
  const retrier = createConfiguredRetrier(config.retry);
  const metrics = new Metrics();
  const persister = new Persister(
    backends ?? createBackends(config, retrier),
    retrier,
    metrics
  );

  try {
    await persister.connect();

    const heights = await persister.listDurableHeights();
    const store = new MemorySequenceStore(config.genesisHeight, heights);
    logger.info(
      `Loaded ${heights.length} stored blocks, frontier ${await store.frontier()}`
    );
    await crossCheckGaps(persister, store);

    return {
      config,
      retrier,
      persister,
      store,
      queue: new MemoryJobQueue(config.gaps.leaseMs),
      createFetcher: createFetcherFactory(config, retrier, metrics),
      metrics,
      close: () => persister.disconnect(),
    };
  } catch (error) {
    await persister.disconnect();
    throw error;
  }
}

/**
 * Wires a continuous-mode runtime sharing its store and queue through Redis.
 * The broker connection and backends are closed again if wiring fails.
 * @throws BrokerUnavailableError if Redis cannot be reached
 */
export async function createContinuousRuntime(
  config: IngestConfig,
  { backends, redis = createRedisClient(config.broker) }: RuntimeDependencies = {}
): Promise<Runtime> {
  const retrier = createConfiguredRetrier(config.retry);
  const metrics = new Metrics();
  const persister = new Persister(
    backends ?? createBackends(config, retrier),
    retrier,
    metrics
  );

  try {
    await connectBroker(redis);
    await persister.connect();
  } catch (error) {
    await persister.disconnect();
    redis.disconnect();
    throw error;
  }

  return {
    config,
    retrier,
    persister,
    store: new RedisSequenceStore(
      redis,
      config.broker.keyPrefix,
      config.genesisHeight
    ),
    queue: new RedisJobQueue(redis, config.broker.keyPrefix, config.gaps.leaseMs),
    createFetcher: createFetcherFactory(config, retrier, metrics),
    metrics,
    close: async () => {
      await persister.disconnect();
      await redis.quit();
    },
  };
}
