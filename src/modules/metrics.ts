import { Counter, Registry } from "prom-client";

const PREFIX = "block_ingest_";

type StorageStats = {
  writes: number;
  failures: number;
  // Percentage of writes confirmed, null before the first write
  successRate: number | null;
};

/**
 * Counters of one process, with derived rates
 */
export type MetricsSnapshot = {
  blocksFetched: number;
  apiRequests: number;
  apiFailures: number;
  // Percentage of RPC calls answered, null before the first call
  apiSuccessRate: number | null;
  storage: Record<string, StorageStats>;
  gapsDetected: number;
  gapsFixed: number;
  elapsedMs: number;
  blocksPerSecond: number;
};

const successRate = (total: number, failures: number) =>
  total > 0 ? Math.round(((total - failures) / total) * 10000) / 100 : null;

async function total<T extends string>(counter: Counter<T>): Promise<number> {
  const { values } = await counter.get();
  return values.reduce((sum, { value }) => sum + value, 0);
}

/**
 * Sums a counter's values by the value of one label
 */
async function totalsBy<T extends string>(
  counter: Counter<T>,
  label: T
): Promise<Map<string, number>> {
  const totals = new Map<string, number>();
  const { values } = await counter.get();
  for (const { value, labels } of values) {
    const key = String(labels[label] ?? "");
    totals.set(key, (totals.get(key) ?? 0) + value);
  }
  return totals;
}

/**
 * Ingestion counters, registered on a registry of their own so that several
 * instances can live in one process
 */
export class Metrics {
  public readonly registry = new Registry();

  public readonly apiRequests = new Counter({
    name: `${PREFIX}api_requests_total`,
    help: "RPC calls issued to the source",
    labelNames: ["method"] as const,
    registers: [this.registry],
  });

  public readonly apiFailures = new Counter({
    name: `${PREFIX}api_failures_total`,
    help: "RPC calls that failed or timed out",
    labelNames: ["method"] as const,
    registers: [this.registry],
  });

  public readonly blocksFetched = new Counter({
    name: `${PREFIX}blocks_fetched_total`,
    help: "Blocks fetched and decoded",
    registers: [this.registry],
  });

  public readonly storageWrites = new Counter({
    name: `${PREFIX}storage_writes_total`,
    help: "Block writes handed to a storage backend",
    labelNames: ["backend"] as const,
    registers: [this.registry],
  });

  public readonly storageFailures = new Counter({
    name: `${PREFIX}storage_failures_total`,
    help: "Block writes a storage backend could not confirm",
    labelNames: ["backend"] as const,
    registers: [this.registry],
  });

  public readonly gapsDetected = new Counter({
    name: `${PREFIX}gaps_detected_total`,
    help: "Missing ranges found by gap detection",
    registers: [this.registry],
  });

  public readonly gapsFixed = new Counter({
    name: `${PREFIX}gaps_fixed_total`,
    help: "Gap ranges fully repaired",
    registers: [this.registry],
  });

  private readonly now: () => number;
  private readonly startedAt: number;

  /**
   * @param now Clock in milliseconds
   */
  constructor(now: () => number = Date.now) {
    this.now = now;
    this.startedAt = now();
  }

  public async snapshot(): Promise<MetricsSnapshot> {
    const apiRequests = await total(this.apiRequests);
    const apiFailures = await total(this.apiFailures);
    const blocksFetched = await total(this.blocksFetched);
    const writes = await totalsBy(this.storageWrites, "backend");
    const failures = await totalsBy(this.storageFailures, "backend");

    const storage: Record<string, StorageStats> = {};
    for (const [backend, count] of writes) {
      const failed = failures.get(backend) ?? 0;
      storage[backend] = {
        writes: count,
        failures: failed,
        successRate: successRate(count, failed),
      };
    }

    const elapsedMs = this.now() - this.startedAt;
    return {
      blocksFetched,
      apiRequests,
      apiFailures,
      apiSuccessRate: successRate(apiRequests, apiFailures),
      storage,
      gapsDetected: await total(this.gapsDetected),
      gapsFixed: await total(this.gapsFixed),
      elapsedMs,
      blocksPerSecond:
        elapsedMs > 0 ? Math.round((blocksFetched / elapsedMs) * 100000) / 100 : 0,
    };
  }
}
