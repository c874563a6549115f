import type { BlockRange } from "../types/BlockRange";
import type { BlockRecord } from "../types/BlockRecord";
import { describeError, isRetryableError } from "./errors";
import { createLogger } from "./logger";
import type { Metrics } from "./metrics";
import { createErrorRetrier, type ErrorRetrier, type Retrier } from "./retry";
import type {
  StorageBackend,
  StorageStats,
  WriteOutcome,
} from "./storageBackend";

const logger = createLogger("persister");

/**
 * Result of writing one record to a set of backends
 */
export type PersistResult = {
  height: number;
  // Outcome per backend that confirmed the write
  outcomes: Record<string, WriteOutcome>;
  // Backends that could not confirm the write
  failed: { backend: string; error: unknown }[];
  // True once every requested backend confirmed
  durable: boolean;
};

/**
 * Writes records to every enabled storage backend
 */
export class Persister {
  private readonly backends: readonly StorageBackend[];
  private readonly errorRetrier: ErrorRetrier;
  private readonly metrics: Metrics | null;

  /**
   * @param backends Enabled storage backends
   * @param retrier Retries each backend write on retryable errors
   * @param metrics Counts writes and failures per backend
   */
  constructor(
    backends: readonly StorageBackend[],
    retrier: Retrier,
    metrics: Metrics | null = null
  ) {
    if (backends.length === 0) {
      throw new Error("At least one storage backend must be enabled");
    }
    const names = new Set(backends.map(({ name }) => name));
    if (names.size !== backends.length) {
      throw new Error("Storage backend names must be unique");
    }
    this.backends = backends;
    this.errorRetrier = createErrorRetrier(retrier);
    this.metrics = metrics;
  }

  public get backendNames(): string[] {
    return this.backends.map(({ name }) => name);
  }

  /**
   * Writes a record to each backend concurrently
   * @param record Fetched record
   * @param only Names of the backends to write to, every backend by default
   */
  public async persist(
    record: BlockRecord,
    only?: readonly string[]
  ): Promise<PersistResult> {
    const targets = this.backends.filter(
      ({ name }) => only == null || only.includes(name)
    );

    const settled = await Promise.allSettled(
      targets.map((backend) =>
        this.errorRetrier.wrap(() => backend.write(record), {
          retryIf: isRetryableError,
          onFailedAttempt: (error, attempt) => {
            logger.warn(
              `${backend.name}.write(${record.height}) failed attempt ${attempt}: ${error}`
            );
          },
          onFailedLastAttempt: (error) => {
            logger.error(
              `${backend.name}.write(${record.height}): giving up: ${error}`
            );
          },
        })
      )
    );

    const result: PersistResult = {
      height: record.height,
      outcomes: {},
      failed: [],
      durable: false,
    };
    settled.forEach((outcome, idx) => {
      const { name } = targets[idx];
      this.metrics?.storageWrites.inc({ backend: name });
      if (outcome.status === "fulfilled") {
        result.outcomes[name] = outcome.value;
      } else {
        this.metrics?.storageFailures.inc({ backend: name });
        result.failed.push({ backend: name, error: outcome.reason });
      }
    });
    result.durable = result.failed.length === 0;
    return result;
  }

  /**
   * Heights stored by every backend, in ascending order
   */
  public async listDurableHeights(): Promise<number[]> {
    const [first, ...rest] = await Promise.all(
      this.backends.map((backend) => backend.listHeights())
    );
    const others = rest.map((heights) => new Set(heights));
    return first.filter((height) => others.every((set) => set.has(height)));
  }

  /**
   * Stored height count and bounds per backend
   */
  public async stats(): Promise<Record<string, StorageStats>> {
    const stats = await Promise.all(
      this.backends.map((backend) => backend.stats())
    );
    return Object.fromEntries(
      this.backends.map(({ name }, idx) => [name, stats[idx]])
    );
  }

  /**
   * Gaps between the heights each backend stores, at or below upperBound
   */
  public async detectGaps(
    upperBound: number
  ): Promise<Record<string, BlockRange[]>> {
    const gaps = await Promise.all(
      this.backends.map((backend) => backend.detectGaps(upperBound))
    );
    return Object.fromEntries(
      this.backends.map(({ name }, idx) => [name, gaps[idx]])
    );
  }

  public async connect(): Promise<void> {
    await Promise.all(this.backends.map((backend) => backend.connect()));
  }

  public async disconnect(): Promise<void> {
    const results = await Promise.allSettled(
      this.backends.map((backend) => backend.disconnect())
    );
    results.forEach((result, idx) => {
      if (result.status === "rejected") {
        logger.warn(
          `Failed to disconnect ${this.backends[idx].name}: ${describeError(result.reason)}`
        );
      }
    });
  }

  /**
   * Checks every backend
   * @returns Error messages by backend name, empty if healthy
   */
  public async healthCheck(): Promise<Record<string, string>> {
    const results = await Promise.allSettled(
      this.backends.map((backend) => backend.healthCheck())
    );
    const problems: Record<string, string> = {};
    results.forEach((result, idx) => {
      if (result.status === "rejected") {
        problems[this.backends[idx].name] = describeError(result.reason);
      }
    });
    return problems;
  }
}
