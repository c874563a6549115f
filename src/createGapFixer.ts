import { describeError } from "./modules/errors";
import type { JobQueue } from "./modules/jobQueue";
import { createLogger } from "./modules/logger";
import type { Metrics } from "./modules/metrics";
import type { BlockRange } from "./types/BlockRange";
import type { IngestContext } from "./types/IngestContext";
import { IngestStatus } from "./types/IngestOutcome";
import type { ValuesUnion } from "./types/ValuesUnion";
import { heightsInRange } from "./utils/assignRoundRobin";
import { rangeKey } from "./utils/formatRanges";
import { ingestBlock } from "./utils/ingestBlock";
import { sleep } from "./utils/sleep";

const logger = createLogger("gap-fixer");

export const GapFixStatus = {
  // Every height resolved, range acknowledged
  FIXED: "FIXED",
  // Re-enqueued with one more attempt
  RETRY: "RETRY",
  STUCK: "STUCK",
  // Stopped mid-range, returned to the queue without counting an attempt
  RELEASED: "RELEASED",
  // The lease expired and the range was reclaimed, the queue was left untouched
  LEASE_LOST: "LEASE_LOST",
} as const;

export type GapFixStatus = ValuesUnion<typeof GapFixStatus>;

export type GapFixResult = {
  range: BlockRange;
  status: GapFixStatus;
  failures: { height: number; error: string; retryable: boolean }[];
};

export type GapFixerStats = Record<GapFixStatus, number>;

export type CreateGapFixerParams = {
  queue: JobQueue;
  context: IngestContext;
  // Failed attempts tolerated before a range becomes stuck
  maxAttempts: number;
  // Base delay before a failed range is eligible again, doubled per attempt
  retryDelayMs: number;
  dequeueTimeoutMs: number;
  // Delay between fetches
  delayMs: number;
  // Stops the fixer when aborted
  signal?: AbortSignal;
  metrics?: Metrics | null;
};

/**
 * Create a gap fixer that consumes gap ranges and ingests their heights.
 * Returns processNext, drain, start and destroy callbacks.
 */
export default function createGapFixer({
  queue,
  context,
  maxAttempts,
  retryDelayMs,
  dequeueTimeoutMs,
  delayMs,
  signal,
  metrics = null,
}: CreateGapFixerParams) {
  const controller = new AbortController();
  signal?.addEventListener("abort", () => controller.abort(), { once: true });
  if (signal?.aborted) {
    controller.abort();
  }

  const isStopped = () => controller.signal.aborted;

  /**
   * Reports a lost lease in place of a result whose queue transition was rejected
   */
  async function settle(
    transition: Promise<boolean>,
    result: GapFixResult
  ): Promise<GapFixResult> {
    if (await transition) {
      return result;
    }
    logger.warn(
      `Lease on gap ${rangeKey(result.range)} was lost before ${result.status}`
    );
    return { ...result, status: GapFixStatus.LEASE_LOST };
  }

  /**
   * Dequeues one range and attempts every height in it
   * @returns The result, or null if no range became eligible in time
   */
  async function processNext(): Promise<GapFixResult | null> {
    const lease = await queue.dequeue(dequeueTimeoutMs);
    if (lease == null) {
      return null;
    }

    const range: BlockRange = {
      startBlockHeight: lease.startBlockHeight,
      endBlockHeight: lease.endBlockHeight,
    };
    const failures: GapFixResult["failures"] = [];
    logger.info(`Fixing gap ${rangeKey(range)}, attempt ${lease.attempts + 1}`);

    for (const height of heightsInRange(
      range.startBlockHeight,
      range.endBlockHeight
    )) {
      if (isStopped()) {
        logger.info(`Releasing gap ${rangeKey(range)}`);
        return settle(queue.release(lease), {
          range,
          status: GapFixStatus.RELEASED,
          failures,
        });
      }

      const outcome = await ingestBlock(height, context);
      switch (outcome.status) {
        case IngestStatus.INGESTED:
          await sleep(delayMs, controller.signal);
          break;
        case IngestStatus.ALREADY_KNOWN:
          break;
        case IngestStatus.NOT_YET_AVAILABLE:
          failures.push({
            height,
            error: "not yet available",
            retryable: true,
          });
          break;
        case IngestStatus.FAILED:
          failures.push({
            height,
            error: describeError(outcome.error),
            retryable: outcome.retryable,
          });
          await sleep(delayMs, controller.signal);
          break;
      }

      if (!(await queue.renew(lease))) {
        logger.warn(`Lease on gap ${rangeKey(range)} expired at block ${height}`);
        return { range, status: GapFixStatus.LEASE_LOST, failures };
      }
    }

    if (failures.length === 0) {
      const result = await settle(queue.ack(lease), {
        range,
        status: GapFixStatus.FIXED,
        failures,
      });
      if (result.status === GapFixStatus.FIXED) {
        metrics?.gapsFixed.inc();
        logger.info(`Fixed gap ${rangeKey(range)}`);
      }
      return result;
    }

    const reason = failures
      .map(({ height, error }) => `${height}: ${error}`)
      .join("; ");

    const attempts = lease.attempts + 1;
    if (failures.some(({ retryable }) => !retryable) || attempts > maxAttempts) {
      logger.error(
        `Gap ${rangeKey(range)} is stuck after ${attempts} attempts: ${reason}`
      );
      return settle(queue.markStuck(lease, reason), {
        range,
        status: GapFixStatus.STUCK,
        failures,
      });
    }

    const delay = retryDelayMs * Math.pow(2, lease.attempts);
    logger.warn(
      `Gap ${rangeKey(range)} failed attempt ${attempts}, retrying in ${delay}ms: ${reason}`
    );
    return settle(queue.retry(lease, delay, reason), {
      range,
      status: GapFixStatus.RETRY,
      failures,
    });
  }

  function emptyStats(): GapFixerStats {
    return { FIXED: 0, RETRY: 0, STUCK: 0, RELEASED: 0, LEASE_LOST: 0 };
  }

  /**
   * Processes ranges until the queue holds no pending or in-flight range, or the fixer is stopped
   */
  async function drain(): Promise<GapFixerStats> {
    const stats = emptyStats();
    while (!isStopped() && (await queue.listOpen()).length > 0) {
      const result = await processNext();
      if (result != null) {
        stats[result.status] += 1;
      }
    }
    return stats;
  }

  /**
   * Processes ranges until destroyed
   */
  async function start(): Promise<GapFixerStats> {
    logger.info("Starting gap fixer");
    const stats = emptyStats();
    while (!isStopped()) {
      const result = await processNext();
      if (result != null) {
        stats[result.status] += 1;
      }
    }
    logger.info("Gap fixer stopped");
    return stats;
  }

  function destroy() {
    controller.abort();
  }

  return { processNext, drain, start, destroy };
}
