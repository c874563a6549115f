import type { CreateFetcherFunction } from "./clients/fetcher";
import createGapDetector from "./createGapDetector";
import createGapFixer from "./createGapFixer";
import type { IngestConfig } from "./modules/config";
import { describeError } from "./modules/errors";
import type { JobQueue } from "./modules/jobQueue";
import { createLogger } from "./modules/logger";
import type { Metrics } from "./modules/metrics";
import type { Persister } from "./modules/persister";
import type { SequenceStore } from "./modules/sequenceStore";
import { IngestStatus } from "./types/IngestOutcome";
import type { RunSummary } from "./types/RunSummary";
import { assignRoundRobin, heightsInRange } from "./utils/assignRoundRobin";
import { formatRanges, heightsToRanges } from "./utils/formatRanges";
import { ingestBlock } from "./utils/ingestBlock";
import { sleep } from "./utils/sleep";

const logger = createLogger("orchestrator");

export type CreateOrchestratorParams = {
  config: IngestConfig;
  store: SequenceStore;
  queue: JobQueue;
  persister: Persister;
  // Called once per worker, and once for the gap pass
  createFetcher: CreateFetcherFunction;
  // Reported in the summary, and fed by the gap pass
  metrics?: Metrics | null;
};

export type RunOptions = {
  // First height of the batch, one past the frontier by default
  startHeight?: number;
  batchSize?: number;
  numWorkers?: number;
  skipGapReconciliation?: boolean;
};

/**
 * True if every assigned height resolved and reconciliation left no gap behind
 */
export const isSuccessfulRun = ({ unresolvedHeights, gaps }: RunSummary) =>
  unresolvedHeights.length === 0 &&
  gaps.stuck === 0 &&
  gaps.open.length === 0 &&
  gaps.remaining.length === 0;

/**
 * Create a batch orchestrator that ingests a range of heights with a pool of workers,
 * then reconciles gaps once. Returns a run and stop callback.
 */
export default function createOrchestrator({
  config,
  store,
  queue,
  persister,
  createFetcher,
  metrics = null,
}: CreateOrchestratorParams) {
  const controller = new AbortController();
  const { signal } = controller;

  async function run({
    startHeight,
    batchSize = config.batch.batchSize,
    numWorkers = config.batch.numWorkers,
    skipGapReconciliation = !config.batch.runGapReconciliation,
  }: RunOptions = {}): Promise<RunSummary> {
    const startTime = Date.now();
    const firstHeight = startHeight ?? (await store.frontier()) + 1;
    const heights = heightsInRange(firstHeight, firstHeight + batchSize - 1);
    const assignments = assignRoundRobin(heights, numWorkers);

    logger.info(
      `Ingesting blocks ${firstHeight}-${firstHeight + batchSize - 1} with ${assignments.length} workers`
    );

    const attempted = new Set<number>();
    const failed: RunSummary["failed"] = [];
    const notYetAvailable: number[] = [];
    let succeeded = 0;
    let alreadyKnown = 0;

    async function runWorker(workerHeights: number[], workerId: number) {
      const fetcher = createFetcher();
      try {
        for (const height of workerHeights) {
          if (signal.aborted) {
            break;
          }
          attempted.add(height);

          const outcome = await ingestBlock(height, {
            fetcher,
            persister,
            store,
            storageRetryRounds: config.storage.retryRounds,
          });

          switch (outcome.status) {
            case IngestStatus.INGESTED:
              succeeded += 1;
              break;
            case IngestStatus.ALREADY_KNOWN:
              alreadyKnown += 1;
              continue;
            case IngestStatus.NOT_YET_AVAILABLE:
              notYetAvailable.push(height);
              break;
            case IngestStatus.FAILED:
              logger.error(
                `Worker ${workerId} failed block ${height}: ${describeError(outcome.error)}`
              );
              failed.push({ height, error: describeError(outcome.error) });
              break;
          }
          await sleep(config.rpc.delayMs, signal);
        }
      } finally {
        await fetcher.disconnect();
      }
    }

    await Promise.all(assignments.map(runWorker));

    const gaps: RunSummary["gaps"] = {
      found: 0,
      enqueued: 0,
      fixed: 0,
      stuck: 0,
      open: [],
      remaining: [],
    };
    if (!skipGapReconciliation && !signal.aborted) {
      const fetcher = createFetcher();
      try {
        const detector = createGapDetector({
          store,
          queue,
          maxRangesPerPass: config.gaps.maxRangesPerPass,
          maxRangeSize: config.gaps.maxRangeSize,
          intervalMs: config.gaps.detectionIntervalMs,
          metrics,
        });
        const report = await detector.runOnce();
        gaps.found = report.gapsFound;
        gaps.enqueued = report.enqueued;

        const fixer = createGapFixer({
          queue,
          context: {
            fetcher,
            persister,
            store,
            storageRetryRounds: config.storage.retryRounds,
          },
          maxAttempts: config.gaps.maxAttempts,
          retryDelayMs: config.gaps.retryDelayMs,
          dequeueTimeoutMs: config.gaps.dequeueTimeoutMs,
          delayMs: config.rpc.delayMs,
          signal,
          metrics,
        });
        const stats = await fixer.drain();
        gaps.fixed = stats.FIXED;
      } finally {
        await fetcher.disconnect();
      }
    }
    gaps.stuck = (await queue.listStuck()).length;
    if (!skipGapReconciliation) {
      gaps.open = (await queue.listOpen()).map(
        ({ startBlockHeight, endBlockHeight }) => ({
          startBlockHeight,
          endBlockHeight,
        })
      );
      const maxHeight = await store.maxHeight();
      gaps.remaining =
        maxHeight == null ? [] : await store.detectGaps(maxHeight);
    }

    const unresolvedHeights: number[] = [];
    for (const height of heights) {
      if (!(await store.has(height))) {
        unresolvedHeights.push(height);
      }
    }

    const elapsedMs = Date.now() - startTime;
    const summary: RunSummary = {
      assigned: heights.length,
      attempted: attempted.size,
      succeeded,
      alreadyKnown,
      failed: failed.sort((a, b) => a.height - b.height),
      notYetAvailable: notYetAvailable.sort((a, b) => a - b),
      notAttempted: heights.filter((height) => !attempted.has(height)),
      unresolvedHeights,
      gaps,
      frontier: await store.frontier(),
      elapsedMs,
      throughput: elapsedMs > 0 ? (succeeded * 1000) / elapsedMs : 0,
      stopped: signal.aborted,
      metrics: metrics == null ? null : await metrics.snapshot(),
    };

    logger.info(
      `Batch done in ${elapsedMs}ms: ${succeeded} ingested, ${alreadyKnown} already known, ${failed.length} failed, ${gaps.fixed}/${gaps.found} gaps fixed, frontier ${summary.frontier}`
    );
    if (unresolvedHeights.length > 0) {
      logger.warn(
        `Unresolved blocks: ${formatRanges(heightsToRanges(unresolvedHeights))}`
      );
    }
    if (gaps.remaining.length > 0) {
      logger.warn(`Gaps left after reconciliation: ${formatRanges(gaps.remaining)}`);
    }
    return summary;
  }

  /**
   * Stops assigning heights and dequeuing gaps. In-flight blocks finish and run resolves with a summary.
   */
  function stop() {
    controller.abort();
  }

  return { run, stop };
}
