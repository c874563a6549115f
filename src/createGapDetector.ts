import { createLogger } from "./modules/logger";
import type { JobQueue } from "./modules/jobQueue";
import type { Metrics } from "./modules/metrics";
import type { SequenceStore } from "./modules/sequenceStore";
import type { BlockRange } from "./types/BlockRange";
import { formatRanges } from "./utils/formatRanges";
import { sleep } from "./utils/sleep";
import { splitRanges } from "./utils/splitRange";

const logger = createLogger("gap-detector");

export type GapDetectionReport = {
  gapsFound: number;
  enqueued: number;
  // Ranges already held by the queue, or beyond the per-pass limit
  skipped: number;
  // Ranges offered to the queue, after splitting long gaps
  ranges: BlockRange[];
};

export type CreateGapDetectorParams = {
  store: SequenceStore;
  queue: JobQueue;
  // Ranges enqueued per pass at most
  maxRangesPerPass: number;
  // Heights per range at most, longer gaps are split
  maxRangeSize: number;
  // Delay between passes when started
  intervalMs: number;
  metrics?: Metrics | null;
};

/**
 * Create a gap detector that schedules repair of missing heights below the
 * highest known height. Returns runOnce, start and destroy callbacks.
 */
export default function createGapDetector({
  store,
  queue,
  maxRangesPerPass,
  maxRangeSize,
  intervalMs,
  metrics = null,
}: CreateGapDetectorParams) {
  const controller = new AbortController();

  async function runOnce(): Promise<GapDetectionReport> {
    const upperBound = await store.maxHeight();
    if (upperBound == null) {
      return { gapsFound: 0, enqueued: 0, skipped: 0, ranges: [] };
    }

    const gaps = await store.detectGaps(upperBound);
    metrics?.gapsDetected.inc(gaps.length);
    const chunks = splitRanges({
      maxBlocksPerRange: maxRangeSize,
      blockRanges: gaps,
    });
    const ranges = chunks.slice(0, maxRangesPerPass);

    let enqueued = 0;
    for (const range of ranges) {
      if (await queue.enqueue(range)) {
        enqueued += 1;
      }
    }

    if (gaps.length > 0) {
      logger.info(
        `Found ${gaps.length} gaps below ${upperBound}, enqueued ${enqueued}: ${formatRanges(gaps)}`
      );
    } else {
      logger.debug(`No gaps below ${upperBound}`);
    }

    return {
      gapsFound: gaps.length,
      enqueued,
      skipped: chunks.length - enqueued,
      ranges,
    };
  }

  /**
   * Runs detection passes until destroyed
   */
  async function start() {
    logger.info(`Starting gap detection every ${intervalMs}ms`);
    while (!controller.signal.aborted) {
      await runOnce();
      await sleep(intervalMs, controller.signal);
    }
    logger.info("Gap detection stopped");
  }

  function destroy() {
    controller.abort();
  }

  return { runOnce, start, destroy };
}
