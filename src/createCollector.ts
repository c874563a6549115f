import { describeError } from "./modules/errors";
import { createLogger } from "./modules/logger";
import type { IngestContext } from "./types/IngestContext";
import { IngestStatus } from "./types/IngestOutcome";
import { ingestBlock } from "./utils/ingestBlock";
import { sleep } from "./utils/sleep";

const logger = createLogger("collector");

export type CollectorReport = {
  collected: number;
  alreadyKnown: number;
  // Heights left behind for the gap detector
  failed: { height: number; error: string }[];
  // Next height the collector would have fetched
  nextHeight: number;
};

export type CreateCollectorParams = {
  context: IngestContext;
  // First height to collect. Defaults to one past the highest known height, else the source's tip.
  startHeight?: number;
  // Last height to collect. Collects until destroyed when unset.
  targetHeight?: number;
  // Delay before asking again for a height beyond the tip
  pollIntervalMs: number;
  // Delay between fetches
  delayMs: number;
};

/**
 * Create a collector that advances the frontier by ingesting new heights in order.
 * Returns a start and destroy callback.
 */
export default function createCollector({
  context,
  startHeight,
  targetHeight,
  pollIntervalMs,
  delayMs,
}: CreateCollectorParams) {
  const controller = new AbortController();

  async function resolveStartHeight(): Promise<number> {
    if (startHeight != null) {
      return startHeight;
    }
    const maxHeight = await context.store.maxHeight();
    if (maxHeight != null) {
      return maxHeight + 1;
    }
    return context.fetcher.getLatestHeight();
  }

  async function start(): Promise<CollectorReport> {
    let cursor = await resolveStartHeight();
    const report: CollectorReport = {
      collected: 0,
      alreadyKnown: 0,
      failed: [],
      nextHeight: cursor,
    };
    logger.info(`Collecting from block ${cursor}`);

    while (
      !controller.signal.aborted &&
      (targetHeight == null || cursor <= targetHeight)
    ) {
      const outcome = await ingestBlock(cursor, context);

      switch (outcome.status) {
        case IngestStatus.INGESTED:
          report.collected += 1;
          cursor += 1;
          await sleep(delayMs, controller.signal);
          break;
        case IngestStatus.ALREADY_KNOWN:
          report.alreadyKnown += 1;
          cursor += 1;
          break;
        case IngestStatus.NOT_YET_AVAILABLE:
          logger.debug(`Block ${cursor} not yet available`);
          await sleep(pollIntervalMs, controller.signal);
          break;
        case IngestStatus.FAILED:
          logger.error(
            `Skipping block ${cursor} for gap repair: ${describeError(outcome.error)}`
          );
          report.failed.push({
            height: cursor,
            error: describeError(outcome.error),
          });
          cursor += 1;
          await sleep(delayMs, controller.signal);
          break;
      }
      report.nextHeight = cursor;
    }

    logger.info(
      `Collector stopped at block ${cursor}: ${report.collected} collected, ${report.failed.length} failed`
    );
    return report;
  }

  function destroy() {
    controller.abort();
  }

  return { start, destroy };
}
