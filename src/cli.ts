#!/usr/bin/env node
import "dotenv/config";
import { Command, InvalidArgumentError } from "commander";
import createCollector from "./createCollector";
import createGapDetector from "./createGapDetector";
import createGapFixer from "./createGapFixer";
import createOrchestrator, { isSuccessfulRun } from "./createOrchestrator";
import {
  checkHealth,
  createBatchRuntime,
  createContinuousRuntime,
  createStorageReport,
  type Runtime,
} from "./createRuntime";
import { loadConfig, type IngestConfig } from "./modules/config";
import { BrokerUnavailableError, describeError } from "./modules/errors";
import { FileBackend } from "./modules/fileBackend";
import logger, { setMinLogLevel } from "./modules/logger";
import { PostgresBackend } from "./modules/postgresBackend";
import { createConfiguredRetrier } from "./modules/retry";
import type { IngestContext } from "./types/IngestContext";
import { formatRanges, rangeKey } from "./utils/formatRanges";
import parseStringToInt from "./utils/parseStringToInt";

const EXIT_OK = 0;
// Some heights or gap ranges were left unresolved
const EXIT_UNRESOLVED = 1;
// Startup failure or broker loss
const EXIT_FATAL = 2;

function parseHeight(value: string): number {
  const height = parseStringToInt(value);
  if (height == null) {
    throw new InvalidArgumentError("Not a non-negative integer.");
  }
  return height;
}

function parsePositiveInt(value: string): number {
  const parsed = parseStringToInt(value);
  if (parsed == null || parsed < 1) {
    throw new InvalidArgumentError("Not a positive integer.");
  }
  return parsed;
}

function readConfig(): IngestConfig {
  const config = loadConfig();
  setMinLogLevel(config.logLevel);
  return config;
}

/**
 * Stops work on SIGINT or SIGTERM and forces an exit if in-flight work outlives the timeout
 */
function stopOnSignal(stop: () => void, shutdownTimeoutMs: number) {
  const handler = (signal: NodeJS.Signals) => {
    logger.warn(`Received ${signal}, finishing in-flight work...`);
    stop();
    setTimeout(() => {
      logger.error(`Shutdown did not finish in ${shutdownTimeoutMs}ms, exiting`);
      process.exit(EXIT_UNRESOLVED);
    }, shutdownTimeoutMs).unref();
  };
  process.once("SIGINT", handler);
  process.once("SIGTERM", handler);
}

/**
 * Wires a runtime, runs the command and sets the exit code
 */
async function runCommand(
  createRuntime: (config: IngestConfig) => Promise<Runtime>,
  command: (runtime: Runtime) => Promise<number>
) {
  let runtime: Runtime | null = null;
  try {
    runtime = await createRuntime(readConfig());
    process.exitCode = await command(runtime);
  } catch (error) {
    const kind =
      error instanceof BrokerUnavailableError ? "Broker unavailable" : "Fatal";
    logger.fatal(`${kind}: ${describeError(error)}`);
    process.exitCode = EXIT_FATAL;
  } finally {
    await runtime?.close();
  }
}

async function logMetrics(runtime: Runtime) {
  logger.info({ metrics: await runtime.metrics.snapshot() }, "Metrics summary");
}

function createContext(runtime: Runtime): IngestContext {
  return {
    fetcher: runtime.createFetcher(),
    persister: runtime.persister,
    store: runtime.store,
    storageRetryRounds: runtime.config.storage.retryRounds,
  };
}

async function checkRuntimeHealth(runtime: Runtime) {
  const fetcher = runtime.createFetcher();
  try {
    await checkHealth(runtime.persister, fetcher);
  } finally {
    await fetcher.disconnect();
  }
}

const program = new Command();

program
  .name("block-ingest")
  .description(
    "Ingest sequentially numbered blocks from a CometBFT RPC node and repair gaps"
  );

program
  .command("batch", { isDefault: true })
  .description("Ingest one batch of blocks past the frontier, then repair gaps")
  .option("--batch-size <n>", "Number of blocks to ingest", parsePositiveInt)
  .option("--workers <n>", "Number of concurrent workers", parsePositiveInt)
  .option("--start-height <height>", "First height of the batch", parseHeight)
  .option("--skip-gaps", "Skip the gap reconciliation pass", false)
  .action(
    async (options: {
      batchSize?: number;
      workers?: number;
      startHeight?: number;
      skipGaps: boolean;
    }) => {
      await runCommand(createBatchRuntime, async (runtime) => {
        await checkRuntimeHealth(runtime);
        const orchestrator = createOrchestrator(runtime);
        stopOnSignal(orchestrator.stop, runtime.config.batch.shutdownTimeoutMs);

        const summary = await orchestrator.run({
          startHeight: options.startHeight,
          batchSize: options.batchSize,
          numWorkers: options.workers,
          skipGapReconciliation: options.skipGaps || undefined,
        });
        logger.info({ summary }, "Run summary");
        return isSuccessfulRun(summary) ? EXIT_OK : EXIT_UNRESOLVED;
      });
    }
  );

program
  .command("collect")
  .description("Continuously ingest new blocks as the source produces them")
  .option("--start-height <height>", "First height to collect", parseHeight)
  .option("--target-height <height>", "Stop after this height", parseHeight)
  .action(async (options: { startHeight?: number; targetHeight?: number }) => {
    await runCommand(createContinuousRuntime, async (runtime) => {
      await checkRuntimeHealth(runtime);
      const context = createContext(runtime);
      const collector = createCollector({
        context,
        startHeight: options.startHeight,
        targetHeight: options.targetHeight,
        pollIntervalMs: runtime.config.collector.pollIntervalMs,
        delayMs: runtime.config.rpc.delayMs,
      });
      stopOnSignal(collector.destroy, runtime.config.batch.shutdownTimeoutMs);

      try {
        const report = await collector.start();
        logger.info({ report }, "Collector report");
      } finally {
        await context.fetcher.disconnect();
      }
      await logMetrics(runtime);
      return EXIT_OK;
    });
  });

program
  .command("detect-gaps")
  .description("Scan for missing heights and enqueue them for repair")
  .option("--once", "Run a single detection pass", false)
  .action(async (options: { once: boolean }) => {
    await runCommand(createContinuousRuntime, async (runtime) => {
      const { config, store, queue, metrics } = runtime;
      const detector = createGapDetector({
        store,
        queue,
        maxRangesPerPass: config.gaps.maxRangesPerPass,
        maxRangeSize: config.gaps.maxRangeSize,
        intervalMs: config.gaps.detectionIntervalMs,
        metrics,
      });

      if (options.once) {
        const report = await detector.runOnce();
        logger.info({ report }, "Gap detection report");
        return EXIT_OK;
      }

      stopOnSignal(detector.destroy, config.batch.shutdownTimeoutMs);
      await detector.start();
      await logMetrics(runtime);
      return EXIT_OK;
    });
  });

program
  .command("fix-gaps")
  .description("Consume gap ranges and ingest their heights")
  .option("--once", "Process a single gap range", false)
  .action(async (options: { once: boolean }) => {
    await runCommand(createContinuousRuntime, async (runtime) => {
      await checkRuntimeHealth(runtime);
      const { config, queue } = runtime;
      const context = createContext(runtime);
      const fixer = createGapFixer({
        queue,
        context,
        maxAttempts: config.gaps.maxAttempts,
        retryDelayMs: config.gaps.retryDelayMs,
        dequeueTimeoutMs: config.gaps.dequeueTimeoutMs,
        delayMs: config.rpc.delayMs,
        metrics: runtime.metrics,
      });
      stopOnSignal(fixer.destroy, config.batch.shutdownTimeoutMs);

      try {
        if (options.once) {
          const result = await fixer.processNext();
          logger.info({ result }, "Gap fix result");
        } else {
          const stats = await fixer.start();
          logger.info({ stats }, "Gap fixer stats");
        }
      } finally {
        await context.fetcher.disconnect();
      }
      await logMetrics(runtime);
      return (await queue.listStuck()).length > 0 ? EXIT_UNRESOLVED : EXIT_OK;
    });
  });

program
  .command("stuck")
  .description("List gap ranges held for operator attention")
  .action(async () => {
    await runCommand(createContinuousRuntime, async ({ queue }) => {
      const stuck = await queue.listStuck();
      for (const range of stuck) {
        process.stdout.write(
          `${rangeKey(range)}\tattempts=${range.attempts}\t${range.lastError ?? ""}\n`
        );
      }
      return EXIT_OK;
    });
  });

program
  .command("requeue")
  .description("Move a stuck gap range back to pending")
  .argument("<start>", "First height of the range", parseHeight)
  .argument("<end>", "Last height of the range", parseHeight)
  .action(async (startBlockHeight: number, endBlockHeight: number) => {
    await runCommand(createContinuousRuntime, async ({ queue }) => {
      const range = { startBlockHeight, endBlockHeight };
      if (!(await queue.requeueStuck(range))) {
        logger.error(`Gap ${rangeKey(range)} is not stuck`);
        return EXIT_UNRESOLVED;
      }
      logger.info(`Requeued gap ${rangeKey(range)}`);
      return EXIT_OK;
    });
  });

program
  .command("stats")
  .description("Show stored block counts, bounds and gaps per backend")
  .action(async () => {
    await runCommand(createBatchRuntime, async ({ persister }) => {
      const report = await createStorageReport(persister);
      for (const [backend, { count, earliest, latest, gaps }] of Object.entries(
        report
      )) {
        process.stdout.write(
          `${backend}\tcount=${count}\tearliest=${earliest ?? "-"}\tlatest=${latest ?? "-"}\tgaps=${gaps.length}\t${formatRanges(gaps)}\n`
        );
      }
      return EXIT_OK;
    });
  });

program
  .command("cleanup-files")
  .description(
    "Delete stale temporary files and corrupt block documents from the data directory"
  )
  .option(
    "--tmp-age <seconds>",
    "Age past which a temporary file is stale",
    parsePositiveInt,
    3600
  )
  .action(async (options: { tmpAge: number }) => {
    const config = readConfig();
    const backend = new FileBackend(config.storage.file);
    try {
      const report = await backend.cleanup(options.tmpAge * 1000);
      if (report.removedHeights.length > 0) {
        logger.warn(
          `Removed corrupt blocks ${report.removedHeights.join(", ")}, run a batch to fetch them again`
        );
      }
    } catch (error) {
      logger.fatal(`File cleanup failed: ${describeError(error)}`);
      process.exitCode = EXIT_FATAL;
    }
  });

program
  .command("setup")
  .description("Apply the PostgreSQL schema")
  .action(async () => {
    const config = readConfig();
    const backend = PostgresBackend.fromConfig(
      config.storage.db,
      createConfiguredRetrier(config.retry)
    );
    try {
      await backend.connect();
      await backend.setup();
    } catch (error) {
      logger.fatal(`Schema setup failed: ${describeError(error)}`);
      process.exitCode = EXIT_FATAL;
    } finally {
      await backend.disconnect();
    }
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  logger.fatal(describeError(error));
  process.exitCode = EXIT_FATAL;
});
