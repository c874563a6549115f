import createOrchestrator, { isSuccessfulRun } from "../src/createOrchestrator";
import { MemoryJobQueue } from "../src/modules/memoryJobQueue";
import { MemorySequenceStore } from "../src/modules/memorySequenceStore";
import { Metrics } from "../src/modules/metrics";
import { Persister } from "../src/modules/persister";
import { createTestConfig, FakeBackend, FakeFetcher, noRetrier } from "./utils";

function createTest(
  tip = 100,
  heights: number[] = [],
  overrides: Record<string, string> = {}
) {
  const config = createTestConfig(overrides);
  const fetcher = new FakeFetcher(tip);
  const backend = new FakeBackend("file");
  const store = new MemorySequenceStore(config.genesisHeight, heights);
  const queue = new MemoryJobQueue(config.gaps.leaseMs, 1);
  const metrics = new Metrics();
  const persister = new Persister([backend], noRetrier, metrics);
  const create = () =>
    createOrchestrator({
      config,
      store,
      queue,
      persister,
      createFetcher: () => fetcher,
      metrics,
    });
  return { fetcher, backend, store, queue, create };
}

test.each([1, 8])("Ingest a batch with %i workers", async (numWorkers) => {
  const { fetcher, backend, store, create } = createTest();
  fetcher.transientFailures.set(5, 1);

  const summary = await create().run({ batchSize: 20, numWorkers });

  expect(summary).toMatchObject({
    assigned: 20,
    attempted: 20,
    succeeded: 19,
    alreadyKnown: 0,
    failed: [{ height: 5, error: "block 5: HTTP 503" }],
    notYetAvailable: [],
    notAttempted: [],
    unresolvedHeights: [],
    gaps: {
      found: 1,
      enqueued: 1,
      fixed: 1,
      stuck: 0,
      open: [],
      remaining: [],
    },
    frontier: 19,
    stopped: false,
  });
  expect(summary.metrics).toMatchObject({
    gapsDetected: 1,
    gapsFixed: 1,
    storage: { file: { writes: 20, failures: 0, successRate: 100 } },
  });
  expect(isSuccessfulRun(summary)).toBe(true);
  expect(store.snapshot()).toEqual([{ startBlockHeight: 0, endBlockHeight: 19 }]);
  expect(await backend.listHeights()).toHaveLength(20);
  expect(fetcher.disconnected).toBe(true);
});

test("Start one past the frontier by default", async () => {
  const { fetcher, store, create } = createTest();
  for (const height of [0, 1, 2]) {
    await store.record(height);
  }

  const summary = await create().run({ batchSize: 3, numWorkers: 2 });

  expect(fetcher.fetchCalls.sort((a, b) => a - b)).toEqual([3, 4, 5]);
  expect(summary.frontier).toBe(5);
});

test("Report heights beyond the tip", async () => {
  const { create } = createTest(5);

  const summary = await create().run({
    startHeight: 0,
    batchSize: 10,
    numWorkers: 3,
    skipGapReconciliation: true,
  });

  expect(summary.notYetAvailable).toEqual([6, 7, 8, 9]);
  expect(summary.unresolvedHeights).toEqual([6, 7, 8, 9]);
  expect(summary.gaps).toEqual({
    found: 0,
    enqueued: 0,
    fixed: 0,
    stuck: 0,
    open: [],
    remaining: [],
  });
  expect(isSuccessfulRun(summary)).toBe(false);
});

test("Report permanently failing heights as stuck", async () => {
  const { fetcher, queue, create } = createTest();
  fetcher.fatalHeights.add(4);

  const summary = await create().run({ batchSize: 10, numWorkers: 2 });

  expect(summary.unresolvedHeights).toEqual([4]);
  expect(summary.gaps).toEqual({
    found: 1,
    enqueued: 1,
    fixed: 0,
    stuck: 1,
    open: [],
    remaining: [{ startBlockHeight: 4, endBlockHeight: 4 }],
  });
  expect(summary.frontier).toBe(3);
  expect(await queue.listStuck()).toMatchObject([
    { startBlockHeight: 4, endBlockHeight: 4, lastError: "4: block 4 is pruned" },
  ]);
  expect(isSuccessfulRun(summary)).toBe(false);
});

test("Resume a stopped run from its unresolved heights", async () => {
  const { fetcher, store, create } = createTest();
  const orchestrator = create();
  fetcher.onFetch = (height) => {
    if (height === 3) {
      orchestrator.stop();
    }
  };

  const stopped = await orchestrator.run({
    startHeight: 0,
    batchSize: 10,
    numWorkers: 1,
  });

  expect(stopped).toMatchObject({
    attempted: 4,
    succeeded: 4,
    notAttempted: [4, 5, 6, 7, 8, 9],
    unresolvedHeights: [4, 5, 6, 7, 8, 9],
    gaps: { found: 0, enqueued: 0, fixed: 0, stuck: 0 },
    frontier: 3,
    stopped: true,
  });

  fetcher.onFetch = null;
  const fetchedBefore = fetcher.fetchCalls.length;
  const resumed = await create().run({
    startHeight: 0,
    batchSize: 10,
    numWorkers: 1,
  });

  expect(fetcher.fetchCalls.slice(fetchedBefore)).toEqual([4, 5, 6, 7, 8, 9]);
  expect(resumed).toMatchObject({
    succeeded: 6,
    alreadyKnown: 4,
    unresolvedHeights: [],
    stopped: false,
  });
  expect(store.snapshot()).toEqual([{ startBlockHeight: 0, endBlockHeight: 9 }]);
});

test("Fail a run stopped while gaps are being fixed", async () => {
  const { fetcher, create } = createTest(100, [0, 5]);
  const orchestrator = create();
  fetcher.onFetch = (height) => {
    if (height === 2) {
      orchestrator.stop();
    }
  };

  const summary = await orchestrator.run({
    startHeight: 6,
    batchSize: 2,
    numWorkers: 1,
  });

  expect(summary.unresolvedHeights).toEqual([]);
  expect(summary.gaps).toEqual({
    found: 1,
    enqueued: 1,
    fixed: 0,
    stuck: 0,
    open: [{ startBlockHeight: 1, endBlockHeight: 4 }],
    remaining: [{ startBlockHeight: 3, endBlockHeight: 4 }],
  });
  expect(summary.stopped).toBe(true);
  expect(isSuccessfulRun(summary)).toBe(false);
});

test("Fail a run that left gaps beyond the per-pass limit", async () => {
  const { create } = createTest(100, [0, 2, 4], { MAX_GAPS_TO_FIX: "1" });

  const summary = await create().run({
    startHeight: 5,
    batchSize: 1,
    numWorkers: 1,
  });

  expect(summary.unresolvedHeights).toEqual([]);
  expect(summary.gaps).toEqual({
    found: 2,
    enqueued: 1,
    fixed: 1,
    stuck: 0,
    open: [],
    remaining: [{ startBlockHeight: 3, endBlockHeight: 3 }],
  });
  expect(isSuccessfulRun(summary)).toBe(false);
});
