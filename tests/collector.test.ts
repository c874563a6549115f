import createCollector from "../src/createCollector";
import { MemorySequenceStore } from "../src/modules/memorySequenceStore";
import { Persister } from "../src/modules/persister";
import { FakeBackend, FakeFetcher, noRetrier } from "./utils";

function createContext(heights: number[], tip = 100) {
  const fetcher = new FakeFetcher(tip);
  const store = new MemorySequenceStore(0, heights);
  return {
    fetcher,
    store,
    context: {
      fetcher,
      persister: new Persister([new FakeBackend("file")], noRetrier),
      store,
      storageRetryRounds: 0,
    },
  };
}

test("Collect from one past the highest known height", async () => {
  const { fetcher, store, context } = createContext([0, 1, 2]);
  const collector = createCollector({
    context,
    targetHeight: 6,
    pollIntervalMs: 1,
    delayMs: 0,
  });

  expect(await collector.start()).toEqual({
    collected: 4,
    alreadyKnown: 0,
    failed: [],
    nextHeight: 7,
  });
  expect(fetcher.fetchCalls).toEqual([3, 4, 5, 6]);
  expect(await store.frontier()).toBe(6);
});

test("Leave failed heights behind for gap repair", async () => {
  const { fetcher, store, context } = createContext([0]);
  fetcher.fatalHeights.add(2);
  const collector = createCollector({
    context,
    startHeight: 1,
    targetHeight: 3,
    pollIntervalMs: 1,
    delayMs: 0,
  });

  expect(await collector.start()).toEqual({
    collected: 2,
    alreadyKnown: 0,
    failed: [{ height: 2, error: "block 2 is pruned" }],
    nextHeight: 4,
  });
  expect(await store.detectGaps(3)).toEqual([
    { startBlockHeight: 2, endBlockHeight: 2 },
  ]);
});

test("Count known heights without fetching them", async () => {
  const { fetcher, context } = createContext([0, 2]);
  const collector = createCollector({
    context,
    startHeight: 1,
    targetHeight: 3,
    pollIntervalMs: 1,
    delayMs: 0,
  });

  expect(await collector.start()).toMatchObject({
    collected: 2,
    alreadyKnown: 1,
  });
  expect(fetcher.fetchCalls).toEqual([1, 3]);
});

test("Start at the tip and wait for new blocks", async () => {
  const { fetcher, context } = createContext([], 50);
  let tipChecks = 0;
  fetcher.onFetch = (height) => {
    if (height === 51 && tipChecks++ === 1) {
      fetcher.tip = 51;
    }
  };
  const collector = createCollector({
    context,
    targetHeight: 51,
    pollIntervalMs: 1,
    delayMs: 0,
  });

  expect(await collector.start()).toMatchObject({ collected: 2, nextHeight: 52 });
  expect(fetcher.fetchCalls).toEqual([50, 51, 51]);
});

test("Stop when destroyed", async () => {
  const { context, fetcher } = createContext([0]);
  const collector = createCollector({
    context,
    pollIntervalMs: 1,
    delayMs: 0,
  });
  fetcher.onFetch = (height) => {
    if (height === 3) {
      collector.destroy();
    }
  };

  expect(await collector.start()).toEqual({
    collected: 3,
    alreadyKnown: 0,
    failed: [],
    nextHeight: 4,
  });
});
