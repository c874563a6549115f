import createGapDetector from "../src/createGapDetector";
import createGapFixer, { GapFixStatus } from "../src/createGapFixer";
import { MemoryJobQueue } from "../src/modules/memoryJobQueue";
import { MemorySequenceStore } from "../src/modules/memorySequenceStore";
import { Persister } from "../src/modules/persister";
import { GapStatus } from "../src/types/BlockRange";
import { FakeBackend, FakeFetcher, noRetrier } from "./utils";

const range = (startBlockHeight: number, endBlockHeight: number) => ({
  startBlockHeight,
  endBlockHeight,
});

function createTest(heights: number[], signal?: AbortSignal) {
  const fetcher = new FakeFetcher(100);
  const backend = new FakeBackend("file");
  const store = new MemorySequenceStore(0, heights);
  const queue = new MemoryJobQueue(60000, 1);
  const fixer = createGapFixer({
    queue,
    context: {
      fetcher,
      persister: new Persister([backend], noRetrier),
      store,
      storageRetryRounds: 0,
    },
    maxAttempts: 2,
    retryDelayMs: 0,
    dequeueTimeoutMs: 20,
    delayMs: 0,
    signal,
  });
  return { fetcher, store, queue, fixer };
}

test("Fix a gap and acknowledge it", async () => {
  const { fetcher, store, queue, fixer } = createTest([0, 1, 5]);
  await queue.enqueue(range(2, 4));

  expect(await fixer.processNext()).toEqual({
    range: range(2, 4),
    status: GapFixStatus.FIXED,
    failures: [],
  });
  expect(fetcher.fetchCalls).toEqual([2, 3, 4]);
  expect(await store.frontier()).toBe(5);
  expect(await queue.size()).toBe(0);
});

test("Return null when nothing is queued", async () => {
  const { fixer } = createTest([0]);
  expect(await fixer.processNext()).toBeNull();
});

test("Retry a failing range until it becomes stuck", async () => {
  const { fetcher, store, queue, fixer } = createTest([0, 1, 5]);
  fetcher.transientFailures.set(3, 10);
  await queue.enqueue(range(2, 4));

  expect(await fixer.drain()).toEqual({
    FIXED: 0,
    RETRY: 2,
    STUCK: 1,
    RELEASED: 0,
    LEASE_LOST: 0,
  });
  // Heights resolved on the first attempt are never fetched again
  expect(fetcher.fetchCalls).toEqual([2, 3, 4, 3, 3]);
  expect(await store.has(2)).toBe(true);
  expect(await store.has(3)).toBe(false);
  expect(await queue.listStuck()).toMatchObject([
    {
      startBlockHeight: 2,
      endBlockHeight: 4,
      status: GapStatus.STUCK,
      attempts: 2,
      lastError: "3: block 3: HTTP 503",
    },
  ]);
});

test("Mark a range stuck on a permanent failure", async () => {
  const { fetcher, store, queue, fixer } = createTest([0, 1, 5]);
  fetcher.fatalHeights.add(3);
  await queue.enqueue(range(2, 4));

  const result = await fixer.processNext();

  expect(result?.status).toBe(GapFixStatus.STUCK);
  expect(result?.failures).toEqual([
    { height: 3, error: "block 3 is pruned", retryable: false },
  ]);
  expect(await queue.listStuck()).toMatchObject([{ attempts: 0 }]);

  const detector = createGapDetector({
    store,
    queue,
    maxRangesPerPass: 10,
    maxRangeSize: 100,
    intervalMs: 10,
  });
  expect(await detector.runOnce()).toMatchObject({ gapsFound: 1, enqueued: 0 });
  expect(await queue.listOpen()).toEqual([]);
});

test("Retry heights beyond the tip", async () => {
  const { fetcher, queue, fixer } = createTest([0, 1, 5]);
  fetcher.tip = 3;
  await queue.enqueue(range(2, 4));

  const result = await fixer.processNext();

  expect(result?.status).toBe(GapFixStatus.RETRY);
  expect(result?.failures).toEqual([
    { height: 4, error: "not yet available", retryable: true },
  ]);
  expect(await queue.listOpen()).toMatchObject([
    { startBlockHeight: 2, status: GapStatus.PENDING, attempts: 1 },
  ]);
});

test("Release a range when stopped mid-range", async () => {
  const controller = new AbortController();
  const { fetcher, queue, fixer } = createTest([0, 1, 5], controller.signal);
  fetcher.onFetch = (height) => {
    if (height === 2) {
      controller.abort();
    }
  };
  await queue.enqueue(range(2, 4));

  const result = await fixer.processNext();

  expect(result?.status).toBe(GapFixStatus.RELEASED);
  expect(fetcher.fetchCalls).toEqual([2]);
  expect(await queue.listOpen()).toMatchObject([
    { startBlockHeight: 2, status: GapStatus.PENDING, attempts: 0 },
  ]);
});

test("Leave the queue untouched once the lease is lost", async () => {
  const { fetcher, store, queue, fixer } = createTest([0, 1, 5]);
  await queue.enqueue(range(2, 4));
  jest.spyOn(queue, "renew").mockResolvedValue(false);
  const ack = jest.spyOn(queue, "ack");

  const result = await fixer.processNext();

  expect(result).toEqual({
    range: range(2, 4),
    status: GapFixStatus.LEASE_LOST,
    failures: [],
  });
  expect(fetcher.fetchCalls).toEqual([2]);
  expect(await store.has(2)).toBe(true);
  expect(ack).not.toHaveBeenCalled();
  expect(await queue.listOpen()).toMatchObject([
    { startBlockHeight: 2, status: GapStatus.IN_FLIGHT, attempts: 0 },
  ]);
});

test("Report a lost lease when the final transition is rejected", async () => {
  const { queue, fixer } = createTest([0, 1, 5]);
  await queue.enqueue(range(2, 4));
  jest.spyOn(queue, "ack").mockResolvedValue(false);

  expect((await fixer.processNext())?.status).toBe(GapFixStatus.LEASE_LOST);
});

test("Renew the lease after every height", async () => {
  const { queue, fixer } = createTest([0, 1, 5]);
  await queue.enqueue(range(2, 4));
  const renew = jest.spyOn(queue, "renew");

  await fixer.processNext();

  expect(renew).toHaveBeenCalledTimes(3);
  expect(renew.mock.calls[0][0]).toMatchObject({
    startBlockHeight: 2,
    endBlockHeight: 4,
    leaseId: expect.any(String),
  });
});

test("Do not detect a fixed range again", async () => {
  const { store, queue, fixer } = createTest([0, 1, 5, 9]);
  const detector = createGapDetector({
    store,
    queue,
    maxRangesPerPass: 10,
    maxRangeSize: 100,
    intervalMs: 10,
  });

  expect((await detector.runOnce()).enqueued).toBe(2);
  expect((await fixer.drain()).FIXED).toBe(2);
  expect(await detector.runOnce()).toMatchObject({ gapsFound: 0, enqueued: 0 });
  expect(await store.frontier()).toBe(9);
});

test("Fix a requeued stuck range", async () => {
  const { fetcher, queue, fixer } = createTest([0, 2]);
  fetcher.fatalHeights.add(1);
  await queue.enqueue(range(1, 1));
  await fixer.drain();
  expect(await queue.listStuck()).toHaveLength(1);

  fetcher.fatalHeights.clear();
  expect(await queue.requeueStuck(range(1, 1))).toBe(true);
  expect(await fixer.drain()).toMatchObject({ FIXED: 1, STUCK: 0 });
  expect(await queue.size()).toBe(0);
});
