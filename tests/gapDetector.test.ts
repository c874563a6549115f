import createGapDetector from "../src/createGapDetector";
import { MemoryJobQueue } from "../src/modules/memoryJobQueue";
import { MemorySequenceStore } from "../src/modules/memorySequenceStore";
import { Metrics } from "../src/modules/metrics";

function createTest(
  heights: number[],
  maxRangesPerPass = 1000,
  maxRangeSize = 100
) {
  const store = new MemorySequenceStore(0, heights);
  const queue = new MemoryJobQueue(60000, 1);
  const detector = createGapDetector({
    store,
    queue,
    maxRangesPerPass,
    maxRangeSize,
    intervalMs: 10,
  });
  return { store, queue, detector };
}

test("Report nothing for an empty store", async () => {
  const { queue, detector } = createTest([]);
  expect(await detector.runOnce()).toEqual({
    gapsFound: 0,
    enqueued: 0,
    skipped: 0,
    ranges: [],
  });
  expect(await queue.size()).toBe(0);
});

test("Enqueue every gap below the highest known height", async () => {
  const { queue, detector } = createTest([0, 1, 2, 5, 6, 9]);

  expect(await detector.runOnce()).toEqual({
    gapsFound: 2,
    enqueued: 2,
    skipped: 0,
    ranges: [
      { startBlockHeight: 3, endBlockHeight: 4 },
      { startBlockHeight: 7, endBlockHeight: 8 },
    ],
  });
  expect((await queue.listOpen()).map(({ startBlockHeight }) => startBlockHeight)).toEqual([3, 7]);
});

test("Limit ranges enqueued per pass", async () => {
  const { queue, detector } = createTest([0, 2, 4, 6]);

  const report = await detector.runOnce();
  expect(report.gapsFound).toBe(3);
  expect(report.enqueued).toBe(3);

  const limited = createTest([0, 2, 4, 6], 2);
  expect(await limited.detector.runOnce()).toEqual({
    gapsFound: 3,
    enqueued: 2,
    skipped: 1,
    ranges: [
      { startBlockHeight: 1, endBlockHeight: 1 },
      { startBlockHeight: 3, endBlockHeight: 3 },
    ],
  });
  expect(await queue.size()).toBe(3);
});

test("Skip ranges the queue already holds", async () => {
  const { detector } = createTest([0, 3, 6]);
  await detector.runOnce();

  expect(await detector.runOnce()).toEqual({
    gapsFound: 2,
    enqueued: 0,
    skipped: 2,
    ranges: [
      { startBlockHeight: 1, endBlockHeight: 2 },
      { startBlockHeight: 4, endBlockHeight: 5 },
    ],
  });
});

test("Run passes until destroyed", async () => {
  const { store, queue, detector } = createTest([0]);
  const running = detector.start();

  await store.record(4);
  await new Promise((resolve) => setTimeout(resolve, 50));
  detector.destroy();
  await running;

  expect(await queue.listOpen()).toMatchObject([
    { startBlockHeight: 1, endBlockHeight: 3 },
  ]);
});

test("Split long gaps into bounded ranges", async () => {
  const { queue, detector } = createTest([0, 11, 13], 1000, 4);

  expect(await detector.runOnce()).toEqual({
    gapsFound: 2,
    enqueued: 4,
    skipped: 0,
    ranges: [
      { startBlockHeight: 1, endBlockHeight: 4 },
      { startBlockHeight: 5, endBlockHeight: 8 },
      { startBlockHeight: 9, endBlockHeight: 10 },
      { startBlockHeight: 12, endBlockHeight: 12 },
    ],
  });
  expect(await queue.size()).toBe(4);
});

test("Apply the per-pass limit after splitting", async () => {
  const { queue, detector } = createTest([0, 11], 2, 4);

  expect(await detector.runOnce()).toEqual({
    gapsFound: 1,
    enqueued: 2,
    skipped: 1,
    ranges: [
      { startBlockHeight: 1, endBlockHeight: 4 },
      { startBlockHeight: 5, endBlockHeight: 8 },
    ],
  });
  expect(await queue.size()).toBe(2);
});

test("Count detected gaps", async () => {
  const metrics = new Metrics();
  const detector = createGapDetector({
    store: new MemorySequenceStore(0, [0, 2, 4]),
    queue: new MemoryJobQueue(60000, 1),
    maxRangesPerPass: 10,
    maxRangeSize: 10,
    intervalMs: 10,
    metrics,
  });

  await detector.runOnce();
  expect((await metrics.snapshot()).gapsDetected).toBe(2);
});
