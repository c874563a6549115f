import RedisMock from "ioredis-mock";
import { RedisSequenceStore } from "../src/modules/redisSequenceStore";

const redis = new RedisMock();

beforeEach(async () => {
  await redis.flushall();
});

afterAll(async () => {
  await redis.quit();
});

test("Frontier starts below genesis", async () => {
  const store = new RedisSequenceStore(redis, "test:", 0);
  expect(await store.frontier()).toBe(-1);
  expect(await store.maxHeight()).toBe(null);
  expect(await store.size()).toBe(0);
});

test("Frontier advances across contiguous heights only", async () => {
  const store = new RedisSequenceStore(redis, "test:", 0);
  await store.record(2);
  await store.record(1);
  expect(await store.frontier()).toBe(-1);

  await store.record(0);
  expect(await store.frontier()).toBe(2);

  await store.record(5);
  expect(await store.frontier()).toBe(2);

  await store.record(4);
  await store.record(3);
  expect(await store.frontier()).toBe(5);
  expect(await store.maxHeight()).toBe(5);
});

test("Recording twice is identical to recording once", async () => {
  const store = new RedisSequenceStore(redis, "test:", 0);
  expect(await store.record(0)).toBe(true);
  expect(await store.record(0)).toBe(false);
  expect(await store.size()).toBe(1);
  expect(await store.frontier()).toBe(0);
  expect(await store.has(0)).toBe(true);
  expect(await store.has(1)).toBe(false);
});

test("Frontier is anchored at a custom genesis", async () => {
  const store = new RedisSequenceStore(redis, "test:", 100);
  await store.record(101);
  expect(await store.frontier()).toBe(99);
  await store.record(100);
  expect(await store.frontier()).toBe(101);
});

test("Detect gaps across scan pages", async () => {
  const store = new RedisSequenceStore(redis, "test:", 0, 2);
  for (const height of [0, 1, 2, 5, 6, 9, 12]) {
    await store.record(height);
  }

  expect(await store.detectGaps(9)).toEqual([
    { startBlockHeight: 3, endBlockHeight: 4 },
    { startBlockHeight: 7, endBlockHeight: 8 },
  ]);
  expect(await store.detectGaps(12)).toEqual([
    { startBlockHeight: 3, endBlockHeight: 4 },
    { startBlockHeight: 7, endBlockHeight: 8 },
    { startBlockHeight: 10, endBlockHeight: 11 },
  ]);
});

test("Stores with different prefixes are independent", async () => {
  const store = new RedisSequenceStore(redis, "test:", 0);
  const other = new RedisSequenceStore(redis, "other:", 0);
  await store.record(0);

  expect(await other.has(0)).toBe(false);
  expect(await other.frontier()).toBe(-1);
});

test("Reject invalid heights", async () => {
  const store = new RedisSequenceStore(redis, "test:", 0);
  await expect(store.record(-1)).rejects.toBeInstanceOf(RangeError);
});
