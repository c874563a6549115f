import { randomUUID } from "node:crypto";
import type Redis from "ioredis";
import { z } from "zod";
import {
  GapStatus,
  type BlockRange,
  type GapLease,
  type GapRange,
  type LeasedRange,
} from "../types/BlockRange";
import { rangeKey } from "../utils/formatRanges";
import { sleep } from "../utils/sleep";
import { BrokerUnavailableError } from "./errors";
import { byStartHeight, JobQueue } from "./jobQueue";
import { brokerCall } from "./redisClient";

// Delay between lease attempts while dequeuing
const DEFAULT_POLL_INTERVAL_MS = 250;
// Eligible ranges compared per lease attempt
const LEASE_CANDIDATES = 100;

// Empty hash fields stand for null
const nullableField = z.string().transform((value) => (value === "" ? null : value));

const TaskHashSchema = z.object({
  start: z.coerce.number().int().nonnegative(),
  end: z.coerce.number().int().nonnegative(),
  status: z.nativeEnum(GapStatus),
  attempts: z.coerce.number().int().nonnegative(),
  availableAt: z.coerce.number(),
  leaseExpiresAt: nullableField.transform((value) =>
    value == null ? null : Number(value)
  ),
  leaseId: nullableField,
  lastError: nullableField,
});

/**
 * Inserts a range unless it overlaps a held range. Held ranges never overlap,
 * so only the held range with the greatest start at or below the new end can.
 * KEYS: starts zset, pending zset.
 * ARGV: task key prefix, range key, start, end, now.
 */
const ENQUEUE_SCRIPT = `
local prev = redis.call('ZREVRANGEBYSCORE', KEYS[1], ARGV[4], '-inf', 'LIMIT', '0', '1')
if prev[1] then
  local prevEnd = redis.call('HGET', ARGV[1] .. prev[1], 'end')
  if prevEnd and tonumber(prevEnd) >= tonumber(ARGV[3]) then
    return 0
  end
end
redis.call('HSET', ARGV[1] .. ARGV[2],
  'start', ARGV[3], 'end', ARGV[4], 'status', 'PENDING', 'attempts', '0',
  'availableAt', ARGV[5], 'leaseExpiresAt', '', 'leaseId', '', 'lastError', '')
redis.call('ZADD', KEYS[1], ARGV[3], ARGV[2])
redis.call('ZADD', KEYS[2], ARGV[5], ARGV[2])
return 1
`;

/**
 * Reclaims expired leases, then leases the eligible pending range with the lowest start.
 * Returns the leased range key, or an empty string.
 * KEYS: pending zset, in-flight zset.
 * ARGV: task key prefix, now, lease milliseconds, candidates, lease id.
 */
const DEQUEUE_SCRIPT = `
local expired = redis.call('ZRANGEBYSCORE', KEYS[2], '-inf', ARGV[2])
for _, key in ipairs(expired) do
  redis.call('ZREM', KEYS[2], key)
  redis.call('HSET', ARGV[1] .. key, 'status', 'PENDING', 'leaseExpiresAt', '', 'leaseId', '')
  redis.call('ZADD', KEYS[1], ARGV[2], key)
end
local candidates = redis.call('ZRANGEBYSCORE', KEYS[1], '-inf', ARGV[2], 'LIMIT', '0', ARGV[4])
local bestKey = nil
local bestStart = nil
for _, key in ipairs(candidates) do
  local start = redis.call('HGET', ARGV[1] .. key, 'start')
  if start then
    start = tonumber(start)
    if bestStart == nil or start < bestStart then
      bestKey = key
      bestStart = start
    end
  else
    redis.call('ZREM', KEYS[1], key)
  end
end
if bestKey == nil then
  return ''
end
local expiresAt = tonumber(ARGV[2]) + tonumber(ARGV[3])
redis.call('ZREM', KEYS[1], bestKey)
redis.call('HSET', ARGV[1] .. bestKey,
  'status', 'IN_FLIGHT', 'leaseExpiresAt', tostring(expiresAt), 'leaseId', ARGV[5])
redis.call('ZADD', KEYS[2], tostring(expiresAt), bestKey)
return bestKey
`;

/**
 * Applies a state transition to a held range. Every transition but requeue
 * needs the current lease id.
 * KEYS: starts zset, pending zset, in-flight zset.
 * ARGV: task key prefix, range key, transition, now, milliseconds, error, lease id.
 */
const TRANSITION_SCRIPT = `
local taskKey = ARGV[1] .. ARGV[2]
local status = redis.call('HGET', taskKey, 'status')
if not status then
  return 0
end
local transition = ARGV[3]
local now = tonumber(ARGV[4])
if transition == 'requeue' then
  if status ~= 'STUCK' then
    return 0
  end
  redis.call('HSET', taskKey, 'status', 'PENDING', 'attempts', '0', 'availableAt', ARGV[4])
  redis.call('ZADD', KEYS[2], ARGV[4], ARGV[2])
  return 1
end
if status ~= 'IN_FLIGHT' or redis.call('HGET', taskKey, 'leaseId') ~= ARGV[7] then
  return 0
end
if transition == 'renew' then
  local expiresAt = now + tonumber(ARGV[5])
  redis.call('HSET', taskKey, 'leaseExpiresAt', tostring(expiresAt))
  redis.call('ZADD', KEYS[3], tostring(expiresAt), ARGV[2])
  return 1
end
redis.call('ZREM', KEYS[3], ARGV[2])
if transition == 'ack' then
  redis.call('DEL', taskKey)
  redis.call('ZREM', KEYS[1], ARGV[2])
  return 1
end
redis.call('HSET', taskKey, 'leaseExpiresAt', '', 'leaseId', '')
if transition == 'retry' then
  local attempts = tonumber(redis.call('HGET', taskKey, 'attempts')) + 1
  local availableAt = now + tonumber(ARGV[5])
  redis.call('HSET', taskKey, 'status', 'PENDING', 'attempts', tostring(attempts),
    'availableAt', tostring(availableAt), 'lastError', ARGV[6])
  redis.call('ZADD', KEYS[2], tostring(availableAt), ARGV[2])
elseif transition == 'release' then
  redis.call('HSET', taskKey, 'status', 'PENDING', 'availableAt', ARGV[4])
  redis.call('ZADD', KEYS[2], ARGV[4], ARGV[2])
elseif transition == 'stuck' then
  redis.call('HSET', taskKey, 'status', 'STUCK', 'lastError', ARGV[6])
end
return 1
`;

type Transition = "renew" | "ack" | "retry" | "release" | "stuck" | "requeue";

/**
 * Job queue shared by continuous-mode processes through Redis.
 * Each range is a hash; sorted sets index starts, eligibility times and
 * lease expiries.
 */
export class RedisJobQueue extends JobQueue {
  private readonly redis: Redis;
  private readonly leaseMs: number;
  private readonly pollIntervalMs: number;
  private readonly taskPrefix: string;
  private readonly keys: {
    starts: string;
    pending: string;
    inflight: string;
  };

  /**
   * @param redis Connected Redis client
   * @param keyPrefix Prefix of every key the queue writes
   * @param leaseMs Milliseconds a dequeued range stays leased
   * @param pollIntervalMs Delay between lease attempts while dequeuing
   */
  constructor(
    redis: Redis,
    keyPrefix: string,
    leaseMs: number,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS
  ) {
    super();
    this.redis = redis;
    this.leaseMs = leaseMs;
    this.pollIntervalMs = pollIntervalMs;
    this.taskPrefix = `${keyPrefix}gaps:task:`;
    this.keys = {
      starts: `${keyPrefix}gaps:starts`,
      pending: `${keyPrefix}gaps:pending`,
      inflight: `${keyPrefix}gaps:inflight`,
    };
  }

  /**
   * Validates a task hash
   * @returns The task, or null if the hash is missing or corrupt
   */
  private parseTask(hash: unknown): GapRange | null {
    const result = TaskHashSchema.safeParse(hash);
    if (!result.success) {
      return null;
    }
    const { start, end, ...task } = result.data;
    return { startBlockHeight: start, endBlockHeight: end, ...task };
  }

  public async enqueue(range: BlockRange): Promise<boolean> {
    const added = await brokerCall("enqueue", () =>
      this.redis.eval(
        ENQUEUE_SCRIPT,
        2,
        this.keys.starts,
        this.keys.pending,
        this.taskPrefix,
        rangeKey(range),
        String(range.startBlockHeight),
        String(range.endBlockHeight),
        String(Date.now())
      )
    );
    return added === 1;
  }

  private async tryLease(): Promise<GapLease | null> {
    const leaseId = randomUUID();
    const key = await brokerCall("dequeue", () =>
      this.redis.eval(
        DEQUEUE_SCRIPT,
        2,
        this.keys.pending,
        this.keys.inflight,
        this.taskPrefix,
        String(Date.now()),
        String(this.leaseMs),
        String(LEASE_CANDIDATES),
        leaseId
      )
    );
    if (typeof key !== "string" || key === "") {
      return null;
    }

    const hash = await brokerCall("dequeue", () =>
      this.redis.hgetall(`${this.taskPrefix}${key}`)
    );
    const task = this.parseTask(hash);
    if (task == null) {
      throw new BrokerUnavailableError(`Corrupt gap task ${key}`);
    }
    return { ...task, leaseId };
  }

  public async dequeue(timeoutMs: number): Promise<GapLease | null> {
    const deadline = Date.now() + timeoutMs;

    for (;;) {
      const lease = await this.tryLease();
      if (lease != null) {
        return lease;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  private async transition(
    range: BlockRange,
    transition: Transition,
    { ms = 0, error = "", leaseId = "" } = {}
  ): Promise<boolean> {
    const applied = await brokerCall(transition, () =>
      this.redis.eval(
        TRANSITION_SCRIPT,
        3,
        this.keys.starts,
        this.keys.pending,
        this.keys.inflight,
        this.taskPrefix,
        rangeKey(range),
        transition,
        String(Date.now()),
        String(ms),
        error,
        leaseId
      )
    );
    return applied === 1;
  }

  public async renew(lease: LeasedRange): Promise<boolean> {
    return this.transition(lease, "renew", {
      ms: this.leaseMs,
      leaseId: lease.leaseId,
    });
  }

  public async ack(lease: LeasedRange): Promise<boolean> {
    return this.transition(lease, "ack", { leaseId: lease.leaseId });
  }

  public async retry(
    lease: LeasedRange,
    delayMs: number,
    error: string
  ): Promise<boolean> {
    return this.transition(lease, "retry", {
      ms: delayMs,
      error,
      leaseId: lease.leaseId,
    });
  }

  public async release(lease: LeasedRange): Promise<boolean> {
    return this.transition(lease, "release", { leaseId: lease.leaseId });
  }

  public async markStuck(lease: LeasedRange, reason: string): Promise<boolean> {
    return this.transition(lease, "stuck", {
      error: reason,
      leaseId: lease.leaseId,
    });
  }

  public async requeueStuck(range: BlockRange): Promise<boolean> {
    return this.transition(range, "requeue");
  }

  private async list(statuses: GapStatus[]): Promise<GapRange[]> {
    const keys = await brokerCall("list", () =>
      this.redis.zrange(this.keys.starts, 0, -1)
    );
    if (keys.length === 0) {
      return [];
    }

    const pipeline = this.redis.pipeline();
    for (const key of keys) {
      pipeline.hgetall(`${this.taskPrefix}${key}`);
    }
    const replies = await brokerCall("list", () => pipeline.exec());

    const tasks: GapRange[] = [];
    for (const [error, hash] of replies ?? []) {
      if (error) {
        throw new BrokerUnavailableError(`Broker list failed: ${error.message}`, error);
      }
      // A range acknowledged since the starts were read has no hash
      const task = this.parseTask(hash);
      if (task != null && statuses.includes(task.status)) {
        tasks.push(task);
      }
    }
    return tasks.sort(byStartHeight);
  }

  public async listOpen(): Promise<GapRange[]> {
    return this.list([GapStatus.PENDING, GapStatus.IN_FLIGHT]);
  }

  public async listStuck(): Promise<GapRange[]> {
    return this.list([GapStatus.STUCK]);
  }

  public async size(): Promise<number> {
    return brokerCall("size", () => this.redis.zcard(this.keys.starts));
  }
}
