import type Redis from "ioredis";
import type { BlockRange } from "../types/BlockRange";
import parseStringToInt from "../utils/parseStringToInt";
import { brokerCall } from "./redisClient";
import { assertValidHeight, SequenceStore } from "./sequenceStore";

const SCAN_PAGE_SIZE = 10000;

/**
 * Adds a height and, if it extends the frontier, advances the frontier past
 * every contiguous known height.
 * KEYS: heights zset, frontier key. ARGV: height, genesis height.
 */
const RECORD_SCRIPT = `
local added = 0
if not redis.call('ZSCORE', KEYS[1], ARGV[1]) then
  redis.call('ZADD', KEYS[1], ARGV[1], ARGV[1])
  added = 1
end
local height = tonumber(ARGV[1])
local frontier = tonumber(redis.call('GET', KEYS[2]) or (tonumber(ARGV[2]) - 1))
if height <= frontier + 1 then
  local nextHeight = frontier + 1
  while redis.call('ZSCORE', KEYS[1], string.format('%d', nextHeight)) do
    frontier = nextHeight
    nextHeight = nextHeight + 1
  end
  redis.call('SET', KEYS[2], string.format('%d', frontier))
end
return added
`;

/**
 * Sequence store shared by continuous-mode processes through Redis.
 * Heights live in a sorted set scored by height.
 */
export class RedisSequenceStore extends SequenceStore {
  public readonly genesisHeight: number;
  private readonly redis: Redis;
  private readonly heightsKey: string;
  private readonly frontierKey: string;
  private readonly scanPageSize: number;

  /**
   * @param redis Connected Redis client
   * @param keyPrefix Prefix of every key the store writes
   * @param genesisHeight Height anchoring the frontier
   * @param scanPageSize Heights read per page while scanning for gaps
   */
  constructor(
    redis: Redis,
    keyPrefix: string,
    genesisHeight = 0,
    scanPageSize = SCAN_PAGE_SIZE
  ) {
    super();
    this.scanPageSize = scanPageSize;
    this.redis = redis;
    this.genesisHeight = genesisHeight;
    this.heightsKey = `${keyPrefix}heights`;
    this.frontierKey = `${keyPrefix}frontier`;
  }

  public async record(height: number): Promise<boolean> {
    assertValidHeight(height);
    const added = await brokerCall("record", () =>
      this.redis.eval(
        RECORD_SCRIPT,
        2,
        this.heightsKey,
        this.frontierKey,
        String(height),
        String(this.genesisHeight)
      )
    );
    return added === 1;
  }

  public async has(height: number): Promise<boolean> {
    const score = await brokerCall("has", () =>
      this.redis.zscore(this.heightsKey, String(height))
    );
    return score != null;
  }

  public async frontier(): Promise<number> {
    const value = await brokerCall("frontier", () =>
      this.redis.get(this.frontierKey)
    );
    return parseStringToInt(value) ?? this.genesisHeight - 1;
  }

  public async maxHeight(): Promise<number | null> {
    const [last] = await brokerCall("maxHeight", () =>
      this.redis.zrange(this.heightsKey, -1, -1)
    );
    return last === undefined ? null : parseStringToInt(last);
  }

  public async detectGaps(upperBound: number): Promise<BlockRange[]> {
    const gaps: BlockRange[] = [];
    let prev: number | null = null;
    let offset = 0;

    for (;;) {
      const page = await brokerCall("detectGaps", () =>
        this.redis.zrangebyscore(
          this.heightsKey,
          "-inf",
          upperBound,
          "LIMIT",
          offset,
          this.scanPageSize
        )
      );

      for (const member of page) {
        const height = parseStringToInt(member);
        if (height == null) {
          continue;
        }
        if (prev != null && height - prev > 1) {
          gaps.push({ startBlockHeight: prev + 1, endBlockHeight: height - 1 });
        }
        prev = height;
      }

      if (page.length < this.scanPageSize) {
        return gaps;
      }
      offset += page.length;
    }
  }

  public async size(): Promise<number> {
    return brokerCall("size", () => this.redis.zcard(this.heightsKey));
  }
}
