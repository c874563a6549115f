import type { BlockRange } from "../types/BlockRange";
import type { BlockRecord } from "../types/BlockRecord";
import type { ValuesUnion } from "../types/ValuesUnion";
import { detectGaps } from "../utils/detectGaps";

export const WriteOutcome = {
  WRITTEN: "WRITTEN",
  // The record was already stored; the write was a no-op
  EXISTS: "EXISTS",
} as const;

export type WriteOutcome = ValuesUnion<typeof WriteOutcome>;

export type StorageStats = {
  count: number;
  earliest: number | null;
  latest: number | null;
};

/**
 * A durable destination for block records. Writes are idempotent per height.
 */
export abstract class StorageBackend {
  public abstract readonly name: string;
  public abstract connect(): Promise<void>;
  public abstract disconnect(): Promise<void>;
  /**
   * Stores a record unless its height is already stored
   * @throws StorageUnavailableError if the backend cannot complete the write
   */
  public abstract write(record: BlockRecord): Promise<WriteOutcome>;
  public abstract has(height: number): Promise<boolean>;
  /**
   * Every stored height, in ascending order
   */
  public abstract listHeights(): Promise<number[]>;

  public async stats(): Promise<StorageStats> {
    const heights = await this.listHeights();
    return {
      count: heights.length,
      earliest: heights.length > 0 ? heights[0] : null,
      latest: heights.length > 0 ? heights[heights.length - 1] : null,
    };
  }

  /**
   * Gaps between stored heights at or below upperBound
   */
  public async detectGaps(upperBound: number): Promise<BlockRange[]> {
    return detectGaps(await this.listHeights(), upperBound);
  }
  /**
   * Throws if the backend cannot serve requests
   */
  public abstract healthCheck(): Promise<void>;
}
