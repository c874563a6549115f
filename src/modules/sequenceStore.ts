import type { BlockRange } from "../types/BlockRange";

/**
 * Source of truth on which block heights have been durably ingested
 */
export abstract class SequenceStore {
  /**
   * Height anchoring the frontier
   */
  public abstract readonly genesisHeight: number;
  /**
   * Records a height as known. Idempotent.
   * @param height Non-negative block height
   * @returns True if the height was not known before
   */
  public abstract record(height: number): Promise<boolean>;
  public abstract has(height: number): Promise<boolean>;
  /**
   * Largest height h such that every height in [genesis, h] is known,
   * or genesis - 1 if genesis itself is unknown
   */
  public abstract frontier(): Promise<number>;
  /**
   * Largest known height, or null if nothing is known
   */
  public abstract maxHeight(): Promise<number | null>;
  /**
   * Maximal missing ranges between known heights at or below the upper bound,
   * sorted by startBlockHeight ascending
   */
  public abstract detectGaps(upperBound: number): Promise<BlockRange[]>;
  /**
   * Number of known heights
   */
  public abstract size(): Promise<number>;
}

/**
 * Throws if the height cannot be recorded
 */
export function assertValidHeight(height: number) {
  if (!Number.isSafeInteger(height) || height < 0) {
    throw new RangeError(`Invalid block height: ${height}`);
  }
}
