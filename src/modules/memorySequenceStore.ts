import type { BlockRange } from "../types/BlockRange";
import { detectGapsInRanges } from "../utils/detectGaps";
import { insertHeight } from "../utils/insertHeight";
import { assertValidHeight, SequenceStore } from "./sequenceStore";

/**
 * In-process sequence store keeping known heights as merged ranges.
 * Used by batch mode, where every worker shares one process.
 */
export class MemorySequenceStore extends SequenceStore {
  public readonly genesisHeight: number;
  private readonly ranges: BlockRange[] = [];
  private cachedFrontier: number;
  private count = 0;

  /**
   * @param genesisHeight Height anchoring the frontier
   * @param heights Heights known up front, e.g. read back from storage
   */
  constructor(genesisHeight = 0, heights: Iterable<number> = []) {
    super();
    this.genesisHeight = genesisHeight;
    this.cachedFrontier = genesisHeight - 1;
    for (const height of heights) {
      this.recordSync(height);
    }
  }

  private recordSync(height: number): boolean {
    assertValidHeight(height);
    if (!insertHeight(this.ranges, height)) {
      return false;
    }
    this.count += 1;

    // Advance the frontier across the range the height now belongs to
    if (height <= this.cachedFrontier + 1) {
      const range = this.ranges.find(
        ({ startBlockHeight, endBlockHeight }) =>
          startBlockHeight <= this.cachedFrontier + 1 &&
          this.cachedFrontier + 1 <= endBlockHeight
      );
      if (range) {
        this.cachedFrontier = range.endBlockHeight;
      }
    }
    return true;
  }

  public async record(height: number): Promise<boolean> {
    return this.recordSync(height);
  }

  public async has(height: number): Promise<boolean> {
    return this.ranges.some(
      ({ startBlockHeight, endBlockHeight }) =>
        startBlockHeight <= height && height <= endBlockHeight
    );
  }

  public async frontier(): Promise<number> {
    return this.cachedFrontier;
  }

  public async maxHeight(): Promise<number | null> {
    const last = this.ranges[this.ranges.length - 1];
    return last ? last.endBlockHeight : null;
  }

  public async detectGaps(upperBound: number): Promise<BlockRange[]> {
    return detectGapsInRanges(this.ranges, upperBound);
  }

  public async size(): Promise<number> {
    return this.count;
  }

  /**
   * Copy of the known heights as merged ranges
   */
  public snapshot(): BlockRange[] {
    return this.ranges.map((range) => ({ ...range }));
  }
}
