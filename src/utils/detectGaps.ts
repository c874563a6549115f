import type { BlockRange } from "../types/BlockRange";

/**
 * Determines the maximal missing ranges between known heights at or below an upper bound.
 * Adjacent known heights a < b with b - a > 1 produce the gap [a + 1, b - 1].
 * No leading gap is produced before the lowest known height.
 * @param heights Known heights, in any order
 * @param upperBound Inclusive upper bound of heights considered
 * @returns Missing ranges sorted by startBlockHeight ascending
 */
export function detectGaps(
  heights: Iterable<number>,
  upperBound: number
): BlockRange[] {
  const sorted = Array.from(heights)
    .filter((height) => height <= upperBound)
    .sort((a, b) => a - b);

  const gaps: BlockRange[] = [];
  for (let idx = 1; idx < sorted.length; idx++) {
    const prev = sorted[idx - 1];
    const curr = sorted[idx];
    if (curr - prev > 1) {
      gaps.push({ startBlockHeight: prev + 1, endBlockHeight: curr - 1 });
    }
  }
  return gaps;
}

/**
 * Same as detectGaps, over sorted, merged, non-adjacent ranges of known heights
 * @param ranges Known heights as ranges sorted by startBlockHeight ascending
 * @param upperBound Inclusive upper bound of heights considered
 */
export function detectGapsInRanges(
  ranges: readonly BlockRange[],
  upperBound: number
): BlockRange[] {
  const gaps: BlockRange[] = [];
  for (let idx = 1; idx < ranges.length; idx++) {
    const { startBlockHeight } = ranges[idx];
    if (startBlockHeight > upperBound) {
      break;
    }
    gaps.push({
      startBlockHeight: ranges[idx - 1].endBlockHeight + 1,
      endBlockHeight: startBlockHeight - 1,
    });
  }
  return gaps;
}
