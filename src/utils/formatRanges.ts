import type { BlockRange } from "../types/BlockRange";

const DEFAULT_MAX_RANGES = 10;

/**
 * Key identifying a block range, such as "3-4"
 */
export const rangeKey = ({ startBlockHeight, endBlockHeight }: BlockRange) =>
  `${startBlockHeight}-${endBlockHeight}`;

/**
 * Formats block ranges for logs, e.g. "3-4, 7, 9-12"
 * @param ranges Ranges to format
 * @param maxRanges Ranges listed before the rest is summarised
 */
export function formatRanges(
  ranges: readonly BlockRange[],
  maxRanges = DEFAULT_MAX_RANGES
): string {
  const formatted = ranges
    .slice(0, maxRanges)
    .map((range) =>
      range.startBlockHeight === range.endBlockHeight
        ? `${range.startBlockHeight}`
        : rangeKey(range)
    )
    .join(", ");

  if (ranges.length <= maxRanges) {
    return formatted;
  }
  return `${formatted} ... and ${ranges.length - maxRanges} more`;
}

/**
 * Groups ascending heights into maximal contiguous ranges
 */
export function heightsToRanges(heights: readonly number[]): BlockRange[] {
  const ranges: BlockRange[] = [];
  for (const height of heights) {
    const last = ranges[ranges.length - 1];
    if (last && last.endBlockHeight === height - 1) {
      last.endBlockHeight = height;
    } else {
      ranges.push({ startBlockHeight: height, endBlockHeight: height });
    }
  }
  return ranges;
}
