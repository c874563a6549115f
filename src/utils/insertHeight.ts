import type { BlockRange } from "../types/BlockRange";

/**
 * Inserts a height into sorted, merged, non-adjacent ranges in place,
 * merging with its neighbours where contiguous
 * @param ranges Ranges sorted by startBlockHeight ascending
 * @param height Height to insert
 * @returns False if the height was already covered
 */
export function insertHeight(ranges: BlockRange[], height: number): boolean {
  // Index of the first range starting after the height
  let low = 0;
  let high = ranges.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (ranges[mid].startBlockHeight > height) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }

  const prev = low > 0 ? ranges[low - 1] : undefined;
  const next = low < ranges.length ? ranges[low] : undefined;

  if (prev && prev.endBlockHeight >= height) {
    return false;
  }

  const joinsPrev = prev !== undefined && prev.endBlockHeight === height - 1;
  const joinsNext = next !== undefined && next.startBlockHeight === height + 1;

  if (prev && next && joinsPrev && joinsNext) {
    prev.endBlockHeight = next.endBlockHeight;
    ranges.splice(low, 1);
  } else if (prev && joinsPrev) {
    prev.endBlockHeight = height;
  } else if (next && joinsNext) {
    next.startBlockHeight = height;
  } else {
    ranges.splice(low, 0, { startBlockHeight: height, endBlockHeight: height });
  }
  return true;
}
