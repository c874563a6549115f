import type { BlockRange } from "../types/BlockRange";

/**
 * Splits a block range into contiguous block ranges of at most maxBlocksPerRange
 * blocks, starting from its first height
 */
export function splitRange({
  maxBlocksPerRange,
  blockRange,
}: {
  maxBlocksPerRange: number;
  blockRange: BlockRange;
}): BlockRange[] {
  if (!Number.isInteger(maxBlocksPerRange) || maxBlocksPerRange < 1) {
    throw new RangeError(`Invalid range size: ${maxBlocksPerRange}`);
  }

  const blockRanges: BlockRange[] = [];
  const { startBlockHeight, endBlockHeight } = blockRange;

  for (
    let start = startBlockHeight;
    start <= endBlockHeight;
    start += maxBlocksPerRange
  ) {
    blockRanges.push({
      startBlockHeight: start,
      endBlockHeight: Math.min(start + maxBlocksPerRange - 1, endBlockHeight),
    });
  }

  return blockRanges;
}

/**
 * Splits block ranges into contiguous block ranges of at most
 * maxBlocksPerRange blocks
 */
export function splitRanges({
  maxBlocksPerRange,
  blockRanges,
}: {
  maxBlocksPerRange: number;
  blockRanges: BlockRange[];
}) {
  return blockRanges.reduce(
    (prevRanges: BlockRange[], currRange) =>
      prevRanges.concat(
        splitRange({
          blockRange: currRange,
          maxBlocksPerRange,
        })
      ),
    []
  );
}
