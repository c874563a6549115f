/**
 * Assigns heights to workers round-robin, so that worker i receives
 * every numWorkers-th height starting at position i
 * @param heights Heights in assignment order
 * @param numWorkers Number of workers
 * @returns One list of heights per worker that received at least one height
 */
export function assignRoundRobin(
  heights: readonly number[],
  numWorkers: number
): number[][] {
  if (!Number.isInteger(numWorkers) || numWorkers < 1) {
    throw new RangeError(`Invalid number of workers: ${numWorkers}`);
  }

  const assignments: number[][] = Array.from(
    { length: Math.min(numWorkers, heights.length) },
    () => []
  );
  heights.forEach((height, idx) => {
    assignments[idx % numWorkers].push(height);
  });
  return assignments;
}

/**
 * Lists every height of an inclusive range
 */
export function heightsInRange(
  startBlockHeight: number,
  endBlockHeight: number
): number[] {
  return Array.from(
    { length: Math.max(0, endBlockHeight - startBlockHeight + 1) },
    (_, idx) => startBlockHeight + idx
  );
}
