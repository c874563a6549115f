/**
 * Applies a mapper to a list of data and returns the non-null results
 * @param list List of data to be mapped
 * @param func A mapper function applied to each element in the list
 */
export function mapAndFilterNull<S, T>(
  list: readonly S[],
  func: (data: S, idx: number) => T | null | undefined
): T[] {
  return list
    .map(func)
    .filter((d: T | null | undefined): d is T => d != null);
}
