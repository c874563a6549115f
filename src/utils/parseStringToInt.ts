const isString = (value: unknown): value is string =>
  typeof value === "string" || value instanceof String;

/**
 * Parses a base 10, non-negative integer string
 * @returns The integer, or null if the string is not a safe non-negative integer
 */
export default function parseStringToInt(data: unknown): number | null {
  if (!isString(data) || !/^\d+$/.test(data.toString())) {
    return null;
  }

  const value = parseInt(data.toString(), 10);
  return Number.isSafeInteger(value) ? value : null;
}
