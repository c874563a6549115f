export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Returns the value in a nested JSON object given a list of keys
 * @param object JSON object
 * @param keys String of keys to be applied in order
 * @returns The value if all keys exist or null
 */
export default function getValue(object: unknown, keys: string[]): unknown {
  return keys.reduce((currentObject: unknown, key) => {
    if (!isRecord(currentObject)) {
      return null;
    }

    return currentObject[key] ?? null;
  }, object);
}
