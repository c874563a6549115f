/**
 * Rejects with the created error if the promise does not settle in time
 * @param promise Promise to bound
 * @param ms Milliseconds to wait before rejecting
 * @param createError Builds the rejection error
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  createError: () => Error
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(createError()), ms);
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
