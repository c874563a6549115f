import {
  createErrorRetrier,
  createExpBackoffRetrier,
  createRetrier,
} from "../src/modules/retry";
import { FetchFatalError, isRetryableError } from "../src/modules/errors";
import { checkErrorThrow } from "./utils";

test("Setup and run basic retrier", async () => {
  const retrier = createRetrier(
    {
      maxRetries: 1,
    },
    () => 10
  );

  let counter = 0;

  expect(
    await checkErrorThrow(async () => {
      await retrier.wrap(
        async (_, retry) => {
          await retry(undefined);
        },
        {
          onFailedAttempt: () => {
            counter += 1;
          },
          onFailedLastAttempt: () => {
            counter += 2;
          },
        }
      );
    })
  ).toBe(true);

  expect(counter).toBe(3);
});

test("Setup and run error retrier", async () => {
  const errorRetrier = createErrorRetrier(
    createRetrier({ maxRetries: 1 }, () => 10)
  );

  let counter = 0;

  expect(
    await checkErrorThrow(async () => {
      await errorRetrier.wrap(
        async () => {
          throw new Error();
        },
        {
          onFailedAttempt: () => {
            counter += 1;
          },
          onFailedLastAttempt: () => {
            counter += 2;
          },
        }
      );
    })
  ).toBe(true);

  expect(counter).toBe(3);
});

test("Error retrier returns the first successful result", async () => {
  const errorRetrier = createErrorRetrier(
    createRetrier({ maxRetries: 3 }, () => 1)
  );
  let calls = 0;

  const result = await errorRetrier.wrap(async () => {
    calls += 1;
    if (calls < 3) {
      throw new Error("flaky");
    }
    return "ok";
  });

  expect(result).toBe("ok");
  expect(calls).toBe(3);
});

test("Errors rejected by retryIf are thrown without retries", async () => {
  const errorRetrier = createErrorRetrier(
    createRetrier({ maxRetries: 5 }, () => 1)
  );
  let calls = 0;
  let failedAttempts = 0;
  let lastAttempt = 0;

  await expect(
    errorRetrier.wrap(
      async () => {
        calls += 1;
        throw new FetchFatalError("pruned");
      },
      {
        retryIf: isRetryableError,
        onFailedAttempt: () => {
          failedAttempts += 1;
        },
        onFailedLastAttempt: (_, attempt) => {
          lastAttempt = attempt;
        },
      }
    )
  ).rejects.toBeInstanceOf(FetchFatalError);

  expect(calls).toBe(1);
  expect(failedAttempts).toBe(0);
  expect(lastAttempt).toBe(1);
});

test("Setup and run exponential error retrier", async () => {
  const retrier = createExpBackoffRetrier({
    initialInterval: 100,
    expFactor: 2,
    jitter: 0,
    maxRetries: 2,
  });

  let counter = 0;

  const errorRetrier = createErrorRetrier(retrier);

  const startTime = performance.now();
  expect(
    await checkErrorThrow(async () => {
      await errorRetrier.wrap(
        async () => {
          throw new Error();
        },
        {
          onFailedAttempt: () => {
            counter += 1;
          },
          onFailedLastAttempt: () => {
            counter += 2;
          },
        }
      );
    })
  ).toBe(true);
  const endTime = performance.now();

  // Waits 100ms then 200ms
  expect(counter).toBe(4);
  expect(endTime - startTime).toBeGreaterThanOrEqual(290);
  expect(endTime - startTime).toBeLessThanOrEqual(600);
});

test("Exponential retrier caps the interval", async () => {
  const errorRetrier = createErrorRetrier(
    createExpBackoffRetrier({
      initialInterval: 50,
      expFactor: 10,
      maxInterval: 60,
      maxRetries: 2,
    })
  );

  const startTime = performance.now();
  await checkErrorThrow(async () => {
    await errorRetrier.wrap(async () => {
      throw new Error();
    });
  });

  // Waits 50ms then 60ms instead of 500ms
  expect(performance.now() - startTime).toBeLessThan(400);
});
