import {
  BrokerUnavailableError,
  describeError,
  isRetryableError,
  StorageUnavailableError,
} from "../modules/errors";
import { createLogger } from "../modules/logger";
import type { PersistResult } from "../modules/persister";
import { FetchResultType, type FetchResult } from "../types/FetchResult";
import type { IngestContext } from "../types/IngestContext";
import { IngestStatus, type IngestOutcome } from "../types/IngestOutcome";

const logger = createLogger("ingest");

const describeFailures = ({ failed }: PersistResult) =>
  failed
    .map(({ backend, error }) => `${backend}: ${describeError(error)}`)
    .join("; ");

/**
 * Fetches a block, persists it to every backend and records its height.
 * Known heights are skipped without a fetch. Backends that fail are retried
 * on the fetched record, which is never fetched again for a storage failure.
 * @param height Block height
 * @param context Fetcher, persister and sequence store to use
 * @throws BrokerUnavailableError if the sequence store cannot be reached
 */
export async function ingestBlock(
  height: number,
  { fetcher, persister, store, storageRetryRounds }: IngestContext
): Promise<IngestOutcome> {
  if (await store.has(height)) {
    return { status: IngestStatus.ALREADY_KNOWN, height };
  }

  let fetched: FetchResult;
  try {
    fetched = await fetcher.fetchBlock(height);
  } catch (error) {
    if (error instanceof BrokerUnavailableError) {
      throw error;
    }
    return {
      status: IngestStatus.FAILED,
      height,
      error,
      retryable: isRetryableError(error),
    };
  }

  if (fetched.type === FetchResultType.NOT_YET_AVAILABLE) {
    return { status: IngestStatus.NOT_YET_AVAILABLE, height };
  }

  const { record } = fetched;
  let result = await persister.persist(record);

  for (let round = 1; !result.durable && round <= storageRetryRounds; round++) {
    const backends = result.failed.map(({ backend }) => backend);
    logger.warn(
      `Block ${height} not stored by ${backends.join(", ")}, retry round ${round}`
    );
    const retried = await persister.persist(record, backends);
    result = {
      height,
      outcomes: { ...result.outcomes, ...retried.outcomes },
      failed: retried.failed,
      durable: retried.failed.length === 0,
    };
  }

  if (!result.durable) {
    return {
      status: IngestStatus.FAILED,
      height,
      error: new StorageUnavailableError(
        result.failed.map(({ backend }) => backend).join(","),
        `Block ${height} is not durable: ${describeFailures(result)}`
      ),
      retryable: true,
    };
  }

  await store.record(height);
  return { status: IngestStatus.INGESTED, height };
}
