import type { Fetcher } from "../clients/fetcher";
import type { Persister } from "../modules/persister";
import type { SequenceStore } from "../modules/sequenceStore";

/**
 * Collaborators of the fetch, persist and record step
 */
export type IngestContext = {
  fetcher: Fetcher;
  persister: Persister;
  store: SequenceStore;
  // Extra rounds of writes to backends that failed, on the already fetched record
  storageRetryRounds: number;
};
