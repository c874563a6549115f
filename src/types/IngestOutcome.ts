import type { ValuesUnion } from "./ValuesUnion";

export const IngestStatus = {
  // Fetched, durably persisted and recorded
  INGESTED: "INGESTED",
  // Already recorded in the sequence store, nothing fetched
  ALREADY_KNOWN: "ALREADY_KNOWN",
  NOT_YET_AVAILABLE: "NOT_YET_AVAILABLE",
  FAILED: "FAILED",
} as const;

export type IngestStatus = ValuesUnion<typeof IngestStatus>;

export type IngestOutcome =
  | {
      status:
        | typeof IngestStatus.INGESTED
        | typeof IngestStatus.ALREADY_KNOWN
        | typeof IngestStatus.NOT_YET_AVAILABLE;
      height: number;
    }
  | {
      status: typeof IngestStatus.FAILED;
      height: number;
      error: unknown;
      // False when another attempt cannot change the outcome
      retryable: boolean;
    };
