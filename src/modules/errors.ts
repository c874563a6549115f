import type { ValuesUnion } from "../types/ValuesUnion";

export const IngestErrorKind = {
  NETWORK_TRANSIENT: "NETWORK_TRANSIENT",
  FETCH_FATAL: "FETCH_FATAL",
  MALFORMED_RESPONSE: "MALFORMED_RESPONSE",
  STORAGE_UNAVAILABLE: "STORAGE_UNAVAILABLE",
  BROKER_UNAVAILABLE: "BROKER_UNAVAILABLE",
} as const;

export type IngestErrorKind = ValuesUnion<typeof IngestErrorKind>;

/**
 * Base class of every classified ingestion error
 */
export abstract class IngestError extends Error {
  public abstract readonly kind: IngestErrorKind;
  /**
   * True if retrying the same operation may succeed
   */
  public abstract readonly retryable: boolean;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * Timeouts, connection resets, rate limits and server-side failures of the source
 */
export class NetworkTransientError extends IngestError {
  public readonly kind = IngestErrorKind.NETWORK_TRANSIENT;
  public readonly retryable = true;
}

/**
 * Permanent rejection of a request by the source, such as a pruned height
 */
export class FetchFatalError extends IngestError {
  public readonly kind = IngestErrorKind.FETCH_FATAL;
  public readonly retryable = false;
}

/**
 * The source answered with a payload that failed validation
 */
export class MalformedResponseError extends IngestError {
  public readonly kind = IngestErrorKind.MALFORMED_RESPONSE;
  public readonly retryable = false;

  constructor(
    public readonly height: number,
    reason: string,
    cause?: unknown
  ) {
    super(`Malformed block ${height}: ${reason}`, cause);
  }
}

/**
 * A storage backend could not complete a read or write
 */
export class StorageUnavailableError extends IngestError {
  public readonly kind = IngestErrorKind.STORAGE_UNAVAILABLE;
  public readonly retryable = true;

  constructor(
    public readonly backend: string,
    message: string,
    cause?: unknown
  ) {
    super(`[${backend}] ${message}`, cause);
  }
}

/**
 * The broker hosting the sequence store or job queue is unreachable.
 * Fatal to the process.
 */
export class BrokerUnavailableError extends IngestError {
  public readonly kind = IngestErrorKind.BROKER_UNAVAILABLE;
  public readonly retryable = false;
}

/**
 * Errors are retryable unless classified otherwise
 */
export function isRetryableError(error: unknown): boolean {
  return error instanceof IngestError ? error.retryable : true;
}

/**
 * Message of an unknown thrown value, for logs and summaries
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
