import type { FetchResult } from "../types/FetchResult";

/**
 * Interface for a source of sequentially numbered blocks
 */
export abstract class Fetcher {
  /**
   * Retrieves one block
   * @param height Block height
   * @returns The decoded record, or NOT_YET_AVAILABLE if the height is beyond the source's tip
   * @throws IngestError classified as retryable or fatal
   */
  public abstract fetchBlock(height: number): Promise<FetchResult>;
  /**
   * Current tip of the source
   */
  public abstract getLatestHeight(): Promise<number>;
  /**
   * Releases the connection to the source
   */
  public abstract disconnect(): Promise<void>;
}

/**
 * Builds a fetcher with its own connection
 */
export type CreateFetcherFunction = () => Fetcher;
