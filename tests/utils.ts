import { Fetcher } from "../src/clients/fetcher";
import { loadConfig, type IngestConfig } from "../src/modules/config";
import {
  FetchFatalError,
  NetworkTransientError,
  StorageUnavailableError,
} from "../src/modules/errors";
import { createRetrier } from "../src/modules/retry";
import { StorageBackend, WriteOutcome } from "../src/modules/storageBackend";
import type { BlockRecord } from "../src/types/BlockRecord";
import { FetchResultType, type FetchResult } from "../src/types/FetchResult";

export async function checkErrorThrow(callback: () => Promise<void>) {
  try {
    await callback();
    return false;
  } catch {
    return true;
  }
}

/**
 * Retrier that never retries
 */
export const noRetrier = createRetrier({ maxRetries: 0 }, () => 0);

export function createTestConfig(
  overrides: Record<string, string> = {}
): IngestConfig {
  return loadConfig({
    RPC_URL: "http://localhost:26657",
    ENABLE_DB_STORAGE: "false",
    ENABLE_FILE_STORAGE: "true",
    DATA_DIR: "./unused",
    BLOCK_FETCH_DELAY: "0",
    MAX_RETRIES: "0",
    STORAGE_RETRY_ROUNDS: "1",
    GAP_RETRY_DELAY: "0",
    GAP_DEQUEUE_TIMEOUT: "0.05",
    MAX_GAP_ATTEMPTS: "2",
    ...overrides,
  });
}

export function makeRecord(height: number): BlockRecord {
  return Object.freeze({
    height,
    hash: height.toString(16).padStart(64, "0").toUpperCase(),
    timestamp: new Date(Date.UTC(2024, 0, 1, 0, 0, height)),
    chainId: "test-chain",
    txs: [],
    payload: { height: String(height) },
  });
}

/**
 * In-process fetcher serving heights up to a tip
 */
export class FakeFetcher extends Fetcher {
  public readonly fetchCalls: number[] = [];
  public disconnected = false;
  public tip: number;
  // Heights that fail with a fatal error on every fetch
  public readonly fatalHeights = new Set<number>();
  // Remaining transient failures per height
  public readonly transientFailures = new Map<number, number>();
  // Called before each fetch resolves
  public onFetch: ((height: number) => void) | null = null;

  constructor(tip = Number.MAX_SAFE_INTEGER) {
    super();
    this.tip = tip;
  }

  public async fetchBlock(height: number): Promise<FetchResult> {
    this.fetchCalls.push(height);
    this.onFetch?.(height);
    await Promise.resolve();

    if (height > this.tip) {
      return { type: FetchResultType.NOT_YET_AVAILABLE, height };
    }
    if (this.fatalHeights.has(height)) {
      throw new FetchFatalError(`block ${height} is pruned`);
    }
    const remaining = this.transientFailures.get(height) ?? 0;
    if (remaining > 0) {
      this.transientFailures.set(height, remaining - 1);
      throw new NetworkTransientError(`block ${height}: HTTP 503`);
    }
    return { type: FetchResultType.FOUND, record: makeRecord(height) };
  }

  public async getLatestHeight(): Promise<number> {
    return this.tip;
  }

  public async disconnect(): Promise<void> {
    this.disconnected = true;
  }
}

/**
 * In-process storage backend with injectable write failures
 */
export class FakeBackend extends StorageBackend {
  public readonly name: string;
  public readonly heights = new Set<number>();
  public readonly writeCalls: number[] = [];
  // Remaining failed writes per height
  public readonly failures = new Map<number, number>();

  constructor(name: string) {
    super();
    this.name = name;
  }

  public async connect(): Promise<void> {}

  public async disconnect(): Promise<void> {}

  public async write(record: BlockRecord): Promise<WriteOutcome> {
    this.writeCalls.push(record.height);
    const remaining = this.failures.get(record.height) ?? 0;
    if (remaining > 0) {
      this.failures.set(record.height, remaining - 1);
      throw new StorageUnavailableError(this.name, "disk full");
    }
    if (this.heights.has(record.height)) {
      return WriteOutcome.EXISTS;
    }
    this.heights.add(record.height);
    return WriteOutcome.WRITTEN;
  }

  public async has(height: number): Promise<boolean> {
    return this.heights.has(height);
  }

  public async listHeights(): Promise<number[]> {
    return Array.from(this.heights).sort((a, b) => a - b);
  }

  public async healthCheck(): Promise<void> {}
}
