import {
  HttpBatchClient,
  HttpClient,
  type RpcClient,
} from "@cosmjs/tendermint-rpc";
import { isRetryableError, NetworkTransientError } from "../modules/errors";
import { createLogger } from "../modules/logger";
import type { Metrics } from "../modules/metrics";
import type { ErrorRetrier, Retrier } from "../modules/retry";
import { createErrorRetrier } from "../modules/retry";
import { FetchResultType, type FetchResult } from "../types/FetchResult";
import { classifyRpcError } from "../utils/classifyRpcError";
import { decodeBlock } from "../utils/decodeBlock";
import parseStringToInt from "../utils/parseStringToInt";
import getValue from "../utils/getValue";
import { withTimeout } from "../utils/withTimeout";
import { Fetcher } from "./fetcher";

const logger = createLogger("comet-http");

/**
 * Parameters found to work well with large batches, but may need further
 * benchmarking/tweaking.
 */
const BATCH_DISPATCH_INTERVAL = 200;
const BATCH_SIZE_LIMIT = 20;

const DEFAULT_TIMEOUT_MS = 12000;

type JsonRpcRequest = Parameters<RpcClient["execute"]>[0];

/**
 * A RPC call that resolved to a height beyond the node's tip
 */
class NotYetAvailable {}

/**
 * Queries blocks from a CometBFT node over HTTP JSON-RPC
 */
export class CometHttpClient extends Fetcher {
  private readonly rpcClient: RpcClient;
  private readonly errorRetrier: ErrorRetrier;
  private readonly timeoutMs: number;
  private readonly metrics: Metrics | null;
  private requestId = 0;

  /**
   * @param rpcClient RPC client used to make HTTP calls
   * @param retrier Retrier that wraps around HTTP RPC calls
   * @param timeoutMs Milliseconds before a single call is abandoned
   * @param metrics Counts calls, failures and fetched blocks
   */
  constructor(
    rpcClient: RpcClient,
    retrier: Retrier,
    timeoutMs = DEFAULT_TIMEOUT_MS,
    metrics: Metrics | null = null
  ) {
    super();
    this.rpcClient = rpcClient;
    this.errorRetrier = createErrorRetrier(retrier);
    this.timeoutMs = timeoutMs;
    this.metrics = metrics;
  }

  /**
   * Create a new CometHttpClient
   * @param endpoint RPC HTTP endpoint
   * @param retrier Retrier that wraps around HTTP RPC calls
   * @param options.timeoutMs Milliseconds before a single call is abandoned
   * @param options.shouldBatchRequests If true, HTTP requests will be batched
   * @param options.metrics Counts calls, failures and fetched blocks
   */
  static create(
    endpoint: string,
    retrier: Retrier,
    {
      timeoutMs = DEFAULT_TIMEOUT_MS,
      shouldBatchRequests = false,
      metrics = null,
    }: {
      timeoutMs?: number;
      shouldBatchRequests?: boolean;
      metrics?: Metrics | null;
    } = {}
  ): CometHttpClient {
    const rpcClient = shouldBatchRequests
      ? new HttpBatchClient(endpoint, {
          dispatchInterval: BATCH_DISPATCH_INTERVAL,
          batchSizeLimit: BATCH_SIZE_LIMIT,
        })
      : new HttpClient(endpoint);

    return new CometHttpClient(rpcClient, retrier, timeoutMs, metrics);
  }

  /**
   * Executes one JSON-RPC call, classifying failures
   * @returns The call's result, or NotYetAvailable
   */
  private async call(
    method: string,
    params: Record<string, string>
  ): Promise<unknown> {
    const request: JsonRpcRequest = {
      jsonrpc: "2.0",
      id: ++this.requestId,
      method,
      params,
    };
    const operation = `${method}(${JSON.stringify(params)})`;
    this.metrics?.apiRequests.inc({ method });

    try {
      // RpcClient takes no abort signal, a timed out request keeps running until the transport gives up
      const response = await withTimeout(
        this.rpcClient.execute(request),
        this.timeoutMs,
        () =>
          new NetworkTransientError(
            `${operation} timed out after ${this.timeoutMs}ms`
          )
      );
      return response.result;
    } catch (error) {
      const classification = classifyRpcError(error, operation);
      if (classification.type === "NOT_YET_AVAILABLE") {
        return new NotYetAvailable();
      }
      this.metrics?.apiFailures.inc({ method });
      throw classification.error;
    }
  }

  /**
   * Queries and decodes a block
   * @param height Block height
   */
  public async fetchBlock(height: number): Promise<FetchResult> {
    return this.errorRetrier.wrap(
      async (): Promise<FetchResult> => {
        const result = await this.call("block", { height: String(height) });
        if (result instanceof NotYetAvailable) {
          return { type: FetchResultType.NOT_YET_AVAILABLE, height };
        }
        const record = decodeBlock(result, height);
        this.metrics?.blocksFetched.inc();
        return { type: FetchResultType.FOUND, record };
      },
      {
        retryIf: isRetryableError,
        onFailedAttempt: (error, attempt) => {
          logger.warn(`fetchBlock(${height}) failed attempt ${attempt}: ${error}`);
        },
        onFailedLastAttempt: (error) => {
          logger.error(`fetchBlock(${height}): giving up: ${error}`);
        },
      }
    );
  }

  /**
   * Queries the latest block height of the node
   */
  public async getLatestHeight(): Promise<number> {
    return this.errorRetrier.wrap(
      async () => {
        const result = await this.call("status", {});
        const height = parseStringToInt(
          getValue(result, ["sync_info", "latest_block_height"])
        );
        if (height == null) {
          throw new NetworkTransientError(
            "status: sync_info.latest_block_height is missing"
          );
        }
        return height;
      },
      {
        retryIf: isRetryableError,
        onFailedAttempt: (error, attempt) => {
          logger.warn(`getLatestHeight() failed attempt ${attempt}: ${error}`);
        },
        onFailedLastAttempt: (error) => {
          logger.error(`getLatestHeight(): giving up: ${error}`);
        },
      }
    );
  }

  public async disconnect(): Promise<void> {
    this.rpcClient.disconnect();
  }
}
