import {
  FetchFatalError,
  IngestError,
  NetworkTransientError,
} from "../modules/errors";
import { describeError } from "../modules/errors";
import { isRecord } from "./getValue";

const NOT_YET_AVAILABLE_PATTERN =
  /must be less than or equal to the current blockchain height/;
const PRUNED_PATTERN = /is not available, lowest height is/;
const BAD_STATUS_PATTERN = /Bad status on response: (\d{3})/;

// JSON-RPC codes the node uses for requests that will never succeed
const FATAL_RPC_CODES = new Set([-32600, -32601, -32602]);
// HTTP client errors worth another attempt
const RETRYABLE_CLIENT_STATUSES = new Set([408, 425, 429]);

export type RpcErrorClassification =
  | { type: "NOT_YET_AVAILABLE" }
  | { type: "ERROR"; error: IngestError };

function parseRpcErrorCode(message: string): number | null {
  if (!message.startsWith("{")) {
    return null;
  }
  try {
    const parsed: unknown = JSON.parse(message);
    return isRecord(parsed) && typeof parsed.code === "number"
      ? parsed.code
      : null;
  } catch {
    return null;
  }
}

/**
 * Classifies an error thrown by an RPC call.
 * Unrecognised failures are treated as transient.
 * @param error Thrown value
 * @param operation Description of the call for error messages
 */
export function classifyRpcError(
  error: unknown,
  operation: string
): RpcErrorClassification {
  if (error instanceof IngestError) {
    return { type: "ERROR", error };
  }

  const message = describeError(error);

  if (NOT_YET_AVAILABLE_PATTERN.test(message)) {
    return { type: "NOT_YET_AVAILABLE" };
  }

  if (PRUNED_PATTERN.test(message)) {
    return {
      type: "ERROR",
      error: new FetchFatalError(`${operation}: ${message}`, error),
    };
  }

  const status = BAD_STATUS_PATTERN.exec(message);
  if (status) {
    const code = parseInt(status[1], 10);
    const isFatal =
      code >= 400 && code < 500 && !RETRYABLE_CLIENT_STATUSES.has(code);
    return {
      type: "ERROR",
      error: isFatal
        ? new FetchFatalError(`${operation}: HTTP ${code}`, error)
        : new NetworkTransientError(`${operation}: HTTP ${code}`, error),
    };
  }

  const rpcCode = parseRpcErrorCode(message);
  if (rpcCode != null && FATAL_RPC_CODES.has(rpcCode)) {
    return {
      type: "ERROR",
      error: new FetchFatalError(`${operation}: ${message}`, error),
    };
  }

  return {
    type: "ERROR",
    error: new NetworkTransientError(`${operation}: ${message}`, error),
  };
}
