import { createHash } from "node:crypto";
import { MalformedResponseError } from "../modules/errors";
import type { BlockRecord, TxRecord } from "../types/BlockRecord";
import getValue from "./getValue";
import parseStringToInt from "./parseStringToInt";

const HEX_PATTERN = /^[0-9A-Fa-f]+$/;
const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

const isBase64 = (value: string) =>
  value.length % 4 === 0 && BASE64_PATTERN.test(value);

/**
 * Upper-case hex SHA-256 of base64 encoded transaction bytes
 */
export const hashTx = (data: string) =>
  createHash("sha256")
    .update(Buffer.from(data, "base64"))
    .digest("hex")
    .toUpperCase();

/**
 * Parses an RFC 3339 time, dropping precision beyond milliseconds
 */
function parseTime(value: string): Date | null {
  const date = new Date(value.replace(/(\.\d{3})\d+/, "$1"));
  return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Validates the result of a CometBFT "block" RPC call and decodes it into a record
 * @param result JSON-RPC result
 * @param height Requested height
 * @throws MalformedResponseError naming the first invalid field
 */
export function decodeBlock(result: unknown, height: number): BlockRecord {
  const fail = (reason: string): never => {
    throw new MalformedResponseError(height, reason);
  };

  const hash = getValue(result, ["block_id", "hash"]);
  if (typeof hash !== "string" || !HEX_PATTERN.test(hash)) {
    return fail("block_id.hash is not a hex string");
  }

  const decodedHeight = parseStringToInt(
    getValue(result, ["block", "header", "height"])
  );
  if (decodedHeight == null) {
    return fail("block.header.height is not an integer string");
  }
  if (decodedHeight !== height) {
    return fail(`block.header.height is ${decodedHeight}`);
  }

  const time = getValue(result, ["block", "header", "time"]);
  const timestamp = typeof time === "string" ? parseTime(time) : null;
  if (timestamp == null) {
    return fail("block.header.time is not a valid time");
  }

  const chainId = getValue(result, ["block", "header", "chain_id"]);
  if (typeof chainId !== "string" || chainId.length === 0) {
    return fail("block.header.chain_id is missing");
  }

  const rawTxs = getValue(result, ["block", "data", "txs"]) ?? [];
  if (!Array.isArray(rawTxs)) {
    return fail("block.data.txs is not a list");
  }

  const txs: TxRecord[] = rawTxs.map((data: unknown, index) => {
    if (typeof data !== "string" || !isBase64(data)) {
      return fail(`block.data.txs[${index}] is not base64`);
    }
    return Object.freeze({ hash: hashTx(data), index, data });
  });

  return Object.freeze({
    height,
    hash: hash.toUpperCase(),
    timestamp,
    chainId,
    txs: Object.freeze(txs),
    payload: result,
  });
}
