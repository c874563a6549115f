/**
 * A transaction contained in a block
 */
export type TxRecord = {
  // Upper-case hex SHA-256 of the transaction bytes
  hash: string;
  index: number;
  // Base64 encoded transaction bytes
  data: string;
};

/**
 * A fetched block. Immutable once decoded.
 */
export type BlockRecord = Readonly<{
  height: number;
  hash: string;
  timestamp: Date;
  chainId: string;
  txs: readonly TxRecord[];
  // Raw RPC result the record was decoded from
  payload: unknown;
}>;
