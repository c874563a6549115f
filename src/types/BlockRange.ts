import type { ValuesUnion } from "./ValuesUnion";

/**
 * Represents an inclusive range of blocks
 */
export type BlockRange = {
  startBlockHeight: number;
  endBlockHeight: number;
};

export const GapStatus = {
  // Waiting to be picked up by a gap fixer
  PENDING: "PENDING",
  // Leased by a gap fixer until leaseExpiresAt
  IN_FLIGHT: "IN_FLIGHT",
  // Repair budget exhausted, held for an operator
  STUCK: "STUCK",
} as const;

export type GapStatus = ValuesUnion<typeof GapStatus>;

/**
 * A block range of missing heights scheduled for repair.
 * Two gap ranges with the same bounds are the same task.
 */
export type GapRange = BlockRange & {
  status: GapStatus;
  // Number of failed repair attempts
  attempts: number;
  // Epoch milliseconds after which the range may be dequeued
  availableAt: number;
  leaseExpiresAt: number | null;
  // Identifies the holder of the current lease
  leaseId: string | null;
  lastError: string | null;
};

/**
 * A range held under a lease. Transitions made with a lease that is no
 * longer current are ignored.
 */
export type LeasedRange = BlockRange & { leaseId: string };

/**
 * A gap range as returned by dequeue
 */
export type GapLease = GapRange & LeasedRange;
