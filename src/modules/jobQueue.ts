import type {
  BlockRange,
  GapLease,
  GapRange,
  LeasedRange,
} from "../types/BlockRange";

/**
 * Queue of gap repair tasks with at-least-once delivery.
 * A range stays held by the queue from enqueue until it is acknowledged.
 */
export abstract class JobQueue {
  /**
   * Adds a pending range
   * @returns False if the range overlaps a range the queue still holds
   */
  public abstract enqueue(range: BlockRange): Promise<boolean>;
  /**
   * Leases the eligible pending range with the lowest start, reclaiming expired leases first
   * @param timeoutMs Milliseconds to wait for an eligible range
   * @returns The leased range, or null on timeout
   */
  public abstract dequeue(timeoutMs: number): Promise<GapLease | null>;
  /**
   * Extends a lease by the queue's lease duration
   * @returns False if the lease is no longer current
   */
  public abstract renew(lease: LeasedRange): Promise<boolean>;
  /**
   * Removes a fully resolved range
   * @returns False if the lease is no longer current
   */
  public abstract ack(lease: LeasedRange): Promise<boolean>;
  /**
   * Returns a range to pending with one more failed attempt
   * @param delayMs Milliseconds before the range is eligible again
   * @param error Reason of the failed attempt
   * @returns False if the lease is no longer current
   */
  public abstract retry(
    lease: LeasedRange,
    delayMs: number,
    error: string
  ): Promise<boolean>;
  /**
   * Returns a leased range to pending without counting an attempt
   * @returns False if the lease is no longer current
   */
  public abstract release(lease: LeasedRange): Promise<boolean>;
  /**
   * Holds a range for operator attention. Stuck ranges are never dequeued.
   * @returns False if the lease is no longer current
   */
  public abstract markStuck(lease: LeasedRange, reason: string): Promise<boolean>;
  /**
   * Pending and in-flight ranges, sorted by startBlockHeight ascending
   */
  public abstract listOpen(): Promise<GapRange[]>;
  /**
   * Stuck ranges, sorted by startBlockHeight ascending
   */
  public abstract listStuck(): Promise<GapRange[]>;
  /**
   * Moves a stuck range back to pending with its attempts reset
   * @returns False if the range is not stuck
   */
  public abstract requeueStuck(range: BlockRange): Promise<boolean>;
  /**
   * Number of ranges held, stuck ones included
   */
  public abstract size(): Promise<number>;
}

export const rangesOverlap = (a: BlockRange, b: BlockRange) =>
  a.startBlockHeight <= b.endBlockHeight &&
  b.startBlockHeight <= a.endBlockHeight;

export const byStartHeight = (a: BlockRange, b: BlockRange) =>
  a.startBlockHeight - b.startBlockHeight;
