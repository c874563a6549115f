import { randomUUID } from "node:crypto";
import {
  GapStatus,
  type BlockRange,
  type GapLease,
  type GapRange,
  type LeasedRange,
} from "../types/BlockRange";
import { rangeKey } from "../utils/formatRanges";
import { sleep } from "../utils/sleep";
import { byStartHeight, JobQueue, rangesOverlap } from "./jobQueue";

// Delay between checks for an eligible range while dequeuing
const DEFAULT_POLL_INTERVAL_MS = 50;

/**
 * In-process job queue used by batch mode
 */
export class MemoryJobQueue extends JobQueue {
  private readonly tasks = new Map<string, GapRange>();
  private readonly leaseMs: number;
  private readonly pollIntervalMs: number;
  private readonly now: () => number;

  /**
   * @param leaseMs Milliseconds a dequeued range stays leased
   * @param pollIntervalMs Delay between checks while dequeuing
   * @param now Clock returning epoch milliseconds
   */
  constructor(
    leaseMs: number,
    pollIntervalMs = DEFAULT_POLL_INTERVAL_MS,
    now: () => number = Date.now
  ) {
    super();
    this.leaseMs = leaseMs;
    this.pollIntervalMs = pollIntervalMs;
    this.now = now;
  }

  public async enqueue(range: BlockRange): Promise<boolean> {
    for (const task of this.tasks.values()) {
      if (rangesOverlap(task, range)) {
        return false;
      }
    }

    this.tasks.set(rangeKey(range), {
      startBlockHeight: range.startBlockHeight,
      endBlockHeight: range.endBlockHeight,
      status: GapStatus.PENDING,
      attempts: 0,
      availableAt: this.now(),
      leaseExpiresAt: null,
      leaseId: null,
      lastError: null,
    });
    return true;
  }

  private tryLease(): GapLease | null {
    const now = this.now();
    let next: GapRange | null = null;

    for (const task of this.tasks.values()) {
      // Reclaim ranges whose lease expired
      if (
        task.status === GapStatus.IN_FLIGHT &&
        task.leaseExpiresAt != null &&
        task.leaseExpiresAt <= now
      ) {
        task.status = GapStatus.PENDING;
        task.leaseExpiresAt = null;
        task.leaseId = null;
      }

      if (
        task.status === GapStatus.PENDING &&
        task.availableAt <= now &&
        (next == null || task.startBlockHeight < next.startBlockHeight)
      ) {
        next = task;
      }
    }

    if (next == null) {
      return null;
    }
    const leaseId = randomUUID();
    next.status = GapStatus.IN_FLIGHT;
    next.leaseExpiresAt = now + this.leaseMs;
    next.leaseId = leaseId;
    return { ...next, leaseId };
  }

  public async dequeue(timeoutMs: number): Promise<GapLease | null> {
    const deadline = this.now() + timeoutMs;

    for (;;) {
      const task = this.tryLease();
      if (task != null) {
        return task;
      }

      const remaining = deadline - this.now();
      if (remaining <= 0) {
        return null;
      }
      await sleep(Math.min(this.pollIntervalMs, remaining));
    }
  }

  /**
   * The task held under a lease, or null if the lease is no longer current
   */
  private leased({ leaseId, ...range }: LeasedRange): GapRange | null {
    const task = this.tasks.get(rangeKey(range));
    return task != null &&
      task.status === GapStatus.IN_FLIGHT &&
      task.leaseId === leaseId
      ? task
      : null;
  }

  public async renew(lease: LeasedRange): Promise<boolean> {
    const task = this.leased(lease);
    if (task == null) {
      return false;
    }
    task.leaseExpiresAt = this.now() + this.leaseMs;
    return true;
  }

  public async ack(lease: LeasedRange): Promise<boolean> {
    if (this.leased(lease) == null) {
      return false;
    }
    this.tasks.delete(rangeKey(lease));
    return true;
  }

  /**
   * Ends a lease, returning the task to pending after a delay
   */
  private unlease(task: GapRange, delayMs: number) {
    task.status = GapStatus.PENDING;
    task.availableAt = this.now() + delayMs;
    task.leaseExpiresAt = null;
    task.leaseId = null;
  }

  public async retry(
    lease: LeasedRange,
    delayMs: number,
    error: string
  ): Promise<boolean> {
    const task = this.leased(lease);
    if (task == null) {
      return false;
    }
    this.unlease(task, delayMs);
    task.attempts += 1;
    task.lastError = error;
    return true;
  }

  public async release(lease: LeasedRange): Promise<boolean> {
    const task = this.leased(lease);
    if (task == null) {
      return false;
    }
    this.unlease(task, 0);
    return true;
  }

  public async markStuck(lease: LeasedRange, reason: string): Promise<boolean> {
    const task = this.leased(lease);
    if (task == null) {
      return false;
    }
    task.status = GapStatus.STUCK;
    task.leaseExpiresAt = null;
    task.leaseId = null;
    task.lastError = reason;
    return true;
  }

  private list(statuses: GapStatus[]): GapRange[] {
    return Array.from(this.tasks.values())
      .filter((task) => statuses.includes(task.status))
      .map((task) => ({ ...task }))
      .sort(byStartHeight);
  }

  public async listOpen(): Promise<GapRange[]> {
    return this.list([GapStatus.PENDING, GapStatus.IN_FLIGHT]);
  }

  public async listStuck(): Promise<GapRange[]> {
    return this.list([GapStatus.STUCK]);
  }

  public async requeueStuck(range: BlockRange): Promise<boolean> {
    const task = this.tasks.get(rangeKey(range));
    if (task == null || task.status !== GapStatus.STUCK) {
      return false;
    }
    task.status = GapStatus.PENDING;
    task.attempts = 0;
    task.availableAt = this.now();
    return true;
  }

  public async size(): Promise<number> {
    return this.tasks.size;
  }
}
