import type { MetricsSnapshot } from "../modules/metrics";
import type { BlockRange } from "./BlockRange";

/**
 * Result of a single batch run
 */
export type RunSummary = {
  assigned: number;
  attempted: number;
  succeeded: number;
  alreadyKnown: number;
  failed: { height: number; error: string }[];
  // Assigned heights beyond the source's tip
  notYetAvailable: number[];
  // Assigned heights never handed to a fetch because the run was stopped
  notAttempted: number[];
  // Assigned heights missing from the sequence store when the run ended
  unresolvedHeights: number[];
  gaps: {
    found: number;
    enqueued: number;
    fixed: number;
    stuck: number;
    // Ranges still pending or in flight after reconciliation
    open: BlockRange[];
    // Gaps left in the sequence store after reconciliation
    remaining: BlockRange[];
  };
  frontier: number;
  elapsedMs: number;
  // Ingested blocks per second
  throughput: number;
  stopped: boolean;
  metrics: MetricsSnapshot | null;
};
