import { CometHttpClient } from "./clients/cometHttpClient";
import { Fetcher, type CreateFetcherFunction } from "./clients/fetcher";
import createCollector, {
  type CollectorReport,
  type CreateCollectorParams,
} from "./createCollector";
import createGapDetector, {
  type CreateGapDetectorParams,
  type GapDetectionReport,
} from "./createGapDetector";
import createGapFixer, {
  GapFixStatus,
  type CreateGapFixerParams,
  type GapFixResult,
} from "./createGapFixer";
import createOrchestrator, {
  isSuccessfulRun,
  type CreateOrchestratorParams,
  type RunOptions,
} from "./createOrchestrator";
import {
  checkHealth,
  createBatchRuntime,
  createContinuousRuntime,
  createStorageReport,
  crossCheckGaps,
  type Runtime,
  type RuntimeDependencies,
  type StorageReport,
} from "./createRuntime";
import { loadConfig, type IngestConfig } from "./modules/config";
import {
  BrokerUnavailableError,
  FetchFatalError,
  IngestError,
  IngestErrorKind,
  MalformedResponseError,
  NetworkTransientError,
  StorageUnavailableError,
} from "./modules/errors";
import { FileBackend, type FileCleanupReport } from "./modules/fileBackend";
import { JobQueue } from "./modules/jobQueue";
import { MemoryJobQueue } from "./modules/memoryJobQueue";
import { MemorySequenceStore } from "./modules/memorySequenceStore";
import { Metrics, type MetricsSnapshot } from "./modules/metrics";
import { Persister, type PersistResult } from "./modules/persister";
import { PostgresBackend } from "./modules/postgresBackend";
import { RedisJobQueue } from "./modules/redisJobQueue";
import { RedisSequenceStore } from "./modules/redisSequenceStore";
import {
  createErrorRetrier,
  createExpBackoffRetrier,
  createRetrier,
  type ErrorRetrier,
  type Retrier,
} from "./modules/retry";
import { SequenceStore } from "./modules/sequenceStore";
import {
  StorageBackend,
  WriteOutcome,
  type StorageStats,
} from "./modules/storageBackend";
import {
  GapStatus,
  type BlockRange,
  type GapLease,
  type GapRange,
  type LeasedRange,
} from "./types/BlockRange";
import type { BlockRecord, TxRecord } from "./types/BlockRecord";
import { FetchResultType, type FetchResult } from "./types/FetchResult";
import type { IngestContext } from "./types/IngestContext";
import { IngestStatus, type IngestOutcome } from "./types/IngestOutcome";
import type { RunSummary } from "./types/RunSummary";
import { detectGaps } from "./utils/detectGaps";
import { ingestBlock } from "./utils/ingestBlock";
import { splitRange, splitRanges } from "./utils/splitRange";

export {
  BrokerUnavailableError,
  checkHealth,
  CometHttpClient,
  createBatchRuntime,
  createCollector,
  createContinuousRuntime,
  createErrorRetrier,
  createExpBackoffRetrier,
  createGapDetector,
  createGapFixer,
  createOrchestrator,
  createRetrier,
  createStorageReport,
  crossCheckGaps,
  detectGaps,
  FetchFatalError,
  Fetcher,
  FetchResultType,
  FileBackend,
  GapFixStatus,
  GapStatus,
  ingestBlock,
  IngestError,
  IngestErrorKind,
  IngestStatus,
  isSuccessfulRun,
  JobQueue,
  loadConfig,
  MalformedResponseError,
  MemoryJobQueue,
  MemorySequenceStore,
  Metrics,
  NetworkTransientError,
  Persister,
  PostgresBackend,
  RedisJobQueue,
  RedisSequenceStore,
  SequenceStore,
  splitRange,
  splitRanges,
  StorageBackend,
  StorageUnavailableError,
  WriteOutcome,
  type BlockRange,
  type BlockRecord,
  type CollectorReport,
  type CreateCollectorParams,
  type CreateFetcherFunction,
  type CreateGapDetectorParams,
  type CreateGapFixerParams,
  type CreateOrchestratorParams,
  type ErrorRetrier,
  type FetchResult,
  type FileCleanupReport,
  type GapDetectionReport,
  type GapFixResult,
  type GapLease,
  type GapRange,
  type IngestConfig,
  type IngestContext,
  type IngestOutcome,
  type LeasedRange,
  type MetricsSnapshot,
  type PersistResult,
  type Retrier,
  type RunOptions,
  type RunSummary,
  type Runtime,
  type RuntimeDependencies,
  type StorageReport,
  type StorageStats,
  type TxRecord,
};
