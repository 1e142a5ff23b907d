import { DocumentKind, FileFormat } from '../config/constants';

export enum BatchStatus {
  PENDING = 'pending',
  RUNNING = 'running',
  COMPLETED = 'completed',
  FAILED = 'failed',
  CANCELLED = 'cancelled',
}

export enum JobStatus {
  QUEUED = 'queued',
  RUNNING = 'running',
  SUCCEEDED = 'succeeded',
  FAILED = 'failed',
}

export const TERMINAL_BATCH_STATUSES: ReadonlySet<BatchStatus> = new Set([
  BatchStatus.COMPLETED,
  BatchStatus.FAILED,
  BatchStatus.CANCELLED,
]);

/** One input document handed to a batch. */
export interface BatchFile {
  name: string;
  content: Buffer;
  kind?: DocumentKind;
}

export type ExtractedPayload = Record<string, unknown>;

export interface JobResult {
  fileName: string;
  fileIndex: number;
  fileFormat: FileFormat | null;
  documentKind: DocumentKind | null;
  processedAt: string;
  data: ExtractedPayload;
}

export interface ExtractionJob {
  id: string;
  fileName: string;
  fileIndex: number;
  fileSize: number;
  documentKind: DocumentKind | null;
  status: JobStatus;
  startedAt?: string;
  completedAt?: string;
  result?: JobResult;
  error?: string;
}

export interface BatchError {
  /** -1 for faults that do not belong to a single file */
  fileIndex: number;
  fileName: string;
  error: string;
}

export interface Batch {
  id: string;
  name: string;
  status: BatchStatus;
  jobs: ExtractionJob[];
  totalFiles: number;
  processedFiles: number;
  failedFiles: number;
  progressPercentage: number;
  cancelRequested: boolean;
  createdAt: string;
  startedAt?: string;
  endedAt?: string;
  results: JobResult[];
  errors: BatchError[];
}

export type ProgressListener = (batch: Batch) => void;

export interface RunOptions {
  onProgress?: ProgressListener;
}

export interface SchedulerOptions {
  maxBatchFiles: number;
  maxConcurrentExtractions: number;
  extractionTimeoutMs: number;
  maxFileSize: number;
  allowedFileTypes: string[];
}

export interface BatchStatistics {
  totalBatches: number;
  byStatus: Record<BatchStatus, number>;
  totalFiles: number;
  totalFilesProcessed: number;
  totalFilesFailed: number;
  successRate: number;
  averageFilesPerBatch: number;
  /** Seconds per processed file over completed batches; null until one completes */
  averageSecondsPerFile: number | null;
  averageBatchMinutes: number | null;
}
