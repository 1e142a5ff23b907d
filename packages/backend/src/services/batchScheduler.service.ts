/**
 * Batch registry and scheduler for extraction jobs.
 *
 * Every batch is owned by one BatchRegistry instance; nothing is shared
 * between registries. Extraction calls go through one p-limit pool per
 * registry, so at most `maxConcurrentExtractions` calls are in flight no
 * matter how many files or batches are queued.
 *
 * All counter/result/error updates for a finished job happen in one
 * synchronous step (`recordOutcome`), so a status read never observes a
 * half-applied job.
 */

import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import { config } from '../config';
import { DocumentKind, FileFormat } from '../config/constants';
import {
  Batch,
  BatchFile,
  BatchStatistics,
  BatchStatus,
  ExtractedPayload,
  ExtractionJob,
  JobResult,
  JobStatus,
  RunOptions,
  SchedulerOptions,
  TERMINAL_BATCH_STATUSES,
} from '../types/batch.types';
import { DocumentExtractor } from '../types/extraction.types';
import { InvalidInputError, SchedulerFault, getErrorMessage } from '../utils/errors';
import { validateFile } from '../utils/file.utils';
import { isPlainObject } from '../utils/json.utils';

type JobOutcome =
  | { ok: true; data: ExtractedPayload; fileFormat: FileFormat }
  | { ok: false; error: string };

const DEFAULT_OPTIONS: SchedulerOptions = {
  maxBatchFiles: config.maxBatchFiles,
  maxConcurrentExtractions: config.maxConcurrentExtractions,
  extractionTimeoutMs: config.extractionTimeoutMs,
  maxFileSize: config.maxFileSize,
  allowedFileTypes: config.allowedFileTypes,
};

export function calculateProgress(processed: number, failed: number, total: number): number {
  if (total <= 0) return 100;
  const percentage = ((processed + failed) / total) * 100;
  return Math.min(100, Math.max(0, percentage));
}

function now(): string {
  return new Date().toISOString();
}

/** Rejects after `timeoutMs` and aborts the controller; 0 disables. */
async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number
): Promise<T> {
  const controller = new AbortController();
  if (timeoutMs <= 0) return task(controller.signal);

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new Error(`Extraction timed out after ${timeoutMs} ms`));
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class BatchRegistry {
  private readonly batches = new Map<string, Batch>();
  private readonly files = new Map<string, BatchFile[]>();
  private readonly options: SchedulerOptions;
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(
    private readonly extractor: DocumentExtractor,
    options: Partial<SchedulerOptions> = {}
  ) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
    if (this.options.maxConcurrentExtractions < 1) {
      throw new InvalidInputError('maxConcurrentExtractions must be at least 1');
    }
    this.limit = pLimit(this.options.maxConcurrentExtractions);
  }

  createBatch(name: string, files: BatchFile[]): string {
    if (!name || !name.trim()) {
      throw new InvalidInputError('Batch name is required');
    }
    if (!files || files.length === 0) {
      throw new InvalidInputError('A batch needs at least one file');
    }
    if (files.length > this.options.maxBatchFiles) {
      throw new InvalidInputError(
        `At most ${this.options.maxBatchFiles} files per batch (got ${files.length})`
      );
    }

    const id = uuidv4();
    const jobs: ExtractionJob[] = files.map((file, index) => ({
      id: uuidv4(),
      fileName: file.name,
      fileIndex: index,
      fileSize: file.content.length,
      documentKind: file.kind ?? null,
      status: JobStatus.QUEUED,
    }));

    this.batches.set(id, {
      id,
      name: name.trim(),
      status: BatchStatus.PENDING,
      jobs,
      totalFiles: files.length,
      processedFiles: 0,
      failedFiles: 0,
      progressPercentage: 0,
      cancelRequested: false,
      createdAt: now(),
      results: [],
      errors: [],
    });
    this.files.set(id, [...files]);

    console.log(`[Batch] Created "${name.trim()}" (${id}) with ${files.length} file(s)`);
    return id;
  }

  /**
   * Runs every job of a pending batch and resolves with its final state.
   * Per-file failures are recorded on the batch; only a scheduler fault
   * rejects (with SchedulerFault, after the batch is marked failed).
   */
  async run(batchId: string, options: RunOptions = {}): Promise<Batch> {
    const batch = this.batches.get(batchId);
    if (!batch) {
      throw new InvalidInputError(`Batch ${batchId} not found`);
    }
    if (batch.status !== BatchStatus.PENDING) {
      throw new InvalidInputError(`Batch ${batchId} is ${batch.status}; only pending batches can run`);
    }
    const files = this.files.get(batchId);
    if (!files) {
      throw new SchedulerFault(`Files of batch ${batchId} are no longer available`, batchId);
    }

    batch.status = BatchStatus.RUNNING;
    batch.startedAt = now();
    console.log(`[Batch] Running "${batch.name}" (${batch.totalFiles} files)`);

    let halted = false;
    try {
      await Promise.all(
        batch.jobs.map((job) =>
          this.limit(async () => {
            // Cancellation is observed right before dispatch
            if (batch.cancelRequested || halted) return;
            const outcome = await this.executeJob(job, files[job.fileIndex]);
            try {
              // Calls still in flight after a fault are recorded too, so no job stays running
              this.recordOutcome(batch, job, outcome);
              if (!halted) options.onProgress?.(this.snapshot(batch));
            } catch (error) {
              // Set before the pool dispatches the next queued job
              halted = true;
              throw error;
            }
          })
        )
      );

      this.finish(batch, batch.cancelRequested ? BatchStatus.CANCELLED : BatchStatus.COMPLETED);
    } catch (error) {
      halted = true;
      const message = `Batch processing failed: ${getErrorMessage(error)}`;
      batch.errors.push({ fileIndex: -1, fileName: 'batch_processing', error: message });
      this.finish(batch, BatchStatus.FAILED);
      console.error(`[Batch] "${batch.name}" failed:`, error);
      throw new SchedulerFault(message, batchId, error);
    } finally {
      this.files.delete(batchId);
    }

    return this.snapshot(batch);
  }

  private async executeJob(job: ExtractionJob, file: BatchFile): Promise<JobOutcome> {
    job.status = JobStatus.RUNNING;
    job.startedAt = now();

    const check = validateFile(file.name, file.content.length, this.options);
    if (!check.valid || !check.format || !check.mimeType) {
      return { ok: false, error: check.error ?? 'Invalid file' };
    }
    const { format, mimeType } = check;

    try {
      const response = await withTimeout(
        (signal) =>
          this.extractor.extract(
            { fileName: file.name, content: file.content, fileFormat: format, mimeType },
            { documentKind: file.kind ?? DocumentKind.COMMERCIAL_INVOICE },
            { signal }
          ),
        this.options.extractionTimeoutMs
      );

      if (!isPlainObject(response)) {
        return { ok: false, error: 'Extraction service returned a non-object response' };
      }
      if (typeof response.error === 'string' && response.error) {
        return { ok: false, error: response.error };
      }
      return this.toStoredPayload(response, format);
    } catch (error) {
      return { ok: false, error: getErrorMessage(error, 'Extraction failed') };
    }
  }

  /** Payloads must survive the copies handed out by `status`; anything else fails the job. */
  private toStoredPayload(response: ExtractedPayload, format: FileFormat): JobOutcome {
    try {
      return { ok: true, data: structuredClone(response), fileFormat: format };
    } catch (error) {
      return {
        ok: false,
        error: `Extraction service returned a payload that cannot be stored: ${getErrorMessage(error)}`,
      };
    }
  }

  private recordOutcome(batch: Batch, job: ExtractionJob, outcome: JobOutcome): void {
    job.completedAt = now();

    if (outcome.ok) {
      const result: JobResult = {
        fileName: job.fileName,
        fileIndex: job.fileIndex,
        fileFormat: outcome.fileFormat,
        documentKind: job.documentKind,
        processedAt: job.completedAt,
        data: outcome.data,
      };
      job.status = JobStatus.SUCCEEDED;
      job.result = result;
      batch.results.push(result);
      batch.processedFiles++;
    } else {
      job.status = JobStatus.FAILED;
      job.error = outcome.error;
      batch.errors.push({ fileIndex: job.fileIndex, fileName: job.fileName, error: outcome.error });
      batch.failedFiles++;
      console.warn(`[Batch] ${job.fileName} failed: ${outcome.error}`);
    }

    batch.progressPercentage = calculateProgress(
      batch.processedFiles,
      batch.failedFiles,
      batch.totalFiles
    );
  }

  private finish(batch: Batch, status: BatchStatus): void {
    if (TERMINAL_BATCH_STATUSES.has(batch.status)) return;
    batch.status = status;
    batch.endedAt = now();
    console.log(
      `[Batch] "${batch.name}" ${status}: ${batch.processedFiles} processed, ${batch.failedFiles} failed`
    );
  }

  private snapshot(batch: Batch): Batch {
    return structuredClone(batch);
  }

  /** Stops further dispatch. Calls already in flight run to completion. */
  cancel(batchId: string): boolean {
    const batch = this.batches.get(batchId);
    if (!batch || batch.status !== BatchStatus.RUNNING) return false;
    batch.cancelRequested = true;
    console.log(`[Batch] Cancellation requested for "${batch.name}"`);
    return true;
  }

  /** Copy of the batch; safe to poll at any rate. */
  status(batchId: string): Batch | undefined {
    const batch = this.batches.get(batchId);
    return batch ? this.snapshot(batch) : undefined;
  }

  list(): Batch[] {
    return Array.from(this.batches.values(), (batch) => this.snapshot(batch));
  }

  /** Removes a batch; a running one is cancelled first. */
  delete(batchId: string): boolean {
    if (!this.batches.has(batchId)) return false;
    this.cancel(batchId);
    this.batches.delete(batchId);
    this.files.delete(batchId);
    return true;
  }

  dispose(): void {
    for (const batchId of this.batches.keys()) {
      this.cancel(batchId);
    }
    this.batches.clear();
    this.files.clear();
  }

  getStatistics(): BatchStatistics {
    const batches = Array.from(this.batches.values());
    const byStatus: Record<BatchStatus, number> = {
      [BatchStatus.PENDING]: 0,
      [BatchStatus.RUNNING]: 0,
      [BatchStatus.COMPLETED]: 0,
      [BatchStatus.FAILED]: 0,
      [BatchStatus.CANCELLED]: 0,
    };

    let totalFiles = 0;
    let totalFilesProcessed = 0;
    let totalFilesFailed = 0;
    for (const batch of batches) {
      byStatus[batch.status]++;
      totalFiles += batch.totalFiles;
      totalFilesProcessed += batch.processedFiles;
      totalFilesFailed += batch.failedFiles;
    }

    const completed = batches.filter(
      (batch) => batch.status === BatchStatus.COMPLETED && batch.startedAt && batch.endedAt
    );
    const durationsMs = completed.map(
      (batch) => Date.parse(batch.endedAt ?? '') - Date.parse(batch.startedAt ?? '')
    );
    const totalDurationMs = durationsMs.reduce((sum, ms) => sum + ms, 0);
    const completedProcessed = completed.reduce((sum, batch) => sum + batch.processedFiles, 0);

    return {
      totalBatches: batches.length,
      byStatus,
      totalFiles,
      totalFilesProcessed,
      totalFilesFailed,
      successRate: totalFiles > 0 ? (totalFilesProcessed / totalFiles) * 100 : 0,
      averageFilesPerBatch: batches.length > 0 ? totalFiles / batches.length : 0,
      averageSecondsPerFile:
        completedProcessed > 0 ? totalDurationMs / 1000 / completedProcessed : null,
      averageBatchMinutes:
        completed.length > 0 ? totalDurationMs / completed.length / 60000 : null,
    };
  }
}
