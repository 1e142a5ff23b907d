export type ErrorCode =
  | 'INVALID_INPUT'
  | 'EXTRACTION_FAILURE'
  | 'SCHEDULER_FAULT';

export interface AppError extends Error {
  code: ErrorCode;
  isOperational: boolean;
}

/** Malformed request from the caller. Surfaced immediately, never retried. */
export class InvalidInputError extends Error implements AppError {
  readonly code = 'INVALID_INPUT';
  readonly isOperational = true;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidInputError';
  }
}

/** One file could not be extracted. Recorded on the batch, never raised past the job. */
export class ExtractionFailure extends Error implements AppError {
  readonly code = 'EXTRACTION_FAILURE';
  readonly isOperational = true;

  constructor(message: string, readonly fileName?: string) {
    super(message);
    this.name = 'ExtractionFailure';
  }
}

/** Internal scheduler error; the whole batch ends as failed. */
export class SchedulerFault extends Error implements AppError {
  readonly code = 'SCHEDULER_FAULT';
  readonly isOperational = false;

  constructor(message: string, readonly batchId: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'SchedulerFault';
  }
}

export function createError(message: string, code: ErrorCode): AppError {
  switch (code) {
    case 'INVALID_INPUT':
      return new InvalidInputError(message);
    case 'EXTRACTION_FAILURE':
      return new ExtractionFailure(message);
    case 'SCHEDULER_FAULT':
      return new SchedulerFault(message, '');
  }
}

export function isAppError(error: unknown): error is AppError {
  return (
    error instanceof Error &&
    'code' in error &&
    typeof error.code === 'string' &&
    'isOperational' in error &&
    typeof error.isOperational === 'boolean'
  );
}

export function getErrorMessage(error: unknown, fallback = 'Unknown error'): string {
  if (error instanceof Error) return error.message || fallback;
  if (typeof error === 'string' && error.trim()) return error;
  return fallback;
}
