import {
  ExtractionFailure,
  InvalidInputError,
  SchedulerFault,
  createError,
  getErrorMessage,
  isAppError,
} from '../utils/errors';

describe('errors', () => {
  it('should create the class matching each code', () => {
    expect(createError('bad', 'INVALID_INPUT')).toBeInstanceOf(InvalidInputError);
    expect(createError('bad', 'EXTRACTION_FAILURE')).toBeInstanceOf(ExtractionFailure);
    expect(createError('bad', 'SCHEDULER_FAULT')).toBeInstanceOf(SchedulerFault);
  });

  it('should mark scheduler faults as non-operational and keep the cause', () => {
    const cause = new Error('listener broke');
    const fault = new SchedulerFault('Batch processing failed', 'batch-1', cause);

    expect(fault.isOperational).toBe(false);
    expect(fault.batchId).toBe('batch-1');
    expect(fault.cause).toBe(cause);
  });

  it('should recognise application errors', () => {
    expect(isAppError(new InvalidInputError('x'))).toBe(true);
    expect(isAppError(new Error('x'))).toBe(false);
    expect(isAppError({ code: 'INVALID_INPUT', isOperational: true })).toBe(false);
  });

  it('should extract a message or fall back', () => {
    expect(getErrorMessage(new Error('boom'))).toBe('boom');
    expect(getErrorMessage('plain text')).toBe('plain text');
    expect(getErrorMessage(undefined, 'Extraction failed')).toBe('Extraction failed');
    expect(getErrorMessage(new Error(''))).toBe('Unknown error');
  });
});
