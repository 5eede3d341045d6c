/**
 * Error taxonomy for the ingest pipeline
 *
 * Every error carries a stable `category` that is stored on failed jobs and
 * returned to API callers next to the human-readable message.
 */

export type ErrorCategory =
  | 'InvalidSource'
  | 'AcquisitionFailed'
  | 'TranscodeFailed'
  | 'FeedPersistError'
  | 'NotFound'
  | 'Cancelled'
  | 'Internal';

export class IngestError extends Error {
  readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.category = category;
  }
}

/**
 * Input could not be resolved to a canonical source id. Never enters the pipeline.
 */
export class InvalidSourceError extends IngestError {
  constructor(message: string) {
    super('InvalidSource', message);
  }
}

export class AcquisitionFailedError extends IngestError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { timedOut?: boolean; cause?: unknown }) {
    super('AcquisitionFailed', message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

export class TranscodeFailedError extends IngestError {
  readonly timedOut: boolean;

  constructor(message: string, options?: { timedOut?: boolean; cause?: unknown }) {
    super('TranscodeFailed', message, options);
    this.timedOut = options?.timedOut ?? false;
  }
}

/**
 * Atomic save failed. The previously persisted feed is left untouched.
 */
export class FeedPersistError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('FeedPersistError', message, options);
  }
}

/**
 * The persisted feed exists but cannot be read back. Raised at startup.
 */
export class FeedCorruptError extends IngestError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('Internal', message, options);
  }
}

export class JobNotFoundError extends IngestError {
  constructor(jobId: string) {
    super('NotFound', `Job not found: ${jobId}`);
  }
}

export class JobCancelledError extends IngestError {
  constructor(message = 'Job cancelled') {
    super('Cancelled', message);
  }
}

/**
 * Map anything thrown inside a job to a category and message
 */
export function describeError(error: unknown): { category: ErrorCategory; message: string } {
  if (error instanceof IngestError) {
    return { category: error.category, message: error.message };
  }
  return {
    category: 'Internal',
    message: error instanceof Error ? error.message : String(error),
  };
}
