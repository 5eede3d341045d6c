/**
 * Job type definitions for the ingest pipeline
 *
 * These types define the contract between:
 * - API endpoints that submit jobs and poll their status
 * - The orchestrator that drives each job through its states
 * - The registry that keeps job records until retention expires
 */

import type { ErrorCategory } from './errors.js';
import type { AcquisitionProgress, SourceReference } from '../media/types.js';

/**
 * Linear pipeline; `completed` and `failed` are terminal
 */
export type JobState =
  | 'pending'
  | 'acquiring'
  | 'transcoding'
  | 'publishing'
  | 'completed'
  | 'failed';

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set<JobState>(['completed', 'failed']);

export function isTerminal(state: JobState): boolean {
  return TERMINAL_STATES.has(state);
}

export interface IngestJob {
  id: string;
  source: SourceReference;
  /** Set at submission for remote sources */
  canonicalSourceId?: string;
  /** Caller-supplied overrides */
  title?: string;
  description?: string;
  state: JobState;
  /** Human-readable description of the current step */
  message: string;
  /** Present only while acquiring */
  progress?: AcquisitionProgress;
  resultEntryId?: string;
  /** True when the entry already existed */
  duplicate?: boolean;
  errorCategory?: ErrorCategory;
  errorMessage?: string;
  /** Non-fatal issues, e.g. an encoder fallback */
  warnings: string[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Fields a state transition may change
 */
export type JobUpdate = Partial<Omit<IngestJob, 'id' | 'source' | 'createdAt' | 'updatedAt'>>;

/**
 * Status returned to pollers
 */
export interface JobStatusView {
  jobId: string;
  state: JobState;
  message: string;
  progress?: AcquisitionProgress;
  resultEntryId?: string;
  duplicate?: boolean;
  errorCategory?: ErrorCategory;
  errorMessage?: string;
  warnings: string[];
  createdAt: string;
  updatedAt: string;
}

/**
 * Queue payload: the job record lives in the registry, the queue only
 * carries its id
 */
export interface IngestQueueData {
  jobId: string;
}

export interface SubmitOptions {
  title?: string;
  description?: string;
}
