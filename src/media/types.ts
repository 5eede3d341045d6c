/**
 * Type definitions for media acquisition and transcoding
 */

/**
 * Caller-supplied pointer to media
 * Discriminated union by kind
 */
export type SourceReference =
  | { kind: 'remote'; value: string }
  | { kind: 'upload'; path: string; originalName: string };

/**
 * Download progress relayed from the extraction tool
 */
export interface AcquisitionProgress {
  percentComplete: number;
  transferRate: string;          // e.g. '1.23MiB/s'
  estimatedTimeRemaining: string; // e.g. '00:42'
}

export interface MediaMetadata {
  title: string;
  description: string;
  durationSeconds?: number;
  thumbnailUrl?: string;
  webpageUrl?: string;
  /** ISO timestamp of the original upload, midnight UTC of its date */
  publishedAt?: string;
}

/**
 * Raw media obtained for a job, before transcoding
 */
export interface AcquiredMedia {
  filePath: string;
  metadata: MediaMetadata;
}

/**
 * Result of the encode step
 * `fallback` is true when the raw file was kept because the encoder failed
 */
export interface TranscodeResult {
  filePath: string;
  mimeType: string;
  fallback: boolean;
  warning?: string;
}
