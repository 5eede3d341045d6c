/**
 * Type definitions for the feed store and its persisted document
 */

/**
 * One published feed item
 * Immutable once stored; removed only by an explicit delete.
 */
export interface FeedEntry {
  /** Content-derived id, unique within the store, also the artifact base name */
  id: string;
  title: string;
  description: string;
  durationSeconds?: number;
  /** Public enclosure URL */
  mediaUrl: string;
  mimeType: string;
  fileSizeBytes: number;
  /** ISO timestamp */
  publishedAt: string;
  /** Original page of the source, for remote entries */
  sourceLink?: string;
  imageUrl?: string;
}

/**
 * Entries sorted newest-first plus a revision bumped by every persisted change
 */
export interface FeedState {
  revision: number;
  entries: readonly FeedEntry[];
}

/**
 * Channel-level metadata written into the RSS document
 */
export interface ChannelInfo {
  title: string;
  description: string;
  siteUrl: string;
  author: string;
  language: string;
  category: string;
  imageUrl?: string;
}

export interface AddEntryResult {
  added: boolean;
  duplicate: boolean;
}

export interface DeleteEntryResult {
  found: boolean;
}
