/**
 * Persistent, ordered, deduplicated feed store
 *
 * The feed document on disk is the source of truth. Mutations run one at a
 * time behind a mutex and are persisted with write-temp-then-rename, so a
 * crash mid-save leaves the previous document intact. Readers get the current
 * immutable snapshot, which is only swapped after a successful save.
 */

import { open, readFile, rename, rm } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import * as path from 'node:path';
import { parseFeed, renderFeed } from './document.js';
import { Mutex } from '../jobs/locks.js';
import { FeedPersistError } from '../jobs/errors.js';
import type { AddEntryResult, ChannelInfo, DeleteEntryResult, FeedEntry, FeedState } from './types.js';

export interface FeedStoreOptions {
  feedPath: string;
  mediaDir: string;
  channel: ChannelInfo;
  /** Presentation cap for listEntries() and the served feed */
  maxItems: number;
}

const EMPTY_STATE: FeedState = { revision: 0, entries: [] };

/**
 * Newest first; Array.prototype.sort is stable so equal timestamps keep
 * their relative order
 */
function sortEntries(entries: FeedEntry[]): FeedEntry[] {
  return entries.sort((a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt));
}

export class FeedStore {
  private state: FeedState = EMPTY_STATE;
  private readonly writeLock = new Mutex();

  constructor(private readonly options: FeedStoreOptions) {}

  /**
   * Load persisted state; a missing file means an empty feed
   *
   * @throws FeedCorruptError when the file exists but cannot be parsed
   */
  async load(): Promise<void> {
    let xml: string;
    try {
      xml = await readFile(this.options.feedPath, 'utf8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        this.state = EMPTY_STATE;
        return;
      }
      throw error;
    }

    const loaded = parseFeed(xml);
    this.state = { revision: loaded.revision, entries: sortEntries([...loaded.entries]) };

    console.log(JSON.stringify({
      event: 'feed_loaded',
      feedPath: this.options.feedPath,
      entries: this.state.entries.length,
      revision: this.state.revision,
      timestamp: new Date().toISOString(),
    }));
  }

  get revision(): number {
    return this.state.revision;
  }

  /**
   * Entries newest-first, capped at maxItems
   */
  listEntries(): FeedEntry[] {
    return this.state.entries.slice(0, this.options.maxItems);
  }

  /** Total stored entries, including those beyond the presentation cap */
  get size(): number {
    return this.state.entries.length;
  }

  hasEntry(id: string): boolean {
    return this.state.entries.some((entry) => entry.id === id);
  }

  getEntry(id: string): FeedEntry | undefined {
    return this.state.entries.find((entry) => entry.id === id);
  }

  /**
   * Insert an entry unless its id is already stored
   * A duplicate is a successful no-op: nothing is written.
   *
   * @throws FeedPersistError when the save fails; state is unchanged
   */
  addEntry(entry: FeedEntry): Promise<AddEntryResult> {
    return this.writeLock.runExclusive(async () => {
      if (this.hasEntry(entry.id)) {
        return { added: false, duplicate: true };
      }

      await this.commit({
        revision: this.state.revision + 1,
        entries: sortEntries([entry, ...this.state.entries]),
      });

      console.log(JSON.stringify({
        event: 'feed_entry_added',
        entryId: entry.id,
        revision: this.state.revision,
        timestamp: new Date().toISOString(),
      }));

      return { added: true, duplicate: false };
    });
  }

  /**
   * Remove an entry and its media artifact
   * An unknown id is not an error.
   *
   * @throws FeedPersistError when the save fails; state and media are unchanged
   */
  deleteEntry(id: string): Promise<DeleteEntryResult> {
    return this.writeLock.runExclusive(async () => {
      const entry = this.getEntry(id);
      if (!entry) {
        return { found: false };
      }
      const artifact = this.artifactPath(entry);

      await this.commit({
        revision: this.state.revision + 1,
        entries: this.state.entries.filter((candidate) => candidate.id !== id),
      });

      if (artifact) {
        await rm(artifact, { force: true });
      }

      console.log(JSON.stringify({
        event: 'feed_entry_deleted',
        entryId: id,
        artifact,
        revision: this.state.revision,
        timestamp: new Date().toISOString(),
      }));

      return { found: true };
    });
  }

  /**
   * Served RSS document, capped at maxItems
   */
  renderPublicFeed(): string {
    return renderFeed(this.options.channel, this.state, this.options.maxItems);
  }

  /**
   * Local path of an entry's artifact: the enclosure URL's file name inside
   * the media directory
   */
  artifactPath(entry: FeedEntry): string | null {
    let fileName: string;
    try {
      fileName = path.posix.basename(new URL(entry.mediaUrl).pathname);
    } catch {
      fileName = path.posix.basename(entry.mediaUrl);
    }

    if (!fileName.startsWith(`${entry.id}.`) || fileName.includes('/') || fileName.includes('\\')) {
      return null;
    }
    return path.join(this.options.mediaDir, fileName);
  }

  /**
   * Persist `next` atomically, then make it the visible state
   */
  private async commit(next: FeedState): Promise<void> {
    await this.persist(next);
    this.state = next;
  }

  private async persist(next: FeedState): Promise<void> {
    const { feedPath } = this.options;
    const tempPath = path.join(path.dirname(feedPath), `.${path.basename(feedPath)}.${randomUUID()}.tmp`);

    try {
      const handle = await open(tempPath, 'w');
      try {
        await handle.writeFile(renderFeed(this.options.channel, next), 'utf8');
        await handle.sync();
      } finally {
        await handle.close();
      }
      await rename(tempPath, feedPath);
    } catch (error) {
      await rm(tempPath, { force: true });

      const message = error instanceof Error ? error.message : String(error);
      console.error(JSON.stringify({
        event: 'feed_persist_failed',
        feedPath,
        error: message,
        timestamp: new Date().toISOString(),
      }));
      throw new FeedPersistError(`Failed to save feed: ${message}`, { cause: error });
    }
  }
}
