/**
 * Feed routes: the published RSS document, its media files and entry management
 *
 * GET /feed.xml - Podcast RSS feed
 * GET /media/:file - Published audio file
 * GET /api/entries - Entries, newest first
 * DELETE /api/entries/:entryId - Remove an entry and its audio file
 * GET /api/config - Public feed settings
 */

import { Router, Request, Response } from 'express';
import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import type { IngestOrchestrator } from '../../jobs/orchestrator.js';
import type { FeedStore } from '../../feed/store.js';
import type { AudioFormat } from '../../config/env.js';

export interface PublicConfig {
  podcastTitle: string;
  audioFormat: AudioFormat;
  siteUrl: string;
}

export interface FeedRouterOptions {
  orchestrator: Pick<IngestOrchestrator, 'listEntries' | 'deleteEntry'>;
  store: Pick<FeedStore, 'renderPublicFeed'>;
  mediaDir: string;
  config: PublicConfig;
}

export function createFeedRouter({ orchestrator, store, mediaDir, config }: FeedRouterOptions): Router {
  const router = Router();
  const mediaRoot = path.resolve(mediaDir);

  router.get('/feed.xml', (_req: Request, res: Response) => {
    res.type('application/rss+xml; charset=utf-8').send(store.renderPublicFeed());
  });

  /**
   * GET /media/:file
   *
   * Security: only serves files directly inside the media directory
   *
   * Status codes:
   * - 200 OK with file content
   * - 400 Bad Request if the name tries to escape the media directory
   * - 404 Not Found if the file doesn't exist
   */
  router.get('/media/:file', async (req: Request, res: Response): Promise<void> => {
    const fileName = req.params.file;
    const filePath = path.resolve(mediaRoot, fileName);

    if (path.dirname(filePath) !== mediaRoot) {
      res.status(400).json({ error: 'Invalid file path' });
      return;
    }

    try {
      const stats = await stat(filePath);
      if (!stats.isFile()) {
        res.status(404).json({ error: 'File not found' });
        return;
      }
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        res.status(404).json({ error: 'File not found' });
        return;
      }
      console.error(JSON.stringify({
        event: 'media_serve_failed',
        file: fileName,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      }));
      res.status(500).json({ error: 'Failed to serve file' });
      return;
    }

    res.sendFile(filePath);
  });

  router.get('/api/entries', (_req: Request, res: Response) => {
    const entries = orchestrator.listEntries();
    res.json({ entries, count: entries.length });
  });

  router.delete('/api/entries/:entryId', async (req: Request, res: Response): Promise<void> => {
    const { entryId } = req.params;

    try {
      const { found } = await orchestrator.deleteEntry(entryId);
      if (!found) {
        res.status(404).json({ error: 'Entry not found', errorCategory: 'NotFound', found });
        return;
      }
      res.json({ entryId, found });
    } catch (error) {
      console.error(JSON.stringify({
        event: 'entry_delete_failed',
        entryId,
        error: error instanceof Error ? error.message : String(error),
        timestamp: new Date().toISOString(),
      }));
      res.status(500).json({ error: 'Failed to delete entry' });
    }
  });

  router.get('/api/config', (_req: Request, res: Response) => {
    res.json(config);
  });

  return router;
}
