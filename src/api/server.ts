/**
 * Express server setup for podfeed
 *
 * Features:
 * - REST API for job submission, status and cancellation (/api/jobs)
 * - Entry listing and deletion (/api/entries)
 * - Podcast RSS feed (/feed.xml) and audio files (/media/:file)
 * - Bull Board monitoring dashboard (/admin/queues)
 * - Health check endpoint (/health)
 */

import express, { type Express, Request, Response } from 'express';
import type { Server } from 'node:http';
import { createJobsRouter, type JobsRouterOptions } from './routes/jobs.js';
import { createFeedRouter, type FeedRouterOptions } from './routes/feed.js';
import { BOARD_BASE_PATH } from './monitoring.js';
import type { ExpressAdapter } from '@bull-board/express';

export interface AppDeps {
  orchestrator: JobsRouterOptions['orchestrator'] & FeedRouterOptions['orchestrator'];
  store: FeedRouterOptions['store'];
  uploadsDir: string;
  maxUploadBytes: number;
  mediaDir: string;
  config: FeedRouterOptions['config'];
  /** Bull Board adapter; the dashboard is mounted only when given */
  board?: ExpressAdapter;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  // Uploads arrive as raw bodies and are streamed by their route
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok' });
  });

  app.use('/api/jobs', createJobsRouter({
    orchestrator: deps.orchestrator,
    uploadsDir: deps.uploadsDir,
    maxUploadBytes: deps.maxUploadBytes,
  }));
  app.use(createFeedRouter({
    orchestrator: deps.orchestrator,
    store: deps.store,
    mediaDir: deps.mediaDir,
    config: deps.config,
  }));

  if (deps.board) {
    app.use(BOARD_BASE_PATH, deps.board.getRouter());
  }

  return app;
}

/**
 * Start the HTTP server
 */
export function startServer(app: Express, port: number): Promise<Server> {
  return new Promise((resolve) => {
    const server = app.listen(port, () => {
      console.log(`Server listening on port ${port}`);
      console.log(`Bull Board available at http://localhost:${port}${BOARD_BASE_PATH}`);
      resolve(server);
    });
  });
}
