/**
 * Bull Board monitoring dashboard setup
 *
 * Provides a web UI for inspecting job queue status at /admin/queues
 */

import { createBullBoard } from '@bull-board/api';
import { BullMQAdapter } from '@bull-board/api/bullMQAdapter';
import { ExpressAdapter } from '@bull-board/express';
import type { Queue } from 'bullmq';

export const BOARD_BASE_PATH = '/admin/queues';

/**
 * Express adapter for Bull Board dashboard
 * Mount with: app.use(BOARD_BASE_PATH, adapter.getRouter())
 */
export function createQueueBoard(queues: Queue[]): ExpressAdapter {
  const serverAdapter = new ExpressAdapter();
  serverAdapter.setBasePath(BOARD_BASE_PATH);

  createBullBoard({
    queues: queues.map((queue) => new BullMQAdapter(queue)),
    serverAdapter,
  });

  return serverAdapter;
}
