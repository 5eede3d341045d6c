/**
 * Ingest queue for feed jobs
 *
 * Configured with:
 * - a single attempt (a failed download or encode is recorded on the job, not retried)
 * - completed and failed entries aged out with the job registry's retention
 */

import { Queue } from 'bullmq';
import { queueConnection } from '../config/redis.js';
import { env } from '../config/env.js';
import type { JobDispatcher } from '../jobs/orchestrator.js';
import type { IngestQueueData } from '../jobs/types.js';

/**
 * Queue name constant - must match worker configuration
 */
export const INGEST_QUEUE_NAME = 'feed-ingest';

export function createIngestQueue(): Queue<IngestQueueData> {
  const queue = new Queue<IngestQueueData>(INGEST_QUEUE_NAME, {
    connection: queueConnection,
    defaultJobOptions: {
      attempts: 1,
      removeOnComplete: { age: env.JOB_RETENTION_SECONDS },
      removeOnFail: { age: env.JOB_RETENTION_SECONDS },
    },
  });

  console.log(`Ingest queue '${INGEST_QUEUE_NAME}' initialized with 1 attempt, retention ${env.JOB_RETENTION_SECONDS}s`);
  return queue;
}

/**
 * Dispatches registry job ids onto the queue
 * The BullMQ job id is the registry id, so a double dispatch is a no-op.
 */
export class QueueDispatcher implements JobDispatcher {
  constructor(private readonly queue: Queue<IngestQueueData>) {}

  async dispatch(jobId: string): Promise<void> {
    await this.queue.add('ingest', { jobId }, { jobId });
  }
}
