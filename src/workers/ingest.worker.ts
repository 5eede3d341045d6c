/**
 * Ingest worker
 *
 * Pulls job ids off the feed-ingest queue and runs them through the
 * orchestrator. Concurrency bounds how many downloads and encodes run at once;
 * anything beyond it waits in the queue.
 */

import { Worker, type Job } from 'bullmq';
import { workerConnection } from '../config/redis.js';
import { INGEST_QUEUE_NAME } from '../queues/ingest.queue.js';
import type { IngestOrchestrator } from '../jobs/orchestrator.js';
import type { IngestQueueData } from '../jobs/types.js';

let workerInstance: Worker<IngestQueueData, void> | null = null;

/**
 * Create the worker; `orchestrator.run` records failures on the job itself,
 * so a BullMQ failure here means the registry could not be written
 */
export function createIngestWorker(
  orchestrator: Pick<IngestOrchestrator, 'run'>,
  concurrency: number
): Worker<IngestQueueData, void> {
  const worker = new Worker<IngestQueueData, void>(
    INGEST_QUEUE_NAME,
    async (job: Job<IngestQueueData, void>) => {
      await orchestrator.run(job.data.jobId);
    },
    {
      connection: workerConnection,
      concurrency,
    }
  );

  worker.on('active', (job) => {
    console.log(JSON.stringify({
      event: 'queue_job_active',
      queueJobId: job.id,
      jobId: job.data.jobId,
      timestamp: new Date().toISOString(),
    }));
  });

  worker.on('failed', (job, error) => {
    console.error(JSON.stringify({
      event: 'queue_job_failed',
      queueJobId: job?.id ?? 'unknown',
      jobId: job?.data.jobId ?? 'unknown',
      error: {
        message: error.message,
        stack: error.stack,
      },
      timestamp: new Date().toISOString(),
    }));
  });

  worker.on('error', (error) => {
    console.error(`[Ingest] Worker error: ${error.message}`);
  });

  return worker;
}

export function startIngestWorker(orchestrator: Pick<IngestOrchestrator, 'run'>, concurrency: number): Worker<IngestQueueData, void> {
  if (workerInstance) {
    return workerInstance;
  }
  workerInstance = createIngestWorker(orchestrator, concurrency);
  console.log(`[Ingest] Worker started for queue '${INGEST_QUEUE_NAME}' with concurrency ${concurrency}`);
  return workerInstance;
}

/**
 * Stop the worker gracefully
 * Waits for in-flight jobs to finish.
 */
export async function stopIngestWorker(): Promise<void> {
  if (!workerInstance) return;

  console.log('[Ingest] Stopping worker...');
  const worker = workerInstance;
  workerInstance = null;
  await worker.close();
  console.log('[Ingest] Worker stopped');
}
