/**
 * podfeed entry point
 *
 * Startup sequence:
 * 1. Environment validation (fail-fast if missing)
 * 2. Redis connections for BullMQ and the job registry
 * 3. Data directory layout and persisted feed
 * 4. Ingest queue, orchestrator and worker
 * 5. HTTP server startup (Express + Bull Board)
 */

console.log('podfeed starting...');

// Import env first - validates required env vars on load (fail-fast pattern)
import { env } from './config/env.js';

// Import Redis connections - configures connections for BullMQ
import { workerConnection, queueConnection } from './config/redis.js';

import { createIngestQueue, QueueDispatcher, INGEST_QUEUE_NAME } from './queues/ingest.queue.js';
import { startIngestWorker, stopIngestWorker } from './workers/ingest.worker.js';
import { createApp, startServer } from './api/server.js';
import { createQueueBoard } from './api/monitoring.js';
import { IngestOrchestrator } from './jobs/orchestrator.js';
import { RedisJobRegistry } from './jobs/registry.js';
import { FeedStore } from './feed/store.js';
import { MediaAcquirer } from './media/acquirer.js';
import { Transcoder } from './media/transcoder.js';
import { spawnCommand } from './media/command.js';
import { ensureLayoutExists, getMediaLayout } from './media/organization.js';
import { createDiscordNotifier } from './notifications/discord.js';

console.log(`Environment: ${env.NODE_ENV}`);
console.log(`Server port configured: ${env.PORT}`);

// Log Redis connection status
console.log('Worker connection:', workerConnection.status);
console.log('Queue connection:', queueConnection.status);

async function main(): Promise<void> {
  const layout = getMediaLayout(env.DATA_DIR);
  await ensureLayoutExists(layout);

  const store = new FeedStore({
    feedPath: layout.feedPath,
    mediaDir: layout.mediaDir,
    maxItems: env.FEED_MAX_ITEMS,
    channel: {
      title: env.PODCAST_TITLE,
      description: env.PODCAST_DESCRIPTION,
      siteUrl: env.SITE_URL,
      author: env.PODCAST_AUTHOR,
      language: env.PODCAST_LANGUAGE,
      category: env.PODCAST_CATEGORY,
      imageUrl: env.PODCAST_IMAGE_URL,
    },
  });
  await store.load();

  const queue = createIngestQueue();

  const orchestrator = new IngestOrchestrator({
    registry: new RedisJobRegistry(queueConnection, env.JOB_RETENTION_SECONDS),
    dispatcher: new QueueDispatcher(queue),
    acquirer: new MediaAcquirer({
      runCommand: spawnCommand,
      ytDlpPath: env.YT_DLP_PATH,
      watchUrlBase: env.WATCH_URL_BASE,
      timeoutMs: env.ACQUIRE_TIMEOUT_MS,
    }),
    transcoder: new Transcoder({
      runCommand: spawnCommand,
      ffmpegPath: env.FFMPEG_PATH,
      ffprobePath: env.FFPROBE_PATH,
      format: env.AUDIO_FORMAT,
      timeoutMs: env.TRANSCODE_TIMEOUT_MS,
    }),
    store,
    layout,
    mediaBaseUrl: env.MEDIA_BASE_URL,
    notifier: env.DISCORD_WEBHOOK_URL ? createDiscordNotifier(env.DISCORD_WEBHOOK_URL) : undefined,
  });

  const app = createApp({
    orchestrator,
    store,
    uploadsDir: layout.uploadsDir,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    mediaDir: layout.mediaDir,
    config: {
      podcastTitle: env.PODCAST_TITLE,
      audioFormat: env.AUDIO_FORMAT,
      siteUrl: env.SITE_URL,
    },
    board: createQueueBoard([queue]),
  });
  const server = await startServer(app, env.PORT);

  startIngestWorker(orchestrator, env.INGEST_CONCURRENCY);

  // Graceful shutdown handler
  let isShuttingDown = false;
  async function gracefulShutdown(signal: string): Promise<void> {
    if (isShuttingDown) return;
    isShuttingDown = true;

    console.log(`${signal} received, shutting down gracefully...`);

    try {
      // Stop taking requests, then let in-flight jobs finish
      await new Promise<void>((resolve) => server.close(() => resolve()));
      await stopIngestWorker();
      await queue.close();
      await workerConnection.quit();
      await queueConnection.quit();
    } catch (error) {
      console.error('Error during shutdown:', error);
    }

    process.exit(0);
  }

  process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));
  process.on('SIGINT', () => void gracefulShutdown('SIGINT'));

  console.log('Initialization complete');
  console.log(`Queue '${INGEST_QUEUE_NAME}' accepting jobs with concurrency ${env.INGEST_CONCURRENCY}`);
  console.log(`Feed available at ${env.SITE_URL}/feed.xml`);
}

main().catch((error: unknown) => {
  console.error('Startup failed:', error instanceof Error ? error.message : error);
  process.exit(1);
});
