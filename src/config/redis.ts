/**
 * Redis connection configuration for BullMQ and the job registry
 *
 * BullMQ requires different connection settings for Queue vs Worker:
 * - Workers need maxRetriesPerRequest: null to survive Redis disconnects
 * - Queues fail fast (enableOfflineQueue: false) so the API answers promptly
 *
 * @see https://docs.bullmq.io/guide/going-to-production
 */

import { Redis } from 'ioredis';
import { env } from './env.js';

const baseOptions = {
  host: env.REDIS_HOST,
  port: env.REDIS_PORT,
};

/**
 * Linear backoff, capped at 20 seconds
 */
export function retryStrategy(times: number): number {
  return Math.min(times * 1000, 20000);
}

/**
 * Redis connection for BullMQ Workers
 *
 * maxRetriesPerRequest must be null or the worker breaks during reconnects.
 */
export const workerConnection = new Redis({
  ...baseOptions,
  maxRetriesPerRequest: null,
  enableReadyCheck: false,
  retryStrategy,
});

/**
 * Redis connection for BullMQ Queues and the job registry
 */
export const queueConnection = new Redis({
  ...baseOptions,
  enableOfflineQueue: false,
  retryStrategy,
});

console.log(`Redis configured for ${env.REDIS_HOST}:${env.REDIS_PORT}`);
