/**
 * Job registry: durable job records keyed by id
 *
 * Records are JSON values in Redis with a TTL of the retention window,
 * refreshed on every write, so finished jobs stay queryable for that long
 * and then disappear on their own.
 */

import { isTerminal, type IngestJob, type JobState, type JobUpdate } from './types.js';

export interface JobRegistry {
  create(job: IngestJob): Promise<void>;
  get(jobId: string): Promise<IngestJob | null>;
  /**
   * Apply `update` and return the new record, or null for an unknown id.
   * Completed and failed records are final: they are returned unchanged.
   */
  update(jobId: string, update: JobUpdate): Promise<IngestJob | null>;
}

/**
 * The subset of ioredis the registry needs
 */
export interface KeyValueClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, secondsToken: 'EX', seconds: number): Promise<unknown>;
}

const KEY_PREFIX = 'ingest:job:';

const JOB_STATES: readonly JobState[] = ['pending', 'acquiring', 'transcoding', 'publishing', 'completed', 'failed'];

function isJobRecord(value: unknown): value is IngestJob {
  if (typeof value !== 'object' || value === null) return false;
  if (!('id' in value && 'state' in value && 'source' in value && 'warnings' in value)) return false;

  const recordState = value.state;
  return (
    typeof value.id === 'string' &&
    JOB_STATES.some((state) => state === recordState) &&
    typeof value.source === 'object' && value.source !== null &&
    Array.isArray(value.warnings)
  );
}

export class RedisJobRegistry implements JobRegistry {
  constructor(
    private readonly redis: KeyValueClient,
    private readonly retentionSeconds: number
  ) {}

  async create(job: IngestJob): Promise<void> {
    await this.write(job);
  }

  async get(jobId: string): Promise<IngestJob | null> {
    const raw = await this.redis.get(`${KEY_PREFIX}${jobId}`);
    if (raw === null) return null;

    const record: unknown = JSON.parse(raw);
    if (!isJobRecord(record)) {
      throw new Error(`Malformed job record in registry: ${jobId}`);
    }
    return record;
  }

  async update(jobId: string, update: JobUpdate): Promise<IngestJob | null> {
    const current = await this.get(jobId);
    if (!current) return null;
    if (isTerminal(current.state)) return current;

    const next: IngestJob = { ...current, ...update, updatedAt: new Date().toISOString() };
    await this.write(next);
    return next;
  }

  private async write(job: IngestJob): Promise<void> {
    await this.redis.set(`${KEY_PREFIX}${job.id}`, JSON.stringify(job), 'EX', this.retentionSeconds);
  }
}
