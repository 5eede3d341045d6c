import { describe, it, expect } from 'vitest';
import { RedisJobRegistry } from './registry.js';
import { InMemoryKeyValue } from '../__tests__/helpers/fakes.js';
import type { IngestJob } from './types.js';

function pendingJob(id: string): IngestJob {
  return {
    id,
    source: { kind: 'remote', value: 'https://youtu.be/abc123' },
    canonicalSourceId: 'abc123',
    state: 'pending',
    message: 'Queued',
    warnings: [],
    createdAt: '2024-03-01T10:00:00.000Z',
    updatedAt: '2024-03-01T10:00:00.000Z',
  };
}

describe('RedisJobRegistry', () => {
  it('stores jobs with the retention TTL', async () => {
    const redis = new InMemoryKeyValue();
    const registry = new RedisJobRegistry(redis, 86_400);

    await registry.create(pendingJob('job-1'));

    expect(await registry.get('job-1')).toEqual(pendingJob('job-1'));
    expect(redis.ttls.get('ingest:job:job-1')).toBe(86_400);
  });

  it('returns null for unknown jobs', async () => {
    const registry = new RedisJobRegistry(new InMemoryKeyValue(), 60);

    expect(await registry.get('missing')).toBeNull();
    expect(await registry.update('missing', { state: 'failed' })).toBeNull();
  });

  it('merges updates and refreshes the TTL', async () => {
    const redis = new InMemoryKeyValue();
    const registry = new RedisJobRegistry(redis, 3_600);
    await registry.create(pendingJob('job-1'));
    redis.ttls.clear();

    const updated = await registry.update('job-1', {
      state: 'acquiring',
      message: 'Downloading media',
      progress: { percentComplete: 10, transferRate: '1MiB/s', estimatedTimeRemaining: '00:30' },
    });

    expect(updated).toMatchObject({ id: 'job-1', state: 'acquiring', message: 'Downloading media', canonicalSourceId: 'abc123' });
    expect(updated?.updatedAt).not.toBe('2024-03-01T10:00:00.000Z');
    expect(await registry.get('job-1')).toEqual(updated);
    expect(redis.ttls.get('ingest:job:job-1')).toBe(3_600);
  });

  it('drops cleared fields', async () => {
    const registry = new RedisJobRegistry(new InMemoryKeyValue(), 60);
    await registry.create(pendingJob('job-1'));
    await registry.update('job-1', {
      progress: { percentComplete: 50, transferRate: 'N/A', estimatedTimeRemaining: 'N/A' },
    });

    await registry.update('job-1', { state: 'transcoding', progress: undefined });

    expect(await registry.get('job-1')).not.toHaveProperty('progress');
  });

  it('keeps finished records final', async () => {
    const registry = new RedisJobRegistry(new InMemoryKeyValue(), 60);
    await registry.create(pendingJob('job-1'));
    const cancelled = await registry.update('job-1', {
      state: 'failed',
      message: 'Job cancelled',
      errorCategory: 'Cancelled',
    });

    const revived = await registry.update('job-1', { state: 'acquiring', message: 'Downloading media' });

    expect(revived).toEqual(cancelled);
    expect(await registry.get('job-1')).toMatchObject({ state: 'failed', errorCategory: 'Cancelled', message: 'Job cancelled' });
  });

  it('rejects malformed records', async () => {
    const redis = new InMemoryKeyValue();
    await redis.set('ingest:job:job-1', JSON.stringify({ id: 'job-1', state: 'exploded' }), 'EX', 60);

    await expect(new RedisJobRegistry(redis, 60).get('job-1')).rejects.toThrow(
      'Malformed job record in registry: job-1'
    );
  });
});
