import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { Server } from 'node:http';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import * as path from 'node:path';
import { createApp } from './server.js';
import { resolveSource } from '../urls/resolver.js';
import { JobNotFoundError } from '../jobs/errors.js';
import type { SourceInput } from '../jobs/orchestrator.js';
import type { JobStatusView, SubmitOptions } from '../jobs/types.js';
import { makeEntry } from '../__tests__/helpers/fixtures.js';
import { makeTempDir, removeTempDir } from '../__tests__/helpers/fakes.js';

const runningView: JobStatusView = {
  jobId: 'job-1',
  state: 'acquiring',
  message: 'Downloading: 25.0%',
  progress: { percentComplete: 25, transferRate: '1.00MiB/s', estimatedTimeRemaining: '00:09' },
  warnings: [],
  createdAt: '2024-03-01T10:00:00.000Z',
  updatedAt: '2024-03-01T10:00:05.000Z',
};

function createFakeOrchestrator() {
  return {
    submit: vi.fn(async (input: SourceInput, _options?: SubmitOptions) => {
      if (input.kind === 'remote') resolveSource(input.url);
      return { jobId: 'job-1' };
    }),
    getStatus: vi.fn(async (jobId: string): Promise<JobStatusView> => {
      if (jobId !== 'job-1') throw new JobNotFoundError(jobId);
      return runningView;
    }),
    cancel: vi.fn(async (jobId: string) => {
      if (jobId !== 'job-1') throw new JobNotFoundError(jobId);
      return { cancelled: true };
    }),
    listEntries: vi.fn(() => [makeEntry('e1')]),
    deleteEntry: vi.fn(async (entryId: string) => ({ found: entryId === 'e1' })),
  };
}

describe('HTTP API', () => {
  let dataDir: string;
  let uploadsDir: string;
  let mediaDir: string;
  let server: Server;
  let baseUrl: string;
  let orchestrator: ReturnType<typeof createFakeOrchestrator>;

  beforeEach(async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    dataDir = await makeTempDir();
    uploadsDir = path.join(dataDir, 'uploads');
    mediaDir = path.join(dataDir, 'media');
    await mkdir(uploadsDir);
    await mkdir(mediaDir);

    orchestrator = createFakeOrchestrator();
    const app = createApp({
      orchestrator,
      store: { renderPublicFeed: () => '<rss version="2.0"></rss>' },
      uploadsDir,
      maxUploadBytes: 32,
      mediaDir,
      config: { podcastTitle: 'Test Podcast', audioFormat: 'mp3', siteUrl: 'http://localhost:3000' },
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, '127.0.0.1', () => resolve(listening));
    });
    const address = server.address();
    if (address === null || typeof address === 'string') {
      throw new Error('server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await removeTempDir(dataDir);
    vi.restoreAllMocks();
  });

  function postJson(route: string, body: unknown): Promise<Response> {
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('reports health', async () => {
    const response = await fetch(`${baseUrl}/health`);
    expect(await response.json()).toEqual({ status: 'ok' });
  });

  describe('POST /api/jobs', () => {
    it('accepts a video URL with overrides', async () => {
      const response = await postJson('/api/jobs', {
        url: 'https://youtu.be/abc123def45',
        title: '  Custom Title ',
      });

      expect(response.status).toBe(202);
      expect(await response.json()).toEqual({ jobId: 'job-1', status: 'pending' });
      expect(orchestrator.submit).toHaveBeenCalledWith(
        { kind: 'remote', url: 'https://youtu.be/abc123def45' },
        { title: 'Custom Title', description: undefined }
      );
    });

    it('requires a url', async () => {
      const response = await postJson('/api/jobs', { title: 'No URL' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'url is required', errorCategory: 'InvalidSource' });
    });

    it('rejects a URL that names no video', async () => {
      const response = await postJson('/api/jobs', { url: 'https://example.com/about' });

      expect(response.status).toBe(400);
      const body: unknown = await response.json();
      expect(body).toMatchObject({ errorCategory: 'InvalidSource' });
    });

    it('answers 500 when the job cannot be queued', async () => {
      vi.spyOn(console, 'error').mockImplementation(() => undefined);
      orchestrator.submit.mockRejectedValueOnce(new Error('Redis unavailable'));

      const response = await postJson('/api/jobs', { url: 'https://youtu.be/abc123def45' });

      expect(response.status).toBe(500);
      expect(await response.json()).toEqual({ error: 'Failed to queue job' });
    });
  });

  describe('POST /api/jobs/upload', () => {
    it('streams the body to the uploads directory and submits it', async () => {
      const response = await fetch(`${baseUrl}/api/jobs/upload?filename=talk.m4a&title=Hello`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: 'audio bytes',
      });

      expect(response.status).toBe(202);
      expect(await response.json()).toEqual({ jobId: 'job-1', status: 'pending' });

      const [input, options] = orchestrator.submit.mock.calls[0];
      expect(options).toEqual({ title: 'Hello', description: undefined });
      if (input.kind !== 'upload') throw new Error('expected an upload submission');
      expect(input.originalName).toBe('talk.m4a');
      expect(path.dirname(input.path)).toBe(uploadsDir);
      expect(input.path.endsWith('.m4a')).toBe(true);
      expect(await readFile(input.path, 'utf8')).toBe('audio bytes');
    });

    it('refuses a body larger than the upload limit', async () => {
      const response = await fetch(`${baseUrl}/api/jobs/upload?filename=big.mp3`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: 'x'.repeat(33),
      });

      expect(response.status).toBe(413);
      expect(await response.json()).toEqual({ error: 'Upload exceeds 32 bytes', errorCategory: 'InvalidSource' });
      expect(await readdir(uploadsDir)).toEqual([]);
      expect(orchestrator.submit).not.toHaveBeenCalled();
    });

    it('requires a filename', async () => {
      const response = await fetch(`${baseUrl}/api/jobs/upload`, { method: 'POST', body: 'audio bytes' });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'filename is required', errorCategory: 'InvalidSource' });
    });

    it('rejects an empty body and leaves nothing behind', async () => {
      const response = await fetch(`${baseUrl}/api/jobs/upload?filename=empty.mp3`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/octet-stream' },
        body: '',
      });

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Uploaded file is empty', errorCategory: 'InvalidSource' });
      expect(await readdir(uploadsDir)).toEqual([]);
      expect(orchestrator.submit).not.toHaveBeenCalled();
    });
  });

  describe('job status and cancellation', () => {
    it('returns the status view', async () => {
      const response = await fetch(`${baseUrl}/api/jobs/job-1`);
      expect(await response.json()).toEqual(runningView);
    });

    it('answers 404 for unknown jobs', async () => {
      const status = await fetch(`${baseUrl}/api/jobs/missing`);
      expect(status.status).toBe(404);
      expect(await status.json()).toEqual({ error: 'Job not found', errorCategory: 'NotFound' });

      const cancel = await fetch(`${baseUrl}/api/jobs/missing/cancel`, { method: 'POST' });
      expect(cancel.status).toBe(404);
    });

    it('cancels a known job', async () => {
      const response = await fetch(`${baseUrl}/api/jobs/job-1/cancel`, { method: 'POST' });
      expect(await response.json()).toEqual({ jobId: 'job-1', cancelled: true });
    });
  });

  describe('feed routes', () => {
    it('serves the rendered feed as RSS', async () => {
      const response = await fetch(`${baseUrl}/feed.xml`);

      expect(response.headers.get('content-type')).toBe('application/rss+xml; charset=utf-8');
      expect(await response.text()).toBe('<rss version="2.0"></rss>');
    });

    it('serves files from the media directory', async () => {
      await writeFile(path.join(mediaDir, 'e1.mp3'), 'audio');

      const response = await fetch(`${baseUrl}/media/e1.mp3`);

      expect(response.status).toBe(200);
      expect(await response.text()).toBe('audio');
    });

    it('refuses names that leave the media directory', async () => {
      const response = await fetch(`${baseUrl}/media/..%2Fsecret.txt`);

      expect(response.status).toBe(400);
      expect(await response.json()).toEqual({ error: 'Invalid file path' });
    });

    it('answers 404 for missing media', async () => {
      const response = await fetch(`${baseUrl}/media/nope.mp3`);
      expect(response.status).toBe(404);
    });

    it('lists entries', async () => {
      const response = await fetch(`${baseUrl}/api/entries`);
      expect(await response.json()).toEqual({ entries: [makeEntry('e1')], count: 1 });
    });

    it('deletes entries and reports unknown ids', async () => {
      const deleted = await fetch(`${baseUrl}/api/entries/e1`, { method: 'DELETE' });
      expect(await deleted.json()).toEqual({ entryId: 'e1', found: true });

      const missing = await fetch(`${baseUrl}/api/entries/e2`, { method: 'DELETE' });
      expect(missing.status).toBe(404);
      expect(await missing.json()).toEqual({ error: 'Entry not found', errorCategory: 'NotFound', found: false });
    });

    it('exposes the public config', async () => {
      const response = await fetch(`${baseUrl}/api/config`);
      expect(await response.json()).toEqual({
        podcastTitle: 'Test Podcast',
        audioFormat: 'mp3',
        siteUrl: 'http://localhost:3000',
      });
    });
  });
});
