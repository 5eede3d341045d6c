/**
 * REST API routes for job submission, status and cancellation
 *
 * POST /api/jobs - Submit a video URL
 * POST /api/jobs/upload - Submit an uploaded audio/video file (raw request body)
 * GET /api/jobs/:jobId - Poll job status
 * POST /api/jobs/:jobId/cancel - Cancel a job that has not started publishing
 */

import { Router, Request, Response } from 'express';
import { createWriteStream } from 'node:fs';
import { rm, stat } from 'node:fs/promises';
import { randomUUID } from 'node:crypto';
import { Transform } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import * as path from 'node:path';
import { uploadFilename } from '../../media/organization.js';
import { InvalidSourceError, JobNotFoundError } from '../../jobs/errors.js';
import type { IngestOrchestrator } from '../../jobs/orchestrator.js';

export interface JobsRouterOptions {
  orchestrator: Pick<IngestOrchestrator, 'submit' | 'getStatus' | 'cancel'>;
  /** Directory upload bodies are streamed into; must exist */
  uploadsDir: string;
  /** Bodies larger than this are refused with 413 */
  maxUploadBytes: number;
}

export class UploadTooLargeError extends Error {
  constructor(readonly maxBytes: number) {
    super(`Upload exceeds ${maxBytes} bytes`);
    this.name = 'UploadTooLargeError';
  }
}

/**
 * Pass-through that fails once more than `maxBytes` have gone by
 */
export function createByteLimit(maxBytes: number): Transform {
  let received = 0;
  return new Transform({
    transform(chunk: Buffer, _encoding, callback) {
      received += chunk.length;
      if (received > maxBytes) {
        callback(new UploadTooLargeError(maxBytes));
        return;
      }
      callback(null, chunk);
    },
  });
}

/**
 * Optional non-empty string from a body field or query parameter
 */
function optionalText(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value.trim() : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function logRouteError(event: string, error: unknown, context: Record<string, unknown>): void {
  console.error(JSON.stringify({
    event,
    ...context,
    error: error instanceof Error ? error.message : String(error),
    timestamp: new Date().toISOString(),
  }));
}

export function createJobsRouter({ orchestrator, uploadsDir, maxUploadBytes }: JobsRouterOptions): Router {
  const router = Router();

  /**
   * POST / - Submit a URL
   *
   * Request body: { url: string, title?: string, description?: string }
   * Response: { jobId: string, status: 'pending' }
   *
   * Returns:
   * - 202 Accepted on success
   * - 400 Bad Request if url missing or not a recognizable video URL
   * - 500 Internal Server Error on queue failure
   */
  router.post('/', async (req: Request, res: Response): Promise<void> => {
    const body: unknown = req.body;
    const fields: Record<string, unknown> = isRecord(body) ? body : {};
    const url = optionalText(fields.url);

    if (!url) {
      res.status(400).json({ error: 'url is required', errorCategory: 'InvalidSource' });
      return;
    }

    try {
      const { jobId } = await orchestrator.submit(
        { kind: 'remote', url },
        {
          title: optionalText(fields.title),
          description: optionalText(fields.description),
        }
      );
      res.status(202).json({ jobId, status: 'pending' });
    } catch (error) {
      if (error instanceof InvalidSourceError) {
        res.status(400).json({ error: error.message, errorCategory: error.category });
        return;
      }
      logRouteError('job_submit_failed', error, { url });
      res.status(500).json({ error: 'Failed to queue job' });
    }
  });

  /**
   * POST /upload?filename=&title=&description= - Submit a file
   *
   * The request body is the file itself, streamed to disk as it arrives.
   *
   * Returns:
   * - 202 Accepted on success
   * - 400 Bad Request if filename is missing or the body is empty
   * - 413 Payload Too Large if the body exceeds maxUploadBytes
   * - 500 Internal Server Error on write or queue failure
   */
  router.post('/upload', async (req: Request, res: Response): Promise<void> => {
    const originalName = optionalText(req.query.filename);
    if (!originalName) {
      res.status(400).json({ error: 'filename is required', errorCategory: 'InvalidSource' });
      return;
    }

    const declaredBytes = Number(req.headers['content-length']);
    if (Number.isFinite(declaredBytes) && declaredBytes > maxUploadBytes) {
      res.status(413).json({ error: new UploadTooLargeError(maxUploadBytes).message, errorCategory: 'InvalidSource' });
      return;
    }

    const uploadPath = path.join(uploadsDir, uploadFilename(randomUUID(), originalName));

    try {
      await pipeline(req, createByteLimit(maxUploadBytes), createWriteStream(uploadPath));

      const { size } = await stat(uploadPath);
      if (size === 0) {
        await rm(uploadPath, { force: true });
        res.status(400).json({ error: 'Uploaded file is empty', errorCategory: 'InvalidSource' });
        return;
      }

      const { jobId } = await orchestrator.submit(
        { kind: 'upload', path: uploadPath, originalName },
        {
          title: optionalText(req.query.title),
          description: optionalText(req.query.description),
        }
      );

      console.log(JSON.stringify({
        event: 'upload_received',
        jobId,
        originalName,
        bytes: size,
        timestamp: new Date().toISOString(),
      }));
      res.status(202).json({ jobId, status: 'pending' });
    } catch (error) {
      await rm(uploadPath, { force: true });
      if (error instanceof UploadTooLargeError) {
        res.status(413).json({ error: error.message, errorCategory: 'InvalidSource' });
        return;
      }
      logRouteError('upload_failed', error, { originalName });
      res.status(500).json({ error: 'Failed to receive upload' });
    }
  });

  /**
   * GET /:jobId - Check job status
   *
   * Returns:
   * - 200 OK with the job's status view
   * - 404 Not Found if the job doesn't exist or has expired
   */
  router.get('/:jobId', async (req: Request, res: Response): Promise<void> => {
    const { jobId } = req.params;

    try {
      res.json(await orchestrator.getStatus(jobId));
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        res.status(404).json({ error: 'Job not found', errorCategory: error.category });
        return;
      }
      logRouteError('job_status_failed', error, { jobId });
      res.status(500).json({ error: 'Failed to get job status' });
    }
  });

  /**
   * POST /:jobId/cancel
   *
   * Response: { jobId, cancelled } where cancelled is false for jobs that
   * already finished or are publishing
   */
  router.post('/:jobId/cancel', async (req: Request, res: Response): Promise<void> => {
    const { jobId } = req.params;

    try {
      const { cancelled } = await orchestrator.cancel(jobId);
      res.json({ jobId, cancelled });
    } catch (error) {
      if (error instanceof JobNotFoundError) {
        res.status(404).json({ error: 'Job not found', errorCategory: error.category });
        return;
      }
      logRouteError('job_cancel_failed', error, { jobId });
      res.status(500).json({ error: 'Failed to cancel job' });
    }
  });

  return router;
}
