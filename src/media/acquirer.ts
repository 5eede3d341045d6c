/**
 * Media acquisition
 *
 * Remote sources are fetched with yt-dlp into the job's scratch directory,
 * relaying download progress line by line. Uploaded files are already on disk
 * and only need metadata filled in.
 */

import { readdir, stat } from 'node:fs/promises';
import * as path from 'node:path';
import { describeCommandFailure, type CommandRunner } from './command.js';
import { titleFromFilename } from './organization.js';
import { canonicalLocator, type CanonicalSourceId } from '../urls/resolver.js';
import { AcquisitionFailedError, JobCancelledError } from '../jobs/errors.js';
import type { AcquiredMedia, AcquisitionProgress, MediaMetadata } from './types.js';

export interface AcquirerOptions {
  runCommand: CommandRunner;
  ytDlpPath: string;
  watchUrlBase: string;
  timeoutMs: number;
}

export interface RemoteAcquireOptions {
  /** Per-job scratch directory, must exist */
  workDir: string;
  onProgress?: (progress: AcquisitionProgress) => void;
  signal?: AbortSignal;
}

const PROGRESS_PREFIX = 'progress ';

/** Base name yt-dlp writes the raw download under */
const RAW_BASENAME = 'source';

/**
 * Parse one `--progress-template` line: "progress  42.5%|1.20MiB/s|00:13"
 */
export function parseProgressLine(line: string): AcquisitionProgress | null {
  if (!line.startsWith(PROGRESS_PREFIX)) return null;

  const [percent, rate, eta] = line.slice(PROGRESS_PREFIX.length).split('|');
  const percentComplete = parseFloat((percent ?? '').replace('%', '').trim());
  if (!Number.isFinite(percentComplete)) return null;

  return {
    percentComplete,
    transferRate: rate?.trim() || 'N/A',
    estimatedTimeRemaining: eta?.trim() || 'N/A',
  };
}

interface RemoteInfo {
  metadata: MediaMetadata;
  filePath?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * yt-dlp `upload_date` (YYYYMMDD) as an ISO timestamp at midnight UTC
 */
export function parseUploadDate(value: unknown): string | undefined {
  if (typeof value !== 'string') return undefined;
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(value);
  if (!match) return undefined;

  const [, year, month, day] = match;
  const date = new Date(`${year}-${month}-${day}T00:00:00.000Z`);
  // Rejects impossible dates such as 20240231, which Date rolls over
  if (Number.isNaN(date.getTime()) || date.getUTCDate() !== Number(day)) return undefined;
  return date.toISOString();
}

/**
 * Parse the JSON line printed after the download was moved into place
 */
export function parseInfoLine(line: string): RemoteInfo | null {
  if (!line.startsWith('{')) return null;

  let fields: unknown;
  try {
    fields = JSON.parse(line);
  } catch {
    return null;
  }
  if (!isRecord(fields)) return null;

  const duration = typeof fields.duration === 'number' && fields.duration > 0
    ? Math.round(fields.duration)
    : undefined;

  const title = optionalString(fields.title) ?? 'Unknown Title';

  return {
    metadata: {
      title,
      description: optionalString(fields.description) ?? title,
      durationSeconds: duration,
      thumbnailUrl: optionalString(fields.thumbnail),
      webpageUrl: optionalString(fields.webpage_url),
      publishedAt: parseUploadDate(fields.upload_date),
    },
    filePath: optionalString(fields.filepath),
  };
}

export class MediaAcquirer {
  constructor(private readonly options: AcquirerOptions) {}

  /**
   * Download the best audio-bearing stream for a source id
   *
   * @throws AcquisitionFailedError on tool failure or timeout
   * @throws JobCancelledError when the signal aborts the download
   */
  async acquireRemote(sourceId: CanonicalSourceId, opts: RemoteAcquireOptions): Promise<AcquiredMedia> {
    const locator = canonicalLocator(sourceId, this.options.watchUrlBase);
    const printed: { info: RemoteInfo | null } = { info: null };

    const result = await this.options.runCommand(
      this.options.ytDlpPath,
      [
        '--no-playlist',
        '--no-colors',
        '--format', 'bestaudio/best',
        '--output', path.join(opts.workDir, `${RAW_BASENAME}.%(ext)s`),
        '--newline',
        '--progress',
        '--progress-template', `download:${PROGRESS_PREFIX}%(progress._percent_str)s|%(progress._speed_str)s|%(progress._eta_str)s`,
        '--print', 'after_move:%(.{id,title,description,duration,upload_date,thumbnail,webpage_url,filepath})j',
        locator,
      ],
      {
        timeoutMs: this.options.timeoutMs,
        signal: opts.signal,
        onStdoutLine: (line) => {
          const progress = parseProgressLine(line);
          if (progress) {
            opts.onProgress?.(progress);
            return;
          }
          printed.info = parseInfoLine(line) ?? printed.info;
        },
      }
    );

    if (result.aborted) {
      throw new JobCancelledError();
    }
    if (result.timedOut) {
      throw new AcquisitionFailedError(
        `Download timed out after ${Math.round(this.options.timeoutMs / 1000)}s`,
        { timedOut: true }
      );
    }
    if (result.exitCode !== 0) {
      throw new AcquisitionFailedError(describeCommandFailure('yt-dlp', result));
    }

    const reported = printed.info;
    if (!reported) {
      throw new AcquisitionFailedError('yt-dlp did not report any metadata');
    }

    const filePath = reported.filePath ?? await this.findRawFile(opts.workDir);
    await this.assertNonEmpty(filePath);

    console.log(JSON.stringify({
      event: 'media_acquired',
      sourceId,
      filePath,
      title: reported.metadata.title,
      timestamp: new Date().toISOString(),
    }));

    return {
      filePath,
      metadata: { ...reported.metadata, webpageUrl: reported.metadata.webpageUrl ?? locator },
    };
  }

  /**
   * Accept an already-received upload
   * Title falls back to the original file name, description to the title.
   */
  async acquireUpload(
    upload: { path: string; originalName: string },
    overrides: { title?: string; description?: string } = {}
  ): Promise<AcquiredMedia> {
    await this.assertNonEmpty(upload.path);

    const title = overrides.title || titleFromFilename(upload.originalName);
    return {
      filePath: upload.path,
      metadata: {
        title,
        description: overrides.description || title,
      },
    };
  }

  private async findRawFile(workDir: string): Promise<string> {
    const files = await readdir(workDir);
    const raw = files.find((name) => name.startsWith(`${RAW_BASENAME}.`) && !name.endsWith('.part'));
    if (!raw) {
      throw new AcquisitionFailedError('Downloaded file not found after yt-dlp finished');
    }
    return path.join(workDir, raw);
  }

  private async assertNonEmpty(filePath: string): Promise<void> {
    let size: number;
    try {
      size = (await stat(filePath)).size;
    } catch (error) {
      throw new AcquisitionFailedError(`Media file not found: ${path.basename(filePath)}`, { cause: error });
    }
    if (size === 0) {
      throw new AcquisitionFailedError(`Media file is empty: ${path.basename(filePath)}`);
    }
  }
}
