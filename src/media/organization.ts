/**
 * On-disk layout and audio container rules for media artifacts
 *
 * Layout under DATA_DIR:
 *   feed.xml              persisted feed document
 *   media/{entryId}.{ext} published artifacts
 *   scratch/{jobId}/      per-job working files, removed after the job
 *   scratch/uploads/      received upload bodies
 */

import { mkdir, rename, copyFile, unlink } from 'node:fs/promises';
import { createRequire } from 'node:module';
import * as path from 'node:path';
import type { AudioFormat } from '../config/env.js';

// Import CommonJS module using require
const require = createRequire(import.meta.url);
const sanitizeFilename = require('sanitize-filename') as (input: string, options?: { replacement?: string | ((substring: string) => string) }) => string;

export interface MediaLayout {
  dataDir: string;
  feedPath: string;
  mediaDir: string;
  scratchDir: string;
  uploadsDir: string;
}

export function getMediaLayout(dataDir: string): MediaLayout {
  const scratchDir = path.join(dataDir, 'scratch');
  return {
    dataDir,
    feedPath: path.join(dataDir, 'feed.xml'),
    mediaDir: path.join(dataDir, 'media'),
    scratchDir,
    uploadsDir: path.join(scratchDir, 'uploads'),
  };
}

export async function ensureLayoutExists(layout: MediaLayout): Promise<void> {
  await mkdir(layout.mediaDir, { recursive: true });
  await mkdir(layout.uploadsDir, { recursive: true });
}

/**
 * Containers that podcast clients can play without transcoding
 */
const PLAYABLE_AUDIO: Record<string, string> = {
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
  aac: 'audio/aac',
  ogg: 'audio/ogg',
  oga: 'audio/ogg',
  opus: 'audio/opus',
  wav: 'audio/wav',
  flac: 'audio/flac',
};

export const CANONICAL_MIME: Record<AudioFormat, string> = {
  mp3: 'audio/mpeg',
  m4a: 'audio/mp4',
};

/**
 * Lowercased extension without the dot ('' when none)
 */
export function getExtension(filePath: string): string {
  return path.extname(filePath).slice(1).toLowerCase();
}

/**
 * MIME type of a directly playable audio file, or null
 */
export function playableAudioMime(filePath: string): string | null {
  return PLAYABLE_AUDIO[getExtension(filePath)] ?? null;
}

/**
 * Title derived from an uploaded file name
 * "my_talk-2024.m4a" -> "my talk 2024"
 */
export function titleFromFilename(originalName: string): string {
  const base = path.basename(originalName, path.extname(originalName));
  const title = sanitizeFilename(base, { replacement: '' })
    .replace(/[_-]+/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
  return title || 'Untitled upload';
}

/**
 * Safe file name for a stored upload body, keeping the original extension
 */
export function uploadFilename(token: string, originalName: string): string {
  const ext = getExtension(sanitizeFilename(originalName));
  return ext ? `${token}.${ext}` : token;
}

/**
 * Move a file, falling back to copy + unlink across devices
 */
export async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'EXDEV') {
      throw error;
    }
    await copyFile(from, to);
    await unlink(from);
  }
}
