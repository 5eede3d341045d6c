/**
 * Environment configuration with validation
 * Fail-fast pattern: validates all required env vars at module load time
 */

export type AudioFormat = 'mp3' | 'm4a';

export interface EnvConfig {
  REDIS_HOST: string;
  REDIS_PORT: number;
  PORT: number;
  NODE_ENV: 'development' | 'production' | 'test';
  /** Data directory holding feed.xml, media/ and scratch/ (default: ./data) */
  DATA_DIR: string;
  /** Public base URL of the site, used for the feed link (default: http://localhost:PORT) */
  SITE_URL: string;
  /** Public base URL media enclosures are served from (default: SITE_URL/media) */
  MEDIA_BASE_URL: string;
  /** Canonical audio format for every published artifact (default: mp3) */
  AUDIO_FORMAT: AudioFormat;
  /** Presentation cap for listings and the served feed (default: 50) */
  FEED_MAX_ITEMS: number;
  /** Concurrent ingest jobs per worker (default: 2) */
  INGEST_CONCURRENCY: number;
  /** yt-dlp timeout in ms (default: 30 minutes) */
  ACQUIRE_TIMEOUT_MS: number;
  /** ffmpeg timeout in ms (default: 10 minutes) */
  TRANSCODE_TIMEOUT_MS: number;
  /** How long terminal jobs stay queryable (default: 1 day) */
  JOB_RETENTION_SECONDS: number;
  /** Largest accepted upload body in bytes (default: 2 GiB) */
  MAX_UPLOAD_BYTES: number;
  /** Path to yt-dlp (default: 'yt-dlp' in PATH) */
  YT_DLP_PATH: string;
  /** Path to ffmpeg (default: 'ffmpeg' in PATH) */
  FFMPEG_PATH: string;
  /** Path to ffprobe (default: 'ffprobe' in PATH) */
  FFPROBE_PATH: string;
  /** Watch URL prefix handed to yt-dlp, the source id is appended */
  WATCH_URL_BASE: string;
  PODCAST_TITLE: string;
  PODCAST_DESCRIPTION: string;
  PODCAST_AUTHOR: string;
  PODCAST_LANGUAGE: string;
  PODCAST_CATEGORY: string;
  /** Cover image URL for the channel (optional) */
  PODCAST_IMAGE_URL?: string;
  /** Discord webhook URL for job notifications (optional) */
  DISCORD_WEBHOOK_URL?: string;
}

const requiredEnvVars = ['REDIS_HOST', 'REDIS_PORT', 'PORT'] as const;

/**
 * Validates that all required environment variables are set
 * Throws immediately on missing vars to fail fast
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): void {
  const missing: string[] = [];

  for (const varName of requiredEnvVars) {
    if (!source[varName]) {
      missing.push(varName);
    }
  }

  if (missing.length > 0) {
    throw new Error(`Missing required env var${missing.length > 1 ? 's' : ''}: ${missing.join(', ')}`);
  }
}

function positiveInt(source: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = source[name];
  if (raw === undefined || raw === '') return fallback;

  const value = parseInt(raw, 10);
  if (!Number.isFinite(value) || value < 1) {
    throw new Error(`${name} must be a positive integer, got: ${raw}`);
  }
  return value;
}

function parseAudioFormat(raw: string | undefined): AudioFormat {
  if (raw === undefined || raw === '' || raw === 'mp3') return 'mp3';
  if (raw === 'm4a') return 'm4a';
  throw new Error(`AUDIO_FORMAT must be 'm4a' or 'mp3', got: ${raw}`);
}

function parseNodeEnv(raw: string | undefined): EnvConfig['NODE_ENV'] {
  return raw === 'production' || raw === 'test' ? raw : 'development';
}

/**
 * Build the typed configuration from an environment map
 */
export function parseEnv(source: NodeJS.ProcessEnv): EnvConfig {
  validateEnv(source);

  const port = positiveInt(source, 'PORT', 3000);
  const siteUrl = (source.SITE_URL || `http://localhost:${port}`).replace(/\/+$/, '');

  return {
    REDIS_HOST: source.REDIS_HOST ?? '',
    REDIS_PORT: positiveInt(source, 'REDIS_PORT', 6379),
    PORT: port,
    NODE_ENV: parseNodeEnv(source.NODE_ENV),
    DATA_DIR: source.DATA_DIR || './data',
    SITE_URL: siteUrl,
    MEDIA_BASE_URL: (source.MEDIA_BASE_URL || `${siteUrl}/media`).replace(/\/+$/, ''),
    AUDIO_FORMAT: parseAudioFormat(source.AUDIO_FORMAT),
    FEED_MAX_ITEMS: positiveInt(source, 'FEED_MAX_ITEMS', 50),
    INGEST_CONCURRENCY: positiveInt(source, 'INGEST_CONCURRENCY', 2),
    ACQUIRE_TIMEOUT_MS: positiveInt(source, 'ACQUIRE_TIMEOUT_MS', 30 * 60 * 1000),
    TRANSCODE_TIMEOUT_MS: positiveInt(source, 'TRANSCODE_TIMEOUT_MS', 10 * 60 * 1000),
    JOB_RETENTION_SECONDS: positiveInt(source, 'JOB_RETENTION_SECONDS', 24 * 60 * 60),
    MAX_UPLOAD_BYTES: positiveInt(source, 'MAX_UPLOAD_BYTES', 2 * 1024 * 1024 * 1024),
    YT_DLP_PATH: source.YT_DLP_PATH || 'yt-dlp',
    FFMPEG_PATH: source.FFMPEG_PATH || 'ffmpeg',
    FFPROBE_PATH: source.FFPROBE_PATH || 'ffprobe',
    WATCH_URL_BASE: source.WATCH_URL_BASE || 'https://www.youtube.com/watch?v=',
    PODCAST_TITLE: source.PODCAST_TITLE || 'Video to Podcast',
    PODCAST_DESCRIPTION: source.PODCAST_DESCRIPTION || 'Personal podcast feed generated from videos',
    PODCAST_AUTHOR: source.PODCAST_AUTHOR || 'Podcast Creator',
    PODCAST_LANGUAGE: source.PODCAST_LANGUAGE || 'en',
    PODCAST_CATEGORY: source.PODCAST_CATEGORY || 'Technology',
    PODCAST_IMAGE_URL: source.PODCAST_IMAGE_URL,
    DISCORD_WEBHOOK_URL: source.DISCORD_WEBHOOK_URL,
  };
}

/**
 * Typed environment configuration
 * Validated on module load (fail-fast pattern)
 */
export const env: EnvConfig = parseEnv(process.env);
