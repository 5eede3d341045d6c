/**
 * Source resolution: reduce a video locator to its canonical source id
 *
 * Handles:
 * - Standard watch links (/watch?v=ID), including mobile hosts
 * - Short links (youtu.be/ID)
 * - /live/ID, /shorts/ID, /embed/ID and legacy /v/ID paths
 * - Missing scheme, www prefix, tracking params, timestamps and hash fragments
 */
import normalizeUrl from 'normalize-url';
import { InvalidSourceError } from '../jobs/errors.js';

/**
 * Locator-derived id that names a remote resource regardless of link shape
 */
export type CanonicalSourceId = string;

const SOURCE_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

/** Hosts whose first path segment is the source id */
const SHORT_LINK_HOSTS = new Set(['youtu.be']);

/** Path prefixes followed directly by the source id */
const PATH_PREFIXES = ['live', 'shorts', 'embed', 'v'];

/**
 * Canonical form of the locator before id extraction (missing scheme added,
 * www and hash stripped, query sorted)
 */
function normalizeLocator(rawUrl: string): URL {
  let normalized: string;
  try {
    normalized = normalizeUrl(rawUrl, {
      stripWWW: true,
      stripHash: true,
      stripTextFragment: true,
      removeTrailingSlash: true,
      sortQueryParameters: true,
    });
  } catch {
    throw new InvalidSourceError(`Not a valid URL: ${rawUrl}`);
  }

  const url = new URL(normalized);
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new InvalidSourceError(`Unsupported URL scheme: ${url.protocol}`);
  }
  return url;
}

function extractId(url: URL): string | null {
  const host = url.hostname.toLowerCase();
  const segments = url.pathname.split('/').filter(Boolean);

  if (SHORT_LINK_HOSTS.has(host)) {
    return segments[0] ?? null;
  }

  if (segments[0] === 'watch') {
    return url.searchParams.get('v');
  }

  if (segments.length >= 2 && PATH_PREFIXES.includes(segments[0])) {
    return segments[1];
  }

  return null;
}

/**
 * Resolve an arbitrary string to a canonical source id
 *
 * @throws InvalidSourceError when no supported locator shape matches
 */
export function resolveSource(input: string): CanonicalSourceId {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidSourceError('Source URL is required');
  }

  const url = normalizeLocator(trimmed);
  const id = extractId(url);

  if (!id) {
    throw new InvalidSourceError(`Could not extract a video id from URL: ${trimmed}`);
  }
  if (!SOURCE_ID_PATTERN.test(id)) {
    throw new InvalidSourceError(`Invalid video id format: ${id}`);
  }

  return id;
}

/**
 * Watch URL handed to the extraction tool and stored as the entry link
 */
export function canonicalLocator(id: CanonicalSourceId, watchUrlBase: string): string {
  return `${watchUrlBase}${encodeURIComponent(id)}`;
}
