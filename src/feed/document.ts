/**
 * RSS 2.0 podcast document: rendering and parsing
 *
 * The persisted feed is a regular podcast RSS document with iTunes tags, so
 * any podcast client can read it directly. Only guid and enclosure are
 * required per item; every other field is optional on read.
 */

import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { FeedCorruptError } from '../jobs/errors.js';
import type { ChannelInfo, FeedEntry, FeedState } from './types.js';

const ITUNES_NS = 'http://www.itunes.com/dtds/podcast-1.0.dtd';
const ATOM_NS = 'http://www.w3.org/2005/Atom';
const STORE_NS = 'urn:podfeed:store';

const GENERATOR = 'podfeed/1.0';

/**
 * HH:MM:SS, or MM:SS under an hour
 */
export function formatDuration(totalSeconds: number): string {
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  const pad = (n: number): string => n.toString().padStart(2, '0');

  return hours > 0
    ? `${pad(hours)}:${pad(minutes)}:${pad(seconds)}`
    : `${pad(minutes)}:${pad(seconds)}`;
}

/**
 * Accepts "SS", "MM:SS" and "HH:MM:SS"
 */
export function parseDuration(value: string): number | undefined {
  const parts = value.trim().split(':').map((part) => parseInt(part, 10));
  if (parts.length === 0 || parts.length > 3 || parts.some((n) => !Number.isFinite(n) || n < 0)) {
    return undefined;
  }
  const seconds = parts.reduce((total, part) => total * 60 + part, 0);
  return seconds > 0 ? seconds : undefined;
}

/** Anything outside the XML 1.0 Char production */
const NON_XML_CHARS = /[^\u0009\u000A\u000D\u0020-\uD7FF\uE000-\uFFFD\u{10000}-\u{10FFFF}]/gu;

/**
 * Drop characters an XML 1.0 reader rejects, such as control codes
 */
export function xmlText(value: string): string {
  return value.replace(NON_XML_CHARS, '');
}

function renderItem(entry: FeedEntry): Record<string, unknown> {
  return {
    title: xmlText(entry.title),
    description: xmlText(entry.description),
    ...(entry.sourceLink ? { link: entry.sourceLink } : {}),
    guid: { '#text': entry.id, '@_isPermaLink': 'false' },
    pubDate: new Date(entry.publishedAt).toUTCString(),
    enclosure: {
      '@_url': entry.mediaUrl,
      '@_length': String(entry.fileSizeBytes),
      '@_type': entry.mimeType,
    },
    ...(entry.durationSeconds ? { 'itunes:duration': formatDuration(entry.durationSeconds) } : {}),
    ...(entry.imageUrl ? { 'itunes:image': { '@_href': entry.imageUrl } } : {}),
  };
}

/**
 * Render the feed document
 *
 * @param maxItems - Cap on rendered items (newest first); all items when omitted
 */
export function renderFeed(channel: ChannelInfo, state: FeedState, maxItems?: number): string {
  const entries = maxItems === undefined ? state.entries : state.entries.slice(0, maxItems);

  const document = {
    '?xml': { '@_version': '1.0', '@_encoding': 'UTF-8' },
    rss: {
      '@_version': '2.0',
      '@_xmlns:itunes': ITUNES_NS,
      '@_xmlns:atom': ATOM_NS,
      '@_xmlns:podfeed': STORE_NS,
      channel: {
        title: xmlText(channel.title),
        description: xmlText(channel.description),
        link: channel.siteUrl,
        'atom:link': {
          '@_href': `${channel.siteUrl}/feed.xml`,
          '@_rel': 'self',
          '@_type': 'application/rss+xml',
        },
        language: channel.language,
        generator: GENERATOR,
        'itunes:author': xmlText(channel.author),
        'itunes:category': { '@_text': xmlText(channel.category) },
        'itunes:explicit': 'false',
        ...(channel.imageUrl ? { 'itunes:image': { '@_href': channel.imageUrl } } : {}),
        'podfeed:revision': String(state.revision),
        item: entries.map(renderItem),
      },
    },
  };

  const builder = new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    format: true,
    suppressEmptyNode: true,
  });

  return builder.build(document);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Text content of a parsed node, whether or not it carried attributes
 */
function textOf(node: unknown): string | undefined {
  if (typeof node === 'string') return node;
  if (isRecord(node) && typeof node['#text'] === 'string') return node['#text'];
  return undefined;
}

function attributeOf(node: unknown, name: string): string | undefined {
  if (!isRecord(node)) return undefined;
  const value = node[`@_${name}`];
  return typeof value === 'string' ? value : undefined;
}

function parseItem(item: unknown, index: number): FeedEntry {
  if (!isRecord(item)) {
    throw new FeedCorruptError(`Feed item ${index} is not an element`);
  }

  const id = textOf(item.guid)?.trim();
  const mediaUrl = attributeOf(item.enclosure, 'url');
  if (!id || !mediaUrl) {
    throw new FeedCorruptError(`Feed item ${index} is missing its guid or enclosure`);
  }

  const publishedMs = Date.parse(textOf(item.pubDate) ?? '');
  const fileSizeBytes = parseInt(attributeOf(item.enclosure, 'length') ?? '', 10);
  const duration = textOf(item['itunes:duration']);

  return {
    id,
    title: textOf(item.title) ?? 'Untitled',
    description: textOf(item.description) ?? '',
    durationSeconds: duration ? parseDuration(duration) : undefined,
    mediaUrl,
    mimeType: attributeOf(item.enclosure, 'type') ?? 'audio/mpeg',
    fileSizeBytes: Number.isFinite(fileSizeBytes) ? fileSizeBytes : 0,
    publishedAt: new Date(Number.isFinite(publishedMs) ? publishedMs : 0).toISOString(),
    sourceLink: textOf(item.link),
    imageUrl: attributeOf(item['itunes:image'], 'href'),
  };
}

/**
 * Parse a persisted feed document back into state
 *
 * @throws FeedCorruptError when the document is not well-formed RSS, an item
 *   lacks its id or enclosure, or two items share an id
 */
export function parseFeed(xml: string): FeedState {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    throw new FeedCorruptError(
      `Feed document is not well-formed XML (line ${validation.err.line}): ${validation.err.msg}`
    );
  }

  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    parseTagValue: false,
    parseAttributeValue: false,
    isArray: (_name, jpath) => jpath === 'rss.channel.item',
  });

  const parsed: unknown = parser.parse(xml);
  const rss = isRecord(parsed) ? parsed.rss : undefined;
  const channel = isRecord(rss) ? rss.channel : undefined;
  if (!isRecord(channel)) {
    throw new FeedCorruptError('Feed document has no rss channel');
  }

  const items = Array.isArray(channel.item) ? channel.item : [];
  const revision = parseInt(textOf(channel['podfeed:revision']) ?? '0', 10);

  const entries = items.map(parseItem);
  const seen = new Set<string>();
  entries.forEach((entry, index) => {
    if (seen.has(entry.id)) {
      throw new FeedCorruptError(`Feed item ${index} repeats guid ${entry.id}`);
    }
    seen.add(entry.id);
  });

  return {
    revision: Number.isFinite(revision) ? revision : 0,
    entries,
  };
}
