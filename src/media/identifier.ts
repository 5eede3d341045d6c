/**
 * Content-derived entry ids
 *
 * Remote sources hash their canonical source id, uploads hash their bytes, so
 * the same video or a byte-identical upload always maps to the same entry.
 * The id doubles as the artifact's base file name.
 */

import { createHash } from 'node:crypto';
import { createReadStream } from 'node:fs';
import type { CanonicalSourceId } from '../urls/resolver.js';

export const ENTRY_ID_LENGTH = 16;

function shortHash(input: string): string {
  return createHash('sha256').update(input).digest('hex').substring(0, ENTRY_ID_LENGTH);
}

export function entryIdForSource(sourceId: CanonicalSourceId): string {
  return shortHash(`source:${sourceId}`);
}

/**
 * Streamed sha256 of a file, hex encoded
 */
export async function hashFile(filePath: string): Promise<string> {
  const hash = createHash('sha256');
  for await (const chunk of createReadStream(filePath)) {
    hash.update(chunk);
  }
  return hash.digest('hex');
}

export async function entryIdForFile(filePath: string): Promise<string> {
  return shortHash(`content:${await hashFile(filePath)}`);
}
