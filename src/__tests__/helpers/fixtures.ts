import type { ChannelInfo, FeedEntry } from '../../feed/types.js';

export const testChannel: ChannelInfo = {
  title: 'Test Podcast',
  description: 'Episodes for tests',
  siteUrl: 'http://localhost:3000',
  author: 'Test Author',
  language: 'en',
  category: 'Technology',
};

export function makeEntry(id: string, overrides: Partial<FeedEntry> = {}): FeedEntry {
  return {
    id,
    title: `Episode ${id}`,
    description: `Description of ${id}`,
    durationSeconds: 125,
    mediaUrl: `http://localhost:3000/media/${id}.mp3`,
    mimeType: 'audio/mpeg',
    fileSizeBytes: 1024,
    publishedAt: '2024-03-01T10:00:00.000Z',
    ...overrides,
  };
}
