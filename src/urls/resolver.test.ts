import { describe, it, expect } from 'vitest';
import { canonicalLocator, resolveSource } from './resolver.js';
import { InvalidSourceError } from '../jobs/errors.js';

describe('resolveSource', () => {
  it('reads the v parameter of a watch link', () => {
    expect(resolveSource('https://www.youtube.com/watch?v=abc123XYZ_-')).toBe('abc123XYZ_-');
  });

  it('ignores timestamps and other query noise', () => {
    const plain = resolveSource('https://example.com/watch?v=abc123');
    expect(resolveSource('https://example.com/watch?v=abc123&t=15s')).toBe(plain);
    expect(resolveSource('https://example.com/watch?t=15s&v=abc123&utm_source=share')).toBe(plain);
    expect(plain).toBe('abc123');
  });

  it('accepts mobile hosts and links without a scheme', () => {
    expect(resolveSource('https://m.youtube.com/watch?v=abc123')).toBe('abc123');
    expect(resolveSource('youtube.com/watch?v=abc123')).toBe('abc123');
  });

  it('reads short links', () => {
    expect(resolveSource('https://youtu.be/abc123')).toBe('abc123');
    expect(resolveSource('youtu.be/abc123?si=sharetoken')).toBe('abc123');
  });

  it.each([
    ['https://www.youtube.com/live/abc123'],
    ['https://www.youtube.com/shorts/abc123'],
    ['https://www.youtube.com/embed/abc123'],
    ['https://www.youtube.com/v/abc123'],
  ])('reads the id from %s', (url) => {
    expect(resolveSource(url)).toBe('abc123');
  });

  it('strips hash fragments and surrounding whitespace', () => {
    expect(resolveSource('  https://www.youtube.com/watch?v=abc123#comments  ')).toBe('abc123');
  });

  it('rejects empty input', () => {
    expect(() => resolveSource('   ')).toThrow(new InvalidSourceError('Source URL is required'));
  });

  it('rejects links without a video id', () => {
    expect(() => resolveSource('https://example.com/about')).toThrow(
      'Could not extract a video id from URL: https://example.com/about'
    );
    expect(() => resolveSource('https://www.youtube.com/watch')).toThrow(InvalidSourceError);
  });

  it('rejects ids with unexpected characters', () => {
    expect(() => resolveSource('https://youtu.be/abc$123')).toThrow(InvalidSourceError);
  });

  it('rejects strings that are not URLs', () => {
    expect(() => resolveSource('not a url at all')).toThrow(InvalidSourceError);
  });

  it('classifies failures as InvalidSource', () => {
    try {
      resolveSource('https://example.com/about');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(InvalidSourceError);
      expect(error).toHaveProperty('category', 'InvalidSource');
    }
  });
});

describe('canonicalLocator', () => {
  it('appends the id to the watch URL base', () => {
    expect(canonicalLocator('abc123', 'https://www.youtube.com/watch?v=')).toBe(
      'https://www.youtube.com/watch?v=abc123'
    );
  });
});
