// tests/unit/extractors.test.ts

import { describe, it, expect } from 'vitest';
import {
  UNKNOWN_AUTHOR,
  extractMediaFrame,
  extractThumbnail,
  formatDisplayTimestamp,
  resolveAuthor,
  resolveTimestamp,
} from '../../src/core/normalizer/extractors';

describe('resolveAuthor', () => {
  it('should prefer the anonymous reviewer nested under author', () => {
    expect(resolveAuthor({ author: { anonymous_user: { email: 'a@b.com' }, name: 'Owner' } })).toBe(
      'a@b.com'
    );
  });

  it('should use a top-level anonymous reviewer before the author', () => {
    expect(resolveAuthor({ anonymous_user: { name: 'Guest' }, author: { name: 'Xavier' } })).toBe(
      'Guest'
    );
  });

  it('should walk name fields in order', () => {
    expect(resolveAuthor({ author: { display_name: '  Dee ', email: 'dee@test.local' } })).toBe('Dee');
    expect(resolveAuthor({ author: { name: '', full_name: 'Full Name' } })).toBe('Full Name');
  });

  it('should fall back to the owner, then a plain author string', () => {
    expect(resolveAuthor({ owner: { full_name: 'Owen' } })).toBe('Owen');
    expect(resolveAuthor({ author: 'plain' })).toBe('plain');
  });

  it('should default to an unknown user', () => {
    expect(resolveAuthor({})).toBe(UNKNOWN_AUTHOR);
    expect(resolveAuthor({ author: { anonymous_user: {} } })).toBe('Unknown User');
  });
});

describe('resolveTimestamp', () => {
  it('should produce ISO and display forms in UTC', () => {
    expect(resolveTimestamp({ created_at: '2024-03-05T14:07:59Z' }, 0)).toEqual({
      rawTimestamp: '2024-03-05T14:07:59.000Z',
      displayTimestamp: '2024-03-05 14:07',
      substituted: false,
    });
  });

  it('should convert offsets to UTC', () => {
    expect(resolveTimestamp({ inserted_at: '2024-03-05T23:30:00+02:00' }, 0).displayTimestamp).toBe(
      '2024-03-05 21:30'
    );
  });

  it('should substitute the current time when missing or invalid', () => {
    const now = Date.parse('2024-05-01T12:00:00.000Z');

    expect(resolveTimestamp({ created_at: 'yesterday-ish' }, now)).toEqual({
      rawTimestamp: '2024-05-01T12:00:00.000Z',
      displayTimestamp: '2024-05-01 12:00',
      substituted: true,
    });
    expect(resolveTimestamp({}, now).substituted).toBe(true);
  });

  it('should treat years beyond four digits as invalid', () => {
    const now = Date.parse('2024-05-01T12:00:00.000Z');

    expect(resolveTimestamp({ created_at: '+010000-01-01T00:00:00Z' }, now)).toEqual({
      rawTimestamp: '2024-05-01T12:00:00.000Z',
      displayTimestamp: '2024-05-01 12:00',
      substituted: true,
    });
    expect(
      resolveTimestamp({ created_at: '+010000-01-01T00:00:00Z', inserted_at: '2024-03-05T10:00:00Z' }, now)
        .rawTimestamp
    ).toBe('2024-03-05T10:00:00.000Z');
  });

  it('should format display timestamps to the minute', () => {
    expect(formatDisplayTimestamp('2024-12-31T23:59:59.999Z')).toBe('2024-12-31 23:59');
  });
});

describe('extractThumbnail', () => {
  it('should prefer the medium size from a thumbnail map', () => {
    expect(extractThumbnail({ thumbnails: { large: 'L', medium: 'M' } })).toBe('M');
    expect(extractThumbnail({ thumbnail: { small: 'S' } })).toBe('S');
  });

  it('should take the first usable entry of a thumbnail list', () => {
    expect(extractThumbnail({ thumbnails: ['', { url: 'U' }] })).toBe('U');
  });

  it('should read string fields in order', () => {
    expect(extractThumbnail({ thumb: 'B', thumbnail_url: 'A' })).toBe('A');
    expect(extractThumbnail({ thumb_540: 'T' })).toBe('T');
  });

  it('should return undefined when nothing is present', () => {
    expect(extractThumbnail({ name: 'Cut' })).toBeUndefined();
  });
});

describe('extractMediaFrame', () => {
  it('should read original dimensions, then resolution', () => {
    expect(extractMediaFrame({ original_width: 1920, original_height: 1080 })).toEqual({
      width: 1920,
      height: 1080,
    });
    expect(extractMediaFrame({ resolution: { width: 640, height: 360 } })).toEqual({
      width: 640,
      height: 360,
    });
  });

  it('should ignore non-positive dimensions', () => {
    expect(extractMediaFrame({ original_width: 0, original_height: 1080 })).toBeUndefined();
  });
});
