import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { defaultOutputPath, formatDuration } from './crawlerUtils';

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [59_400, '59s'],
    [59_500, '1m 0s'],
    [125_000, '2m 5s'],
  ])('should format %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('defaultOutputPath', () => {
  it('should name the file after the site and start time', () => {
    expect(defaultOutputPath('youtube-shorts', new Date('2024-01-02T03:04:05.678Z'))).toBe(
      path.join(
        process.cwd(),
        'actors/crawler/crawler-outputs',
        'youtube-shorts-videos-2024-01-02T03-04-05-678Z.csv'
      )
    );
  });
});
