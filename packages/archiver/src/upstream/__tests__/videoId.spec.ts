import { describe, it, expect } from 'vitest';
import { extractVideoId } from '../videoId';

describe('extractVideoId', () => {
  it.each([
    ['dQw4w9WgXcQ'],
    ['  dQw4w9WgXcQ  '],
    ['https://www.youtube.com/watch?v=dQw4w9WgXcQ'],
    ['https://www.youtube.com/watch?feature=share&v=dQw4w9WgXcQ'],
    ['https://m.youtube.com/watch?v=dQw4w9WgXcQ'],
    ['https://youtu.be/dQw4w9WgXcQ'],
    ['https://youtu.be/dQw4w9WgXcQ?t=42'],
    ['https://www.youtube.com/live/dQw4w9WgXcQ?si=share'],
    ['https://www.youtube.com/shorts/dQw4w9WgXcQ']
  ])('finds the id in %s', (input) => {
    expect(extractVideoId(input)).toBe('dQw4w9WgXcQ');
  });

  it.each([
    ['not a url'],
    ['https://example.com/watch?v=dQw4w9WgXcQ'],
    ['https://www.youtube.com/channel/UCtestchannel000000000000'],
    ['https://youtu.be/']
  ])('finds nothing in %s', (input) => {
    expect(extractVideoId(input)).toBeNull();
  });
});
