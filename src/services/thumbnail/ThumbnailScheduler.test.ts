import { ValidationError } from '../../core/errors/AppError';
import { coverThumbnailTimestamps, coverTimestampsFor, trimThumbnailTimestamps } from './ThumbnailScheduler';
import { VideoEditorSource } from './ThumbnailTypes';

function editorSource(overrides: Partial<VideoEditorSource> = {}): VideoEditorSource {
  return {
    filePath: '/videos/clip.mp4',
    videoDurationMs: 10000,
    isTrimmed: false,
    startTrimMs: 0,
    trimmedDurationMs: 10000,
    trimThumbnailsQuality: 10,
    coverThumbnailsQuality: 10,
    ...overrides
  };
}

describe('ThumbnailScheduler', () => {
  describe('trimThumbnailTimestamps', () => {
    it('spaces points after the start and ends on the duration', () => {
      expect(trimThumbnailTimestamps(10000, 5)).toEqual([2000, 4000, 6000, 8000, 10000]);
    });

    it('rounds fractional positions', () => {
      expect(trimThumbnailTimestamps(1000, 3)).toEqual([333, 667, 1000]);
    });

    it('produces N strictly increasing points within (0, D]', () => {
      for (const duration of [1000, 7777, 60000]) {
        for (const quantity of [1, 3, 7, 10]) {
          const timestamps = trimThumbnailTimestamps(duration, quantity);
          expect(timestamps).toHaveLength(quantity);
          expect(timestamps[0]).toBeGreaterThan(0);
          expect(timestamps[quantity - 1]).toBe(duration);
          for (let i = 1; i < timestamps.length; i++) {
            expect(timestamps[i]).toBeGreaterThan(timestamps[i - 1]);
          }
        }
      }
    });

    it('rejects invalid quantity and duration', () => {
      expect(() => trimThumbnailTimestamps(10000, 0)).toThrow(ValidationError);
      expect(() => trimThumbnailTimestamps(10000, 2.5)).toThrow(ValidationError);
      expect(() => trimThumbnailTimestamps(-1, 3)).toThrow(ValidationError);
      expect(() => trimThumbnailTimestamps(Number.NaN, 3)).toThrow(ValidationError);
    });
  });

  describe('coverThumbnailTimestamps', () => {
    it('starts at zero for an untrimmed video', () => {
      expect(coverThumbnailTimestamps(10000, 4)).toEqual([0, 2500, 5000, 7500]);
    });

    it('shifts points by the offset', () => {
      expect(coverThumbnailTimestamps(4000, 2, 1000)).toEqual([1000, 3000]);
    });

    it('produces N strictly increasing points within [offset, offset + D)', () => {
      for (const quantity of [1, 4, 9]) {
        const timestamps = coverThumbnailTimestamps(9000, quantity, 500);
        expect(timestamps).toHaveLength(quantity);
        expect(timestamps[0]).toBe(500);
        expect(timestamps[quantity - 1]).toBeLessThan(9500);
        for (let i = 1; i < timestamps.length; i++) {
          expect(timestamps[i]).toBeGreaterThan(timestamps[i - 1]);
        }
      }
    });

    it('rejects a negative offset', () => {
      expect(() => coverThumbnailTimestamps(4000, 2, -10)).toThrow(ValidationError);
    });
  });

  describe('coverTimestampsFor', () => {
    it('uses the full duration when not trimmed', () => {
      expect(coverTimestampsFor(editorSource(), 4)).toEqual([0, 2500, 5000, 7500]);
    });

    it('uses the trimmed window when trimmed', () => {
      const source = editorSource({ isTrimmed: true, startTrimMs: 1000, trimmedDurationMs: 4000 });
      expect(coverTimestampsFor(source, 2)).toEqual([1000, 3000]);
    });
  });
});
