import { describe, it, expect } from 'vitest';
import {
  ARCHIVE_EXTENSIONS,
  BLEND_LABELS,
  DEFAULT_SETTINGS,
  GENRE_TAGS,
  PLAYLIST_EXTENSIONS,
  SUPPORTED_EXTENSIONS,
} from '../../src/shared/types';

describe('Shared Types', () => {
  describe('extension lists', () => {
    it('should prefix every extension with a dot', () => {
      for (const ext of [...SUPPORTED_EXTENSIONS, ...PLAYLIST_EXTENSIONS, ...ARCHIVE_EXTENSIONS]) {
        expect(ext).toMatch(/^\.[a-z0-9]+$/);
      }
    });

    it('should not overlap', () => {
      const all = [...SUPPORTED_EXTENSIONS, ...PLAYLIST_EXTENSIONS, ...ARCHIVE_EXTENSIONS];
      expect(new Set(all).size).toBe(all.length);
    });

    it('should include the common audio formats', () => {
      expect(SUPPORTED_EXTENSIONS).toEqual(
        expect.arrayContaining(['.wav', '.mp3', '.flac', '.aiff', '.ogg', '.m4a']),
      );
    });
  });

  describe('GENRE_TAGS', () => {
    it('should be unique snake_case keys', () => {
      expect(new Set(GENRE_TAGS).size).toBe(GENRE_TAGS.length);
      for (const tag of GENRE_TAGS) {
        expect(tag).toMatch(/^[a-z]+(_[a-z]+)*$/);
      }
    });
  });

  describe('BLEND_LABELS', () => {
    it('should list the four profiles in order', () => {
      expect(BLEND_LABELS).toEqual(['A', 'B', 'C', 'D']);
    });
  });

  describe('DEFAULT_SETTINGS', () => {
    it('should have the documented defaults', () => {
      expect(DEFAULT_SETTINGS).toEqual({
        outputDir: './mastered',
        concurrency: 4,
        masteringEndpoint: 'http://127.0.0.1:8360',
        referenceLibraryDir: null,
        searchRoots: [],
        blendDominantShare: 0.6,
        numberedRatio: 0.6,
        albumMinTracks: 3,
        albumMaxTracks: 30,
        recordHistory: true,
        logDir: null,
      });
    });

    it('should keep concurrency within 1-10', () => {
      expect(DEFAULT_SETTINGS.concurrency).toBeGreaterThanOrEqual(1);
      expect(DEFAULT_SETTINGS.concurrency).toBeLessThanOrEqual(10);
    });
  });
});
