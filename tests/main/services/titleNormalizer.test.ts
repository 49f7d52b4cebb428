import { describe, it, expect } from 'vitest';
import {
  cleanUploader,
  extractFeaturedArtist,
  normalize,
  queryHints,
  stripNoise,
} from '../../../src/main/services/titleNormalizer';

describe('titleNormalizer', () => {
  describe('cleanUploader', () => {
    it('should drop the " - Topic" suffix of auto-generated channels', () => {
      expect(cleanUploader('Coldplay - Topic')).toBe('Coldplay');
    });

    it('should drop a trailing VEVO', () => {
      expect(cleanUploader('MadeUpBandVEVO')).toBe('MadeUpBand');
    });

    it('should drop channel noise words', () => {
      expect(cleanUploader('Nova Records Official')).toBe('Nova');
    });

    it('should leave plain artist names alone', () => {
      expect(cleanUploader('  Ed Sheeran ')).toBe('Ed Sheeran');
    });
  });

  describe('extractFeaturedArtist', () => {
    it('should extract a bracketed featured artist', () => {
      const result = extractFeaturedArtist('Closer (feat. Halsey)');

      expect(result.featured).toBe('Halsey');
      expect(result.title.trim()).toBe('Closer');
    });

    it('should stop a bare featured artist at the next bracket', () => {
      const result = extractFeaturedArtist('Glowing Lights ft. Sam Rivers [Lyric Video]');

      expect(result.featured).toBe('Sam Rivers');
      expect(result.title).toBe('Glowing Lights  [Lyric Video]');
    });

    it('should return null when there is no featured artist', () => {
      expect(extractFeaturedArtist('Yellow')).toEqual({ title: 'Yellow', featured: null });
    });
  });

  describe('stripNoise', () => {
    it('should remove bracketed noise markers', () => {
      expect(stripNoise('Perfect (Official Music Video)').trim()).toBe('Perfect');
    });

    it('should keep bracketed text that is not noise', () => {
      expect(stripNoise('Song Title (Part 2)')).toBe('Song Title (Part 2)');
    });

    it('should remove everything after a pipe', () => {
      expect(stripNoise('Midnight Drive | Lofi Beats 2024').trim()).toBe('Midnight Drive');
    });
  });

  describe('normalize', () => {
    it('should split a featured artist from the uploader hint', () => {
      expect(normalize('Shape of You [Official Video] ft. Stormzy', 'Ed Sheeran')).toEqual({
        searchTitle: 'Shape of You',
        artistHint: 'Stormzy',
        extraHints: ['Ed Sheeran'],
      });
    });

    it('should drop an "Artist - " prefix that repeats the uploader', () => {
      expect(normalize('Ed Sheeran - Perfect (Official Music Video)', 'Ed Sheeran')).toEqual({
        searchTitle: 'Perfect',
        artistHint: 'Ed Sheeran',
        extraHints: [],
      });
    });

    it('should compare the prefix against the cleaned uploader', () => {
      expect(normalize('Coldplay - Yellow', 'Coldplay - Topic').searchTitle).toBe('Yellow');
    });

    it('should keep a prefix that does not match the uploader', () => {
      expect(normalize('Other Band - Yellow', 'Coldplay').searchTitle).toBe('Other Band - Yellow');
    });

    it('should use the bracketed featured artist as the preferred hint', () => {
      expect(normalize('Closer (feat. Halsey)', 'The Chainsmokers')).toEqual({
        searchTitle: 'Closer',
        artistHint: 'Halsey',
        extraHints: ['The Chainsmokers'],
      });
    });

    it('should remove bare quality tags', () => {
      expect(normalize('Ocean Eyes HD', 'Someone').searchTitle).toBe('Ocean Eyes');
    });

    it('should fall back to the raw title when everything is noise', () => {
      expect(normalize('  (Official Video) ', 'X').searchTitle).toBe('(Official Video)');
    });

    it('should leave the artist hint unset for an empty uploader', () => {
      const query = normalize('Yellow', '');

      expect(query.artistHint).toBeUndefined();
      expect(query.extraHints).toEqual([]);
    });

    it('should carry a positive duration only', () => {
      expect(normalize('Yellow', 'Coldplay', 266).durationSeconds).toBe(266);
      expect(normalize('Yellow', 'Coldplay', 0).durationSeconds).toBeUndefined();
      expect(normalize('Yellow', 'Coldplay').durationSeconds).toBeUndefined();
    });

    it('should be deterministic', () => {
      const raw = 'Artist X - Track Y (Lyric Video) | Label';
      expect(normalize(raw, 'Artist X')).toEqual(normalize(raw, 'Artist X'));
    });
  });

  describe('queryHints', () => {
    it('should list the preferred hint first', () => {
      expect(
        queryHints({ searchTitle: 'Closer', artistHint: 'Halsey', extraHints: ['The Chainsmokers'] }),
      ).toEqual(['Halsey', 'The Chainsmokers']);
    });

    it('should return only the extra hints when there is no preferred hint', () => {
      expect(queryHints({ searchTitle: 'Closer', extraHints: [] })).toEqual([]);
    });
  });
});
