/**
 * Title Normalizer
 *
 * Turns a raw video title and uploader name into a catalog search query.
 * Pure: no I/O, no failure mode.
 */

import type { NormalizedQuery } from '../../shared/types';
import { foldText } from '../utils/textSimilarity';

// ─── Patterns ────────────────────────────────────────────────────────────────

/** "(feat. X)", "[ft. X]", "{featuring X}" */
const BRACKETED_FEATURING = /[([{]\s*(?:feat\.?|ft\.?|featuring)\s+([^)\]}]+)[)\]}]/i;

/** " feat. X" up to the next bracket, pipe, dash separator or end of title */
const BARE_FEATURING = /\s(?:feat\.?|ft\.?|featuring)\s+(.+?)(?=\s*[([{|]|\s+[-–—]\s|$)/i;

const BRACKETED_SEGMENT = /[([{]([^)\]}]*)[)\]}]/g;

const NOISE_MARKER = new RegExp(
  [
    'official',
    'lyrics?',
    'lyric video',
    'visuali[sz]er',
    'music video',
    'video',
    'audio',
    'hd',
    'hq',
    '4k',
    '1080p',
    '720p',
    'remix',
    'cover',
    'live',
    'acoustic',
    'slowed',
    'reverb',
    'sped\\s*up',
    'lo-?fi',
    'remaster(?:ed)?',
    'explicit',
    'clean',
  ]
    .map((marker) => `\\b${marker}\\b`)
    .join('|'),
  'i',
);

const BARE_QUALITY_TAG = /\b(?:HD|HQ|4K)\b/gi;

const PIPE_SUFFIX = /\|.*$/;

const ARTIST_PREFIX = /^(.+?)\s+[-–—]\s+(.+)$/;

const EDGE_SEPARATORS = /^[\s\-|–—]+|[\s\-|–—]+$/g;

const CHANNEL_SUFFIXES = [/\s*-\s*topic\s*$/i, /vevo\s*$/i];

const CHANNEL_NOISE_WORDS = /\b(?:official|music|records|tv|channel)\b/gi;

// ─── Helpers ─────────────────────────────────────────────────────────────────

function collapse(value: string): string {
  return value.replace(/\s+/g, ' ').replace(EDGE_SEPARATORS, '').trim();
}

/**
 * Removes channel decorations from an uploader name:
 * "Ed Sheeran - Topic" → "Ed Sheeran", "SomeArtistVEVO" → "SomeArtist".
 */
export function cleanUploader(uploader: string): string {
  let cleaned = uploader.trim();
  for (const suffix of CHANNEL_SUFFIXES) {
    cleaned = cleaned.replace(suffix, '');
  }
  return collapse(cleaned.replace(CHANNEL_NOISE_WORDS, ' '));
}

/**
 * Pulls a featured artist out of a title.
 * Returns the title without the featuring segment and the artist text (or null).
 */
export function extractFeaturedArtist(title: string): { title: string; featured: string | null } {
  const bracketed = title.match(BRACKETED_FEATURING);
  if (bracketed) {
    return {
      title: title.replace(bracketed[0], ' '),
      featured: collapse(bracketed[1]) || null,
    };
  }

  const bare = title.match(BARE_FEATURING);
  if (bare) {
    return {
      title: title.replace(bare[0], ' '),
      featured: collapse(bare[1]) || null,
    };
  }

  return { title, featured: null };
}

/**
 * Removes bracketed decorations whose content is a noise marker, bare quality
 * tags and everything after a pipe.
 */
export function stripNoise(title: string): string {
  return title
    .replace(BRACKETED_SEGMENT, (segment: string, content: string) =>
      NOISE_MARKER.test(content) ? ' ' : segment,
    )
    .replace(BARE_QUALITY_TAG, ' ')
    .replace(PIPE_SUFFIX, ' ');
}

function dropUploaderPrefix(title: string, uploaderHint: string, uploader: string): string {
  const match = title.match(ARTIST_PREFIX);
  if (!match) return title;

  const prefix = foldText(match[1]);
  if (prefix.length > 0 && (prefix === foldText(uploaderHint) || prefix === foldText(uploader))) {
    return match[2];
  }
  return title;
}

// ─── Public API ──────────────────────────────────────────────────────────────

/**
 * Normalizes a raw title into a NormalizedQuery.
 *
 * @example
 * normalize('Shape of You [Official Video] ft. Stormzy', 'Ed Sheeran')
 * // → { searchTitle: 'Shape of You', artistHint: 'Stormzy', extraHints: ['Ed Sheeran'] }
 */
export function normalize(
  rawTitle: string,
  uploader: string,
  durationSeconds?: number,
): NormalizedQuery {
  const uploaderHint = cleanUploader(uploader);

  const { title: withoutFeaturing, featured } = extractFeaturedArtist(rawTitle);
  const stripped = collapse(stripNoise(withoutFeaturing));
  let searchTitle = collapse(dropUploaderPrefix(stripped, uploaderHint, uploader));

  if (searchTitle.length === 0) {
    searchTitle = rawTitle.trim();
  }

  const query: NormalizedQuery = { searchTitle, extraHints: [] };

  if (featured) {
    query.artistHint = featured;
    if (uploaderHint) {
      query.extraHints.push(uploaderHint);
    }
  } else if (uploaderHint) {
    query.artistHint = uploaderHint;
  }

  if (durationSeconds !== undefined && Number.isFinite(durationSeconds) && durationSeconds > 0) {
    query.durationSeconds = durationSeconds;
  }

  return query;
}

/**
 * All artist hints of a query, preferred hint first.
 */
export function queryHints(query: NormalizedQuery): string[] {
  return query.artistHint ? [query.artistHint, ...query.extraHints] : [...query.extraHints];
}
