/**
 * Tag Writer Service
 *
 * Writes ID3v2 tags and front-cover artwork to converted MP3 files with
 * node-id3. Tags are written in replace mode: the files are freshly
 * converted and carry no tags worth keeping.
 */

import * as fs from 'fs';
import NodeID3 from 'node-id3';
import type { MatchCandidate } from '../../shared/types';
import { TagWriteError } from './errors';
import type { AlbumArtResult } from './albumArtFetcher';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Metadata fields written to a converted file */
export interface TagFields {
  title: string;
  artist: string;
  album?: string;
  year?: number;
  /** Album artist (TPE2) */
  albumArtist?: string;
  composer?: string;
  /** Record label (TPUB) */
  publisher?: string;
  genre?: string;
  copyright?: string;
  /** Track length in seconds, stored in milliseconds (TLEN) */
  durationSeconds?: number;
  /** Free-text comment, e.g. the catalog page of the track */
  comment?: string;
}

/** Writes tags and optional artwork to an audio file */
export interface TagWriter {
  /**
   * @throws TagWriteError when the tags cannot be written
   */
  writeTags(filePath: string, fields: TagFields, artwork?: AlbumArtResult | null, itemId?: string): Promise<void>;
}

// ─── ID3 Tag Building ─────────────────────────────────────────────────────────

/**
 * Builds the tag fields for a matched candidate. The probed duration of the
 * converted file wins over the catalog's.
 */
export function buildTagFields(candidate: MatchCandidate, probedDurationSeconds?: number): TagFields {
  const fields: TagFields = {
    title: candidate.title,
    artist: candidate.artist,
  };

  if (candidate.album) fields.album = candidate.album;
  if (candidate.year !== undefined) fields.year = candidate.year;
  if (candidate.albumArtist) fields.albumArtist = candidate.albumArtist;
  if (candidate.composer) fields.composer = candidate.composer;
  if (candidate.label) fields.publisher = candidate.label;
  if (candidate.genre) fields.genre = candidate.genre;
  if (candidate.copyright) fields.copyright = candidate.copyright;
  if (candidate.permalink) fields.comment = candidate.permalink;

  const duration =
    probedDurationSeconds !== undefined && probedDurationSeconds > 0
      ? probedDurationSeconds
      : candidate.durationSeconds;
  if (duration !== undefined && duration > 0) fields.durationSeconds = duration;

  return fields;
}

/**
 * Builds a node-id3 compatible tag object from TagFields and optional artwork.
 */
export function buildId3Tags(fields: TagFields, artwork?: AlbumArtResult | null): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: fields.title,
    artist: fields.artist,
  };

  if (fields.album !== undefined) {
    tags.album = fields.album;
  }

  if (fields.year !== undefined) {
    tags.year = String(fields.year);
  }

  if (fields.albumArtist !== undefined) {
    tags.performerInfo = fields.albumArtist;
  }

  if (fields.composer !== undefined) {
    tags.composer = fields.composer;
  }

  if (fields.publisher !== undefined) {
    tags.publisher = fields.publisher;
  }

  if (fields.genre !== undefined) {
    tags.genre = fields.genre;
  }

  if (fields.copyright !== undefined) {
    tags.copyright = fields.copyright;
  }

  if (fields.durationSeconds !== undefined) {
    tags.length = String(Math.round(fields.durationSeconds * 1000));
  }

  if (fields.comment !== undefined) {
    tags.comment = {
      language: 'eng',
      text: fields.comment,
    };
  }

  if (artwork) {
    tags.image = {
      mime: artwork.mimeType,
      type: { id: 3, name: 'front cover' },
      description: 'Front Cover',
      imageBuffer: artwork.data,
    };
  }

  return tags;
}

// ─── MP3 Tag Writing ──────────────────────────────────────────────────────────

export class Id3TagWriter implements TagWriter {
  async writeTags(
    filePath: string,
    fields: TagFields,
    artwork?: AlbumArtResult | null,
    itemId?: string,
  ): Promise<void> {
    if (!fs.existsSync(filePath)) {
      throw new TagWriteError(`File not found: ${filePath}`, { itemId });
    }

    const tags = buildId3Tags(fields, artwork);

    let result: true | Error;
    try {
      result = NodeID3.write(tags, filePath);
    } catch (error: unknown) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new TagWriteError(`Unexpected error writing tags: ${cause.message}`, { itemId, cause });
    }

    if (result instanceof Error) {
      throw new TagWriteError(`Failed to write ID3 tags: ${result.message}`, {
        itemId,
        cause: result,
      });
    }
  }
}
