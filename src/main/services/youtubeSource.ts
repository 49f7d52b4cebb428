/**
 * YouTube Metadata Source
 *
 * Resolves a playlist or single video URL into SourceItems without
 * downloading any media. Playlists are expanded with ytpl (all pages);
 * single videos are looked up with ytdl-core.
 */

import ytpl from 'ytpl';
import ytdl from '@distube/ytdl-core';
import type { SourceItem } from '../../shared/types';
import { SourceUnavailableError } from './errors';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Resolves a source URL to the ordered list of items it contains */
export interface MetadataSource {
  /**
   * @throws SourceUnavailableError when the URL cannot be resolved
   */
  resolveItems(sourceUrl: string): Promise<SourceItem[]>;
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

const YOUTUBE_HOSTS = new Set([
  'youtube.com',
  'www.youtube.com',
  'm.youtube.com',
  'music.youtube.com',
  'youtu.be',
]);

function parseUrl(value: string): URL | null {
  try {
    return new URL(value.trim());
  } catch {
    return null;
  }
}

/**
 * Returns the playlist id of a YouTube URL with a `list=` parameter, else null.
 */
export function getPlaylistId(sourceUrl: string): string | null {
  const url = parseUrl(sourceUrl);
  if (!url || !YOUTUBE_HOSTS.has(url.hostname.toLowerCase())) return null;
  const list = url.searchParams.get('list');
  return list && list.trim().length > 0 ? list.trim() : null;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

// ─── YouTube Source ──────────────────────────────────────────────────────────

export class YoutubeMetadataSource implements MetadataSource {
  async resolveItems(sourceUrl: string): Promise<SourceItem[]> {
    const playlistId = getPlaylistId(sourceUrl);
    if (playlistId) {
      return this.resolvePlaylist(sourceUrl, playlistId);
    }

    if (!ytdl.validateURL(sourceUrl)) {
      throw new SourceUnavailableError(`Not a YouTube video or playlist URL: ${sourceUrl}`, sourceUrl);
    }

    return [await this.resolveVideo(sourceUrl)];
  }

  private async resolvePlaylist(sourceUrl: string, playlistId: string): Promise<SourceItem[]> {
    let playlist: ytpl.Result;
    try {
      playlist = await ytpl(playlistId, { limit: Infinity });
    } catch (error: unknown) {
      throw new SourceUnavailableError(
        `Playlist ${playlistId} is unavailable: ${errorMessage(error)}`,
        sourceUrl,
        { cause: toError(error) },
      );
    }

    return playlist.items
      .filter((item) => Boolean(item.id))
      .map(
        (item, sequenceIndex): SourceItem => ({
          rawTitle: item.title ?? '',
          uploader: item.author?.name ?? '',
          sourceId: item.id,
          sequenceIndex,
          sourceUrl: item.shortUrl || item.url,
          durationSeconds: item.durationSec ?? undefined,
        }),
      );
  }

  private async resolveVideo(sourceUrl: string): Promise<SourceItem> {
    let info: ytdl.videoInfo;
    try {
      info = await ytdl.getBasicInfo(sourceUrl);
    } catch (error: unknown) {
      throw new SourceUnavailableError(
        `Video is unavailable: ${errorMessage(error)}`,
        sourceUrl,
        { cause: toError(error) },
      );
    }

    const details = info.videoDetails;
    const length = Number(details.lengthSeconds);

    return {
      rawTitle: details.title ?? '',
      uploader: details.author?.name ?? '',
      sourceId: details.videoId,
      sequenceIndex: 0,
      sourceUrl: details.video_url || sourceUrl,
      durationSeconds: Number.isFinite(length) && length > 0 ? length : undefined,
    };
  }
}
