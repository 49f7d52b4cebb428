/**
 * Track Fetcher
 *
 * Turns a matched catalog candidate into a finished file:
 * download → transcode → probe → artwork → tags → atomic rename.
 *
 * Work happens in a private temp directory inside the destination
 * directory so the final rename never crosses filesystems. The temp
 * directory is removed on every path, and nothing is written to the
 * destination unless every step succeeded.
 */

import * as fs from 'fs';
import * as path from 'path';
import { randomBytes } from 'crypto';
import type { FailureKind, MatchCandidate, SourceItem, TrackOutcome } from '../../shared/types';
import {
  PipelineError,
  StreamUnavailableError,
  TranscodeError,
  isPipelineError,
  wrapError,
} from './errors';
import type { AudioStreamSource } from './audioStream';
import type { AudioTranscoder } from './audioTranscoder';
import type { AudioProbe } from './audioReader';
import type { AlbumArtResult, ArtworkFetcher } from './albumArtFetcher';
import { buildTagFields } from './tagWriter';
import type { TagWriter } from './tagWriter';
import { buildDestinationPath } from '../utils/fileScanner';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

export interface TrackFetcherDependencies {
  streamSource: AudioStreamSource;
  transcoder: AudioTranscoder;
  probe: AudioProbe;
  fetchArtwork: ArtworkFetcher;
  tagWriter: TagWriter;
}

export interface TrackFetcherOptions {
  /** Target MP3 bitrate in kbps */
  bitrateKbps?: number;
  logger?: Logger;
}

/** Identity of the item a fetch belongs to */
export type ItemRef = Pick<SourceItem, 'sequenceIndex' | 'sourceId'>;

// ─── Constants ───────────────────────────────────────────────────────────────

const DEFAULT_BITRATE_KBPS = 320;

/** Prefix of the per-fetch temp directories created in the destination directory */
export const TEMP_DIR_PREFIX = '.songbridge-';

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Removes temp directories that fetches interrupted by a hard exit left in
 * `destinationDir`. Returns how many were removed.
 */
export async function removeStaleTempDirs(destinationDir: string): Promise<number> {
  let entries: fs.Dirent[];
  try {
    entries = await fs.promises.readdir(destinationDir, { withFileTypes: true });
  } catch (error: unknown) {
    if (isMissingDirError(error)) return 0;
    throw error;
  }

  const stale = entries.filter((entry) => entry.isDirectory() && entry.name.startsWith(TEMP_DIR_PREFIX));
  for (const entry of stale) {
    await fs.promises.rm(path.join(destinationDir, entry.name), { recursive: true, force: true });
  }
  return stale.length;
}

function isMissingDirError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Maps an error raised while fetching to the failure kind of its outcome.
 */
export function failureKindOf(error: unknown): FailureKind {
  if (!isPipelineError(error)) return 'Unexpected';
  switch (error.category) {
    case 'NoMatch':
    case 'StreamUnavailable':
    case 'TranscodeError':
    case 'TagWriteError':
      return error.category;
    default:
      return 'Unexpected';
  }
}

function tempName(baseName: string, suffix: string): string {
  return `${baseName}.${randomBytes(4).toString('hex')}${suffix}`;
}

// ─── Track Fetcher ───────────────────────────────────────────────────────────

export class TrackFetcher {
  private readonly deps: TrackFetcherDependencies;
  private readonly bitrateKbps: number;
  private readonly logger: Logger | undefined;

  constructor(deps: TrackFetcherDependencies, options?: TrackFetcherOptions) {
    this.deps = deps;
    this.bitrateKbps = options?.bitrateKbps ?? DEFAULT_BITRATE_KBPS;
    this.logger = options?.logger;
  }

  /**
   * Fetches a candidate into `destinationDir`. The destination path defaults
   * to "<Title> - <Artist>.mp3". Never throws: every failure becomes a
   * `Failed` outcome.
   */
  async fetch(
    candidate: MatchCandidate,
    destinationDir: string,
    destinationPath?: string,
    item: ItemRef = { sequenceIndex: 0, sourceId: candidate.catalogId },
  ): Promise<TrackOutcome> {
    const target = destinationPath ?? buildDestinationPath(destinationDir, candidate.title, candidate.artist);
    const itemId = item.sourceId;
    const ref = { sequenceIndex: item.sequenceIndex, sourceId: item.sourceId };

    let workDir: string | null = null;
    try {
      if (!candidate.streamUrl) {
        throw new StreamUnavailableError(`"${candidate.title}" has no downloadable stream`, { itemId });
      }

      await fs.promises.mkdir(destinationDir, { recursive: true });
      workDir = await fs.promises.mkdtemp(path.join(destinationDir, TEMP_DIR_PREFIX));

      const baseName = path.basename(target, path.extname(target));
      const downloadPath = path.join(workDir, tempName(baseName, '.download'));
      const partPath = path.join(workDir, tempName(baseName, '.part.mp3'));

      await this.step('StreamUnavailable', itemId, 'downloading', () =>
        this.deps.streamSource.download(candidate.streamUrl ?? '', downloadPath, itemId),
      );

      await this.step('TranscodeError', itemId, 'transcoding', () =>
        this.deps.transcoder.transcode(downloadPath, partPath, this.bitrateKbps, itemId),
      );

      const probed = await this.step('TranscodeError', itemId, 'probing', () =>
        this.deps.probe(partPath),
      );
      if (probed.durationSeconds <= 0) {
        throw new TranscodeError('Converted file has no playable audio', { itemId, step: 'probing' });
      }

      const artwork = await this.loadArtwork(candidate, itemId);

      await this.step('TagWriteError', itemId, 'tagging', () =>
        this.deps.tagWriter.writeTags(
          partPath,
          buildTagFields(candidate, probed.durationSeconds),
          artwork,
          itemId,
        ),
      );

      await fs.promises.rename(partPath, target);

      this.logger?.info(`Downloaded "${path.basename(target)}"`, { item: itemId, step: 'fetching' });
      return { kind: 'Downloaded', destinationPath: target, ...ref };
    } catch (error: unknown) {
      const errorKind = failureKindOf(error);
      const message = error instanceof Error ? error.message : String(error);
      if (isPipelineError(error)) {
        this.logger?.logPipelineError(error);
      } else {
        this.logger?.logError(error, { item: itemId, step: 'fetching' });
      }
      return { kind: 'Failed', errorKind, message, ...ref };
    } finally {
      if (workDir) {
        await fs.promises.rm(workDir, { recursive: true, force: true });
      }
    }
  }

  /**
   * Artwork never fails a track: errors are logged and tagging goes on without it.
   */
  private async loadArtwork(candidate: MatchCandidate, itemId: string): Promise<AlbumArtResult | null> {
    if (!candidate.artworkUrl) return null;
    try {
      return await this.deps.fetchArtwork(candidate.artworkUrl);
    } catch (error: unknown) {
      this.logger?.warn('Artwork unavailable; tagging without cover', {
        item: itemId,
        step: 'artwork',
        cause: error instanceof Error ? error.message : String(error),
      });
      return null;
    }
  }

  /**
   * Runs one step, wrapping anything that is not already a PipelineError in
   * the step's category.
   */
  private async step<T>(
    category: 'StreamUnavailable' | 'TranscodeError' | 'TagWriteError',
    itemId: string,
    stepName: string,
    run: () => Promise<T>,
  ): Promise<T> {
    try {
      return await run();
    } catch (error: unknown) {
      const wrapped: PipelineError = wrapError(error, category, { itemId, step: stepName });
      throw wrapped;
    }
  }
}
