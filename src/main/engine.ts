/**
 * Wires the download engine from settings: YouTube source, JioSaavn
 * catalog, HTTP stream download, ffmpeg, music-metadata probe and node-id3.
 */

import type { AppSettings, ProgressUpdate, TrackOutcome } from '../shared/types';
import { DEFAULT_SETTINGS } from '../shared/types';
import { Orchestrator } from './services/orchestrator';
import { YoutubeMetadataSource } from './services/youtubeSource';
import { SaavnCatalogSearch } from './services/saavnCatalog';
import { CatalogMatcher, SearchCache } from './services/catalogMatcher';
import { TrackFetcher } from './services/trackFetcher';
import { HttpAudioStreamSource } from './services/audioStream';
import { FfmpegAudioTranscoder } from './services/audioTranscoder';
import { probeAudioFile } from './services/audioReader';
import { fetchArtwork } from './services/albumArtFetcher';
import { Id3TagWriter } from './services/tagWriter';
import type { Logger } from './services/logger';

export interface DownloadEngineOptions {
  settings?: AppSettings;
  logger?: Logger;
  onProgress?: (update: ProgressUpdate) => void;
  onItemComplete?: (outcome: TrackOutcome) => void;
}

export function createDownloadEngine(options: DownloadEngineOptions = {}): Orchestrator {
  const settings = options.settings ?? DEFAULT_SETTINGS;
  const logger = options.logger;

  const catalog = new SaavnCatalogSearch({
    apiBaseUrl: settings.catalogApiBaseUrl,
    limit: settings.searchLimit,
    timeoutMs: settings.requestTimeoutMs,
    maxRetries: settings.maxRetries,
    logger,
  });

  const matcher = new CatalogMatcher(catalog, {
    policy: settings.matchPolicy,
    cache: new SearchCache(),
  });

  const fetcher = new TrackFetcher(
    {
      streamSource: new HttpAudioStreamSource({ timeoutMs: settings.requestTimeoutMs }),
      transcoder: new FfmpegAudioTranscoder({ ffmpegPath: settings.ffmpegPath }),
      probe: probeAudioFile,
      fetchArtwork: (url) => fetchArtwork(url, { timeoutMs: settings.requestTimeoutMs, logger }),
      tagWriter: new Id3TagWriter(),
    },
    { bitrateKbps: settings.bitrateKbps, logger },
  );

  return new Orchestrator(
    { metadataSource: new YoutubeMetadataSource(), matcher, fetcher },
    {
      concurrency: settings.concurrency,
      logger,
      onProgress: options.onProgress,
      onItemComplete: options.onItemComplete,
    },
  );
}

export { Orchestrator } from './services/orchestrator';
export { SourceUnavailableError, PipelineError } from './services/errors';
export { normalize } from './services/titleNormalizer';
export type {
  AppSettings,
  MatchCandidate,
  NormalizedQuery,
  RunSummary,
  SourceItem,
  TrackOutcome,
} from '../shared/types';
