/**
 * Shared type definitions for songbridge.
 * These interfaces are used by the download engine, its collaborators and the CLI.
 */

/** One playlist/video entry to be resolved and downloaded */
export interface SourceItem {
  /** Video title exactly as the platform reports it */
  readonly rawTitle: string;
  /** Channel / uploader name */
  readonly uploader: string;
  /** Platform identifier of the video */
  readonly sourceId: string;
  /** Position in the resolved list (0-based) */
  readonly sequenceIndex: number;
  /** Watch URL of the video (if known) */
  readonly sourceUrl?: string;
  /** Length of the video in seconds (if known) */
  readonly durationSeconds?: number;
}

/** Search-ready query derived from a SourceItem */
export interface NormalizedQuery {
  /** Cleaned title used as the catalog search term */
  searchTitle: string;
  /** Preferred artist hint (featured artist if one was found, else the uploader) */
  artistHint?: string;
  /** Additional artist hints offered to the matcher */
  extraHints: string[];
  /** Duration of the source video in seconds (if known) */
  durationSeconds?: number;
}

/** A catalog search result considered for selection */
export interface MatchCandidate {
  /** Catalog identifier */
  catalogId: string;
  /** Track title */
  title: string;
  /** Primary artist(s), comma separated */
  artist: string;
  /** Album name */
  album: string;
  /** Release year */
  year?: number;
  /** Track length in seconds */
  durationSeconds?: number;
  /** Cover art URL (fixed 500x500 rendition when the catalog offers one) */
  artworkUrl?: string;
  /** Catalog-reported quality: best available stream bitrate in kbps */
  qualityScore: number;
  /** Album artist (music directors / composers credited on the album) */
  albumArtist?: string;
  /** Composer / lyricist credits */
  composer?: string;
  /** Record label */
  label?: string;
  /** Genre (the catalog reports the language here) */
  genre?: string;
  /** Copyright notice */
  copyright?: string;
  /** Public catalog page for the track */
  permalink?: string;
  /** Highest quality stream URL */
  streamUrl?: string;
}

/** Category of a per-item failure */
export type FailureKind =
  | 'NoMatch'
  | 'StreamUnavailable'
  | 'TranscodeError'
  | 'TagWriteError'
  | 'Unexpected';

/** Fields shared by all outcomes */
interface OutcomeBase {
  /** Index of the item the outcome belongs to */
  sequenceIndex: number;
  /** Platform identifier of the item */
  sourceId: string;
}

/** Terminal result for one SourceItem */
export type TrackOutcome =
  | (OutcomeBase & { kind: 'Downloaded'; destinationPath: string })
  | (OutcomeBase & { kind: 'Skipped'; reason: string; destinationPath?: string })
  | (OutcomeBase & { kind: 'Failed'; errorKind: FailureKind; message: string })
  | (OutcomeBase & { kind: 'Cancelled' });

/** Discriminator values of TrackOutcome */
export type OutcomeKind = TrackOutcome['kind'];

export const OUTCOME_KINDS: readonly OutcomeKind[] = [
  'Downloaded',
  'Skipped',
  'Failed',
  'Cancelled',
] as const;

/** Aggregated, sequence-ordered outcomes for a full run */
export interface RunSummary {
  /** Number of source items in the run */
  total: number;
  /** Number of outcomes of each kind (sums to total) */
  counts: Record<OutcomeKind, number>;
  /** One outcome per item, ordered by sequenceIndex */
  outcomes: TrackOutcome[];
  /** Wall-clock duration of the run */
  durationMs: number;
}

/** Processing state of a single task */
export type TaskState =
  | 'Queued'
  | 'Normalizing'
  | 'Matching'
  | 'SkipCheck'
  | 'Fetching'
  | 'Completed'
  | 'Failed'
  | 'Skipped'
  | 'Cancelled';

export const TERMINAL_STATES: readonly TaskState[] = [
  'Completed',
  'Failed',
  'Skipped',
  'Cancelled',
] as const;

/** Progress update emitted by the orchestrator */
export interface ProgressUpdate {
  /** Total number of items in the run */
  totalItems: number;
  /** Items that reached a terminal state */
  finishedItems: number;
  downloadedCount: number;
  skippedCount: number;
  failedCount: number;
  cancelledCount: number;
  /** Item whose state changed (null for run-level updates) */
  currentItem: string | null;
  /** New state of the current item */
  currentState: TaskState | null;
  /** Estimated time remaining in seconds */
  estimatedTimeRemaining: number | null;
}

/** Weights and thresholds used to rank catalog candidates */
export interface MatchPolicy {
  /** Weight of the title similarity term */
  titleWeight: number;
  /** Weight of the duration closeness term */
  durationWeight: number;
  /** Weight of the artist hint term */
  artistWeight: number;
  /** Duration difference (seconds) at which closeness reaches zero */
  durationToleranceSeconds: number;
  /** Candidates below this title similarity are discarded (0-1) */
  minTitleSimilarity: number;
}

export const DEFAULT_MATCH_POLICY: MatchPolicy = {
  titleWeight: 0.6,
  durationWeight: 0.15,
  artistWeight: 0.25,
  durationToleranceSeconds: 30,
  minTitleSimilarity: 0.35,
};

/** Log severity levels */
export type LogLevel = 'ERROR' | 'WARN' | 'INFO' | 'DEBUG';

/** MP3 bitrates the transcoder accepts */
export const SUPPORTED_BITRATES: readonly number[] = [128, 192, 256, 320] as const;

/** Application settings */
export interface AppSettings {
  /** Directory downloads are written to */
  outputFolder: string;
  /** Number of parallel workers */
  concurrency: number;
  /** Target MP3 bitrate in kbps */
  bitrateKbps: number;
  /** Base URL of the JioSaavn-compatible catalog API */
  catalogApiBaseUrl: string;
  /** Number of candidates requested per search */
  searchLimit: number;
  /** Candidate ranking policy */
  matchPolicy: MatchPolicy;
  /** Path to the ffmpeg binary (null = ffmpeg on PATH) */
  ffmpegPath: string | null;
  /** HTTP timeout for catalog, stream and artwork requests */
  requestTimeoutMs: number;
  /** Retries for transient catalog failures */
  maxRetries: number;
  /** Minimum level written by the logger */
  logLevel: LogLevel;
}

/** Default application settings */
export const DEFAULT_SETTINGS: AppSettings = {
  outputFolder: 'downloads',
  concurrency: 3,
  bitrateKbps: 320,
  catalogApiBaseUrl: 'https://saavn.sumit.co',
  searchLimit: 10,
  matchPolicy: { ...DEFAULT_MATCH_POLICY },
  ffmpegPath: null,
  requestTimeoutMs: 15_000,
  maxRetries: 3,
  logLevel: 'INFO',
};
