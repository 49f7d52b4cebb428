/**
 * JioSaavn Catalog Search
 *
 * Searches a JioSaavn-compatible API for songs and converts the loose JSON
 * it returns into MatchCandidates. Implements rate limiting, retry with
 * exponential backoff for transient failures (network, 429, 5xx) and
 * returns an empty list once retries are exhausted.
 */

import axios from 'axios';
import type { MatchCandidate } from '../../shared/types';
import { APIError } from './errors';
import type { CatalogSearch } from './catalogMatcher';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

interface SaavnArtist {
  id?: string;
  name?: string;
  role?: string;
}

interface SaavnLink {
  quality?: string;
  url?: string;
}

/** Song entry from the search endpoint (fields are optional; the API is inconsistent) */
export interface SaavnSong {
  id?: string;
  name?: string;
  year?: string | number | null;
  duration?: number | string | null;
  label?: string | null;
  language?: string | null;
  url?: string | null;
  copyright?: string | null;
  album?: { id?: string; name?: string | null } | null;
  artists?: {
    primary?: SaavnArtist[];
    featured?: SaavnArtist[];
    all?: SaavnArtist[];
  } | null;
  primaryArtists?: string | null;
  image?: SaavnLink[] | null;
  downloadUrl?: SaavnLink[] | null;
}

/** Search endpoint response */
export interface SaavnSearchResponse {
  success?: boolean;
  data?: {
    total?: number;
    results?: SaavnSong[];
  } | null;
}

export interface SaavnCatalogOptions {
  /** API base URL, e.g. https://saavn.sumit.co */
  apiBaseUrl: string;
  /** Results requested per search */
  limit?: number;
  /** HTTP timeout in ms */
  timeoutMs?: number;
  /** Maximum number of retries for transient failures */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff */
  baseRetryDelay?: number;
  /** Minimum interval between requests in ms */
  minRequestInterval?: number;
  logger?: Logger;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const SERVICE_NAME = 'JioSaavn';
const SEARCH_PATH = '/api/search/songs';
const DEFAULT_LIMIT = 10;
const DEFAULT_TIMEOUT = 15_000;
const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BASE_RETRY_DELAY = 1000;
const DEFAULT_MIN_REQUEST_INTERVAL = 200;

/** Artwork rendition preferred for embedding */
export const PREFERRED_IMAGE_QUALITY = '500x500';

const ALBUM_ARTIST_ROLES = new Set(['music', 'composer']);
const COMPOSER_ROLES = new Set(['lyricist']);

// ─── Rate Limiter ────────────────────────────────────────────────────────────

/**
 * FIFO rate limiter: concurrent callers are released one at a time, at
 * least `intervalMs` apart.
 */
export class FifoRateLimiter {
  private lastRequestTime = 0;
  private readonly intervalMs: number;
  private readonly waitQueue: Array<() => void> = [];
  private isDraining = false;

  constructor(intervalMs: number = DEFAULT_MIN_REQUEST_INTERVAL) {
    this.intervalMs = intervalMs;
  }

  waitForSlot(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.waitQueue.push(resolve);
      if (!this.isDraining) {
        void this.drain();
      }
    });
  }

  private async drain(): Promise<void> {
    this.isDraining = true;
    while (this.waitQueue.length > 0) {
      const remaining = this.intervalMs - (Date.now() - this.lastRequestTime);
      if (remaining > 0) {
        await new Promise<void>((r) => setTimeout(r, remaining));
      }
      this.lastRequestTime = Date.now();
      const next = this.waitQueue.shift();
      if (next) next();
    }
    this.isDraining = false;
  }
}

// ─── Axios Error Detection ──────────────────────────────────────────────────

interface AxiosLikeError extends Error {
  isAxiosError: boolean;
  response?: {
    status: number;
    data?: unknown;
  };
}

function isAxiosLikeError(error: unknown): error is AxiosLikeError {
  return error instanceof Error && 'isAxiosError' in error && error.isAxiosError === true;
}

// ─── Response Mapping ───────────────────────────────────────────────────────

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  quot: '"',
  apos: "'",
  lt: '<',
  gt: '>',
  nbsp: ' ',
};

/**
 * Decodes the HTML entities the API leaves in names ("&quot;", "&amp;", "&#039;").
 */
export function decodeHtmlEntities(value: string): string {
  return value.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (entity: string, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? entity;
  });
}

function text(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') return undefined;
  const decoded = decodeHtmlEntities(value).trim();
  return decoded.length > 0 ? decoded : undefined;
}

function joinNames(artists: SaavnArtist[]): string {
  const names: string[] = [];
  for (const artist of artists) {
    const name = text(artist.name);
    if (name && !names.includes(name)) {
      names.push(name);
    }
  }
  return names.join(', ');
}

function toNumber(value: string | number | null | undefined): number | undefined {
  if (value === null || value === undefined || value === '') return undefined;
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/** Parses a bitrate label such as "320kbps" */
export function parseKbps(quality: string | undefined): number {
  const match = quality?.match(/(\d+)\s*kbps/i);
  return match ? parseInt(match[1], 10) : 0;
}

/**
 * Picks the 500x500 rendition, falling back to the last (largest) image.
 */
export function selectArtworkUrl(images: SaavnLink[] | null | undefined): string | undefined {
  if (!images || images.length === 0) return undefined;
  const preferred = images.find((img) => img.quality === PREFERRED_IMAGE_QUALITY && img.url);
  return preferred?.url ?? images[images.length - 1].url ?? undefined;
}

/**
 * Picks the highest-bitrate stream.
 */
export function selectBestStream(
  links: SaavnLink[] | null | undefined,
): { url: string; kbps: number } | undefined {
  let best: { url: string; kbps: number } | undefined;
  for (const link of links ?? []) {
    if (!link.url) continue;
    const kbps = parseKbps(link.quality);
    if (!best || kbps > best.kbps) {
      best = { url: link.url, kbps };
    }
  }
  return best;
}

/**
 * The catalog reports the language in lower case ("hindi"); the genre tag
 * carries it capitalized ("Hindi").
 */
export function genreFromLanguage(language: string | null | undefined): string | undefined {
  const value = text(language);
  if (!value) return undefined;
  return value
    .split(/\s+/)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Maps a raw song entry to a MatchCandidate. Entries without an id or name
 * are dropped (null).
 */
export function mapSongToCandidate(song: SaavnSong): MatchCandidate | null {
  const catalogId = song.id;
  const title = text(song.name);
  if (!catalogId || !title) return null;

  const primary = song.artists?.primary ?? [];
  const all = song.artists?.all ?? [];
  const artist = joinNames(primary) || text(song.primaryArtists) || '';

  const year = toNumber(song.year);
  const durationSeconds = toNumber(song.duration);
  const stream = selectBestStream(song.downloadUrl);

  const albumArtist = joinNames(all.filter((a) => a.role && ALBUM_ARTIST_ROLES.has(a.role)));
  const composer = joinNames(all.filter((a) => a.role && COMPOSER_ROLES.has(a.role)));

  return {
    catalogId,
    title,
    artist,
    album: text(song.album?.name) ?? '',
    year: year !== undefined && year > 0 ? Math.trunc(year) : undefined,
    durationSeconds: durationSeconds !== undefined && durationSeconds > 0 ? durationSeconds : undefined,
    artworkUrl: selectArtworkUrl(song.image),
    qualityScore: stream?.kbps ?? 0,
    albumArtist: albumArtist || artist || undefined,
    composer: composer || undefined,
    label: text(song.label),
    genre: genreFromLanguage(song.language),
    copyright: text(song.copyright),
    permalink: text(song.url),
    streamUrl: stream?.url,
  };
}

export function mapSearchResponse(response: SaavnSearchResponse): MatchCandidate[] {
  if (response.success === false) return [];
  const results = response.data?.results ?? [];
  const candidates: MatchCandidate[] = [];
  for (const song of results) {
    const candidate = mapSongToCandidate(song);
    if (candidate) candidates.push(candidate);
  }
  return candidates;
}

/**
 * Builds the text sent to the search endpoint: the title plus the first hint.
 */
export function buildSearchText(query: string, hints: string[]): string {
  const hint = hints.find((h) => h.trim().length > 0);
  return hint ? `${query} ${hint.trim()}` : query;
}

// ─── Catalog ─────────────────────────────────────────────────────────────────

export class SaavnCatalogSearch implements CatalogSearch {
  private readonly apiBaseUrl: string;
  private readonly limit: number;
  private readonly timeoutMs: number;
  private readonly maxRetries: number;
  private readonly baseRetryDelay: number;
  private readonly rateLimiter: FifoRateLimiter;
  private readonly logger: Logger | undefined;

  constructor(options: SaavnCatalogOptions) {
    this.apiBaseUrl = options.apiBaseUrl.replace(/\/+$/, '');
    this.limit = options.limit ?? DEFAULT_LIMIT;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.baseRetryDelay = options.baseRetryDelay ?? DEFAULT_BASE_RETRY_DELAY;
    this.rateLimiter = new FifoRateLimiter(options.minRequestInterval ?? DEFAULT_MIN_REQUEST_INTERVAL);
    this.logger = options.logger;
  }

  /**
   * Searches the catalog. Terminal failures are logged and yield [].
   */
  async search(query: string, hints: string[]): Promise<MatchCandidate[]> {
    const searchText = buildSearchText(query, hints);
    try {
      const response = await this.querySearch(searchText);
      const candidates = mapSearchResponse(response);
      this.logger?.debug(`Catalog returned ${candidates.length} result(s) for "${searchText}"`, {
        step: 'matching',
      });
      return candidates;
    } catch (error: unknown) {
      if (error instanceof APIError) {
        this.logger?.logPipelineError(error, 'WARN');
        return [];
      }
      throw error;
    }
  }

  /**
   * GETs the search endpoint with retry and exponential backoff.
   *
   * @throws APIError on a non-retryable status or once retries are exhausted
   */
  async querySearch(searchText: string): Promise<SaavnSearchResponse> {
    let lastError: Error | null = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (attempt > 0) {
        const delay = this.baseRetryDelay * Math.pow(2, attempt - 1);
        await new Promise<void>((resolve) => setTimeout(resolve, delay));
      }

      await this.rateLimiter.waitForSlot();

      try {
        const response = await axios.get<SaavnSearchResponse>(`${this.apiBaseUrl}${SEARCH_PATH}`, {
          params: { query: searchText, limit: this.limit },
          headers: { Accept: 'application/json' },
          timeout: this.timeoutMs,
        });
        return response.data ?? {};
      } catch (error: unknown) {
        if (isAxiosLikeError(error)) {
          const status = error.response?.status;

          if (status && status >= 400 && status < 500 && status !== 429) {
            throw new APIError(`${SERVICE_NAME} search failed (${status}) for "${searchText}"`, {
              statusCode: status,
              service: SERVICE_NAME,
              step: 'matching',
              cause: error,
            });
          }

          lastError = error;
        } else if (error instanceof Error) {
          lastError = error;
        } else {
          lastError = new Error(String(error));
        }
      }
    }

    throw new APIError(
      `${SERVICE_NAME} search failed after ${this.maxRetries + 1} attempts for "${searchText}"`,
      {
        service: SERVICE_NAME,
        step: 'matching',
        cause: lastError ?? undefined,
      },
    );
  }
}
