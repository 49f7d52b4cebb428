/**
 * Catalog Matcher
 *
 * Searches the catalog once per query and picks the candidate that best
 * matches the normalized title, source duration and artist hints.
 * Selection is deterministic: maximum score, then higher quality, then
 * the order the catalog returned.
 */

import type { MatchCandidate, MatchPolicy, NormalizedQuery } from '../../shared/types';
import { DEFAULT_MATCH_POLICY } from '../../shared/types';
import { NoMatchError } from './errors';
import { queryHints } from './titleNormalizer';
import { diceCoefficient, foldText } from '../utils/textSimilarity';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Catalog search backend. Transient failures are retried inside; a terminal failure yields []. */
export interface CatalogSearch {
  search(query: string, hints: string[]): Promise<MatchCandidate[]>;
}

/** Score breakdown for one candidate */
export interface ScoredCandidate {
  candidate: MatchCandidate;
  /** Position in the search result list */
  index: number;
  titleSimilarity: number;
  durationCloseness: number;
  artistMatch: number;
  score: number;
}

export interface CatalogMatcherOptions {
  policy?: MatchPolicy;
  /** Shared cache of search results; a fresh one is created when omitted */
  cache?: SearchCache;
}

// ─── Search Cache ────────────────────────────────────────────────────────────

/**
 * In-memory cache of catalog searches keyed by folded query and hints.
 * Concurrent identical searches share one in-flight promise.
 */
export class SearchCache {
  private cache: Map<string, Promise<MatchCandidate[]>> = new Map();

  static keyOf(query: string, hints: string[]): string {
    return [foldText(query), ...hints.map(foldText)].join('\u0000');
  }

  /**
   * Returns the cached result for the search, or runs `load` and caches it.
   * A rejected load is evicted so a later call can retry.
   */
  getOrLoad(query: string, hints: string[], load: () => Promise<MatchCandidate[]>): Promise<MatchCandidate[]> {
    const key = SearchCache.keyOf(query, hints);
    const cached = this.cache.get(key);
    if (cached) return cached;

    const pending = load().catch((error: unknown) => {
      this.cache.delete(key);
      throw error;
    });
    this.cache.set(key, pending);
    return pending;
  }

  has(query: string, hints: string[]): boolean {
    return this.cache.has(SearchCache.keyOf(query, hints));
  }

  clear(): void {
    this.cache.clear();
  }

  get size(): number {
    return this.cache.size;
  }
}

// ─── Scoring ─────────────────────────────────────────────────────────────────

/**
 * 1 when both durations are equal, falling linearly to 0 at the tolerance.
 * 0 when either duration is unknown.
 */
export function durationCloseness(
  sourceSeconds: number | undefined,
  candidateSeconds: number | undefined,
  toleranceSeconds: number,
): number {
  if (sourceSeconds === undefined || candidateSeconds === undefined) return 0;
  if (toleranceSeconds <= 0) return sourceSeconds === candidateSeconds ? 1 : 0;
  return Math.max(0, 1 - Math.abs(sourceSeconds - candidateSeconds) / toleranceSeconds);
}

/**
 * 1 when a folded hint contains, or is contained in, the folded candidate
 * artist; otherwise the best Dice similarity of the hints. 0 with no hints.
 */
export function artistMatch(hints: string[], candidateArtist: string): number {
  const artist = foldText(candidateArtist);
  let best = 0;

  for (const hint of hints) {
    const folded = foldText(hint);
    if (!folded || !artist) continue;
    if (artist.includes(folded) || folded.includes(artist)) {
      return 1;
    }
    best = Math.max(best, diceCoefficient(folded, artist));
  }

  return best;
}

export function scoreCandidate(
  query: NormalizedQuery,
  candidate: MatchCandidate,
  index: number,
  policy: MatchPolicy = DEFAULT_MATCH_POLICY,
): ScoredCandidate {
  const titleSimilarity = diceCoefficient(query.searchTitle, candidate.title);
  const closeness = durationCloseness(
    query.durationSeconds,
    candidate.durationSeconds,
    policy.durationToleranceSeconds,
  );
  const artist = artistMatch(queryHints(query), candidate.artist);

  return {
    candidate,
    index,
    titleSimilarity,
    durationCloseness: closeness,
    artistMatch: artist,
    score:
      policy.titleWeight * titleSimilarity +
      policy.durationWeight * closeness +
      policy.artistWeight * artist,
  };
}

/**
 * Orders scored candidates best-first: score, then qualityScore, then the
 * original result order.
 */
export function compareScored(a: ScoredCandidate, b: ScoredCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.candidate.qualityScore !== b.candidate.qualityScore) {
    return b.candidate.qualityScore - a.candidate.qualityScore;
  }
  return a.index - b.index;
}

/**
 * Picks the best candidate, or null when none reaches the title similarity floor.
 */
export function selectBestCandidate(
  query: NormalizedQuery,
  candidates: MatchCandidate[],
  policy: MatchPolicy = DEFAULT_MATCH_POLICY,
): ScoredCandidate | null {
  const eligible = candidates
    .map((candidate, index) => scoreCandidate(query, candidate, index, policy))
    .filter((scored) => scored.titleSimilarity >= policy.minTitleSimilarity)
    .sort(compareScored);

  return eligible[0] ?? null;
}

// ─── Matcher ─────────────────────────────────────────────────────────────────

export class CatalogMatcher {
  private readonly search: CatalogSearch;
  private readonly policy: MatchPolicy;
  private readonly cache: SearchCache;

  constructor(search: CatalogSearch, options?: CatalogMatcherOptions) {
    this.search = search;
    this.policy = { ...(options?.policy ?? DEFAULT_MATCH_POLICY) };
    this.cache = options?.cache ?? new SearchCache();
  }

  /**
   * Resolves a query to the best catalog candidate.
   *
   * @throws NoMatchError when the catalog returns nothing usable
   */
  async match(query: NormalizedQuery, itemId?: string): Promise<MatchCandidate> {
    const hints = queryHints(query);
    const candidates = await this.cache.getOrLoad(query.searchTitle, hints, () =>
      this.search.search(query.searchTitle, hints),
    );

    if (candidates.length === 0) {
      throw new NoMatchError(`No catalog results for "${query.searchTitle}"`, { itemId });
    }

    const best = selectBestCandidate(query, candidates, this.policy);
    if (!best) {
      throw new NoMatchError(
        `None of ${candidates.length} catalog results resembles "${query.searchTitle}"`,
        { itemId },
      );
    }

    return best.candidate;
  }

  getPolicy(): MatchPolicy {
    return { ...this.policy };
  }
}
