/**
 * Download Orchestrator
 *
 * Resolves a source URL into items and runs one task per item on a pool of
 * async workers: normalize → match → skip check → claim → fetch.
 * Every item ends with exactly one TrackOutcome; the RunSummary lists them
 * in source order.
 *
 * Cancellation is cooperative. It is checked when a worker takes the next
 * item, once matching settles and again just before fetching. Fetches
 * already under way finish; items that never got an outcome are reported
 * as Cancelled. Temp directories left by an earlier hard exit are removed
 * before any item starts.
 */

import type {
  MatchCandidate,
  NormalizedQuery,
  OutcomeKind,
  ProgressUpdate,
  RunSummary,
  SourceItem,
  TaskState,
  TrackOutcome,
} from '../../shared/types';
import { DEFAULT_SETTINGS, OUTCOME_KINDS } from '../../shared/types';
import { SourceUnavailableError, isPipelineError, wrapError } from './errors';
import type { MetadataSource } from './youtubeSource';
import type { ItemRef } from './trackFetcher';
import { failureKindOf, removeStaleTempDirs } from './trackFetcher';
import { normalize } from './titleNormalizer';
import { ClaimRegistry, DownloadLedger } from './downloadLedger';
import { validateConcurrency } from './settingsManager';
import { buildDestinationPath } from '../utils/fileScanner';
import type { Logger } from './logger';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Picks the catalog track for a query */
export interface CandidateMatcher {
  /** @throws NoMatchError when nothing suitable is found */
  match(query: NormalizedQuery, itemId?: string): Promise<MatchCandidate>;
}

/** Fetches a matched track to its destination; failures come back as outcomes */
export interface CandidateFetcher {
  fetch(
    candidate: MatchCandidate,
    destinationDir: string,
    destinationPath: string,
    item: ItemRef,
  ): Promise<TrackOutcome>;
}

export interface OrchestratorDependencies {
  metadataSource: MetadataSource;
  matcher: CandidateMatcher;
  fetcher: CandidateFetcher;
}

export interface OrchestratorOptions {
  /** Default number of workers (1-10) */
  concurrency?: number;
  logger?: Logger;
  /** Called after every task state change */
  onProgress?: (update: ProgressUpdate) => void;
  /** Called once per item when its outcome is known */
  onItemComplete?: (outcome: TrackOutcome) => void;
}

/** Snapshot of a run in progress */
export interface RunState {
  sourceUrl: string;
  totalItems: number;
  finishedItems: number;
  counts: Record<OutcomeKind, number>;
  /** State of every item that has left the queue, by sequence index */
  taskStates: Map<number, TaskState>;
  startTime: number;
  cancelled: boolean;
}

// ─── Cancellation ────────────────────────────────────────────────────────────

/** One-way cancellation signal shared by the workers of a run */
export class CancellationFlag {
  private requested = false;

  request(): void {
    this.requested = true;
  }

  get isRequested(): boolean {
    return this.requested;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────────

export const SKIP_REASON_EXISTS = 'already downloaded';
export const SKIP_REASON_DUPLICATE = 'duplicate in run';

function emptyCounts(): Record<OutcomeKind, number> {
  return { Downloaded: 0, Skipped: 0, Failed: 0, Cancelled: 0 };
}

function terminalStateOf(outcome: TrackOutcome): TaskState {
  switch (outcome.kind) {
    case 'Downloaded':
      return 'Completed';
    case 'Skipped':
      return 'Skipped';
    case 'Failed':
      return 'Failed';
    case 'Cancelled':
      return 'Cancelled';
  }
}

function refOf(item: SourceItem): ItemRef {
  return { sequenceIndex: item.sequenceIndex, sourceId: item.sourceId };
}

/**
 * Builds a RunSummary from outcomes, ordered by sequence index.
 */
export function summarize(total: number, outcomes: TrackOutcome[], durationMs: number): RunSummary {
  const ordered = [...outcomes].sort((a, b) => a.sequenceIndex - b.sequenceIndex);
  const counts = emptyCounts();
  for (const outcome of ordered) {
    counts[outcome.kind]++;
  }
  return { total, counts, outcomes: ordered, durationMs };
}

// ─── Orchestrator ────────────────────────────────────────────────────────────

export class Orchestrator {
  private readonly deps: OrchestratorDependencies;
  private readonly concurrency: number;
  private readonly logger: Logger | null;
  private readonly onProgress: ((update: ProgressUpdate) => void) | null;
  private readonly onItemComplete: ((outcome: TrackOutcome) => void) | null;

  private state: RunState | null = null;
  private cancellation: CancellationFlag | null = null;

  constructor(deps: OrchestratorDependencies, options: OrchestratorOptions = {}) {
    this.deps = deps;
    this.concurrency = validateConcurrency(options.concurrency ?? DEFAULT_SETTINGS.concurrency);
    this.logger = options.logger ?? null;
    this.onProgress = options.onProgress ?? null;
    this.onItemComplete = options.onItemComplete ?? null;
  }

  getConcurrency(): number {
    return this.concurrency;
  }

  /**
   * Returns a copy of the current run state, or null when idle.
   */
  getState(): RunState | null {
    if (!this.state) return null;
    return {
      ...this.state,
      counts: { ...this.state.counts },
      taskStates: new Map(this.state.taskStates),
    };
  }

  isRunning(): boolean {
    return this.state !== null;
  }

  /**
   * Requests cancellation of the current run. Idempotent; a no-op when idle.
   */
  cancel(): void {
    if (this.cancellation && !this.cancellation.isRequested) {
      this.cancellation.request();
      if (this.state) this.state.cancelled = true;
      this.logger?.info('Cancellation requested; in-flight downloads will finish');
    }
  }

  /**
   * Runs a full download for `sourceUrl` into `outputDir`.
   *
   * @throws SourceUnavailableError when the source cannot be resolved
   * @throws Error when a run is already in progress on this instance
   */
  async run(sourceUrl: string, outputDir: string, workerCount?: number): Promise<RunSummary> {
    if (this.state) {
      throw new Error('A run is already in progress');
    }

    const startTime = Date.now();
    const cancellation = new CancellationFlag();
    this.cancellation = cancellation;
    const state: RunState = {
      sourceUrl,
      totalItems: 0,
      finishedItems: 0,
      counts: emptyCounts(),
      taskStates: new Map(),
      startTime,
      cancelled: false,
    };
    this.state = state;

    try {
      this.logger?.info(`Resolving ${sourceUrl}`, { step: 'resolving' });
      const items = await this.resolve(sourceUrl);
      state.totalItems = items.length;

      const removed = await removeStaleTempDirs(outputDir).catch((error: unknown) => {
        this.logger?.warn('Could not remove stale temp directories', {
          step: 'cleanup',
          cause: error instanceof Error ? error.message : String(error),
        });
        return 0;
      });
      if (removed > 0) {
        this.logger?.info(`Removed ${removed} stale temp director${removed === 1 ? 'y' : 'ies'} from ${outputDir}`);
      }

      if (items.length === 0) {
        this.logger?.info('Source contains no items');
        return summarize(0, [], Date.now() - startTime);
      }

      const workers = validateConcurrency(workerCount ?? this.concurrency);
      this.logger?.info(`Processing ${items.length} item(s) with ${workers} worker(s)`);
      this.emitProgress(null, null);

      const ledger = DownloadLedger.snapshot(outputDir);
      const claims = new ClaimRegistry();
      const outcomes = new Map<number, TrackOutcome>();

      let nextIndex = 0;
      const processNext = async (): Promise<void> => {
        while (nextIndex < items.length) {
          if (cancellation.isRequested) {
            break;
          }

          const item = items[nextIndex++];
          const outcome = await this.processItem(item, outputDir, ledger, claims, cancellation);
          this.recordOutcome(item, outcome, outcomes);
        }
      };

      const pool: Promise<void>[] = [];
      for (let i = 0; i < Math.min(workers, items.length); i++) {
        pool.push(processNext());
      }
      await Promise.all(pool);

      for (const item of items) {
        if (!outcomes.has(item.sequenceIndex)) {
          this.recordOutcome(item, { kind: 'Cancelled', ...refOf(item) }, outcomes);
        }
      }

      const summary = summarize(items.length, [...outcomes.values()], Date.now() - startTime);
      this.logger?.info(
        `Run complete: ${OUTCOME_KINDS.map((kind) => `${summary.counts[kind]} ${kind.toLowerCase()}`).join(', ')} in ${(summary.durationMs / 1000).toFixed(1)}s`,
      );
      this.emitProgress(null, null);
      return summary;
    } finally {
      this.state = null;
      this.cancellation = null;
    }
  }

  // ─── Private Helpers ─────────────────────────────────────────────────────

  private async resolve(sourceUrl: string): Promise<SourceItem[]> {
    try {
      return await this.deps.metadataSource.resolveItems(sourceUrl);
    } catch (error: unknown) {
      const unavailable =
        error instanceof SourceUnavailableError
          ? error
          : new SourceUnavailableError(
              `Could not resolve source: ${error instanceof Error ? error.message : String(error)}`,
              sourceUrl,
              { cause: error instanceof Error ? error : undefined },
            );
      this.logger?.logPipelineError(unavailable);
      throw unavailable;
    }
  }

  /**
   * Runs one item to its outcome. Never throws.
   */
  private async processItem(
    item: SourceItem,
    outputDir: string,
    ledger: DownloadLedger,
    claims: ClaimRegistry,
    cancellation: CancellationFlag,
  ): Promise<TrackOutcome> {
    const ref = refOf(item);
    try {
      this.setTaskState(item, 'Normalizing');
      const query = normalize(item.rawTitle, item.uploader, item.durationSeconds);
      this.logger?.debug(`Normalized "${item.rawTitle}" to "${query.searchTitle}"`, {
        item: item.sourceId,
        step: 'normalizing',
      });

      this.setTaskState(item, 'Matching');
      const matched = await this.deps.matcher.match(query, item.sourceId).then(
        (candidate) => ({ candidate, error: null }),
        (error: unknown) => ({ candidate: null, error }),
      );
      if (cancellation.isRequested) {
        return { kind: 'Cancelled', ...ref };
      }
      if (!matched.candidate) {
        throw wrapError(matched.error, 'NoMatch', { itemId: item.sourceId, step: 'matching' });
      }
      const candidate = matched.candidate;

      this.setTaskState(item, 'SkipCheck');
      const destinationPath = buildDestinationPath(outputDir, candidate.title, candidate.artist);

      if (ledger.exists(destinationPath)) {
        this.logger?.logSkippedItem(item.sourceId, SKIP_REASON_EXISTS);
        return { kind: 'Skipped', reason: SKIP_REASON_EXISTS, destinationPath, ...ref };
      }

      if (!claims.tryClaim(destinationPath)) {
        this.logger?.logSkippedItem(item.sourceId, SKIP_REASON_DUPLICATE);
        return { kind: 'Skipped', reason: SKIP_REASON_DUPLICATE, destinationPath, ...ref };
      }

      if (cancellation.isRequested) {
        claims.release(destinationPath);
        return { kind: 'Cancelled', ...ref };
      }

      this.setTaskState(item, 'Fetching');
      const outcome = await this.deps.fetcher.fetch(candidate, outputDir, destinationPath, ref);
      if (outcome.kind === 'Downloaded') {
        ledger.record(outcome.destinationPath);
      }
      return outcome;
    } catch (error: unknown) {
      if (isPipelineError(error)) {
        this.logger?.logPipelineError(error);
      } else {
        this.logger?.logError(error, { item: item.sourceId });
      }
      return {
        kind: 'Failed',
        errorKind: failureKindOf(error),
        message: error instanceof Error ? error.message : String(error),
        ...ref,
      };
    }
  }

  private recordOutcome(item: SourceItem, outcome: TrackOutcome, outcomes: Map<number, TrackOutcome>): void {
    outcomes.set(item.sequenceIndex, outcome);
    if (this.state) {
      this.state.finishedItems++;
      this.state.counts[outcome.kind]++;
    }
    this.setTaskState(item, terminalStateOf(outcome));
    this.onItemComplete?.(outcome);
  }

  private setTaskState(item: SourceItem, taskState: TaskState): void {
    this.state?.taskStates.set(item.sequenceIndex, taskState);
    this.emitProgress(item.rawTitle || item.sourceId, taskState);
  }

  private createProgressUpdate(currentItem: string | null, currentState: TaskState | null): ProgressUpdate {
    const state = this.state;
    if (!state) {
      return {
        totalItems: 0,
        finishedItems: 0,
        downloadedCount: 0,
        skippedCount: 0,
        failedCount: 0,
        cancelledCount: 0,
        currentItem,
        currentState,
        estimatedTimeRemaining: null,
      };
    }

    let estimatedTimeRemaining: number | null = null;
    if (state.finishedItems > 0) {
      const elapsedMs = Date.now() - state.startTime;
      const avgTimePerItem = elapsedMs / state.finishedItems;
      const remaining = state.totalItems - state.finishedItems;
      estimatedTimeRemaining = Math.round((remaining * avgTimePerItem) / 1000);
    }

    return {
      totalItems: state.totalItems,
      finishedItems: state.finishedItems,
      downloadedCount: state.counts.Downloaded,
      skippedCount: state.counts.Skipped,
      failedCount: state.counts.Failed,
      cancelledCount: state.counts.Cancelled,
      currentItem,
      currentState,
      estimatedTimeRemaining,
    };
  }

  private emitProgress(currentItem: string | null, currentState: TaskState | null): void {
    this.onProgress?.(this.createProgressUpdate(currentItem, currentState));
  }
}
