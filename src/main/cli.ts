/**
 * Command-line parsing and result reporting for the songbridge CLI.
 */

import type { AppSettings, ProgressUpdate, RunSummary, TrackOutcome } from '../shared/types';
import { SUPPORTED_BITRATES } from '../shared/types';
import { validateSettings } from './services/settingsManager';

// ─── Types ────────────────────────────────────────────────────────────────────

export interface CliOptions {
  sourceUrl: string;
  outputDir?: string;
  workers?: number;
  bitrateKbps?: number;
  verbose: boolean;
  configPath?: string;
}

export type CliCommand =
  | { kind: 'run'; options: CliOptions }
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string };

// ─── Exit Codes ───────────────────────────────────────────────────────────────

export const EXIT_OK = 0;
export const EXIT_PARTIAL = 1;
export const EXIT_FAILED = 2;
export const EXIT_INTERRUPTED = 130;
export const EXIT_USAGE = 64;

export const USAGE = [
  'Usage: songbridge <youtube-url> [options]',
  '',
  'Downloads every track of a YouTube playlist or video from the JioSaavn catalog',
  'as tagged MP3 files.',
  '',
  'Options:',
  '  -o, --output <dir>     Output directory (default: settings outputFolder)',
  '  -w, --workers <n>      Parallel workers, 1-10 (default: settings concurrency)',
  `  -b, --bitrate <kbps>   MP3 bitrate: ${SUPPORTED_BITRATES.join(', ')} (default: 320)`,
  '  -v, --verbose          Log debug output',
  '      --config <file>    Settings file to use instead of the default',
  '  -h, --help             Show this help message',
].join('\n');

// ─── Parsing ──────────────────────────────────────────────────────────────────

function parseInteger(value: string): number | null {
  return /^\d+$/.test(value) ? parseInt(value, 10) : null;
}

/**
 * Parses argv (without the node and script entries). Supports "--flag value"
 * and "--flag=value".
 */
export function parseCliArgs(argv: string[]): CliCommand {
  const options: Partial<CliOptions> & { verbose: boolean } = { verbose: false };
  const positionals: string[] = [];

  for (let i = 0; i < argv.length; i++) {
    const raw = argv[i];
    const eq = raw.startsWith('--') ? raw.indexOf('=') : -1;
    const flag = eq > 0 ? raw.slice(0, eq) : raw;
    const inline = eq > 0 ? raw.slice(eq + 1) : undefined;

    const takeValue = (): string | null => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined || next.startsWith('-')) return null;
      i++;
      return next;
    };

    switch (flag) {
      case '-h':
      case '--help':
        return { kind: 'help' };
      case '-v':
      case '--verbose':
        options.verbose = true;
        break;
      case '-o':
      case '--output': {
        const value = takeValue();
        if (!value) return { kind: 'usage-error', message: `${flag} requires a directory` };
        options.outputDir = value;
        break;
      }
      case '-w':
      case '--workers': {
        const value = takeValue();
        const workers = value === null ? null : parseInteger(value);
        if (workers === null || workers < 1 || workers > 10) {
          return { kind: 'usage-error', message: `${flag} must be a number from 1 to 10` };
        }
        options.workers = workers;
        break;
      }
      case '-b':
      case '--bitrate': {
        const value = takeValue();
        const bitrate = value === null ? null : parseInteger(value);
        if (bitrate === null || !SUPPORTED_BITRATES.includes(bitrate)) {
          return {
            kind: 'usage-error',
            message: `${flag} must be one of ${SUPPORTED_BITRATES.join(', ')}`,
          };
        }
        options.bitrateKbps = bitrate;
        break;
      }
      case '--config': {
        const value = takeValue();
        if (!value) return { kind: 'usage-error', message: '--config requires a file path' };
        options.configPath = value;
        break;
      }
      default:
        if (raw.startsWith('-')) {
          return { kind: 'usage-error', message: `Unknown option: ${raw}` };
        }
        positionals.push(raw);
    }
  }

  if (positionals.length === 0) {
    return { kind: 'usage-error', message: 'Missing YouTube URL' };
  }
  if (positionals.length > 1) {
    return { kind: 'usage-error', message: `Unexpected argument: ${positionals[1]}` };
  }

  return { kind: 'run', options: { ...options, sourceUrl: positionals[0] } };
}

/**
 * Applies command-line overrides on top of loaded settings.
 */
export function applyCliOverrides(settings: AppSettings, options: CliOptions): AppSettings {
  const overrides: Partial<AppSettings> = {};
  if (options.outputDir !== undefined) overrides.outputFolder = options.outputDir;
  if (options.workers !== undefined) overrides.concurrency = options.workers;
  if (options.bitrateKbps !== undefined) overrides.bitrateKbps = options.bitrateKbps;
  if (options.verbose) overrides.logLevel = 'DEBUG';
  if (process.env.FFMPEG_PATH) overrides.ffmpegPath = process.env.FFMPEG_PATH;

  return validateSettings({ ...settings, ...overrides });
}

// ─── Reporting ────────────────────────────────────────────────────────────────

/**
 * 0 when every item was downloaded or skipped, 2 when none was, 1 otherwise.
 */
export function exitCodeFor(summary: RunSummary): number {
  if (summary.total === 0) return EXIT_OK;
  const succeeded = summary.counts.Downloaded + summary.counts.Skipped;
  if (succeeded === 0) return EXIT_FAILED;
  return succeeded === summary.total ? EXIT_OK : EXIT_PARTIAL;
}

export function describeOutcome(outcome: TrackOutcome): string {
  const position = `#${outcome.sequenceIndex + 1}`;
  switch (outcome.kind) {
    case 'Downloaded':
      return `${position} downloaded: ${outcome.destinationPath}`;
    case 'Skipped':
      return `${position} skipped (${outcome.reason})${outcome.destinationPath ? `: ${outcome.destinationPath}` : ''}`;
    case 'Failed':
      return `${position} failed [${outcome.errorKind}]: ${outcome.message}`;
    case 'Cancelled':
      return `${position} cancelled`;
  }
}

export function formatSummary(summary: RunSummary): string {
  const { counts } = summary;
  return (
    `${summary.total} item(s): ${counts.Downloaded} downloaded, ${counts.Skipped} skipped, ` +
    `${counts.Failed} failed, ${counts.Cancelled} cancelled ` +
    `(${(summary.durationMs / 1000).toFixed(1)}s)`
  );
}

/**
 * One progress line, e.g. `[2/5] completed: Yellow (about 30s left)`.
 */
export function formatProgress(update: ProgressUpdate): string {
  const parts = [`[${update.finishedItems}/${update.totalItems}]`];
  if (update.currentState) parts.push(`${update.currentState.toLowerCase()}:`);
  if (update.currentItem) parts.push(update.currentItem);
  if (update.estimatedTimeRemaining !== null && update.finishedItems < update.totalItems) {
    parts.push(`(about ${update.estimatedTimeRemaining}s left)`);
  }
  return parts.join(' ');
}
