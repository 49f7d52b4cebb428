/**
 * Logger Service for songbridge
 *
 * Structured logging with daily log files, PipelineError integration and an
 * optional console echo for the CLI.
 *
 * Log levels: ERROR (item failures), WARN (skipped items), INFO (progress), DEBUG (verbose)
 *
 * Default log directory: %APPDATA%/songbridge/logs/ (~/.config/songbridge/logs/ elsewhere)
 * Log file format: YYYY-MM-DD.log
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import type { LogLevel } from '../../shared/types';
import type { ErrorCategory, PipelineError } from './errors';
import { isPipelineError } from './errors';

export type { LogLevel };

// ─── Interfaces ──────────────────────────────────────────────────────────

/** A single log entry */
export interface LogEntry {
  /** ISO 8601 timestamp */
  timestamp: string;
  level: LogLevel;
  message: string;
  /** Error category (if applicable) */
  category: ErrorCategory | null;
  /** Source item the entry refers to (if applicable) */
  item: string | null;
  /** Task step that produced the entry (if applicable) */
  step: string | null;
  /** Original error message (from cause chain, if applicable) */
  cause: string | null;
}

/** Context fields accepted by the logging methods */
export interface LogContext {
  category?: ErrorCategory;
  item?: string;
  step?: string;
  cause?: string;
}

/** Options for configuring the Logger */
export interface LoggerOptions {
  /** Directory to store log files. Defaults to the app data log directory */
  logDir?: string;
  /** Minimum log level to record (inclusive). Defaults to 'INFO' */
  minLevel?: LogLevel;
  /** Whether to write to file. Defaults to true */
  writeToFile?: boolean;
  /** Whether to echo entries to stdout/stderr. Defaults to false */
  echoToConsole?: boolean;
  /** Maximum log file size in bytes before rotation. Defaults to 10MB */
  maxFileSize?: number;
  /** Custom function to get the current date (for testing) */
  getCurrentDate?: () => Date;
}

// ─── Constants ───────────────────────────────────────────────────────────

const APP_DIR_NAME = 'songbridge';

const LOG_DIR_NAME = 'logs';

const DEFAULT_MAX_FILE_SIZE = 10 * 1024 * 1024;

const LOG_LEVEL_VALUES: Record<LogLevel, number> = {
  ERROR: 0,
  WARN: 1,
  INFO: 2,
  DEBUG: 3,
};

// ─── Helper Functions ────────────────────────────────────────────────────

/**
 * Returns the default log directory path based on the platform.
 */
export function getDefaultLogDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME, LOG_DIR_NAME);
}

/**
 * Generates a log filename from a Date object (YYYY-MM-DD.log, local time).
 */
export function getLogFileName(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}.log`;
}

/**
 * Formats a LogEntry as a single line.
 * Format: [TIMESTAMP] LEVEL [CATEGORY] message | item: ... | step: ... | cause: ...
 */
export function formatLogEntry(entry: LogEntry): string {
  const parts: string[] = [];

  parts.push(`[${entry.timestamp}]`);
  parts.push(entry.level);

  if (entry.category) {
    parts.push(`[${entry.category}]`);
  }

  parts.push(entry.message);

  if (entry.item) {
    parts.push(`| item: ${entry.item}`);
  }

  if (entry.step) {
    parts.push(`| step: ${entry.step}`);
  }

  if (entry.cause) {
    parts.push(`| cause: ${entry.cause}`);
  }

  return parts.join(' ');
}

/**
 * Checks if the given level meets the minimum level threshold.
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LOG_LEVEL_VALUES[level] <= LOG_LEVEL_VALUES[minLevel];
}

/**
 * Creates a LogEntry from a PipelineError.
 */
export function createLogEntryFromError(
  error: PipelineError,
  level: LogLevel = 'ERROR',
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message: error.message,
    category: error.category,
    item: error.itemId,
    step: error.step,
    cause: error.cause?.message ?? null,
  };
}

/**
 * Creates a LogEntry from a message and optional context.
 */
export function createLogEntry(
  level: LogLevel,
  message: string,
  options?: LogContext,
  getCurrentDate?: () => Date,
): LogEntry {
  const now = getCurrentDate ? getCurrentDate() : new Date();
  return {
    timestamp: now.toISOString(),
    level,
    message,
    category: options?.category ?? null,
    item: options?.item ?? null,
    step: options?.step ?? null,
    cause: options?.cause ?? null,
  };
}

// ─── Logger Class ────────────────────────────────────────────────────────

/**
 * Logger for songbridge.
 *
 * Usage:
 * ```typescript
 * const logger = new Logger({ echoToConsole: true });
 * await logger.initialize();
 * logger.info('Resolving playlist', { step: 'resolving' });
 * logger.logPipelineError(new NoMatchError('no candidates', { itemId: 'dQw4w9WgXcQ' }));
 * ```
 */
export class Logger {
  private readonly logDir: string;
  private readonly minLevel: LogLevel;
  private writeToFile: boolean;
  private readonly echoToConsole: boolean;
  private readonly maxFileSize: number;
  private readonly getCurrentDate: () => Date;

  private initialized = false;

  constructor(options?: LoggerOptions) {
    this.logDir = options?.logDir ?? getDefaultLogDir();
    this.minLevel = options?.minLevel ?? 'INFO';
    this.writeToFile = options?.writeToFile ?? true;
    this.echoToConsole = options?.echoToConsole ?? false;
    this.maxFileSize = options?.maxFileSize ?? DEFAULT_MAX_FILE_SIZE;
    this.getCurrentDate = options?.getCurrentDate ?? ((): Date => new Date());
  }

  /**
   * Ensures the log directory exists. If it cannot be created, file logging
   * is turned off and a warning is kept in memory.
   */
  async initialize(): Promise<void> {
    if (!this.writeToFile) {
      this.initialized = true;
      return;
    }

    try {
      await fs.promises.mkdir(this.logDir, { recursive: true });
      this.initialized = true;
    } catch (error: unknown) {
      this.initialized = true;
      this.writeToFile = false;
      const message = error instanceof Error ? error.message : String(error);
      this.reportFileFailure(`Failed to create log directory "${this.logDir}": ${message}`);
    }
  }

  getLogFilePath(): string {
    const fileName = getLogFileName(this.getCurrentDate());
    return path.join(this.logDir, fileName);
  }

  getLogDir(): string {
    return this.logDir;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Whether entries are currently written to the log file */
  isWritingToFile(): boolean {
    return this.writeToFile;
  }

  // ─── Logging Methods ────────────────────────────────────────────────

  error(message: string, options?: LogContext): void {
    this.log('ERROR', message, options);
  }

  warn(message: string, options?: LogContext): void {
    this.log('WARN', message, options);
  }

  info(message: string, options?: LogContext): void {
    this.log('INFO', message, options);
  }

  debug(message: string, options?: LogContext): void {
    this.log('DEBUG', message, options);
  }

  /**
   * Logs a PipelineError with its category, item, step and cause.
   */
  logPipelineError(error: PipelineError, level: LogLevel = 'ERROR'): void {
    if (!shouldLog(level, this.minLevel)) return;
    this.addEntry(createLogEntryFromError(error, level, this.getCurrentDate));
  }

  /**
   * Logs any error. PipelineErrors keep their context; anything else
   * becomes a plain ERROR entry.
   */
  logError(
    error: unknown,
    context?: {
      item?: string;
      step?: string;
    },
  ): void {
    if (isPipelineError(error)) {
      this.logPipelineError(error);
      return;
    }

    const message = error instanceof Error ? error.message : String(error);
    this.error(message, {
      item: context?.item,
      step: context?.step,
    });
  }

  /**
   * Logs a skipped item (WARN level).
   */
  logSkippedItem(item: string, reason: string): void {
    this.warn(`Item skipped: ${reason}`, {
      item,
      step: 'skip_check',
    });
  }

  // ─── Core Logging ──────────────────────────────────────────────────

  private log(level: LogLevel, message: string, options?: LogContext): void {
    if (!shouldLog(level, this.minLevel)) return;

    this.addEntry(createLogEntry(level, message, options, this.getCurrentDate));
  }

  private addEntry(entry: LogEntry): void {
    if (this.echoToConsole) {
      const line = formatLogEntry(entry);
      if (entry.level === 'ERROR' || entry.level === 'WARN') {
        console.error(line);
      } else {
        console.log(line);
      }
    }
    if (this.writeToFile && this.initialized) {
      this.writeEntryToFile(entry);
    }
  }

  /**
   * Appends an entry to today's log file, rotating it first if it is too large.
   * A write failure turns file logging off for the rest of the session.
   */
  private writeEntryToFile(entry: LogEntry): void {
    try {
      const logFilePath = this.getLogFilePath();
      const formatted = formatLogEntry(entry) + '\n';

      if (fs.existsSync(logFilePath)) {
        const stats = fs.statSync(logFilePath);
        if (stats.size >= this.maxFileSize) {
          this.rotateLogFile(logFilePath);
        }
      }

      const dir = path.dirname(logFilePath);
      if (!fs.existsSync(dir)) {
        fs.mkdirSync(dir, { recursive: true });
      }

      fs.appendFileSync(logFilePath, formatted, 'utf-8');
    } catch (error: unknown) {
      this.writeToFile = false;
      const message = error instanceof Error ? error.message : String(error);
      this.reportFileFailure(`Log file write failed: ${message}`);
    }
  }

  /**
   * Renames a full log file with the next free numeric suffix.
   * e.g., 2024-01-15.log → 2024-01-15.1.log
   */
  private rotateLogFile(logFilePath: string): void {
    const ext = path.extname(logFilePath);
    const base = logFilePath.slice(0, -ext.length);

    let rotationIndex = 1;
    let rotatedPath = `${base}.${rotationIndex}${ext}`;
    while (fs.existsSync(rotatedPath)) {
      rotationIndex++;
      rotatedPath = `${base}.${rotationIndex}${ext}`;
    }

    fs.renameSync(logFilePath, rotatedPath);
  }

  /**
   * File logging is off from here on; the warning always goes to stderr.
   */
  private reportFileFailure(reason: string): void {
    const entry = createLogEntry('WARN', `${reason}. File logging disabled.`, undefined, this.getCurrentDate);
    console.error(formatLogEntry(entry));
  }
}
