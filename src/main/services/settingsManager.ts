/**
 * Settings Manager Service for songbridge
 *
 * Settings are stored at %APPDATA%/songbridge/settings.json (Windows) or
 * ~/.config/songbridge/settings.json (other platforms). Every value read from
 * disk is validated and falls back to its default when invalid.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import {
  AppSettings,
  DEFAULT_SETTINGS,
  DEFAULT_MATCH_POLICY,
  LogLevel,
  MatchPolicy,
  SUPPORTED_BITRATES,
} from '../../shared/types';

// ─── Interfaces ──────────────────────────────────────────────────────────────

/** Options for configuring the SettingsManager */
export interface SettingsManagerOptions {
  /** Custom directory to store settings file. Defaults to platform-specific appdata */
  settingsDir?: string;
  /** Custom filename for the settings file. Defaults to 'settings.json' */
  fileName?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const APP_DIR_NAME = 'songbridge';

const DEFAULT_SETTINGS_FILENAME = 'settings.json';

const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 10;

const MIN_SEARCH_LIMIT = 1;
const MAX_SEARCH_LIMIT = 50;

const LOG_LEVELS: readonly LogLevel[] = ['ERROR', 'WARN', 'INFO', 'DEBUG'];

// ─── Helper Functions ────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

function cloneSettings(settings: AppSettings): AppSettings {
  return { ...settings, matchPolicy: { ...settings.matchPolicy } };
}

/**
 * Returns the default settings directory path based on the platform.
 */
export function getDefaultSettingsDir(): string {
  const appData = process.env.APPDATA || path.join(os.homedir(), '.config');
  return path.join(appData, APP_DIR_NAME);
}

/**
 * Validates a concurrency value and clamps it to the valid range (1-10).
 */
export function validateConcurrency(value: unknown): number {
  if (!isFiniteNumber(value)) {
    return DEFAULT_SETTINGS.concurrency;
  }
  return Math.max(MIN_CONCURRENCY, Math.min(MAX_CONCURRENCY, Math.round(value)));
}

/**
 * Returns the bitrate if it is one the transcoder supports, otherwise the default.
 */
export function validateBitrate(value: unknown): number {
  if (isFiniteNumber(value) && SUPPORTED_BITRATES.includes(value)) {
    return value;
  }
  return DEFAULT_SETTINGS.bitrateKbps;
}

/**
 * Validates a match policy. Weights must be non-negative and not all zero,
 * the tolerance positive and the similarity floor within 0-1. Invalid
 * fields keep their defaults.
 */
export function validateMatchPolicy(value: unknown): MatchPolicy {
  const policy: MatchPolicy = { ...DEFAULT_MATCH_POLICY };
  if (!isRecord(value)) return policy;

  if (isFiniteNumber(value.titleWeight) && value.titleWeight >= 0) {
    policy.titleWeight = value.titleWeight;
  }
  if (isFiniteNumber(value.durationWeight) && value.durationWeight >= 0) {
    policy.durationWeight = value.durationWeight;
  }
  if (isFiniteNumber(value.artistWeight) && value.artistWeight >= 0) {
    policy.artistWeight = value.artistWeight;
  }
  if (isFiniteNumber(value.durationToleranceSeconds) && value.durationToleranceSeconds > 0) {
    policy.durationToleranceSeconds = value.durationToleranceSeconds;
  }
  if (
    isFiniteNumber(value.minTitleSimilarity) &&
    value.minTitleSimilarity >= 0 &&
    value.minTitleSimilarity <= 1
  ) {
    policy.minTitleSimilarity = value.minTitleSimilarity;
  }

  if (policy.titleWeight + policy.durationWeight + policy.artistWeight === 0) {
    return { ...DEFAULT_MATCH_POLICY };
  }
  return policy;
}

/**
 * Validates and sanitizes a partial settings object, merging with defaults.
 */
export function validateSettings(partial: unknown): AppSettings {
  const validated = cloneSettings(DEFAULT_SETTINGS);
  if (!isRecord(partial)) {
    return validated;
  }

  const raw = partial;

  // outputFolder: non-empty string
  if (typeof raw.outputFolder === 'string' && raw.outputFolder.trim().length > 0) {
    validated.outputFolder = raw.outputFolder.trim();
  }

  if (raw.concurrency !== undefined) {
    validated.concurrency = validateConcurrency(raw.concurrency);
  }

  if (raw.bitrateKbps !== undefined) {
    validated.bitrateKbps = validateBitrate(raw.bitrateKbps);
  }

  // catalogApiBaseUrl: http(s) URL, trailing slashes dropped
  if (typeof raw.catalogApiBaseUrl === 'string' && /^https?:\/\/\S+$/i.test(raw.catalogApiBaseUrl.trim())) {
    validated.catalogApiBaseUrl = raw.catalogApiBaseUrl.trim().replace(/\/+$/, '');
  }

  if (isFiniteNumber(raw.searchLimit)) {
    validated.searchLimit = Math.max(
      MIN_SEARCH_LIMIT,
      Math.min(MAX_SEARCH_LIMIT, Math.round(raw.searchLimit)),
    );
  }

  if (raw.matchPolicy !== undefined) {
    validated.matchPolicy = validateMatchPolicy(raw.matchPolicy);
  }

  // ffmpegPath: string | null
  if (raw.ffmpegPath === null) {
    validated.ffmpegPath = null;
  } else if (typeof raw.ffmpegPath === 'string') {
    const trimmed = raw.ffmpegPath.trim();
    validated.ffmpegPath = trimmed.length > 0 ? trimmed : null;
  }

  if (isFiniteNumber(raw.requestTimeoutMs) && raw.requestTimeoutMs > 0) {
    validated.requestTimeoutMs = Math.round(raw.requestTimeoutMs);
  }

  if (isFiniteNumber(raw.maxRetries) && raw.maxRetries >= 0) {
    validated.maxRetries = Math.min(10, Math.round(raw.maxRetries));
  }

  const level = LOG_LEVELS.find((l) => l === raw.logLevel);
  if (level) {
    validated.logLevel = level;
  }

  return validated;
}

/**
 * Deserializes a JSON string to a settings object.
 * Returns null if the JSON is invalid or not an object.
 */
export function deserializeSettings(json: string): Record<string, unknown> | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }
  return isRecord(parsed) ? parsed : null;
}

// ─── SettingsManager Class ───────────────────────────────────────────────────

/**
 * Loads application settings from the settings file.
 *
 * Usage:
 * ```typescript
 * const manager = new SettingsManager();
 * await manager.initialize();
 *
 * const settings = manager.get();
 * ```
 */
export class SettingsManager {
  private settings: AppSettings;
  private readonly settingsDir: string;
  private readonly fileName: string;
  private initialized = false;
  private loadWarning: string | null = null;

  constructor(options?: SettingsManagerOptions) {
    this.settingsDir = options?.settingsDir ?? getDefaultSettingsDir();
    this.fileName = options?.fileName ?? DEFAULT_SETTINGS_FILENAME;
    this.settings = cloneSettings(DEFAULT_SETTINGS);
  }

  /**
   * Loads settings from file. A missing file means defaults; an unreadable
   * or corrupt one also means defaults, with the reason kept in
   * getLoadWarning().
   */
  async initialize(): Promise<void> {
    const filePath = this.getFilePath();
    let content: string | null = null;
    try {
      content = await fs.promises.readFile(filePath, 'utf-8');
    } catch (error: unknown) {
      if (!isMissingFileError(error)) {
        const message = error instanceof Error ? error.message : String(error);
        this.loadWarning = `Could not read settings file "${filePath}": ${message}`;
      }
    }

    if (content !== null) {
      const parsed = deserializeSettings(content);
      if (parsed) {
        this.settings = validateSettings(parsed);
      } else {
        this.loadWarning = `Settings file "${filePath}" is not a JSON object; using defaults`;
      }
    }

    this.initialized = true;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  /** Reason the settings file was ignored during initialize(), if any */
  getLoadWarning(): string | null {
    return this.loadWarning;
  }

  /**
   * Gets the current settings (copy to prevent mutation).
   */
  get(): AppSettings {
    return cloneSettings(this.settings);
  }

  getFilePath(): string {
    return path.join(this.settingsDir, this.fileName);
  }
}

function isMissingFileError(error: unknown): boolean {
  return isRecord(error) && error.code === 'ENOENT';
}
