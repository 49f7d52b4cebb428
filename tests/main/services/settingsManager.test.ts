/**
 * Tests for Settings Manager Service
 *
 * Covers validation of every setting, serialization, loading from disk
 * (missing, corrupt and partial files) and copies returned by get().
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  SettingsManager,
  deserializeSettings,
  getDefaultSettingsDir,
  validateBitrate,
  validateConcurrency,
  validateMatchPolicy,
  validateSettings,
} from '../../../src/main/services/settingsManager';
import { DEFAULT_MATCH_POLICY, DEFAULT_SETTINGS } from '../../../src/shared/types';

// ─── Validation ──────────────────────────────────────────────────────────────

describe('settings validation', () => {
  describe('getDefaultSettingsDir', () => {
    it('should end with the app directory', () => {
      expect(path.basename(getDefaultSettingsDir())).toBe('songbridge');
    });
  });

  describe('validateConcurrency', () => {
    it('should clamp to 1-10 and round', () => {
      expect(validateConcurrency(0)).toBe(1);
      expect(validateConcurrency(-3)).toBe(1);
      expect(validateConcurrency(11)).toBe(10);
      expect(validateConcurrency(4.6)).toBe(5);
    });

    it('should fall back to the default for non-numbers', () => {
      expect(validateConcurrency('4')).toBe(3);
      expect(validateConcurrency(NaN)).toBe(3);
      expect(validateConcurrency(undefined)).toBe(3);
    });
  });

  describe('validateBitrate', () => {
    it('should accept supported bitrates only', () => {
      expect(validateBitrate(192)).toBe(192);
      expect(validateBitrate(200)).toBe(320);
      expect(validateBitrate('128')).toBe(320);
    });
  });

  describe('validateMatchPolicy', () => {
    it('should keep valid fields and default the rest', () => {
      expect(
        validateMatchPolicy({ titleWeight: 0.8, durationWeight: -1, minTitleSimilarity: 2, durationToleranceSeconds: 10 }),
      ).toEqual({
        titleWeight: 0.8,
        durationWeight: 0.15,
        artistWeight: 0.25,
        durationToleranceSeconds: 10,
        minTitleSimilarity: 0.35,
      });
    });

    it('should reject a policy whose weights are all zero', () => {
      expect(validateMatchPolicy({ titleWeight: 0, durationWeight: 0, artistWeight: 0 })).toEqual(
        DEFAULT_MATCH_POLICY,
      );
    });

    it('should return the defaults for non-objects', () => {
      expect(validateMatchPolicy('fast')).toEqual(DEFAULT_MATCH_POLICY);
    });
  });

  describe('validateSettings', () => {
    it('should return defaults for non-objects', () => {
      expect(validateSettings(null)).toEqual(DEFAULT_SETTINGS);
      expect(validateSettings([1, 2])).toEqual(DEFAULT_SETTINGS);
    });

    it('should keep valid values', () => {
      const settings = validateSettings({
        outputFolder: '  /music  ',
        concurrency: 5,
        bitrateKbps: 256,
        catalogApiBaseUrl: 'https://catalog.example.test///',
        searchLimit: 20,
        ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
        requestTimeoutMs: 5000,
        maxRetries: 1,
        logLevel: 'DEBUG',
      });

      expect(settings).toEqual({
        outputFolder: '/music',
        concurrency: 5,
        bitrateKbps: 256,
        catalogApiBaseUrl: 'https://catalog.example.test',
        searchLimit: 20,
        matchPolicy: DEFAULT_MATCH_POLICY,
        ffmpegPath: '/opt/ffmpeg/bin/ffmpeg',
        requestTimeoutMs: 5000,
        maxRetries: 1,
        logLevel: 'DEBUG',
      });
    });

    it('should replace invalid values with defaults', () => {
      const settings = validateSettings({
        outputFolder: '   ',
        catalogApiBaseUrl: 'ftp://catalog.example.test',
        requestTimeoutMs: 0,
        maxRetries: -1,
        logLevel: 'TRACE',
        ffmpegPath: 42,
      });

      expect(settings).toEqual(DEFAULT_SETTINGS);
    });

    it('should clamp the search limit and retries', () => {
      const settings = validateSettings({ searchLimit: 500, maxRetries: 99 });

      expect(settings.searchLimit).toBe(50);
      expect(settings.maxRetries).toBe(10);
    });

    it('should treat an empty ffmpeg path as unset', () => {
      expect(validateSettings({ ffmpegPath: '  ' }).ffmpegPath).toBeNull();
    });

    it('should not share the match policy with the defaults', () => {
      const settings = validateSettings({});
      settings.matchPolicy.titleWeight = 0;

      expect(DEFAULT_SETTINGS.matchPolicy.titleWeight).toBe(0.6);
    });
  });

  describe('deserializeSettings', () => {
    it('should read a settings object written as JSON', () => {
      const json = JSON.stringify(DEFAULT_SETTINGS, null, 2);

      expect(validateSettings(deserializeSettings(json))).toEqual(DEFAULT_SETTINGS);
    });

    it('should return null for invalid JSON or non-objects', () => {
      expect(deserializeSettings('{not json')).toBeNull();
      expect(deserializeSettings('[1,2]')).toBeNull();
      expect(deserializeSettings('"text"')).toBeNull();
    });
  });
});

// ─── SettingsManager ─────────────────────────────────────────────────────────

describe('SettingsManager', () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-test-'));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it('should use defaults when the file is missing', async () => {
    const manager = new SettingsManager({ settingsDir: tmpDir });

    await manager.initialize();

    expect(manager.isInitialized()).toBe(true);
    expect(manager.get()).toEqual(DEFAULT_SETTINGS);
    expect(manager.getLoadWarning()).toBeNull();
  });

  it('should merge a partial file with defaults', async () => {
    fs.writeFileSync(path.join(tmpDir, 'settings.json'), JSON.stringify({ concurrency: 6, outputFolder: 'out' }));
    const manager = new SettingsManager({ settingsDir: tmpDir });

    await manager.initialize();

    expect(manager.get()).toEqual({ ...DEFAULT_SETTINGS, concurrency: 6, outputFolder: 'out' });
  });

  it('should fall back to defaults with a warning for a corrupt file', async () => {
    fs.writeFileSync(path.join(tmpDir, 'settings.json'), '{ "concurrency": ');
    const manager = new SettingsManager({ settingsDir: tmpDir });

    await manager.initialize();

    expect(manager.get()).toEqual(DEFAULT_SETTINGS);
    expect(manager.getLoadWarning()).toBe(
      `Settings file "${path.join(tmpDir, 'settings.json')}" is not a JSON object; using defaults`,
    );
  });

  it('should read a custom file name', async () => {
    fs.writeFileSync(path.join(tmpDir, 'custom.json'), JSON.stringify({ bitrateKbps: 128 }));
    const manager = new SettingsManager({ settingsDir: tmpDir, fileName: 'custom.json' });

    await manager.initialize();

    expect(manager.get().bitrateKbps).toBe(128);
    expect(manager.getFilePath()).toBe(path.join(tmpDir, 'custom.json'));
  });

  it('should return copies from get()', async () => {
    const manager = new SettingsManager({ settingsDir: tmpDir });
    await manager.initialize();

    const settings = manager.get();
    settings.concurrency = 9;
    settings.matchPolicy.artistWeight = 0;

    expect(manager.get().concurrency).toBe(3);
    expect(manager.get().matchPolicy.artistWeight).toBe(0.25);
  });
});
