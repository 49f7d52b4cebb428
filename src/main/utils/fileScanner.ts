/**
 * File Scanner Utility
 *
 * Lists an output directory and builds safe destination file names.
 */

import * as fs from 'fs';
import * as path from 'path';

/** Extension of every file the engine writes */
export const OUTPUT_EXTENSION = '.mp3';

/** Maximum length of a destination base name (without extension) */
export const MAX_BASENAME_LENGTH = 200;

/**
 * Lists the file names (not paths) directly inside a directory.
 * A missing directory yields an empty list; other read errors propagate.
 */
export function listFileNames(dirPath: string): string[] {
  let entries: fs.Dirent[];
  try {
    entries = fs.readdirSync(dirPath, { withFileTypes: true });
  } catch (error: unknown) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return [];
    }
    throw error;
  }

  return entries
    .filter((entry) => entry.isFile())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Sanitizes a filename by removing characters invalid on Windows and control
 * characters, collapsing whitespace and trimming trailing dots and spaces.
 */
export function sanitizeFilename(filename: string): string {
  return filename
    .replace(/[/\\:*?"<>|]/g, '')
    .replace(/[\u0000-\u001f\u007f]/g, '')
    .replace(/\s+/g, ' ')
    .trim()
    .replace(/[. ]+$/, '');
}

/**
 * Builds "<Title> - <Artist>.mp3" from a matched track.
 * Empty parts become "Unknown"; the base name is capped at 200 characters.
 */
export function buildDestinationName(title: string, artist: string): string {
  const safeTitle = sanitizeFilename(title) || 'Unknown';
  const safeArtist = sanitizeFilename(artist) || 'Unknown';

  let baseName = `${safeTitle} - ${safeArtist}`;
  if (baseName.length > MAX_BASENAME_LENGTH) {
    baseName = baseName.slice(0, MAX_BASENAME_LENGTH).replace(/[. ]+$/, '');
  }

  return `${baseName}${OUTPUT_EXTENSION}`;
}

/**
 * Resolves the destination path of a track inside the output directory.
 */
export function buildDestinationPath(outputDir: string, title: string, artist: string): string {
  return path.join(path.resolve(outputDir), buildDestinationName(title, artist));
}
