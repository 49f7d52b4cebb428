/**
 * Audio Reader Service
 *
 * Probes converted files with music-metadata to confirm they decode and to
 * read their duration and bitrate.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as mm from 'music-metadata';

/** Technical properties of a decoded audio file */
export interface AudioProbeResult {
  /** Duration in seconds (0 when unknown) */
  durationSeconds: number;
  /** Average bitrate in kbps (0 when unknown) */
  bitrateKbps: number;
  /** Container/codec reported by the parser, e.g. "MPEG" */
  container: string | null;
  fileSize: number;
}

/** Reads the technical properties of an audio file */
export type AudioProbe = (filePath: string) => Promise<AudioProbeResult>;

/**
 * Parses an audio file and returns its duration and bitrate.
 *
 * @throws Error if the file does not exist or cannot be parsed
 */
export async function probeAudioFile(filePath: string): Promise<AudioProbeResult> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`File not found: ${filePath}`);
  }

  const stats = fs.statSync(filePath);

  let metadata: mm.IAudioMetadata;
  try {
    metadata = await mm.parseFile(filePath, {
      duration: true,
      skipCovers: true,
    });
  } catch (error: unknown) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse audio file "${path.basename(filePath)}": ${message}`);
  }

  const formatInfo = metadata.format;

  return {
    durationSeconds: formatInfo.duration ?? 0,
    bitrateKbps: formatInfo.bitrate ? Math.round(formatInfo.bitrate / 1000) : 0,
    container: formatInfo.container ?? null,
    fileSize: stats.size,
  };
}
