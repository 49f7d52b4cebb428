/**
 * Album Art Fetcher Service
 *
 * Downloads cover art from the catalog's artwork URL. Artwork is
 * best-effort: failures are logged and reported as null.
 */

import axios from 'axios';
import type { Logger } from './logger';

// ─── Types ────────────────────────────────────────────────────────────────────

/** Image data returned from an artwork URL */
export interface AlbumArtResult {
  /** Raw image bytes */
  data: Buffer;
  /** MIME type, e.g. "image/jpeg" or "image/png" */
  mimeType: string;
}

/** Fetches artwork for a candidate; null when none could be retrieved */
export type ArtworkFetcher = (url: string) => Promise<AlbumArtResult | null>;

export interface ArtworkFetchOptions {
  timeoutMs?: number;
  /** Delay before the single retry */
  retryDelayMs?: number;
  logger?: Logger;
  /** Item the artwork belongs to, for log context */
  itemId?: string;
}

// ─── Constants ───────────────────────────────────────────────────────────────

const REQUEST_TIMEOUT_MS = 15_000;
const ART_RETRY_DELAY_MS = 2_000;

// ─── Helpers ─────────────────────────────────────────────────────────────────

/**
 * Detects the image type from its leading bytes. Returns null for anything
 * that is neither JPEG nor PNG.
 */
export function sniffImageMimeType(data: Buffer): string | null {
  if (data.length >= 3 && data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) {
    return 'image/jpeg';
  }
  if (
    data.length >= 8 &&
    data[0] === 0x89 &&
    data[1] === 0x50 &&
    data[2] === 0x4e &&
    data[3] === 0x47
  ) {
    return 'image/png';
  }
  return null;
}

function headerValue(headers: unknown, name: string): string {
  if (headers === null || typeof headers !== 'object') return '';
  const value: unknown = Reflect.get(headers, name);
  return typeof value === 'string' ? value : '';
}

async function downloadImage(url: string, timeoutMs: number): Promise<AlbumArtResult> {
  const response = await axios.get<ArrayBuffer>(url, {
    responseType: 'arraybuffer',
    timeout: timeoutMs,
    maxRedirects: 5,
    validateStatus: (status) => status < 400,
  });

  const data = Buffer.from(response.data);
  if (data.length === 0) {
    throw new Error('Artwork response was empty');
  }

  const contentType = headerValue(response.headers, 'content-type').split(';')[0].trim();
  const mimeType = contentType.startsWith('image/') ? contentType : sniffImageMimeType(data);
  if (!mimeType) {
    throw new Error(`Artwork response is not an image (${contentType || 'no content-type'})`);
  }

  return { data, mimeType };
}

// ─── Main Fetcher ─────────────────────────────────────────────────────────────

/**
 * Fetches artwork from a URL, retrying once after a short delay.
 * Returns null (and logs a warning) when both attempts fail.
 */
export async function fetchArtwork(
  url: string | undefined,
  options: ArtworkFetchOptions = {},
): Promise<AlbumArtResult | null> {
  if (!url) return null;

  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;
  const retryDelayMs = options.retryDelayMs ?? ART_RETRY_DELAY_MS;

  try {
    return await downloadImage(url, timeoutMs);
  } catch (firstError: unknown) {
    options.logger?.debug(`Artwork download failed, retrying: ${describe(firstError)}`, {
      item: options.itemId,
      step: 'artwork',
    });
  }

  await new Promise<void>((r) => setTimeout(r, retryDelayMs));

  try {
    return await downloadImage(url, timeoutMs);
  } catch (error: unknown) {
    options.logger?.warn('Artwork unavailable; tagging without cover', {
      item: options.itemId,
      step: 'artwork',
      cause: describe(error),
    });
    return null;
  }
}

function describe(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
