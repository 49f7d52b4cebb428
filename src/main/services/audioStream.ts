/**
 * Audio Stream Source
 *
 * Downloads a catalog audio stream to a local file.
 */

import * as fs from 'fs';
import { pipeline } from 'stream/promises';
import type { Readable } from 'stream';
import axios from 'axios';
import { StreamUnavailableError } from './errors';

/** Downloads a stream URL to a local path */
export interface AudioStreamSource {
  /**
   * @throws StreamUnavailableError when the stream cannot be fetched
   */
  download(url: string, targetPath: string, itemId?: string): Promise<void>;
}

export interface HttpAudioStreamOptions {
  timeoutMs?: number;
  userAgent?: string;
}

const DEFAULT_TIMEOUT = 15_000;
const DEFAULT_USER_AGENT = 'songbridge/1.0.0';

export class HttpAudioStreamSource implements AudioStreamSource {
  private readonly timeoutMs: number;
  private readonly userAgent: string;

  constructor(options?: HttpAudioStreamOptions) {
    this.timeoutMs = options?.timeoutMs ?? DEFAULT_TIMEOUT;
    this.userAgent = options?.userAgent ?? DEFAULT_USER_AGENT;
  }

  async download(url: string, targetPath: string, itemId?: string): Promise<void> {
    try {
      const response = await axios.get<Readable>(url, {
        responseType: 'stream',
        timeout: this.timeoutMs,
        maxRedirects: 5,
        headers: { 'User-Agent': this.userAgent },
      });

      await pipeline(response.data, fs.createWriteStream(targetPath));
    } catch (error: unknown) {
      const message = error instanceof Error ? error.message : String(error);
      throw new StreamUnavailableError(`Stream download failed: ${message}`, {
        itemId,
        cause: error instanceof Error ? error : undefined,
      });
    }

    const stats = await fs.promises.stat(targetPath);
    if (stats.size === 0) {
      throw new StreamUnavailableError('Stream download produced an empty file', { itemId });
    }
  }
}
