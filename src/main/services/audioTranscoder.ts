/**
 * Audio Transcoder
 *
 * Converts downloaded audio to a constant-bitrate MP3 with ffmpeg.
 */

import ffmpeg from 'fluent-ffmpeg';
import { TranscodeError } from './errors';

/** Converts an audio file to MP3 */
export interface AudioTranscoder {
  /**
   * @throws TranscodeError when conversion fails
   */
  transcode(inputPath: string, outputPath: string, bitrateKbps: number, itemId?: string): Promise<void>;
}

export interface FfmpegTranscoderOptions {
  /** Path to the ffmpeg binary; ffmpeg on PATH when omitted */
  ffmpegPath?: string | null;
}

export class FfmpegAudioTranscoder implements AudioTranscoder {
  constructor(options?: FfmpegTranscoderOptions) {
    const ffmpegPath = options?.ffmpegPath ?? process.env.FFMPEG_PATH;
    if (ffmpegPath) {
      ffmpeg.setFfmpegPath(ffmpegPath);
    }
  }

  transcode(inputPath: string, outputPath: string, bitrateKbps: number, itemId?: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      ffmpeg(inputPath)
        .noVideo()
        .audioCodec('libmp3lame')
        .audioBitrate(bitrateKbps)
        .format('mp3')
        .on('error', (error: Error) => {
          reject(
            new TranscodeError(`ffmpeg failed: ${error.message}`, {
              itemId,
              cause: error,
            }),
          );
        })
        .on('end', () => resolve())
        .save(outputPath);
    });
  }
}
