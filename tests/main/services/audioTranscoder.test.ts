import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { FfmpegAudioTranscoder } from '../../../src/main/services/audioTranscoder';
import { TranscodeError } from '../../../src/main/services/errors';

// ─── Mocks ───────────────────────────────────────────────────────────────────

type Handler = (...args: unknown[]) => void;

interface FakeCommand {
  noVideo: () => FakeCommand;
  audioCodec: (codec: string) => FakeCommand;
  audioBitrate: (bitrate: number) => FakeCommand;
  format: (format: string) => FakeCommand;
  on: (event: string, handler: Handler) => FakeCommand;
  save: (outputPath: string) => FakeCommand;
}

const fake = vi.hoisted(() => {
  const handlers = new Map<string, Handler>();
  const state: { failWith: Error | null } = { failWith: null };

  const command: FakeCommand = {
    noVideo: vi.fn(() => command),
    audioCodec: vi.fn(() => command),
    audioBitrate: vi.fn(() => command),
    format: vi.fn(() => command),
    on: vi.fn((event: string, handler: Handler) => {
      handlers.set(event, handler);
      return command;
    }),
    save: vi.fn(() => {
      queueMicrotask(() => {
        if (state.failWith) {
          handlers.get('error')?.(state.failWith);
        } else {
          handlers.get('end')?.();
        }
      });
      return command;
    }),
  };

  const ffmpeg = Object.assign(
    vi.fn(() => command),
    { setFfmpegPath: vi.fn() },
  );

  return { command, ffmpeg, state };
});

vi.mock('fluent-ffmpeg', () => ({ default: fake.ffmpeg }));

// ─── Tests ───────────────────────────────────────────────────────────────────

describe('FfmpegAudioTranscoder', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    fake.state.failWith = null;
    vi.stubEnv('FFMPEG_PATH', '');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should convert to MP3 at the requested bitrate', async () => {
    const transcoder = new FfmpegAudioTranscoder();

    await transcoder.transcode('/tmp/in.download', '/tmp/out.part.mp3', 192);

    expect(fake.ffmpeg).toHaveBeenCalledWith('/tmp/in.download');
    expect(fake.command.noVideo).toHaveBeenCalled();
    expect(fake.command.audioCodec).toHaveBeenCalledWith('libmp3lame');
    expect(fake.command.audioBitrate).toHaveBeenCalledWith(192);
    expect(fake.command.format).toHaveBeenCalledWith('mp3');
    expect(fake.command.save).toHaveBeenCalledWith('/tmp/out.part.mp3');
  });

  it('should reject with TranscodeError when ffmpeg fails', async () => {
    fake.state.failWith = new Error('ffmpeg exited with code 1');
    const transcoder = new FfmpegAudioTranscoder();

    const error = await transcoder.transcode('/tmp/in', '/tmp/out.mp3', 320, 'vid-5').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(TranscodeError);
    expect(error).toMatchObject({
      message: 'ffmpeg failed: ffmpeg exited with code 1',
      itemId: 'vid-5',
      step: 'transcoding',
    });
  });

  it('should use a configured ffmpeg binary', () => {
    new FfmpegAudioTranscoder({ ffmpegPath: '/opt/ffmpeg/bin/ffmpeg' });

    expect(fake.ffmpeg.setFfmpegPath).toHaveBeenCalledWith('/opt/ffmpeg/bin/ffmpeg');
  });

  it('should fall back to FFMPEG_PATH', () => {
    vi.stubEnv('FFMPEG_PATH', '/usr/local/bin/ffmpeg');

    new FfmpegAudioTranscoder();

    expect(fake.ffmpeg.setFfmpegPath).toHaveBeenCalledWith('/usr/local/bin/ffmpeg');
  });

  it('should leave the binary alone when none is configured', () => {
    new FfmpegAudioTranscoder({ ffmpegPath: null });

    expect(fake.ffmpeg.setFfmpegPath).not.toHaveBeenCalled();
  });
});
