import { spawn } from 'node:child_process';
import { logger } from '@tenantune/logger';
import prism from 'prism-media';
import { z } from 'zod';
import { LookupFailedError, TranscodeFailedError, isCancellation } from '../errors.js';
import type { AudioSource, MediaInfo, Song } from '../types.js';
import { ProcessError, StderrTail, runProcess } from './process.js';

export interface YtDlpSourceOptions {
  ytDlpPath?: string;
  ffmpegPath?: string;
  /** Opus bitrate in kbit/s. */
  bitrateK?: number;
}

const infoSchema = z.object({
  id: z.string(),
  extractor_key: z.string().optional(),
  url: z.string().optional(),
  title: z.string().optional(),
  duration: z.number().nullish(),
});

/**
 * Reads metadata with yt-dlp and transcodes with ffmpeg to Ogg/Opus, demuxed into
 * 20 ms Opus packets ready for the voice connection.
 */
export class YtDlpAudioSource implements AudioSource {
  private readonly ytDlpPath: string;
  private readonly ffmpegPath: string;
  private readonly bitrateK: number;
  private readonly log = logger.child({ component: 'yt-dlp-source' });

  constructor(options: YtDlpSourceOptions = {}) {
    this.ytDlpPath = options.ytDlpPath ?? 'yt-dlp';
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.bitrateK = Math.min(512, Math.max(16, options.bitrateK ?? 96));
  }

  async inspect(song: Song, signal: AbortSignal): Promise<MediaInfo> {
    const args = ['--dump-single-json', '--no-playlist', '--no-warnings', '-f', 'bestaudio/best', song.url];

    let stdout: string;
    try {
      ({ stdout } = await runProcess(this.ytDlpPath, args, signal));
    } catch (error) {
      if (isCancellation(error)) throw error;
      const detail = error instanceof ProcessError ? error.stderrTail : String(error);
      throw new LookupFailedError(`yt-dlp could not read ${song.url}: ${detail}`, { cause: error });
    }

    const parsed = infoSchema.safeParse(JSON.parse(stdout));
    if (!parsed.success) {
      throw new LookupFailedError(`yt-dlp returned unexpected metadata for ${song.url}`);
    }

    const info = parsed.data;
    return {
      mediaId: `${(info.extractor_key ?? 'generic').toLowerCase()}:${info.id}`,
      streamUrl: info.url,
      title: info.title,
      durationSeconds: info.duration ?? undefined,
    };
  }

  async *transcode(media: MediaInfo, song: Song, signal: AbortSignal): AsyncIterable<Buffer> {
    const input = media.streamUrl;
    if (!input) {
      throw new TranscodeFailedError(`No stream URL for ${song.url}`);
    }

    const ffmpeg = spawn(this.ffmpegPath, [
      '-loglevel', 'error',
      '-reconnect', '1',
      '-reconnect_streamed', '1',
      '-reconnect_delay_max', '5',
      '-i', input,
      '-vn',
      '-c:a', 'libopus',
      '-b:a', `${this.bitrateK}k`,
      '-frame_duration', '20',
      '-ar', '48000',
      '-ac', '2',
      '-f', 'ogg',
      'pipe:1',
    ], { stdio: ['ignore', 'pipe', 'pipe'], signal });

    const stderr = new StderrTail();
    ffmpeg.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const demuxer = new prism.opus.OggDemuxer();
    ffmpeg.once('error', (error) => demuxer.destroy(error));

    let exitCode: number | null | undefined;
    const exited = new Promise<void>((resolve) => {
      ffmpeg.once('close', (code) => {
        exitCode = code;
        resolve();
      });
    });

    ffmpeg.stdout.pipe(demuxer);
    this.log.debug({ mediaId: media.mediaId, bitrateK: this.bitrateK }, 'ffmpeg started');

    try {
      for await (const packet of demuxer) {
        if (Buffer.isBuffer(packet)) yield packet;
      }

      await exited;
      if (exitCode !== 0) {
        throw new TranscodeFailedError(`ffmpeg exited with code ${exitCode} for ${song.url}: ${stderr.toString()}`);
      }
    } finally {
      if (exitCode === undefined) {
        ffmpeg.kill('SIGKILL');
      }
      demuxer.destroy();
    }
  }
}
