import { LruCache, SingleFlight, normalizeKey, type CacheMetricsSink } from '@tenantune/cache';
import { logger } from '@tenantune/logger';
import {
  CancelledError,
  LookupFailedError,
  TranscodeFailedError,
  describeError,
  isCancellation,
  throwIfAborted,
} from '../errors.js';
import type { AudioSource, MediaInfo, Song, SourceResolver } from '../types.js';
import { raceAbort } from '../utils/abort.js';
import { FrameSequence, type FrameReader } from './frame-sequence.js';

export interface AudioSourcePipelineOptions {
  source: AudioSource;
  metrics?: CacheMetricsSink;
  metadataCache?: { capacity: number; ttlMs?: number };
  audioCache?: { capacityBytes: number };
}

export const METADATA_CACHE_NAME = 'metadata_cache';
export const AUDIO_CACHE_NAME = 'audio_cache';

/**
 * Turns a Song into a stream of encoded frames.
 *
 * Lookup order: metadata cache (normalized URL -> MediaInfo), then the audio
 * cache (mediaId -> completed FrameSequence), then the source collaborator.
 * Concurrent requests for the same key share one metadata lookup and one transcode.
 * Only successful, complete results are cached.
 */
export class AudioSourcePipeline implements SourceResolver {
  readonly metadataCache: LruCache<MediaInfo>;
  readonly audioCache: LruCache<FrameSequence>;

  private readonly source: AudioSource;
  private readonly lookups = new SingleFlight<string, MediaInfo>();
  private readonly producing = new Map<string, FrameSequence>();
  private readonly lifetime = new AbortController();
  private readonly log = logger.child({ component: 'audio-source-pipeline' });

  constructor(options: AudioSourcePipelineOptions) {
    this.source = options.source;
    this.metadataCache = new LruCache<MediaInfo>({
      name: METADATA_CACHE_NAME,
      capacity: options.metadataCache?.capacity ?? 1000,
      defaultTTL: options.metadataCache?.ttlMs,
      metrics: options.metrics,
    });
    this.audioCache = new LruCache<FrameSequence>({
      name: AUDIO_CACHE_NAME,
      capacity: options.audioCache?.capacityBytes ?? 256 * 1024 * 1024,
      sizeOf: (sequence) => sequence.byteLength,
      metrics: options.metrics,
    });
  }

  /**
   * Resolves once the first frame is available. The returned reader holds a
   * lease on the underlying sequence and must be closed by the caller (it
   * closes itself when iterated to the end).
   */
  async resolve(song: Song, signal: AbortSignal): Promise<FrameReader> {
    throwIfAborted(signal);

    const media = await this.lookupMedia(song, signal);
    throwIfAborted(signal);

    const cached = this.audioCache.get(media.mediaId);
    if (cached) {
      this.log.debug({ mediaId: media.mediaId }, 'Audio cache hit');
      return cached.open(signal);
    }

    const sequence = this.producing.get(media.mediaId) ?? this.startProduction(media, song);
    const reader = sequence.open(signal);
    try {
      await reader.ready();
    } catch (error) {
      reader.close();
      throw error;
    }
    return reader;
  }

  isProducing(mediaId: string): boolean {
    return this.producing.has(mediaId);
  }

  dispose(): void {
    this.lifetime.abort();
    this.metadataCache.dispose();
    this.audioCache.dispose();
  }

  private async lookupMedia(song: Song, signal: AbortSignal): Promise<MediaInfo> {
    const key = normalizeKey(song.url);
    const cached = this.metadataCache.get(key);
    if (cached) return cached;

    const lookup = this.lookups.do(key, async () => {
      try {
        const media = await this.source.inspect(song, this.lifetime.signal);
        this.metadataCache.set(key, media);
        return media;
      } catch (error) {
        if (error instanceof LookupFailedError || isCancellation(error)) throw error;
        throw new LookupFailedError(`Failed to look up ${song.url}: ${describeError(error).message}`, { cause: error });
      }
    });

    return raceAbort(lookup, signal);
  }

  private startProduction(media: MediaInfo, song: Song): FrameSequence {
    const controller = new AbortController();
    // Abandoned and oversized sequences leave `producing` at once so the next
    // resolve starts a fresh transcode instead of joining a dying one.
    const sequence: FrameSequence = new FrameSequence(
      media.mediaId,
      () => {
        controller.abort();
        this.forgetProduction(media.mediaId, sequence);
      },
      this.audioCache.capacity,
    );
    this.producing.set(media.mediaId, sequence);

    const stopOnShutdown = () => controller.abort();
    this.lifetime.signal.addEventListener('abort', stopOnShutdown, { once: true });

    this.produce(sequence, media, song, controller.signal)
      .catch((error: unknown) => {
        this.log.error({ error: describeError(error), mediaId: media.mediaId }, 'Frame producer crashed');
        sequence.fail(new TranscodeFailedError('Frame producer crashed', { cause: error }));
      })
      .finally(() => {
        this.forgetProduction(media.mediaId, sequence);
        this.lifetime.signal.removeEventListener('abort', stopOnShutdown);
      });

    return sequence;
  }

  private forgetProduction(mediaId: string, sequence: FrameSequence): void {
    if (this.producing.get(mediaId) === sequence) this.producing.delete(mediaId);
  }

  private async produce(sequence: FrameSequence, media: MediaInfo, song: Song, signal: AbortSignal): Promise<void> {
    const startedAt = Date.now();
    try {
      for await (const frame of this.source.transcode(media, song, signal)) {
        if (signal.aborted) break;
        sequence.push(frame);
        if (!sequence.isReplayable && this.producing.get(media.mediaId) === sequence) {
          this.producing.delete(media.mediaId);
          this.log.info({ mediaId: media.mediaId, bytes: sequence.byteLength }, 'Audio exceeds cache capacity, streaming uncached');
        }
      }
      throwIfAborted(signal);
    } catch (error) {
      if (signal.aborted || isCancellation(error)) {
        this.log.debug({ mediaId: media.mediaId, frames: sequence.length }, 'Transcode abandoned');
        sequence.fail(new CancelledError('Transcode abandoned'));
        return;
      }
      this.log.warn({ error: describeError(error), mediaId: media.mediaId }, 'Transcode failed');
      sequence.fail(error instanceof TranscodeFailedError
        ? error
        : new TranscodeFailedError(`Failed to transcode ${song.url}: ${describeError(error).message}`, { cause: error }));
      return;
    }

    if (sequence.length === 0) {
      sequence.fail(new TranscodeFailedError(`Transcode of ${song.url} produced no audio`));
      return;
    }

    sequence.complete();
    if (!sequence.isReplayable) return;
    this.audioCache.set(media.mediaId, sequence);

    this.log.info({
      mediaId: media.mediaId,
      frames: sequence.length,
      bytes: sequence.byteLength,
      durationMs: Date.now() - startedAt,
    }, 'Audio fetched and cached');
  }
}
