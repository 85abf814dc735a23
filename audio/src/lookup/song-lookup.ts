import { LruCache, SingleFlight, normalizeKey, type CacheMetricsSink } from '@tenantune/cache';
import { logger } from '@tenantune/logger';
import { LookupFailedError, NotFoundError, describeError, isCancellation } from '../errors.js';
import { createSong, type Song } from '../types.js';
import { raceAbort } from '../utils/abort.js';

export interface SongSearchProvider {
  search(query: string, signal?: AbortSignal): Promise<Song[]>;
}

export interface SongLookupOptions {
  provider: SongSearchProvider;
  capacity?: number;
  ttlMs?: number;
  metrics?: CacheMetricsSink;
}

export interface LookupRequest {
  signal?: AbortSignal;
  /** Stamped on every returned song. */
  requestedBy?: string;
}

export const LOOKUP_CACHE_NAME = 'lookup_cache';

/**
 * Turns what a user typed into resolved songs. Results are cached by the
 * normalized query and concurrent identical queries share one search.
 */
export class SongLookup {
  readonly cache: LruCache<Song[]>;
  private readonly provider: SongSearchProvider;
  private readonly searches = new SingleFlight<string, Song[]>();
  private readonly log = logger.child({ component: 'song-lookup' });

  constructor(options: SongLookupOptions) {
    this.provider = options.provider;
    this.cache = new LruCache<Song[]>({
      name: LOOKUP_CACHE_NAME,
      capacity: options.capacity ?? 500,
      defaultTTL: options.ttlMs,
      metrics: options.metrics,
    });
  }

  async lookupSongs(query: string, request: LookupRequest = {}): Promise<Song[]> {
    const key = normalizeKey(query);
    if (!key) throw new NotFoundError(query);

    let songs = this.cache.get(key);
    if (!songs) {
      const search = this.searches.do(key, () => this.search(key, query));
      songs = request.signal ? await raceAbort(search, request.signal) : await search;
    }

    if (songs.length === 0) throw new NotFoundError(query);

    const { requestedBy } = request;
    return requestedBy ? songs.map((song) => createSong({ ...song, requestedBy })) : [...songs];
  }

  dispose(): void {
    this.cache.dispose();
  }

  private async search(key: string, query: string): Promise<Song[]> {
    let songs: Song[];
    try {
      songs = await this.provider.search(query.trim());
    } catch (error) {
      if (error instanceof LookupFailedError || isCancellation(error)) throw error;
      this.log.warn({ error: describeError(error), query }, 'Song search failed');
      throw new LookupFailedError(`Search for "${query}" failed: ${describeError(error).message}`, { cause: error });
    }

    // Empty results are not cached; the next attempt searches again.
    if (songs.length > 0) {
      this.cache.set(key, songs);
    }
    this.log.debug({ query, results: songs.length }, 'Song search completed');
    return songs;
  }
}
