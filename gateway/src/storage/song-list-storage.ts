import { LruCache } from '@tenantune/cache';
import type { Song } from '@tenantune/audio';

/**
 * Lookup results waiting for the "song or whole playlist" choice, keyed by text channel.
 */
export interface SongListStorage {
  save(channelId: string, songs: readonly Song[]): void;
  get(channelId: string): readonly Song[] | undefined;
  delete(channelId: string): void;
}

export interface SongListStorageOptions {
  /** Channels remembered at once. */
  capacity?: number;
  /** Unanswered choices expire after this long. */
  ttlMs?: number;
}

export class InMemorySongListStorage implements SongListStorage {
  private readonly lists: LruCache<readonly Song[]>;

  constructor(options: SongListStorageOptions = {}) {
    this.lists = new LruCache({
      name: 'song_lists',
      capacity: options.capacity ?? 1000,
      defaultTTL: options.ttlMs ?? 15 * 60 * 1000,
    });
  }

  save(channelId: string, songs: readonly Song[]): void {
    this.lists.set(channelId, [...songs]);
  }

  get(channelId: string): readonly Song[] | undefined {
    return this.lists.peek(channelId);
  }

  delete(channelId: string): void {
    this.lists.delete(channelId);
  }

  dispose(): void {
    this.lists.dispose();
  }
}
