import { logger } from '@tenantune/logger';
import { z } from 'zod';
import { createSong, type PlaylistSnapshot, type PlaylistStore } from '../types.js';

const songSchema = z.object({
  url: z.string().min(1),
  title: z.string(),
  durationSeconds: z.number().nonnegative(),
  thumbnailUrl: z.string().optional(),
  requestedBy: z.string().optional(),
});

const snapshotSchema = z.object({
  voiceChannelId: z.string().nullable(),
  textChannelId: z.string().nullable(),
  songs: z.array(songSchema),
});

function cloneSnapshot(snapshot: PlaylistSnapshot): PlaylistSnapshot {
  return { ...snapshot, songs: [...snapshot.songs] };
}

export class InMemoryPlaylistStore implements PlaylistStore {
  private snapshots = new Map<string, PlaylistSnapshot>();

  async load(tenantId: string): Promise<PlaylistSnapshot | null> {
    const snapshot = this.snapshots.get(tenantId);
    return snapshot ? cloneSnapshot(snapshot) : null;
  }

  async save(tenantId: string, snapshot: PlaylistSnapshot): Promise<void> {
    this.snapshots.set(tenantId, cloneSnapshot(snapshot));
  }

  async delete(tenantId: string): Promise<void> {
    this.snapshots.delete(tenantId);
  }
}

/**
 * The subset of the ioredis client the store talks to.
 */
export interface PlaylistRedisClient {
  get(key: string): Promise<string | null>;
  setex(key: string, seconds: number, value: string): Promise<unknown>;
  del(key: string): Promise<number>;
}

/**
 * Redis implementation of PlaylistStore
 * One JSON document per tenant, refreshed with a TTL on every save so
 * tenants that never come back are forgotten.
 */
export class RedisPlaylistStore implements PlaylistStore {
  private readonly keyPrefix = 'tenantune:playlist:';
  private readonly log = logger.child({ component: 'redis-playlist-store' });

  constructor(
    private readonly redis: PlaylistRedisClient,
    private readonly ttlSeconds = 7 * 24 * 3600, // 1 week
  ) {}

  async load(tenantId: string): Promise<PlaylistSnapshot | null> {
    const data = await this.redis.get(this.getKey(tenantId));
    if (!data) return null;

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      this.log.warn({ tenantId, error: error instanceof Error ? error.message : String(error) }, 'Stored playlist is not valid JSON, ignoring it');
      return null;
    }

    const parsed = snapshotSchema.safeParse(raw);
    if (!parsed.success) {
      this.log.warn({ tenantId, issues: parsed.error.issues.length }, 'Stored playlist has an unexpected shape, ignoring it');
      return null;
    }

    return {
      voiceChannelId: parsed.data.voiceChannelId,
      textChannelId: parsed.data.textChannelId,
      songs: parsed.data.songs.map((song) => createSong(song)),
    };
  }

  async save(tenantId: string, snapshot: PlaylistSnapshot): Promise<void> {
    await this.redis.setex(this.getKey(tenantId), this.ttlSeconds, JSON.stringify(snapshot));
  }

  async delete(tenantId: string): Promise<void> {
    await this.redis.del(this.getKey(tenantId));
  }

  private getKey(tenantId: string): string {
    return `${this.keyPrefix}${tenantId}`;
  }
}
