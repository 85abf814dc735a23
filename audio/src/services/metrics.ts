import { logger } from '@tenantune/logger';
import type { CacheMetricsSink } from '@tenantune/cache';
import { Counter, Gauge, Histogram, Registry } from 'prom-client';

export type PlaybackFailureReason =
  | 'lookup_failed'
  | 'transcode_failed'
  | 'transport_error'
  | 'internal';

/**
 * Counters the playback engine reports into. The core only sees this
 * interface; prom-client stays behind `PrometheusMetrics`.
 */
export interface MetricsSink extends CacheMetricsSink {
  commandUsed(command: string): void;
  playbackFailed(reason: PlaybackFailureReason): void;
  songPlayed(durationSeconds: number): void;
  streamRebased(): void;
  activePlayers(count: number): void;
}

export class NoopMetrics implements MetricsSink {
  commandUsed(): void {}
  cacheHit(): void {}
  cacheMiss(): void {}
  cacheEviction(): void {}
  playbackFailed(): void {}
  songPlayed(): void {}
  streamRebased(): void {}
  activePlayers(): void {}
}

export class PrometheusMetrics implements MetricsSink {
  readonly registry: Registry;

  private readonly metrics: {
    commandUsage: Counter<'command'>;
    cacheHits: Counter<'cache'>;
    cacheMisses: Counter<'cache'>;
    cacheEvictions: Counter<'cache'>;
    playbackFailures: Counter<'reason'>;
    songsPlayed: Counter;
    songDuration: Histogram;
    streamRebases: Counter;
    activePlayers: Gauge;
  };

  constructor(registry?: Registry) {
    this.registry = registry || new Registry();

    this.metrics = {
      commandUsage: new Counter({
        name: 'tenantune_command_usage_total',
        help: 'Slash commands and menu choices handled',
        labelNames: ['command'],
        registers: [this.registry],
      }),

      cacheHits: new Counter({
        name: 'tenantune_cache_hits_total',
        help: 'Cache lookups served from memory',
        labelNames: ['cache'],
        registers: [this.registry],
      }),

      cacheMisses: new Counter({
        name: 'tenantune_cache_misses_total',
        help: 'Cache lookups that fell through to the source',
        labelNames: ['cache'],
        registers: [this.registry],
      }),

      cacheEvictions: new Counter({
        name: 'tenantune_cache_evictions_total',
        help: 'Entries evicted to stay within capacity',
        labelNames: ['cache'],
        registers: [this.registry],
      }),

      playbackFailures: new Counter({
        name: 'tenantune_playback_failures_total',
        help: 'Songs skipped because of an error',
        labelNames: ['reason'],
        registers: [this.registry],
      }),

      songsPlayed: new Counter({
        name: 'tenantune_songs_played_total',
        help: 'Songs that started streaming',
        registers: [this.registry],
      }),

      songDuration: new Histogram({
        name: 'tenantune_song_duration_seconds',
        help: 'Declared duration of songs that started streaming',
        buckets: [60, 180, 300, 600, 1800, 3600], // 1m, 3m, 5m, 10m, 30m, 1h
        registers: [this.registry],
      }),

      streamRebases: new Counter({
        name: 'tenantune_stream_rebases_total',
        help: 'Times the frame schedule was re-based after falling behind',
        registers: [this.registry],
      }),

      activePlayers: new Gauge({
        name: 'tenantune_active_players',
        help: 'Tenant players currently registered',
        registers: [this.registry],
      }),
    };

    logger.debug({ component: 'metrics' }, 'Prometheus metrics registered');
  }

  commandUsed(command: string): void {
    this.metrics.commandUsage.inc({ command });
  }

  cacheHit(cache: string): void {
    this.metrics.cacheHits.inc({ cache });
  }

  cacheMiss(cache: string): void {
    this.metrics.cacheMisses.inc({ cache });
  }

  cacheEviction(cache: string): void {
    this.metrics.cacheEvictions.inc({ cache });
  }

  playbackFailed(reason: PlaybackFailureReason): void {
    this.metrics.playbackFailures.inc({ reason });
  }

  songPlayed(durationSeconds: number): void {
    this.metrics.songsPlayed.inc();
    if (durationSeconds > 0) {
      this.metrics.songDuration.observe(durationSeconds);
    }
  }

  streamRebased(): void {
    this.metrics.streamRebases.inc();
  }

  activePlayers(count: number): void {
    this.metrics.activePlayers.set(count);
  }
}
