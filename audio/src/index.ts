export * from './errors.js';
export * from './types.js';
export { TenantMutex } from './tenant-mutex.js';
export type { MutexTask } from './tenant-mutex.js';
export { raceAbort } from './utils/abort.js';

export { FrameSequence, FrameReader } from './pipeline/frame-sequence.js';
export { AudioSourcePipeline, METADATA_CACHE_NAME, AUDIO_CACHE_NAME } from './pipeline/audio-source-pipeline.js';
export type { AudioSourcePipelineOptions } from './pipeline/audio-source-pipeline.js';

export { FrameStreamer } from './streaming/frame-streamer.js';
export type { FrameStreamerOptions, StreamOutcome } from './streaming/frame-streamer.js';
export { systemClock } from './streaming/clock.js';
export type { Clock } from './streaming/clock.js';

export { TenantPlayer } from './player/tenant-player.js';
export type { TenantPlayerOptions } from './player/tenant-player.js';
export { TenantRegistry } from './registry/tenant-registry.js';
export type { TenantRegistryOptions, PlayerFactory } from './registry/tenant-registry.js';
export { PresenceMonitor } from './presence/presence-monitor.js';
export type { PresenceMonitorOptions } from './presence/presence-monitor.js';

export { SongLookup, LOOKUP_CACHE_NAME } from './lookup/song-lookup.js';
export type { SongSearchProvider, SongLookupOptions, LookupRequest } from './lookup/song-lookup.js';

export { PrometheusMetrics, NoopMetrics } from './services/metrics.js';
export type { MetricsSink, PlaybackFailureReason } from './services/metrics.js';
export { InMemoryPlaylistStore, RedisPlaylistStore } from './services/playlist-store.js';
export type { PlaylistRedisClient } from './services/playlist-store.js';

export { YtDlpAudioSource } from './sources/yt-dlp-source.js';
export type { YtDlpSourceOptions } from './sources/yt-dlp-source.js';
export { YtDlpSearchProvider } from './sources/yt-dlp-search.js';
export { runProcess, ProcessError } from './sources/process.js';
