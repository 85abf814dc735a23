import type { FrameReader } from './pipeline/frame-sequence.js';

export interface Song {
  readonly url: string;
  readonly title: string;
  readonly durationSeconds: number;
  readonly thumbnailUrl?: string;
  readonly requestedBy?: string;
}

export type PlayerState = 'idle' | 'loading' | 'playing' | 'closed';

export interface MediaInfo {
  /** Stable identifier of the audio itself; keys the audio cache. */
  mediaId: string;
  /** Direct media URL, short-lived. */
  streamUrl?: string;
  title?: string;
  durationSeconds?: number;
}

export interface PlaylistSnapshot {
  voiceChannelId: string | null;
  textChannelId: string | null;
  songs: Song[];
}

/**
 * Fetch/transcode collaborator, invoked only on cache misses.
 */
export interface AudioSource {
  inspect(song: Song, signal: AbortSignal): Promise<MediaInfo>;
  /** Yields encoded frames of fixed duration, in playback order. */
  transcode(media: MediaInfo, song: Song, signal: AbortSignal): AsyncIterable<Buffer>;
}

export interface VoiceSession {
  readonly channelId: string;
  /** False once the connection is gone; such a session never recovers. */
  readonly isOpen: boolean;
  sendFrame(frame: Buffer): Promise<void>;
  /** Marks the end of a stream; the next frame starts a new one. */
  idle(): Promise<void>;
  close(): Promise<void>;
}

export interface VoiceTransport {
  open(tenantId: string, channelId: string): Promise<VoiceSession>;
}

export interface PresenceQuery {
  /** Number of members, the bot included, in the voice channel. */
  occupancy(tenantId: string, channelId: string): Promise<number>;
}

/**
 * User-visible messaging collaborator.
 */
export interface PlayerNotifier {
  nowPlaying(textChannelId: string, song: Song): Promise<void>;
  playbackFailed(textChannelId: string, song: Song, error: Error): Promise<void>;
}

export interface PlaylistStore {
  load(tenantId: string): Promise<PlaylistSnapshot | null>;
  save(tenantId: string, snapshot: PlaylistSnapshot): Promise<void>;
  delete(tenantId: string): Promise<void>;
}

export interface TenantLifecycleListener {
  onTenantJoin(tenantId: string): Promise<void>;
  onTenantLeave(tenantId: string): Promise<void>;
}

export interface SourceResolver {
  /** Resolves with a lease-holding reader once the first frame is available. */
  resolve(song: Song, signal: AbortSignal): Promise<FrameReader>;
}

export function createSong(fields: Song): Song {
  return Object.freeze({ ...fields });
}
