import { logger, type Logger } from '@tenantune/logger';
import {
  InvalidPositionError,
  LookupFailedError,
  PlayerClosedError,
  TranscodeFailedError,
  TransportError,
  VoiceConnectError,
  describeError,
  toEngineError,
} from '../errors.js';
import type { FrameReader } from '../pipeline/frame-sequence.js';
import { NoopMetrics, type MetricsSink, type PlaybackFailureReason } from '../services/metrics.js';
import type { FrameStreamer } from '../streaming/frame-streamer.js';
import { TenantMutex } from '../tenant-mutex.js';
import type {
  PlayerNotifier,
  PlayerState,
  PlaylistSnapshot,
  PlaylistStore,
  Song,
  SourceResolver,
  VoiceSession,
  VoiceTransport,
} from '../types.js';

export interface TenantPlayerOptions {
  tenantId: string;
  resolver: SourceResolver;
  streamer: Pick<FrameStreamer, 'stream'>;
  transport: VoiceTransport;
  notifier: PlayerNotifier;
  store?: PlaylistStore;
  metrics?: MetricsSink;
  /** Shared lock; the player serializes its own mutations under its tenant id. */
  mutex?: TenantMutex;
}

interface SongTurn {
  song: Song;
  voiceChannelId: string;
  controller: AbortController;
  textChannelId: string | null;
}

function failureReason(error: unknown): PlaybackFailureReason {
  if (error instanceof LookupFailedError) return 'lookup_failed';
  if (error instanceof TranscodeFailedError) return 'transcode_failed';
  if (error instanceof TransportError) return 'transport_error';
  return 'internal';
}

/**
 * Queue and playback state of one tenant.
 *
 * Every mutation runs under the tenant's lock. Voice joins, the playback loop
 * and snapshot writes run outside it, so skip, stop, list and remove stay
 * responsive while a channel is being joined or a song is loading or
 * streaming. Each song gets its own AbortController; skip and stop abort it.
 */
export class TenantPlayer {
  readonly tenantId: string;

  private queue: Song[] = [];
  private current: Song | null = null;
  private currentController: AbortController | null = null;
  private state: PlayerState = 'idle';
  private session: VoiceSession | null = null;
  private opening: Promise<VoiceSession> | null = null;
  private voiceChannelId: string | null = null;
  private textChannelId: string | null = null;
  private looping = false;
  private loopDone: Promise<void> = Promise.resolve();
  private writes: Promise<void> = Promise.resolve();

  private readonly resolver: SourceResolver;
  private readonly streamer: Pick<FrameStreamer, 'stream'>;
  private readonly transport: VoiceTransport;
  private readonly notifier: PlayerNotifier;
  private readonly store?: PlaylistStore;
  private readonly metrics: MetricsSink;
  private readonly mutex: TenantMutex;
  private readonly log: Logger;

  constructor(options: TenantPlayerOptions) {
    this.tenantId = options.tenantId;
    this.resolver = options.resolver;
    this.streamer = options.streamer;
    this.transport = options.transport;
    this.notifier = options.notifier;
    this.store = options.store;
    this.metrics = options.metrics ?? new NoopMetrics();
    this.mutex = options.mutex ?? new TenantMutex();
    this.log = logger.child({ component: 'tenant-player', tenantId: options.tenantId });
  }

  /**
   * Enqueues a song, joining the voice channel first when no session is open.
   * Resolves with the number of pending songs once the song is queued.
   */
  addSong(textChannelId: string, voiceChannelId: string, song: Song): Promise<number> {
    return this.enqueue(textChannelId, voiceChannelId, [song]);
  }

  addSongs(textChannelId: string, voiceChannelId: string, songs: readonly Song[]): Promise<number> {
    return this.enqueue(textChannelId, voiceChannelId, songs);
  }

  skipSong(): Promise<Song | null> {
    return this.mutex.run(this.tenantId, () => {
      this.assertOpen();
      if (!this.current || !this.currentController) return null;

      this.log.info({ title: this.current.title }, 'Skipping song');
      this.currentController.abort();
      return this.current;
    });
  }

  /**
   * Ends playback for good: cancels the current song, drops the queue, closes
   * the voice session and deletes the stored snapshot. Calling it again does
   * nothing.
   */
  stop(): Promise<void> {
    return this.close(true);
  }

  /**
   * Like stop, but keeps the stored snapshot so the queue is restored on the
   * next start.
   */
  shutdown(): Promise<void> {
    return this.close(false);
  }

  removeSong(position: number): Promise<Song> {
    return this.mutex.run(this.tenantId, () => {
      this.assertOpen();
      if (!Number.isInteger(position) || position < 1 || position > this.queue.length) {
        throw new InvalidPositionError(position, this.queue.length, this.tenantId);
      }

      const [removed] = this.queue.splice(position - 1, 1);
      this.persist();
      this.log.info({ position, title: removed.title }, 'Song removed from queue');
      return removed;
    });
  }

  getPlaylist(): Song[] {
    return [...this.queue];
  }

  getPlayedSong(): Song | null {
    return this.current;
  }

  getState(): PlayerState {
    return this.state;
  }

  getVoiceChannelId(): string | null {
    return this.session?.channelId ?? null;
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /**
   * Resolves once the playback loop has drained the queue (or the player
   * closed).
   */
  async whenIdle(): Promise<void> {
    while (this.looping) {
      await this.loopDone;
    }
  }

  /**
   * Resolves once every snapshot write issued so far has finished.
   */
  async whenPersisted(): Promise<void> {
    let pending: Promise<void>;
    do {
      pending = this.writes;
      await pending;
    } while (pending !== this.writes);
  }

  /**
   * Re-enqueues the persisted queue after a restart. Store and voice failures
   * are logged; the player simply starts empty.
   */
  async restore(): Promise<number> {
    if (!this.store) return 0;

    let snapshot: PlaylistSnapshot | null;
    try {
      snapshot = await this.store.load(this.tenantId);
    } catch (error) {
      this.log.warn({ error: describeError(error) }, 'Failed to load playlist snapshot');
      return 0;
    }
    if (!snapshot || snapshot.songs.length === 0 || !snapshot.voiceChannelId) return 0;

    try {
      await this.enqueue(snapshot.textChannelId, snapshot.voiceChannelId, snapshot.songs);
    } catch (error) {
      this.log.warn({ error: describeError(error) }, 'Failed to restore playlist');
      return 0;
    }

    this.log.info({ songs: snapshot.songs.length }, 'Playlist restored');
    return snapshot.songs.length;
  }

  private async close(forget: boolean): Promise<void> {
    const closing = await this.mutex.run(this.tenantId, () => {
      if (this.state === 'closed') return null;

      this.state = 'closed';
      this.currentController?.abort();
      this.queue = [];
      this.voiceChannelId = null;
      const session = this.session;
      this.session = null;
      if (forget) this.forgetSnapshot();
      return { session };
    });
    if (!closing) return;

    if (closing.session) await this.closeSession(closing.session);
    await this.whenPersisted();
    this.log.info({ forget }, 'Player stopped');
  }

  private async enqueue(textChannelId: string | null, voiceChannelId: string, songs: readonly Song[]): Promise<number> {
    const session = await this.ensureSession(voiceChannelId);

    return this.mutex.run(this.tenantId, () => {
      this.assertOpen();

      // Songs from another channel play in the one already joined
      this.voiceChannelId = session.channelId;
      if (textChannelId) this.textChannelId = textChannelId;

      this.queue.push(...songs);
      this.persist();
      this.log.debug({ added: songs.length, pending: this.queue.length }, 'Songs enqueued');

      this.startLoop();
      return this.queue.length;
    });
  }

  /**
   * The open voice session, joining the channel when there is none or the
   * previous one was lost. Concurrent callers share one join.
   */
  private ensureSession(voiceChannelId: string): Promise<VoiceSession> {
    this.assertOpen();
    const { session } = this;
    if (session?.isOpen) return Promise.resolve(session);

    this.opening ??= this.openSession(voiceChannelId, session).finally(() => {
      this.opening = null;
    });
    return this.opening;
  }

  private async openSession(voiceChannelId: string, lost: VoiceSession | null): Promise<VoiceSession> {
    if (lost) {
      this.log.warn({ voiceChannelId: lost.channelId }, 'Voice session lost, rejoining');
      if (this.session === lost) this.session = null;
      await this.closeSession(lost);
    }

    const session = await this.transport.open(this.tenantId, voiceChannelId);
    if (this.state === 'closed') {
      await this.closeSession(session);
      throw new PlayerClosedError(this.tenantId);
    }

    this.session = session;
    this.log.info({ voiceChannelId }, 'Voice session opened');
    return session;
  }

  private async closeSession(session: VoiceSession): Promise<void> {
    try {
      await session.close();
    } catch (error) {
      this.log.warn({ error: describeError(error) }, 'Failed to close voice session');
    }
  }

  // Caller holds the lock.
  private startLoop(): void {
    if (this.looping || this.state === 'closed') return;
    this.looping = true;
    this.loopDone = this.runLoop().catch((error: unknown) => {
      this.log.error({ error: describeError(error) }, 'Playback loop crashed');
    });
  }

  private async runLoop(): Promise<void> {
    for (;;) {
      const turn = await this.mutex.run(this.tenantId, () => this.nextTurn());
      if (!turn) return;
      if (!(await this.play(turn))) return;
    }
  }

  // Caller holds the lock. Clearing `looping` here keeps an add that races
  // with the end of the queue from being stranded.
  private nextTurn(): SongTurn | null {
    const song = this.queue[0];
    if (this.state === 'closed' || !song || !this.voiceChannelId) {
      this.looping = false;
      return null;
    }
    this.queue.shift();

    const controller = new AbortController();
    this.current = song;
    this.currentController = controller;
    this.state = 'loading';
    this.log.debug({ title: song.title, pending: this.queue.length }, 'Loading song');

    return { song, voiceChannelId: this.voiceChannelId, controller, textChannelId: this.textChannelId };
  }

  /**
   * Plays one song. Resolves false when the voice channel could not be
   * rejoined; the rest of the queue then waits for the next add.
   */
  private async play(turn: SongTurn): Promise<boolean> {
    const { song, voiceChannelId, controller, textChannelId } = turn;
    let reader: FrameReader | null = null;
    let keepGoing = true;

    try {
      let session: VoiceSession;
      try {
        session = await this.ensureSession(voiceChannelId);
      } catch (error) {
        if (error instanceof VoiceConnectError) keepGoing = false;
        throw error;
      }

      reader = await this.resolver.resolve(song, controller.signal);

      const started = await this.mutex.run(this.tenantId, () => {
        if (controller.signal.aborted || this.state === 'closed') return false;
        this.state = 'playing';
        return true;
      });
      if (!started) return keepGoing;

      this.metrics.songPlayed(song.durationSeconds);
      if (textChannelId) {
        this.notifier.nowPlaying(textChannelId, song).catch((error: unknown) => {
          this.log.warn({ error: describeError(error) }, 'Failed to announce song');
        });
      }

      const outcome = await this.streamer.stream(reader, session, controller.signal, this.tenantId);
      this.log.info({ title: song.title, outcome }, 'Song finished');
    } catch (error) {
      if (controller.signal.aborted) {
        this.log.debug({ title: song.title }, 'Song cancelled');
      } else {
        this.reportFailure(song, textChannelId, error);
      }
    } finally {
      reader?.close();
      await this.mutex.run(this.tenantId, () => {
        if (this.currentController === controller) {
          this.current = null;
          this.currentController = null;
        }
        if (!keepGoing) this.looping = false;
        if (this.state !== 'closed') {
          // Without a voice channel the song stays queued for the next add
          if (!keepGoing) this.queue.unshift(song);
          this.state = 'idle';
          this.persist();
        }
      });
    }
    return keepGoing;
  }

  private reportFailure(song: Song, textChannelId: string | null, error: unknown): void {
    const engineError = toEngineError(error, this.tenantId);
    this.metrics.playbackFailed(failureReason(engineError));
    this.log.error({ error: describeError(engineError), title: song.title, url: song.url }, 'Playback failed, skipping song');

    if (textChannelId) {
      this.notifier.playbackFailed(textChannelId, song, engineError).catch((notifyError: unknown) => {
        this.log.warn({ error: describeError(notifyError) }, 'Failed to report playback failure');
      });
    }
  }

  private snapshot(): PlaylistSnapshot {
    return {
      voiceChannelId: this.voiceChannelId,
      textChannelId: this.textChannelId,
      songs: this.current ? [this.current, ...this.queue] : [...this.queue],
    };
  }

  // Caller holds the lock. Writes are chained so they land in order without
  // holding the lock while the store is slow.
  private persist(): void {
    const { store } = this;
    if (!store) return;
    const snapshot = this.snapshot();
    this.enqueueWrite(() => store.save(this.tenantId, snapshot), 'Failed to persist playlist snapshot');
  }

  private forgetSnapshot(): void {
    const { store } = this;
    if (!store) return;
    this.enqueueWrite(() => store.delete(this.tenantId), 'Failed to delete playlist snapshot');
  }

  private enqueueWrite(write: () => Promise<void>, failureMessage: string): void {
    this.writes = this.writes.then(async () => {
      try {
        await write();
      } catch (error) {
        this.log.warn({ error: describeError(error) }, failureMessage);
      }
    });
  }

  private assertOpen(): void {
    if (this.state === 'closed') {
      throw new PlayerClosedError(this.tenantId);
    }
  }
}
