import { describe, it, expect, afterEach, vi } from 'vitest';
import {
  InvalidPositionError,
  PlayerClosedError,
  TranscodeFailedError,
  TransportError,
  VoiceConnectError,
} from '../src/errors.js';
import { AudioSourcePipeline } from '../src/pipeline/audio-source-pipeline.js';
import { TenantPlayer } from '../src/player/tenant-player.js';
import { NoopMetrics, type MetricsSink } from '../src/services/metrics.js';
import { FrameStreamer } from '../src/streaming/frame-streamer.js';
import type { PlaylistSnapshot, PlaylistStore } from '../src/types.js';
import {
  FakeAudioSource,
  FakeVoiceTransport,
  RecordingNotifier,
  RecordingPlaylistStore,
  VirtualClock,
  deferred,
  song,
} from './fakes.js';

const pipelines: AudioSourcePipeline[] = [];

function setup(store?: PlaylistStore) {
  const source = new FakeAudioSource();
  for (const id of ['a', 'b', 'c']) {
    source.define(song(id).url, { mediaId: id });
  }
  const transport = new FakeVoiceTransport();
  const notifier = new RecordingNotifier();
  const metrics: MetricsSink = new NoopMetrics();
  const pipeline = new AudioSourcePipeline({ source });
  pipelines.push(pipeline);

  const player = new TenantPlayer({
    tenantId: 'tenant-1',
    resolver: pipeline,
    streamer: new FrameStreamer({ clock: new VirtualClock() }),
    transport,
    notifier,
    store,
    metrics,
  });

  return { source, transport, notifier, metrics, player };
}

class SlowPlaylistStore extends RecordingPlaylistStore {
  readonly gate = deferred<void>();

  override async save(tenantId: string, snapshot: PlaylistSnapshot): Promise<void> {
    await this.gate.promise;
    await super.save(tenantId, snapshot);
  }
}

/** Songs that stream three frames and then wait until skipped. */
function holdAll(source: FakeAudioSource): void {
  for (const id of ['a', 'b', 'c']) {
    source.define(song(id).url, { mediaId: id, hold: true });
  }
}

describe('TenantPlayer', () => {
  afterEach(() => {
    for (const pipeline of pipelines.splice(0)) pipeline.dispose();
  });

  it('should play queued songs in order and return to idle', async () => {
    const { player, transport, notifier } = setup();

    await player.addSong('text-1', 'voice-1', song('a'));
    await player.addSong('text-1', 'voice-1', song('b'));
    await player.whenIdle();

    expect(transport.opens).toEqual([{ tenantId: 'tenant-1', channelId: 'voice-1' }]);
    expect(transport.lastSession.frames).toEqual(['a#0', 'a#1', 'a#2', 'b#0', 'b#1', 'b#2']);
    expect(transport.lastSession.idleCount).toBe(2);
    expect(notifier.nowPlayingTitles).toEqual(['Song a', 'Song b']);
    expect(player.getState()).toBe('idle');
    expect(player.getPlayedSong()).toBeNull();
    expect(player.getVoiceChannelId()).toBe('voice-1');
  });

  it('should remove by pending position and skip through the queue', async () => {
    const { player, source } = setup();
    holdAll(source);

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b'), song('c')]);
    await vi.waitFor(() => {
      expect(player.getPlayedSong()?.title).toBe('Song a');
      expect(player.getState()).toBe('playing');
    });

    const removed = await player.removeSong(1);
    expect(removed.title).toBe('Song b');
    expect(player.getPlaylist().map((queued) => queued.title)).toEqual(['Song c']);
    expect(player.getPlayedSong()?.title).toBe('Song a');

    expect((await player.skipSong())?.title).toBe('Song a');
    await vi.waitFor(() => {
      expect(player.getPlayedSong()?.title).toBe('Song c');
      expect(player.getState()).toBe('playing');
    });
    expect(player.getPlaylist()).toEqual([]);

    await player.skipSong();
    await player.whenIdle();
    expect(player.getState()).toBe('idle');
    expect(player.getPlayedSong()).toBeNull();
  });

  it('should treat skip while idle as a no-op', async () => {
    const { player } = setup();

    expect(await player.skipSong()).toBeNull();
    expect(player.getState()).toBe('idle');
  });

  it('should reject positions outside the pending range and leave the queue alone', async () => {
    const { player, source } = setup();
    holdAll(source);

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await vi.waitFor(() => expect(player.getState()).toBe('playing'));

    await expect(player.removeSong(0)).rejects.toBeInstanceOf(InvalidPositionError);
    await expect(player.removeSong(2)).rejects.toThrow('Position 2 is outside 1..1');
    await expect(player.removeSong(1.5)).rejects.toBeInstanceOf(InvalidPositionError);
    expect(player.getPlaylist().map((queued) => queued.title)).toEqual(['Song b']);

    await player.stop();
  });

  it('should stop once, close the session once and refuse further commands', async () => {
    const { player, source, transport } = setup();
    holdAll(source);

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await vi.waitFor(() => expect(player.getState()).toBe('playing'));

    await Promise.all([player.stop(), player.stop()]);
    await player.stop();
    await player.whenIdle();

    expect(transport.lastSession.closeCount).toBe(1);
    expect(player.getState()).toBe('closed');
    expect(player.getPlaylist()).toEqual([]);
    expect(player.getPlayedSong()).toBeNull();
    expect(player.getVoiceChannelId()).toBeNull();

    await expect(player.addSong('text-1', 'voice-1', song('c'))).rejects.toBeInstanceOf(PlayerClosedError);
    await expect(player.skipSong()).rejects.toBeInstanceOf(PlayerClosedError);
    await expect(player.removeSong(1)).rejects.toBeInstanceOf(PlayerClosedError);
  });

  it('should move on to the next song after a transport error', async () => {
    const { player, transport, notifier, metrics } = setup();
    const failed = vi.spyOn(metrics, 'playbackFailed');

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    transport.lastSession.failAt = 1;
    await player.whenIdle();

    expect(transport.lastSession.frames).toEqual(['a#0', 'b#0', 'b#1', 'b#2']);
    expect(notifier.failures).toHaveLength(1);
    expect(notifier.failures[0].title).toBe('Song a');
    expect(notifier.failures[0].error).toBeInstanceOf(TransportError);
    expect(failed).toHaveBeenCalledWith('transport_error');
    expect(player.getState()).toBe('idle');
  });

  it('should skip a song whose transcode fails', async () => {
    const { player, source, transport, notifier, metrics } = setup();
    source.define(song('a').url, { mediaId: 'a', transcodeError: new Error('ffmpeg exited with code 1') });
    const failed = vi.spyOn(metrics, 'playbackFailed');

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await player.whenIdle();

    expect(transport.lastSession.frames).toEqual(['b#0', 'b#1', 'b#2']);
    expect(notifier.failures[0].error).toBeInstanceOf(TranscodeFailedError);
    expect(notifier.nowPlayingTitles).toEqual(['Song b']);
    expect(failed).toHaveBeenCalledWith('transcode_failed');
  });

  it('should skip a song that is still loading and play the next one', async () => {
    const { player, source, transport, notifier } = setup();
    holdAll(source);
    const gate = deferred<void>();
    source.define(song('a').url, { mediaId: 'a', hold: true, gate: gate.promise });

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await vi.waitFor(() => expect(source.transcodes).toEqual(['a']));
    expect(player.getState()).toBe('loading');

    expect((await player.skipSong())?.title).toBe('Song a');
    await vi.waitFor(() => {
      expect(player.getPlayedSong()?.title).toBe('Song b');
      expect(transport.lastSession.frames).toEqual(['b#0', 'b#1', 'b#2']);
    });
    expect(notifier.nowPlayingTitles).toEqual(['Song b']);
    expect(notifier.failures).toEqual([]);

    gate.resolve();
    await vi.waitFor(() => expect(source.abortedTranscodes).toEqual(['a']));
    await player.stop();
  });

  it('should stop while a song is loading without reporting a failure', async () => {
    const { player, source, transport, notifier } = setup();
    const gate = deferred<void>();
    source.define(song('a').url, { mediaId: 'a', gate: gate.promise });

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await vi.waitFor(() => expect(source.transcodes).toEqual(['a']));
    expect(player.getState()).toBe('loading');

    await player.stop();
    gate.resolve();
    await player.whenIdle();

    expect(player.getState()).toBe('closed');
    expect(transport.lastSession.frames).toEqual([]);
    expect(transport.lastSession.closeCount).toBe(1);
    expect(notifier.nowPlayingTitles).toEqual([]);
    expect(notifier.failures).toEqual([]);
  });

  it('should transcode a skipped song again when it is queued twice', async () => {
    const { player, source, transport, notifier } = setup();
    holdAll(source);

    await player.addSongs('text-1', 'voice-1', [song('a'), song('a')]);
    await vi.waitFor(() => expect(transport.lastSession.frames).toHaveLength(3));

    await player.skipSong();
    await vi.waitFor(() => {
      expect(transport.lastSession.frames).toEqual(['a#0', 'a#1', 'a#2', 'a#0', 'a#1', 'a#2']);
    });
    expect(source.transcodes).toEqual(['a', 'a']);
    expect(notifier.nowPlayingTitles).toEqual(['Song a', 'Song a']);
    expect(notifier.failures).toEqual([]);

    await player.stop();
  });

  it('should rejoin the voice channel after the connection is lost', async () => {
    const { player, transport, notifier } = setup();
    transport.dropNext = 1;

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await player.whenIdle();

    expect(transport.opens).toHaveLength(2);
    expect(transport.sessions[0].frames).toEqual(['a#0']);
    expect(transport.sessions[0].closeCount).toBe(1);
    expect(transport.sessions[1].frames).toEqual(['b#0', 'b#1', 'b#2']);
    expect(notifier.failures.map((failure) => failure.title)).toEqual(['Song a']);
    expect(notifier.failures[0].error).toBeInstanceOf(TransportError);

    await player.addSong('text-1', 'voice-1', song('c'));
    await player.whenIdle();
    expect(transport.opens).toHaveLength(2);
    expect(transport.sessions[1].frames).toEqual(['b#0', 'b#1', 'b#2', 'c#0', 'c#1', 'c#2']);
  });

  it('should keep the queue when the voice channel cannot be rejoined', async () => {
    const { player, transport, notifier } = setup();
    transport.dropNext = 1;

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    transport.failNext = new VoiceConnectError('Voice connection not ready after 20000ms', 'tenant-1');
    await player.whenIdle();

    expect(player.getState()).toBe('idle');
    expect(player.getPlaylist().map((queued) => queued.title)).toEqual(['Song b']);
    expect(notifier.failures.map((failure) => failure.title)).toEqual(['Song a', 'Song b']);
    expect(notifier.failures[1].error).toBeInstanceOf(VoiceConnectError);

    await player.addSong('text-1', 'voice-1', song('c'));
    await player.whenIdle();
    expect(transport.opens).toHaveLength(3);
    expect(transport.lastSession.frames).toEqual(['b#0', 'b#1', 'b#2', 'c#0', 'c#1', 'c#2']);
  });

  it('should let stop finish while the voice channel is still being joined', async () => {
    const { player, transport } = setup();
    const gate = deferred<void>();
    transport.gate = gate.promise;

    const adding = player.addSong('text-1', 'voice-1', song('a'));
    await vi.waitFor(() => expect(transport.opens).toHaveLength(1));
    await player.stop();
    expect(player.getState()).toBe('closed');
    expect(transport.sessions).toEqual([]);

    gate.resolve();
    await expect(adding).rejects.toBeInstanceOf(PlayerClosedError);
    expect(transport.sessions).toHaveLength(1);
    expect(transport.sessions[0].closeCount).toBe(1);
    expect(transport.sessions[0].frames).toEqual([]);
  });

  it('should not enqueue when the voice channel cannot be joined', async () => {
    const { player, transport } = setup();
    transport.failNext = new VoiceConnectError('Voice connection not ready after 20000ms', 'tenant-1');

    await expect(player.addSong('text-1', 'voice-1', song('a'))).rejects.toBeInstanceOf(VoiceConnectError);
    expect(player.getPlaylist()).toEqual([]);
    expect(player.getState()).toBe('idle');

    await player.addSong('text-1', 'voice-1', song('a'));
    await player.whenIdle();
    expect(transport.opens).toHaveLength(2);
    expect(transport.lastSession.frames).toEqual(['a#0', 'a#1', 'a#2']);
  });

  it('should persist the queue and delete it on stop', async () => {
    const store = new RecordingPlaylistStore();
    const { player, source } = setup(store);
    holdAll(source);

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await player.whenPersisted();
    expect(store.saved.get('tenant-1')).toEqual({
      voiceChannelId: 'voice-1',
      textChannelId: 'text-1',
      songs: [song('a'), song('b')],
    });

    await player.stop();
    expect(store.saved.has('tenant-1')).toBe(false);
  });

  it('should keep the snapshot when shut down', async () => {
    const store = new RecordingPlaylistStore();
    const { player, source, transport } = setup(store);
    holdAll(source);

    await player.addSongs('text-1', 'voice-1', [song('a'), song('b')]);
    await vi.waitFor(() => expect(player.getState()).toBe('playing'));
    await player.shutdown();

    expect(player.getState()).toBe('closed');
    expect(transport.lastSession.closeCount).toBe(1);
    expect(store.saved.get('tenant-1')?.songs).toEqual([song('a'), song('b')]);
  });

  it('should not hold the lock while the store is slow', async () => {
    const store = new SlowPlaylistStore();
    const { player, source } = setup(store);
    holdAll(source);

    expect(await player.addSongs('text-1', 'voice-1', [song('a'), song('b')])).toBe(2);
    await vi.waitFor(() => expect(player.getState()).toBe('playing'));
    expect((await player.skipSong())?.title).toBe('Song a');
    await vi.waitFor(() => expect(player.getPlayedSong()?.title).toBe('Song b'));
    expect(store.saved.size).toBe(0);

    store.gate.resolve();
    await player.whenPersisted();
    expect(store.saved.get('tenant-1')?.songs).toEqual([song('b')]);

    await player.stop();
    expect(store.saved.size).toBe(0);
  });

  it('should restore a persisted queue', async () => {
    const store = new RecordingPlaylistStore();
    await store.save('tenant-1', { voiceChannelId: 'voice-9', textChannelId: 'text-9', songs: [song('c')] });
    const { player, transport, notifier } = setup(store);

    expect(await player.restore()).toBe(1);
    await player.whenIdle();

    expect(transport.opens).toEqual([{ tenantId: 'tenant-1', channelId: 'voice-9' }]);
    expect(transport.lastSession.frames).toEqual(['c#0', 'c#1', 'c#2']);
    expect(notifier.nowPlayingTitles).toEqual(['Song c']);
  });

  it('should start empty when the snapshot cannot be loaded', async () => {
    const store = new RecordingPlaylistStore();
    store.failLoad = new Error('connection refused');
    const { player, transport } = setup(store);

    expect(await player.restore()).toBe(0);
    expect(transport.opens).toEqual([]);
  });
});
