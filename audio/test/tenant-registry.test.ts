import { describe, it, expect, afterEach, vi } from 'vitest';
import { AudioSourcePipeline } from '../src/pipeline/audio-source-pipeline.js';
import { TenantPlayer } from '../src/player/tenant-player.js';
import { TenantRegistry } from '../src/registry/tenant-registry.js';
import { NoopMetrics, type MetricsSink } from '../src/services/metrics.js';
import { FrameStreamer } from '../src/streaming/frame-streamer.js';
import {
  FakeAudioSource,
  FakeVoiceTransport,
  RecordingNotifier,
  RecordingPlaylistStore,
  VirtualClock,
  song,
} from './fakes.js';

function createRegistry(store = new RecordingPlaylistStore()) {
  const source = new FakeAudioSource();
  const pipeline = new AudioSourcePipeline({ source });
  const transport = new FakeVoiceTransport();
  const metrics: MetricsSink = new NoopMetrics();
  const streamer = new FrameStreamer({ clock: new VirtualClock() });

  const registry = new TenantRegistry({
    metrics,
    createPlayer: (tenantId) => new TenantPlayer({
      tenantId,
      resolver: pipeline,
      streamer,
      transport,
      notifier: new RecordingNotifier(),
      store,
      metrics,
    }),
  });

  return { registry, pipeline, source, transport, metrics, store };
}

describe('TenantRegistry', () => {
  const pipelines: AudioSourcePipeline[] = [];

  afterEach(() => {
    for (const pipeline of pipelines.splice(0)) pipeline.dispose();
  });

  function tracked(store?: RecordingPlaylistStore) {
    const created = createRegistry(store);
    pipelines.push(created.pipeline);
    return created;
  }

  it('should hand out one player per tenant', async () => {
    const { registry } = tracked();

    const first = await registry.getOrCreate('tenant-1');
    const again = await registry.getOrCreate('tenant-1');
    const other = await registry.getOrCreate('tenant-2');

    expect(again).toBe(first);
    expect(other).not.toBe(first);
    expect(registry.size).toBe(2);
    expect(registry.get('tenant-3')).toBeUndefined();
  });

  it('should create concurrent first requests only once', async () => {
    const { registry } = tracked();

    const players = await Promise.all([registry.getOrCreate('tenant-1'), registry.getOrCreate('tenant-1')]);

    expect(players[0]).toBe(players[1]);
  });

  it('should replace a stopped player so the tenant can play again', async () => {
    const { registry } = tracked();

    const first = await registry.getOrCreate('tenant-1');
    await first.stop();
    const second = await registry.getOrCreate('tenant-1');

    expect(second).not.toBe(first);
    expect(second.getState()).toBe('idle');
    expect(registry.activePlayers()).toEqual([second]);
  });

  it('should restore the saved queue when a tenant joins', async () => {
    const store = new RecordingPlaylistStore();
    await store.save('tenant-1', { voiceChannelId: 'voice-1', textChannelId: 'text-1', songs: [song('a')] });
    const { registry, transport } = tracked(store);

    await registry.onTenantJoin('tenant-1');
    await registry.get('tenant-1')?.whenIdle();

    expect(transport.opens).toEqual([{ tenantId: 'tenant-1', channelId: 'voice-1' }]);
    expect(transport.lastSession.frames).toHaveLength(3);
  });

  it('should stop and forget the player when a tenant leaves', async () => {
    const { registry, source, transport } = tracked();
    source.define(song('a').url, { mediaId: 'a', hold: true });

    const player = await registry.getOrCreate('tenant-1');
    await player.addSong('text-1', 'voice-1', song('a'));
    await registry.onTenantLeave('tenant-1');

    expect(registry.get('tenant-1')).toBeUndefined();
    expect(player.getState()).toBe('closed');
    expect(transport.lastSession.closeCount).toBe(1);

    await registry.onTenantLeave('tenant-unknown');
  });

  it('should stop every player on shutdown', async () => {
    const { registry, metrics } = tracked();
    const reported = vi.spyOn(metrics, 'activePlayers');

    const players = await Promise.all(['tenant-1', 'tenant-2', 'tenant-3'].map((id) => registry.getOrCreate(id)));
    await registry.shutdown();

    expect(players.map((player) => player.getState())).toEqual(['closed', 'closed', 'closed']);
    expect(registry.size).toBe(0);
    expect(reported.mock.calls.map(([count]) => count)).toEqual([1, 2, 3, 0]);
  });

  it('should keep snapshots on shutdown and delete them when a tenant leaves', async () => {
    const { registry, source, store } = tracked();
    source.define(song('a').url, { mediaId: 'a', hold: true });
    source.define(song('b').url, { mediaId: 'b', hold: true });

    await (await registry.getOrCreate('tenant-1')).addSong('text-1', 'voice-1', song('a'));
    await (await registry.getOrCreate('tenant-2')).addSong('text-2', 'voice-2', song('b'));
    await registry.onTenantLeave('tenant-2');
    await registry.shutdown();

    expect(store.saved.get('tenant-1')?.songs).toEqual([song('a')]);
    expect(store.saved.has('tenant-2')).toBe(false);
  });
});
