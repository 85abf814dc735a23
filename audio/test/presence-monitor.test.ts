import { describe, it, expect, afterEach, vi } from 'vitest';
import { AudioSourcePipeline } from '../src/pipeline/audio-source-pipeline.js';
import { TenantPlayer } from '../src/player/tenant-player.js';
import { PresenceMonitor } from '../src/presence/presence-monitor.js';
import { FrameStreamer } from '../src/streaming/frame-streamer.js';
import type { PresenceQuery } from '../src/types.js';
import { FakeAudioSource, FakeVoiceTransport, RecordingNotifier, VirtualClock, song } from './fakes.js';

class FakePresence implements PresenceQuery {
  members = new Map<string, number>();
  failing = new Set<string>();
  queries: string[] = [];

  async occupancy(tenantId: string, channelId: string): Promise<number> {
    this.queries.push(tenantId);
    if (this.failing.has(tenantId)) throw new Error('Missing Access');
    return this.members.get(channelId) ?? 0;
  }
}

describe('PresenceMonitor', () => {
  const pipelines: AudioSourcePipeline[] = [];

  afterEach(() => {
    vi.useRealTimers();
    for (const pipeline of pipelines.splice(0)) pipeline.dispose();
  });

  async function playingPlayer(tenantId: string, voiceChannelId: string): Promise<TenantPlayer> {
    const source = new FakeAudioSource().define(song('a').url, { mediaId: 'a', hold: true });
    const pipeline = new AudioSourcePipeline({ source });
    pipelines.push(pipeline);

    const player = new TenantPlayer({
      tenantId,
      resolver: pipeline,
      streamer: new FrameStreamer({ clock: new VirtualClock() }),
      transport: new FakeVoiceTransport(),
      notifier: new RecordingNotifier(),
    });
    await player.addSong('text-1', voiceChannelId, song('a'));
    return player;
  }

  it('should stop players left alone with the bot', async () => {
    const lonely = await playingPlayer('tenant-1', 'voice-1');
    const busy = await playingPlayer('tenant-2', 'voice-2');
    const presence = new FakePresence();
    presence.members.set('voice-1', 1);
    presence.members.set('voice-2', 3);

    const monitor = new PresenceMonitor({ registry: { activePlayers: () => [lonely, busy] }, presence });

    expect(await monitor.tick()).toBe(1);
    expect(lonely.getState()).toBe('closed');
    expect(busy.isClosed).toBe(false);

    await busy.stop();
  });

  it('should keep checking other players when one query fails', async () => {
    const broken = await playingPlayer('tenant-1', 'voice-1');
    const empty = await playingPlayer('tenant-2', 'voice-2');
    const presence = new FakePresence();
    presence.failing.add('tenant-1');

    const monitor = new PresenceMonitor({ registry: { activePlayers: () => [broken, empty] }, presence });

    expect(await monitor.tick()).toBe(1);
    expect(presence.queries).toEqual(['tenant-1', 'tenant-2']);
    expect(broken.isClosed).toBe(false);
    expect(empty.isClosed).toBe(true);

    await broken.stop();
  });

  it('should skip players without a voice session', async () => {
    const idle = new TenantPlayer({
      tenantId: 'tenant-1',
      resolver: new AudioSourcePipeline({ source: new FakeAudioSource() }),
      streamer: new FrameStreamer(),
      transport: new FakeVoiceTransport(),
      notifier: new RecordingNotifier(),
    });
    const presence = new FakePresence();

    const monitor = new PresenceMonitor({ registry: { activePlayers: () => [idle] }, presence });

    expect(await monitor.tick()).toBe(0);
    expect(presence.queries).toEqual([]);
  });

  it('should tick on its interval until the shutdown signal fires', async () => {
    vi.useFakeTimers();
    const shutdown = new AbortController();
    const monitor = new PresenceMonitor({
      registry: { activePlayers: () => [] },
      presence: new FakePresence(),
      intervalMs: 1000,
      signal: shutdown.signal,
    });
    const tick = vi.spyOn(monitor, 'tick');

    monitor.start();
    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(3);

    shutdown.abort();
    expect(monitor.isRunning).toBe(false);
    await vi.advanceTimersByTimeAsync(3000);
    expect(tick).toHaveBeenCalledTimes(3);
  });
});
