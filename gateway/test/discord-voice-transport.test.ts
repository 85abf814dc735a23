import { EventEmitter } from 'node:events';
import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { DiscordGatewayAdapterCreator } from '@discordjs/voice';
import { TransportError, VoiceConnectError } from '@tenantune/audio';
import { DiscordVoiceTransport } from '../src/infrastructure/discord/discord-voice-transport.js';

const voice = vi.hoisted(() => ({
  joinVoiceChannel: vi.fn(),
  entersState: vi.fn(),
}));

vi.mock('@discordjs/voice', () => ({
  VoiceConnectionStatus: {
    Signalling: 'signalling',
    Connecting: 'connecting',
    Ready: 'ready',
    Disconnected: 'disconnected',
    Destroyed: 'destroyed',
  },
  joinVoiceChannel: voice.joinVoiceChannel,
  entersState: voice.entersState,
}));

/** Stand-in for a VoiceConnection: records packets, speaking changes and destroys. */
class FakeConnection extends EventEmitter {
  state = { status: 'ready' };
  packets: string[] = [];
  speaking: boolean[] = [];
  destroyCount = 0;

  playOpusPacket(packet: Buffer): void {
    this.packets.push(packet.toString());
  }

  setSpeaking(enabled: boolean): void {
    this.speaking.push(enabled);
  }

  destroy(): void {
    this.destroyCount++;
    this.state = { status: 'destroyed' };
  }
}

const adapterCreator: DiscordGatewayAdapterCreator = () => ({
  sendPayload: () => true,
  destroy: () => undefined,
});

describe('DiscordVoiceTransport', () => {
  let connection: FakeConnection;

  beforeEach(() => {
    connection = new FakeConnection();
    voice.joinVoiceChannel.mockReset().mockReturnValue(connection);
    voice.entersState.mockReset().mockResolvedValue(connection);
  });

  function transport(): DiscordVoiceTransport {
    return new DiscordVoiceTransport({
      adapterFor: (tenantId) => (tenantId === 'guild-1' ? adapterCreator : undefined),
    });
  }

  it('should join the channel and forward frames once ready', async () => {
    const session = await transport().open('guild-1', 'voice-1');

    expect(voice.joinVoiceChannel).toHaveBeenCalledWith({
      guildId: 'guild-1',
      channelId: 'voice-1',
      adapterCreator,
      selfDeaf: true,
    });
    expect(voice.entersState).toHaveBeenCalledWith(connection, 'ready', 20_000);
    expect(session.channelId).toBe('voice-1');

    await session.sendFrame(Buffer.from('f0'));
    await session.sendFrame(Buffer.from('f1'));
    expect(connection.packets).toEqual(['f0', 'f1']);
  });

  it('should start speaking on the first frame of each stream and stop when it goes idle', async () => {
    const session = await transport().open('guild-1', 'voice-1');

    await session.sendFrame(Buffer.from('f0'));
    await session.sendFrame(Buffer.from('f1'));
    expect(connection.speaking).toEqual([true]);

    await session.idle();
    await session.idle();
    expect(connection.speaking).toEqual([true, false]);

    await session.sendFrame(Buffer.from('f2'));
    expect(connection.speaking).toEqual([true, false, true]);
    expect(connection.packets).toEqual(['f0', 'f1', 'f2']);
  });

  it('should close the connection exactly once', async () => {
    const session = await transport().open('guild-1', 'voice-1');
    await session.sendFrame(Buffer.from('f0'));
    expect(session.isOpen).toBe(true);

    await session.close();
    await session.close();

    expect(session.isOpen).toBe(false);
    expect(connection.speaking).toEqual([true, false]);
    expect(connection.destroyCount).toBe(1);
    await expect(session.sendFrame(Buffer.from('late'))).rejects.toThrow('Voice connection to voice-1 is closed');
  });

  it('should reject frames while the connection is not ready', async () => {
    const session = await transport().open('guild-1', 'voice-1');
    connection.state = { status: 'disconnected' };

    await expect(session.sendFrame(Buffer.from('f0'))).rejects.toBeInstanceOf(TransportError);
    await expect(session.sendFrame(Buffer.from('f0'))).rejects.toThrow('Voice connection to voice-1 is disconnected');
    expect(connection.packets).toEqual([]);
  });

  it('should give up and clean up when the connection never becomes ready', async () => {
    voice.entersState.mockRejectedValue(new Error('The operation was aborted'));

    const opening = transport().open('guild-1', 'voice-1');

    await expect(opening).rejects.toBeInstanceOf(VoiceConnectError);
    await expect(opening).rejects.toThrow('Voice connection not ready after 20000ms');
    expect(connection.destroyCount).toBe(1);
  });

  it('should fail without joining when the guild is unknown', async () => {
    await expect(transport().open('guild-2', 'voice-1')).rejects.toThrow('Guild guild-2 is not available');
    expect(voice.joinVoiceChannel).not.toHaveBeenCalled();
  });

  it('should destroy a connection that does not start reconnecting', async () => {
    const session = await transport().open('guild-1', 'voice-1');
    voice.entersState.mockRejectedValue(new Error('The operation was aborted'));

    connection.state = { status: 'disconnected' };
    connection.emit('disconnected');

    await vi.waitFor(() => expect(connection.destroyCount).toBe(1));
    expect(session.isOpen).toBe(false);
  });
});
