import {
  VoiceConnectionStatus,
  entersState,
  joinVoiceChannel,
  type DiscordGatewayAdapterCreator,
  type VoiceConnection,
} from '@discordjs/voice';
import { logger, type Logger } from '@tenantune/logger';
import {
  TransportError,
  VoiceConnectError,
  describeError,
  type VoiceSession,
  type VoiceTransport,
} from '@tenantune/audio';

export interface DiscordVoiceTransportOptions {
  /** The guild's voice adapter; undefined when the guild is not cached. */
  adapterFor: (tenantId: string) => DiscordGatewayAdapterCreator | undefined;
  readyTimeoutMs?: number;
  /** How long a dropped connection may take to start reconnecting. */
  reconnectGraceMs?: number;
}

class DiscordVoiceSession implements VoiceSession {
  private closed = false;
  private speaking = false;

  constructor(
    readonly channelId: string,
    private readonly tenantId: string,
    private readonly connection: VoiceConnection,
  ) {}

  get isOpen(): boolean {
    return !this.closed && this.connection.state.status !== VoiceConnectionStatus.Destroyed;
  }

  async sendFrame(frame: Buffer): Promise<void> {
    const { status } = this.connection.state;
    if (this.closed || status !== VoiceConnectionStatus.Ready) {
      throw new TransportError(
        `Voice connection to ${this.channelId} is ${this.closed ? 'closed' : status}`,
        this.tenantId,
      );
    }
    // Discord drops audio from a client that has not announced it is speaking
    if (!this.speaking) {
      this.connection.setSpeaking(true);
      this.speaking = true;
    }
    this.connection.playOpusPacket(frame);
  }

  async idle(): Promise<void> {
    this.stopSpeaking();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (this.connection.state.status === VoiceConnectionStatus.Destroyed) return;

    this.stopSpeaking();
    this.connection.destroy();
  }

  private stopSpeaking(): void {
    if (!this.speaking) return;
    this.speaking = false;
    if (this.connection.state.status === VoiceConnectionStatus.Destroyed) return;
    this.connection.setSpeaking(false);
  }
}

/**
 * Opens one voice connection per session and hands raw Opus packets to it,
 * bypassing the library's audio player so frame pacing stays with the caller.
 */
export class DiscordVoiceTransport implements VoiceTransport {
  private readonly adapterFor: DiscordVoiceTransportOptions['adapterFor'];
  private readonly readyTimeoutMs: number;
  private readonly reconnectGraceMs: number;

  constructor(options: DiscordVoiceTransportOptions) {
    this.adapterFor = options.adapterFor;
    this.readyTimeoutMs = options.readyTimeoutMs ?? 20_000;
    this.reconnectGraceMs = options.reconnectGraceMs ?? 5_000;
  }

  async open(tenantId: string, channelId: string): Promise<VoiceSession> {
    const adapterCreator = this.adapterFor(tenantId);
    if (!adapterCreator) {
      throw new VoiceConnectError(`Guild ${tenantId} is not available`, tenantId);
    }

    const log = logger.child({ component: 'voice-transport', tenantId, channelId });
    const connection = joinVoiceChannel({
      guildId: tenantId,
      channelId,
      adapterCreator,
      selfDeaf: true,
    });
    this.watch(connection, log);

    try {
      await entersState(connection, VoiceConnectionStatus.Ready, this.readyTimeoutMs);
    } catch (error) {
      if (connection.state.status !== VoiceConnectionStatus.Destroyed) connection.destroy();
      throw new VoiceConnectError(
        `Voice connection not ready after ${this.readyTimeoutMs}ms`,
        tenantId,
        { cause: error },
      );
    }

    log.info('Voice connection ready');
    return new DiscordVoiceSession(channelId, tenantId, connection);
  }

  private watch(connection: VoiceConnection, log: Logger): void {
    connection.on('error', (error) => {
      log.warn({ error: describeError(error) }, 'Voice connection error');
    });

    connection.on(VoiceConnectionStatus.Disconnected, () => {
      // Moves between channels and region changes reconnect on their own
      void Promise.race([
        entersState(connection, VoiceConnectionStatus.Signalling, this.reconnectGraceMs),
        entersState(connection, VoiceConnectionStatus.Connecting, this.reconnectGraceMs),
      ]).catch(() => {
        log.info('Voice connection lost');
        if (connection.state.status !== VoiceConnectionStatus.Destroyed) connection.destroy();
      });
    });
  }
}
