import { Client, Events, GatewayIntentBits } from 'discord.js';
import { Redis } from 'ioredis';
import { HealthChecker, checkDiscord, checkHeap, checkRedis, logger } from '@tenantune/logger';
import { env, type Env } from '@tenantune/config';
import {
  AudioSourcePipeline,
  FrameStreamer,
  InMemoryPlaylistStore,
  PresenceMonitor,
  PrometheusMetrics,
  RedisPlaylistStore,
  SongLookup,
  TenantPlayer,
  TenantRegistry,
  YtDlpAudioSource,
  YtDlpSearchProvider,
  describeError,
  type PlaylistStore,
} from '@tenantune/audio';

import { registerCommands } from './commands.js';
import { handleInteraction, type InteractionHandlerContext } from './handlers/interaction.js';
import { registerLifecycleHandlers } from './handlers/ready.js';
import { DiscordNotifier, clientChannelResolver } from './infrastructure/discord/discord-notifier.js';
import { DiscordPresenceQuery } from './infrastructure/discord/discord-presence-query.js';
import { DiscordVoiceTransport } from './infrastructure/discord/discord-voice-transport.js';
import { HealthServer } from './infrastructure/http/health-server.js';
import { InMemorySongListStorage } from './storage/song-list-storage.js';

/**
 * Composition root: builds the engine, binds it to Discord and owns shutdown.
 */
export class GatewayApplication {
  private readonly shutdownController = new AbortController();
  private readonly metrics = new PrometheusMetrics();
  private readonly client: Client;
  private readonly redis: Redis | null;
  private readonly pipeline: AudioSourcePipeline;
  private readonly lookup: SongLookup;
  private readonly registry: TenantRegistry;
  private readonly presenceMonitor: PresenceMonitor;
  private readonly songLists = new InMemorySongListStorage();
  private readonly healthChecker: HealthChecker;
  private readonly healthServer: HealthServer;
  private shutdownPromise: Promise<void> | null = null;

  constructor(private readonly config: Env = env) {
    this.client = new Client({
      intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
    });

    this.redis = config.PLAYLIST_STORE === 'redis'
      ? new Redis(config.REDIS_URL, { lazyConnect: true, maxRetriesPerRequest: 3 })
      : null;
    const store: PlaylistStore = this.redis ? new RedisPlaylistStore(this.redis) : new InMemoryPlaylistStore();

    const source = new YtDlpAudioSource({
      ytDlpPath: config.YTDLP_PATH,
      ffmpegPath: config.FFMPEG_PATH,
      bitrateK: config.OPUS_BITRATE_K,
    });
    this.pipeline = new AudioSourcePipeline({
      source,
      metrics: this.metrics,
      metadataCache: { capacity: config.METADATA_CACHE_ENTRIES, ttlMs: config.METADATA_CACHE_TTL_MS },
      audioCache: { capacityBytes: config.AUDIO_CACHE_MAX_BYTES },
    });
    this.lookup = new SongLookup({
      provider: new YtDlpSearchProvider(config.YTDLP_PATH),
      capacity: config.LOOKUP_CACHE_ENTRIES,
      metrics: this.metrics,
    });

    const streamer = new FrameStreamer({ frameDurationMs: config.FRAME_DURATION_MS, metrics: this.metrics });
    const transport = new DiscordVoiceTransport({
      adapterFor: (tenantId) => this.client.guilds.cache.get(tenantId)?.voiceAdapterCreator,
      readyTimeoutMs: config.VOICE_READY_TIMEOUT_MS,
    });
    const notifier = new DiscordNotifier(clientChannelResolver(this.client));

    this.registry = new TenantRegistry({
      metrics: this.metrics,
      createPlayer: (tenantId) => new TenantPlayer({
        tenantId,
        resolver: this.pipeline,
        streamer,
        transport,
        notifier,
        store,
        metrics: this.metrics,
      }),
    });

    this.presenceMonitor = new PresenceMonitor({
      registry: this.registry,
      presence: new DiscordPresenceQuery(this.client),
      intervalMs: config.PRESENCE_INTERVAL_MS,
      signal: this.shutdownController.signal,
    });

    this.healthChecker = this.createHealthChecker();
    this.healthServer = new HealthServer(this.healthChecker, this.metrics.registry, config.HTTP_PORT);
  }

  async initialize(): Promise<void> {
    logger.info({ playlistStore: this.config.PLAYLIST_STORE }, 'Initializing gateway');

    if (this.redis) await this.redis.connect();

    await this.healthServer.start();
    await registerCommands(this.config.DISCORD_TOKEN, this.config.DISCORD_APPLICATION_ID, this.config.DISCORD_GUILD_ID);

    const context: InteractionHandlerContext = {
      registry: this.registry,
      lookup: this.lookup,
      songLists: this.songLists,
      metrics: this.metrics,
      signal: this.shutdownController.signal,
    };
    registerLifecycleHandlers(this.client, this.registry);
    this.client.on(Events.InteractionCreate, (interaction) => {
      void handleInteraction(interaction, context);
    });
    this.client.on(Events.Error, (error) => {
      logger.error({ error: describeError(error) }, 'Discord client error');
    });

    this.presenceMonitor.start();
    await this.client.login(this.config.DISCORD_TOKEN);

    logger.info('Gateway initialized');
  }

  /**
   * Stops in dependency order: new work first, then players and their voice
   * sessions, then the connections they used. Safe to call more than once.
   */
  shutdown(): Promise<void> {
    this.shutdownPromise ??= this.runShutdown();
    return this.shutdownPromise;
  }

  private async runShutdown(): Promise<void> {
    logger.info('Shutting down gateway...');
    this.shutdownController.abort();

    const steps: Array<[string, () => Promise<unknown> | void]> = [
      ['registry', () => this.registry.shutdown()],
      ['caches', () => {
        this.pipeline.dispose();
        this.lookup.dispose();
        this.songLists.dispose();
      }],
      ['discord', () => this.client.destroy()],
      ['redis', () => this.redis?.quit()],
      ['http', () => this.healthServer.shutdown()],
    ];

    for (const [name, step] of steps) {
      try {
        await step();
      } catch (error) {
        logger.error({ step: name, error: describeError(error) }, 'Error during shutdown');
      }
    }

    logger.info('Gateway shut down');
  }

  private createHealthChecker(): HealthChecker {
    const checker = new HealthChecker('tenantune-gateway', process.env.npm_package_version);

    checker.register('discord', () => checkDiscord(this.client));
    checker.register('memory', () => checkHeap());
    checker.register('players', async () => ({
      status: this.shutdownController.signal.aborted ? 'unhealthy' : 'healthy',
      details: {
        players: this.registry.size,
        active: this.registry.activePlayers().length,
        presenceMonitor: this.presenceMonitor.isRunning,
      },
    }));

    const { redis } = this;
    if (redis) {
      checker.register('redis', () => checkRedis(redis));
    }

    return checker;
  }
}
