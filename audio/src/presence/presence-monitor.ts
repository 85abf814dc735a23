import { logger } from '@tenantune/logger';
import { describeError } from '../errors.js';
import type { TenantRegistry } from '../registry/tenant-registry.js';
import type { PresenceQuery } from '../types.js';

export interface PresenceMonitorOptions {
  registry: Pick<TenantRegistry, 'activePlayers'>;
  presence: PresenceQuery;
  intervalMs?: number;
  /** Process-wide shutdown signal. */
  signal?: AbortSignal;
}

/**
 * Stops players whose voice channel has no listener left besides the bot.
 */
export class PresenceMonitor {
  private readonly registry: Pick<TenantRegistry, 'activePlayers'>;
  private readonly presence: PresenceQuery;
  private readonly intervalMs: number;
  private readonly signal?: AbortSignal;
  private timer?: NodeJS.Timeout;
  private ticking: Promise<number> | null = null;
  private readonly log = logger.child({ component: 'presence-monitor' });

  constructor(options: PresenceMonitorOptions) {
    this.registry = options.registry;
    this.presence = options.presence;
    this.intervalMs = options.intervalMs ?? 60000;
    this.signal = options.signal;
  }

  start(): void {
    if (this.timer || this.signal?.aborted) return;

    this.timer = setInterval(() => {
      if (this.ticking) return;
      this.ticking = this.tick().finally(() => {
        this.ticking = null;
      });
    }, this.intervalMs);
    this.timer.unref();

    this.signal?.addEventListener('abort', () => this.stop(), { once: true });
    this.log.info({ intervalMs: this.intervalMs }, 'Presence monitor started');
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = undefined;
    this.log.info('Presence monitor stopped');
  }

  get isRunning(): boolean {
    return this.timer !== undefined;
  }

  /**
   * One pass over the active players. Resolves with the number of players
   * stopped; never rejects.
   */
  async tick(): Promise<number> {
    let stopped = 0;

    for (const player of this.registry.activePlayers()) {
      if (this.signal?.aborted) break;

      const channelId = player.getVoiceChannelId();
      if (!channelId || player.isClosed) continue;

      try {
        const members = await this.presence.occupancy(player.tenantId, channelId);
        if (members <= 1) {
          this.log.info({ tenantId: player.tenantId, channelId, members }, 'Voice channel empty, stopping player');
          await player.stop();
          stopped++;
        }
      } catch (error) {
        this.log.warn({ error: describeError(error), tenantId: player.tenantId }, 'Presence check failed');
      }
    }

    return stopped;
  }
}
