import { logger } from '@tenantune/logger';
import { describeError } from '../errors.js';
import { TenantPlayer } from '../player/tenant-player.js';
import type { MetricsSink } from '../services/metrics.js';
import { TenantMutex } from '../tenant-mutex.js';
import type { TenantLifecycleListener } from '../types.js';

export type PlayerFactory = (tenantId: string) => TenantPlayer;

export interface TenantRegistryOptions {
  createPlayer: PlayerFactory;
  metrics?: MetricsSink;
}

const REGISTRY_LOCK = 'registry';

/**
 * Owns one TenantPlayer per tenant. The map has its own lock and no player
 * lock is ever taken while holding it.
 */
export class TenantRegistry implements TenantLifecycleListener {
  private readonly players = new Map<string, TenantPlayer>();
  private readonly mutex = new TenantMutex();
  private readonly createPlayer: PlayerFactory;
  private readonly metrics?: MetricsSink;
  private readonly log = logger.child({ component: 'tenant-registry' });

  constructor(options: TenantRegistryOptions) {
    this.createPlayer = options.createPlayer;
    this.metrics = options.metrics;
  }

  async onTenantJoin(tenantId: string): Promise<void> {
    const player = await this.getOrCreate(tenantId);
    const restored = await player.restore();
    this.log.info({ tenantId, restored }, 'Tenant joined');
  }

  async onTenantLeave(tenantId: string): Promise<void> {
    const player = await this.mutex.run(REGISTRY_LOCK, () => {
      const existing = this.players.get(tenantId);
      this.players.delete(tenantId);
      this.reportSize();
      return existing;
    });

    if (player) await player.stop();
    this.log.info({ tenantId }, 'Tenant left');
  }

  /**
   * The player for a tenant, created on first use. A closed player is
   * replaced so the tenant can start playing again after a stop.
   */
  getOrCreate(tenantId: string): Promise<TenantPlayer> {
    return this.mutex.run(REGISTRY_LOCK, () => {
      const existing = this.players.get(tenantId);
      if (existing && !existing.isClosed) return existing;

      const player = this.createPlayer(tenantId);
      this.players.set(tenantId, player);
      this.reportSize();
      this.log.debug({ tenantId, replaced: existing !== undefined }, 'Player created');
      return player;
    });
  }

  get(tenantId: string): TenantPlayer | undefined {
    return this.players.get(tenantId);
  }

  activePlayers(): TenantPlayer[] {
    return Array.from(this.players.values()).filter((player) => !player.isClosed);
  }

  get size(): number {
    return this.players.size;
  }

  /**
   * Closes every player and keeps their snapshots for the next start. Players
   * are closed concurrently; a failure in one does not keep the others from
   * closing.
   */
  async shutdown(): Promise<void> {
    const players = await this.mutex.run(REGISTRY_LOCK, () => {
      const all = Array.from(this.players.values());
      this.players.clear();
      this.reportSize();
      return all;
    });

    const results = await Promise.allSettled(players.map((player) => player.shutdown()));
    results.forEach((result, index) => {
      if (result.status === 'rejected') {
        this.log.error({ error: describeError(result.reason), tenantId: players[index].tenantId }, 'Failed to stop player');
      }
    });

    this.log.info({ stopped: players.length }, 'Registry shut down');
  }

  private reportSize(): void {
    this.metrics?.activePlayers(this.players.size);
  }
}
