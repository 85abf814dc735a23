import { Events, type Client } from 'discord.js';
import { logger } from '@tenantune/logger';
import { describeError, type TenantLifecycleListener } from '@tenantune/audio';

interface GuildRef {
  readonly id: string;
  readonly name: string;
}

export async function handleReady(client: Client<true>, listener: TenantLifecycleListener): Promise<void> {
  logger.info({
    tag: client.user.tag,
    id: client.user.id,
    guilds: client.guilds.cache.size,
  }, 'Bot logged in successfully');

  // Guilds present at login never fire guildCreate
  await Promise.all(client.guilds.cache.map((guild) => handleGuildCreate(guild, listener)));
}

export async function handleGuildCreate(guild: GuildRef, listener: TenantLifecycleListener): Promise<void> {
  logger.info({ guildId: guild.id, guildName: guild.name, action: 'guild-joined' }, 'Tenant available');
  try {
    await listener.onTenantJoin(guild.id);
  } catch (error) {
    logger.error({ guildId: guild.id, error: describeError(error) }, 'Failed to set up tenant');
  }
}

export async function handleGuildDelete(guild: GuildRef, listener: TenantLifecycleListener): Promise<void> {
  logger.info({ guildId: guild.id, guildName: guild.name, action: 'guild-left' }, 'Tenant gone');
  try {
    await listener.onTenantLeave(guild.id);
  } catch (error) {
    logger.error({ guildId: guild.id, error: describeError(error) }, 'Failed to tear down tenant');
  }
}

/**
 * Maps gateway guild events onto tenant lifecycle calls.
 */
export function registerLifecycleHandlers(client: Client, listener: TenantLifecycleListener): void {
  client.once(Events.ClientReady, (readyClient) => {
    void handleReady(readyClient, listener);
  });

  client.on(Events.GuildCreate, (guild) => {
    void handleGuildCreate(guild, listener);
  });

  client.on(Events.GuildDelete, (guild) => {
    void handleGuildDelete(guild, listener);
  });

  logger.info('Ready and guild handlers registered');
}
