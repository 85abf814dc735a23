import type { Client } from 'discord.js';
import type { PresenceQuery } from '@tenantune/audio';

interface VoiceStateLike {
  readonly channelId: string | null;
}

export function countChannelMembers(voiceStates: Iterable<VoiceStateLike>, channelId: string): number {
  let count = 0;
  for (const state of voiceStates) {
    if (state.channelId === channelId) count++;
  }
  return count;
}

/**
 * Reads occupancy from the gateway's voice-state cache; needs the
 * GuildVoiceStates intent.
 */
export class DiscordPresenceQuery implements PresenceQuery {
  constructor(private readonly client: Client) {}

  async occupancy(tenantId: string, channelId: string): Promise<number> {
    const guild = this.client.guilds.cache.get(tenantId);
    if (!guild) {
      throw new Error(`Guild ${tenantId} is not cached`);
    }
    return countChannelMembers(guild.voiceStates.cache.values(), channelId);
  }
}
