import type { Client, EmbedBuilder } from 'discord.js';
import { logger } from '@tenantune/logger';
import { describeError, type PlayerNotifier, type Song } from '@tenantune/audio';
import { buildNowPlayingEmbed, buildPlaybackFailedEmbed } from '../../ui.js';

export interface SendableChannel {
  send(options: { embeds: EmbedBuilder[] }): Promise<unknown>;
}

export type ChannelResolver = (channelId: string) => Promise<SendableChannel | null>;

/**
 * Resolves a channel the bot can post in, using the cache before the API.
 */
export function clientChannelResolver(client: Client): ChannelResolver {
  return async (channelId) => {
    const channel = client.channels.cache.get(channelId) ?? await client.channels.fetch(channelId);
    return channel?.isSendable() ? channel : null;
  };
}

/**
 * Posts playback events to the text channel the songs were requested from.
 * Delivery failures are logged; playback does not depend on them.
 */
export class DiscordNotifier implements PlayerNotifier {
  constructor(private readonly resolveChannel: ChannelResolver) {}

  async nowPlaying(textChannelId: string, song: Song): Promise<void> {
    await this.send(textChannelId, buildNowPlayingEmbed(song), 'now-playing');
  }

  async playbackFailed(textChannelId: string, song: Song, error: Error): Promise<void> {
    await this.send(textChannelId, buildPlaybackFailedEmbed(song, error), 'playback-failed');
  }

  private async send(channelId: string, embed: EmbedBuilder, kind: string): Promise<void> {
    try {
      const channel = await this.resolveChannel(channelId);
      if (!channel) {
        logger.warn({ channelId, kind }, 'Text channel not available for notification');
        return;
      }
      await channel.send({ embeds: [embed] });
    } catch (error) {
      logger.warn({ channelId, kind, error: describeError(error) }, 'Failed to send notification');
    }
  }
}
