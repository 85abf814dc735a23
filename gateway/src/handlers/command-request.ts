import type {
  Guild,
  InteractionEditReplyOptions,
  InteractionReplyOptions,
  User,
} from 'discord.js';
import type { ReplyPayload } from '../ui.js';

/**
 * What a command handler needs from an interaction, detached from discord.js.
 */
export interface CommandRequest {
  readonly tenantId: string;
  readonly textChannelId: string;
  readonly userId: string;
  readonly userName: string;
  /** Voice channel the invoking member sits in. */
  readonly voiceChannelId: string | null;
  defer(): Promise<void>;
  /** Replies, or edits the deferred reply. */
  respond(payload: ReplyPayload): Promise<void>;
}

/** The parts of a slash-command or select-menu interaction the adapter reads. */
export interface RepliableGuildInteraction {
  readonly guild: Guild | null;
  readonly channelId: string | null;
  readonly user: User;
  readonly deferred: boolean;
  readonly replied: boolean;
  deferReply(): Promise<unknown>;
  reply(options: InteractionReplyOptions): Promise<unknown>;
  editReply(options: InteractionEditReplyOptions): Promise<unknown>;
}

/**
 * Returns null outside a cached guild text channel.
 */
export function toCommandRequest(interaction: RepliableGuildInteraction): CommandRequest | null {
  const { guild, channelId, user } = interaction;
  if (!guild || !channelId) return null;

  return {
    tenantId: guild.id,
    textChannelId: channelId,
    userId: user.id,
    userName: user.displayName,
    voiceChannelId: guild.voiceStates.cache.get(user.id)?.channelId ?? null,

    async defer() {
      if (interaction.deferred || interaction.replied) return;
      await interaction.deferReply();
    },

    async respond({ ephemeral, ...body }) {
      if (interaction.deferred || interaction.replied) {
        await interaction.editReply(body);
        return;
      }
      await interaction.reply({ ...body, ephemeral });
    },
  };
}
