import type { ChatInputCommandInteraction, Interaction, StringSelectMenuInteraction } from 'discord.js';
import { logger } from '@tenantune/logger';
import {
  InvalidPositionError,
  describeError,
  type MetricsSink,
  type SongLookup,
  type TenantPlayer,
  type TenantRegistry,
} from '@tenantune/audio';
import { isCommandName } from '../commands.js';
import { handleInteractionError } from '../errors.js';
import type { SongListStorage } from '../storage/song-list-storage.js';
import {
  SONG_CHOICE_ID,
  buildAddedToQueueEmbed,
  buildPlayingMessage,
  buildPlaylistEmbed,
  buildSongChoice,
  buildSongRemovedMessage,
  buildSongsAddedMessage,
  isSongChoice,
  messages,
  type SongChoice,
} from '../ui.js';
import { validateSearchQuery } from '../validation.js';
import { toCommandRequest, type CommandRequest } from './command-request.js';

export interface InteractionHandlerContext {
  registry: Pick<TenantRegistry, 'getOrCreate' | 'get'>;
  lookup: Pick<SongLookup, 'lookupSongs'>;
  songLists: SongListStorage;
  metrics: Pick<MetricsSink, 'commandUsed'>;
  /** Aborted on shutdown; cancels lookups still in flight. */
  signal?: AbortSignal;
}

export type CommandInvocation =
  | { name: 'play'; input: string | null }
  | { name: 'skip' }
  | { name: 'stop' }
  | { name: 'list' }
  | { name: 'remove'; position: number }
  | { name: 'playing' }
  | { name: typeof SONG_CHOICE_ID; choice: string | undefined };

function activePlayer(context: InteractionHandlerContext, tenantId: string): TenantPlayer | null {
  const player = context.registry.get(tenantId);
  return player && !player.isClosed ? player : null;
}

export async function handlePlay(
  request: CommandRequest,
  input: string | null,
  context: InteractionHandlerContext,
): Promise<void> {
  const query = validateSearchQuery(input);
  if (!query.success) {
    await request.respond({ content: `Invalid input: ${query.error}`, ephemeral: true });
    return;
  }

  const { voiceChannelId } = request;
  if (!voiceChannelId) {
    await request.respond({ content: messages.notInVoiceChannel, ephemeral: true });
    return;
  }

  await request.defer();
  const songs = await context.lookup.lookupSongs(query.data, {
    signal: context.signal,
    requestedBy: request.userName,
  });

  if (songs.length > 1) {
    context.songLists.save(request.textChannelId, songs);
    await request.respond(buildSongChoice(songs));
    return;
  }

  const [song] = songs;
  const player = await context.registry.getOrCreate(request.tenantId);
  const pending = await player.addSong(request.textChannelId, voiceChannelId, song);
  await request.respond({ embeds: [buildAddedToQueueEmbed(song, pending)] });
}

/**
 * Answers the select menu shown when a lookup returned several songs.
 */
export async function handleSongChoice(
  request: CommandRequest,
  choice: SongChoice,
  context: InteractionHandlerContext,
): Promise<void> {
  const songs = context.songLists.get(request.textChannelId);
  if (!songs || songs.length === 0) {
    await request.respond({ content: messages.choiceAlreadyMade, ephemeral: true });
    return;
  }

  const { voiceChannelId } = request;
  if (!voiceChannelId) {
    await request.respond({ content: messages.notInVoiceChannel, ephemeral: true });
    return;
  }

  context.songLists.delete(request.textChannelId);
  const player = await context.registry.getOrCreate(request.tenantId);

  if (choice === 'playlist') {
    await player.addSongs(request.textChannelId, voiceChannelId, songs);
    await request.respond({ content: buildSongsAddedMessage(songs.length) });
    return;
  }

  const [song] = songs;
  const pending = await player.addSong(request.textChannelId, voiceChannelId, song);
  await request.respond({ embeds: [buildAddedToQueueEmbed(song, pending)] });
}

export async function handleSkip(request: CommandRequest, context: InteractionHandlerContext): Promise<void> {
  const skipped = await activePlayer(context, request.tenantId)?.skipSong() ?? null;
  await request.respond({ content: skipped ? messages.skipped : messages.nothingToSkip });
}

export async function handleStop(request: CommandRequest, context: InteractionHandlerContext): Promise<void> {
  await activePlayer(context, request.tenantId)?.stop();
  await request.respond({ content: messages.stopped });
}

export async function handleList(request: CommandRequest, context: InteractionHandlerContext): Promise<void> {
  const songs = activePlayer(context, request.tenantId)?.getPlaylist() ?? [];
  if (songs.length === 0) {
    await request.respond({ content: messages.emptyPlaylist });
    return;
  }
  await request.respond({ embeds: [buildPlaylistEmbed(songs)] });
}

export async function handleRemove(
  request: CommandRequest,
  position: number,
  context: InteractionHandlerContext,
): Promise<void> {
  const player = activePlayer(context, request.tenantId);
  if (!player) throw new InvalidPositionError(position, 0, request.tenantId);

  const removed = await player.removeSong(position);
  await request.respond({ content: buildSongRemovedMessage(removed) });
}

export async function handlePlaying(request: CommandRequest, context: InteractionHandlerContext): Promise<void> {
  const song = activePlayer(context, request.tenantId)?.getPlayedSong() ?? null;
  await request.respond({ content: song ? buildPlayingMessage(song) : messages.nothingPlaying });
}

/**
 * Runs one command, counting it and turning failures into a reply.
 */
export async function executeCommand(
  command: CommandInvocation,
  request: CommandRequest,
  context: InteractionHandlerContext,
): Promise<void> {
  context.metrics.commandUsed(command.name);
  logger.info({ guildId: request.tenantId, userId: request.userId, command: command.name }, 'command');

  try {
    switch (command.name) {
      case 'play':
        await handlePlay(request, command.input, context);
        break;
      case 'skip':
        await handleSkip(request, context);
        break;
      case 'stop':
        await handleStop(request, context);
        break;
      case 'list':
        await handleList(request, context);
        break;
      case 'remove':
        await handleRemove(request, command.position, context);
        break;
      case 'playing':
        await handlePlaying(request, context);
        break;
      case SONG_CHOICE_ID:
        if (!isSongChoice(command.choice)) {
          await request.respond({ content: messages.genericError, ephemeral: true });
          return;
        }
        await handleSongChoice(request, command.choice, context);
        break;
    }
  } catch (error) {
    await handleInteractionError(error, request, command.name);
  }
}

function parseCommand(interaction: ChatInputCommandInteraction): CommandInvocation | null {
  const name = interaction.commandName;
  if (!isCommandName(name)) return null;

  switch (name) {
    case 'play':
      return { name, input: interaction.options.getString('input') };
    case 'remove':
      return { name, position: interaction.options.getInteger('position', true) };
    default:
      return { name };
  }
}

async function handleChatInput(
  interaction: ChatInputCommandInteraction,
  context: InteractionHandlerContext,
): Promise<void> {
  const request = toCommandRequest(interaction);
  if (!request) {
    await interaction.reply({ content: messages.guildOnly, ephemeral: true });
    return;
  }

  const command = parseCommand(interaction);
  if (!command) {
    logger.warn({ command: interaction.commandName }, 'Unknown command');
    await request.respond({ content: messages.unknownCommand, ephemeral: true });
    return;
  }

  await executeCommand(command, request, context);
}

async function handleSelectMenu(
  interaction: StringSelectMenuInteraction,
  context: InteractionHandlerContext,
): Promise<void> {
  if (interaction.customId !== SONG_CHOICE_ID) {
    logger.warn({ customId: interaction.customId }, 'Unknown select menu interaction');
    return;
  }

  const request = toCommandRequest(interaction);
  if (!request) {
    await interaction.reply({ content: messages.guildOnly, ephemeral: true });
    return;
  }

  await executeCommand({ name: SONG_CHOICE_ID, choice: interaction.values[0] }, request, context);
}

/**
 * Entry point wired to the client's interactionCreate event. Never rejects.
 */
export async function handleInteraction(interaction: Interaction, context: InteractionHandlerContext): Promise<void> {
  try {
    if (interaction.isChatInputCommand()) {
      await handleChatInput(interaction, context);
    } else if (interaction.isStringSelectMenu()) {
      await handleSelectMenu(interaction, context);
    }
  } catch (error) {
    logger.error({ error: describeError(error), interactionId: interaction.id }, 'Failed to handle interaction');
  }
}
