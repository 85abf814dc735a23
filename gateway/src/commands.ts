import { REST, Routes, SlashCommandBuilder } from 'discord.js';
import { logger } from '@tenantune/logger';

export const COMMAND_NAMES = ['play', 'skip', 'stop', 'list', 'remove', 'playing'] as const;
export type CommandName = (typeof COMMAND_NAMES)[number];

export function isCommandName(name: string): name is CommandName {
  return COMMAND_NAMES.some((known) => known === name);
}

export const commandDefinitions = [
  new SlashCommandBuilder()
    .setName('play')
    .setDescription('Play a song or playlist from a URL or a search')
    .addStringOption((option) => option
      .setName('input')
      .setDescription('URL or search text')
      .setRequired(true)
      .setMaxLength(1000)),
  new SlashCommandBuilder()
    .setName('skip')
    .setDescription('Skip the current song'),
  new SlashCommandBuilder()
    .setName('stop')
    .setDescription('Stop playback, clear the playlist and leave the voice channel'),
  new SlashCommandBuilder()
    .setName('list')
    .setDescription('Show the pending songs'),
  new SlashCommandBuilder()
    .setName('remove')
    .setDescription('Remove a pending song from the playlist')
    .addIntegerOption((option) => option
      .setName('position')
      .setDescription('Position in the /list output')
      .setRequired(true)
      .setMinValue(1)),
  new SlashCommandBuilder()
    .setName('playing')
    .setDescription('Show the song that is playing'),
];

/**
 * Overwrites the application's commands, on one guild when `guildId` is set
 * (instant) or globally otherwise.
 */
export async function registerCommands(token: string, applicationId: string, guildId?: string): Promise<void> {
  const rest = new REST({ version: '10' }).setToken(token);
  const body = commandDefinitions.map((command) => command.toJSON());
  const route = guildId
    ? Routes.applicationGuildCommands(applicationId, guildId)
    : Routes.applicationCommands(applicationId);

  await rest.put(route, { body });
  logger.info({ count: body.length, guildId: guildId ?? 'global' }, 'Slash commands registered');
}
