import {
  ActionRowBuilder,
  EmbedBuilder,
  StringSelectMenuBuilder,
  StringSelectMenuOptionBuilder,
} from 'discord.js';
import type { Song } from '@tenantune/audio';

export const BRAND_COLOR = 0x6A0DAD;
const ERROR_COLOR = 0xff0000;

export const SONG_CHOICE_ID = 'add_song_playlist';
export type SongChoice = 'song' | 'playlist';

const PLAYLIST_TEXT_LIMIT = 4000;

export const messages = {
  guildOnly: 'This command only works inside a server.',
  notInVoiceChannel: 'You need to be in a voice channel to play music.',
  choiceAlreadyMade: 'That selection was already handled.',
  stopped: '⏹️ Playback stopped',
  skipped: '⏭️ Song skipped',
  nothingToSkip: 'Nothing is playing.',
  nothingPlaying: 'No song playing',
  emptyPlaylist: '🫙 The playlist is empty',
  unknownCommand: 'Unknown command.',
  genericError: 'An error occurred while processing your interaction.',
} as const;

export interface ReplyPayload {
  content?: string;
  embeds?: EmbedBuilder[];
  components?: ActionRowBuilder<StringSelectMenuBuilder>[];
  ephemeral?: boolean;
}

export function formatDuration(totalSeconds: number): string {
  const seconds = Math.max(0, Math.floor(totalSeconds));
  const hours = Math.floor(seconds / 3600);
  const min = Math.floor(seconds / 60) % 60;
  const sec = seconds % 60;

  if (hours > 0) {
    return `${hours}:${min.toString().padStart(2, '0')}:${sec.toString().padStart(2, '0')}`;
  }
  return `${min}:${sec.toString().padStart(2, '0')}`;
}

function songEmbed(song: Song, heading: string): EmbedBuilder {
  const embed = new EmbedBuilder()
    .setColor(BRAND_COLOR)
    .setAuthor({ name: heading })
    .setTitle(song.title)
    .setURL(song.url)
    .addFields({ name: 'Duration', value: formatDuration(song.durationSeconds), inline: true })
    .setTimestamp();

  if (song.thumbnailUrl) embed.setThumbnail(song.thumbnailUrl);
  if (song.requestedBy) embed.setFooter({ text: `Requested by ${song.requestedBy}` });

  return embed;
}

export function buildAddedToQueueEmbed(song: Song, queuePosition: number): EmbedBuilder {
  return songEmbed(song, '✨ Added to Queue').addFields({
    name: 'Position in Queue',
    value: `#${queuePosition}`,
    inline: true,
  });
}

export function buildNowPlayingEmbed(song: Song): EmbedBuilder {
  return songEmbed(song, '🎶 Now Playing');
}

export function buildPlaybackFailedEmbed(song: Song, error: Error): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(ERROR_COLOR)
    .setTitle('❌ Failed to play')
    .setDescription(`**${song.title}**\n${error.message}`)
    .setTimestamp();
}

export function buildSongsAddedMessage(count: number): string {
  return `➕ Added ${count} songs to the playlist`;
}

export function buildSongRemovedMessage(song: Song): string {
  return `🗑️ Song **${song.title}** removed from the playlist`;
}

export function buildPlayingMessage(song: Song): string {
  return `🎶 ${song.title}`;
}

/**
 * Asks whether to queue only the first result or the whole list.
 */
export function buildSongChoice(songs: readonly Song[]): ReplyPayload {
  const embed = new EmbedBuilder()
    .setColor(BRAND_COLOR)
    .setTitle(`Found ${songs.length} songs`)
    .setDescription(`First result: **${songs[0]?.title ?? 'unknown'}**`);

  const menu = new StringSelectMenuBuilder()
    .setCustomId(SONG_CHOICE_ID)
    .setPlaceholder('What should be added?')
    .addOptions(
      new StringSelectMenuOptionBuilder().setLabel('Add song').setValue('song').setEmoji('🎵'),
      new StringSelectMenuOptionBuilder().setLabel('Add the whole playlist').setValue('playlist').setEmoji('🎶'),
    );

  return {
    embeds: [embed],
    components: [new ActionRowBuilder<StringSelectMenuBuilder>().addComponents(menu)],
  };
}

export function formatPlaylist(songs: readonly Song[]): string {
  let text = '';
  for (const [index, song] of songs.entries()) {
    const line = `${index + 1}. ${song.title}\n`;
    if (text.length + line.length > PLAYLIST_TEXT_LIMIT) {
      text += '...';
      break;
    }
    text += line;
  }
  return text.trim();
}

export function buildPlaylistEmbed(songs: readonly Song[]): EmbedBuilder {
  return new EmbedBuilder()
    .setColor(BRAND_COLOR)
    .setTitle('Playlist')
    .setDescription(formatPlaylist(songs));
}

export function isSongChoice(value: string | undefined): value is SongChoice {
  return value === 'song' || value === 'playlist';
}
