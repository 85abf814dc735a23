import { z } from 'zod';
import { LookupFailedError, isCancellation } from '../errors.js';
import { createSong, type Song } from '../types.js';
import type { SongSearchProvider } from '../lookup/song-lookup.js';
import { ProcessError, runProcess } from './process.js';

const entrySchema = z.object({
  id: z.string().optional(),
  url: z.string().optional(),
  webpage_url: z.string().optional(),
  title: z.string().optional(),
  duration: z.number().nullish(),
  thumbnail: z.string().optional(),
  thumbnails: z.array(z.object({ url: z.string() })).optional(),
});

const resultSchema = entrySchema.extend({
  entries: z.array(entrySchema).optional(),
});

type Entry = z.infer<typeof entrySchema>;

function isUrl(query: string): boolean {
  return /^https?:\/\//i.test(query.trim());
}

function toSong(entry: Entry): Song | null {
  const url = entry.webpage_url ?? entry.url ?? (entry.id ? `https://www.youtube.com/watch?v=${entry.id}` : undefined);
  if (!url) return null;

  const thumbnails = entry.thumbnails;
  const thumbnailUrl = entry.thumbnail ?? (thumbnails && thumbnails.length > 0 ? thumbnails[thumbnails.length - 1].url : undefined);

  return createSong({
    url,
    title: entry.title ?? url,
    durationSeconds: Math.max(0, Math.round(entry.duration ?? 0)),
    thumbnailUrl,
  });
}

/**
 * Resolves a URL (video or playlist) or free text into songs with yt-dlp.
 * Free text takes the first search hit.
 */
export class YtDlpSearchProvider implements SongSearchProvider {
  constructor(private readonly ytDlpPath = 'yt-dlp') {}

  async search(query: string, signal?: AbortSignal): Promise<Song[]> {
    const target = isUrl(query) ? query.trim() : `ytsearch1:${query.trim()}`;
    const args = ['--flat-playlist', '--dump-single-json', '--no-warnings', target];

    let stdout: string;
    try {
      ({ stdout } = await runProcess(this.ytDlpPath, args, signal));
    } catch (error) {
      if (isCancellation(error)) throw error;
      const detail = error instanceof ProcessError ? error.stderrTail : String(error);
      throw new LookupFailedError(`yt-dlp search failed for "${query}": ${detail}`, { cause: error });
    }

    const parsed = resultSchema.safeParse(JSON.parse(stdout));
    if (!parsed.success) {
      throw new LookupFailedError(`yt-dlp returned an unexpected result for "${query}"`);
    }

    const entries: Entry[] = parsed.data.entries ?? [parsed.data];
    return entries
      .map(toSong)
      .filter((song): song is Song => song !== null);
  }
}
