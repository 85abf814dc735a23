import { z } from 'zod';

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  DISCORD_TOKEN: z.string().min(1),
  DISCORD_APPLICATION_ID: z.string().min(1),
  // Registers commands on a single guild instead of globally
  DISCORD_GUILD_ID: z.string().optional(),
  REDIS_URL: z.string().default('redis://localhost:6379'),
  PLAYLIST_STORE: z.enum(['memory', 'redis']).default('memory'),
  HTTP_PORT: z.coerce.number().int().positive().default(8080),
  // Caches
  METADATA_CACHE_ENTRIES: z.coerce.number().int().positive().default(1000),
  METADATA_CACHE_TTL_MS: z.coerce.number().int().positive().default(60 * 60 * 1000),
  AUDIO_CACHE_MAX_BYTES: z.coerce.number().int().positive().default(256 * 1024 * 1024),
  LOOKUP_CACHE_ENTRIES: z.coerce.number().int().positive().default(500),
  // Playback
  FRAME_DURATION_MS: z.coerce.number().int().positive().default(20),
  PRESENCE_INTERVAL_MS: z.coerce.number().int().positive().default(60_000),
  VOICE_READY_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
  // External tools
  YTDLP_PATH: z.string().default('yt-dlp'),
  FFMPEG_PATH: z.string().default('ffmpeg'),
  OPUS_BITRATE_K: z.coerce.number().int().min(16).max(512).default(96),
});

export type Env = z.infer<typeof envSchema>;

export function loadConfig(source: Record<string, string | undefined>): Env {
  return envSchema.parse(source);
}

export const env: Env = loadConfig(process.env);
