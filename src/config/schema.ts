import { z } from "zod";

/**
 * Audio format preferences, in the numbering the stream API uses.
 */
export const AUDIO_FORMAT = {
  alac: 1,
  flac: 2,
  mqa: 3,
  spatial: 4,
  aac: 5,
} as const;

export type AudioFormat = (typeof AUDIO_FORMAT)[keyof typeof AUDIO_FORMAT];

/**
 * Video format preferences, mapped to a resolution tier in the catalog.
 */
export const VIDEO_FORMAT = {
  "480p": 1,
  "720p": 2,
  "1080p": 3,
  "1440p": 4,
  "4k": 5,
} as const;

export type VideoFormat = (typeof VIDEO_FORMAT)[keyof typeof VIDEO_FORMAT];

const audioFormatSchema = z.union([
  z.literal(AUDIO_FORMAT.alac),
  z.literal(AUDIO_FORMAT.flac),
  z.literal(AUDIO_FORMAT.mqa),
  z.literal(AUDIO_FORMAT.spatial),
  z.literal(AUDIO_FORMAT.aac),
]);

const videoFormatSchema = z.union([
  z.literal(VIDEO_FORMAT["480p"]),
  z.literal(VIDEO_FORMAT["720p"]),
  z.literal(VIDEO_FORMAT["1080p"]),
  z.literal(VIDEO_FORMAT["1440p"]),
  z.literal(VIDEO_FORMAT["4k"]),
]);

/**
 * Global application configuration schema.
 */
export const configSchema = z.object({
  email: z.string().default(""),
  password: z.string().default(""),
  token: z.string().default(""),
  apiClientId: z.string().default(""),
  apiDeveloperKey: z.string().default(""),
  format: audioFormatSchema.default(AUDIO_FORMAT.flac),
  videoFormat: videoFormatSchema.default(VIDEO_FORMAT["4k"]),
  outPath: z.string().default("~/Downloads/tapevault"),
  ffmpegPath: z.string().min(1).default("ffmpeg"),
  skipVideos: z.boolean().default(false),
  forceVideo: z.boolean().default(false),
  skipChapters: z.boolean().default(false),
  tagAudio: z.boolean().default(false),
  maxRetries: z.number().int().min(1).max(10).default(3),
  requestTimeoutMs: z.number().int().min(1000).max(600_000).default(30_000),
});

export type Config = z.infer<typeof configSchema>;

/**
 * Strips the scheme prefix users often paste along with a bearer token.
 */
export function normalizeToken(token: string): string {
  return token.trim().replace(/^Bearer /, "");
}

/**
 * Keys that hold credentials; `config show` masks them.
 */
export const SECRET_KEYS: readonly (keyof Config)[] = ["password", "token", "apiDeveloperKey"];

export type ConfigKey = keyof Config;

export const CONFIG_KEYS = Object.keys(configSchema.shape);

export function isConfigKey(key: string): key is ConfigKey {
  return Object.hasOwn(configSchema.shape, key);
}

/**
 * Parses a command-line value into the type of the setting it replaces.
 * Returns null for a number setting given a non-numeric value.
 */
export function coerceConfigValue(raw: string, current: unknown): string | number | boolean | null {
  if (typeof current === "boolean") return raw === "true" || raw === "1";
  if (typeof current === "number") {
    const parsed = Number.parseInt(raw, 10);
    return Number.isNaN(parsed) ? null : parsed;
  }
  return raw;
}
