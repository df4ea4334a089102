// src/core/config/index.ts
import { z } from 'zod';
import { ErrorCode, LinkDigestError } from '../errors.js';
import {
  DEFAULT_CHUNK_DELAY_MS,
  DEFAULT_EXCLUDED_DOMAINS,
  DEFAULT_FORUM_SEARCH_THREAD_LIMIT,
  DEFAULT_FORUM_THREAD_CHECK_LIMIT,
  DEFAULT_MESSAGE_FETCH_LIMIT,
  DEFAULT_SUMMARY_CHECK_LIMIT,
  DEFAULT_TEXT_MODEL,
  DEFAULT_URL_DELAY_MS,
  DEFAULT_VIDEO_MODEL,
  DISCORD_API_BASE,
  GEMINI_API_BASE,
  MAX_MESSAGE_LENGTH,
} from './constants.js';

export interface AppConfig {
  discordToken: string;
  googleApiKey: string;
  guildId?: string;
  sourceChannelIds: string[];
  summaryChannelId?: string;
  forumChannelId?: string;
  categoryName?: string;
  excludedChannelNames: string[];
  excludedDomains: string[];
  stateFile?: string;
  // Unset leaves the choice to the command
  includeBots?: boolean;
  discordApiBase: string;
  gemini: {
    apiBase: string;
    textModel: string;
    videoModel: string;
  };
  limits: {
    messageFetch: number;
    summaryCheck: number;
    forumThreadCheck: number;
    forumSearchThreads: number;
    messageLength: number;
  };
  pacing: {
    chunkDelayMs: number;
    urlDelayMs: number;
  };
}

export interface ConfigOverrides {
  stateFile?: string;
  messageFetch?: number;
  includeBots?: boolean;
}

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const optionalString = z.preprocess(blankToUndefined, z.string().trim().optional());

const snowflake = z.string().regex(/^\d+$/, 'must be a numeric Discord id');

const optionalSnowflake = z.preprocess(blankToUndefined, snowflake.optional());

const positiveInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().positive().default(fallback));

const nonNegativeInt = (fallback: number) =>
  z.preprocess(blankToUndefined, z.coerce.number().int().min(0).default(fallback));

const flag = z.preprocess(
  blankToUndefined,
  z
    .string()
    .optional()
    .transform((value) => (value === undefined ? undefined : ['true', '1', 'yes', 'on'].includes(value.toLowerCase())))
);

/**
 * Accepts a JSON array (`'["123", "456"]'`) or a comma-separated list.
 */
export function parseList(raw: string | undefined): string[] {
  if (!raw || raw.trim() === '') {
    return [];
  }

  const trimmed = raw.trim();
  if (trimmed.startsWith('[')) {
    const parsed: unknown = JSON.parse(trimmed);
    const items = z.array(z.union([z.string(), z.number()])).parse(parsed);
    return items.map((item) => String(item).trim()).filter((item) => item.length > 0);
  }

  return trimmed
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

const list = (fallback: string[] = []) =>
  z.preprocess(
    blankToUndefined,
    z
      .string()
      .optional()
      .transform((value, ctx) => {
        if (value === undefined) {
          return fallback;
        }
        try {
          return parseList(value);
        } catch {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: 'expected a JSON array of strings or a comma-separated list',
          });
          return z.NEVER;
        }
      })
  );

const envSchema = z.object({
  DISCORD_TOKEN: z.string({ required_error: 'DISCORD_TOKEN is required' }).trim().min(1, 'DISCORD_TOKEN is required'),
  GOOGLE_API_KEY: z.string({ required_error: 'GOOGLE_API_KEY is required' }).trim().min(1, 'GOOGLE_API_KEY is required'),
  GUILD_ID: optionalSnowflake,
  SOURCE_CHANNEL_IDS: list().pipe(z.array(snowflake)),
  SUMMARY_CHANNEL_ID: optionalSnowflake,
  FORUM_CHANNEL_ID: optionalSnowflake,
  BOT_CATEGORY_NAME: optionalString,
  EXCLUDED_CHANNEL_NAMES: list(),
  EXCLUDED_DOMAINS: list(DEFAULT_EXCLUDED_DOMAINS),
  STATE_FILE: optionalString,
  INCLUDE_BOTS: flag,
  DISCORD_API_BASE: z.preprocess(blankToUndefined, z.string().url().default(DISCORD_API_BASE)),
  GEMINI_API_BASE: z.preprocess(blankToUndefined, z.string().url().default(GEMINI_API_BASE)),
  GEMINI_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_TEXT_MODEL)),
  GEMINI_VIDEO_MODEL: z.preprocess(blankToUndefined, z.string().default(DEFAULT_VIDEO_MODEL)),
  MESSAGE_FETCH_LIMIT: positiveInt(DEFAULT_MESSAGE_FETCH_LIMIT),
  SUMMARY_CHECK_LIMIT: positiveInt(DEFAULT_SUMMARY_CHECK_LIMIT),
  FORUM_THREAD_CHECK_LIMIT: positiveInt(DEFAULT_FORUM_THREAD_CHECK_LIMIT),
  FORUM_SEARCH_THREAD_LIMIT: positiveInt(DEFAULT_FORUM_SEARCH_THREAD_LIMIT),
  MAX_MESSAGE_LENGTH: positiveInt(MAX_MESSAGE_LENGTH),
  CHUNK_DELAY_MS: nonNegativeInt(DEFAULT_CHUNK_DELAY_MS),
  URL_DELAY_MS: nonNegativeInt(DEFAULT_URL_DELAY_MS),
});

/**
 * Builds the run configuration from environment variables. Throws a
 * `config_invalid` error listing every problem found.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: ConfigOverrides = {}
): AppConfig {
  const result = envSchema.safeParse(env);

  if (!result.success) {
    const problems = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new LinkDigestError(
      ErrorCode.CONFIG_INVALID,
      `Invalid configuration: ${problems.join('; ')}`,
      false,
      'Check the environment variables or the .env file'
    );
  }

  const parsed = result.data;

  return Object.freeze({
    discordToken: parsed.DISCORD_TOKEN,
    googleApiKey: parsed.GOOGLE_API_KEY,
    guildId: parsed.GUILD_ID,
    sourceChannelIds: parsed.SOURCE_CHANNEL_IDS,
    summaryChannelId: parsed.SUMMARY_CHANNEL_ID,
    forumChannelId: parsed.FORUM_CHANNEL_ID,
    categoryName: parsed.BOT_CATEGORY_NAME,
    excludedChannelNames: parsed.EXCLUDED_CHANNEL_NAMES,
    excludedDomains: parsed.EXCLUDED_DOMAINS,
    stateFile: overrides.stateFile ?? parsed.STATE_FILE,
    includeBots: overrides.includeBots ?? parsed.INCLUDE_BOTS,
    discordApiBase: parsed.DISCORD_API_BASE,
    gemini: {
      apiBase: parsed.GEMINI_API_BASE,
      textModel: parsed.GEMINI_MODEL,
      videoModel: parsed.GEMINI_VIDEO_MODEL,
    },
    limits: {
      messageFetch: overrides.messageFetch ?? parsed.MESSAGE_FETCH_LIMIT,
      summaryCheck: parsed.SUMMARY_CHECK_LIMIT,
      forumThreadCheck: parsed.FORUM_THREAD_CHECK_LIMIT,
      forumSearchThreads: parsed.FORUM_SEARCH_THREAD_LIMIT,
      messageLength: parsed.MAX_MESSAGE_LENGTH,
    },
    pacing: {
      chunkDelayMs: parsed.CHUNK_DELAY_MS,
      urlDelayMs: parsed.URL_DELAY_MS,
    },
  });
}

type OptionalSetting = 'guildId' | 'summaryChannelId' | 'forumChannelId' | 'categoryName';

const ENV_NAMES: Record<OptionalSetting, string> = {
  guildId: 'GUILD_ID',
  summaryChannelId: 'SUMMARY_CHANNEL_ID',
  forumChannelId: 'FORUM_CHANNEL_ID',
  categoryName: 'BOT_CATEGORY_NAME',
};

export function requireSetting(config: AppConfig, key: OptionalSetting): string {
  const value = config[key];
  if (!value) {
    throw new LinkDigestError(
      ErrorCode.CONFIG_INVALID,
      `${ENV_NAMES[key]} environment variable not set`,
      false,
      `Set ${ENV_NAMES[key]} for this command`
    );
  }
  return value;
}
