// src/core/config/constants.ts
export const DISCORD_API_BASE = 'https://discord.com/api/v10';
export const GEMINI_API_BASE = 'https://generativelanguage.googleapis.com/v1beta';
export const DEFAULT_USER_AGENT = 'DiscordBot (link-digest, 0.1.0)';

export const MAX_MESSAGE_LENGTH = 2000;
export const MESSAGES_PAGE_SIZE = 100;

export const DEFAULT_MESSAGE_FETCH_LIMIT = 50;
export const DEFAULT_SUMMARY_CHECK_LIMIT = 50;
export const DEFAULT_FORUM_THREAD_CHECK_LIMIT = 5;
export const DEFAULT_FORUM_SEARCH_THREAD_LIMIT = 25;
export const DEFAULT_AUTO_ARCHIVE_MINUTES = 1440;

export const DEFAULT_CHUNK_DELAY_MS = 1000;
export const DEFAULT_URL_DELAY_MS = 1000;
export const DEFAULT_RATE_LIMIT_FALLBACK_S = 1;
export const DEFAULT_MAX_RATE_LIMIT_RETRIES = 20;
export const DEFAULT_POST_ATTEMPTS = 3;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30000;

export const DEFAULT_STATE_FILE = 'processed_urls.json';
export const DEFAULT_EXCLUDED_DOMAINS = ['x.com'];
export const VIDEO_HOST_PATTERNS = ['youtube.com', 'youtu.be'];
export const DISCUSSION_HOST_PATTERNS = ['reddit.com'];

export const DEFAULT_TEXT_MODEL = 'gemini-2.0-flash';
export const DEFAULT_VIDEO_MODEL = 'gemini-2.5-pro';
