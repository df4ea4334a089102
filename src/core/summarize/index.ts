// src/core/summarize/index.ts
export { GeminiClient } from './gemini.js';
export type { GeminiClientOptions } from './gemini.js';
export { WebScraper, htmlToText } from './scraper.js';
export { buildPrompt, isVideoUrl, selectPromptMode, VIDEO_PROMPT } from './prompts.js';
export type { PromptMode } from './prompts.js';
export type { Scraper, Summarizer } from './types.js';
