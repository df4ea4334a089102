// src/core/summarize/prompts.ts
import { DISCUSSION_HOST_PATTERNS, VIDEO_HOST_PATTERNS } from '../config/constants.js';
import { containsAny } from '../extract/url.js';

export type PromptMode = 'discussion' | 'article';

export const VIDEO_PROMPT = `Analyze the following YouTube video content. Provide a concise summary covering:

1. **Main Thesis/Claim:** What is the central point the creator is making?
2. **Key Topics:** List the main subjects discussed, referencing timestamps where possible.
3. **Call to Action:** Identify any explicit requests made to the viewer.
4. **Summary:** Provide a concise summary of the video content.

Use the provided title, chapter timestamps/descriptions, and description text for your analysis. Please answer without explanation`;

export function isVideoUrl(url: string): boolean {
  return containsAny(url, VIDEO_HOST_PATTERNS);
}

export function selectPromptMode(url: string): PromptMode {
  return containsAny(url, DISCUSSION_HOST_PATTERNS) ? 'discussion' : 'article';
}

export function buildPrompt(mode: PromptMode, text: string): string {
  switch (mode) {
    case 'discussion':
      return (
        'Summarize the key points and main discussion from the following Reddit post content within 1500 characters. ' +
        "Focus on the post's topic, user opinions, and any conclusions drawn. " +
        `Ignore site navigation elements and generic Reddit boilerplate. Use English point form:\n\n${text}`
      );
    case 'article':
      return (
        'Without any explanation, just summarize this in English point form with minimal losing in information ' +
        `and ignore useless information for news consumer:\n\n${text}`
      );
  }
}
