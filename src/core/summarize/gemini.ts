// src/core/summarize/gemini.ts
import { z } from 'zod';
import { DEFAULT_TEXT_MODEL, DEFAULT_VIDEO_MODEL, GEMINI_API_BASE } from '../config/constants.js';
import { ErrorCode, LinkDigestError } from '../errors.js';
import { logger } from '../logger.js';
import type { FetchLike } from '../discord/client.js';
import { VIDEO_PROMPT } from './prompts.js';
import type { Summarizer } from './types.js';

const generateResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z.array(z.object({ text: z.string().optional() }).passthrough()).default([]),
          })
          .optional(),
      })
    )
    .default([]),
});

type Part = { text: string } | { file_data: { file_uri: string } };

export interface GeminiClientOptions {
  apiKey: string;
  apiBase?: string;
  textModel?: string;
  videoModel?: string;
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * Single-shot calls to the Gemini `generateContent` endpoint.
 */
export class GeminiClient implements Summarizer {
  private readonly apiBase: string;
  private readonly textModel: string;
  private readonly videoModel: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(private readonly options: GeminiClientOptions) {
    this.apiBase = (options.apiBase ?? GEMINI_API_BASE).replace(/\/+$/, '');
    this.textModel = options.textModel ?? DEFAULT_TEXT_MODEL;
    this.videoModel = options.videoModel ?? DEFAULT_VIDEO_MODEL;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 120000;
  }

  async summarize(prompt: string): Promise<string | null> {
    try {
      return await this.generate(this.textModel, [{ text: prompt }]);
    } catch (error) {
      logger.error('Error summarizing with Gemini API', error);
      return null;
    }
  }

  summarizeVideo(url: string): Promise<string | null> {
    return this.generate(this.videoModel, [{ text: VIDEO_PROMPT }, { file_data: { file_uri: url } }]);
  }

  private async generate(model: string, parts: Part[]): Promise<string | null> {
    const endpoint = `${this.apiBase}/models/${model}:generateContent?key=${encodeURIComponent(this.options.apiKey)}`;

    let response: Response;
    try {
      response = await this.fetchImpl(endpoint, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ contents: [{ parts }] }),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new LinkDigestError(
        ErrorCode.NETWORK_ERROR,
        `Gemini request failed: ${error instanceof Error ? error.message : String(error)}`,
        true,
        undefined,
        { model }
      );
    }

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new LinkDigestError(
        ErrorCode.SUMMARY_FAILED,
        `Gemini API error (${response.status}): ${text.slice(0, 500)}`,
        response.status === 429 || response.status >= 500,
        undefined,
        { model, status: response.status }
      );
    }

    const parsed = generateResponseSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new LinkDigestError(ErrorCode.INVALID_RESPONSE, 'Gemini response has an unexpected shape', false, undefined, {
        model,
      });
    }

    const text = (parsed.data.candidates[0]?.content?.parts ?? [])
      .map((part) => part.text ?? '')
      .join('');
    return text.length > 0 ? text : null;
  }
}
