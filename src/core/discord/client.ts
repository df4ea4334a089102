// src/core/discord/client.ts
import type { z } from 'zod';
import { ErrorCode, LinkDigestError } from '../errors.js';
import { logger } from '../logger.js';
import {
  DEFAULT_MAX_RATE_LIMIT_RETRIES,
  DEFAULT_RATE_LIMIT_FALLBACK_S,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
  DISCORD_API_BASE,
} from '../config/constants.js';
import { rateLimitBodySchema } from './schemas.js';
import { computeDelay, DEFAULT_RETRY_POLICY, sleep, withRetry, type RetryPolicy, type Sleep } from './retry.js';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface DiscordClientOptions {
  token: string;
  apiBase?: string;
  userAgent?: string;
  fetch?: FetchLike;
  sleep?: Sleep;
  random?: () => number;
  retryPolicy?: RetryPolicy;
  maxRateLimitRetries?: number;
  rateLimitFallbackSeconds?: number;
  timeoutMs?: number;
}

type Method = 'GET' | 'POST';

/**
 * Thin Discord REST client. 429 responses are waited out using the
 * server-advertised `retry_after`; GET failures resolve to null, POST
 * failures are retried per the retry policy before resolving to null.
 */
export class DiscordClient {
  private readonly apiBase: string;
  private readonly headers: Record<string, string>;
  private readonly fetchImpl: FetchLike;
  private readonly sleep: Sleep;
  private readonly random: () => number;
  private readonly retryPolicy: RetryPolicy;
  private readonly maxRateLimitRetries: number;
  private readonly rateLimitFallbackSeconds: number;
  private readonly timeoutMs: number;

  constructor(options: DiscordClientOptions) {
    this.apiBase = (options.apiBase ?? DISCORD_API_BASE).replace(/\/+$/, '');
    this.headers = {
      Authorization: `Bot ${options.token}`,
      'User-Agent': options.userAgent ?? DEFAULT_USER_AGENT,
      'Content-Type': 'application/json',
    };
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.sleep = options.sleep ?? sleep;
    this.random = options.random ?? Math.random;
    this.retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
    this.maxRateLimitRetries = options.maxRateLimitRetries ?? DEFAULT_MAX_RATE_LIMIT_RETRIES;
    this.rateLimitFallbackSeconds = options.rateLimitFallbackSeconds ?? DEFAULT_RATE_LIMIT_FALLBACK_S;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  async get<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.output<S> | null> {
    try {
      const body = await this.request('GET', path);
      return this.parse(schema, body, 'GET', path);
    } catch (error) {
      logger.warn(`GET ${path} failed`, { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }

  async post<S extends z.ZodTypeAny>(path: string, payload: unknown, schema: S): Promise<z.output<S> | null> {
    try {
      return await withRetry(
        async () => {
          const body = await this.request('POST', path, payload);
          return this.parse(schema, body, 'POST', path);
        },
        {
          policy: this.retryPolicy,
          sleep: this.sleep,
          random: this.random,
          label: `POST ${path}`,
        }
      );
    } catch (error) {
      logger.error(`POST ${path} failed`, error);
      return null;
    }
  }

  private async request(method: Method, path: string, payload?: unknown): Promise<unknown> {
    const url = `${this.apiBase}${path}`;

    for (let attempt = 1; ; attempt++) {
      let response: Response;
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: this.headers,
          body: payload === undefined ? undefined : JSON.stringify(payload),
          signal: AbortSignal.timeout(this.timeoutMs),
        });
      } catch (error) {
        throw new LinkDigestError(
          ErrorCode.NETWORK_ERROR,
          `${method} ${path}: ${error instanceof Error ? error.message : String(error)}`,
          true,
          undefined,
          { path }
        );
      }

      if (response.status === 429) {
        if (attempt > this.maxRateLimitRetries) {
          throw new LinkDigestError(
            ErrorCode.RATE_LIMITED,
            `${method} ${path}: still rate limited after ${this.maxRateLimitRetries} retries`,
            false,
            undefined,
            { path }
          );
        }
        const waitMs = await this.rateLimitWait(response, attempt);
        logger.warn(`Rate limited on ${method} ${path}, sleeping ${waitMs}ms`, { attempt });
        await this.sleep(waitMs);
        continue;
      }

      if (!response.ok) {
        const text = await response.text().catch(() => '');
        throw new LinkDigestError(
          ErrorCode.HTTP_ERROR,
          `Discord API error (${response.status}) for ${method} ${path}: ${text}`,
          response.status >= 500,
          undefined,
          { path, status: response.status }
        );
      }

      const text = await response.text();
      if (text.trim() === '') {
        return null;
      }
      try {
        return JSON.parse(text);
      } catch {
        throw new LinkDigestError(ErrorCode.INVALID_RESPONSE, `${method} ${path}: response is not JSON`);
      }
    }
  }

  private async rateLimitWait(response: Response, attempt: number): Promise<number> {
    const body: unknown = await response.json().catch(() => null);
    const parsed = rateLimitBodySchema.safeParse(body);

    if (parsed.success && parsed.data.retry_after !== undefined) {
      return Math.round(parsed.data.retry_after * 1000);
    }

    const fallbackPolicy = { ...this.retryPolicy, baseDelayMs: this.rateLimitFallbackSeconds * 1000 };
    return computeDelay(fallbackPolicy, attempt, this.random);
  }

  private parse<S extends z.ZodTypeAny>(schema: S, body: unknown, method: Method, path: string): z.output<S> {
    const result = schema.safeParse(body);
    if (!result.success) {
      throw new LinkDigestError(
        ErrorCode.INVALID_RESPONSE,
        `${method} ${path}: unexpected response shape (${result.error.issues[0]?.message ?? 'invalid'})`,
        false,
        undefined,
        { path }
      );
    }
    return result.data;
  }
}
