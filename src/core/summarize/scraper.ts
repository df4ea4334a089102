// src/core/summarize/scraper.ts
import * as cheerio from 'cheerio';
import { hasChildren, isTag, isText, type AnyNode } from 'domhandler';
import { logger } from '../logger.js';
import type { FetchLike } from '../discord/client.js';
import type { Scraper } from './types.js';

export const BROWSER_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

const BROWSER_HEADERS: Record<string, string> = {
  'User-Agent': BROWSER_USER_AGENT,
  Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
};

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template', 'svg', 'head']);

function collectText(node: AnyNode, parts: string[]): void {
  if (isText(node)) {
    const value = node.data.trim();
    if (value) {
      parts.push(value);
    }
    return;
  }
  if (isTag(node) && SKIPPED_TAGS.has(node.name)) {
    return;
  }
  if (hasChildren(node)) {
    for (const child of node.children) {
      collectText(child, parts);
    }
  }
}

/**
 * Visible text of an HTML document: every non-empty text node, in document
 * order, joined by single spaces.
 */
export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  const parts: string[] = [];
  for (const body of $('body').get()) {
    collectText(body, parts);
  }
  return parts.join(' ').replace(/\s+/g, ' ');
}

export interface WebScraperOptions {
  fetch?: FetchLike;
  timeoutMs?: number;
}

/**
 * Plain fetch first; when the site refuses it, one more attempt with
 * browser-like headers.
 */
export class WebScraper implements Scraper {
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: WebScraperOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 30000;
  }

  async scrape(url: string): Promise<string | null> {
    const html = (await this.fetchHtml(url, {})) ?? (await this.fetchHtml(url, BROWSER_HEADERS));
    if (html === null) {
      logger.warn(`Error scraping ${url}`);
      return null;
    }

    const text = htmlToText(html);
    return text.length > 0 ? text : null;
  }

  private async fetchHtml(url: string, headers: Record<string, string>): Promise<string | null> {
    try {
      const response = await this.fetchImpl(url, {
        headers,
        redirect: 'follow',
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        logger.debug(`Fetching ${url} returned ${response.status}`);
        return null;
      }
      return await response.text();
    } catch (error) {
      logger.debug(`Fetching ${url} failed`, { error: error instanceof Error ? error.message : String(error) });
      return null;
    }
  }
}
