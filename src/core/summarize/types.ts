// src/core/summarize/types.ts
export interface Scraper {
  /** Visible text of the page, or null when it could not be fetched. */
  scrape(url: string): Promise<string | null>;
}

export interface Summarizer {
  /** Never throws; null on any failure. */
  summarize(prompt: string): Promise<string | null>;
  /** May throw on transport failure. */
  summarizeVideo(url: string): Promise<string | null>;
}
