// src/core/dedupe/detector.ts
import type { DuplicateStatus } from '../types/index.js';
import type { ProcessedUrlStore } from './store.js';

export type LiveCheck = (url: string) => Promise<boolean>;

export interface DuplicateDetectorOptions {
  store?: ProcessedUrlStore;
  liveCheck?: LiveCheck;
}

/**
 * Checks cheapest first: URLs seen earlier in this run, then the persisted
 * record, then a live scan of the destination.
 */
export class DuplicateDetector {
  private readonly seenThisRun = new Set<string>();

  constructor(private readonly options: DuplicateDetectorOptions = {}) {}

  async check(url: string): Promise<DuplicateStatus | null> {
    if (this.seenThisRun.has(url)) {
      return 'duplicate-run';
    }

    if (this.options.store && (await this.options.store.has(url))) {
      return 'duplicate-historical';
    }

    if (this.options.liveCheck && (await this.options.liveCheck(url))) {
      return 'duplicate-live';
    }

    return null;
  }

  /**
   * Remembers a URL for the rest of the run without persisting it.
   */
  noteSeen(url: string): void {
    this.seenThisRun.add(url);
  }

  /**
   * Call only once the summary is fully posted.
   */
  async markProcessed(url: string): Promise<void> {
    this.seenThisRun.add(url);
    await this.options.store?.add(url);
  }
}
