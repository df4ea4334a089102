// src/core/delivery/daily-thread.ts
import { DEFAULT_AUTO_ARCHIVE_MINUTES, DEFAULT_FORUM_THREAD_CHECK_LIMIT } from '../config/constants.js';
import { logger } from '../logger.js';
import type { ChannelDirectory } from '../discord/directory.js';
import type { MessageSource } from '../discord/messages.js';

const WEEKDAYS = ['Sunday', 'Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday'];

/**
 * `Summary for 2026-10-18 (Sunday)`, always in UTC.
 */
export function dailyThreadTitle(now: Date = new Date()): string {
  const date = now.toISOString().slice(0, 10);
  return `Summary for ${date} (${WEEKDAYS[now.getUTCDay()]})`;
}

export type ResolverState = 'unknown' | 'resolving' | 'found' | 'created';

export interface DailyThreadOptions {
  guildId: string;
  forumId: string;
  title: string;
  checkLimit?: number;
  autoArchiveMinutes?: number;
}

export interface ThreadResolution {
  threadId: string;
  // True when the thread was created with the initial content as its first message
  created: boolean;
}

export class DailyThreadResolver {
  private state: ResolverState = 'unknown';
  private threadId: string | null = null;
  private readonly checkLimit: number;
  private readonly autoArchiveMinutes: number;

  constructor(
    private readonly directory: ChannelDirectory,
    private readonly messages: MessageSource,
    private readonly options: DailyThreadOptions
  ) {
    this.checkLimit = options.checkLimit ?? DEFAULT_FORUM_THREAD_CHECK_LIMIT;
    this.autoArchiveMinutes = options.autoArchiveMinutes ?? DEFAULT_AUTO_ARCHIVE_MINUTES;
  }

  get currentState(): ResolverState {
    return this.state;
  }

  get title(): string {
    return this.options.title;
  }

  /**
   * Returns the cached thread, an existing thread with today's title, or a
   * new thread whose starter message is `initialContent`. Null when the
   * thread could not be created; the next call searches again.
   */
  async resolve(initialContent: string): Promise<ThreadResolution | null> {
    if (this.threadId !== null) {
      return { threadId: this.threadId, created: false };
    }

    this.state = 'resolving';
    const existing = await this.find();
    if (existing !== null) {
      this.threadId = existing;
      this.state = 'found';
      return { threadId: existing, created: false };
    }

    logger.info(`Creating thread '${this.options.title}' in forum ${this.options.forumId}`);
    const created = await this.directory.createThread(
      this.options.forumId,
      this.options.title,
      initialContent,
      this.autoArchiveMinutes
    );
    if (created === null) {
      logger.error(`Failed to create thread '${this.options.title}'`);
      this.state = 'unknown';
      return null;
    }

    this.threadId = created;
    this.state = 'created';
    logger.info(`Created thread ${created}`);
    return { threadId: created, created: true };
  }

  async find(): Promise<string | null> {
    const { guildId, forumId, title } = this.options;

    const active = await this.directory.listActiveThreads(guildId);
    const live = active.find((thread) => thread.parentId === forumId && thread.name === title);
    if (live) {
      logger.info(`Found active thread '${title}' (${live.id})`);
      return live.id;
    }

    // A thread created moments ago may be missing from the active listing
    const recent = await this.messages.fetchRecent(forumId, this.checkLimit * 2);
    const marker = recent.find((message) => message.thread?.name === title);
    if (marker?.thread) {
      logger.info(`Found thread '${title}' via starter message (${marker.thread.id})`);
      return marker.thread.id;
    }

    const archived = await this.directory.listArchivedThreads(forumId, this.checkLimit);
    const match = archived.find((thread) => thread.name === title);
    if (match) {
      logger.info(`Found archived thread '${title}' (${match.id})`);
      return match.id;
    }

    logger.info(`Thread '${title}' not found`);
    return null;
  }
}
