// src/core/dedupe/live-scan.ts
import { logger } from '../logger.js';
import type { ChannelDirectory } from '../discord/directory.js';
import type { MessageSource } from '../discord/messages.js';
import type { Thread } from '../types/index.js';

export interface ForumScanLimits {
  // Distinct threads whose messages are read
  threadLimit: number;
  // Recent messages read per thread
  messageLimit: number;
}

/**
 * Looks for earlier summaries of a URL in what the destination already shows.
 * The scan window is bounded, so a summary older than the window is missed.
 */
export class LiveScanner {
  constructor(
    private readonly directory: ChannelDirectory,
    private readonly messages: MessageSource
  ) {}

  async inChannel(channelId: string, url: string, messageLimit: number): Promise<boolean> {
    const recent = await this.messages.fetchRecent(channelId, messageLimit);
    const hit = recent.find((message) => message.content.includes(url));
    if (hit) {
      logger.debug(`URL ${url} found in message ${hit.id} of channel ${channelId}`);
      return true;
    }
    return false;
  }

  async inForum(guildId: string, forumId: string, url: string, limits: ForumScanLimits): Promise<boolean> {
    const candidates = await this.forumThreads(guildId, forumId, limits.threadLimit);

    let checked = 0;
    for (const thread of candidates) {
      if (checked >= limits.threadLimit) {
        logger.debug(`Reached thread check limit (${limits.threadLimit}), stopping forum search`);
        break;
      }
      checked++;

      logger.debug(`Checking thread ${thread.name} (${thread.id})`, { archived: thread.archived });
      if (await this.inChannel(thread.id, url, limits.messageLimit)) {
        return true;
      }
    }

    return false;
  }

  private async forumThreads(guildId: string, forumId: string, threadLimit: number): Promise<Thread[]> {
    const active = (await this.directory.listActiveThreads(guildId)).filter((thread) => thread.parentId === forumId);
    const seen = new Set(active.map((thread) => thread.id));
    const candidates = [...active];

    const remaining = Math.max(0, threadLimit - candidates.length);
    if (remaining > 0) {
      for (const thread of await this.directory.listArchivedThreads(forumId, remaining)) {
        if (!seen.has(thread.id)) {
          seen.add(thread.id);
          candidates.push(thread);
        }
      }
    }

    return candidates;
  }
}
