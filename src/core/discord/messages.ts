// src/core/discord/messages.ts
import { MESSAGES_PAGE_SIZE } from '../config/constants.js';
import { logger } from '../logger.js';
import type { Message } from '../types/index.js';
import type { DiscordClient } from './client.js';
import { createdIdSchema, messageListSchema } from './schemas.js';

export class MessageSource {
  constructor(private readonly client: DiscordClient) {}

  /**
   * Up to `limit` most recent messages, newest first. Pages through the
   * `before` cursor when `limit` exceeds one page.
   */
  async fetchRecent(channelId: string, limit: number): Promise<Message[]> {
    const messages: Message[] = [];
    let before: string | undefined;

    while (messages.length < limit) {
      const pageSize = Math.min(MESSAGES_PAGE_SIZE, limit - messages.length);
      const batch = await this.fetchPage(channelId, pageSize, before);
      if (batch === null) {
        break;
      }
      messages.push(...batch);
      if (batch.length < pageSize) {
        break;
      }
      before = batch[batch.length - 1].id;
    }

    return messages;
  }

  /**
   * Whole channel history, newest first, until the platform returns an
   * empty batch.
   */
  async fetchAll(channelId: string): Promise<Message[]> {
    const messages: Message[] = [];
    let before: string | undefined;

    for (;;) {
      const batch = await this.fetchPage(channelId, MESSAGES_PAGE_SIZE, before);
      if (batch === null || batch.length === 0) {
        break;
      }
      messages.push(...batch);
      before = batch[batch.length - 1].id;
      logger.debug(`Fetched ${messages.length} messages from ${channelId}`, { before });
    }

    return messages;
  }

  async postMessage(channelId: string, content: string): Promise<string | null> {
    const created = await this.client.post(`/channels/${channelId}/messages`, { content }, createdIdSchema);
    return created?.id ?? null;
  }

  private async fetchPage(channelId: string, limit: number, before?: string): Promise<Message[] | null> {
    const params = new URLSearchParams({ limit: String(limit) });
    if (before) {
      params.set('before', before);
    }
    const batch = await this.client.get(`/channels/${channelId}/messages?${params.toString()}`, messageListSchema);
    if (batch === null) {
      logger.warn(`Could not fetch messages from channel ${channelId}`);
    }
    return batch;
  }
}
