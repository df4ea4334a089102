// src/core/delivery/sender.ts
import { DEFAULT_CHUNK_DELAY_MS, MAX_MESSAGE_LENGTH } from '../config/constants.js';
import { logger } from '../logger.js';
import { sleep as defaultSleep, type Sleep } from '../discord/retry.js';
import type { MessageSource } from '../discord/messages.js';
import type { DeliveryReport } from '../types/index.js';
import { splitMessage, textLength } from './chunker.js';

export interface MessageSenderOptions {
  chunkDelayMs?: number;
  limit?: number;
  sleep?: Sleep;
}

export class MessageSender {
  private readonly chunkDelayMs: number;
  private readonly limit: number;
  private readonly sleep: Sleep;

  constructor(
    private readonly messages: MessageSource,
    options: MessageSenderOptions = {}
  ) {
    this.chunkDelayMs = options.chunkDelayMs ?? DEFAULT_CHUNK_DELAY_MS;
    this.limit = options.limit ?? MAX_MESSAGE_LENGTH;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Posts `chunks` in order, pausing between them. Stops at the first chunk
   * that cannot be delivered; the report then carries its index.
   */
  async send(channelId: string, chunks: string[], alreadySent: number = 0): Promise<DeliveryReport> {
    const total = chunks.length + alreadySent;

    for (const [index, chunk] of chunks.entries()) {
      const position = index + alreadySent;
      if (textLength(chunk) > this.limit) {
        logger.error(`Chunk ${position + 1}/${total} exceeds ${this.limit} characters`, { channelId });
        return { ok: false, sent: position, total, failure: 'post-failed-formatting', failedIndex: position };
      }

      logger.debug(`Sending chunk ${position + 1}/${total} to ${channelId}`);
      const id = await this.messages.postMessage(channelId, chunk);
      if (id === null) {
        logger.error(`Failed to send chunk ${position + 1}/${total} to ${channelId}, aborting rest of message`);
        return { ok: false, sent: position, total, failure: 'post-failed-chunk', failedIndex: position };
      }

      if (index < chunks.length - 1) {
        await this.sleep(this.chunkDelayMs);
      }
    }

    return { ok: true, sent: total, total };
  }

  async sendText(channelId: string, text: string): Promise<DeliveryReport> {
    return this.send(channelId, splitMessage(text, this.limit));
  }
}
