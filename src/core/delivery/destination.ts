// src/core/delivery/destination.ts
import type { DeliveryReport } from '../types/index.js';
import type { DailyThreadResolver } from './daily-thread.js';
import type { MessageSender } from './sender.js';

export interface Destination {
  readonly description: string;
  deliver(chunks: string[]): Promise<DeliveryReport>;
}

export class ChannelDestination implements Destination {
  readonly description: string;

  constructor(
    private readonly sender: MessageSender,
    private readonly channelId: string
  ) {
    this.description = `channel ${channelId}`;
  }

  deliver(chunks: string[]): Promise<DeliveryReport> {
    return this.sender.send(this.channelId, chunks);
  }
}

/**
 * Posts into the forum's thread for the current day, creating it with the
 * first chunk when it does not exist yet.
 */
export class DailyThreadDestination implements Destination {
  constructor(
    private readonly sender: MessageSender,
    private readonly resolver: DailyThreadResolver
  ) {}

  get description(): string {
    return `thread '${this.resolver.title}'`;
  }

  async deliver(chunks: string[]): Promise<DeliveryReport> {
    if (chunks.length === 0) {
      return { ok: false, sent: 0, total: 0, failure: 'post-failed-formatting' };
    }

    const resolution = await this.resolver.resolve(chunks[0]);
    if (resolution === null) {
      return { ok: false, sent: 0, total: chunks.length, failure: 'post-failed-thread-create', failedIndex: 0 };
    }

    if (resolution.created) {
      return this.sender.send(resolution.threadId, chunks.slice(1), 1);
    }
    return this.sender.send(resolution.threadId, chunks);
  }
}
