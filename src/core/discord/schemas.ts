// src/core/discord/schemas.ts
import { z } from 'zod';
import type { Channel, ChannelKind, Embed, Message, Thread } from '../types/index.js';

// Discord channel type numbers
const CHANNEL_KINDS: Record<number, ChannelKind> = {
  0: 'text',
  4: 'category',
  5: 'announcement',
  15: 'forum',
};

const embedSchema = z
  .object({ url: z.string().nullish() })
  .passthrough()
  .transform((embed): Embed => (embed.url ? { url: embed.url } : {}));

export const channelSchema = z
  .object({
    id: z.string(),
    type: z.number(),
    name: z.string().nullish(),
    parent_id: z.string().nullish(),
  })
  .transform(
    (raw): Channel => ({
      id: raw.id,
      name: raw.name ?? `Channel ${raw.id}`,
      kind: CHANNEL_KINDS[raw.type] ?? 'other',
      parentId: raw.parent_id ?? null,
    })
  );

export const channelListSchema = z.array(channelSchema);

export const threadSchema = z
  .object({
    id: z.string(),
    name: z.string().nullish(),
    parent_id: z.string().nullish(),
    thread_metadata: z.object({ archived: z.boolean().optional() }).nullish(),
  })
  .transform(
    (raw): Thread => ({
      id: raw.id,
      name: raw.name ?? '',
      parentId: raw.parent_id ?? null,
      archived: raw.thread_metadata?.archived ?? false,
    })
  );

export const threadListSchema = z
  .object({ threads: z.array(threadSchema).default([]) })
  .transform((raw) => raw.threads);

const snapshotSchema = z
  .object({
    message: z
      .object({
        content: z.string().nullish(),
        embeds: z.array(embedSchema).nullish(),
      })
      .nullish(),
  })
  .transform((raw) => ({
    content: raw.message?.content ?? '',
    embeds: raw.message?.embeds ?? [],
  }));

export const messageSchema = z
  .object({
    id: z.string(),
    content: z.string().nullish(),
    author: z
      .object({
        id: z.string(),
        username: z.string().nullish(),
        bot: z.boolean().nullish(),
      })
      .nullish(),
    embeds: z.array(embedSchema).nullish(),
    thread: z.object({ id: z.string(), name: z.string().nullish() }).nullish(),
    message_snapshots: z.array(snapshotSchema).nullish(),
  })
  .transform((raw): Message => {
    const message: Message = {
      id: raw.id,
      author: {
        id: raw.author?.id ?? '',
        name: raw.author?.username ?? 'Unknown',
        isBot: raw.author?.bot ?? false,
      },
      content: raw.content ?? '',
      embeds: raw.embeds ?? [],
      snapshots: raw.message_snapshots ?? [],
    };
    if (raw.thread) {
      message.thread = { id: raw.thread.id, name: raw.thread.name ?? '' };
    }
    return message;
  });

export const messageListSchema = z.array(messageSchema);

export const createdIdSchema = z.object({ id: z.string() }).passthrough();

export const rateLimitBodySchema = z.object({
  retry_after: z.number().nonnegative().optional(),
  global: z.boolean().optional(),
});
