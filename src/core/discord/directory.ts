// src/core/discord/directory.ts
import { DEFAULT_AUTO_ARCHIVE_MINUTES } from '../config/constants.js';
import { logger } from '../logger.js';
import type { Channel, Thread } from '../types/index.js';
import type { DiscordClient } from './client.js';
import { channelListSchema, channelSchema, createdIdSchema, threadListSchema } from './schemas.js';

export interface ChannelExclusions {
  ids?: string[];
  names?: string[];
}

const isTextLike = (channel: Channel): boolean =>
  channel.kind === 'text' || channel.kind === 'announcement';

export class ChannelDirectory {
  constructor(private readonly client: DiscordClient) {}

  async listChannels(guildId: string): Promise<Channel[]> {
    const channels = await this.client.get(`/guilds/${guildId}/channels`, channelListSchema);
    if (!channels) {
      logger.warn(`Could not fetch channels for guild ${guildId}`);
      return [];
    }
    return channels;
  }

  async getChannel(channelId: string): Promise<Channel | null> {
    return this.client.get(`/channels/${channelId}`, channelSchema);
  }

  /**
   * Active threads of every channel in the guild; filter by `parentId`.
   */
  async listActiveThreads(guildId: string): Promise<Thread[]> {
    return (await this.client.get(`/guilds/${guildId}/threads/active`, threadListSchema)) ?? [];
  }

  async listArchivedThreads(channelId: string, limit: number): Promise<Thread[]> {
    if (limit <= 0) {
      return [];
    }
    const threads = await this.client.get(
      `/channels/${channelId}/threads/archived/public?limit=${limit}`,
      threadListSchema
    );
    return (threads ?? []).map((thread) => ({ ...thread, archived: true }));
  }

  /**
   * Text and announcement channels under the category called `categoryName`,
   * minus the excluded ids and names. A missing category yields an empty list.
   */
  async channelsInCategory(
    guildId: string,
    categoryName: string,
    exclusions: ChannelExclusions = {}
  ): Promise<Channel[]> {
    const channels = await this.listChannels(guildId);
    const category = channels.find((channel) => channel.kind === 'category' && channel.name === categoryName);

    if (!category) {
      logger.warn(`Category '${categoryName}' not found in guild ${guildId}`);
      return [];
    }

    const excludedIds = new Set(exclusions.ids ?? []);
    const excludedNames = new Set(exclusions.names ?? []);

    const result: Channel[] = [];
    for (const channel of channels) {
      if (!isTextLike(channel) || channel.parentId !== category.id) {
        continue;
      }
      if (excludedIds.has(channel.id) || excludedNames.has(channel.name)) {
        logger.debug(`Skipping excluded channel '${channel.name}' (${channel.id})`);
        continue;
      }
      result.push(channel);
    }

    logger.info(`Found ${result.length} channels in category '${categoryName}'`, { categoryId: category.id });
    return result;
  }

  async createThread(
    forumId: string,
    name: string,
    content: string,
    autoArchiveMinutes: number = DEFAULT_AUTO_ARCHIVE_MINUTES
  ): Promise<string | null> {
    const created = await this.client.post(
      `/channels/${forumId}/threads`,
      { name, auto_archive_duration: autoArchiveMinutes, message: { content } },
      createdIdSchema
    );
    return created?.id ?? null;
  }
}

export function findChannelByName(channels: Channel[], name: string): Channel | undefined {
  return channels.find((channel) => isTextLike(channel) && channel.name === name);
}
