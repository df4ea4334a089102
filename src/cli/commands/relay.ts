// src/cli/commands/relay.ts
import { Command } from 'commander';
import { DEFAULT_STATE_FILE } from '../../core/config/constants.js';
import { requireSetting } from '../../core/config/index.js';
import { DuplicateDetector } from '../../core/dedupe/index.js';
import { ChannelDestination } from '../../core/delivery/destination.js';
import { findChannelByName } from '../../core/discord/directory.js';
import { ErrorCode, LinkDigestError } from '../../core/errors.js';
import { SummaryPipeline } from '../../core/pipeline/index.js';
import type { Channel } from '../../core/types/index.js';
import { addCommonOptions, createServices, finishRun, openStore, resolveConfig, type CommonOptions } from './shared.js';

interface RelayOptions extends CommonOptions {
  all?: boolean;
}

function lookup(channels: Channel[], name: string): Channel {
  const channel = findChannelByName(channels, name);
  if (!channel) {
    throw new LinkDigestError(
      ErrorCode.CONFIG_INVALID,
      `Channel '#${name}' not found`,
      false,
      'Check the channel name and that the bot can see it'
    );
  }
  return channel;
}

export function registerRelayCommand(program: Command): void {
  addCommonOptions(
    program
      .command('relay <source> <target>')
      .description('Summarize links from one channel into another, linking back to each original message')
  )
    .option('--all', 'Read the whole source channel history', false)
    .action(async (sourceName: string, targetName: string, options: RelayOptions) => {
      const config = resolveConfig(options);
      const guildId = requireSetting(config, 'guildId');

      const services = createServices(config);
      const channels = await services.directory.listChannels(guildId);
      const source = lookup(channels, sourceName);
      const target = lookup(channels, targetName);

      const store = await openStore(config.stateFile ?? DEFAULT_STATE_FILE);
      const pipeline = new SummaryPipeline(
        {
          messages: services.messages,
          detector: new DuplicateDetector({ store }),
          scraper: services.scraper,
          summarizer: services.summarizer,
          destination: new ChannelDestination(services.sender, target.id),
        },
        {
          messageLimit: config.limits.messageFetch,
          excludedDomains: config.excludedDomains,
          messageLength: config.limits.messageLength,
          includeBots: config.includeBots ?? true,
          fullHistory: options.all,
          linkOriginalInGuild: guildId,
          labelWithAuthor: true,
          urlDelayMs: config.pacing.urlDelayMs,
        }
      );

      finishRun(await pipeline.run([{ id: source.id, name: source.name }]));
    });
}
