// src/cli/commands/channel.ts
import { Command } from 'commander';
import { requireSetting } from '../../core/config/index.js';
import { DuplicateDetector, LiveScanner } from '../../core/dedupe/index.js';
import { ChannelDestination } from '../../core/delivery/destination.js';
import { ErrorCode, LinkDigestError } from '../../core/errors.js';
import { SummaryPipeline } from '../../core/pipeline/index.js';
import type { SourceChannel } from '../../core/types/index.js';
import { addCommonOptions, createServices, finishRun, openStore, resolveConfig, type CommonOptions } from './shared.js';

export function registerChannelCommand(program: Command): void {
  addCommonOptions(
    program
      .command('channel')
      .description('Summarize links from SOURCE_CHANNEL_IDS into SUMMARY_CHANNEL_ID')
  ).action(async (options: CommonOptions) => {
    const config = resolveConfig(options);
    const summaryChannelId = requireSetting(config, 'summaryChannelId');
    if (config.sourceChannelIds.length === 0) {
      throw new LinkDigestError(
        ErrorCode.CONFIG_INVALID,
        'SOURCE_CHANNEL_IDS environment variable not set',
        false,
        'Set SOURCE_CHANNEL_IDS to a JSON array or comma-separated list of channel ids'
      );
    }

    const services = createServices(config);
    const store = await openStore(config.stateFile);
    const scanner = new LiveScanner(services.directory, services.messages);
    const detector = new DuplicateDetector({
      store,
      liveCheck: (url) => scanner.inChannel(summaryChannelId, url, config.limits.summaryCheck),
    });

    const sources: SourceChannel[] = [];
    for (const id of config.sourceChannelIds) {
      const channel = await services.directory.getChannel(id);
      sources.push({ id, name: channel?.name ?? id });
    }

    const pipeline = new SummaryPipeline(
      {
        messages: services.messages,
        detector,
        scraper: services.scraper,
        summarizer: services.summarizer,
        destination: new ChannelDestination(services.sender, summaryChannelId),
      },
      {
        messageLimit: config.limits.messageFetch,
        excludedDomains: config.excludedDomains,
        messageLength: config.limits.messageLength,
        includeBots: config.includeBots ?? false,
        urlDelayMs: config.pacing.urlDelayMs,
      }
    );

    finishRun(await pipeline.run(sources));
  });
}
