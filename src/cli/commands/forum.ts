// src/cli/commands/forum.ts
import { Command } from 'commander';
import { requireSetting } from '../../core/config/index.js';
import { DuplicateDetector, LiveScanner } from '../../core/dedupe/index.js';
import { DailyThreadResolver, dailyThreadTitle } from '../../core/delivery/daily-thread.js';
import { DailyThreadDestination } from '../../core/delivery/destination.js';
import { logger } from '../../core/logger.js';
import { SummaryPipeline } from '../../core/pipeline/index.js';
import { addCommonOptions, createServices, finishRun, openStore, resolveConfig, type CommonOptions } from './shared.js';

export function registerForumCommand(program: Command): void {
  addCommonOptions(
    program
      .command('forum')
      .description("Summarize links from BOT_CATEGORY_NAME channels into today's FORUM_CHANNEL_ID thread")
  ).action(async (options: CommonOptions) => {
    const config = resolveConfig(options);
    const guildId = requireSetting(config, 'guildId');
    const forumId = requireSetting(config, 'forumChannelId');
    const categoryName = requireSetting(config, 'categoryName');

    const services = createServices(config);
    const store = await openStore(config.stateFile);
    const scanner = new LiveScanner(services.directory, services.messages);
    const detector = new DuplicateDetector({
      store,
      liveCheck: (url) =>
        scanner.inForum(guildId, forumId, url, {
          threadLimit: config.limits.forumSearchThreads,
          messageLimit: config.limits.summaryCheck,
        }),
    });

    const sources = await services.directory.channelsInCategory(guildId, categoryName, {
      ids: [forumId],
      names: config.excludedChannelNames,
    });
    if (sources.length === 0) {
      logger.warn(`No source channels found in category '${categoryName}'`);
      return;
    }

    const resolver = new DailyThreadResolver(services.directory, services.messages, {
      guildId,
      forumId,
      title: dailyThreadTitle(),
      checkLimit: config.limits.forumThreadCheck,
    });

    const pipeline = new SummaryPipeline(
      {
        messages: services.messages,
        detector,
        scraper: services.scraper,
        summarizer: services.summarizer,
        destination: new DailyThreadDestination(services.sender, resolver),
      },
      {
        messageLimit: config.limits.messageFetch,
        excludedDomains: config.excludedDomains,
        messageLength: config.limits.messageLength,
        // Channels in the bot category are fed by bots
        includeBots: config.includeBots ?? true,
        urlDelayMs: config.pacing.urlDelayMs,
      }
    );

    finishRun(await pipeline.run(sources.map(({ id, name }) => ({ id, name }))));
  });
}
