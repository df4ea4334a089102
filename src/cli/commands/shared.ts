// src/cli/commands/shared.ts
import { Command, InvalidArgumentError } from 'commander';
import { loadConfig, type AppConfig } from '../../core/config/index.js';
import { ProcessedUrlStore } from '../../core/dedupe/index.js';
import { MessageSender } from '../../core/delivery/sender.js';
import { DiscordClient } from '../../core/discord/client.js';
import { ChannelDirectory } from '../../core/discord/directory.js';
import { MessageSource } from '../../core/discord/messages.js';
import { setVerbose } from '../../core/logger.js';
import { printSummary } from '../../core/pipeline/index.js';
import { GeminiClient, WebScraper } from '../../core/summarize/index.js';
import type { RunReport } from '../../core/types/index.js';

export interface CommonOptions {
  state?: string;
  limit?: number;
  includeBots?: boolean;
  verbose?: boolean;
}

export interface Services {
  directory: ChannelDirectory;
  messages: MessageSource;
  sender: MessageSender;
  scraper: WebScraper;
  summarizer: GeminiClient;
}

export function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

export function addCommonOptions(command: Command): Command {
  return command
    .option('--state <file>', 'JSON file recording already-summarized URLs')
    .option('--limit <n>', 'Recent messages to read per source channel', parsePositiveInt)
    .option('--include-bots', 'Also summarize links posted by bots')
    .option('--no-include-bots', 'Skip links posted by bots')
    .option('--verbose', 'Verbose output', false);
}

export function resolveConfig(options: CommonOptions, env: NodeJS.ProcessEnv = process.env): AppConfig {
  if (options.verbose) {
    setVerbose(true);
  }
  return loadConfig(env, {
    stateFile: options.state,
    messageFetch: options.limit,
    includeBots: options.includeBots,
  });
}

export function createServices(config: AppConfig): Services {
  const client = new DiscordClient({ token: config.discordToken, apiBase: config.discordApiBase });
  const messages = new MessageSource(client);

  return {
    directory: new ChannelDirectory(client),
    messages,
    sender: new MessageSender(messages, {
      chunkDelayMs: config.pacing.chunkDelayMs,
      limit: config.limits.messageLength,
    }),
    scraper: new WebScraper(),
    summarizer: new GeminiClient({
      apiKey: config.googleApiKey,
      apiBase: config.gemini.apiBase,
      textModel: config.gemini.textModel,
      videoModel: config.gemini.videoModel,
    }),
  };
}

export async function openStore(filePath: string | undefined): Promise<ProcessedUrlStore | undefined> {
  if (!filePath) {
    return undefined;
  }
  const store = new ProcessedUrlStore(filePath);
  await store.load();
  return store;
}

export function finishRun(report: RunReport): void {
  printSummary(report);
  if (report.total === 0) {
    console.log('No links to summarize.');
  }
}
