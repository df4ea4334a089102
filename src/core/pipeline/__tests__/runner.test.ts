// src/core/pipeline/__tests__/runner.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import * as os from 'os';
import * as path from 'path';
import { mkdtemp, rm } from 'fs/promises';
import { DiscordClient } from '../../discord/client.js';
import { ChannelDirectory } from '../../discord/directory.js';
import { MessageSource } from '../../discord/messages.js';
import { DuplicateDetector } from '../../dedupe/detector.js';
import { LiveScanner } from '../../dedupe/live-scan.js';
import { ProcessedUrlStore } from '../../dedupe/store.js';
import { DailyThreadResolver } from '../../delivery/daily-thread.js';
import { ChannelDestination, DailyThreadDestination, type Destination } from '../../delivery/destination.js';
import { MessageSender } from '../../delivery/sender.js';
import type { Sleep } from '../../discord/retry.js';
import type { Scraper, Summarizer } from '../../summarize/types.js';
import { SummaryPipeline, type PipelineOptions } from '../runner.js';
import { FAKE_API_BASE, FakeDiscord, rawMessage } from '../../__tests__/helpers/fake-discord.js';

const GUILD = '100';
const SOURCE = { id: '11', name: 'news' };
const SUMMARY_CHANNEL = '300';
const FORUM = '200';

const posted = (url: string, summary = 'A summary.', label = 'news') =>
  `**URL (${label}):** ${url}\n**Summary:**\n${summary}\n\n---`;

describe('SummaryPipeline', () => {
  let dir: string;
  let stateFile: string;
  let discord: FakeDiscord;
  let client: DiscordClient;
  let messages: MessageSource;
  let sender: MessageSender;
  let scraper: { scrape: ReturnType<typeof jest.fn<Scraper['scrape']>> };
  let summarizer: {
    summarize: ReturnType<typeof jest.fn<Summarizer['summarize']>>;
    summarizeVideo: ReturnType<typeof jest.fn<Summarizer['summarizeVideo']>>;
  };
  let sleep: ReturnType<typeof jest.fn<Sleep>>;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'link-digest-pipeline-'));
    stateFile = path.join(dir, 'processed_urls.json');

    discord = new FakeDiscord();
    discord.seed(SUMMARY_CHANNEL);
    discord.seed(FORUM);
    client = new DiscordClient({ token: 'test-token', apiBase: FAKE_API_BASE, fetch: discord.fetch, sleep: async () => {} });
    messages = new MessageSource(client);
    sender = new MessageSender(messages, { sleep: async () => {} });

    scraper = { scrape: jest.fn<Scraper['scrape']>(async (url) => `Page text of ${url}`) };
    summarizer = {
      summarize: jest.fn<Summarizer['summarize']>(async () => 'A summary.'),
      summarizeVideo: jest.fn<Summarizer['summarizeVideo']>(async () => 'Video summary.'),
    };
    sleep = jest.fn<Sleep>(async () => {});
    jest.spyOn(console, 'log').mockImplementation(() => {});
    jest.spyOn(console, 'warn').mockImplementation(() => {});
    jest.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(async () => {
    jest.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  function liveChannelDetector(store?: ProcessedUrlStore): DuplicateDetector {
    const scanner = new LiveScanner(new ChannelDirectory(client), messages);
    return new DuplicateDetector({ store, liveCheck: (url) => scanner.inChannel(SUMMARY_CHANNEL, url, 50) });
  }

  function pipeline(
    detector: DuplicateDetector,
    options: Partial<PipelineOptions> = {},
    destination: Destination = new ChannelDestination(sender, SUMMARY_CHANNEL)
  ): SummaryPipeline {
    return new SummaryPipeline(
      { messages, detector, scraper, summarizer, destination },
      { messageLimit: 50, excludedDomains: ['x.com'], urlDelayMs: 250, sleep, ...options }
    );
  }

  it('summarizes each link oldest first and records it', async () => {
    discord.seed(
      SOURCE.id,
      rawMessage('1', 'first https://example.com/a'),
      rawMessage('2', 'no link here'),
      rawMessage('3', 'then https://example.com/b')
    );
    const store = new ProcessedUrlStore(stateFile);

    const report = await pipeline(liveChannelDetector(store)).run([SOURCE]);

    expect(report).toMatchObject({ total: 2, posted: 2, skipped: 0, failed: 0 });
    expect(discord.postsTo(SUMMARY_CHANNEL)).toEqual([posted('https://example.com/a'), posted('https://example.com/b')]);
    expect(store.values()).toEqual(['https://example.com/a', 'https://example.com/b']);
    expect(summarizer.summarize).toHaveBeenCalledWith(expect.stringContaining('Page text of https://example.com/a'));
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(250);
  });

  it('posts nothing new when run twice over the same messages', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'https://example.com/b'));

    await pipeline(liveChannelDetector(new ProcessedUrlStore(stateFile))).run([SOURCE]);
    const second = await pipeline(liveChannelDetector(new ProcessedUrlStore(stateFile))).run([SOURCE]);

    expect(second).toMatchObject({ total: 2, posted: 0, skipped: 2 });
    expect(second.statuses).toEqual({
      'https://example.com/a': 'duplicate-historical',
      'https://example.com/b': 'duplicate-historical',
    });
    expect(discord.postsTo(SUMMARY_CHANNEL)).toHaveLength(2);
    expect(scraper.scrape).toHaveBeenCalledTimes(2);
  });

  it('short-circuits a recorded URL without scraping, summarizing or posting', async () => {
    const store = new ProcessedUrlStore(stateFile);
    await store.add('https://example.com/a');
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'));

    const report = await pipeline(liveChannelDetector(store)).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://example.com/a': 'duplicate-historical' });
    expect(scraper.scrape).not.toHaveBeenCalled();
    expect(summarizer.summarize).not.toHaveBeenCalled();
    expect(summarizer.summarizeVideo).not.toHaveBeenCalled();
    expect(discord.postsTo(SUMMARY_CHANNEL)).toEqual([]);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('skips a URL already visible in the destination', async () => {
    discord.seed(SUMMARY_CHANNEL, rawMessage('50', posted('https://example.com/a'), { bot: true }));
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'));

    const report = await pipeline(liveChannelDetector()).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://example.com/a': 'duplicate-live' });
    expect(scraper.scrape).not.toHaveBeenCalled();
  });

  it('handles a URL shared twice in one run once', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'again https://example.com/a'));

    const report = await pipeline(new DuplicateDetector()).run([SOURCE]);

    expect(report).toMatchObject({ total: 1, posted: 1 });
    expect(discord.postsTo(SUMMARY_CHANNEL)).toHaveLength(1);
    expect(scraper.scrape).toHaveBeenCalledTimes(1);
  });

  it('does not retry a failed URL later in the same run', async () => {
    scraper.scrape.mockResolvedValueOnce(null);
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'https://example.com/a'));

    const report = await pipeline(new DuplicateDetector()).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://example.com/a': 'scrape-failed' });
    expect(scraper.scrape).toHaveBeenCalledTimes(1);
  });

  it('isolates a failing URL and retries it on the next run', async () => {
    scraper.scrape.mockImplementation(async (url) => (url.endsWith('/a') ? null : `Page text of ${url}`));
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'https://example.com/b'));

    const first = await pipeline(new DuplicateDetector({ store: new ProcessedUrlStore(stateFile) })).run([SOURCE]);

    expect(first.statuses).toEqual({
      'https://example.com/a': 'scrape-failed',
      'https://example.com/b': 'summarized-posted',
    });
    expect(first).toMatchObject({ posted: 1, failed: 1 });

    scraper.scrape.mockImplementation(async (url) => `Page text of ${url}`);
    const second = await pipeline(new DuplicateDetector({ store: new ProcessedUrlStore(stateFile) })).run([SOURCE]);

    expect(second.statuses).toEqual({
      'https://example.com/a': 'summarized-posted',
      'https://example.com/b': 'duplicate-historical',
    });
  });

  it('skips excluded domains before any other work', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://x.com/someone/status/1'));
    const liveCheck = jest.fn(async () => false);

    const report = await pipeline(new DuplicateDetector({ liveCheck })).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://x.com/someone/status/1': 'skipped-platform-excluded' });
    expect(liveCheck).not.toHaveBeenCalled();
    expect(scraper.scrape).not.toHaveBeenCalled();
  });

  it('ignores links posted by bots unless asked', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/bot', { bot: true, username: 'feedbot' }));

    const ignored = await pipeline(new DuplicateDetector()).run([SOURCE]);
    expect(ignored.total).toBe(0);

    const included = await pipeline(new DuplicateDetector(), { includeBots: true }).run([SOURCE]);
    expect(included.statuses).toEqual({ 'https://example.com/bot': 'summarized-posted' });
  });

  it('sends video links straight to the video summarizer', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://www.youtube.com/watch?v=abc'));

    await pipeline(new DuplicateDetector()).run([SOURCE]);

    expect(summarizer.summarizeVideo).toHaveBeenCalledWith('https://www.youtube.com/watch?v=abc');
    expect(scraper.scrape).not.toHaveBeenCalled();
    expect(discord.postsTo(SUMMARY_CHANNEL)).toEqual([posted('https://www.youtube.com/watch?v=abc', 'Video summary.')]);
  });

  it('treats a video summarizer error as a failed summary', async () => {
    summarizer.summarizeVideo.mockRejectedValueOnce(new Error('quota exceeded'));
    discord.seed(SOURCE.id, rawMessage('1', 'https://youtu.be/abc'));

    const report = await pipeline(new DuplicateDetector()).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://youtu.be/abc': 'summary-failed' });
  });

  it('uses the discussion prompt for reddit links', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://www.reddit.com/r/typescript/comments/1'));

    await pipeline(new DuplicateDetector()).run([SOURCE]);

    const [prompt] = summarizer.summarize.mock.calls[0];
    expect(prompt.startsWith('Summarize the key points and main discussion')).toBe(true);
  });

  it('distinguishes missing and blank summaries', async () => {
    summarizer.summarize.mockResolvedValueOnce(null).mockResolvedValueOnce('  \n ');
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'https://example.com/b'));

    const report = await pipeline(new DuplicateDetector()).run([SOURCE]);

    expect(report.statuses).toEqual({
      'https://example.com/a': 'summary-failed',
      'https://example.com/b': 'summary-empty',
    });
    expect(discord.postsTo(SUMMARY_CHANNEL)).toEqual([]);
  });

  it('leaves a URL unrecorded when posting fails', async () => {
    discord.forbiddenChannels.add(SUMMARY_CHANNEL);
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'));
    const store = new ProcessedUrlStore(stateFile);

    const report = await pipeline(new DuplicateDetector({ store })).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://example.com/a': 'post-failed-chunk' });
    expect(store.values()).toEqual([]);
  });

  it('keeps earlier URLs recorded when a later one fails to send', async () => {
    discord.failedMessagePosts.add(2);
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'https://example.com/b'));
    const store = new ProcessedUrlStore(stateFile);

    const report = await pipeline(new DuplicateDetector({ store })).run([SOURCE]);

    expect(report.statuses).toEqual({
      'https://example.com/a': 'summarized-posted',
      'https://example.com/b': 'post-failed-chunk',
    });
    expect(report).toMatchObject({ total: 2, posted: 1, failed: 1 });

    const reopened = new ProcessedUrlStore(stateFile);
    await reopened.load();
    expect(reopened.values()).toEqual(['https://example.com/a']);
  });

  it('leaves a URL unrecorded when a later chunk of its summary fails', async () => {
    const longSummary = Array.from({ length: 30 }, (_, index) => `Point ${index + 1} of a long summary.`).join('\n');
    summarizer.summarize.mockResolvedValueOnce(longSummary);
    discord.failedMessagePosts.add(2);
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'));
    const store = new ProcessedUrlStore(stateFile);

    const report = await pipeline(new DuplicateDetector({ store }), { messageLength: 300 }).run([SOURCE]);

    expect(report.statuses).toEqual({ 'https://example.com/a': 'post-failed-chunk' });
    expect(discord.count('POST', `/channels/${SUMMARY_CHANNEL}/messages`)).toBe(2);
    expect(discord.postsTo(SUMMARY_CHANNEL)[0].endsWith('\n...(continued)\n\n---')).toBe(true);
    expect(store.values()).toEqual([]);
  });

  it('creates one daily thread for several URLs', async () => {
    discord.seed(SOURCE.id, rawMessage('1', 'https://example.com/a'), rawMessage('2', 'https://example.com/b'));
    const resolver = new DailyThreadResolver(new ChannelDirectory(client), messages, {
      guildId: GUILD,
      forumId: FORUM,
      title: 'Summary for 2026-10-18 (Sunday)',
    });

    const report = await pipeline(new DuplicateDetector(), {}, new DailyThreadDestination(sender, resolver)).run([SOURCE]);

    expect(report.posted).toBe(2);
    expect(discord.count('POST', `/channels/${FORUM}/threads`)).toBe(1);
    expect(discord.postsTo('9001')).toEqual([posted('https://example.com/b')]);
  });

  it('labels relayed summaries with the author and links the original message', async () => {
    discord.seed(SOURCE.id, rawMessage('77', 'https://example.com/a', { username: 'bob' }));

    await pipeline(new DuplicateDetector(), { linkOriginalInGuild: GUILD, labelWithAuthor: true }).run([SOURCE]);

    expect(discord.postsTo(SUMMARY_CHANNEL)).toEqual([
      posted(
        'https://example.com/a',
        `A summary.\n\n*Original Message: <https://discord.com/channels/${GUILD}/${SOURCE.id}/77>*`,
        '#news by bob'
      ),
    ]);
  });

  it('reads the whole history when asked', async () => {
    const history = Array.from({ length: 120 }, (_, index) => rawMessage(String(index + 1), `chat ${index + 1}`));
    history[0] = rawMessage('1', 'https://example.com/oldest');
    discord.seed(SOURCE.id, ...history);

    const recent = await pipeline(new DuplicateDetector()).run([SOURCE]);
    expect(recent.total).toBe(0);

    const full = await pipeline(new DuplicateDetector(), { fullHistory: true }).run([SOURCE]);
    expect(full.statuses).toEqual({ 'https://example.com/oldest': 'summarized-posted' });
  });
});
