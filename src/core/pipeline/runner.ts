// src/core/pipeline/runner.ts
import { DEFAULT_URL_DELAY_MS, MAX_MESSAGE_LENGTH } from '../config/constants.js';
import { describeError } from '../errors.js';
import { logger } from '../logger.js';
import { sleep as defaultSleep, type Sleep } from '../discord/retry.js';
import type { MessageSource } from '../discord/messages.js';
import type { DuplicateDetector } from '../dedupe/detector.js';
import type { Destination } from '../delivery/destination.js';
import { formatSummary, type SummaryEntry } from '../delivery/format.js';
import { extractUrl, matchesDomain } from '../extract/url.js';
import { buildPrompt, isVideoUrl, selectPromptMode } from '../summarize/prompts.js';
import type { Scraper, Summarizer } from '../summarize/types.js';
import type { Message, ProcessingStatus, RunReport, SourceChannel } from '../types/index.js';
import { fail, proceed, skip, statusGroup, type StageOutcome } from './outcome.js';

export interface PipelineDeps {
  messages: MessageSource;
  detector: DuplicateDetector;
  scraper: Scraper;
  summarizer: Summarizer;
  destination: Destination;
}

export interface PipelineOptions {
  messageLimit: number;
  excludedDomains: string[];
  messageLength?: number;
  includeBots?: boolean;
  // Read whole channel histories instead of the recent window
  fullHistory?: boolean;
  // Appends a link to the source message under each summary
  linkOriginalInGuild?: string;
  // Labels summaries with `#channel by author` instead of the channel name
  labelWithAuthor?: boolean;
  urlDelayMs?: number;
  sleep?: Sleep;
}

interface UrlContext {
  source: SourceChannel;
  message: Message;
}

export class SummaryPipeline {
  private readonly statuses = new Map<string, ProcessingStatus>();
  private readonly sleep: Sleep;

  constructor(
    private readonly deps: PipelineDeps,
    private readonly options: PipelineOptions
  ) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  async run(sources: SourceChannel[]): Promise<RunReport> {
    const startTime = Date.now();
    logger.info(`Processing ${sources.length} source channel(s) into ${this.deps.destination.description}`);

    for (const source of sources) {
      const messages = this.options.fullHistory
        ? await this.deps.messages.fetchAll(source.id)
        : await this.deps.messages.fetchRecent(source.id, this.options.messageLimit);

      if (messages.length === 0) {
        logger.info(`No messages found in #${source.name} (${source.id})`);
        continue;
      }
      logger.info(`Fetched ${messages.length} messages from #${source.name} (${source.id})`);

      // Newest first from the API; summaries go out in chronological order
      for (const message of [...messages].reverse()) {
        if (message.author.isBot && !this.options.includeBots) {
          continue;
        }
        const url = extractUrl(message);
        if (!url) {
          continue;
        }
        await this.processUrl(url, { source, message });
      }
    }

    return this.buildReport(Date.now() - startTime);
  }

  private async processUrl(url: string, context: UrlContext): Promise<ProcessingStatus> {
    logger.info(`Processing ${url} from #${context.source.name}`, { messageId: context.message.id });

    const status = await this.runStages(url, context);
    logger.info(`${statusSymbol(status)} ${url} (${status})`);

    if (!this.statuses.has(url)) {
      this.statuses.set(url, status);
    }
    this.deps.detector.noteSeen(url);

    if (statusGroup(status) !== 'skipped') {
      await this.sleep(this.options.urlDelayMs ?? DEFAULT_URL_DELAY_MS);
    }
    return status;
  }

  private async runStages(url: string, context: UrlContext): Promise<ProcessingStatus> {
    const allowed = this.checkExcluded(url);
    if (allowed.kind !== 'continue') return this.settle(url, allowed);

    const fresh = await this.checkDuplicate(url);
    if (fresh.kind !== 'continue') return this.settle(url, fresh);

    const summary = await this.obtainSummary(url);
    if (summary.kind !== 'continue') return this.settle(url, summary);

    const delivered = await this.deliver(url, summary.value, context);
    if (delivered.kind !== 'continue') return this.settle(url, delivered);

    await this.deps.detector.markProcessed(url);
    return 'summarized-posted';
  }

  private settle(url: string, outcome: Exclude<StageOutcome<unknown>, { kind: 'continue' }>): ProcessingStatus {
    if (outcome.kind === 'fail') {
      logger.warn(`Failed ${url}: ${outcome.reason}. Will retry next run.`);
    }
    return outcome.status;
  }

  private checkExcluded(url: string): StageOutcome<string> {
    return matchesDomain(url, this.options.excludedDomains) ? skip('skipped-platform-excluded') : proceed(url);
  }

  private async checkDuplicate(url: string): Promise<StageOutcome<string>> {
    const duplicate = await this.deps.detector.check(url);
    return duplicate ? skip(duplicate) : proceed(url);
  }

  private async obtainSummary(url: string): Promise<StageOutcome<string>> {
    let summary: string | null;

    if (isVideoUrl(url)) {
      try {
        summary = await this.deps.summarizer.summarizeVideo(url);
      } catch (error) {
        return fail('summary-failed', `video summary failed: ${describeError(error)}`);
      }
    } else {
      let text: string | null;
      try {
        text = await this.deps.scraper.scrape(url);
      } catch (error) {
        return fail('scrape-failed', describeError(error));
      }
      if (!text) {
        return fail('scrape-failed', 'no content scraped');
      }

      logger.debug(`Scraped ${text.length} chars from ${url}`);
      try {
        summary = await this.deps.summarizer.summarize(buildPrompt(selectPromptMode(url), text));
      } catch (error) {
        return fail('summary-failed', describeError(error));
      }
    }

    if (summary === null) {
      return fail('summary-failed', 'summarizer returned nothing');
    }
    const trimmed = summary.trim();
    return trimmed ? proceed(trimmed) : fail('summary-empty', 'summary was empty');
  }

  private async deliver(url: string, summary: string, context: UrlContext): Promise<StageOutcome<number>> {
    const chunks = formatSummary(this.entryFor(url, summary, context), this.options.messageLength ?? MAX_MESSAGE_LENGTH);
    if (chunks.length === 0) {
      return fail('post-failed-formatting', 'nothing to send after formatting');
    }

    const report = await this.deps.destination.deliver(chunks);
    if (!report.ok) {
      const where = report.failedIndex === undefined ? '' : ` at chunk ${report.failedIndex + 1}/${report.total}`;
      return fail(report.failure ?? 'post-failed-chunk', `delivery to ${this.deps.destination.description} failed${where}`);
    }
    return proceed(report.sent);
  }

  private entryFor(url: string, summary: string, { source, message }: UrlContext): SummaryEntry {
    const label = this.options.labelWithAuthor ? `#${source.name} by ${message.author.name}` : source.name;
    const entry: SummaryEntry = { url, label, summary };
    if (this.options.linkOriginalInGuild) {
      const link = `https://discord.com/channels/${this.options.linkOriginalInGuild}/${source.id}/${message.id}`;
      entry.footer = `*Original Message: <${link}>*`;
    }
    return entry;
  }

  private buildReport(durationMs: number): RunReport {
    const report: RunReport = {
      total: this.statuses.size,
      posted: 0,
      skipped: 0,
      failed: 0,
      durationMs,
      statuses: Object.fromEntries(this.statuses),
    };
    for (const status of this.statuses.values()) {
      report[statusGroup(status)]++;
    }
    return report;
  }
}

function statusSymbol(status: ProcessingStatus): string {
  switch (statusGroup(status)) {
    case 'posted':
      return '✓';
    case 'skipped':
      return '⊘';
    case 'failed':
      return '✗';
  }
}

export function printSummary(report: RunReport): void {
  console.log('\n' + '━'.repeat(50));
  console.log(
    `Summary: ${report.posted} posted, ${report.skipped} skipped, ${report.failed} failed, ${(report.durationMs / 1000).toFixed(1)}s`
  );

  const failures = Object.entries(report.statuses).filter(([, status]) => statusGroup(status) === 'failed');
  if (failures.length > 0) {
    console.log('\nFailed URLs:');
    failures.forEach(([url, status]) => {
      console.log(`  - ${url}: ${status}`);
    });
  }
}
