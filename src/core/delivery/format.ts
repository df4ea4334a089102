// src/core/delivery/format.ts
import { MAX_MESSAGE_LENGTH } from '../config/constants.js';
import { splitMessage, textLength } from './chunker.js';

export interface SummaryEntry {
  url: string;
  label: string;
  summary: string;
  // Appended below the summary body, e.g. a link back to the source message
  footer?: string;
}

export const CONTINUED_MARKER = '\n...(continued)';
export const ENTRY_SEPARATOR = '\n\n---';

// Below this much room per part the URL header itself is the problem
const MIN_BODY_LENGTH = 100;

export function entryHeader(entry: Pick<SummaryEntry, 'url' | 'label'>): string {
  return `**URL (${entry.label}):** ${entry.url}\n**Summary:**\n`;
}

function entryBody(entry: SummaryEntry): string {
  return entry.footer ? `${entry.summary}\n\n${entry.footer}` : entry.summary;
}

/**
 * Formats one summary as one or more messages of at most `limit`
 * characters. An entry too long for one message is split into parts that
 * each repeat the URL header, every part but the last marked as continued.
 */
export function formatSummary(entry: SummaryEntry, limit: number = MAX_MESSAGE_LENGTH): string[] {
  const header = entryHeader(entry);
  const body = entryBody(entry);
  const whole = `${header}${body}\n\n---\n\n`.trim();

  if (textLength(whole) <= limit) {
    return [whole];
  }

  const budget = limit - textLength(header) - textLength(CONTINUED_MARKER) - textLength(ENTRY_SEPARATOR);
  if (budget < MIN_BODY_LENGTH) {
    return splitMessage(whole, limit);
  }

  const parts = splitMessage(body, budget);
  return parts.map((part, index) => {
    const marker = index < parts.length - 1 ? CONTINUED_MARKER : '';
    return `${header}${part}${marker}${ENTRY_SEPARATOR}`;
  });
}
