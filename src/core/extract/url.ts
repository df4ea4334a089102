// src/core/extract/url.ts
import type { Embed, Message } from '../types/index.js';

export const URL_PATTERN = /https?:\/\/[^\s<>"']+/;

export function extractUrlFromText(text: string): string | null {
  const match = URL_PATTERN.exec(text);
  return match ? match[0] : null;
}

function firstEmbedUrl(embeds: Embed[]): string | null {
  return embeds.find((embed) => Boolean(embed.url))?.url ?? null;
}

/**
 * The single candidate URL of a message: the first link in its text, else
 * the first embed URL, else the same lookup on forwarded snapshots.
 */
export function extractUrl(message: Message): string | null {
  const fromMessage = extractUrlFromText(message.content) ?? firstEmbedUrl(message.embeds);
  if (fromMessage) {
    return fromMessage;
  }

  for (const snapshot of message.snapshots) {
    const fromSnapshot = extractUrlFromText(snapshot.content) ?? firstEmbedUrl(snapshot.embeds);
    if (fromSnapshot) {
      return fromSnapshot;
    }
  }

  return null;
}

/**
 * True when the URL's host is one of `domains` or a subdomain of one.
 */
export function matchesDomain(urlString: string, domains: string[]): boolean {
  let hostname: string;
  try {
    hostname = new URL(urlString).hostname.toLowerCase();
  } catch {
    return false;
  }

  return domains.some((domain) => {
    const normalized = domain.toLowerCase().replace(/^\.+/, '');
    return hostname === normalized || hostname.endsWith(`.${normalized}`);
  });
}

export function containsAny(urlString: string, patterns: string[]): boolean {
  return patterns.some((pattern) => urlString.includes(pattern));
}
