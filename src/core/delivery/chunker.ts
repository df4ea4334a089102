// src/core/delivery/chunker.ts
import { MAX_MESSAGE_LENGTH } from '../config/constants.js';

// Discord counts code points, so a surrogate pair is one character
export function textLength(text: string): number {
  return Array.from(text).length;
}

function hardSplit(word: string, limit: number): string[] {
  const chars = Array.from(word);
  const pieces: string[] = [];
  for (let i = 0; i < chars.length; i += limit) {
    pieces.push(chars.slice(i, i + limit).join(''));
  }
  return pieces;
}

/**
 * Splits one over-long line on spaces. A word longer than `limit` is cut
 * by character count.
 */
export function splitLine(line: string, limit: number): string[] {
  const pieces: string[] = [];
  let current = '';

  for (const word of line.split(' ')) {
    if (textLength(word) > limit) {
      if (current) {
        pieces.push(current);
        current = '';
      }
      const parts = hardSplit(word, limit);
      pieces.push(...parts.slice(0, -1));
      current = parts[parts.length - 1];
      continue;
    }

    const candidate = current ? `${current} ${word}` : word;
    if (textLength(candidate) > limit) {
      pieces.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) {
    pieces.push(current);
  }
  return pieces;
}

/**
 * Splits text into chunks of at most `limit` characters, keeping whole
 * lines together where possible, then whole words.
 */
export function splitMessage(text: string, limit: number = MAX_MESSAGE_LENGTH): string[] {
  if (limit <= 0) {
    throw new RangeError(`Chunk limit must be positive, got ${limit}`);
  }
  if (textLength(text) <= limit) {
    return text.trim() === '' ? [] : [text];
  }

  const chunks: string[] = [];
  let buffer: string | null = null;

  const flush = () => {
    if (buffer !== null && buffer.trim() !== '') {
      chunks.push(buffer);
    }
    buffer = null;
  };

  for (const line of text.split('\n')) {
    if (textLength(line) > limit) {
      flush();
      const pieces = splitLine(line, limit);
      chunks.push(...pieces.slice(0, -1));
      buffer = pieces.length > 0 ? pieces[pieces.length - 1] : null;
      continue;
    }

    if (buffer === null) {
      buffer = line;
    } else if (textLength(buffer) + 1 + textLength(line) > limit) {
      flush();
      buffer = line;
    } else {
      buffer = `${buffer}\n${line}`;
    }
  }
  flush();

  return chunks;
}
