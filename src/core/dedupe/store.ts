// src/core/dedupe/store.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { existsSync } from 'fs';
import { z } from 'zod';
import { ErrorCode, LinkDigestError } from '../errors.js';
import { logger } from '../logger.js';

const recordSchema = z.array(z.string());

/**
 * Set of already-summarized URLs kept as a JSON array on disk. Entries are
 * only ever added; the whole file is rewritten after each addition.
 */
export class ProcessedUrlStore {
  private urls = new Set<string>();
  private loaded: boolean = false;

  constructor(readonly filePath: string) {}

  async load(): Promise<void> {
    if (this.loaded) return;

    if (!existsSync(this.filePath)) {
      logger.info(`Processed URLs file (${this.filePath}) not found. Starting fresh.`);
      this.loaded = true;
      return;
    }

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      throw new LinkDigestError(
        ErrorCode.STATE_IO,
        `Failed to read processed URLs from ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        false,
        'Check that the state file is readable',
        { filePath: this.filePath }
      );
    }

    try {
      this.urls = new Set(recordSchema.parse(JSON.parse(content)));
      logger.info(`Loaded ${this.urls.size} processed URLs from ${this.filePath}`);
    } catch (error) {
      logger.warn(`Processed URLs file ${this.filePath} is corrupt, starting fresh`, {
        error: error instanceof Error ? error.message : String(error),
      });
      await this.backupAndRecover();
    }
    this.loaded = true;
  }

  async has(url: string): Promise<boolean> {
    await this.ensureLoaded();
    return this.urls.has(url);
  }

  async add(url: string): Promise<void> {
    await this.ensureLoaded();
    this.urls.add(url);
    await this.save();
  }

  get size(): number {
    return this.urls.size;
  }

  values(): string[] {
    return [...this.urls];
  }

  async save(): Promise<void> {
    const tmpPath = `${this.filePath}.tmp`;
    try {
      await fs.mkdir(path.dirname(path.resolve(this.filePath)), { recursive: true });
      await fs.writeFile(tmpPath, JSON.stringify([...this.urls], null, 2));
      await fs.rename(tmpPath, this.filePath);
    } catch (error) {
      throw new LinkDigestError(
        ErrorCode.STATE_IO,
        `Failed to save processed URLs to ${this.filePath}: ${error instanceof Error ? error.message : String(error)}`,
        false,
        'Check that the state file location is writable',
        { filePath: this.filePath }
      );
    }
  }

  private async ensureLoaded(): Promise<void> {
    if (!this.loaded) {
      await this.load();
    }
  }

  private async backupAndRecover(): Promise<void> {
    const backupPath = this.filePath + '.bak';

    try {
      await fs.rename(this.filePath, backupPath);
      logger.warn(`Moved unreadable state file to ${backupPath}`);
    } catch (error) {
      logger.warn(`Could not back up ${this.filePath}`, {
        error: error instanceof Error ? error.message : String(error),
      });
    }

    this.urls = new Set();
  }
}
