/**
 * Summary Cache
 *
 * Content-addressed store of summaries keyed by the MD5 of the URL.
 * Entries live at <root>/<first two hex chars>/<key>_summary.txt and are
 * never invalidated.
 */

import crypto from 'node:crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { CacheIoError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export interface SummaryCache {
  keyFor(url: string): string;
  get(key: string): Promise<string | undefined>;
  put(key: string, value: string): Promise<void>;
}

/**
 * 128-bit hex digest of the URL's UTF-8 bytes, stable across processes
 */
export function cacheKeyFor(url: string): string {
  return crypto.createHash('md5').update(url, 'utf8').digest('hex');
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class FsSummaryCache implements SummaryCache {
  constructor(private readonly root: string) {}

  keyFor(url: string): string {
    return cacheKeyFor(url);
  }

  /**
   * Path of the entry file for a key
   */
  entryPath(key: string): string {
    return path.join(this.root, key.slice(0, 2), `${key}_summary.txt`);
  }

  async get(key: string): Promise<string | undefined> {
    const file = this.entryPath(key);
    try {
      return await readFile(file, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw new CacheIoError('read', file, error);
    }
  }

  /**
   * Write to a temp file beside the entry, then rename over it
   */
  async put(key: string, value: string): Promise<void> {
    const file = this.entryPath(key);
    const temp = `${file}.${process.pid}.${crypto.randomBytes(4).toString('hex')}.tmp`;
    try {
      await mkdir(path.dirname(file), { recursive: true });
      await writeFile(temp, value, 'utf-8');
      await rename(temp, file);
    } catch (error) {
      await rm(temp, { force: true }).catch((cleanupError: unknown) => {
        logger.warn({ error: cleanupError, temp }, 'Failed to remove temporary cache file');
      });
      throw new CacheIoError('write', file, error);
    }
  }
}

/**
 * In-memory cache with the same key derivation
 */
export class MemorySummaryCache implements SummaryCache {
  private readonly entries = new Map<string, string>();

  keyFor(url: string): string {
    return cacheKeyFor(url);
  }

  async get(key: string): Promise<string | undefined> {
    return this.entries.get(key);
  }

  async put(key: string, value: string): Promise<void> {
    this.entries.set(key, value);
  }

  get size(): number {
    return this.entries.size;
  }
}
