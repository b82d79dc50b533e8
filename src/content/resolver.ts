/**
 * Content Resolver
 *
 * Wraps an extractor so that a failing page never aborts the batch
 */

import { logger } from '../utils/logger.js';
import { success, failure, errorMessage, type Result } from '../utils/result.js';

export type Extractor = (url: string) => Promise<string | null>;

export interface ContentResolver {
  /** Resolve to text or the reason nothing could be extracted */
  tryResolve(url: string): Promise<Result<string>>;
  /** Resolve to text, or "" on any failure */
  resolve(url: string): Promise<string>;
}

export function createContentResolver(extract: Extractor): ContentResolver {
  const tryResolve = async (url: string): Promise<Result<string>> => {
    try {
      const text = await extract(url);
      if (text === null || text.trim() === '') {
        return failure('no content extracted');
      }
      return success(text);
    } catch (error) {
      return failure(errorMessage(error));
    }
  };

  const resolve = async (url: string): Promise<string> => {
    const result = await tryResolve(url);
    if (!result.ok) {
      logger.error({ url, reason: result.error }, 'Failed to resolve article content');
      return '';
    }
    return result.value;
  };

  return { tryResolve, resolve };
}
