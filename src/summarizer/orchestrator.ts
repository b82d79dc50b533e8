/**
 * Summarization Orchestrator
 *
 * Content resolver + summary cache + summarizer behind one call. A URL is
 * summarized at most once for the lifetime of the cache.
 */

import type { SummaryCache } from '../cache/summary-cache.js';
import type { ContentResolver } from '../content/resolver.js';
import { SummarizationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { Summarizer } from './summarizer.js';

export interface SummarizeDeps {
  cache: SummaryCache;
  resolver: Pick<ContentResolver, 'resolve'>;
  summarize: Summarizer;
}

export interface SummarizeOptions {
  maxCharacters: number;
  /** Persist "" for URLs with no extractable text so they are never fetched again */
  cacheEmptyExtractions?: boolean;
}

/**
 * Prefix of at most maxCharacters code points
 */
export function truncateText(text: string, maxCharacters: number): string {
  // Code-unit length is an upper bound on code points
  if (text.length <= maxCharacters) {
    return text;
  }
  return Array.from(text).slice(0, maxCharacters).join('');
}

export async function summarizeUrl(
  url: string,
  deps: SummarizeDeps,
  options: SummarizeOptions
): Promise<string> {
  const { cache, resolver, summarize } = deps;
  const key = cache.keyFor(url);

  const cached = await cache.get(key);
  if (cached !== undefined) {
    logger.info({ url, key }, 'Reading summary from cache');
    return cached;
  }

  const text = await resolver.resolve(url);
  if (text === '') {
    if (options.cacheEmptyExtractions) {
      await cache.put(key, '');
    }
    logger.warn({ url }, 'No content to summarize');
    return '';
  }

  const input = truncateText(text, options.maxCharacters);

  let summary: string;
  try {
    summary = await summarize(input);
  } catch (error) {
    throw new SummarizationError(url, error);
  }

  await cache.put(key, summary);
  logger.info({ url, key, summaryLength: summary.length }, 'Summary cached');

  return summary;
}
