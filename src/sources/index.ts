/**
 * Sources Module
 *
 * Search, social and feed fetchers plus the normalizer
 */

import { config } from '../config/index.js';
import { loadFeeds } from '../config/feeds.js';
import { loadKeywords } from '../config/keywords.js';
import { logger } from '../utils/logger.js';
import { success, failure, errorMessage, type Result } from '../utils/result.js';
import type { RawHit } from '../types/index.js';
import { createSearchSource } from './search-fetcher.js';
import { createSocialSource } from './social-fetcher.js';
import { createFeedSource, createParser } from './rss-fetcher.js';
import type { DigestSource } from './types.js';

export { normalizeHit, normalizeHits, type DroppedHit } from './normalizer.js';
export { createSearchSource, buildSearchUrl, type SearchSourceOptions } from './search-fetcher.js';
export { createSocialSource, type SocialSourceOptions } from './social-fetcher.js';
export { createFeedSource, createParser, fetchFeedEntries } from './rss-fetcher.js';
export type { DigestSource } from './types.js';

/**
 * Fetch one source's hits; a rejected fetch becomes a failure value
 */
export async function fetchSourceHits(
  source: DigestSource,
  now: Date
): Promise<Result<RawHit[]>> {
  try {
    return success(await source.fetchHits(now));
  } catch (error) {
    return failure(errorMessage(error));
  }
}

/**
 * Build every configured source from application config
 */
export async function createConfiguredSources(): Promise<DigestSource[]> {
  const windowMs = config.digest.windowMs;
  const http = { userAgent: config.http.userAgent, timeoutMs: config.http.timeout };
  const sources: DigestSource[] = [];

  const keywords = await loadKeywords(config.sources.search.keywordsFile);
  if (keywords.length > 0) {
    sources.push(
      createSearchSource({ apiUrl: config.sources.search.apiUrl, keywords, windowMs, http })
    );
  } else {
    logger.warn({ file: config.sources.search.keywordsFile }, 'No search keywords, search source disabled');
  }

  if (config.sources.social.subreddits.length > 0) {
    sources.push(
      createSocialSource({
        apiUrl: config.sources.social.apiUrl,
        subreddits: [...config.sources.social.subreddits],
        limit: config.sources.social.limit,
        windowMs,
        http,
      })
    );
  }

  const feeds = await loadFeeds(config.sources.feeds.file);
  const parser = createParser(http);
  for (const feed of feeds) {
    sources.push(createFeedSource(feed, parser, windowMs));
  }

  logger.info({ sources: sources.map((source) => source.name) }, 'Sources configured');

  return sources;
}
