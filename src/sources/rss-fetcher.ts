/**
 * RSS Feed Fetcher
 *
 * Fetches entries from RSS/Atom feeds
 */

import Parser from 'rss-parser';
import { logger } from '../utils/logger.js';
import type { FeedConfig } from '../config/feeds.js';
import type { FeedEntry, RawHit } from '../types/index.js';
import type { DigestSource } from './types.js';

export interface FeedParserOptions {
  userAgent: string;
  timeoutMs: number;
}

/**
 * Create RSS parser with custom headers
 */
export function createParser(options: FeedParserOptions): Parser {
  return new Parser({
    headers: {
      'User-Agent': options.userAgent,
      Accept: 'application/rss+xml, application/atom+xml, application/xml, text/xml, */*',
    },
    timeout: options.timeoutMs,
  });
}

/**
 * Fetch entries from a single feed
 */
export async function fetchFeedEntries(feed: FeedConfig, parser: Parser): Promise<FeedEntry[]> {
  logger.info({ feed: feed.name, url: feed.url }, 'Fetching RSS feed');

  const result = await parser.parseURL(feed.url);

  logger.info({ feed: feed.name, itemCount: result.items?.length ?? 0 }, 'RSS feed parsed');

  return result.items ?? [];
}

/**
 * Each configured feed is its own source with its own scope criteria
 */
export function createFeedSource(
  feed: FeedConfig,
  parser: Parser,
  windowMs: number
): DigestSource {
  return {
    name: `feed:${feed.name}`,
    tag: 'feed',
    criteria: {
      windowMs,
      category: feed.category,
      keywords: feed.keywords,
    },
    fetchHits: async () => {
      const entries = await fetchFeedEntries(feed, parser);
      return entries.map((hit): RawHit => ({ source: 'feed', hit }));
    },
  };
}
