/**
 * Search API Fetcher
 *
 * Queries the Hacker News Algolia search API once per keyword
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { httpGetJson, type HttpOptions } from '../utils/http.js';
import type { RawHit, SearchHit } from '../types/index.js';
import type { DigestSource } from './types.js';

const searchHitSchema = z.object({
  story_id: z.number().nullish(),
  objectID: z.string().optional(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  created_at: z.string().nullish(),
  created_at_i: z.number().nullish(),
  story_text: z.string().nullish(),
  _tags: z.array(z.string()).optional(),
});

const searchResponseSchema = z.object({
  hits: z.array(searchHitSchema),
});

export interface SearchSourceOptions {
  apiUrl: string;
  keywords: string[];
  windowMs: number;
  http: HttpOptions;
}

/**
 * Build the search request URL for one keyword
 */
export function buildSearchUrl(apiUrl: string, keyword: string, since: Date): string {
  const timestamp = Math.floor(since.getTime() / 1000);
  const params = [
    `query=${encodeURIComponent(keyword)}`,
    'tags=story',
    'restrictSearchableAttributes=title,story_text',
    'typoTolerance=false',
    `numericFilters=created_at_i>${timestamp}`,
  ];
  return `${apiUrl}?${params.join('&')}`;
}

async function searchKeyword(
  options: SearchSourceOptions,
  keyword: string,
  since: Date
): Promise<SearchHit[]> {
  const url = buildSearchUrl(options.apiUrl, keyword, since);
  logger.info({ keyword, url }, 'Requesting search API');

  const result = searchResponseSchema.safeParse(await httpGetJson(url, options.http));
  if (!result.success) {
    throw new Error(`Unexpected search response: ${result.error.message}`);
  }

  return result.data.hits;
}

/**
 * Fetch hits for every keyword; a failing keyword is skipped
 */
export async function fetchSearchHits(options: SearchSourceOptions, now: Date): Promise<RawHit[]> {
  const since = new Date(now.getTime() - options.windowMs);
  const hits: RawHit[] = [];

  for (const keyword of options.keywords) {
    try {
      const keywordHits = await searchKeyword(options, keyword, since);
      logger.debug({ keyword, count: keywordHits.length }, 'Search keyword processed');
      hits.push(...keywordHits.map((hit): RawHit => ({ source: 'search', hit })));
    } catch (error) {
      logger.error({ error, keyword }, 'Error fetching stories for keyword');
    }
  }

  return hits;
}

export function createSearchSource(options: SearchSourceOptions): DigestSource {
  return {
    name: 'search',
    tag: 'search',
    criteria: { windowMs: options.windowMs },
    fetchHits: (now) => fetchSearchHits(options, now),
  };
}
