/**
 * Social Link Fetcher
 *
 * Reads the newest submissions of each configured subreddit
 */

import { z } from 'zod';
import { logger } from '../utils/logger.js';
import { httpGetJson, type HttpOptions } from '../utils/http.js';
import type { RawHit, SocialSubmission } from '../types/index.js';
import type { DigestSource } from './types.js';

const submissionSchema = z.object({
  id: z.string().optional(),
  title: z.string().nullish(),
  url: z.string().nullish(),
  permalink: z.string().nullish(),
  is_self: z.boolean().optional(),
  created_utc: z.number().nullish(),
  selftext: z.string().nullish(),
  link_flair_text: z.string().nullish(),
});

const listingSchema = z.object({
  data: z.object({
    children: z.array(z.object({ kind: z.string(), data: submissionSchema })),
  }),
});

export interface SocialSourceOptions {
  apiUrl: string;
  subreddits: string[];
  limit: number;
  windowMs: number;
  http: HttpOptions;
}

async function fetchSubreddit(
  options: SocialSourceOptions,
  subreddit: string
): Promise<SocialSubmission[]> {
  const url = `${options.apiUrl}/r/${encodeURIComponent(subreddit)}/new.json?limit=${options.limit}`;
  logger.info({ subreddit, url }, 'Requesting subreddit listing');

  const result = listingSchema.safeParse(await httpGetJson(url, options.http));
  if (!result.success) {
    throw new Error(`Unexpected listing response: ${result.error.message}`);
  }

  return result.data.data.children
    .filter((child) => child.kind === 't3')
    .map((child) => child.data);
}

/**
 * Fetch submissions for every subreddit; a failing subreddit is skipped
 */
export async function fetchSocialHits(options: SocialSourceOptions): Promise<RawHit[]> {
  const hits: RawHit[] = [];

  for (const subreddit of options.subreddits) {
    try {
      const submissions = await fetchSubreddit(options, subreddit);
      logger.debug({ subreddit, count: submissions.length }, 'Subreddit processed');
      hits.push(
        ...submissions.map((hit): RawHit => ({ source: 'social', hit, baseUrl: options.apiUrl }))
      );
    } catch (error) {
      logger.error({ error, subreddit }, 'Error fetching subreddit');
    }
  }

  return hits;
}

export function createSocialSource(options: SocialSourceOptions): DigestSource {
  return {
    name: 'social',
    tag: 'social',
    criteria: { windowMs: options.windowMs },
    fetchHits: () => fetchSocialHits(options),
  };
}
