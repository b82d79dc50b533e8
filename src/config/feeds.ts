/**
 * Feed list configuration file
 */

import { readFile } from 'node:fs/promises';
import { z } from 'zod';

const feedSchema = z.object({
  name: z.string().min(1),
  url: z.string().url(),
  category: z.string().min(1).optional(),
  keywords: z.array(z.string().min(1)).optional(),
});

const feedsFileSchema = z.object({
  feeds: z.array(feedSchema).default([]),
});

export type FeedConfig = z.infer<typeof feedSchema>;

export function parseFeedsFile(json: string, origin = 'feeds file'): FeedConfig[] {
  const result = feedsFileSchema.safeParse(JSON.parse(json));

  if (!result.success) {
    throw new Error(`Invalid ${origin}:\n${JSON.stringify(result.error.format(), null, 2)}`);
  }

  return result.data.feeds;
}

export async function loadFeeds(path: string): Promise<FeedConfig[]> {
  return parseFeedsFile(await readFile(path, 'utf-8'), path);
}
