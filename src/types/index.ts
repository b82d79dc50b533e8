/**
 * Core types for the News Digest Aggregator
 */

import type Parser from 'rss-parser';

export type SourceTag = 'search' | 'social' | 'feed';

export interface CandidateItem {
  title: string;
  url: string;
  /** null when the source gave no usable date; treated as current */
  publishedAt: Date | null;
  summary: string;
  sourceTag: SourceTag;
  /** Source-provided description or body text */
  excerpt: string;
  categories: string[];
}

/**
 * Search API hit (Hacker News Algolia)
 */
export interface SearchHit {
  story_id?: number | null;
  objectID?: string;
  title?: string | null;
  url?: string | null;
  created_at?: string | null;
  created_at_i?: number | null;
  story_text?: string | null;
  _tags?: string[];
}

/**
 * Social link API submission (Reddit listing child)
 */
export interface SocialSubmission {
  id?: string;
  title?: string | null;
  url?: string | null;
  permalink?: string | null;
  is_self?: boolean;
  created_utc?: number | null;
  selftext?: string | null;
  link_flair_text?: string | null;
}

export type FeedEntry = Parser.Item & { summary?: string };

export type RawHit =
  | { source: 'search'; hit: SearchHit }
  | { source: 'social'; hit: SocialSubmission; baseUrl?: string }
  | { source: 'feed'; hit: FeedEntry };

export interface ScopeCriteria {
  windowMs: number;
  category?: string;
  keywords?: string[];
}

export interface DigestEntry {
  title: string;
  url: string;
  summary: string;
  publishedAt: Date | null;
  sourceTag: SourceTag;
}

export interface DigestRunResult {
  entries: DigestEntry[];
  stats: DigestRunStats;
}

export interface DigestRunStats {
  sources: number;
  sourceErrors: number;
  fetched: number;
  dropped: number;
  outOfScope: number;
  duplicates: number;
  summarized: number;
  summaryErrors: number;
  durationMs: number;
}
