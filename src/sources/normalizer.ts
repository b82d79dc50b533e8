/**
 * SourceRecord Normalizer
 *
 * Converts each source's raw hit shape into a CandidateItem
 */

import { success, failure, type Result } from '../utils/result.js';
import type {
  CandidateItem,
  FeedEntry,
  RawHit,
  SearchHit,
  SocialSubmission,
} from '../types/index.js';

const DEFAULT_SOCIAL_BASE_URL = 'https://www.reddit.com';

function nonBlank(value: string | null | undefined): string | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse a date string, null when missing or unparseable
 */
function parseDate(value: string | null | undefined): Date | null {
  if (!value) {
    return null;
  }
  const date = new Date(value);
  return isNaN(date.getTime()) ? null : date;
}

function fromEpochSeconds(value: number | null | undefined): Date | null {
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    return null;
  }
  return new Date(value * 1000);
}

function requireFields(
  title: string | undefined,
  url: string | undefined
): Result<{ title: string; url: string }> {
  if (!url) {
    return failure('missing url');
  }
  if (!title) {
    return failure('missing title');
  }
  return success({ title, url });
}

function normalizeSearchHit(hit: SearchHit): Result<CandidateItem> {
  const required = requireFields(nonBlank(hit.title), nonBlank(hit.url));
  if (!required.ok) {
    return required;
  }

  return success({
    ...required.value,
    publishedAt: fromEpochSeconds(hit.created_at_i) ?? parseDate(hit.created_at),
    summary: '',
    sourceTag: 'search',
    excerpt: hit.story_text ?? '',
    categories: [],
  });
}

/**
 * Absolute thread URL, undefined when the permalink does not resolve
 */
function resolvePermalink(permalink: string | undefined, baseUrl: string): string | undefined {
  if (!permalink || !URL.canParse(permalink, baseUrl)) {
    return undefined;
  }
  return new URL(permalink, baseUrl).toString();
}

function normalizeSocialSubmission(hit: SocialSubmission, baseUrl: string): Result<CandidateItem> {
  const threadUrl = resolvePermalink(nonBlank(hit.permalink), baseUrl);
  // Self posts link back to their own thread
  const url = hit.is_self ? (threadUrl ?? nonBlank(hit.url)) : (nonBlank(hit.url) ?? threadUrl);

  const required = requireFields(nonBlank(hit.title), url);
  if (!required.ok) {
    return required;
  }

  const flair = nonBlank(hit.link_flair_text);

  return success({
    ...required.value,
    publishedAt: fromEpochSeconds(hit.created_utc),
    summary: '',
    sourceTag: 'social',
    excerpt: hit.selftext ?? '',
    categories: flair ? [flair] : [],
  });
}

function normalizeFeedEntry(entry: FeedEntry): Result<CandidateItem> {
  const required = requireFields(nonBlank(entry.title), nonBlank(entry.link));
  if (!required.ok) {
    return required;
  }

  const categories = (entry.categories ?? []).filter(
    (category): category is string => typeof category === 'string' && category.trim() !== ''
  );

  return success({
    ...required.value,
    publishedAt: parseDate(entry.isoDate) ?? parseDate(entry.pubDate),
    summary: '',
    sourceTag: 'feed',
    excerpt: entry.contentSnippet ?? entry.summary ?? entry.content ?? '',
    categories: categories.map((category) => category.trim()),
  });
}

/**
 * Normalize a single raw hit; fails only when url or title is missing
 */
export function normalizeHit(raw: RawHit): Result<CandidateItem> {
  switch (raw.source) {
    case 'search':
      return normalizeSearchHit(raw.hit);
    case 'social':
      return normalizeSocialSubmission(raw.hit, raw.baseUrl ?? DEFAULT_SOCIAL_BASE_URL);
    case 'feed':
      return normalizeFeedEntry(raw.hit);
  }
}

export interface DroppedHit {
  raw: RawHit;
  reason: string;
}

/**
 * Normalize a batch, separating malformed hits
 */
export function normalizeHits(raws: RawHit[]): { items: CandidateItem[]; dropped: DroppedHit[] } {
  const items: CandidateItem[] = [];
  const dropped: DroppedHit[] = [];

  for (const raw of raws) {
    const result = normalizeHit(raw);
    if (result.ok) {
      items.push(result.value);
    } else {
      dropped.push({ raw, reason: result.error });
    }
  }

  return { items, dropped };
}
