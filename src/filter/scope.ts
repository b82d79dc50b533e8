/**
 * Scope Filter
 *
 * Recency window, category and keyword predicates for candidate items
 */

import type { CandidateItem, ScopeCriteria } from '../types/index.js';

/**
 * Normalize text for matching (lowercase, remove accents)
 */
export function normalizeText(text: string): string {
  return text
    .toLowerCase()
    .normalize('NFD')
    .replace(/[\u0300-\u036f]/g, '');
}

/**
 * Escape regex special characters
 */
function escapeRegex(str: string): string {
  return str.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Whole-word, case and accent insensitive containment
 */
export function containsWholeWord(text: string, keyword: string): boolean {
  const normalizedKeyword = normalizeText(keyword.trim());
  if (normalizedKeyword.length === 0) {
    return false;
  }

  // Lookarounds instead of \b so keywords like "c++" or ".net" still anchor
  const regex = new RegExp(
    `(?<![\\p{L}\\p{N}_])${escapeRegex(normalizedKeyword)}(?![\\p{L}\\p{N}_])`,
    'u'
  );
  return regex.test(normalizeText(text));
}

export function isWithinWindow(item: CandidateItem, now: Date, windowMs: number): boolean {
  const publishedAt = item.publishedAt ?? now;
  return Math.abs(now.getTime() - publishedAt.getTime()) <= windowMs;
}

/**
 * Items declaring no categories pass any category filter
 */
export function matchesCategory(item: CandidateItem, category: string | undefined): boolean {
  if (!category || item.categories.length === 0) {
    return true;
  }
  const wanted = category.trim().toLowerCase();
  return item.categories.some((declared) => declared.trim().toLowerCase() === wanted);
}

/**
 * Keywords are matched against the excerpt, never the title
 */
export function matchesKeywords(item: CandidateItem, keywords: readonly string[] | undefined): boolean {
  if (!keywords || keywords.length === 0) {
    return true;
  }
  return keywords.some((keyword) => containsWholeWord(item.excerpt, keyword));
}

export function isInScope(item: CandidateItem, now: Date, criteria: ScopeCriteria): boolean {
  return (
    isWithinWindow(item, now, criteria.windowMs) &&
    matchesCategory(item, criteria.category) &&
    matchesKeywords(item, criteria.keywords)
  );
}

/**
 * Split items into those in scope and those rejected
 */
export function filterInScope(
  items: CandidateItem[],
  now: Date,
  criteria: ScopeCriteria
): { kept: CandidateItem[]; rejected: CandidateItem[] } {
  const kept: CandidateItem[] = [];
  const rejected: CandidateItem[] = [];

  for (const item of items) {
    if (isInScope(item, now, criteria)) {
      kept.push(item);
    } else {
      rejected.push(item);
    }
  }

  return { kept, rejected };
}
