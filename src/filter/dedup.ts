/**
 * Deduplicator
 *
 * Keeps the first-seen item per URL, in first-seen order
 */

import type { CandidateItem } from '../types/index.js';

export interface DeduplicationResult<T> {
  unique: T[];
  duplicates: T[];
}

export function dedupeByUrl<T extends Pick<CandidateItem, 'url'>>(items: readonly T[]): DeduplicationResult<T> {
  const seen = new Set<string>();
  const unique: T[] = [];
  const duplicates: T[] = [];

  for (const item of items) {
    if (seen.has(item.url)) {
      duplicates.push(item);
      continue;
    }
    seen.add(item.url);
    unique.push(item);
  }

  return { unique, duplicates };
}
