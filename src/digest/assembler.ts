/**
 * Digest Assembler
 *
 * Merges every source's summarized items into one ordered list
 */

import { dedupeByUrl } from '../filter/dedup.js';
import type { CandidateItem, DigestEntry } from '../types/index.js';

export interface AssembleOptions {
  dedupeAcrossSources: boolean;
}

export function toDigestEntry(item: CandidateItem): DigestEntry {
  return {
    title: item.title,
    url: item.url,
    summary: item.summary,
    publishedAt: item.publishedAt,
    sourceTag: item.sourceTag,
  };
}

/**
 * Concatenate batches in source order
 */
export function assembleDigest(
  batches: readonly CandidateItem[][],
  options: AssembleOptions
): { entries: DigestEntry[]; duplicates: number } {
  const all = batches.flat();

  if (!options.dedupeAcrossSources) {
    return { entries: all.map(toDigestEntry), duplicates: 0 };
  }

  const { unique, duplicates } = dedupeByUrl(all);
  return { entries: unique.map(toDigestEntry), duplicates: duplicates.length };
}
