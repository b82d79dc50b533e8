/**
 * Filter Module
 *
 * Scope filtering and URL deduplication
 */

export {
  isInScope,
  filterInScope,
  isWithinWindow,
  matchesCategory,
  matchesKeywords,
  containsWholeWord,
  normalizeText,
} from './scope.js';

export { dedupeByUrl, type DeduplicationResult } from './dedup.js';
