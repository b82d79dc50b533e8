/**
 * Cache Module
 */

export {
  FsSummaryCache,
  MemorySummaryCache,
  cacheKeyFor,
  type SummaryCache,
} from './summary-cache.js';
