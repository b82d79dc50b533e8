/**
 * Source Types
 */

import type { RawHit, ScopeCriteria, SourceTag } from '../types/index.js';

/**
 * One configured source of raw hits
 */
export interface DigestSource {
  name: string;
  tag: SourceTag;
  criteria: ScopeCriteria;
  fetchHits(now: Date): Promise<RawHit[]>;
}
