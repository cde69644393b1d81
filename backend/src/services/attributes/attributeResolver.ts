/**
 * Attribute Resolver
 * Picks one value per entity: a single animal-level value wins, then a single
 * study-level value; anything else stays unresolved
 */

import type { AttributeCandidates } from './candidateAggregator.js';

export type ResolutionSource = 'fine' | 'coarse';

export interface Resolution {
  value: string | null;
  source: ResolutionSource | null;
}

export function resolveValue(candidates: AttributeCandidates): Resolution {
  const fineCount = candidates.fineValues.size;
  const coarseCount = candidates.coarseValues.size;

  if (fineCount === 1) {
    return { value: candidates.fineValues.single(), source: 'fine' };
  }
  if (fineCount === 0 && coarseCount === 1) {
    return { value: candidates.coarseValues.single(), source: 'coarse' };
  }
  return { value: null, source: null };
}
