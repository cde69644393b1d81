/**
 * Unit Tests for the Attribute Resolver
 * Animal-level evidence wins over study-level evidence; ambiguity is never guessed
 */

import { describe, it, expect } from 'vitest';
import { resolveValue } from '../../src/services/attributes/attributeResolver.js';
import type { AttributeCandidates } from '../../src/services/attributes/candidateAggregator.js';
import { ValueSet } from '../../src/services/attributes/valueSet.js';

function candidates(fineValues: string[], coarseValues: string[]): AttributeCandidates {
  return {
    groupKey: 'S1',
    entityKey: 'A1',
    fineValues: new ValueSet(fineValues),
    coarseValues: new ValueSet(coarseValues),
  };
}

describe('resolveValue', () => {
  it('should take a single animal-level value regardless of study-level values', () => {
    expect(resolveValue(candidates(['ORAL GAVAGE'], []))).toEqual({ value: 'ORAL GAVAGE', source: 'fine' });
    expect(resolveValue(candidates(['ORAL GAVAGE'], ['ORAL']))).toEqual({ value: 'ORAL GAVAGE', source: 'fine' });
    expect(resolveValue(candidates(['ORAL GAVAGE'], ['ORAL', 'DERMAL']))).toEqual({
      value: 'ORAL GAVAGE',
      source: 'fine',
    });
  });

  it('should fall back to a single study-level value when no animal-level value exists', () => {
    expect(resolveValue(candidates([], ['SUBCUTANEOUS']))).toEqual({ value: 'SUBCUTANEOUS', source: 'coarse' });
  });

  it('should leave the value unresolved for multiple animal-level values', () => {
    expect(resolveValue(candidates(['ORAL', 'INTRAVENOUS'], ['ORAL']))).toEqual({ value: null, source: null });
  });

  it('should leave the value unresolved for multiple study-level values', () => {
    expect(resolveValue(candidates([], ['ORAL', 'DERMAL']))).toEqual({ value: null, source: null });
  });

  it('should leave the value unresolved when both sources are missing', () => {
    expect(resolveValue(candidates([], []))).toEqual({ value: null, source: null });
  });
});
