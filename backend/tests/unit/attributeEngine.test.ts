/**
 * Unit Tests for the Attribute Engine
 * Properties of the full resolve → classify → filter pass
 */

import { describe, it, expect } from 'vitest';
import {
  normalizeFilterValues,
  resolveRecords,
  runAttributeEngine,
  selectMessageColumn,
  type EngineInput,
  type FilterRequest,
} from '../../src/services/attributes/attributeEngine.js';
import {
  ROUTE_ATTRIBUTE,
  STUDY_DESIGN_ATTRIBUTE,
} from '../../src/services/attributes/attributeDescriptors.js';
import { ROUTE_VOCABULARY, animal, coarse, fine, idsOf } from '../fixtures/sendData.js';

// Study S1: A1, A2 animal-level; A3 from TS
// Study S2: B1 subcutaneous, B2 oral
// Study S3: C1 ambiguous, C2 clean, C3 mismatching TS, C4 invalid
// Study S4: D1 with no evidence at all
function routeInput(vocabulary: ReadonlySet<string> | null = ROUTE_VOCABULARY): EngineInput {
  return {
    descriptor: ROUTE_ATTRIBUTE,
    entities: [
      animal('S1', 'A1'),
      animal('S1', 'A2'),
      animal('S1', 'A3'),
      animal('S2', 'B1'),
      animal('S2', 'B2'),
      animal('S3', 'C1'),
      animal('S3', 'C2'),
      animal('S3', 'C3'),
      animal('S3', 'C4'),
      animal('S4', 'D1'),
    ],
    fineObservations: [
      fine('S1', 'A1', 'ORAL'),
      fine('S1', 'A2', 'ORAL GAVAGE'),
      fine('S2', 'B1', 'SUBCUTANEOUS'),
      fine('S2', 'B2', 'ORAL'),
      fine('S3', 'C1', 'ORAL'),
      fine('S3', 'C1', 'INTRAVENOUS'),
      fine('S3', 'C2', 'ORAL'),
      fine('S3', 'C3', 'DERMAL'),
      fine('S3', 'C4', 'ORALLY'),
    ],
    coarseObservations: [coarse('S1', 'ORAL'), coarse('S3', 'ORAL'), coarse('S3', 'ORALLY')],
    vocabulary,
  };
}

function filter(targetValues: string[], flags: Partial<FilterRequest> = {}): FilterRequest {
  return { targetValues, exclusively: false, matchAll: false, inclUncertain: false, ...flags };
}

describe('normalizeFilterValues', () => {
  it('should accept a single value or a list', () => {
    expect(normalizeFilterValues('ORAL')).toEqual(['ORAL']);
    expect(normalizeFilterValues(['ORAL', ' DERMAL '])).toEqual(['ORAL', 'DERMAL']);
  });

  it('should treat absent and blank filters as no filter', () => {
    expect(normalizeFilterValues(null)).toEqual([]);
    expect(normalizeFilterValues(undefined)).toEqual([]);
    expect(normalizeFilterValues('')).toEqual([]);
    expect(normalizeFilterValues(['', '  '])).toEqual([]);
  });
});

describe('selectMessageColumn', () => {
  it('should report UNCERTAIN_MSG when filtering with uncertain animals included', () => {
    expect(selectMessageColumn(true, true, true)).toBe('UNCERTAIN_MSG');
    expect(selectMessageColumn(true, false, true)).toBeNull();
  });

  it('should report NOT_VALID_MSG when not filtering and reporting is on', () => {
    expect(selectMessageColumn(false, true, true)).toBe('NOT_VALID_MSG');
    expect(selectMessageColumn(false, false, false)).toBeNull();
  });
});

describe('resolveRecords', () => {
  it('should resolve animal-level values before study-level values', () => {
    const records = resolveRecords(routeInput());
    const byId = new Map(records.map((r) => [r.entityKey, r.value]));

    expect(byId.get('A1')).toBe('ORAL');
    expect(byId.get('A2')).toBe('ORAL GAVAGE');
    expect(byId.get('A3')).toBe('ORAL');
    expect(byId.get('C1')).toBeNull();
    expect(byId.get('C3')).toBe('DERMAL');
    expect(byId.get('D1')).toBeNull();
  });

  it('should flag exactly the unresolved, invalid and mismatching animals', () => {
    const flagged = resolveRecords(routeInput()).filter((r) => r.reason !== null);

    // A2 mismatches TS ORAL; C2's ORAL is among the TS values of S3
    expect(idsOf(flagged)).toEqual(['A2', 'C1', 'C3', 'C4', 'D1']);
  });

  it('should leave reasons empty when no vocabulary is given', () => {
    const records = resolveRecords(routeInput(null));

    expect(records.every((r) => r.reason === null)).toBe(true);
  });

  it('should expose the candidate values of each record', () => {
    const c1 = resolveRecords(routeInput()).find((r) => r.entityKey === 'C1');

    expect(c1?.fineValues).toEqual(['ORAL', 'INTRAVENOUS']);
    expect(c1?.coarseValues).toEqual(['ORAL', 'ORALLY']);
  });

  it('should ignore animal-level observations for study-level attributes', () => {
    const [study] = resolveRecords({
      descriptor: STUDY_DESIGN_ATTRIBUTE,
      entities: [{ groupKey: 'S1', entityKey: 'S1' }],
      fineObservations: [fine('S1', 'S1', 'CROSSOVER')],
      coarseObservations: [coarse('S1', 'PARALLEL')],
      vocabulary: new Set(['PARALLEL', 'CROSSOVER']),
    });

    expect(study).toEqual({
      groupKey: 'S1',
      entityKey: 'S1',
      value: 'PARALLEL',
      reason: null,
      fineValues: [],
      coarseValues: ['PARALLEL'],
    });
  });
});

describe('runAttributeEngine', () => {
  it('should return every record without a filter', () => {
    expect(runAttributeEngine(routeInput(), null)).toHaveLength(10);
    expect(runAttributeEngine(routeInput(), filter([]))).toHaveLength(10);
  });

  it('should keep a study where animal-level and TS values together cover every target', () => {
    const result = runAttributeEngine(routeInput(), filter(['ORAL', 'ORAL GAVAGE'], { matchAll: true }));

    expect(idsOf(result)).toEqual(['A1', 'A2', 'A3']);
  });

  it('should drop a study exhibiting other routes when filtering exclusively', () => {
    const result = runAttributeEngine(routeInput(), filter(['SUBCUTANEOUS'], { exclusively: true }));

    expect(result).toEqual([]);
  });

  it('should include uncertain animals alongside matches', () => {
    const result = runAttributeEngine(routeInput(), filter(['SUBCUTANEOUS'], { inclUncertain: true }));

    expect(idsOf(result)).toEqual(['A2', 'B1', 'C1', 'C3', 'C4', 'D1']);
  });

  it('should yield identical output for identical input', () => {
    const request = filter(['ORAL'], { exclusively: true, inclUncertain: true });

    expect(runAttributeEngine(routeInput(), request)).toEqual(runAttributeEngine(routeInput(), request));
  });

  it('should never select more animals when filtering exclusively', () => {
    for (const targets of [['ORAL'], ['ORAL', 'ORAL GAVAGE'], ['DERMAL'], ['SUBCUTANEOUS', 'ORAL']]) {
      const loose = runAttributeEngine(routeInput(null), filter(targets));
      const strict = runAttributeEngine(routeInput(null), filter(targets, { exclusively: true }));

      expect(strict.length).toBeLessThanOrEqual(loose.length);
    }
  });

  it('should match a study with several designs on any of them unless filtering exclusively', () => {
    const designInput: EngineInput = {
      descriptor: STUDY_DESIGN_ATTRIBUTE,
      entities: [
        { groupKey: 'S1', entityKey: 'S1' },
        { groupKey: 'S2', entityKey: 'S2' },
      ],
      fineObservations: [],
      coarseObservations: [coarse('S1', 'PARALLEL'), coarse('S2', 'CROSSOVER'), coarse('S2', 'parallel')],
      vocabulary: null,
    };

    const strict = runAttributeEngine(designInput, filter(['PARALLEL'], { exclusively: true }));
    const loose = runAttributeEngine(designInput, filter(['PARALLEL']));

    expect(strict.map((r) => [r.entityKey, r.value])).toEqual([['S1', 'PARALLEL']]);
    expect(loose.map((r) => [r.entityKey, r.value])).toEqual([
      ['S1', 'PARALLEL'],
      ['S2', 'parallel'],
    ]);
  });

  it('should only keep studies covering every target when matching all', () => {
    const targets = ['SUBCUTANEOUS', 'ORAL'];
    const result = runAttributeEngine(routeInput(null), filter(targets, { matchAll: true }));

    expect(idsOf(result)).toEqual(['B1', 'B2']);
    expect(new Set(result.map((r) => r.value))).toEqual(new Set(targets));
  });
});
