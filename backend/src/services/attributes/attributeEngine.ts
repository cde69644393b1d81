/**
 * Attribute Engine
 * Aggregate → resolve → classify → filter, as one synchronous in-memory pass
 */

import {
  MessageColumn,
  ResolutionMode,
  type CoarseObservation,
  type EntityRef,
  type FilterValues,
  type FineObservation,
  type ResolvedRecord,
} from '@send-attributes/shared';
import type { AttributeDescriptor } from './attributeDescriptors.js';
import { aggregateCandidates } from './candidateAggregator.js';
import { resolveValue } from './attributeResolver.js';
import { classifyUncertainty } from './uncertaintyClassifier.js';
import { filterRecords, type SetFilterOptions } from './setFilterEngine.js';
import { ValueSet, normalizeValue } from './valueSet.js';

export interface EngineInput {
  descriptor: AttributeDescriptor;
  entities: readonly EntityRef[];
  fineObservations: readonly FineObservation[];
  coarseObservations: readonly CoarseObservation[];
  // Reference vocabulary; records are classified only when it is given
  vocabulary: ReadonlySet<string> | null;
}

export interface FilterRequest extends SetFilterOptions {
  targetValues: readonly string[];
}

/**
 * Trimmed, non-empty filter values; an empty result means no filtering
 */
export function normalizeFilterValues(filter: FilterValues): string[] {
  if (filter === null || filter === undefined) {
    return [];
  }
  const values = typeof filter === 'string' ? [filter] : filter;
  return values
    .map((value) => normalizeValue(value))
    .filter((value): value is string => value !== null);
}

/**
 * Message column reported for a call, if any
 */
export function selectMessageColumn(
  filtering: boolean,
  inclUncertain: boolean,
  noFilterReportUncertain: boolean
): MessageColumn | null {
  if (filtering && inclUncertain) {
    return MessageColumn.UNCERTAIN;
  }
  if (!filtering && noFilterReportUncertain) {
    return MessageColumn.NOT_VALID;
  }
  return null;
}

export function resolveRecords(input: EngineInput): ResolvedRecord[] {
  const { descriptor, vocabulary } = input;
  // Study-level attributes have no animal-level source
  const fineObservations =
    descriptor.mode === ResolutionMode.GROUP_LEVEL_ONLY ? [] : input.fineObservations;
  const referenceValues = vocabulary ? new ValueSet(vocabulary) : null;

  return aggregateCandidates(input.entities, fineObservations, input.coarseObservations).map(
    (candidates) => {
      const resolution = resolveValue(candidates);
      return {
        groupKey: candidates.groupKey,
        entityKey: candidates.entityKey,
        value: resolution.value,
        reason: referenceValues
          ? classifyUncertainty(candidates, resolution, referenceValues, descriptor)
          : null,
        fineValues: candidates.fineValues.values(),
        coarseValues: candidates.coarseValues.values(),
      };
    }
  );
}

/**
 * Study-level attributes filtered non-exclusively match a study on any of its
 * values: an unresolved study takes its first value found in the target set.
 */
function matchAnyGroupValue(records: readonly ResolvedRecord[], target: ValueSet): ResolvedRecord[] {
  return records.map((record) => {
    if (record.value !== null) {
      return record;
    }
    const matched = record.coarseValues.find((value) => target.has(value));
    return matched === undefined ? record : { ...record, value: matched };
  });
}

/**
 * Resolve every entity and, when a filter is given, select by target values
 */
export function runAttributeEngine(
  input: EngineInput,
  filter: FilterRequest | null
): ResolvedRecord[] {
  const records = resolveRecords(input);
  if (!filter || filter.targetValues.length === 0) {
    return records;
  }
  const target = new ValueSet(filter.targetValues);
  const candidates =
    input.descriptor.mode === ResolutionMode.GROUP_LEVEL_ONLY && !filter.exclusively
      ? matchAnyGroupValue(records, target)
      : records;
  return filterRecords(candidates, target, filter);
}
