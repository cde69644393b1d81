/**
 * Set Filter Engine
 * Selects resolved records by a target value set, with study-level
 * exclusivity and match-all rules
 */

import type { ResolvedRecord } from '@send-attributes/shared';
import { entityId } from './candidateAggregator.js';
import { ValueSet } from './valueSet.js';

export interface SetFilterOptions {
  // Drop studies exhibiting any resolved value outside the target set
  exclusively: boolean;
  // Keep only studies exhibiting every target value (multi-value targets)
  matchAll: boolean;
  // Add every record carrying an uncertainty reason
  inclUncertain: boolean;
}

/**
 * Distinct resolved values per study
 */
function valuesByGroup(records: readonly ResolvedRecord[]): Map<string, ValueSet> {
  const groups = new Map<string, ValueSet>();
  for (const record of records) {
    let values = groups.get(record.groupKey);
    if (!values) {
      values = new ValueSet();
      groups.set(record.groupKey, values);
    }
    values.add(record.value);
  }
  return groups;
}

export function filterRecords(
  records: readonly ResolvedRecord[],
  target: ValueSet,
  options: SetFilterOptions
): ResolvedRecord[] {
  let selected = records.filter((record) => record.value !== null && target.has(record.value));

  if (options.exclusively) {
    const allValues = valuesByGroup(records);
    const matchedGroups = new Set(selected.map((record) => record.groupKey));
    const disqualified = new Set<string>();

    for (const group of matchedGroups) {
      const outside = allValues.get(group)?.difference(target);
      if (outside && outside.size > 0) {
        disqualified.add(group);
      }
    }
    selected = selected.filter((record) => !disqualified.has(record.groupKey));
  }

  if (options.matchAll && target.size > 1) {
    const matchedValues = valuesByGroup(selected);
    selected = selected.filter(
      (record) => matchedValues.get(record.groupKey)?.size === target.size
    );
  }

  const result = new Map<string, ResolvedRecord>();
  for (const record of selected) {
    result.set(entityId(record), record);
  }

  // Uncertain records are added regardless of the study-level rules above
  if (options.inclUncertain) {
    for (const record of records) {
      if (record.reason !== null) {
        result.set(entityId(record), record);
      }
    }
  }

  return [...result.values()];
}
