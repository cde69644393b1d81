/**
 * Candidate Aggregator
 * Collects the distinct animal-level and study-level candidate values per entity
 */

import type { CoarseObservation, EntityRef, FineObservation } from '@send-attributes/shared';
import { ValueSet } from './valueSet.js';

export interface AttributeCandidates extends EntityRef {
  fineValues: ValueSet;
  coarseValues: ValueSet;
}

/**
 * Composite key of an entity within its group
 */
export function entityId(ref: EntityRef): string {
  return `${ref.groupKey}\u0000${ref.entityKey}`;
}

/**
 * Aggregate candidate values for every distinct entity in the list.
 *
 * Observations for entities or groups outside the list are ignored. Study-level
 * values are shared by all entities of the study; entities without any
 * observation get empty candidate sets.
 */
export function aggregateCandidates(
  entities: readonly EntityRef[],
  fineObservations: readonly FineObservation[],
  coarseObservations: readonly CoarseObservation[]
): AttributeCandidates[] {
  const groupKeys = new Set(entities.map((e) => e.groupKey));

  const coarseByGroup = new Map<string, ValueSet>();
  for (const group of groupKeys) {
    coarseByGroup.set(group, new ValueSet());
  }
  for (const observation of coarseObservations) {
    coarseByGroup.get(observation.groupKey)?.add(observation.value);
  }

  const candidates = new Map<string, AttributeCandidates>();
  for (const entity of entities) {
    const id = entityId(entity);
    if (candidates.has(id)) {
      continue;
    }
    candidates.set(id, {
      groupKey: entity.groupKey,
      entityKey: entity.entityKey,
      fineValues: new ValueSet(),
      coarseValues: coarseByGroup.get(entity.groupKey) ?? new ValueSet(),
    });
  }

  for (const observation of fineObservations) {
    candidates.get(entityId(observation))?.fineValues.add(observation.value);
  }

  return [...candidates.values()];
}
