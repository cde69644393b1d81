/**
 * Uncertainty Classifier
 * Explains why an attribute value is missing, ambiguous, invalid or conflicting
 */

import { ResolutionMode } from '@send-attributes/shared';
import {
  type AttributeDescriptor,
  coarseSourceLabel,
  fineSourceLabel,
  missingFineRowsLabel,
} from './attributeDescriptors.js';
import type { AttributeCandidates } from './candidateAggregator.js';
import type { Resolution } from './attributeResolver.js';
import type { ValueSet } from './valueSet.js';

const CONDITION_SEPARATOR = ' & ';

/**
 * Classify one entity against the reference vocabulary.
 *
 * Applicable conditions are reported in a fixed order: unresolved, invalid,
 * mismatch. Returns null when none applies.
 */
export function classifyUncertainty(
  candidates: AttributeCandidates,
  resolution: Resolution,
  vocabulary: ValueSet,
  descriptor: AttributeDescriptor
): string | null {
  const fine = fineSourceLabel(descriptor);
  const coarse = coarseSourceLabel(descriptor);
  const missingFine = missingFineRowsLabel(descriptor);
  const groupLevelOnly = descriptor.mode === ResolutionMode.GROUP_LEVEL_ONLY;
  const fineCount = candidates.fineValues.size;
  const coarseCount = candidates.coarseValues.size;
  const conditions: string[] = [];

  if (resolution.value === null) {
    if (fineCount > 1) {
      conditions.push(`Multiple values for ${fine} found`);
    } else if (fineCount === 0 && coarseCount > 1) {
      conditions.push(
        groupLevelOnly
          ? `Multiple TS parameters ${descriptor.tsParameter} found`
          : `Multiple TS parameters ${descriptor.tsParameter} found and ${missingFine} are missing`
      );
    } else if (fineCount === 0 && coarseCount === 0) {
      conditions.push(
        groupLevelOnly
          ? `${coarse} is missing`
          : `TS parameters ${descriptor.tsParameter} and ${missingFine} are missing`
      );
    }
  } else if (!vocabulary.has(resolution.value)) {
    const source = resolution.source === 'fine' ? fine : coarse;
    conditions.push(`${source} does not contain a valid CT value`);
  }

  if (fineCount > 0 && coarseCount > 0 && !candidates.fineValues.isSubsetOf(candidates.coarseValues)) {
    conditions.push(`Mismatch in values of ${coarse} and ${fine}`);
  }

  if (conditions.length === 0) {
    return null;
  }
  return `${descriptor.attribute}: ${conditions.join(CONDITION_SEPARATOR)}`;
}
