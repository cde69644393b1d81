/**
 * Attribute Descriptors
 * Where each resolvable SEND attribute is recorded and how its sources are named
 */

import { ResolutionMode } from '@send-attributes/shared';

export interface AttributeDescriptor {
  // Output column and message prefix
  attribute: string;
  mode: ResolutionMode;
  // TS parameter holding the study-level value
  tsParameter: string;
  // CDISC CT codelist the value must belong to
  codelist: string;
  // Label of the animal-level source (entity-and-group-level attributes only)
  fineSourceLabel?: string;
  // Domain holding the animal-level rows
  fineSourceDomain?: string;
}

export const ROUTE_ATTRIBUTE: AttributeDescriptor = {
  attribute: 'ROUTE',
  mode: ResolutionMode.ENTITY_AND_GROUP_LEVEL,
  tsParameter: 'ROUTE',
  codelist: 'ROUTE',
  fineSourceLabel: 'EXROUTE',
  fineSourceDomain: 'EX',
};

export const STUDY_DESIGN_ATTRIBUTE: AttributeDescriptor = {
  attribute: 'SDESIGN',
  mode: ResolutionMode.GROUP_LEVEL_ONLY,
  tsParameter: 'SDESIGN',
  codelist: 'DESIGN',
};

export function coarseSourceLabel(descriptor: AttributeDescriptor): string {
  return `TS parameter ${descriptor.tsParameter}`;
}

export function fineSourceLabel(descriptor: AttributeDescriptor): string {
  return descriptor.fineSourceLabel ?? descriptor.attribute;
}

/**
 * Names the absent animal-level rows, e.g. `EX rows with EXROUTE values`
 */
export function missingFineRowsLabel(descriptor: AttributeDescriptor): string {
  const fine = fineSourceLabel(descriptor);
  return descriptor.fineSourceDomain ? `${descriptor.fineSourceDomain} rows with ${fine} values` : fine;
}
