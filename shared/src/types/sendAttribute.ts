/**
 * SEND Attribute Types
 * Rows, observations and resolved records exchanged between the resolution
 * engine and its callers
 */

export const ResolutionMode = {
  ENTITY_AND_GROUP_LEVEL: 'ENTITY_AND_GROUP_LEVEL',
  GROUP_LEVEL_ONLY: 'GROUP_LEVEL_ONLY',
} as const;

export type ResolutionMode = (typeof ResolutionMode)[keyof typeof ResolutionMode];

export const MessageColumn = {
  UNCERTAIN: 'UNCERTAIN_MSG',
  NOT_VALID: 'NOT_VALID_MSG',
} as const;

export type MessageColumn = (typeof MessageColumn)[keyof typeof MessageColumn];

// Separator used when a message column already carries a value from a prior step
export const MESSAGE_MERGE_SEPARATOR = '|';

/**
 * A study row supplied by a caller; any extra columns are carried through
 */
export interface StudyRow {
  STUDYID: string;
  [column: string]: unknown;
}

/**
 * An animal row supplied by a caller
 */
export interface AnimalRow extends StudyRow {
  USUBJID: string;
}

export interface MessageColumns {
  UNCERTAIN_MSG?: string | null;
  NOT_VALID_MSG?: string | null;
}

/**
 * Identity of the subject of resolution. For study-level attributes the
 * entity key equals the group key.
 */
export interface EntityRef {
  groupKey: string;
  entityKey: string;
}

// Attribute value recorded per animal (e.g. EXROUTE)
export interface FineObservation {
  groupKey: string;
  entityKey: string;
  value: string | null;
}

// Attribute value recorded per study (e.g. TS parameter ROUTE)
export interface CoarseObservation {
  groupKey: string;
  value: string | null;
}

export interface ResolvedRecord extends EntityRef {
  value: string | null;
  reason: string | null;
  fineValues: string[];
  coarseValues: string[];
}

export type FilterValues = string | readonly string[] | null | undefined;
