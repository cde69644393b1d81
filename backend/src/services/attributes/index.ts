/**
 * Attribute Resolution Services Index
 * Exports the resolution engine, its stages and the caller-facing service
 */

// Caller-facing service
export {
  AttributeResolutionService,
  createAttributeResolutionService,
  type AttributeResult,
  type SubjectRouteRow,
  type StudyDesignRow,
  type SubjectRouteOptions,
  type StudyDesignOptions,
} from './attributeResolutionService.js';

// Engine
export {
  runAttributeEngine,
  resolveRecords,
  normalizeFilterValues,
  selectMessageColumn,
  type EngineInput,
  type FilterRequest,
} from './attributeEngine.js';

// Attribute descriptors
export {
  ROUTE_ATTRIBUTE,
  STUDY_DESIGN_ATTRIBUTE,
  type AttributeDescriptor,
} from './attributeDescriptors.js';

// Stages
export { aggregateCandidates, entityId, type AttributeCandidates } from './candidateAggregator.js';
export { resolveValue, type Resolution, type ResolutionSource } from './attributeResolver.js';
export { classifyUncertainty } from './uncertaintyClassifier.js';
export { filterRecords, type SetFilterOptions } from './setFilterEngine.js';
export { mergeResults, mergeMessages, type MergedResult, type MergeOptions } from './resultMerger.js';
export { shapeResult } from './resultShaper.js';
export { ValueSet, normalizeValue, valueKey } from './valueSet.js';

// Validation
export {
  type EntityAttributeOptions,
  type GroupAttributeOptions,
} from './inputValidation.js';
