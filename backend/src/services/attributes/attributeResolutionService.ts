/**
 * Attribute Resolution Service
 * Resolves, reports and filters SEND attributes for lists of animals or studies
 */

import {
  ResolutionMode,
  type AnimalRow,
  type FilterValues,
  type MessageColumn,
  type MessageColumns,
  type StudyRow,
} from '@send-attributes/shared';
import { createLogger } from '../../lib/logger.js';
import { ControlledTerminologyService, type VocabularyProvider } from '../send/controlledTerminology.js';
import { PgSendDataRepository, type SendDataRepository } from '../send/sendDataRepository.js';
import {
  ROUTE_ATTRIBUTE,
  STUDY_DESIGN_ATTRIBUTE,
  type AttributeDescriptor,
} from './attributeDescriptors.js';
import {
  normalizeFilterValues,
  runAttributeEngine,
  selectMessageColumn,
} from './attributeEngine.js';
import {
  animalRowSchema,
  assertRows,
  entityAttributeOptionsSchema,
  groupAttributeOptionsSchema,
  parseInput,
  studyRowSchema,
  type EntityAttributeOptions,
  type GroupAttributeOptions,
} from './inputValidation.js';
import { mergeResults, type MergedResult } from './resultMerger.js';
import { shapeResult } from './resultShaper.js';

const log = createLogger('attribute-resolution');

export interface AttributeResult<T extends StudyRow> {
  rows: MergedResult<T>[];
  messageColumn: MessageColumn | null;
}

export type SubjectRouteRow<T extends AnimalRow> = T & { ROUTE: string | null } & MessageColumns;
export type StudyDesignRow<T extends StudyRow> = T & { SDESIGN: string | null } & MessageColumns;

export interface SubjectRouteOptions {
  // Route(s) of administration to select; empty means no filtering
  routeFilter?: FilterValues;
  inclUncertain?: boolean;
  exclusively?: boolean;
  matchAll?: boolean;
  noFilterReportUncertain?: boolean;
}

export interface StudyDesignOptions {
  // Study design(s) to select; empty means no filtering
  studyDesignFilter?: FilterValues;
  exclusively?: boolean;
  inclUncertain?: boolean;
  noFilterReportUncertain?: boolean;
}

function assertMode(descriptor: AttributeDescriptor, mode: ResolutionMode): void {
  if (descriptor.mode !== mode) {
    throw new Error(`Attribute ${descriptor.attribute} cannot be resolved in ${mode} mode`);
  }
}

export class AttributeResolutionService {
  constructor(
    private readonly repository: SendDataRepository,
    private readonly vocabularyProvider: VocabularyProvider
  ) {}

  /**
   * Attach the resolved attribute to each animal and optionally filter by it.
   *
   * Without filter values every animal is returned with its value (or null)
   * and, when requested, a NOT_VALID_MSG reason. With filter values only the
   * selected animals are returned, plus uncertain animals with UNCERTAIN_MSG
   * when inclUncertain is set.
   */
  async resolveAndFilterEntityAttribute<T extends AnimalRow>(
    descriptor: AttributeDescriptor,
    entityList: readonly T[],
    options: EntityAttributeOptions = {}
  ): Promise<AttributeResult<T>> {
    assertMode(descriptor, ResolutionMode.ENTITY_AND_GROUP_LEVEL);
    assertRows(animalRowSchema, entityList, 'entity list');
    const parsed = parseInput(entityAttributeOptionsSchema, options, `${descriptor.attribute} options`);

    const targetValues = normalizeFilterValues(parsed.filter);
    const filtering = targetValues.length > 0;
    const messageColumn = selectMessageColumn(
      filtering,
      parsed.inclUncertain,
      parsed.noFilterReportUncertain
    );
    const studyIds = [...new Set(entityList.map((row) => row.STUDYID))];

    const [fineObservations, coarseObservations, vocabulary] = await Promise.all([
      this.repository.fetchFineObservations(studyIds),
      this.repository.fetchCoarseObservations(descriptor.tsParameter, studyIds),
      messageColumn ? this.vocabularyProvider.lookupReferenceValues(descriptor.codelist) : null,
    ]);

    const records = runAttributeEngine(
      {
        descriptor,
        entities: entityList.map((row) => ({ groupKey: row.STUDYID, entityKey: row.USUBJID })),
        fineObservations,
        coarseObservations,
        vocabulary,
      },
      filtering
        ? {
            targetValues,
            exclusively: parsed.exclusively,
            matchAll: parsed.matchAll,
            inclUncertain: parsed.inclUncertain,
          }
        : null
    );

    const rows = mergeResults(entityList, records, {
      joinOn: 'entity',
      messageColumn,
      retainAll: !filtering,
    });

    log.debug(
      {
        attribute: descriptor.attribute,
        studies: studyIds.length,
        animals: entityList.length,
        filter: targetValues,
        returned: rows.length,
      },
      'Entity attribute resolved'
    );

    return { rows, messageColumn };
  }

  /**
   * Attach the resolved study-level attribute to each study and optionally
   * filter by it. Without a study list every study in TS is processed.
   */
  async resolveGroupAttribute<T extends StudyRow>(
    descriptor: AttributeDescriptor,
    groupList: readonly T[],
    options?: GroupAttributeOptions
  ): Promise<AttributeResult<T>>;
  async resolveGroupAttribute(
    descriptor: AttributeDescriptor,
    groupList?: null,
    options?: GroupAttributeOptions
  ): Promise<AttributeResult<StudyRow>>;
  async resolveGroupAttribute(
    descriptor: AttributeDescriptor,
    groupList?: readonly StudyRow[] | null,
    options: GroupAttributeOptions = {}
  ): Promise<AttributeResult<StudyRow>> {
    assertMode(descriptor, ResolutionMode.GROUP_LEVEL_ONLY);
    if (groupList) {
      assertRows(studyRowSchema, groupList, 'group list');
    }
    const parsed = parseInput(groupAttributeOptionsSchema, options, `${descriptor.attribute} options`);

    const targetValues = normalizeFilterValues(parsed.filter);
    const filtering = targetValues.length > 0;
    const messageColumn = selectMessageColumn(
      filtering,
      parsed.inclUncertain,
      parsed.noFilterReportUncertain
    );

    const studyIds = groupList
      ? [...new Set(groupList.map((row) => row.STUDYID))]
      : await this.repository.fetchStudyIds();
    const callerRows: readonly StudyRow[] = groupList ?? studyIds.map((STUDYID) => ({ STUDYID }));

    const [coarseObservations, vocabulary] = await Promise.all([
      this.repository.fetchCoarseObservations(descriptor.tsParameter, studyIds),
      messageColumn ? this.vocabularyProvider.lookupReferenceValues(descriptor.codelist) : null,
    ]);

    const records = runAttributeEngine(
      {
        descriptor,
        entities: studyIds.map((studyId) => ({ groupKey: studyId, entityKey: studyId })),
        fineObservations: [],
        coarseObservations,
        vocabulary,
      },
      filtering
        ? {
            targetValues,
            exclusively: parsed.exclusively,
            matchAll: false,
            inclUncertain: parsed.inclUncertain,
          }
        : null
    );

    const rows = mergeResults(callerRows, records, {
      joinOn: 'group',
      messageColumn,
      retainAll: !filtering,
    });

    log.debug(
      {
        attribute: descriptor.attribute,
        studies: studyIds.length,
        filter: targetValues,
        returned: rows.length,
      },
      'Group attribute resolved'
    );

    return { rows, messageColumn };
  }

  /**
   * Route of administration per animal, from EXROUTE or TS parameter ROUTE
   */
  async getSubjectRoute<T extends AnimalRow>(
    animalList: readonly T[],
    options: SubjectRouteOptions = {}
  ): Promise<Array<SubjectRouteRow<T>>> {
    const { routeFilter, ...flags } = options;
    const result = await this.resolveAndFilterEntityAttribute(ROUTE_ATTRIBUTE, animalList, {
      ...flags,
      filter: routeFilter,
    });

    return shapeResult(result.rows, (entry) => ({ ROUTE: entry.value }), result.messageColumn);
  }

  /**
   * Study design per study, from TS parameter SDESIGN
   */
  async getStudyDesign<T extends StudyRow>(
    studyList: readonly T[],
    options?: StudyDesignOptions
  ): Promise<Array<StudyDesignRow<T>>>;
  async getStudyDesign(
    studyList?: null,
    options?: StudyDesignOptions
  ): Promise<Array<StudyDesignRow<StudyRow>>>;
  async getStudyDesign(
    studyList?: readonly StudyRow[] | null,
    options: StudyDesignOptions = {}
  ): Promise<Array<StudyDesignRow<StudyRow>>> {
    const { studyDesignFilter, ...flags } = options;
    const groupOptions: GroupAttributeOptions = { ...flags, filter: studyDesignFilter };
    const result = studyList
      ? await this.resolveGroupAttribute(STUDY_DESIGN_ATTRIBUTE, studyList, groupOptions)
      : await this.resolveGroupAttribute(STUDY_DESIGN_ATTRIBUTE, null, groupOptions);

    return shapeResult(result.rows, (entry) => ({ SDESIGN: entry.value }), result.messageColumn);
  }
}

/**
 * Service bound to the configured SEND database
 */
export function createAttributeResolutionService(): AttributeResolutionService {
  return new AttributeResolutionService(
    new PgSendDataRepository(),
    new ControlledTerminologyService()
  );
}
