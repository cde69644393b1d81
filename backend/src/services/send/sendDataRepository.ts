/**
 * SEND Data Repository
 * Reads candidate attribute values from the pooled SEND data store
 */

import type { CoarseObservation, FineObservation } from '@send-attributes/shared';
import { query as defaultQuery, type QueryFn } from '../../lib/database/sendDatabase.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('send-data-repository');

export interface SendDataRepository {
  /**
   * Distinct non-empty EXROUTE values per animal, including pool-level EX
   * rows expanded to the animals of each pool
   */
  fetchFineObservations(studyIds: readonly string[]): Promise<FineObservation[]>;

  /**
   * Distinct non-empty values of a TS parameter per study; all studies when
   * no study ids are given
   */
  fetchCoarseObservations(
    tsParameter: string,
    studyIds?: readonly string[]
  ): Promise<CoarseObservation[]>;

  /**
   * Every study present in TS
   */
  fetchStudyIds(): Promise<string[]>;
}

type ExRouteRow = {
  studyid: string;
  usubjid: string;
  exroute: string | null;
};

type TsValueRow = {
  studyid: string;
  tsval: string | null;
};

type PoolSupportRow = {
  has_pooldef: boolean;
  has_poolid: boolean;
};

const SUBJECT_EXROUTE_SQL = `
  SELECT DISTINCT ex.studyid, ex.usubjid, ex.exroute
    FROM ex
   WHERE ex.studyid = ANY($1)
     AND ex.usubjid IS NOT NULL
     AND ex.usubjid <> ''
     AND ex.exroute IS NOT NULL
     AND ex.exroute <> ''
`;

const POOL_EXROUTE_SQL = `
  SELECT DISTINCT pooldef.studyid, pooldef.usubjid, ex.exroute
    FROM pooldef
    JOIN ex
      ON ex.studyid = pooldef.studyid
     AND ex.poolid = pooldef.poolid
   WHERE pooldef.studyid = ANY($1)
     AND ex.exroute IS NOT NULL
     AND ex.exroute <> ''
`;

const POOL_SUPPORT_SQL = `
  SELECT
    EXISTS (
      SELECT 1 FROM information_schema.tables
       WHERE table_name = 'pooldef'
    ) AS has_pooldef,
    EXISTS (
      SELECT 1 FROM information_schema.columns
       WHERE table_name = 'ex' AND column_name = 'poolid'
    ) AS has_poolid
`;

export class PgSendDataRepository implements SendDataRepository {
  private poolSupport: Promise<boolean> | null = null;

  constructor(private readonly runQuery: QueryFn = defaultQuery) {}

  async fetchFineObservations(studyIds: readonly string[]): Promise<FineObservation[]> {
    if (studyIds.length === 0) {
      return [];
    }

    const sql = (await this.hasPoolLevelExposure())
      ? `${SUBJECT_EXROUTE_SQL} UNION ${POOL_EXROUTE_SQL}`
      : SUBJECT_EXROUTE_SQL;
    const result = await this.runQuery<ExRouteRow>(sql, [[...studyIds]]);

    log.debug({ studies: studyIds.length, rows: result.rows.length }, 'Fetched EXROUTE values');

    return result.rows.map((row) => ({
      groupKey: row.studyid,
      entityKey: row.usubjid,
      value: row.exroute,
    }));
  }

  async fetchCoarseObservations(
    tsParameter: string,
    studyIds?: readonly string[]
  ): Promise<CoarseObservation[]> {
    if (studyIds && studyIds.length === 0) {
      return [];
    }

    const conditions = ['tsparmcd = $1', 'tsval IS NOT NULL', "tsval <> ''"];
    const params: unknown[] = [tsParameter];
    if (studyIds) {
      conditions.push('studyid = ANY($2)');
      params.push([...studyIds]);
    }

    const result = await this.runQuery<TsValueRow>(
      `SELECT DISTINCT studyid, tsval FROM ts WHERE ${conditions.join(' AND ')}`,
      params
    );

    log.debug({ tsParameter, rows: result.rows.length }, 'Fetched TS parameter values');

    return result.rows.map((row) => ({ groupKey: row.studyid, value: row.tsval }));
  }

  async fetchStudyIds(): Promise<string[]> {
    const result = await this.runQuery<{ studyid: string }>(
      'SELECT DISTINCT studyid FROM ts ORDER BY studyid'
    );
    return result.rows.map((row) => row.studyid);
  }

  /**
   * Whether EX carries pool-level rows that POOLDEF can expand (checked once)
   */
  private hasPoolLevelExposure(): Promise<boolean> {
    if (!this.poolSupport) {
      this.poolSupport = this.runQuery<PoolSupportRow>(POOL_SUPPORT_SQL).then(
        (result) => {
          const row = result.rows[0];
          return Boolean(row?.has_pooldef && row.has_poolid);
        },
        (error: unknown) => {
          this.poolSupport = null;
          throw error;
        }
      );
    }
    return this.poolSupport;
  }
}
