/**
 * Controlled Terminology Service
 * Looks up CDISC codelist submission values loaded into the SEND data store
 */

import { getConfig } from '../../lib/config.js';
import { query as defaultQuery, type QueryFn } from '../../lib/database/sendDatabase.js';
import { VocabularyNotFoundError } from '../../lib/errors.js';
import { createLogger } from '../../lib/logger.js';

const log = createLogger('controlled-terminology');

export interface VocabularyProvider {
  /**
   * Upper-cased submission values of a codelist
   */
  lookupReferenceValues(codelist: string): Promise<ReadonlySet<string>>;
}

type CodelistValueRow = {
  value: string;
};

// Latest loaded CT version unless one is pinned
const CODELIST_VALUES_SQL = `
  SELECT DISTINCT UPPER(cdisc_submission_value) AS value
    FROM cdisc_ct
   WHERE codelist = $1
     AND ct_version = COALESCE(
           $2::text,
           (SELECT MAX(ct_version) FROM cdisc_ct WHERE codelist = $1)
         )
`;

export class ControlledTerminologyService implements VocabularyProvider {
  private readonly cache = new Map<string, ReadonlySet<string>>();

  constructor(
    private readonly runQuery: QueryFn = defaultQuery,
    private readonly ctVersion: string | null = getConfig().CT_VERSION ?? null
  ) {}

  async lookupReferenceValues(codelist: string): Promise<ReadonlySet<string>> {
    const key = codelist.toUpperCase();
    const cached = this.cache.get(key);
    if (cached) {
      return cached;
    }

    const result = await this.runQuery<CodelistValueRow>(CODELIST_VALUES_SQL, [
      key,
      this.ctVersion,
    ]);

    if (result.rows.length === 0) {
      throw new VocabularyNotFoundError(key, this.ctVersion ?? undefined);
    }

    const values = new Set(result.rows.map((row) => row.value));
    this.cache.set(key, values);

    log.debug({ codelist: key, ctVersion: this.ctVersion, values: values.size }, 'Codelist loaded');

    return values;
  }
}
