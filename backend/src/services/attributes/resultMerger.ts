/**
 * Result Merger
 * Joins resolved records back onto the caller's rows
 */

import {
  MESSAGE_MERGE_SEPARATOR,
  type MessageColumn,
  type ResolvedRecord,
  type StudyRow,
} from '@send-attributes/shared';
import { entityId } from './candidateAggregator.js';

export type JoinKey = 'entity' | 'group';

export interface MergeOptions {
  // 'entity' joins on STUDYID + USUBJID, 'group' on STUDYID only
  joinOn: JoinKey;
  messageColumn: MessageColumn | null;
  // Keep caller rows with no record, with an unresolved value
  retainAll: boolean;
}

export interface MergedResult<T extends StudyRow> {
  row: T;
  value: string | null;
  message: string | null;
}

function rowKey(row: StudyRow, joinOn: JoinKey): string {
  if (joinOn === 'group') {
    return row.STUDYID;
  }
  return entityId({ groupKey: row.STUDYID, entityKey: String(row['USUBJID']) });
}

function recordKey(record: ResolvedRecord, joinOn: JoinKey): string {
  return joinOn === 'group' ? record.groupKey : entityId(record);
}

function presentMessage(value: unknown): string | null {
  return typeof value === 'string' && value.trim() !== '' ? value : null;
}

/**
 * Append a new message to one the caller already carries
 */
export function mergeMessages(existing: unknown, message: string | null): string | null {
  const parts = [presentMessage(existing), message].filter((part): part is string => part !== null);
  return parts.length > 0 ? parts.join(MESSAGE_MERGE_SEPARATOR) : null;
}

export function mergeResults<T extends StudyRow>(
  rows: readonly T[],
  records: readonly ResolvedRecord[],
  options: MergeOptions
): MergedResult<T>[] {
  const byKey = new Map<string, ResolvedRecord>();
  for (const record of records) {
    byKey.set(recordKey(record, options.joinOn), record);
  }

  const merged: MergedResult<T>[] = [];
  for (const row of rows) {
    const record = byKey.get(rowKey(row, options.joinOn));
    if (!record && !options.retainAll) {
      continue;
    }

    merged.push({
      row,
      value: record?.value ?? null,
      message: options.messageColumn
        ? mergeMessages(row[options.messageColumn], record?.reason ?? null)
        : null,
    });
  }

  return merged;
}
