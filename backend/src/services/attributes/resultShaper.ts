/**
 * Result Shaper
 * Builds output rows: caller columns in caller order, then the attribute
 * column, then the message column
 */

import type { MessageColumn, MessageColumns, StudyRow } from '@send-attributes/shared';
import type { MergedResult } from './resultMerger.js';

function messageFields(column: MessageColumn | null, message: string | null): MessageColumns {
  switch (column) {
    case 'UNCERTAIN_MSG':
      return { UNCERTAIN_MSG: message };
    case 'NOT_VALID_MSG':
      return { NOT_VALID_MSG: message };
    default:
      return {};
  }
}

export function shapeResult<T extends StudyRow, A extends object>(
  merged: readonly MergedResult<T>[],
  attributeColumns: (entry: MergedResult<T>) => A,
  messageColumn: MessageColumn | null
): Array<T & A & MessageColumns> {
  return merged.map((entry) => ({
    ...entry.row,
    ...attributeColumns(entry),
    ...messageFields(messageColumn, entry.message),
  }));
}
