/**
 * Classifier
 *
 * Operation kind from the leading keyword, target table from the first
 * matching clause pattern.
 */

import type { OperationType } from '../types.js';
import { bracketDepthAt } from '../scanner/literals.js';

const OPERATION_BY_KEYWORD: Readonly<Record<string, OperationType>> = {
  SELECT: 'Select',
  INSERT: 'Insert',
  UPDATE: 'Update',
  DELETE: 'Delete',
  CREATE: 'DDL',
  ALTER: 'DDL',
  DROP: 'DDL',
  EXEC: 'StoredProcedure',
  EXECUTE: 'StoredProcedure',
  CALL: 'StoredProcedure',
};

const LEADING_KEYWORD_PATTERN = /^[(\s]*([A-Z]+)\b/;

// Tried in order; the first clause found names the table. Quotes and a schema
// prefix are allowed. `:placeholder` targets are captured too, see extractTableName.
const TABLE_PATTERNS: readonly RegExp[] = [
  /\bFROM\s+(?:"?[\w$]+"?\.)?"?(:?[A-Za-z_][\w$]*)"?/gi,
  /\bINTO\s+(?:"?[\w$]+"?\.)?"?(:?[A-Za-z_][\w$]*)"?/gi,
  /\bUPDATE\s+(?:OR\s+INSERT\s+INTO\s+)?(?:"?[\w$]+"?\.)?"?(:?[A-Za-z_][\w$]*)"?/gi,
  /\bDELETE\s+FROM\s+(?:"?[\w$]+"?\.)?"?(:?[A-Za-z_][\w$]*)"?/gi,
  /\bSET\s+GENERATOR\s+"?(:?[A-Za-z_][\w$]*)"?\s+TO\b/gi,
  /\bTABLE\s+"?(:?[A-Za-z_][\w$]*)"?/gi,
  /\bON\s+"?(:?[A-Za-z_][\w$]*)"?\s*\(/gi,
];

export function classifyOperation(sql: string): OperationType {
  const keyword = LEADING_KEYWORD_PATTERN.exec(sql.trim().toUpperCase())?.[1];
  if (!keyword) return 'Unknown';
  return OPERATION_BY_KEYWORD[keyword] ?? 'Unknown';
}

/**
 * Upper-cased target table, or undefined when no clause names one.
 *
 * A top-level placeholder target (`FROM :Table`) ends the search, so a
 * subquery's FROM later on is never reported in its place. Placeholders
 * inside brackets, as in `EXTRACT(YEAR FROM :D)`, are skipped.
 */
export function extractTableName(sql: string): string | undefined {
  for (const pattern of TABLE_PATTERNS) {
    for (const match of sql.matchAll(pattern)) {
      const table = match[1];
      if (!table) continue;
      if (!table.startsWith(':')) return table.toUpperCase();
      if (bracketDepthAt(sql, match.index ?? 0) === 0) return undefined;
    }
  }
  return undefined;
}
