/**
 * Activity Detector
 *
 * Gate in front of the statement battery: a method body is scanned for
 * statements only when one of these signals matches it.
 */

import {
  CONNECTION_COMPONENT_PATTERN,
  DIRECT_EXECUTE_LITERAL_PATTERN,
  QUERY_COMPONENT_PATTERN,
  QUERY_VALUE_LITERAL_PATTERN,
  SQL_MUTATION_PATTERN,
  STORED_PROC_COMPONENT_PATTERN,
  TRANSACTION_PATTERN,
  VARIABLE_SQL_LITERAL_PATTERN,
} from '../patterns.js';

const ACTIVITY_SIGNALS: readonly RegExp[] = [
  QUERY_COMPONENT_PATTERN,
  CONNECTION_COMPONENT_PATTERN,
  SQL_MUTATION_PATTERN,
  TRANSACTION_PATTERN,
  STORED_PROC_COMPONENT_PATTERN,
  DIRECT_EXECUTE_LITERAL_PATTERN,
  QUERY_VALUE_LITERAL_PATTERN,
  VARIABLE_SQL_LITERAL_PATTERN,
];

export function hasDatabaseActivity(body: string): boolean {
  return ACTIVITY_SIGNALS.some((pattern) => pattern.test(body));
}
