/**
 * Extractors - recover database operations from Object Pascal units
 *
 * Each extractor handles one stage of the unit pipeline and can be used on
 * its own; `extractOperations` runs them in order.
 */

export { hasDatabaseActivity } from './activity.js';
export { extractQueryVariables, extractQueryComponentTypes, resolveComponentType } from './query-variables.js';
export {
  STATEMENT_RULES,
  extractStatementCandidates,
  sqlTextLiteralRule,
  sqlTextConcatRule,
  sqlAddBlockRule,
  sqlAddConcatRule,
  variableAssignRule,
  directExecuteRule,
  queryValueRule,
} from './statements.js';
export type { ConcatenationResult } from './concatenation.js';
export { parseConcatenation, parseFormatCall, reduceToCoreName, isFormatCall } from './concatenation.js';
export {
  ACCESSOR_TYPES,
  UNTYPED_SOURCE_TYPE,
  extractParameters,
  extractFieldNames,
  inferParameterType,
  parameterKey,
} from './parameters.js';
export { isTransactional, transactionGroupId, groupByTransaction } from './transactions.js';
export { DYNAMIC_SQL_SENTINEL, extractOperations, extractUnit } from './operations.js';
