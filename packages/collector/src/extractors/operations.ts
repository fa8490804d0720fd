/**
 * Unit pipeline
 *
 * scan -> locate bodies -> activity gate -> statement battery -> normalize
 * -> classify -> parameters -> transaction ids -> refine
 *
 * Never throws on malformed source; anything unrecognized simply yields no
 * operations.
 */

import type {
  DatabaseOperation,
  ExtractionOptions,
  MethodBody,
  OperationType,
  QueryVariableMap,
  RefineStatement,
  SqlParameter,
  StatementCandidate,
  UnitExtraction,
} from '../types.js';
import { countNewlines, stripComments } from '../scanner/comments.js';
import { locateMethodBodies } from '../scanner/method-bodies.js';
import { normalizeSql } from '../sql/normalize.js';
import { classifyOperation, extractTableName } from '../sql/classify.js';
import { debugLog } from '../debug.js';
import { hasDatabaseActivity } from './activity.js';
import { extractQueryComponentTypes, extractQueryVariables, resolveComponentType } from './query-variables.js';
import { extractStatementCandidates } from './statements.js';
import { extractParameters } from './parameters.js';
import { groupByTransaction, isTransactional, transactionGroupId } from './transactions.js';

/** Stored in place of a reconstructed template under `dynamicSql: 'sentinel'` */
export const DYNAMIC_SQL_SENTINEL = 'Dynamic SQL';

interface UnitContext {
  raw: string;
  scanned: string;
  unitName: string;
  variables: QueryVariableMap;
  componentTypes: string[];
  sentinel: boolean;
  quoteReservedWords: boolean;
  refineStatement?: RefineStatement;
}

interface StatementShape {
  sqlStatement: string;
  operationType: OperationType;
  tableName?: string;
  parameters: SqlParameter[];
}

function describeStatement(
  context: UnitContext,
  method: MethodBody,
  candidate: StatementCandidate,
  normalized: string
): StatementShape {
  if (candidate.isDynamic && context.sentinel) {
    return {
      sqlStatement: DYNAMIC_SQL_SENTINEL,
      operationType: 'Unknown',
      parameters: extractParameters(method.body, ''),
    };
  }
  // Only static statements name a table.
  return {
    sqlStatement: normalized,
    operationType: classifyOperation(normalized),
    tableName: candidate.isDynamic ? undefined : extractTableName(normalized),
    parameters: extractParameters(method.body, normalized),
  };
}

/**
 * Apply the refine hook. A hook that throws leaves the statement as it was.
 */
function refine(context: UnitContext, method: MethodBody, shape: StatementShape): string {
  if (!context.refineStatement) return shape.sqlStatement;
  try {
    return context.refineStatement(shape.sqlStatement, {
      unitName: context.unitName,
      containingClass: method.className,
      methodName: method.methodName,
      operationType: shape.operationType,
      tableName: shape.tableName,
      methodBody: method.body,
    });
  } catch (error) {
    debugLog(
      `refine failed for ${context.unitName}.${method.className}.${method.methodName}: ${
        error instanceof Error ? error.message : String(error)
      }`
    );
    return shape.sqlStatement;
  }
}

function methodOperations(context: UnitContext, method: MethodBody, groupId: string | undefined): DatabaseOperation[] {
  const originalSourceText = context.raw.slice(method.headerEnd, method.bodyEnd).trim();
  const seen = new Set<string>();
  const operations: DatabaseOperation[] = [];

  for (const candidate of extractStatementCandidates(method.body)) {
    const normalized = normalizeSql(candidate.text, { quoteReservedWords: context.quoteReservedWords }).trim();
    if (!normalized || seen.has(normalized)) continue;
    seen.add(normalized);

    const shape = describeStatement(context, method, candidate, normalized);
    const operation: DatabaseOperation = {
      methodName: method.methodName,
      containingClass: method.className,
      unitName: context.unitName,
      sqlStatement: refine(context, method, shape),
      operationType: shape.operationType,
      parameters: shape.parameters,
      isPartOfTransaction: groupId !== undefined,
      originalSourceText,
      sourceLineNumber:
        method.startLine + countNewlines(context.scanned, method.headerStart, method.headerEnd + candidate.position),
      isDynamic: candidate.isDynamic,
      componentType: resolveComponentType(context.variables, method.body, candidate.target, context.componentTypes),
      extractor: candidate.rule,
    };
    if (shape.tableName !== undefined) operation.tableName = shape.tableName;
    if (groupId !== undefined) operation.transactionGroupId = groupId;
    operations.push(operation);
  }

  return operations;
}

function createContext(source: string, options: ExtractionOptions, scanned: string): UnitContext {
  return {
    raw: source,
    scanned,
    unitName: options.unitName,
    variables: options.queryVariables ?? extractQueryVariables(scanned),
    componentTypes: extractQueryComponentTypes(scanned),
    sentinel: options.dynamicSql === 'sentinel',
    quoteReservedWords: options.quoteReservedWords ?? true,
    refineStatement: options.refineStatement,
  };
}

/**
 * Extract every database operation from one unit, ordered by method header
 * and then by rule order within the method.
 */
export function extractOperations(source: string, options: ExtractionOptions): DatabaseOperation[] {
  const scanned = stripComments(source, 'blank');
  const context = createContext(source, options, scanned);
  const operations: DatabaseOperation[] = [];
  let transactionalMethods = 0;

  for (const method of locateMethodBodies(scanned, options.bodyMatching)) {
    if (!hasDatabaseActivity(method.body)) continue;

    const groupId = isTransactional(method.body)
      ? transactionGroupId(context.unitName, method.className, method.methodName, transactionalMethods++)
      : undefined;

    operations.push(...methodOperations(context, method, groupId));
  }

  debugLog(`${options.unitName}: ${operations.length} operation(s)`);
  return operations;
}

/**
 * Extract operations plus unit-level metadata for the artifact.
 */
export function extractUnit(source: string, file: string, options: ExtractionOptions): UnitExtraction {
  const operations = extractOperations(source, options);
  return {
    file,
    unitName: options.unitName,
    lineCount: source.length === 0 ? 0 : countNewlines(source, 0, source.length) + 1,
    componentTypes: extractQueryComponentTypes(stripComments(source, 'blank')),
    operations,
    transactionGroups: groupByTransaction(operations),
  };
}
