/**
 * Statement Extractor battery
 *
 * Each rule looks for one source shape that builds or runs SQL and yields raw
 * candidates from a single method body. Rules are independent; the caller
 * unions their output in rule order and deduplicates on normalized text.
 */

import type { StatementCandidate, StatementRule } from '../types.js';
import {
  CONNECTION_EXECUTE_HELPERS,
  DIRECT_EXECUTE_PATTERN,
  QUERY_VALUE_PATTERN,
  SQL_ADD_CALL_PATTERN,
  SQL_CLEAR_PATTERN,
  SQL_START_PATTERN,
  SQL_TEXT_ASSIGN_PATTERN,
  VARIABLE_SQL_ASSIGN_PATTERN,
} from '../patterns.js';
import {
  findTopLevel,
  hasTopLevelPlus,
  readCallArguments,
  singleLiteral,
  splitTopLevel,
} from '../scanner/literals.js';
import { isFormatCall, parseConcatenation, parseFormatCall } from './concatenation.js';

interface ParsedExpression {
  text: string;
  isDynamic: boolean;
}

/** Right-hand side of an assignment, up to the next top-level `;` */
function readStatementTail(body: string, start: number): string {
  const end = findTopLevel(body, start, ';');
  return body.slice(start, end < 0 ? body.length : end).trim();
}

function parseBuiltExpression(expression: string): ParsedExpression | undefined {
  if (hasTopLevelPlus(expression)) {
    const result = parseConcatenation(expression);
    return { text: result.template, isDynamic: result.isDynamic };
  }
  if (isFormatCall(expression)) {
    const result = parseFormatCall(expression);
    return { text: result.template, isDynamic: result.isDynamic };
  }
  return undefined;
}

function parseStringExpression(expression: string): ParsedExpression | undefined {
  const literal = singleLiteral(expression);
  if (literal !== undefined) return { text: literal, isDynamic: false };
  return parseBuiltExpression(expression);
}

interface AddCall {
  position: number;
  target?: string;
  argument: string;
}

function findAddCalls(body: string): AddCall[] {
  const calls: AddCall[] = [];
  for (const match of body.matchAll(SQL_ADD_CALL_PATTERN)) {
    const start = match.index ?? 0;
    const call = readCallArguments(body, start + match[0].length - 1);
    if (!call) continue;
    calls.push({ position: start, target: match[1], argument: call.args.trim() });
  }
  return calls;
}

/**
 * Literal passed to a helper call, as the first argument or after a
 * connection argument. Only text that reads as SQL is taken.
 */
function helperStatement(args: string[], allowLeadingArgument: boolean): ParsedExpression | undefined {
  const positions = allowLeadingArgument ? [0, 1] : [0];
  for (const index of positions) {
    const argument = args[index]?.trim();
    if (!argument?.startsWith("'")) continue;
    const parsed = parseStringExpression(argument);
    if (parsed && SQL_START_PATTERN.test(parsed.text)) return parsed;
  }
  return undefined;
}

// ============================================================================
// Rules
// ============================================================================

export const sqlTextLiteralRule: StatementRule = {
  id: 'sql-text-literal',
  extract(body) {
    const candidates: StatementCandidate[] = [];
    for (const match of body.matchAll(SQL_TEXT_ASSIGN_PATTERN)) {
      const start = match.index ?? 0;
      const literal = singleLiteral(readStatementTail(body, start + match[0].length));
      if (literal === undefined) continue;
      candidates.push({
        rule: 'sql-text-literal',
        text: literal,
        position: start,
        isDynamic: false,
        target: match[1],
      });
    }
    return candidates;
  },
};

export const sqlTextConcatRule: StatementRule = {
  id: 'sql-text-concat',
  extract(body) {
    const candidates: StatementCandidate[] = [];
    for (const match of body.matchAll(SQL_TEXT_ASSIGN_PATTERN)) {
      const start = match.index ?? 0;
      const parsed = parseBuiltExpression(readStatementTail(body, start + match[0].length));
      if (!parsed) continue;
      candidates.push({ rule: 'sql-text-concat', ...parsed, position: start, target: match[1] });
    }
    return candidates;
  },
};

/**
 * Literal `SQL.Add` calls joined with newlines. Each `SQL.Clear` opens a new
 * window; Adds before the first Clear form a window of their own.
 */
export const sqlAddBlockRule: StatementRule = {
  id: 'sql-add-block',
  extract(body) {
    const clears = [...body.matchAll(SQL_CLEAR_PATTERN)].map((match) => match.index ?? 0);
    const windows = new Map<number, { position: number; target?: string; lines: string[] }>();

    for (const call of findAddCalls(body)) {
      const literal = singleLiteral(call.argument);
      if (literal === undefined) continue;

      const windowIndex = clears.filter((clear) => clear < call.position).length;
      const window = windows.get(windowIndex);
      if (window) {
        window.lines.push(literal);
      } else {
        windows.set(windowIndex, { position: call.position, target: call.target, lines: [literal] });
      }
    }

    return [...windows.values()].map((window): StatementCandidate => ({
      rule: 'sql-add-block',
      text: window.lines.join('\n'),
      position: window.position,
      isDynamic: false,
      target: window.target,
    }));
  },
};

export const sqlAddConcatRule: StatementRule = {
  id: 'sql-add-concat',
  extract(body) {
    const candidates: StatementCandidate[] = [];
    for (const call of findAddCalls(body)) {
      const parsed = parseBuiltExpression(call.argument);
      if (!parsed) continue;
      candidates.push({ rule: 'sql-add-concat', ...parsed, position: call.position, target: call.target });
    }
    return candidates;
  },
};

export const variableAssignRule: StatementRule = {
  id: 'variable-assign',
  extract(body) {
    const candidates: StatementCandidate[] = [];
    for (const match of body.matchAll(VARIABLE_SQL_ASSIGN_PATTERN)) {
      const start = match.index ?? 0;
      const parsed = parseStringExpression(readStatementTail(body, start + match[0].length));
      if (!parsed) continue;
      candidates.push({ rule: 'variable-assign', ...parsed, position: start });
    }
    return candidates;
  },
};

export const directExecuteRule: StatementRule = {
  id: 'direct-execute',
  extract(body) {
    const candidates: StatementCandidate[] = [];
    for (const match of body.matchAll(DIRECT_EXECUTE_PATTERN)) {
      const start = match.index ?? 0;
      const call = readCallArguments(body, start + match[0].length - 1);
      if (!call) continue;
      const helper = (match[1] ?? '').toLowerCase();
      const parsed = helperStatement(splitTopLevel(call.args, ','), CONNECTION_EXECUTE_HELPERS.has(helper));
      if (!parsed) continue;
      candidates.push({ rule: 'direct-execute', ...parsed, position: start });
    }
    return candidates;
  },
};

export const queryValueRule: StatementRule = {
  id: 'query-value',
  extract(body) {
    const candidates: StatementCandidate[] = [];
    for (const match of body.matchAll(QUERY_VALUE_PATTERN)) {
      const start = match.index ?? 0;
      const call = readCallArguments(body, start + match[0].length - 1);
      if (!call) continue;
      const parsed = helperStatement(splitTopLevel(call.args, ','), true);
      if (!parsed) continue;
      candidates.push({ rule: 'query-value', ...parsed, position: start });
    }
    return candidates;
  },
};

/** All rules, in the order their candidates are reported */
export const STATEMENT_RULES: readonly StatementRule[] = [
  sqlTextLiteralRule,
  sqlTextConcatRule,
  sqlAddBlockRule,
  sqlAddConcatRule,
  variableAssignRule,
  directExecuteRule,
  queryValueRule,
];

/**
 * Run every rule over one method body. Candidates with blank text are dropped.
 */
export function extractStatementCandidates(
  body: string,
  rules: readonly StatementRule[] = STATEMENT_RULES
): StatementCandidate[] {
  return rules.flatMap((rule) => rule.extract(body)).filter((candidate) => candidate.text.trim() !== '');
}
