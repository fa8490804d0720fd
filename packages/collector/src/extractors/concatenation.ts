/**
 * Concatenation Parser
 *
 * Turns a Pascal string expression built with `+` (or `Format`) into a
 * parameterized SQL template. Literal parts are kept verbatim; every other
 * part becomes a `:Name` placeholder named after the variable it reads.
 *
 *   'SELECT * FROM T WHERE ID = ' + IntToStr(ID)  ->  SELECT * FROM T WHERE ID = :ID
 */

import { findTopLevel, splitTopLevel, unescapeLiteral } from '../scanner/literals.js';

export interface ConcatenationResult {
  template: string;
  /** True when at least one part was not a literal */
  isDynamic: boolean;
  /** Placeholder names in order of appearance */
  placeholders: string[];
}

/** A run of literals and character codes, e.g. `'a'#13#10'b'` */
const LITERAL_RUN_PATTERN = /^(?:\s*(?:'(?:[^']|'')*'|#\$[0-9A-Fa-f]+|#\d+))+\s*$/;

/** One literal or character code inside a literal run */
const LITERAL_PART_PATTERN = /'((?:[^']|'')*)'|#\$([0-9A-Fa-f]+)|#(\d+)/g;

const CALL_PATTERN = /^([A-Za-z_][\w.]*)\s*\(([\s\S]*)\)$/;
const FORMAT_CALL_PATTERN = /^Format\s*\(/i;
const FORMAT_SPECIFIER_PATTERN = /%%|%(?:(\d+):)?-?(?:\d+|\*)?(?:\.(?:\d+|\*))?[dueEfgnmpsxDUFGNMPSX]/g;

// Placeholders are fenced while the template is assembled so quotes written
// around them (`'''' + Name + ''''`) can be dropped afterwards.
const FENCE = '\u0000';
const QUOTED_FENCED_PATTERN = new RegExp(`'${FENCE}(\\w+)${FENCE}'`, 'g');
const FENCED_PATTERN = new RegExp(`${FENCE}(\\w+)${FENCE}`, 'g');

function decodeLiteralRun(run: string): string {
  let text = '';
  for (const match of run.matchAll(LITERAL_PART_PATTERN)) {
    if (match[1] !== undefined) {
      text += unescapeLiteral(match[1]);
    } else if (match[2] !== undefined) {
      text += String.fromCharCode(parseInt(match[2], 16));
    } else if (match[3] !== undefined) {
      text += String.fromCharCode(parseInt(match[3], 10));
    }
  }
  return text;
}

function isBalanced(text: string): boolean {
  return findTopLevel(text, 0, '') < 0;
}

function matchCall(expression: string): RegExpExecArray | undefined {
  const call = CALL_PATTERN.exec(expression);
  if (!call || !isBalanced(call[2] ?? '')) return undefined;
  return call;
}

function stripOuterParens(expression: string): string {
  let current = expression.trim();
  while (current.startsWith('(') && current.endsWith(')')) {
    const inner = current.slice(1, -1);
    // `(a) + (b)` starts and ends with parentheses that do not pair up.
    if (!isBalanced(inner)) break;
    current = inner.trim();
  }
  return current;
}

/**
 * Reduce a non-literal expression to the name its placeholder should carry.
 * A single-argument call gives its argument, a member access its trailing
 * member. Calls with several arguments give an empty name, and the
 * placeholder falls back to `Param<n>`.
 */
export function reduceToCoreName(expression: string): string {
  const trimmed = stripOuterParens(expression);

  const call = matchCall(trimmed);
  if (call) {
    const args = splitTopLevel(call[2] ?? '', ',');
    if (args.length > 1) return '';
    const only = args[0]?.trim();
    if (only) return reduceToCoreName(only);
  }

  if (/^[A-Za-z_]\w*(?:\s*\.\s*[A-Za-z_]\w*)+$/.test(trimmed)) {
    const members = trimmed.split('.');
    return (members[members.length - 1] ?? trimmed).trim();
  }

  return trimmed.replace(/\W+/g, '_').replace(/^_+|_+$/g, '');
}

function placeholderFor(expression: string, index: number): string {
  const name = reduceToCoreName(expression);
  const usable = /^[A-Za-z_]/.test(name) ? name : `Param${index}`;
  return `${FENCE}${usable}${FENCE}`;
}

function finish(fenced: string, isDynamic: boolean): ConcatenationResult {
  const placeholders = [...fenced.matchAll(FENCED_PATTERN)].map((match) => match[1] ?? '');
  const template = fenced.replace(QUOTED_FENCED_PATTERN, ':$1').replace(FENCED_PATTERN, ':$1').trim();
  return { template, isDynamic, placeholders };
}

/** True when `expression` is a `Format(...)` call */
export function isFormatCall(expression: string): boolean {
  return FORMAT_CALL_PATTERN.test(expression.trim());
}

function expandFormat(expression: string, counter: { next: number }): { text: string; isDynamic: boolean } {
  const call = matchCall(expression.trim());
  const args = splitTopLevel(call?.[2] ?? '', ',');
  const formatArg = args[0] ?? '';
  const argList = args.slice(1).join(',').trim().replace(/^\[/, '').replace(/\]$/, '');
  const values = argList ? splitTopLevel(argList, ',').map((value) => value.trim()) : [];

  const format = LITERAL_RUN_PATTERN.test(formatArg) ? decodeLiteralRun(formatArg) : '';
  let sequential = 0;
  let isDynamic = false;

  const text = format.replace(FORMAT_SPECIFIER_PATTERN, (specifier: string, index?: string) => {
    if (specifier === '%%') return '%';
    isDynamic = true;
    const position = index !== undefined ? parseInt(index, 10) : sequential;
    sequential = position + 1;
    counter.next++;
    const value = values[position];
    return value ? placeholderFor(value, counter.next) : `${FENCE}Param${counter.next}${FENCE}`;
  });

  return { text, isDynamic };
}

/**
 * Parse an additive string expression into a SQL template.
 */
export function parseConcatenation(expression: string): ConcatenationResult {
  const counter = { next: 0 };
  let fenced = '';
  let isDynamic = false;

  for (const rawPart of splitTopLevel(expression, '+')) {
    const part = rawPart.trim();
    if (!part) continue;

    if (LITERAL_RUN_PATTERN.test(part)) {
      fenced += decodeLiteralRun(part);
    } else if (isFormatCall(part)) {
      const expanded = expandFormat(part, counter);
      fenced += expanded.text;
      isDynamic = isDynamic || expanded.isDynamic;
    } else {
      counter.next++;
      fenced += placeholderFor(part, counter.next);
      isDynamic = true;
    }
  }

  return finish(fenced, isDynamic);
}

/**
 * Parse a `Format('...', [args])` call into a SQL template.
 */
export function parseFormatCall(expression: string): ConcatenationResult {
  const expanded = expandFormat(expression, { next: 0 });
  return finish(expanded.text, expanded.isDynamic);
}
