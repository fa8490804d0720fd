/**
 * Method Body Locator
 *
 * Finds `Class.Method` implementation headers and isolates each method body
 * by matching the `begin` that opens it with its closing `end;`.
 *
 * Two matching strategies:
 * - `block-stack` (default): `begin`, `try`, `case` and `asm` push a block and
 *   every `end` pops one; the body closes when the opening `begin` pops.
 * - `begin-count`: counts `begin` against `end` and closes at the first `end;`
 *   where the counts balance. `try ... end;` and `case ... end;` also close with
 *   `end;`, so this strategy can cut a method short.
 */

import type { BodyMatching, MethodBody, MethodKind } from '../types.js';
import { METHOD_HEADER_PATTERN } from '../patterns.js';
import { countNewlines } from './comments.js';
import { skipLiteral } from './literals.js';

const BLOCK_OPENERS = new Set(['begin', 'try', 'case', 'asm']);

interface Word {
  text: string;
  start: number;
  end: number;
}

/**
 * Iterate identifier-like words in `text[start, limit)`, skipping string literals.
 */
function* words(text: string, start: number, limit: number): Generator<Word> {
  let i = start;
  while (i < limit) {
    const ch = text[i] ?? '';
    if (ch === "'") {
      i = skipLiteral(text, i);
      continue;
    }
    if (/[A-Za-z_]/.test(ch)) {
      let j = i + 1;
      while (j < limit && /\w/.test(text[j] ?? '')) j++;
      yield { text: text.slice(i, j).toLowerCase(), start: i, end: j };
      i = j;
      continue;
    }
    // Digits and other characters never begin a keyword.
    if (/\d/.test(ch)) {
      while (i < limit && /\w/.test(text[i] ?? '')) i++;
      continue;
    }
    i++;
  }
}

/** Offset just past a `;` that follows `from` after optional whitespace, or -1 */
function semicolonAfter(text: string, from: number, limit: number): number {
  let i = from;
  while (i < limit && /\s/.test(text[i] ?? '')) i++;
  return text[i] === ';' ? i + 1 : -1;
}

/**
 * Find the end of the body that starts after `start`.
 * Returns the offset just past the closing `end;`, `start` when no `begin` is
 * reachable before `limit`, or `limit` when the body never closes.
 */
export function findBodyEnd(
  text: string,
  start: number,
  limit: number = text.length,
  matching: BodyMatching = 'block-stack'
): number {
  const iterator = words(text, start, limit);

  // Manual stepping: breaking out of for...of would close the generator.
  let step = iterator.next();
  while (!step.done && step.value.text !== 'begin') {
    step = iterator.next();
  }
  if (step.done) return start;

  if (matching === 'begin-count') {
    let begins = 1;
    let ends = 0;
    for (const word of iterator) {
      if (word.text === 'begin') {
        begins++;
      } else if (word.text === 'end') {
        ends++;
        const after = semicolonAfter(text, word.end, limit);
        if (after >= 0 && begins === ends) return after;
      }
    }
    return limit;
  }

  const stack: string[] = ['begin'];
  for (const word of iterator) {
    if (BLOCK_OPENERS.has(word.text)) {
      stack.push(word.text);
    } else if (word.text === 'end') {
      stack.pop();
      if (stack.length === 0) {
        const after = semicolonAfter(text, word.end, limit);
        return after >= 0 ? after : word.end;
      }
    }
  }
  return limit;
}

function toMethodKind(keyword: string): MethodKind {
  switch (keyword.toLowerCase()) {
    case 'function':
      return 'function';
    case 'constructor':
      return 'constructor';
    case 'destructor':
      return 'destructor';
    default:
      return 'procedure';
  }
}

/**
 * Locate every method implementation in `scanned` (comment-stripped text).
 * Headers with no reachable `begin` before the next header are skipped.
 */
export function locateMethodBodies(scanned: string, matching: BodyMatching = 'block-stack'): MethodBody[] {
  const headers = [...scanned.matchAll(METHOD_HEADER_PATTERN)];
  const methods: MethodBody[] = [];

  headers.forEach((header, index) => {
    const headerStart = header.index ?? 0;
    const headerEnd = headerStart + header[0].length;
    const limit = headers[index + 1]?.index ?? scanned.length;
    const bodyEnd = findBodyEnd(scanned, headerEnd, limit, matching);
    if (bodyEnd <= headerEnd) return;

    methods.push({
      kind: toMethodKind(header[2] ?? ''),
      isClassMethod: header[1] !== undefined,
      className: header[3] ?? '',
      methodName: header[4] ?? '',
      headerStart,
      headerEnd,
      bodyEnd,
      startLine: countNewlines(scanned, 0, headerStart) + 1,
      body: scanned.slice(headerEnd, bodyEnd),
    });
  });

  return methods;
}
