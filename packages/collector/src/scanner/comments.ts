/**
 * Comment/String Scanner
 *
 * Removes `//`, `{ }` and `(* *)` comments from Object Pascal source while
 * leaving string literals untouched. Newlines always survive, so line numbers
 * computed on the scanned text match the raw unit.
 *
 * In `blank` mode comment characters are replaced by spaces instead of being
 * dropped, which keeps every offset aligned with the raw text.
 */

import type { CommentMode } from '../types.js';

export function stripComments(source: string, mode: CommentMode = 'remove'): string {
  const out: string[] = [];
  const blank = mode === 'blank';
  let inString = false;
  let i = 0;

  // Emits a skipped comment character: newlines always, everything else only when blanking.
  const skip = (ch: string): void => {
    if (ch === '\n' || ch === '\r') {
      out.push(ch);
    } else if (blank) {
      out.push(' ');
    }
  };

  while (i < source.length) {
    const ch = source[i] ?? '';
    const next = source[i + 1];

    if (inString) {
      if (ch === "'" && next === "'") {
        out.push("''");
        i += 2;
        continue;
      }
      if (ch === "'") inString = false;
      out.push(ch);
      i++;
      continue;
    }

    if (ch === "'") {
      inString = true;
      out.push(ch);
      i++;
      continue;
    }

    if (ch === '/' && next === '/') {
      while (i < source.length && source[i] !== '\n') {
        skip(source[i] ?? '');
        i++;
      }
      continue;
    }

    if (ch === '{') {
      while (i < source.length && source[i] !== '}') {
        skip(source[i] ?? '');
        i++;
      }
      if (i < source.length) {
        skip('}');
        i++;
      }
      continue;
    }

    if (ch === '(' && next === '*') {
      skip('(');
      skip('*');
      i += 2;
      while (i < source.length && !(source[i] === '*' && source[i + 1] === ')')) {
        skip(source[i] ?? '');
        i++;
      }
      if (i < source.length) {
        skip('*');
        skip(')');
        i += 2;
      }
      continue;
    }

    out.push(ch);
    i++;
  }

  return out.join('');
}

/**
 * Count newlines in `text` between `start` (inclusive) and `end` (exclusive).
 */
export function countNewlines(text: string, start: number, end: number): number {
  let count = 0;
  const stop = Math.min(end, text.length);
  for (let i = Math.max(0, start); i < stop; i++) {
    if (text.charCodeAt(i) === 10) count++;
  }
  return count;
}
