/**
 * String-aware scanning helpers shared by the extractors.
 *
 * Pascal string literals use single quotes with `''` as the escaped quote,
 * so a plain `[^)]+` or `[^;]+` cuts expressions such as
 * `'WHERE NAME = ''a;b''' + IntToStr(Id)` in the wrong place.
 */

/** Undo `''` escaping inside a literal body */
export function unescapeLiteral(body: string): string {
  return body.replace(/''/g, "'");
}

/**
 * Offset just past the literal that opens at `start` (which must be a quote).
 * Unterminated literals run to the end of the text.
 */
export function skipLiteral(text: string, start: number): number {
  let i = start + 1;
  while (i < text.length) {
    if (text[i] === "'") {
      if (text[i + 1] === "'") {
        i += 2;
        continue;
      }
      return i + 1;
    }
    i++;
  }
  return text.length;
}

/**
 * Scan forward from `start` and return the offset of the first character in
 * `stops` found at parenthesis/bracket depth zero and outside string literals.
 * An unmatched closing `)` or `]` also stops the scan. Returns -1 when nothing
 * stops it.
 */
export function findTopLevel(text: string, start: number, stops: string): number {
  let depth = 0;
  let i = start;
  while (i < text.length) {
    const ch = text[i] ?? '';
    if (ch === "'") {
      i = skipLiteral(text, i);
      continue;
    }
    if (depth === 0 && stops.includes(ch)) return i;
    if (ch === '(' || ch === '[') {
      depth++;
    } else if (ch === ')' || ch === ']') {
      if (depth === 0) return i;
      depth--;
    }
    i++;
  }
  return -1;
}

/**
 * Read the argument list of a call whose opening parenthesis is at `openParen`.
 * Returns the text between the parentheses and the offset of the closing one,
 * or undefined when the call is not closed.
 */
export function readCallArguments(
  text: string,
  openParen: number
): { args: string; close: number } | undefined {
  const close = findTopLevel(text, openParen + 1, ')');
  if (close < 0 || text[close] !== ')') return undefined;
  return { args: text.slice(openParen + 1, close), close };
}

/** Bracket nesting depth at `index`, not counting brackets inside literals */
export function bracketDepthAt(text: string, index: number): number {
  let depth = 0;
  let i = 0;
  while (i < index && i < text.length) {
    const ch = text[i] ?? '';
    if (ch === "'") {
      i = skipLiteral(text, i);
      continue;
    }
    if (ch === '(' || ch === '[') depth++;
    else if (ch === ')' || ch === ']') depth = Math.max(0, depth - 1);
    i++;
  }
  return depth;
}

/** Split `text` on a separator that sits outside literals and brackets */
export function splitTopLevel(text: string, separator: string): string[] {
  const parts: string[] = [];
  let start = 0;
  let depth = 0;
  let i = 0;
  while (i < text.length) {
    const ch = text[i] ?? '';
    if (ch === "'") {
      i = skipLiteral(text, i);
      continue;
    }
    if (ch === '(' || ch === '[') depth++;
    else if (ch === ')' || ch === ']') depth = Math.max(0, depth - 1);
    else if (ch === separator && depth === 0) {
      parts.push(text.slice(start, i));
      start = i + 1;
    }
    i++;
  }
  parts.push(text.slice(start));
  return parts;
}

/** True when the expression concatenates with `+` outside any literal or call */
export function hasTopLevelPlus(expression: string): boolean {
  return splitTopLevel(expression, '+').length > 1;
}

/**
 * If the whole expression is exactly one literal, return its unescaped body.
 */
export function singleLiteral(expression: string): string | undefined {
  const trimmed = expression.trim();
  if (!trimmed.startsWith("'")) return undefined;
  if (skipLiteral(trimmed, 0) !== trimmed.length || !trimmed.endsWith("'") || trimmed.length < 2) {
    return undefined;
  }
  return unescapeLiteral(trimmed.slice(1, -1));
}
