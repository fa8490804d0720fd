/**
 * SQL Normalizer
 *
 * Canonical form for extracted statements, applied in a fixed order:
 *   1. unquote "IDENT" unless IDENT is a preserved reserved word
 *   2. upper-case SQL keywords
 *   3. PascalCase `:param` names
 *   4. quote reserved words used as identifiers (optional)
 *
 * Single-quoted SQL literals are masked for the whole pipeline, so
 * `WHERE KIND = 'select'` keeps its value. The pipeline is idempotent.
 */

import { KEYWORD_PATTERN, PRESERVED_QUOTE_WORDS } from './words.js';
import { quoteReservedWords } from './quoting.js';

export interface NormalizeOptions {
  /** Reapply reserved-word quoting after normalization */
  quoteReservedWords?: boolean;
}

const SQL_LITERAL_PATTERN = /'(?:[^']|'')*'/g;
const MASK = '\u0001';
const MASKED_LITERAL_PATTERN = new RegExp(`${MASK}(\\d+)${MASK}`, 'g');

const QUOTED_IDENTIFIER_PATTERN = /"([A-Za-z_][A-Za-z0-9_]*)"/g;
const PARAMETER_PATTERN = /(?<![:\w]):([A-Za-z_]\w*)/g;

/** Upper runs, capitalized words, lower runs and digit runs of a mixed-case name */
const MIXED_CASE_TOKEN_PATTERN = /[A-Z]+(?![a-z])|[A-Z]?[a-z]+|\d+/g;
const LETTER_DIGIT_TOKEN_PATTERN = /[A-Za-z]+|\d+/g;

function maskLiterals(sql: string): { masked: string; literals: string[] } {
  const literals: string[] = [];
  const masked = sql.replace(SQL_LITERAL_PATTERN, (literal) => {
    literals.push(literal);
    return `${MASK}${literals.length - 1}${MASK}`;
  });
  return { masked, literals };
}

function unmaskLiterals(masked: string, literals: string[]): string {
  return masked.replace(MASKED_LITERAL_PATTERN, (token: string, index: string) => literals[Number(index)] ?? token);
}

export function unquoteIdentifiers(sql: string): string {
  return sql.replace(QUOTED_IDENTIFIER_PATTERN, (quoted: string, identifier: string) =>
    PRESERVED_QUOTE_WORDS.has(identifier.toUpperCase()) ? quoted : identifier
  );
}

export function uppercaseKeywords(sql: string): string {
  return sql.replace(KEYWORD_PATTERN, (keyword) => keyword.toUpperCase());
}

function capitalize(token: string): string {
  return token.charAt(0).toUpperCase() + token.slice(1).toLowerCase();
}

/**
 * PATIENT_ID, patient_id and PatientID all become PatientId.
 *
 * Underscore-separated parts are words. A part mixing upper and lower case is
 * further split at case boundaries. A single letter that follows another
 * single letter stays lower-case (A_B -> Ab) so the result maps to itself.
 */
export function toPascalCase(name: string): string {
  const tokens: string[] = [];
  for (const part of name.split('_')) {
    if (!part) continue;
    const mixed = /[a-z]/.test(part) && /[A-Z]/.test(part);
    const pattern = mixed ? MIXED_CASE_TOKEN_PATTERN : LETTER_DIGIT_TOKEN_PATTERN;
    tokens.push(...(part.match(pattern) ?? [part]));
  }

  let result = '';
  let previousSingleLetter = false;
  for (const token of tokens) {
    const singleLetter = /^[A-Za-z]$/.test(token);
    result += previousSingleLetter && singleLetter ? token.toLowerCase() : capitalize(token);
    previousSingleLetter = singleLetter;
  }
  return result || name;
}

export function pascalCaseParameters(sql: string): string {
  return sql.replace(PARAMETER_PATTERN, (_match: string, name: string) => `:${toPascalCase(name)}`);
}

/**
 * Run the normalization pipeline over one statement.
 */
export function normalizeSql(sql: string, options: NormalizeOptions = {}): string {
  const { masked, literals } = maskLiterals(sql);
  let result = unquoteIdentifiers(masked);
  result = uppercaseKeywords(result);
  result = pascalCaseParameters(result);
  if (options.quoteReservedWords) {
    result = quoteReservedWords(result);
  }
  return unmaskLiterals(result, literals);
}
