/**
 * SQL word lists, read once from data/sql-words.json.
 */

import { readFileSync } from 'fs';

interface SqlWordLists {
  /** Quoted identifiers matching these keep their quotes when unquoting */
  preservedQuoteWords: string[];
  /** Upper-cased wherever they appear */
  keywords: string[];
  /** Must be quoted when used as an identifier */
  reservedWords: string[];
  /** Read as values or operators, never quoted as compared columns */
  valueWords: string[];
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === 'string');
}

function loadWordLists(): SqlWordLists {
  const raw: unknown = JSON.parse(readFileSync(new URL('../../data/sql-words.json', import.meta.url), 'utf-8'));
  if (typeof raw !== 'object' || raw === null) {
    throw new Error('sql-words.json must contain an object');
  }
  const lists = new Map(Object.entries(raw));
  const read = (key: keyof SqlWordLists): string[] => {
    const value = lists.get(key);
    if (!isStringArray(value)) throw new Error(`sql-words.json: "${key}" must be an array of strings`);
    return value;
  };
  return {
    preservedQuoteWords: read('preservedQuoteWords'),
    keywords: read('keywords'),
    reservedWords: read('reservedWords'),
    valueWords: read('valueWords'),
  };
}

const WORD_LISTS = loadWordLists();

const upperSet = (words: string[]): ReadonlySet<string> => new Set(words.map((word) => word.toUpperCase()));

export const PRESERVED_QUOTE_WORDS = upperSet(WORD_LISTS.preservedQuoteWords);
export const SQL_KEYWORDS = upperSet(WORD_LISTS.keywords);
export const RESERVED_WORDS = upperSet(WORD_LISTS.reservedWords);
export const VALUE_WORDS = upperSet(WORD_LISTS.valueWords);

/** Word-bounded, case-insensitive match of any keyword */
export const KEYWORD_PATTERN = new RegExp(`\\b(?:${[...SQL_KEYWORDS].join('|')})\\b`, 'gi');
