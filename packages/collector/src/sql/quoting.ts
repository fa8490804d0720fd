/**
 * Reserved-word quoting
 *
 * Firebird and InterBase reject reserved words used as identifiers unless they
 * are double-quoted. Quoting is applied to table positions, bare select-list
 * columns, and columns compared in WHERE, SET and ORDER BY clauses.
 */

import { splitTopLevel } from '../scanner/literals.js';
import { RESERVED_WORDS, VALUE_WORDS } from './words.js';

const IDENTIFIER = '[A-Za-z_][\\w$]*';

/** Table after FROM, JOIN, INTO, UPDATE OR INSERT INTO, UPDATE (but not FOR UPDATE) */
const TABLE_POSITION_PATTERN = new RegExp(
  `(\\b(?:FROM|JOIN|INTO|UPDATE\\s+OR\\s+INSERT\\s+INTO|(?<!\\bFOR\\s+)UPDATE)\\s+)(${IDENTIFIER})(?=\\s|$|\\)|,|\\(|;)`,
  'gi'
);

/** Select list of the first SELECT, after DISTINCT / FIRST n / SKIP n prefixes */
const SELECT_LIST_PATTERN =
  /(\bSELECT\s+(?:(?:DISTINCT|ALL)\s+|(?:FIRST|SKIP|TOP)\s+(?:\d+|:\w+|\([^)]*\))\s+)*)([\s\S]+?)(\s+FROM\b)/i;

/** `col`, `alias.col`, `col alias`, `col AS alias` */
const SELECT_ITEM_PATTERN = new RegExp(`^(?:(${IDENTIFIER})\\.)?(${IDENTIFIER})(?:(\\s+(?:AS\\s+)?)(${IDENTIFIER}))?$`, 'i');

/** A word followed by a comparison operator or an ORDER BY / predicate keyword */
const COMPARED_COLUMN_PATTERN = new RegExp(
  `(^|[\\s(,.])(${IDENTIFIER})(?=\\s*(?:[=<>!]|\\s(?:ASC|DESC|NULLS|IS|IN|LIKE|BETWEEN|CONTAINING|STARTING)\\b))`,
  'gi'
);

export function isReservedWord(identifier: string): boolean {
  return RESERVED_WORDS.has(identifier.toUpperCase());
}

/** Quote a bare identifier when it is reserved */
export function quoteIfReserved(identifier: string): string {
  if (identifier.startsWith('"') && identifier.endsWith('"')) return identifier;
  return isReservedWord(identifier) ? `"${identifier}"` : identifier;
}

function quoteColumn(identifier: string): string {
  return VALUE_WORDS.has(identifier.toUpperCase()) ? identifier : quoteIfReserved(identifier);
}

function quoteSelectItem(item: string): string {
  const match = SELECT_ITEM_PATTERN.exec(item.trim());
  if (!match) return item;

  const [, qualifier, column = '', separator, alias] = match;
  let quoted = qualifier ? `${qualifier}.${quoteIfReserved(column)}` : quoteColumn(column);
  if (separator !== undefined && alias !== undefined) {
    quoted += `${separator}${quoteIfReserved(alias)}`;
  }

  const leading = item.length - item.trimStart().length;
  const trailing = item.length - item.trimEnd().length;
  return item.slice(0, leading) + quoted + item.slice(item.length - trailing);
}

function quoteSelectList(sql: string): string {
  return sql.replace(SELECT_LIST_PATTERN, (_match: string, prefix: string, list: string, from: string) => {
    const items = splitTopLevel(list, ',').map(quoteSelectItem);
    return prefix + items.join(',') + from;
  });
}

function quoteTableNames(sql: string): string {
  return sql.replace(TABLE_POSITION_PATTERN, (_match: string, keyword: string, table: string) => {
    return keyword + quoteIfReserved(table);
  });
}

function quoteComparedColumns(sql: string): string {
  return sql.replace(COMPARED_COLUMN_PATTERN, (_match: string, before: string, column: string) => {
    // `alias.col` keeps its qualifier; only the column itself is considered.
    return before + quoteColumn(column);
  });
}

/**
 * Quote reserved words used as identifiers. Already quoted identifiers are
 * left alone, so the function maps its own output to itself.
 */
export function quoteReservedWords(sql: string): string {
  if (!sql.trim()) return sql;
  let result = quoteSelectList(sql);
  result = quoteTableNames(result);
  result = quoteComparedColumns(result);
  return result;
}
