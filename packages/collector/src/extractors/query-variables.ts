/**
 * Query-Variable Tracker
 *
 * Maps variable and field names to the query class they hold, so a statement
 * can be attributed to the component that runs it.
 */

import type { QueryVariableMap } from '../types.js';
import {
  DEFAULT_COMPONENT_TYPE,
  QUERY_COMPONENT_TYPES,
  QUERY_COMPONENT_TYPE_PATTERNS,
  QUERY_FIELD_DECLARATION_PATTERN,
  QUERY_VARIABLE_CREATION_PATTERN,
  QUERY_VARIABLE_DECLARATION_PATTERN,
  SQL_TARGET_PATTERN,
} from '../patterns.js';

const CANONICAL_TYPES = new Map<string, string>(QUERY_COMPONENT_TYPES.map((type) => [type.toLowerCase(), type]));

function canonicalType(typeName: string): string {
  return CANONICAL_TYPES.get(typeName.toLowerCase()) ?? typeName;
}

/**
 * Build the variable map for a unit from declarations, creations and class fields.
 * Keys are lower-cased; later sightings of a name win.
 */
export function extractQueryVariables(source: string): QueryVariableMap {
  const variables: QueryVariableMap = new Map();

  for (const match of source.matchAll(QUERY_VARIABLE_DECLARATION_PATTERN)) {
    const type = canonicalType(match[2] ?? '');
    for (const name of (match[1] ?? '').split(',')) {
      const trimmed = name.trim();
      if (trimmed) variables.set(trimmed.toLowerCase(), type);
    }
  }

  for (const match of source.matchAll(QUERY_VARIABLE_CREATION_PATTERN)) {
    variables.set((match[1] ?? '').toLowerCase(), canonicalType(match[2] ?? ''));
  }

  // Fields are known both as `FQuery` and through a `Query` property.
  for (const match of source.matchAll(QUERY_FIELD_DECLARATION_PATTERN)) {
    const prefix = match[1] ?? '';
    const name = match[2] ?? '';
    const type = canonicalType(match[3] ?? '');
    variables.set(`${prefix}${name}`.toLowerCase(), type);
    if (prefix) variables.set(name.toLowerCase(), type);
  }

  return variables;
}

/** Distinct query classes mentioned anywhere in the unit, in table order */
export function extractQueryComponentTypes(source: string): string[] {
  return QUERY_COMPONENT_TYPE_PATTERNS.filter(({ pattern }) => pattern.test(source)).map(({ type }) => type);
}

/**
 * Resolve the component class that runs a statement.
 *
 * Order: the statement's own target, the first known `X.SQL.` target in the
 * body, the only entry of a single-entry map, the unit's first query class,
 * then `TQuery`.
 */
export function resolveComponentType(
  variables: QueryVariableMap,
  body: string,
  target: string | undefined,
  unitComponentTypes: readonly string[]
): string {
  if (target) {
    const own = variables.get(target.toLowerCase());
    if (own) return own;
  }

  for (const match of body.matchAll(SQL_TARGET_PATTERN)) {
    const known = variables.get((match[1] ?? '').toLowerCase());
    if (known) return known;
  }

  if (variables.size === 1) {
    const [only] = variables.values();
    if (only) return only;
  }

  return unitComponentTypes[0] ?? DEFAULT_COMPONENT_TYPE;
}
