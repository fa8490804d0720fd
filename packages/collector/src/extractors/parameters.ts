/**
 * Parameter Extractor & Type Inference
 *
 * Collects bound-parameter names from a statement and its method body and
 * infers a scalar type from the first typed accessor used on each name.
 */

import type { InferredType, SqlParameter } from '../types.js';
import { toPascalCase } from '../sql/normalize.js';

/** Accessor tag -> inferred scalar kind */
export const ACCESSOR_TYPES: Readonly<Record<string, InferredType>> = {
  AsString: 'text',
  AsWideString: 'text',
  AsAnsiString: 'text',
  AsMemo: 'text',
  AsInteger: 'integer',
  AsLargeInt: 'integer',
  AsSmallInt: 'integer',
  AsShortInt: 'integer',
  AsWord: 'integer',
  AsLongWord: 'integer',
  AsFloat: 'floating',
  AsSingle: 'floating',
  AsExtended: 'floating',
  AsBoolean: 'boolean',
  AsDateTime: 'date-time',
  AsDate: 'date-time',
  AsTime: 'date-time',
  AsSQLTimeStamp: 'date-time',
  AsCurrency: 'decimal',
  AsBCD: 'decimal',
  AsFMTBCD: 'decimal',
  AsBlob: 'binary',
  AsBytes: 'binary',
  Value: 'opaque',
  AsVariant: 'opaque',
};

export const UNTYPED_SOURCE_TYPE = 'Variant';

const ACCESSOR_LOOKUP = new Map(
  Object.entries(ACCESSOR_TYPES).map(([tag, type]) => [tag.toLowerCase(), { tag, type }] as const)
);

const SQL_PLACEHOLDER_PATTERN = /(?<![:\w]):([A-Za-z_]\w*)/g;
const PARAM_BY_NAME_PATTERN = /\bParamByName\s*\(\s*['"](\w+)['"]\s*\)/gi;
const PARAMS_INDEXER_PATTERN = /\bParams\s*(?:\.\s*ParamValues\s*)?\[\s*['"](\w+)['"]\s*\]/gi;
const FIELD_BY_NAME_PATTERN = /\bFieldByName\s*\(\s*['"](\w+)['"]\s*\)/gi;

/** `ParamByName('X').AsInteger` or `Params['X'].Value` */
const TYPED_ACCESS_PATTERN =
  /\b(?:ParamByName\s*\(\s*['"](\w+)['"]\s*\)|Params\s*\[\s*['"](\w+)['"]\s*\])\s*\.\s*(As\w+|Value)\b/gi;

/**
 * Key under which two spellings count as the same parameter.
 * `:PatientId` in normalized SQL and `ParamByName('PATIENT_ID')` share one.
 */
export function parameterKey(name: string): string {
  return toPascalCase(name).toLowerCase();
}

function addUnique(names: Map<string, string>, name: string): void {
  const key = parameterKey(name);
  if (!names.has(key)) names.set(key, name);
}

/**
 * Infer the type of one parameter from the earliest typed accessor on it.
 */
export function inferParameterType(body: string, name: string): Pick<SqlParameter, 'sourceType' | 'inferredType'> {
  const key = parameterKey(name);
  for (const match of body.matchAll(TYPED_ACCESS_PATTERN)) {
    const accessed = match[1] ?? match[2] ?? '';
    if (parameterKey(accessed) !== key) continue;
    const accessor = ACCESSOR_LOOKUP.get((match[3] ?? '').toLowerCase());
    if (accessor) return { sourceType: accessor.tag, inferredType: accessor.type };
  }
  return { sourceType: UNTYPED_SOURCE_TYPE, inferredType: 'opaque' };
}

/**
 * Parameters of one statement: SQL placeholders, then `ParamByName` names,
 * then `Params['X']` keys from the body. The first spelling seen is kept.
 */
export function extractParameters(body: string, sql: string): SqlParameter[] {
  const names = new Map<string, string>();

  for (const match of sql.matchAll(SQL_PLACEHOLDER_PATTERN)) addUnique(names, match[1] ?? '');
  for (const match of body.matchAll(PARAM_BY_NAME_PATTERN)) addUnique(names, match[1] ?? '');
  for (const match of body.matchAll(PARAMS_INDEXER_PATTERN)) addUnique(names, match[1] ?? '');

  return [...names.values()].map((name) => ({ name, ...inferParameterType(body, name) }));
}

/** Distinct `FieldByName('X')` names, first spelling kept */
export function extractFieldNames(body: string): string[] {
  const fields = new Map<string, string>();
  for (const match of body.matchAll(FIELD_BY_NAME_PATTERN)) {
    const name = match[1] ?? '';
    const key = name.toLowerCase();
    if (!fields.has(key)) fields.set(key, name);
  }
  return [...fields.values()];
}
