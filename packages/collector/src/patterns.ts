/**
 * Pattern tables
 *
 * Every shape the extractors look for is compiled once here. Global patterns
 * are only ever consumed through `matchAll`, which works on a copy, so the
 * tables are never mutated at run time.
 */

// ============================================================================
// Component classes
// ============================================================================

export const QUERY_COMPONENT_TYPES = [
  'TQuery',
  'TIBQuery',
  'TADOQuery',
  'TFDQuery',
  'TZQuery',
  'TSQLQuery',
  'TIBDataSet',
  'TADODataSet',
  'TFDMemTable',
  'TClientDataSet',
  'TSQLDataSet',
  'TUniQuery',
] as const;

export const CONNECTION_COMPONENT_TYPES = [
  'TDatabase',
  'TIBDatabase',
  'TADOConnection',
  'TFDConnection',
  'TZConnection',
  'TSQLConnection',
  'TUniConnection',
] as const;

export const STORED_PROC_COMPONENT_TYPES = [
  'TStoredProc',
  'TIBStoredProc',
  'TADOStoredProc',
  'TFDStoredProc',
  'TZStoredProc',
] as const;

/** Fallback when nothing in a unit names a query class */
export const DEFAULT_COMPONENT_TYPE = 'TQuery';

const alternation = (names: readonly string[]): string => names.join('|');

export const QUERY_COMPONENT_PATTERN = new RegExp(`\\b(?:${alternation(QUERY_COMPONENT_TYPES)})\\b`, 'i');
export const CONNECTION_COMPONENT_PATTERN = new RegExp(
  `\\b(?:${alternation(CONNECTION_COMPONENT_TYPES)})\\b`,
  'i'
);
export const STORED_PROC_COMPONENT_PATTERN = new RegExp(
  `\\b(?:${alternation(STORED_PROC_COMPONENT_TYPES)})\\b`,
  'i'
);

/** One entry per query class, used to list the classes a unit mentions */
export const QUERY_COMPONENT_TYPE_PATTERNS: ReadonlyArray<{ type: string; pattern: RegExp }> =
  QUERY_COMPONENT_TYPES.map((type) => ({ type, pattern: new RegExp(`\\b${type}\\b`, 'i') }));

// ============================================================================
// Query variables
// ============================================================================

/** `Name: TFDQuery` and `A, B: TFDQuery` (var sections, parameters) */
export const QUERY_VARIABLE_DECLARATION_PATTERN = new RegExp(
  `\\b(\\w+(?:\\s*,\\s*\\w+)*)\\s*:\\s*(${alternation(QUERY_COMPONENT_TYPES)})\\b`,
  'gi'
);

/** `Name := TFDQuery.Create(...)` */
export const QUERY_VARIABLE_CREATION_PATTERN = new RegExp(
  `\\b(\\w+)\\s*:=\\s*(${alternation(QUERY_COMPONENT_TYPES)})\\s*\\.\\s*Create\\b`,
  'gi'
);

/** `FName: TIBQuery;` on its own line (class fields) */
export const QUERY_FIELD_DECLARATION_PATTERN = new RegExp(
  `^\\s*(F)?(\\w+)\\s*:\\s*(${alternation(QUERY_COMPONENT_TYPES)})\\s*;`,
  'gim'
);

/** `Target.SQL.` or `Target.SelectSQL.` with the target captured */
export const SQL_TARGET_PATTERN = /\b(\w+)\s*\.\s*(?:SQL|SelectSQL)\s*\.\s*(?:Text|Add|Clear)\b/gi;

// ============================================================================
// Method headers
// ============================================================================

/**
 * `[class] procedure|function|constructor|destructor Class.Method[(params)][: Result];`
 * Groups: 1 class prefix, 2 kind, 3 class, 4 method.
 */
export const METHOD_HEADER_PATTERN =
  /^[ \t]*(?:(class)\s+)?(procedure|function|constructor|destructor)\s+(\w+)\s*\.\s*(\w+)(?:\s*\([^)]*\))?\s*(?::\s*[\w.]+)?\s*;/gim;

// ============================================================================
// Statement shapes
// ============================================================================

/** Keywords a string must start with to be taken for SQL */
export const SQL_START_PATTERN =
  /^\s*(?:SELECT|INSERT|UPDATE|DELETE|EXECUTE|EXEC|CALL|CREATE|ALTER|DROP|SET\s+GENERATOR|WITH|MERGE)\b/i;

const SQL_PROPERTY = '(?:SQL|SelectSQL)';
const TARGET_PREFIX = '(?:\\b(\\w+)\\s*\\.\\s*)?';

/** `[target.]SQL.Text :=` - the right-hand side is read up to the next top-level `;` */
export const SQL_TEXT_ASSIGN_PATTERN = new RegExp(
  `${TARGET_PREFIX}\\b${SQL_PROPERTY}\\s*\\.\\s*Text\\s*:=`,
  'gi'
);

/** `[target.]SQL.Add(` - arguments are read up to the matching `)` */
export const SQL_ADD_CALL_PATTERN = new RegExp(`${TARGET_PREFIX}\\b${SQL_PROPERTY}\\s*\\.\\s*Add\\s*\\(`, 'gi');

/** `[target.]SQL.Clear` */
export const SQL_CLEAR_PATTERN = new RegExp(`${TARGET_PREFIX}\\b${SQL_PROPERTY}\\s*\\.\\s*Clear\\b`, 'gi');

/** `Var :=` whose right-hand side opens with a SQL literal; not a property such as `.Text :=` */
export const VARIABLE_SQL_ASSIGN_PATTERN =
  /(?<!\.\s*)\b(\w+)\s*:=\s*(?='\s*(?:SELECT|INSERT|UPDATE|DELETE|EXECUTE|EXEC|CALL|CREATE|ALTER|DROP|SET\s+GENERATOR|WITH|MERGE)\b)/gi;

/** Execute helpers that take the statement first */
export const DIRECT_EXECUTE_PATTERN = /\b(ExecuteQuery|ExecuteSQL|ExecQuery|ExecProc|ExecSQL)\s*\(/gi;

/** Execute helpers that may take a connection before the statement */
export const CONNECTION_EXECUTE_HELPERS = new Set(['executequery', 'executesql', 'execquery']);

export const QUERY_VALUE_PATTERN =
  /\b(QueryValueAs(?:Integer|String|Float|Boolean|DateTime|Variant)|QueryValue|GetFieldValue|LookupValue)\s*\(/gi;

// ============================================================================
// Activity signals
// ============================================================================

export const SQL_MUTATION_PATTERN = new RegExp(`\\b${SQL_PROPERTY}\\s*\\.\\s*(?:Clear|Add|Text)\\s*[(:=;]`, 'i');

export const TRANSACTION_PATTERN =
  /\b(?:StartTransaction|Commit(?:Retaining)?|Rollback(?:Retaining)?|InTransaction)\b/i;

export const DIRECT_EXECUTE_LITERAL_PATTERN = new RegExp(
  `\\b(?:ExecuteQuery|ExecuteSQL|ExecQuery|ExecProc|ExecSQL)\\s*\\(\\s*(?:[\\w.]+\\s*,\\s*)?'`,
  'i'
);

export const QUERY_VALUE_LITERAL_PATTERN = new RegExp(
  `\\b(?:QueryValueAs(?:Integer|String|Float|Boolean|DateTime|Variant)|QueryValue|GetFieldValue|LookupValue)\\s*\\(\\s*(?:[\\w.]+\\s*,\\s*)?'`,
  'i'
);

export const VARIABLE_SQL_LITERAL_PATTERN =
  /\b\w+\s*:=\s*'\s*(?:SELECT|INSERT|UPDATE|DELETE|EXECUTE|EXEC|CALL|CREATE|ALTER|DROP|SET\s+GENERATOR|WITH|MERGE)\b/i;
