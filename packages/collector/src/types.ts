/**
 * Core types for the sqltrail collector
 */

// ============================================================================
// Operation Types
// ============================================================================

export type OperationType =
  | 'Select'
  | 'Insert'
  | 'Update'
  | 'Delete'
  | 'DDL'
  | 'StoredProcedure'
  | 'Unknown';

/** Semantic scalar kind inferred from a parameter accessor */
export type InferredType =
  | 'integer'
  | 'text'
  | 'boolean'
  | 'floating'
  | 'decimal'
  | 'date-time'
  | 'binary'
  | 'opaque';

export interface SqlParameter {
  name: string;
  /** Accessor observed in the method body, e.g. "AsInteger". "Variant" when none was seen. */
  sourceType: string;
  inferredType: InferredType;
}

/** Ids of the shape rules in the statement extractor battery */
export type StatementRuleId =
  | 'sql-text-literal'
  | 'sql-text-concat'
  | 'sql-add-block'
  | 'sql-add-concat'
  | 'variable-assign'
  | 'direct-execute'
  | 'query-value';

export interface DatabaseOperation {
  methodName: string;
  containingClass: string;
  unitName: string;
  sqlStatement: string;
  operationType: OperationType;
  /** Upper-cased target table, when one could be read from the statement */
  tableName?: string;
  parameters: SqlParameter[];
  isPartOfTransaction: boolean;
  /** Present iff isPartOfTransaction */
  transactionGroupId?: string;
  /** The unmodified method body */
  originalSourceText: string;
  /** 1-based line in the unit where the statement originates */
  sourceLineNumber: number;
  isDynamic: boolean;
  /** Database component class that runs the statement, e.g. TFDQuery */
  componentType: string;
  extractor: StatementRuleId;
}

export interface TransactionGroup {
  groupId: string;
  methodName: string;
  containingClass: string;
  operations: DatabaseOperation[];
  originalSourceText: string;
}

/** Variable name (lower-cased) -> component class */
export type QueryVariableMap = Map<string, string>;

// ============================================================================
// Scanner Types
// ============================================================================

export type CommentMode = 'remove' | 'blank';

export type BodyMatching = 'block-stack' | 'begin-count';

export type MethodKind = 'procedure' | 'function' | 'constructor' | 'destructor';

export interface MethodBody {
  kind: MethodKind;
  isClassMethod: boolean;
  className: string;
  methodName: string;
  /** Offset of the header in the unit */
  headerStart: number;
  /** Offset just past the header's terminating semicolon */
  headerEnd: number;
  /** Offset just past the closing `end;` */
  bodyEnd: number;
  /** 1-based line of the header */
  startLine: number;
  /** Scanned text from headerEnd to bodyEnd */
  body: string;
}

// ============================================================================
// Extraction Types
// ============================================================================

export type DynamicSqlMode = 'template' | 'sentinel';

/** One raw statement found by a shape rule inside a method body */
export interface StatementCandidate {
  rule: StatementRuleId;
  text: string;
  /** Offset inside the method body */
  position: number;
  isDynamic: boolean;
  /** Variable the statement is assigned to, e.g. `qry` in `qry.SQL.Text` */
  target?: string;
}

export interface StatementRule {
  id: StatementRuleId;
  extract(body: string): StatementCandidate[];
}

export interface RefineContext {
  unitName: string;
  containingClass: string;
  methodName: string;
  operationType: OperationType;
  tableName?: string;
  /** Scanned method body */
  methodBody: string;
}

/** Boundary hook used by a field-access analyzer, e.g. to expand `SELECT *` */
export type RefineStatement = (sql: string, context: RefineContext) => string;

export interface ExtractionOptions {
  unitName: string;
  /** Caller-supplied component map; derived from the unit when absent */
  queryVariables?: QueryVariableMap;
  dynamicSql?: DynamicSqlMode;
  bodyMatching?: BodyMatching;
  quoteReservedWords?: boolean;
  refineStatement?: RefineStatement;
}

// ============================================================================
// Collector Types
// ============================================================================

export interface UnitExtraction {
  /** Path relative to the collection root */
  file: string;
  unitName: string;
  lineCount: number;
  componentTypes: string[];
  operations: DatabaseOperation[];
  transactionGroups: TransactionGroup[];
}

export interface SkippedFile {
  file: string;
  reason: string;
}

export interface CollectorArtifact {
  version: '1.0';
  /**
   * Schema version (semver). Used by consumers to check compatibility.
   */
  schemaVersion: string;
  extractedAt: string; // ISO date
  codebase: {
    root: string;
    filesScanned: number;
    unitsWithOperations: number;
  };
  units: UnitExtraction[];
  operations: DatabaseOperation[];
  transactionGroups: TransactionGroup[];
  skippedFiles: SkippedFile[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface ExtractionConfig {
  dynamicSql: DynamicSqlMode;
  bodyMatching: BodyMatching;
  quoteReservedWords: boolean;
}

export interface CollectorConfig {
  version: '1.0';

  // Paths to scan
  include: string[];
  exclude: string[];

  /** Encoding the units are stored in */
  encoding: BufferEncoding;

  extraction: ExtractionConfig;
}

export interface ExtractorOptions {
  targetPath: string;
  config: CollectorConfig;
}
