/**
 * Artifact and operation rendering
 */

import pc from 'picocolors';
import type { CollectorArtifact, DatabaseOperation } from '../../../collector/src/index.js';

export type OutputFormat = 'json' | 'ndjson';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'ndjson'];

/**
 * Serialize an artifact. NDJSON puts a `_meta` line first and then one line
 * per unit, operation, transaction group and skipped file, each tagged with `_type`.
 */
export function formatArtifact(artifact: CollectorArtifact, format: OutputFormat, pretty = false): string {
  if (format === 'json') {
    return pretty ? JSON.stringify(artifact, null, 2) : JSON.stringify(artifact);
  }

  const lines: string[] = [];
  lines.push(
    JSON.stringify({
      _meta: {
        version: artifact.version,
        schemaVersion: artifact.schemaVersion,
        extractedAt: artifact.extractedAt,
        codebase: artifact.codebase,
      },
    })
  );
  for (const unit of artifact.units) {
    const { operations, transactionGroups, ...summary } = unit;
    lines.push(
      JSON.stringify({
        _type: 'unit',
        ...summary,
        operationCount: operations.length,
        transactionGroupCount: transactionGroups.length,
      })
    );
  }
  for (const operation of artifact.operations) {
    lines.push(JSON.stringify({ _type: 'operation', ...operation }));
  }
  for (const group of artifact.transactionGroups) {
    lines.push(JSON.stringify({ _type: 'transactionGroup', ...group }));
  }
  for (const skipped of artifact.skippedFiles) {
    lines.push(JSON.stringify({ _type: 'skippedFile', ...skipped }));
  }
  return lines.join('\n') + '\n';
}

function firstLine(text: string): string {
  const [line = ''] = text.split('\n');
  return line.length > 72 ? `${line.slice(0, 69)}...` : line;
}

/**
 * One row per operation: line, method, kind, table, statement.
 */
export function renderOperationsTable(operations: readonly DatabaseOperation[]): string {
  if (operations.length === 0) {
    return pc.dim('No database operations found.');
  }

  const rows = operations.map((operation) => ({
    line: String(operation.sourceLineNumber),
    method: `${operation.containingClass}.${operation.methodName}`,
    kind: operation.operationType,
    table: operation.tableName ?? '-',
    sql: firstLine(operation.sqlStatement),
    transactional: operation.isPartOfTransaction,
    dynamic: operation.isDynamic,
  }));

  const lineWidth = Math.max(4, ...rows.map((row) => row.line.length));
  const methodWidth = Math.max(6, ...rows.map((row) => row.method.length));
  const kindWidth = Math.max(4, ...rows.map((row) => row.kind.length));
  const tableWidth = Math.max(5, ...rows.map((row) => row.table.length));

  const header = [
    'Line'.padEnd(lineWidth),
    'Method'.padEnd(methodWidth),
    'Kind'.padEnd(kindWidth),
    'Table'.padEnd(tableWidth),
    'Statement',
  ].join('  ');

  const body = rows.map((row) => {
    const flags = `${row.transactional ? pc.magenta('T') : ' '}${row.dynamic ? pc.yellow('D') : ' '}`;
    return [
      pc.dim(row.line.padStart(lineWidth)),
      pc.cyan(row.method.padEnd(methodWidth)),
      row.kind.padEnd(kindWidth),
      row.table.padEnd(tableWidth),
      `${flags} ${row.sql}`,
    ].join('  ');
  });

  return [pc.bold(header), ...body].join('\n');
}
