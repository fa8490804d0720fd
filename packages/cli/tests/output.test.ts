/**
 * Tests for artifact serialization and the operations table
 */

import { describe, it, expect } from 'vitest';
import { extractUnit, type CollectorArtifact } from '../../collector/src/index.js';
import { formatArtifact, renderOperationsTable } from '../src/lib/output.js';

const SOURCE = [
  'unit Orders;',
  'implementation',
  'procedure TOrders.Load;',
  'begin',
  "  Q.SQL.Text := 'SELECT * FROM ORDERS';",
  'end;',
  'end.',
].join('\n');

function makeArtifact(): CollectorArtifact {
  const unit = extractUnit(SOURCE, 'Orders.pas', { unitName: 'Orders' });
  return {
    version: '1.0',
    schemaVersion: '1.0.0',
    extractedAt: '2026-01-01T00:00:00.000Z',
    codebase: { root: '/project', filesScanned: 2, unitsWithOperations: 1 },
    units: [unit],
    operations: unit.operations,
    transactionGroups: unit.transactionGroups,
    skippedFiles: [{ file: 'Broken.pas', reason: 'EACCES: permission denied' }],
  };
}

describe('formatArtifact', () => {
  it('writes the whole artifact as JSON', () => {
    const artifact = makeArtifact();
    expect(JSON.parse(formatArtifact(artifact, 'json'))).toEqual(artifact);
  });

  it('indents JSON when asked', () => {
    expect(formatArtifact(makeArtifact(), 'json', true)).toContain('\n  "version": "1.0"');
  });

  it('writes one NDJSON record per entry after a meta line', () => {
    const lines = formatArtifact(makeArtifact(), 'ndjson').split('\n');

    expect(lines).toHaveLength(5);
    expect(lines[4]).toBe('');
    expect(JSON.parse(lines[0] ?? '')).toEqual({
      _meta: {
        version: '1.0',
        schemaVersion: '1.0.0',
        extractedAt: '2026-01-01T00:00:00.000Z',
        codebase: { root: '/project', filesScanned: 2, unitsWithOperations: 1 },
      },
    });
    expect(JSON.parse(lines[1] ?? '')).toEqual({
      _type: 'unit',
      file: 'Orders.pas',
      unitName: 'Orders',
      lineCount: 7,
      componentTypes: [],
      operationCount: 1,
      transactionGroupCount: 0,
    });
    expect(JSON.parse(lines[2] ?? '')).toMatchObject({ _type: 'operation', sqlStatement: 'SELECT * FROM ORDERS' });
    expect(JSON.parse(lines[3] ?? '')).toEqual({
      _type: 'skippedFile',
      file: 'Broken.pas',
      reason: 'EACCES: permission denied',
    });
  });
});

describe('renderOperationsTable', () => {
  it('says so when there is nothing to show', () => {
    expect(renderOperationsTable([])).toContain('No database operations found.');
  });

  it('shows one row per operation', () => {
    const table = renderOperationsTable(makeArtifact().operations);
    const rows = table.split('\n');

    expect(rows).toHaveLength(2);
    expect(rows[0]).toContain('Statement');
    expect(rows[1]).toContain('TOrders.Load');
    expect(rows[1]).toContain('ORDERS');
    expect(rows[1]?.endsWith(' SELECT * FROM ORDERS')).toBe(true);
  });

  it('cuts long statements to the first line', () => {
    const [operation] = makeArtifact().operations;
    expect(operation).toBeDefined();
    if (!operation) return;

    const long = { ...operation, sqlStatement: `SELECT ${'A, '.repeat(40)}B FROM ORDERS\nWHERE 1 = 1` };
    const row = renderOperationsTable([long]).split('\n')[1] ?? '';

    expect(row.endsWith(`SELECT ${'A, '.repeat(20)}A,...`)).toBe(true);
  });
});
