/**
 * Tests for parameter extraction and type inference
 */

import { describe, it, expect } from 'vitest';
import {
  extractFieldNames,
  extractParameters,
  inferParameterType,
  parameterKey,
} from '../src/extractors/parameters.js';

const BODY = [
  "  Q.SQL.Text := 'SELECT * FROM T WHERE ID = :PATIENT_ID AND D > :FromDate';",
  "  Q.ParamByName('patient_id').AsInteger := FId;",
  "  Q.ParamByName('FromDate').AsDateTime := Now;",
  "  Q.ParamByName('Extra').Value := 1;",
  "  Q.Params['Other'].AsString := 'x';",
].join('\n');

describe('extractParameters', () => {
  it('merges placeholders with ParamByName and Params names', () => {
    expect(extractParameters(BODY, 'SELECT * FROM T WHERE ID = :PatientId AND D > :FromDate')).toEqual([
      { name: 'PatientId', sourceType: 'AsInteger', inferredType: 'integer' },
      { name: 'FromDate', sourceType: 'AsDateTime', inferredType: 'date-time' },
      { name: 'Extra', sourceType: 'Value', inferredType: 'opaque' },
      { name: 'Other', sourceType: 'AsString', inferredType: 'text' },
    ]);
  });

  it('falls back to Variant when no accessor is used', () => {
    expect(extractParameters('Q.Open;', 'SELECT * FROM T WHERE ID = :Id')).toEqual([
      { name: 'Id', sourceType: 'Variant', inferredType: 'opaque' },
    ]);
  });

  it('returns no parameters for a statement without placeholders', () => {
    expect(extractParameters('Q.Open;', 'SELECT * FROM T')).toEqual([]);
  });
});

describe('inferParameterType', () => {
  it('uses the earliest typed accessor', () => {
    const body = "Q.ParamByName('A').AsString := ''; Q.ParamByName('A').AsInteger := 1;";
    expect(inferParameterType(body, 'A')).toEqual({ sourceType: 'AsString', inferredType: 'text' });
  });

  it('skips accessors it does not know', () => {
    const body = "Q.ParamByName('A').AsGuid := G; Q.ParamByName('A').AsCurrency := C;";
    expect(inferParameterType(body, 'A')).toEqual({ sourceType: 'AsCurrency', inferredType: 'decimal' });
  });

  it('matches names across spellings', () => {
    const body = "Q.ParamByName('ORDER_ID').AsLargeInt := Id;";
    expect(inferParameterType(body, 'OrderId')).toEqual({ sourceType: 'AsLargeInt', inferredType: 'integer' });
    expect(parameterKey('ORDER_ID')).toBe(parameterKey('OrderId'));
  });
});

describe('extractFieldNames', () => {
  it('lists distinct FieldByName names in order', () => {
    const body = "A := Q.FieldByName('NAME').AsString; B := Q.FieldByName('name').AsString; C := Q.FieldByName('ID').AsInteger;";
    expect(extractFieldNames(body)).toEqual(['NAME', 'ID']);
  });
});
