/**
 * Tests for query-variable tracking and component resolution
 */

import { describe, it, expect } from 'vitest';
import {
  extractQueryComponentTypes,
  extractQueryVariables,
  resolveComponentType,
} from '../src/extractors/query-variables.js';

const SOURCE = [
  'type',
  '  TDm = class(TDataModule)',
  '    FQuery: TIBQuery;',
  '    Orders: TFDQuery;',
  '  end;',
  '',
  'procedure TDm.Run;',
  'var',
  '  Q1, Q2: TADOQuery;',
  'begin',
  '  Tmp := TZQuery.Create(nil);',
  'end;',
].join('\n');

describe('extractQueryVariables', () => {
  it('collects declarations, creations and fields', () => {
    const variables = extractQueryVariables(SOURCE);

    expect(variables.get('fquery')).toBe('TIBQuery');
    expect(variables.get('query')).toBe('TIBQuery');
    expect(variables.get('orders')).toBe('TFDQuery');
    expect(variables.get('q1')).toBe('TADOQuery');
    expect(variables.get('q2')).toBe('TADOQuery');
    expect(variables.get('tmp')).toBe('TZQuery');
    expect(variables.size).toBe(6);
  });

  it('canonicalizes the spelling of the class', () => {
    expect(extractQueryVariables('var Q: tfdquery;').get('q')).toBe('TFDQuery');
  });
});

describe('extractQueryComponentTypes', () => {
  it('lists the query classes a unit mentions in table order', () => {
    expect(extractQueryComponentTypes(SOURCE)).toEqual(['TIBQuery', 'TADOQuery', 'TFDQuery', 'TZQuery']);
  });
});

describe('resolveComponentType', () => {
  const variables = extractQueryVariables(SOURCE);

  it('prefers the statement target', () => {
    expect(resolveComponentType(variables, '', 'Orders', [])).toBe('TFDQuery');
  });

  it('falls back to the first known SQL target in the body', () => {
    expect(resolveComponentType(variables, "Other.SQL.Clear; q2.SQL.Text := 'x';", undefined, [])).toBe(
      'TADOQuery'
    );
  });

  it('uses the only entry of a single-entry map', () => {
    expect(resolveComponentType(new Map([['qry', 'TUniQuery']]), '', undefined, [])).toBe('TUniQuery');
  });

  it('falls back to the unit classes, then TQuery', () => {
    expect(resolveComponentType(new Map(), '', undefined, ['TFDQuery'])).toBe('TFDQuery');
    expect(resolveComponentType(new Map(), '', undefined, [])).toBe('TQuery');
  });
});
