/**
 * Tests for the comment/string scanner and string-aware helpers
 */

import { describe, it, expect } from 'vitest';
import { countNewlines, stripComments } from '../src/scanner/comments.js';
import {
  bracketDepthAt,
  findTopLevel,
  hasTopLevelPlus,
  readCallArguments,
  singleLiteral,
  splitTopLevel,
} from '../src/scanner/literals.js';

describe('stripComments', () => {
  it('removes line comments and keeps the newline', () => {
    expect(stripComments('x := 1; // note\ny := 2;')).toBe('x := 1; \ny := 2;');
  });

  it('removes brace and paren-star block comments', () => {
    expect(stripComments('a{ c }b')).toBe('ab');
    expect(stripComments('a(* x *)b')).toBe('ab');
  });

  it('keeps newlines inside block comments', () => {
    expect(stripComments('a{\n\n}b')).toBe('a\n\nb');
    expect(stripComments('a(*\r\n*)b')).toBe('a\r\nb');
  });

  it('ends a block comment at the first close', () => {
    expect(stripComments('{ a { b } c }')).toBe(' c }');
  });

  it('leaves comment markers inside string literals alone', () => {
    const source = "s := '{not a comment} // nope (* still text *)';";
    expect(stripComments(source)).toBe(source);
  });

  it('passes doubled quotes through as part of the literal', () => {
    expect(stripComments("s := 'it''s // here'; // gone")).toBe("s := 'it''s // here'; ");
  });

  describe('blank mode', () => {
    it('replaces comment characters with spaces', () => {
      expect(stripComments('a{ c }b', 'blank')).toBe('a     b');
      expect(stripComments('a(* x *)b', 'blank')).toBe('a       b');
      expect(stripComments('x; // y', 'blank')).toBe('x;     ');
    });

    it('keeps every offset aligned with the source', () => {
      const source = "begin\n  { old:\n  Q.SQL.Text := 'x'; }\n  Q.Open; // run\nend;";
      const scanned = stripComments(source, 'blank');
      expect(scanned.length).toBe(source.length);
      expect(scanned.indexOf('Q.Open')).toBe(source.indexOf('Q.Open'));
      expect(scanned).not.toContain('SQL');
    });
  });
});

describe('countNewlines', () => {
  it('counts newlines in a half-open range', () => {
    expect(countNewlines('a\nb\nc', 0, 5)).toBe(2);
    expect(countNewlines('a\nb\nc', 2, 5)).toBe(1);
    expect(countNewlines('a\nb\nc', 0, 1)).toBe(0);
  });
});

describe('literal helpers', () => {
  it('measures bracket depth outside literals', () => {
    const text = "A(B, ')', [C";
    expect(bracketDepthAt(text, 0)).toBe(0);
    expect(bracketDepthAt(text, 2)).toBe(1);
    expect(bracketDepthAt(text, 11)).toBe(2);
  });

  it('findTopLevel skips separators inside literals and calls', () => {
    expect(findTopLevel("'a;b'; c", 0, ';')).toBe(5);
    expect(findTopLevel('f(a;b);', 0, ';')).toBe(6);
    expect(findTopLevel('abc', 0, ';')).toBe(-1);
  });

  it('findTopLevel stops at an unmatched closing parenthesis', () => {
    expect(findTopLevel('a, b) + c', 0, '+')).toBe(4);
  });

  it('readCallArguments reads up to the matching parenthesis', () => {
    const text = "Add('x)' + IntToStr(N));";
    expect(readCallArguments(text, 3)).toEqual({ args: "'x)' + IntToStr(N)", close: 22 });
  });

  it('readCallArguments returns undefined for an unclosed call', () => {
    expect(readCallArguments("Add('x'", 3)).toBeUndefined();
  });

  it('splitTopLevel ignores separators in literals and brackets', () => {
    expect(splitTopLevel("'a+b' + F(x+y) + c", '+')).toEqual(["'a+b' ", ' F(x+y) ', ' c']);
    expect(splitTopLevel('a, [b, c], d', ',')).toEqual(['a', ' [b, c]', ' d']);
  });

  it('hasTopLevelPlus ignores a plus inside a literal', () => {
    expect(hasTopLevelPlus("'SELECT A + B FROM T'")).toBe(false);
    expect(hasTopLevelPlus("'SELECT ' + Cols")).toBe(true);
  });

  it('singleLiteral unescapes exactly one literal', () => {
    expect(singleLiteral("  'it''s'  ")).toBe("it's");
    expect(singleLiteral("''")).toBe('');
    expect(singleLiteral("'a' + 'b'")).toBeUndefined();
    expect(singleLiteral('Name')).toBeUndefined();
    expect(singleLiteral("'open")).toBeUndefined();
  });
});
