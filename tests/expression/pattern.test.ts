import { describe, it, expect } from 'vitest';
import { compile } from '../../src/expression/pattern.js';
import { parse } from '../../src/expression/parser.js';
import { ParseError } from '../../src/expression/types.js';
import { and } from '../../src/expression/tree.js';

describe('compile', () => {
  it('should keep the source and the parsed tree', () => {
    const pattern = compile('abc');
    expect(pattern.source).toBe('abc');
    expect(pattern.tree).toEqual(parse('abc'));
  });

  it('should simplify the tree once', () => {
    expect(compile('abc').simplified).toEqual(and('a', 'b', 'c'));
  });

  it('should test subjects against the simplified tree', () => {
    const pattern = compile('[ab]c|de');
    expect(pattern.test('ac')).toBe(true);
    expect(pattern.test('de')).toBe(true);
    expect(pattern.test('ae')).toBe(false);
  });

  it('should apply the options given at compile time', () => {
    expect(compile('ab', { full: true }).test('abc')).toBe(false);
  });

  it('should let options given to test override compile-time options', () => {
    const pattern = compile('ab|ac', { full: true });
    expect(pattern.test('ac')).toBe(false);
    expect(pattern.test('ac', { mode: 'backtracking' })).toBe(true);
    expect(pattern.test('acx', { mode: 'backtracking', full: false })).toBe(true);
  });

  it('should keep compile-time options that test leaves undefined', () => {
    const pattern = compile('ab|ac', { mode: 'backtracking', full: true });
    expect(pattern.test('ac', { mode: undefined })).toBe(true);
    expect(pattern.test('acx', { full: undefined })).toBe(false);
  });

  it('should throw ParseError for an invalid pattern', () => {
    expect(() => compile('(a')).toThrow(ParseError);
  });
});
