import { describe, it, expect } from 'vitest';
import { match } from '../../src/matchers/index.js';
import { parse } from '../../src/expression/parser.js';

describe('match', () => {
  it('should use the consuming strategy by default', () => {
    expect(match(parse('ab|ac'), 'ac')).toBe(false);
  });

  it('should use the backtracking strategy when asked', () => {
    expect(match(parse('ab|ac'), 'ac', { mode: 'backtracking' })).toBe(true);
  });

  it('should match a prefix by default', () => {
    expect(match(parse('ab'), 'abc')).toBe(true);
  });

  it('should require the whole subject for a full match', () => {
    expect(match(parse('ab'), 'abc', { full: true })).toBe(false);
    expect(match(parse('ab'), 'abc', { mode: 'backtracking', full: true })).toBe(false);
  });

  it('should give the same tree the same answer on every call', () => {
    const tree = parse('[ab]c');
    expect(match(tree, 'bc')).toBe(true);
    expect(match(tree, 'bc')).toBe(true);
    expect(match(tree, 'xc')).toBe(false);
  });
});
