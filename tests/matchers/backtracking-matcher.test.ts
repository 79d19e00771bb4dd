import { describe, it, expect } from 'vitest';
import { endPositions, matchBacktracking } from '../../src/matchers/backtracking-matcher.js';
import { parse } from '../../src/expression/parser.js';

describe('endPositions', () => {
  it('should end one past a matching literal', () => {
    expect(endPositions(parse('b'), 'ab', 1)).toEqual([2]);
  });

  it('should have no ends at the end of the subject', () => {
    expect(endPositions(parse('a'), 'a', 1)).toEqual([]);
  });

  it('should collect every alternative in order', () => {
    expect(endPositions(parse('a|ab'), 'ab', 0)).toEqual([1, 2]);
  });

  it('should drop duplicate ends', () => {
    expect(endPositions(parse('a|a'), 'a', 0)).toEqual([1]);
  });

  it('should thread every end through a concatenation', () => {
    expect(endPositions(parse('(a|ab)(b|c)'), 'abc', 0)).toEqual([2, 3]);
  });
});

describe('matchBacktracking', () => {
  it('should retry alternatives from the original position', () => {
    expect(matchBacktracking(parse('ab|ac'), 'ac')).toBe(true);
  });

  it('should not match a later alternative on leftover input', () => {
    expect(matchBacktracking(parse('ab|c'), 'ac')).toBe(false);
  });

  it('should agree with the class examples', () => {
    const tree = parse('[ab]c|de');
    expect(matchBacktracking(tree, 'ac')).toBe(true);
    expect(matchBacktracking(tree, 'bc')).toBe(true);
    expect(matchBacktracking(tree, 'de')).toBe(true);
    expect(matchBacktracking(tree, 'ae')).toBe(false);
  });

  it('should find a full match behind a shorter one', () => {
    expect(matchBacktracking(parse('a|ab'), 'ab', true)).toBe(true);
  });

  it('should reject a full match that leaves input', () => {
    expect(matchBacktracking(parse('a|ab'), 'abc', true)).toBe(false);
  });

  it('should reject the empty subject', () => {
    expect(matchBacktracking(parse('a'), '')).toBe(false);
  });
});
