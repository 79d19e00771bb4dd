import { describe, it, expect } from 'vitest';
import { Scanner } from '../../src/expression/scanner.js';
import { ParseError } from '../../src/expression/types.js';

describe('Scanner', () => {
  it('should be at end for empty input', () => {
    const scanner = new Scanner('');
    expect(scanner.isAtEnd()).toBe(true);
    expect(scanner.peek()).toBeUndefined();
  });

  it('should yield one symbol at a time', () => {
    const scanner = new Scanner('a(');
    expect(scanner.advance()).toBe('a');
    expect(scanner.position).toBe(1);
    expect(scanner.advance()).toBe('(');
    expect(scanner.isAtEnd()).toBe(true);
  });

  it('should peek without consuming', () => {
    const scanner = new Scanner('xy');
    expect(scanner.peek()).toBe('x');
    expect(scanner.peek()).toBe('x');
    expect(scanner.position).toBe(0);
  });

  it('should check against several symbols', () => {
    const scanner = new Scanner(')');
    expect(scanner.check('|', ')')).toBe(true);
    expect(scanner.check(']')).toBe(false);
  });

  it('should consume only on a successful match', () => {
    const scanner = new Scanner('|a');
    expect(scanner.match('a')).toBe(false);
    expect(scanner.position).toBe(0);
    expect(scanner.match('|')).toBe(true);
    expect(scanner.remaining()).toBe('a');
  });

  it('should throw ParseError when advancing past the end', () => {
    const scanner = new Scanner('a');
    scanner.advance();
    expect(() => scanner.advance()).toThrow(ParseError);
    expect(() => scanner.advance()).toThrow('Unexpected end of pattern at position 1: "a"');
  });
});
