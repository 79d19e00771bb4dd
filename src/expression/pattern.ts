import type { ExpressionNode, MatchOptions, Pattern } from './types.js';
import { parse } from './parser.js';
import { simplify } from './simplifier.js';
import { match } from '../matchers/index.js';

/**
 * A compiled pattern implementation
 */
class CompiledPattern implements Pattern {
  readonly source: string;
  readonly tree: ExpressionNode;
  readonly simplified: ExpressionNode;
  private readonly options: MatchOptions;

  constructor(source: string, tree: ExpressionNode, options: MatchOptions) {
    this.source = source;
    this.tree = tree;
    this.simplified = simplify(tree);
    this.options = options;
  }

  test(subject: string, options?: MatchOptions): boolean {
    return match(this.simplified, subject, {
      mode: options?.mode ?? this.options.mode,
      full: options?.full ?? this.options.full,
    });
  }
}

/**
 * Compile a pattern string into a Pattern object.
 *
 * @param source - The pattern string
 * @param options - Default match options for `test`
 * @returns A compiled Pattern that can be tested against subjects
 * @throws ParseError if the pattern is invalid
 *
 * @example
 * ```ts
 * const pattern = compile('[ab]c|de');
 * pattern.test('bc'); // true
 * pattern.test('ae'); // false
 * ```
 */
export function compile(source: string, options: MatchOptions = {}): Pattern {
  return new CompiledPattern(source, parse(source), options);
}
