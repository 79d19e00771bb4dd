import { ParseError, ExpressionNode } from './types.js';
import { literal, and, or } from './tree.js';
import { Scanner } from './scanner.js';

/**
 * Recursive descent parser for patterns.
 *
 * Grammar:
 *   regex  := concat ('|' regex)?
 *   concat := group concat?
 *   group  := '(' regex ')' | '[' chars ']' | symbol
 *   chars  := symbol chars?
 *
 * Alternation and concatenation are right-associative and always binary:
 * `abc` parses to And("a", And("b", "c")).
 */
export class Parser {
  private scanner: Scanner;
  private readonly source: string;

  constructor(source: string) {
    this.source = source;
    this.scanner = new Scanner(source);
  }

  /**
   * Parse the whole pattern and return the tree.
   */
  parse(): ExpressionNode {
    const ast = this.parseRegex();

    if (!this.scanner.isAtEnd()) {
      throw new ParseError(
        `Trailing input "${this.scanner.remaining()}"`,
        this.scanner.position,
        this.source
      );
    }

    return ast;
  }

  /**
   * regex := concat ('|' regex)?
   *
   * Stops at end of input or before a `)`, which belongs to the caller.
   */
  private parseRegex(): ExpressionNode {
    const left = this.parseConcat();

    if (this.scanner.match('|')) {
      const right = this.parseRegex();
      return or(left, right);
    }

    return left;
  }

  /**
   * concat := group concat?
   */
  private parseConcat(): ExpressionNode {
    const group = this.parseGroup();

    if (this.scanner.isAtEnd() || this.scanner.check('|', ')')) {
      return group;
    }

    return and(group, this.parseConcat());
  }

  /**
   * group := '(' regex ')' | '[' chars ']' | symbol
   */
  private parseGroup(): ExpressionNode {
    if (this.scanner.match('(')) {
      const inner = this.parseRegex();
      // parseRegex only stops before `)` or at the end
      this.scanner.advance();
      return inner;
    }

    if (this.scanner.match('[')) {
      const chars = this.parseChars();
      // `]` or `)`
      this.scanner.advance();
      return chars;
    }

    return literal(this.scanner.advance());
  }

  /**
   * chars := symbol chars?
   *
   * Reads up to (not including) the next `]` or `)`.
   */
  private parseChars(): ExpressionNode {
    const start = this.scanner.position - 1;
    const symbols: string[] = [];

    while (!this.scanner.check(']', ')')) {
      symbols.push(this.scanner.advance());
    }

    if (symbols.length === 0) {
      throw new ParseError('Empty character class', start, this.source);
    }

    let node: ExpressionNode = literal(symbols[symbols.length - 1]);
    for (let i = symbols.length - 2; i >= 0; i--) {
      node = or(symbols[i], node);
    }
    return node;
  }
}

/**
 * Parse a pattern string into an expression tree.
 *
 * @throws ParseError if the pattern is malformed
 *
 * @example
 * ```ts
 * repr(parse('[ab]c|de')); // 'Or(And(Or("a", "b"), "c"), And("d", "e"))'
 * ```
 */
export function parse(pattern: string): ExpressionNode {
  return new Parser(pattern).parse();
}
