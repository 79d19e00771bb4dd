import { ParseError } from './types.js';

/**
 * Scanner for patterns.
 * Every character of a pattern is its own token, so the scanner is a
 * symbol-level cursor over the source string.
 */
export class Scanner {
  private readonly source: string;
  private current: number = 0;

  constructor(source: string) {
    this.source = source;
  }

  /**
   * Zero-based offset of the next symbol
   */
  get position(): number {
    return this.current;
  }

  /**
   * Peek at the current symbol without consuming it
   */
  peek(): string | undefined {
    return this.current < this.source.length ? this.source[this.current] : undefined;
  }

  /**
   * Consume and return the current symbol
   */
  advance(): string {
    const symbol = this.peek();
    if (symbol === undefined) {
      throw new ParseError('Unexpected end of pattern', this.current, this.source);
    }
    this.current++;
    return symbol;
  }

  /**
   * Check if we've reached the end of the pattern
   */
  isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  /**
   * Check if the current symbol is one of the given symbols
   */
  check(...symbols: string[]): boolean {
    const symbol = this.peek();
    return symbol !== undefined && symbols.includes(symbol);
  }

  /**
   * Consume the current symbol if it is the given symbol
   */
  match(symbol: string): boolean {
    if (this.check(symbol)) {
      this.current++;
      return true;
    }
    return false;
  }

  /**
   * The unconsumed rest of the pattern
   */
  remaining(): string {
    return this.source.slice(this.current);
  }
}
