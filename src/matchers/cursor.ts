/**
 * Mutable read position over an immutable subject string.
 *
 * Each top-level match owns its own cursor. Literal matches advance it and
 * nothing ever moves it back.
 */
export class InputCursor {
  private readonly subject: string;
  private offset: number = 0;

  constructor(subject: string) {
    this.subject = subject;
  }

  /**
   * Number of symbols consumed so far
   */
  get position(): number {
    return this.offset;
  }

  /**
   * Peek at the front symbol without consuming it
   */
  peek(): string | undefined {
    return this.offset < this.subject.length ? this.subject[this.offset] : undefined;
  }

  /**
   * Check if the whole subject has been consumed
   */
  isAtEnd(): boolean {
    return this.offset >= this.subject.length;
  }

  /**
   * Consume the front symbol if it equals the given symbol
   */
  match(symbol: string): boolean {
    if (this.peek() === symbol) {
      this.offset++;
      return true;
    }
    return false;
  }

  /**
   * The unconsumed rest of the subject
   */
  remaining(): string {
    return this.subject.slice(this.offset);
  }
}
