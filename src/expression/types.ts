/**
 * Base interface for all expression tree nodes
 */
export interface ASTNode {
  readonly type: string;
}

/**
 * Literal node matching exactly one symbol
 */
export interface LiteralNode extends ASTNode {
  readonly type: 'Literal';
  readonly value: string;
}

/**
 * AND node: every operand must match, in order
 */
export interface AndNode extends ASTNode {
  readonly type: 'And';
  readonly operands: readonly ExpressionNode[];
}

/**
 * OR node: the first operand that matches wins
 */
export interface OrNode extends ASTNode {
  readonly type: 'Or';
  readonly operands: readonly ExpressionNode[];
}

/**
 * Union type of all expression node types
 */
export type ExpressionNode = LiteralNode | AndNode | OrNode;

/**
 * Kinds of node that hold operands
 */
export type OperatorKind = (AndNode | OrNode)['type'];

/**
 * An operand as accepted by the node constructors. Strings become literals.
 */
export type Operand = ExpressionNode | string;

/**
 * How a tree is matched against a subject.
 *
 * - `consuming`: a single cursor is advanced by every literal that matches
 *   and is never rewound, so a failed branch can leave input consumed.
 * - `backtracking`: every reachable end position is explored.
 */
export type MatchMode = 'consuming' | 'backtracking';

/**
 * Options for matching
 */
export interface MatchOptions {
  /**
   * Matching strategy. Defaults to `consuming`.
   */
  mode?: MatchMode;

  /**
   * If true, the whole subject must be consumed.
   * If false (default), matching a prefix is enough.
   */
  full?: boolean;
}

/**
 * A parsed and simplified pattern, ready to be tested against subjects
 */
export interface Pattern {
  /**
   * The original pattern string
   */
  readonly source: string;

  /**
   * The tree as parsed
   */
  readonly tree: ExpressionNode;

  /**
   * The tree after simplification
   */
  readonly simplified: ExpressionNode;

  /**
   * Match the simplified tree against a subject.
   * Options given here override those given to `compile`.
   */
  test(subject: string, options?: MatchOptions): boolean;
}

/**
 * Error thrown when parsing fails
 */
export class ParseError extends Error {
  constructor(
    message: string,
    public readonly position: number,
    public readonly source: string
  ) {
    super(`${message} at position ${position}: "${source}"`);
    this.name = 'ParseError';
  }
}
