import type {
  ExpressionNode,
  LiteralNode,
  AndNode,
  OrNode,
  Operand,
  OperatorKind,
} from './types.js';

function toNode(operand: Operand): ExpressionNode {
  return typeof operand === 'string' ? literal(operand) : operand;
}

/**
 * Create a literal node. The value is expected to be a single symbol.
 */
export function literal(value: string): LiteralNode {
  return { type: 'Literal', value };
}

/**
 * Create an AND node over the given operands.
 *
 * @example
 * ```ts
 * and('a', or('b', 'c')); // And("a", Or("b", "c"))
 * ```
 */
export function and(...operands: Operand[]): AndNode {
  return { type: 'And', operands: operands.map(toNode) };
}

/**
 * Create an OR node over the given operands.
 */
export function or(...operands: Operand[]): OrNode {
  return { type: 'Or', operands: operands.map(toNode) };
}

/**
 * Create an operator node of the given kind.
 */
export function operator(kind: OperatorKind, operands: readonly Operand[]): AndNode | OrNode {
  return kind === 'And' ? and(...operands) : or(...operands);
}

/**
 * Deep structural equality. Operand order matters, identity does not.
 */
export function equals(a: ExpressionNode, b: ExpressionNode): boolean {
  if (a === b) {
    return true;
  }

  switch (a.type) {
    case 'Literal':
      return b.type === 'Literal' && a.value === b.value;

    case 'And':
    case 'Or': {
      if (b.type === 'Literal' || b.type !== a.type || a.operands.length !== b.operands.length) {
        return false;
      }
      const others = b.operands;
      return a.operands.every((operand, i) => equals(operand, others[i]));
    }

    default: {
      const _exhaustive: never = a;
      throw new Error(`Unknown node type: ${(_exhaustive as ExpressionNode).type}`);
    }
  }
}
