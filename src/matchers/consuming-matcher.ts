import type { ExpressionNode } from '../expression/types.js';
import { InputCursor } from './cursor.js';

/**
 * Match a tree against the front of a cursor, consuming what matches.
 *
 * Both operators short-circuit. Input consumed by an operand that later
 * fails stays consumed: a failed `And` leaves the cursor part-way, and the
 * next alternative of an `Or` starts from wherever the previous one stopped.
 * `Or(And("a", "b"), And("a", "c"))` therefore rejects "ac".
 *
 * @example
 * ```ts
 * const cursor = new InputCursor('abz');
 * matchPrefix(parse('ab'), cursor); // true
 * cursor.remaining();               // 'z'
 * ```
 */
export function matchPrefix(node: ExpressionNode, cursor: InputCursor): boolean {
  switch (node.type) {
    case 'Literal':
      return cursor.match(node.value);

    case 'And':
      return node.operands.every(operand => matchPrefix(operand, cursor));

    case 'Or':
      return node.operands.some(operand => matchPrefix(operand, cursor));

    default:
      // TypeScript exhaustiveness check
      const _exhaustive: never = node;
      throw new Error(`Unknown node type: ${(_exhaustive as ExpressionNode).type}`);
  }
}

/**
 * Match with a fresh cursor over the subject.
 */
export function matchConsuming(node: ExpressionNode, subject: string, full = false): boolean {
  const cursor = new InputCursor(subject);
  return matchPrefix(node, cursor) && (!full || cursor.isAtEnd());
}
