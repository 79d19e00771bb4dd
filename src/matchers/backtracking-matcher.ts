import type { ExpressionNode } from '../expression/types.js';

function union(positions: number[]): number[] {
  return [...new Set(positions)];
}

/**
 * Every offset at which a match of `node` starting at `start` can end,
 * without duplicates.
 */
export function endPositions(node: ExpressionNode, subject: string, start: number): number[] {
  switch (node.type) {
    case 'Literal':
      return start < subject.length && subject[start] === node.value ? [start + 1] : [];

    case 'And': {
      let positions = [start];
      for (const operand of node.operands) {
        positions = union(positions.flatMap(p => endPositions(operand, subject, p)));
        if (positions.length === 0) break;
      }
      return positions;
    }

    case 'Or':
      return union(node.operands.flatMap(operand => endPositions(operand, subject, start)));

    default:
      const _exhaustive: never = node;
      throw new Error(`Unknown node type: ${(_exhaustive as ExpressionNode).type}`);
  }
}

/**
 * Match a tree against a subject, trying every alternative from the
 * same starting point.
 */
export function matchBacktracking(node: ExpressionNode, subject: string, full = false): boolean {
  const ends = endPositions(node, subject, 0);
  return full ? ends.includes(subject.length) : ends.length > 0;
}
