import type { ExpressionNode, AndNode, OrNode, OperatorKind } from './types.js';
import { operator, equals } from './tree.js';

/**
 * A rewrite from one tree to another
 */
export type Transform = (tree: ExpressionNode) => ExpressionNode;

function isOperator(node: ExpressionNode, kind: OperatorKind): node is AndNode | OrNode {
  return node.type === kind;
}

/**
 * Pull the operands of same-kind children up into the node.
 *
 * Only one level is removed per call. The node's other operands come first,
 * followed by the operands of each flattened child in order, so
 * `And(And("a", "b"), "c")` becomes `And("c", "a", "b")`.
 * Nodes of another kind are returned unchanged.
 *
 * @example
 * ```ts
 * flatten(and('a', and('b', and('c', 'd'))), 'And');
 * // And("a", "b", And("c", "d"))
 * ```
 */
export function flatten(tree: ExpressionNode, kind: OperatorKind): ExpressionNode {
  if (!isOperator(tree, kind)) {
    return tree;
  }

  const kept = tree.operands.filter(op => !isOperator(op, kind));
  const pulled = tree.operands
    .filter((op): op is AndNode | OrNode => isOperator(op, kind))
    .flatMap(op => op.operands);

  return operator(kind, [...kept, ...pulled]);
}

export const flattenAnds: Transform = tree => flatten(tree, 'And');

export const flattenOrs: Transform = tree => flatten(tree, 'Or');

/**
 * Lift a transform so it applies to every node, children before parents.
 * Subtrees whose children are unchanged are reused.
 */
export function bottomUp(transform: Transform): Transform {
  const apply: Transform = tree => {
    if (tree.type === 'Literal') {
      return transform(tree);
    }

    const original = tree.operands;
    const operands = original.map(operand => apply(operand));
    const unchanged = operands.every((op, i) => op === original[i]);
    return transform(unchanged ? tree : operator(tree.type, operands));
  };
  return apply;
}

/**
 * Apply the transforms in order, again and again, until a round leaves
 * the tree structurally equal to what it started with.
 */
export function runUntilUnchanged(
  tree: ExpressionNode,
  transforms: readonly Transform[]
): ExpressionNode {
  let current = tree;
  for (;;) {
    const next = transforms.reduce((t, transform) => transform(t), current);
    if (equals(next, current)) {
      return current;
    }
    current = next;
  }
}

const passes: readonly Transform[] = [bottomUp(flattenOrs), bottomUp(flattenAnds)];

/**
 * Flatten nested `Or` in `Or` and `And` in `And` throughout the tree.
 *
 * The input is never modified.
 *
 * @example
 * ```ts
 * repr(simplify(parse('abcd'))); // 'And("a", "b", "c", "d")'
 * ```
 */
export function simplify(tree: ExpressionNode): ExpressionNode {
  return runUntilUnchanged(tree, passes);
}
