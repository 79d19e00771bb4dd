import type { ExpressionNode } from './types.js';

function indent(text: string, width: number): string {
  const pad = ' '.repeat(width);
  return text
    .split('\n')
    .map(line => pad + line)
    .join('\n');
}

/**
 * Compact pattern-algebra rendering of a tree.
 *
 * @example
 * ```ts
 * repr(parse('a[bc]')); // 'And("a", Or("b", "c"))'
 * ```
 */
export function repr(node: ExpressionNode): string {
  if (node.type === 'Literal') {
    return `"${node.value}"`;
  }
  return `${node.type}(${node.operands.map(repr).join(', ')})`;
}

/**
 * Indented multi-line rendering of a tree.
 *
 * Each operand goes on its own line, indented past the node's name and
 * opening parenthesis. The closing parenthesis ends the last operand line.
 *
 * @example
 * ```ts
 * display(parse('a[bc]'));
 * // And(
 * //     "a"
 * //     Or(
 * //        "b"
 * //        "c"))
 * ```
 */
export function display(node: ExpressionNode): string {
  if (node.type === 'Literal') {
    return repr(node);
  }
  const width = node.type.length + 1;
  const body = node.operands.map(operand => indent(display(operand), width)).join('\n');
  return `${node.type}(\n${body})`;
}
