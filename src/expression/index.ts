export { ParseError } from './types.js';
export type {
  ASTNode,
  LiteralNode,
  AndNode,
  OrNode,
  ExpressionNode,
  OperatorKind,
  Operand,
  MatchMode,
  MatchOptions,
  Pattern,
} from './types.js';

export { literal, and, or, operator, equals } from './tree.js';
export { repr, display } from './render.js';
export { Scanner } from './scanner.js';
export { Parser, parse } from './parser.js';
export {
  flatten,
  flattenAnds,
  flattenOrs,
  bottomUp,
  runUntilUnchanged,
  simplify,
} from './simplifier.js';
export type { Transform } from './simplifier.js';
export { compile } from './pattern.js';
