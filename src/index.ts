// Main entry point for minire

// Expression tree, parser and simplifier
export {
  literal,
  and,
  or,
  operator,
  equals,
  repr,
  display,
  Scanner,
  Parser,
  parse,
  flatten,
  flattenAnds,
  flattenOrs,
  bottomUp,
  runUntilUnchanged,
  simplify,
  compile,
  ParseError,
} from './expression/index.js';
export type {
  ExpressionNode,
  LiteralNode,
  AndNode,
  OrNode,
  OperatorKind,
  Operand,
  Transform,
} from './expression/index.js';

// Matching
export {
  match,
  matchPrefix,
  matchConsuming,
  matchBacktracking,
  endPositions,
  InputCursor,
} from './matchers/index.js';

// Command line
export { run, USAGE } from './cli/run.js';
export type { Output } from './cli/run.js';
export { resolveInvocation, OptionsError } from './cli/options.js';

// Re-export types
export type {
  MatchMode,
  MatchOptions,
  Pattern,
  CliOptions,
  CliInvocation,
} from './types/index.js';
