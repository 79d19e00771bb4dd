import type { ExpressionNode, MatchOptions } from '../expression/types.js';
import { matchConsuming } from './consuming-matcher.js';
import { matchBacktracking } from './backtracking-matcher.js';

export { InputCursor } from './cursor.js';
export { matchPrefix, matchConsuming } from './consuming-matcher.js';
export { endPositions, matchBacktracking } from './backtracking-matcher.js';

/**
 * Match a tree against a subject.
 *
 * By default a prefix match is enough and the consuming strategy is used.
 * Never throws.
 *
 * @example
 * ```ts
 * match(parse('[ab]c'), 'bc');                           // true
 * match(parse('[ab]c'), 'bcd', { full: true });          // false
 * match(parse('ab|ac'), 'ac', { mode: 'backtracking' }); // true
 * ```
 */
export function match(tree: ExpressionNode, subject: string, options: MatchOptions = {}): boolean {
  const full = options.full ?? false;

  switch (options.mode ?? 'consuming') {
    case 'consuming':
      return matchConsuming(tree, subject, full);
    case 'backtracking':
      return matchBacktracking(tree, subject, full);
  }
}
