import { ParseError, ExpressionNode } from '../expression/types.js';
import { parse } from '../expression/parser.js';
import { simplify } from '../expression/simplifier.js';
import { repr, display } from '../expression/render.js';
import { match } from '../matchers/index.js';
import type { CliOptions } from '../types/index.js';
import { resolveInvocation, OptionsError } from './options.js';

/**
 * Where the CLI writes its results and errors
 */
export interface Output {
  log(message: string): void;
  error(message: string): void;
}

export const USAGE = 'example: minire "[ab]c" bc';

/**
 * Log a message if debug is enabled
 */
function log(output: Output, options: CliOptions, message: string): void {
  if (options.debug) {
    output.log(`[minire] ${message}`);
  }
}

/**
 * Run the command line: parse the pattern, print the parsed and simplified
 * trees, then print whether the subject matches.
 *
 * @param args - Arguments without the node binary and script path
 * @returns The process exit code
 *
 * @example
 * ```bash
 * minire '[ab]c' bc
 * minire --mode backtracking --full 'ab|ac' ac
 * MINIRE_DEBUG=true minire abc abc
 * ```
 */
export function run(
  args: string[],
  env: Record<string, string | undefined> = process.env,
  output: Output = console
): number {
  let options: CliOptions;
  let positionals: string[];
  try {
    ({ options, positionals } = resolveInvocation(args, env));
  } catch (error) {
    if (error instanceof OptionsError) {
      output.error(error.message);
      return 1;
    }
    throw error;
  }

  log(output, options, `Options: mode=${options.mode}, full=${options.full}, debug=${options.debug}`);

  if (positionals.length !== 2) {
    output.log(USAGE);
    return 0;
  }

  const [pattern, subject] = positionals;
  output.log(`${pattern} ${subject}`);

  let tree: ExpressionNode;
  try {
    tree = parse(pattern);
  } catch (error) {
    if (error instanceof ParseError) {
      output.error(error.message);
      return 1;
    }
    throw error;
  }
  log(output, options, `Parsed: ${repr(tree)}`);
  output.log(display(tree));

  const simplified = simplify(tree);
  log(output, options, `Simplified: ${repr(simplified)}`);
  output.log(display(simplified));

  const matched = match(simplified, subject, { mode: options.mode, full: options.full });
  output.log(String(matched));
  return 0;
}
