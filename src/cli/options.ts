import yargs from 'yargs';
import type { MatchMode } from '../expression/types.js';
import type { CliInvocation } from '../types/index.js';

const MODES: readonly MatchMode[] = ['consuming', 'backtracking'];

/**
 * Error thrown when a command-line option has an unusable value
 */
export class OptionsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OptionsError';
  }
}

/**
 * Environment flags count as set when they are `true`, `"true"` or `"1"`
 */
export function isEnabled(value: unknown): boolean {
  return value === true || value === 'true' || value === '1';
}

function isMatchMode(value: string): value is MatchMode {
  return MODES.some(mode => mode === value);
}

/**
 * Resolve CLI options from arguments first and the environment second.
 *
 * @param args - Arguments without the node binary and script path
 * @param env - Environment to read `MINIRE_*` fallbacks from
 * @throws OptionsError if the mode is not a known match mode
 *
 * @example
 * ```ts
 * resolveInvocation(['--full', 'ab', 'ab'], { MINIRE_MODE: 'backtracking' });
 * // { options: { mode: 'backtracking', full: true, debug: false }, positionals: ['ab', 'ab'] }
 * ```
 */
export function resolveInvocation(
  args: string[],
  env: Record<string, string | undefined>
): CliInvocation {
  const argv = yargs(args)
    .parserConfiguration({
      'parse-positional-numbers': false,
      // patterns and subjects may start with a dash
      'unknown-options-as-args': true,
    })
    .option('mode', { type: 'string', describe: 'consuming or backtracking' })
    .option('full', { type: 'boolean', describe: 'require the whole subject to match' })
    .option('debug', { type: 'boolean', describe: 'log parsing and simplification steps' })
    .help(false)
    .version(false)
    .exitProcess(false)
    .parseSync();

  const mode = argv.mode ?? env.MINIRE_MODE ?? 'consuming';
  if (!isMatchMode(mode)) {
    throw new OptionsError(`Unknown mode "${mode}", expected one of: ${MODES.join(', ')}`);
  }

  return {
    options: {
      mode,
      full: argv.full ?? isEnabled(env.MINIRE_FULL),
      debug: argv.debug ?? isEnabled(env.MINIRE_DEBUG),
    },
    positionals: argv._.map(String),
  };
}
