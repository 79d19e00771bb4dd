import type { MatchMode } from '../expression/types.js';

export type {
  ExpressionNode,
  MatchMode,
  MatchOptions,
  Pattern,
} from '../expression/types.js';

/**
 * Options for the command-line entry point
 */
export interface CliOptions {
  /**
   * Matching strategy.
   * Read from `--mode`, then `MINIRE_MODE`. Defaults to `consuming`.
   */
  mode: MatchMode;

  /**
   * If true, the whole subject must match.
   * Read from `--full`, then `MINIRE_FULL`.
   */
  full: boolean;

  /**
   * Enable debug logging.
   * Read from `--debug`, then `MINIRE_DEBUG`.
   */
  debug: boolean;
}

/**
 * Command-line arguments after option resolution
 */
export interface CliInvocation {
  options: CliOptions;

  /**
   * Positional arguments in order: pattern, then subject
   */
  positionals: string[];
}
