/**
 * CLI types and interfaces for the yini CLI.
 */

import type { YiniConfig } from '../config/types.js';
import type { Logger } from '../utils/logger.js';

/**
 * Terminal display options.
 */
export interface DisplayOptions {
  /**
   * Whether to use ANSI colors in error output.
   */
  colors: boolean;
}

/**
 * CLI command context.
 */
export interface CliContext {
  /**
   * Command arguments, without the command name and global flags.
   */
  args: string[];

  /**
   * Effective configuration: yini.toml merged with YINI_* overrides.
   */
  config: YiniConfig;

  /**
   * Logger writing JSON lines to stderr.
   */
  logger: Logger;

  display: DisplayOptions;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, non-zero for error).
   */
  exitCode: number;

  /**
   * Optional message to display.
   */
  message?: string;
}

/**
 * CLI command handler function.
 */
export type CliCommandHandler = (context: CliContext) => Promise<CliCommandResult>;
