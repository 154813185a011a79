/**
 * Shared error handling utilities for CLI commands.
 *
 * Provides a wrapper function that standardizes error handling
 * across command handlers, reducing code duplication.
 */

import { displayError } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Runs a command handler and converts a thrown error into exit code 1,
 * printing the error with suggestions for its type.
 *
 * @param fn - The function to run (sync or async).
 * @param options - Display options for error output.
 * @returns The handler's result, or `{ exitCode: 1 }` on error.
 */
export async function runCommand(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions
): Promise<CliCommandResult> {
  try {
    return await fn();
  } catch (error) {
    displayError(error, options);
    return { exitCode: 1 };
  }
}

/**
 * Wraps a command handler with standard error handling and exits the
 * process with the handler's exit code.
 *
 * @param fn - The function to wrap (sync or async).
 * @param options - Display options for error output.
 */
export function withErrorHandling(
  fn: () => CliCommandResult | Promise<CliCommandResult>,
  options: DisplayOptions = { colors: false }
): void {
  void (async () => {
    const result = await runCommand(fn, options);
    process.exit(result.exitCode);
  })();
}

/**
 * Reports a usage problem such as a missing argument.
 *
 * @param message - What is wrong with the invocation.
 * @param command - Command whose help to point at.
 * @returns A result with exit code 1.
 */
export function usageError(message: string, command: string): CliCommandResult {
  console.error(`Error: ${message}`);
  console.error(`\nRun "yini help ${command}" for usage information.`);
  return { exitCode: 1, message };
}

/**
 * Splits arguments into positionals and `--flags`.
 */
export function splitArgs(args: readonly string[]): { positionals: string[]; flags: Set<string> } {
  const positionals: string[] = [];
  const flags = new Set<string>();
  for (const arg of args) {
    if (arg.startsWith('--')) {
      flags.add(arg);
    } else {
      positionals.push(arg);
    }
  }
  return { positionals, flags };
}
