#!/usr/bin/env node

/**
 * yini CLI entry point.
 *
 * This is the main entry point for the 'yini' CLI command.
 */

import { getEnvVarDocumentation } from '../config/env.js';
import { createCliApp } from './app.js';
import { handleCheckCommand } from './commands/check.js';
import { handleFormatCommand } from './commands/format.js';
import { handleGetCommand } from './commands/get.js';
import { handleJsonCommand } from './commands/json.js';
import { handleVersionCommand } from './commands/version.js';
import type { CliCommandHandler } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';

/**
 * Lists the YINI_* environment variables, one per line.
 */
function formatEnvVars(): string {
  const docs = Object.entries(getEnvVarDocumentation());
  const width = Math.max(...docs.map(([name]) => name.length));
  return docs.map(([name, doc]) => `  ${name.padEnd(width)}  ${doc.description}`).join('\n');
}

/**
 * Displays usage information.
 */
function showHelp(): void {
  const helpText = `
yini - read, check and format YINI configuration files

USAGE:
  yini <command> [options]

COMMANDS:
  check       Parse a file and report its size
  format      Print a file in canonical form
  get         Print one value by its dotted path
  json        Print a file as JSON
  help        Show this help message
  version     Show version information

OPTIONS:
  --help, -h     Show help for a command
  --version, -v  Show version information
  --verbose      Write debug logs to stderr

CONFIGURATION:
  Settings are read from yini.toml in the working directory and may be
  overridden with these environment variables:

${formatEnvVars()}

EXAMPLES:
  yini check app.yini
  yini format app.yini --write
  yini get app.yini server.port
  yini json app.yini
`;
  console.log(helpText);
}

/**
 * Shows help for a specific command.
 *
 * @param commandName - The command name to show help for.
 */
function showHelpForCommand(commandName: string): void {
  const commandHelp: Record<string, string> = {
    check: `
USAGE: yini check <file>

Parses the file and prints the number of properties and sections it holds.
Exits with status 1 and the offending line when the file is malformed.
`,
    format: `
USAGE: yini format <file> [--write]

Prints the file in canonical form. Comments are not kept.

OPTIONS:
  --write    Rewrite the file in place instead of printing it
`,
    get: `
USAGE: yini get <file> <path>

Prints the value at a dotted path such as server.connection.port.
Section names come first and the key last.
`,
    json: `
USAGE: yini json <file>

Prints the whole document as indented JSON.
`,
  };

  const help = commandHelp[commandName];
  if (help !== undefined) {
    console.log(help);
  } else {
    console.log(`No help available for command: ${commandName}`);
    console.log('\nRun "yini help" for a list of commands.');
  }
}

/**
 * Shows error message with help.
 *
 * @param message - The error message to display.
 */
function showError(message: string): void {
  console.error(`Error: ${message}`);
  console.error('\nRun "yini help" for usage information.');
}

const COMMANDS: Readonly<Record<string, CliCommandHandler>> = {
  check: handleCheckCommand,
  format: handleFormatCommand,
  get: handleGetCommand,
  json: handleJsonCommand,
};

/**
 * Builds the context for a command and runs its handler.
 */
function runWithContext(handler: CliCommandHandler, commandArgs: string[]): void {
  const context = createCliApp({ args: commandArgs });
  withErrorHandling(() => handler(context), context.display);
}

/**
 * Main CLI entry point.
 */
function main(): void {
  const args = process.argv.slice(2);
  const command = args[0] ?? '';
  const commandArgs = args.slice(1);

  if (!command) {
    showHelp();
    process.exit(0);
  }

  switch (command) {
    case 'help':
    case '--help':
    case '-h':
      if (commandArgs[0] !== undefined) {
        showHelpForCommand(commandArgs[0]);
      } else {
        showHelp();
      }
      process.exit(0);
      break;

    case 'version':
    case '--version':
    case '-v':
      withErrorHandling(() => handleVersionCommand());
      break;

    default: {
      const handler = COMMANDS[command];
      if (handler === undefined) {
        showError(`Unknown command: ${command}`);
        process.exit(1);
      }
      if (commandArgs.includes('--help') || commandArgs.includes('-h')) {
        showHelpForCommand(command);
        process.exit(0);
      }
      runWithContext(handler, commandArgs);
    }
  }
}

try {
  main();
} catch (error) {
  console.error('Unexpected error:', error instanceof Error ? error.message : String(error));
  if (error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}
