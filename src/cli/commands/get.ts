/**
 * Get command handler for the yini CLI.
 *
 * Prints one value addressed by a dotted path.
 */

import { NotFoundError } from '../../document/errors.js';
import { loadDocument } from '../../io/file.js';
import { renderLiteral } from '../../writer/writer.js';
import { documentOptions } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { splitArgs, usageError } from '../utils/errorHandling.js';

/**
 * Handles `yini get <file> <path>`.
 *
 * Scalars print in their text form; arrays print as an array literal.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 when the value exists.
 * @throws NotFoundError when the path does not name a property.
 */
export async function handleGetCommand(context: CliContext): Promise<CliCommandResult> {
  const [filePath, path] = splitArgs(context.args).positionals;
  if (filePath === undefined || path === undefined) {
    return usageError('Expected a file and a dotted path', 'get');
  }

  const doc = await loadDocument(filePath, documentOptions(context));
  const value = doc.lookup(path);
  if (value === undefined) {
    throw new NotFoundError('property', path);
  }

  console.log(value.isArray() ? renderLiteral(value, context.config.writer.quote) : value.asText());
  return { exitCode: 0 };
}
