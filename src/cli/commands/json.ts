/**
 * JSON command handler for the yini CLI.
 */

import { loadDocument } from '../../io/file.js';
import { documentOptions } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { splitArgs, usageError } from '../utils/errorHandling.js';

/**
 * Handles `yini json <file>`: prints the document as indented JSON.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 on success.
 */
export async function handleJsonCommand(context: CliContext): Promise<CliCommandResult> {
  const [filePath] = splitArgs(context.args).positionals;
  if (filePath === undefined) {
    return usageError('Missing file argument', 'json');
  }

  const doc = await loadDocument(filePath, documentOptions(context));
  console.log(JSON.stringify(doc.root.toJSON(), null, 2));
  return { exitCode: 0 };
}
