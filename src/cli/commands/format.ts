/**
 * Format command handler for the yini CLI.
 *
 * Prints a file in canonical form, or rewrites it in place with `--write`.
 * Comments are not kept.
 */

import { loadDocument, saveDocument } from '../../io/file.js';
import { documentOptions } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { splitArgs, usageError } from '../utils/errorHandling.js';

/**
 * Handles `yini format <file> [--write]`.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 on success.
 * @throws FileError or FormatError on failure.
 */
export async function handleFormatCommand(context: CliContext): Promise<CliCommandResult> {
  const { positionals, flags } = splitArgs(context.args);
  const [filePath] = positionals;
  if (filePath === undefined) {
    return usageError('Missing file argument', 'format');
  }

  const doc = await loadDocument(filePath, documentOptions(context));

  if (flags.has('--write')) {
    await saveDocument(filePath, doc);
    context.logger.info('file_formatted', { path: filePath });
    console.log(`Formatted ${filePath}`);
  } else {
    process.stdout.write(doc.serialize());
  }

  return { exitCode: 0 };
}
