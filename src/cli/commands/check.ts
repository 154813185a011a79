/**
 * Check command handler for the yini CLI.
 *
 * Parses a file and reports how many properties and sections it holds.
 */

import type { Section } from '../../document/section.js';
import { loadDocument } from '../../io/file.js';
import { documentOptions } from '../app.js';
import type { CliCommandResult, CliContext } from '../types.js';
import { splitArgs, usageError } from '../utils/errorHandling.js';

/**
 * Totals for a section tree, the root itself not counted as a section.
 */
export interface TreeCounts {
  properties: number;
  sections: number;
}

/**
 * Counts every property and section below a section.
 */
export function countTree(section: Section): TreeCounts {
  const counts: TreeCounts = { properties: section.propertyCount, sections: 0 };
  for (const [, child] of section.sections()) {
    const nested = countTree(child);
    counts.properties += nested.properties;
    counts.sections += nested.sections + 1;
  }
  return counts;
}

/**
 * Handles `yini check <file>`.
 *
 * @param context - The CLI context.
 * @returns Exit code 0 when the file parses.
 * @throws FileError or FormatError when it does not.
 */
export async function handleCheckCommand(context: CliContext): Promise<CliCommandResult> {
  const [filePath] = splitArgs(context.args).positionals;
  if (filePath === undefined) {
    return usageError('Missing file argument', 'check');
  }

  const doc = await loadDocument(filePath, documentOptions(context));
  const counts = countTree(doc.root);
  console.log(
    `OK ${filePath}: ${String(counts.properties)} properties, ${String(counts.sections)} sections`
  );
  return { exitCode: 0 };
}
