/**
 * File wrappers around the string-in/string-out core.
 *
 * @packageDocumentation
 */

import { YiniDocument, type YiniDocumentOptions } from '../document/document.js';
import { safeReadFile, safeWriteFile } from '../utils/safe-fs.js';

/**
 * The file operation that failed.
 */
export type FileOperation = 'read' | 'write';

/**
 * Error thrown when a YINI file cannot be read or written.
 */
export class FileError extends Error {
  public readonly operation: FileOperation;
  /** The path as given by the caller. */
  public readonly filePath: string;
  /** The underlying error, if any. */
  public override readonly cause: Error | undefined;

  /**
   * Creates a new FileError.
   *
   * @param operation - Whether reading or writing failed.
   * @param filePath - The path as given by the caller.
   * @param cause - The underlying error, if any.
   */
  constructor(operation: FileOperation, filePath: string, cause?: Error) {
    const verb = operation === 'read' ? 'Cannot open file' : 'Cannot write to file';
    super(cause !== undefined ? `${verb}: ${filePath} (${cause.message})` : `${verb}: ${filePath}`);
    this.name = 'FileError';
    this.operation = operation;
    this.filePath = filePath;
    this.cause = cause;
  }
}

function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Reads and parses a YINI file.
 *
 * @param filePath - Path to the file.
 * @param options - Options for the returned document.
 * @returns The parsed document.
 * @throws FileError if the file cannot be read.
 * @throws FormatError if the contents are malformed.
 *
 * @example
 * ```typescript
 * const doc = await loadDocument('settings.yini');
 * doc.lookup('server.port')?.asInteger();
 * ```
 */
export async function loadDocument(
  filePath: string,
  options: YiniDocumentOptions = {}
): Promise<YiniDocument> {
  let text: string;
  try {
    text = await safeReadFile(filePath);
  } catch (error) {
    throw new FileError('read', filePath, asError(error));
  }
  return new YiniDocument(options).parse(text);
}

/**
 * Serializes a document and writes it to a file, replacing its contents.
 *
 * @throws FileError if the file cannot be written.
 */
export async function saveDocument(filePath: string, document: YiniDocument): Promise<void> {
  const text = document.serialize();
  try {
    await safeWriteFile(filePath, text);
  } catch (error) {
    throw new FileError('write', filePath, asError(error));
  }
}
