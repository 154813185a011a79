/**
 * Parse-time errors.
 *
 * @packageDocumentation
 */

/**
 * Error thrown for any syntax fault in YINI text.
 *
 * Parsing stops at the first fault; there is no partial result.
 */
export class FormatError extends Error {
  /** 1-based line number in the original source. */
  public readonly lineNumber: number;
  /** The offending line after comment removal and trimming. */
  public readonly line: string;

  /**
   * Creates a new FormatError.
   *
   * @param reason - What is wrong with the line, e.g. "Invalid line format".
   * @param lineNumber - 1-based source line number.
   * @param line - The offending line text.
   */
  constructor(reason: string, lineNumber: number, line: string) {
    super(`${reason} at line ${String(lineNumber)}: ${line}`);
    this.name = 'FormatError';
    this.lineNumber = lineNumber;
    this.line = line;
  }
}
