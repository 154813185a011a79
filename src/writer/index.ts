/**
 * YINI writer.
 *
 * @packageDocumentation
 */

export type { WriterOptions, QuoteStyle } from './writer.js';

export { DEFAULT_WRITER_OPTIONS, renderLiteral, serialize } from './writer.js';
