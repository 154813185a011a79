/**
 * YINI parser: comment removal, line parsing and literal parsing.
 *
 * @packageDocumentation
 */

export type {
  ParserOptions,
  CommentOptions,
  LiteralOptions,
  UnterminatedCommentPolicy,
  SourceLine,
} from './types.js';

export { DEFAULT_PARSER_OPTIONS } from './types.js';

export { FormatError } from './errors.js';

export { preprocess, stripComments } from './preprocessor.js';

export { parseLiteral, splitTopLevel } from './literal.js';

export type { LiteralLocation } from './literal.js';

export {
  NESTING_MARKER,
  countMarkers,
  parse,
  parseInto,
  resolveParserOptions,
} from './line-parser.js';
