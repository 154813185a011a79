/**
 * Document model: typed values and the section tree.
 *
 * @packageDocumentation
 */

export type { ValueData, ValueKind, ValueInput, JsonValue } from './value.js';

export {
  Value,
  TRUE_KEYWORDS,
  FALSE_KEYWORDS,
  parseIntegerLiteral,
  parseRealLiteral,
  formatReal,
  matchBooleanKeyword,
} from './value.js';

export { Section } from './section.js';

export type { SectionJson } from './section.js';

export { YiniDocument } from './document.js';

export type { YiniDocumentOptions } from './document.js';

export { TypeCoercionError, NotFoundError } from './errors.js';

export type { CoercionTarget, LookupKind } from './errors.js';
