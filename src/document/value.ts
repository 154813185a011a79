/**
 * Typed values stored in YINI documents.
 *
 * A {@link Value} holds exactly one of five variants: text, integer, real,
 * boolean or array. The variant is exposed as the {@link ValueData}
 * discriminated union so callers can switch on `kind` exhaustively; the
 * coercion accessors (`asText`, `asInteger`, ...) implement the conversion
 * rules between variants.
 *
 * @packageDocumentation
 */

import { TypeCoercionError } from './errors.js';

/**
 * The active variant of a Value.
 */
export type ValueData =
  | { readonly kind: 'text'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'real'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean }
  | { readonly kind: 'array'; readonly value: readonly Value[] };

/**
 * Discriminant of {@link ValueData}.
 */
export type ValueKind = ValueData['kind'];

/**
 * Plain JavaScript input accepted by {@link Value.from} and `Section.set`.
 */
export type ValueInput = string | number | boolean | Value | readonly ValueInput[];

/**
 * Plain JavaScript form of a Value, as returned by {@link Value.toJSON}.
 */
export type JsonValue = string | number | boolean | JsonValue[];

/** Keywords read as boolean true, compared case-insensitively. */
export const TRUE_KEYWORDS: readonly string[] = ['true', 'yes', 'on'];

/** Keywords read as boolean false, compared case-insensitively. */
export const FALSE_KEYWORDS: readonly string[] = ['false', 'no', 'off'];

/** Signed decimal integer, whole-string match. */
const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Decimal with a mandatory point and optional exponent, whole-string match. */
const REAL_PATTERN = /^[+-]?(?:\d+\.\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Any decimal number, point optional, used when coercing text. */
const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Parses an integer literal. Returns undefined unless the whole string is a
 * signed run of digits whose value is a safe integer.
 *
 * @example
 * ```typescript
 * parseIntegerLiteral('-42');  // -42
 * parseIntegerLiteral('42px'); // undefined
 * ```
 */
export function parseIntegerLiteral(text: string): number | undefined {
  if (!INTEGER_PATTERN.test(text)) {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isSafeInteger(parsed) ? normalizeZero(parsed) : undefined;
}

/**
 * Parses a real literal. The literal must contain a decimal point and
 * evaluate to a finite number.
 *
 * @example
 * ```typescript
 * parseRealLiteral('30.5');   // 30.5
 * parseRealLiteral('1.0e+3'); // 1000
 * parseRealLiteral('1.2.3');  // undefined
 * ```
 */
export function parseRealLiteral(text: string): number | undefined {
  if (!REAL_PATTERN.test(text)) {
    return undefined;
  }
  const parsed = Number(text);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * Formats a real number so that it always reads back as a real: a decimal
 * point is added when the default formatting has none.
 *
 * @example
 * ```typescript
 * formatReal(30);    // "30.0"
 * formatReal(0.25);  // "0.25"
 * formatReal(1e21);  // "1.0e+21"
 * ```
 */
export function formatReal(value: number): string {
  const text = String(value);
  if (text.includes('.')) {
    return text;
  }
  const exponentAt = text.indexOf('e');
  if (exponentAt === -1) {
    return `${text}.0`;
  }
  return `${text.slice(0, exponentAt)}.0${text.slice(exponentAt)}`;
}

/**
 * Matches a boolean keyword case-insensitively.
 *
 * @returns The boolean, or undefined when the text is not a keyword.
 */
export function matchBooleanKeyword(text: string): boolean | undefined {
  const lower = text.toLowerCase();
  if (TRUE_KEYWORDS.includes(lower)) {
    return true;
  }
  if (FALSE_KEYWORDS.includes(lower)) {
    return false;
  }
  return undefined;
}

function normalizeZero(value: number): number {
  return value === 0 ? 0 : value;
}

function parseNumericText(text: string): number | undefined {
  const trimmed = text.trim();
  if (!NUMBER_PATTERN.test(trimmed)) {
    return undefined;
  }
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}

/**
 * An immutable typed value.
 *
 * @example
 * ```typescript
 * const port = Value.integer(8080);
 * port.isInteger();   // true
 * port.asText();      // "8080"
 * port.asReal();      // 8080
 *
 * const flag = Value.text('Yes');
 * flag.asBoolean();   // true
 * flag.asInteger();   // throws TypeCoercionError
 * ```
 */
export class Value {
  /** The active variant. */
  public readonly data: ValueData;

  private constructor(data: ValueData) {
    this.data = data;
  }

  /**
   * Creates a text value.
   */
  static text(value: string): Value {
    return new Value({ kind: 'text', value });
  }

  /**
   * Creates an integer value.
   *
   * @throws RangeError if the number is not a safe integer.
   */
  static integer(value: number): Value {
    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`Integer value must be a safe integer, got ${String(value)}`);
    }
    return new Value({ kind: 'integer', value: normalizeZero(value) });
  }

  /**
   * Creates a real value.
   *
   * @throws RangeError if the number is NaN or infinite.
   */
  static real(value: number): Value {
    if (!Number.isFinite(value)) {
      throw new RangeError(`Real value must be finite, got ${String(value)}`);
    }
    return new Value({ kind: 'real', value });
  }

  static boolean(value: boolean): Value {
    return new Value({ kind: 'boolean', value });
  }

  /**
   * Creates an array value. Elements are copied into a frozen list.
   */
  static array(elements: Iterable<Value>): Value {
    return new Value({ kind: 'array', value: Object.freeze([...elements]) });
  }

  /**
   * Converts plain JavaScript input into a Value.
   *
   * Safe-integer numbers become integers and every other finite number
   * becomes a real; use {@link Value.real} to store a whole number as a real.
   *
   * @example
   * ```typescript
   * Value.from(3);               // integer 3
   * Value.from(3.5);             // real 3.5
   * Value.from(['a', 1, true]);  // array of text, integer, boolean
   * ```
   */
  static from(input: ValueInput): Value {
    if (input instanceof Value) {
      return input;
    }
    if (typeof input === 'string') {
      return Value.text(input);
    }
    if (typeof input === 'boolean') {
      return Value.boolean(input);
    }
    if (typeof input === 'number') {
      return Number.isSafeInteger(input) ? Value.integer(input) : Value.real(input);
    }
    return Value.array(input.map((element) => Value.from(element)));
  }

  /**
   * The variant tag of this value.
   */
  get kind(): ValueKind {
    return this.data.kind;
  }

  isText(): boolean {
    return this.data.kind === 'text';
  }

  isInteger(): boolean {
    return this.data.kind === 'integer';
  }

  isReal(): boolean {
    return this.data.kind === 'real';
  }

  isBoolean(): boolean {
    return this.data.kind === 'boolean';
  }

  isArray(): boolean {
    return this.data.kind === 'array';
  }

  /**
   * Returns the text form of a scalar. Reals always carry a decimal point.
   *
   * @throws TypeCoercionError for arrays.
   */
  asText(): string {
    const data = this.data;
    switch (data.kind) {
      case 'text':
        return data.value;
      case 'integer':
        return String(data.value);
      case 'real':
        return formatReal(data.value);
      case 'boolean':
        return data.value ? 'true' : 'false';
      case 'array':
        throw new TypeCoercionError('array', 'text');
      default: {
        const exhaustiveCheck: never = data;
        return exhaustiveCheck;
      }
    }
  }

  /**
   * Returns the value as an integer. Reals and numeric text are truncated
   * toward zero.
   *
   * @throws TypeCoercionError for booleans, arrays, non-numeric text and
   * results outside the safe integer range.
   */
  asInteger(): number {
    const data = this.data;
    switch (data.kind) {
      case 'integer':
        return data.value;
      case 'real':
        return this.truncate(data.value);
      case 'text': {
        const parsed = parseNumericText(data.value);
        if (parsed === undefined) {
          throw new TypeCoercionError(
            'text',
            'integer',
            `Cannot convert text '${data.value}' to integer`
          );
        }
        return this.truncate(parsed);
      }
      case 'boolean':
      case 'array':
        throw new TypeCoercionError(data.kind, 'integer');
      default: {
        const exhaustiveCheck: never = data;
        return exhaustiveCheck;
      }
    }
  }

  /**
   * Returns the value as a real. Integers widen; text must be numeric.
   *
   * @throws TypeCoercionError for booleans, arrays and non-numeric text.
   */
  asReal(): number {
    const data = this.data;
    switch (data.kind) {
      case 'real':
      case 'integer':
        return data.value;
      case 'text': {
        const parsed = parseNumericText(data.value);
        if (parsed === undefined) {
          throw new TypeCoercionError('text', 'real', `Cannot convert text '${data.value}' to real`);
        }
        return parsed;
      }
      case 'boolean':
      case 'array':
        throw new TypeCoercionError(data.kind, 'real');
      default: {
        const exhaustiveCheck: never = data;
        return exhaustiveCheck;
      }
    }
  }

  /**
   * Returns the value as a boolean.
   *
   * Text matches `true/yes/on/1` and `false/no/off/0` in any letter case;
   * integers are true when nonzero.
   *
   * @throws TypeCoercionError for reals, arrays and unrecognized text.
   */
  asBoolean(): boolean {
    const data = this.data;
    switch (data.kind) {
      case 'boolean':
        return data.value;
      case 'integer':
        return data.value !== 0;
      case 'text': {
        const trimmed = data.value.trim();
        if (trimmed === '1') {
          return true;
        }
        if (trimmed === '0') {
          return false;
        }
        const keyword = matchBooleanKeyword(trimmed);
        if (keyword === undefined) {
          throw new TypeCoercionError(
            'text',
            'boolean',
            `Cannot convert text '${data.value}' to boolean. Expected one of: ${[...TRUE_KEYWORDS, '1', ...FALSE_KEYWORDS, '0'].join(', ')}`
          );
        }
        return keyword;
      }
      case 'real':
      case 'array':
        throw new TypeCoercionError(data.kind, 'boolean');
      default: {
        const exhaustiveCheck: never = data;
        return exhaustiveCheck;
      }
    }
  }

  /**
   * Returns a copy of the element list.
   *
   * @throws TypeCoercionError for every variant except array.
   */
  asArray(): Value[] {
    const data = this.data;
    if (data.kind !== 'array') {
      throw new TypeCoercionError(data.kind, 'array', `Value is not an array (${data.kind})`);
    }
    return [...data.value];
  }

  /**
   * Structural equality: same variant and equal contents, recursively.
   */
  equals(other: Value): boolean {
    const a = this.data;
    const b = other.data;
    if (a.kind === 'array' && b.kind === 'array') {
      return (
        a.value.length === b.value.length &&
        a.value.every((element, index) => {
          const counterpart = b.value[index];
          return counterpart !== undefined && element.equals(counterpart);
        })
      );
    }
    return a.kind === b.kind && a.value === b.value;
  }

  /**
   * Returns the plain JavaScript form of the value.
   */
  toJSON(): JsonValue {
    const data = this.data;
    if (data.kind === 'array') {
      return data.value.map((element) => element.toJSON());
    }
    return data.value;
  }

  private truncate(value: number): number {
    const truncated = normalizeZero(Math.trunc(value));
    if (!Number.isSafeInteger(truncated)) {
      throw new TypeCoercionError(
        this.data.kind,
        'integer',
        `Value ${String(value)} is outside the integer range`
      );
    }
    return truncated;
  }
}
