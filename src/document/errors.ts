/**
 * Errors raised by the document model.
 *
 * A missing key or section and a value of the wrong type are different
 * failures: lookups raise {@link NotFoundError}, conversions raise
 * {@link TypeCoercionError}, and neither is ever used for the other.
 *
 * @packageDocumentation
 */

import type { ValueKind } from './value.js';

/**
 * Target types of the Value coercion accessors.
 */
export type CoercionTarget = 'text' | 'integer' | 'real' | 'boolean' | 'array';

/**
 * Error thrown when a Value cannot be converted to the requested type.
 */
export class TypeCoercionError extends Error {
  /** Variant held by the value that failed to convert. */
  public readonly from: ValueKind;
  /** Type that was requested. */
  public readonly to: CoercionTarget;

  /**
   * Creates a new TypeCoercionError.
   *
   * @param from - The variant held by the value.
   * @param to - The requested type.
   * @param message - Optional detailed message.
   */
  constructor(from: ValueKind, to: CoercionTarget, message?: string) {
    super(message ?? `Cannot convert ${from} to ${to}`);
    this.name = 'TypeCoercionError';
    this.from = from;
    this.to = to;
  }
}

/**
 * What a failed lookup was looking for.
 */
export type LookupKind = 'property' | 'section';

/**
 * Error thrown by strict lookups when a property or section does not exist.
 */
export class NotFoundError extends Error {
  public readonly kind: LookupKind;
  /** The key or section name that was not found. */
  public readonly key: string;

  /**
   * Creates a new NotFoundError.
   *
   * @param kind - Whether a property or a section was requested.
   * @param key - The missing key or section name.
   */
  constructor(kind: LookupKind, key: string) {
    super(kind === 'property' ? `Key not found: ${key}` : `Section not found: ${key}`);
    this.name = 'NotFoundError';
    this.kind = kind;
    this.key = key;
  }
}
