/**
 * Semantic validation for configuration values.
 *
 * Type and choice checks happen while parsing and while reading environment
 * overrides; this module checks numeric ranges, which a value from either
 * source can still violate.
 *
 * @packageDocumentation
 */

import { INDENT_WIDTH_RANGE } from './defaults.js';
import type { YiniConfig } from './types.js';

/**
 * Error class for semantic validation errors.
 */
export class ConfigValidationError extends Error {
  /** Array of validation failure details. */
  public readonly errors: ValidationError[];

  /**
   * Creates a new ConfigValidationError.
   *
   * @param message - Summary error message.
   * @param errors - Array of specific validation errors.
   */
  constructor(message: string, errors: ValidationError[]) {
    super(message);
    this.name = 'ConfigValidationError';
    this.errors = errors;
  }
}

/**
 * Individual validation error details.
 */
export interface ValidationError {
  /** The field path that failed validation. */
  field: string;
  /** The invalid value that was provided. */
  value: unknown;
  /** Human-readable description of the validation failure. */
  message: string;
}

/**
 * Result of a validation operation.
 */
export interface ValidationResult {
  /** Whether validation passed. */
  valid: boolean;
  /** Array of validation errors (empty if valid). */
  errors: ValidationError[];
}

function validateIndentWidth(value: number, errors: ValidationError[]): void {
  const field = 'writer.indent_width';
  if (!Number.isInteger(value)) {
    errors.push({ field, value, message: `'${field}' must be an integer` });
    return;
  }
  if (value < INDENT_WIDTH_RANGE.min || value > INDENT_WIDTH_RANGE.max) {
    errors.push({
      field,
      value,
      message: `'${field}' must be between ${String(INDENT_WIDTH_RANGE.min)} and ${String(INDENT_WIDTH_RANGE.max)}`,
    });
  }
}

/**
 * Validates configuration semantically.
 *
 * @param config - The parsed configuration to validate.
 * @returns Validation result with any errors.
 *
 * @example
 * ```typescript
 * const result = validateConfig(parseConfig(tomlContent));
 *
 * if (!result.valid) {
 *   for (const error of result.errors) {
 *     console.error(`${error.field}: ${error.message}`);
 *   }
 * }
 * ```
 */
export function validateConfig(config: YiniConfig): ValidationResult {
  const errors: ValidationError[] = [];

  validateIndentWidth(config.writer.indent_width, errors);

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Validates configuration and throws if invalid.
 *
 * @param config - The parsed configuration to validate.
 * @throws ConfigValidationError if validation fails.
 */
export function assertConfigValid(config: YiniConfig): void {
  const result = validateConfig(config);

  if (!result.valid) {
    const errorMessages = result.errors.map((e) => `  - ${e.field}: ${e.message}`).join('\n');
    throw new ConfigValidationError(
      `Configuration validation failed:\n${errorMessages}`,
      result.errors
    );
  }
}
