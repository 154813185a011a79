/**
 * Environment variable overrides for configuration.
 *
 * Provides support for YINI_* environment variables to override
 * configuration values at runtime. Environment variables take precedence
 * over config file values, which take precedence over defaults.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

import { QUOTE_STYLES, UNTERMINATED_COMMENT_POLICIES } from './defaults.js';
import type { PartialYiniConfig, YiniConfig } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a number.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced number value.
 * @throws EnvCoercionError if the value cannot be converted to a valid number.
 */
function coerceToNumber(value: string, envVar: string): number {
  const trimmed = value.trim();

  if (trimmed === '') {
    throw new EnvCoercionError(envVar, value, 'number', `Empty value for '${envVar}'`);
  }

  const num = Number(trimmed);

  if (Number.isNaN(num)) {
    throw new EnvCoercionError(envVar, value, 'number');
  }

  return num;
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to one of a fixed set of choices, case-insensitively.
 *
 * @throws EnvCoercionError if the value matches none of the choices.
 */
function coerceToChoice<T extends string>(
  value: string,
  choices: readonly T[],
  envVar: string
): T {
  const trimmed = value.trim().toLowerCase();
  const match = choices.find((choice) => choice === trimmed);
  if (match === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      choices.join(' | '),
      `Cannot coerce '${envVar}' value '${value}'. Expected one of: ${choices.join(', ')}`
    );
  }
  return match;
}

/**
 * How one environment variable maps onto the configuration.
 */
interface EnvVarMapping {
  readonly description: string;
  /** Expected type, as shown in documentation. */
  readonly type: string;
  /** Coerces the raw value and stores it in the overrides. */
  readonly apply: (overrides: PartialYiniConfig, value: string, envVar: string) => void;
}

/**
 * Mapping from environment variable names to config fields.
 *
 * Format: YINI_<SECTION>_<FIELD> maps to config.<section>.<field>;
 * YINI_DEBUG is a shortcut for logging.debug.
 */
const ENV_VAR_MAPPINGS: Readonly<Record<string, EnvVarMapping>> = {
  YINI_PARSER_STRICT_DEPTH: {
    description: 'Reject section headers that skip a depth level (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      const strictDepth = coerceToBoolean(value, envVar);
      (overrides.parser ??= {}).strict_depth = strictDepth;
    },
  },
  YINI_PARSER_STRICT_LITERALS: {
    description: 'Reject unterminated quoted and array literals (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      const strictLiterals = coerceToBoolean(value, envVar);
      (overrides.parser ??= {}).strict_literals = strictLiterals;
    },
  },
  YINI_PARSER_QUOTE_AWARE_COMMENTS: {
    description: 'Ignore comment markers inside quotes (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      const quoteAwareComments = coerceToBoolean(value, envVar);
      (overrides.parser ??= {}).quote_aware_comments = quoteAwareComments;
    },
  },
  YINI_PARSER_UNTERMINATED_COMMENT: {
    description: 'Policy for an unclosed block comment (truncate, error)',
    type: 'string',
    apply: (overrides, value, envVar) => {
      const unterminatedComment = coerceToChoice(
        value,
        UNTERMINATED_COMMENT_POLICIES,
        envVar
      );
      (overrides.parser ??= {}).unterminated_comment = unterminatedComment;
    },
  },
  YINI_WRITER_INDENT_WIDTH: {
    description: 'Spaces per nesting level in formatted output',
    type: 'number',
    apply: (overrides, value, envVar) => {
      const indentWidth = coerceToNumber(value, envVar);
      (overrides.writer ??= {}).indent_width = indentWidth;
    },
  },
  YINI_WRITER_QUOTE: {
    description: 'Quote character for text values (single, double)',
    type: 'string',
    apply: (overrides, value, envVar) => {
      const quote = coerceToChoice(value, QUOTE_STYLES, envVar);
      (overrides.writer ??= {}).quote = quote;
    },
  },
  YINI_DEBUG: {
    description: 'Enable debug logging to stderr (true/false)',
    type: 'boolean',
    apply: (overrides, value, envVar) => {
      const debug = coerceToBoolean(value, envVar);
      (overrides.logging ??= {}).debug = debug;
    },
  },
};

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Partial configuration with values from environment variables. */
  overrides: PartialYiniConfig;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns configuration overrides.
 *
 * Unset and empty variables are skipped.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Result containing overrides and any errors.
 * @throws EnvCoercionError for the first invalid value unless `collectErrors` is set.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ YINI_WRITER_INDENT_WIDTH: '2' });
 * console.log(result.overrides.writer?.indent_width); // 2
 * console.log(result.appliedVars);                    // ['YINI_WRITER_INDENT_WIDTH']
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialYiniConfig = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    const value = env[envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, envVar);
      appliedVars.push(envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Merges a partial configuration into a full configuration.
 *
 * @param base - The base configuration.
 * @param partial - The partial configuration to merge.
 * @returns A new configuration with partial values merged in.
 */
export function mergeConfig(base: YiniConfig, partial: PartialYiniConfig): YiniConfig {
  return {
    parser: {
      ...base.parser,
      ...partial.parser,
    },
    writer: {
      ...base.writer,
      ...partial.writer,
    },
    logging: {
      ...base.logging,
      ...partial.logging,
    },
  };
}

/**
 * Applies environment variable overrides to a configuration.
 *
 * Override precedence: env > config
 *
 * @param config - The base configuration to override.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns The configuration with environment overrides applied.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 *
 * @example
 * ```typescript
 * const config = applyEnvOverrides(parseConfig(tomlContent));
 * // YINI_WRITER_QUOTE=double overrides [writer] quote
 * ```
 */
export function applyEnvOverrides(config: YiniConfig, env: EnvRecord = process.env): YiniConfig {
  const { overrides } = readEnvOverrides(env);

  return mergeConfig(config, overrides);
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation object mapping env var names to descriptions.
 */
export function getEnvVarDocumentation(): Record<string, { description: string; type: string }> {
  const docs: Record<string, { description: string; type: string }> = {};
  for (const [envVar, mapping] of Object.entries(ENV_VAR_MAPPINGS)) {
    docs[envVar] = { description: mapping.description, type: mapping.type };
  }
  return docs;
}
