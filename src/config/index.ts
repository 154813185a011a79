/**
 * Configuration module for yini.toml parsing and validation.
 *
 * Provides typed configuration parsing with defaults, semantic validation,
 * and environment variable overrides.
 *
 * Override precedence: env > config file > defaults
 *
 * @packageDocumentation
 */

export {
  ConfigParseError,
  getDefaultConfig,
  parseConfig,
  toParserOptions,
  toWriterOptions,
} from './parser.js';
export type {
  LoggingSettings,
  ParserSettings,
  PartialYiniConfig,
  WriterSettings,
  YiniConfig,
} from './types.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_LOGGING_SETTINGS,
  DEFAULT_PARSER_SETTINGS,
  DEFAULT_WRITER_SETTINGS,
  INDENT_WIDTH_RANGE,
  QUOTE_STYLES,
  UNTERMINATED_COMMENT_POLICIES,
} from './defaults.js';
export { ConfigValidationError, validateConfig, assertConfigValid } from './validator.js';
export type { ValidationError, ValidationResult } from './validator.js';
export {
  EnvCoercionError,
  readEnvOverrides,
  applyEnvOverrides,
  mergeConfig,
  getEnvVarDocumentation,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
