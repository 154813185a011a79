/**
 * yini-config
 *
 * Parser, document model and writer for YINI, an INI-derived configuration
 * format with nested sections, typed values, arrays and comments.
 *
 * @packageDocumentation
 */

/**
 * Library version string.
 */
export const VERSION = '0.1.0';

export * from './document/index.js';
export * from './parser/index.js';
export * from './writer/index.js';
export * from './io/index.js';

export { Logger, logger } from './utils/logger.js';

export type { LogLevel, LogEntry, LoggerOptions } from './utils/logger.js';
