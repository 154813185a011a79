/**
 * Context setup for the yini CLI.
 */

import {
  applyEnvOverrides,
  assertConfigValid,
  getDefaultConfig,
  parseConfig,
  toParserOptions,
  toWriterOptions,
  type EnvRecord,
  type YiniConfig,
} from '../config/index.js';
import type { YiniDocumentOptions } from '../document/document.js';
import { Logger } from '../utils/logger.js';
import { safeExistsSync, safeReadFileSync } from '../utils/safe-fs.js';
import type { CliContext } from './types.js';

/** Configuration file looked up in the working directory. */
export const CONFIG_FILE_NAME = 'yini.toml';

/** Global flag that enables debug logging. */
export const VERBOSE_FLAG = '--verbose';

/**
 * Options for creating the CLI context.
 */
export interface CliAppOptions {
  /** Arguments after the command name (defaults to process.argv). */
  args?: string[];
  /** Path of the configuration file (defaults to yini.toml). */
  configPath?: string;
  /** Environment for YINI_* overrides (defaults to process.env). */
  env?: EnvRecord;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Loads yini.toml, falling back to defaults with a warning when it cannot
 * be read, parsed or validated.
 */
function loadFileConfig(configPath: string): YiniConfig {
  if (!safeExistsSync(configPath)) {
    return getDefaultConfig();
  }

  try {
    const config = parseConfig(safeReadFileSync(configPath));
    assertConfigValid(config);
    return config;
  } catch (error) {
    console.warn(`Warning: Failed to load config from ${configPath}: ${errorMessage(error)}`);
    console.warn('Using default settings.');
    return getDefaultConfig();
  }
}

/**
 * Applies YINI_* overrides, keeping the file settings with a warning when
 * an override is invalid.
 */
function applyEnv(config: YiniConfig, env: EnvRecord): YiniConfig {
  try {
    const merged = applyEnvOverrides(config, env);
    assertConfigValid(merged);
    return merged;
  } catch (error) {
    console.warn(`Warning: Ignoring YINI_* overrides: ${errorMessage(error)}`);
    return config;
  }
}

/**
 * Creates and initializes CLI application context.
 *
 * Override precedence: env > yini.toml > defaults. `--verbose` anywhere in
 * the arguments enables debug logging and is removed from `args`.
 *
 * @param options - Argument, config path and environment overrides.
 * @returns The CLI context.
 */
export function createCliApp(options: CliAppOptions = {}): CliContext {
  const env = options.env ?? process.env;
  const rawArgs = options.args ?? process.argv.slice(2);
  const verbose = rawArgs.includes(VERBOSE_FLAG);
  const configPath = options.configPath ?? CONFIG_FILE_NAME;

  const config = applyEnv(loadFileConfig(configPath), env);
  const logger = new Logger({ component: 'cli', debugMode: verbose || config.logging.debug });
  logger.debug('config_loaded', { path: configPath, config });

  return {
    args: rawArgs.filter((arg) => arg !== VERBOSE_FLAG),
    config,
    logger,
    display: {
      colors: process.stderr.isTTY === true && env.NO_COLOR === undefined,
    },
  };
}

/**
 * Builds document options from the CLI configuration.
 */
export function documentOptions(context: CliContext): YiniDocumentOptions {
  return {
    parser: toParserOptions(context.config),
    writer: toWriterOptions(context.config),
    logger: context.logger.child('parser'),
  };
}
