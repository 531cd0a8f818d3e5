/**
 * Invocation configuration
 *
 * Built once from the root command's global options and handed to every
 * component that needs it.
 */

import { homedir } from 'node:os';
import { resolve } from 'node:path';
import { ConfigError } from './errors.js';
import { createLogger, type Logger, type LogFormat } from './logger.js';
import { quarryConfigSchema, validateBody } from './validation.js';

export interface QuarryConfig {
  dbPath: string;
  verbose: boolean;
  logFormat: LogFormat;
}

/** Unvalidated options, as parsed from the command line */
export type ConfigInput = {
  dbPath?: string;
  verbose?: boolean;
  logFormat?: string;
};

/**
 * Get the default database path
 */
export function getDefaultDbPath(): string {
  return resolve(homedir(), '.quarry', 'quarry.db');
}

/**
 * Validate and complete a partial configuration
 */
export function resolveConfig(input: ConfigInput = {}): QuarryConfig {
  const result = validateBody(quarryConfigSchema, {
    ...input,
    dbPath: input.dbPath ?? getDefaultDbPath(),
  });

  if (!result.success) {
    throw new ConfigError(`Invalid configuration: ${result.error}`);
  }

  return { ...result.data, dbPath: resolve(result.data.dbPath) };
}

/**
 * Build the logger described by a configuration
 */
export function loggerFromConfig(config: QuarryConfig): Logger {
  return createLogger({
    level: config.verbose ? 'debug' : 'warn',
    format: config.logFormat,
  });
}
