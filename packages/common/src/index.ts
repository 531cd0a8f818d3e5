/**
 * @quarry/common - Shared types, utilities, configuration and validation
 */

export * from './types.js';
export * from './validation.js';
export * from './utils.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
