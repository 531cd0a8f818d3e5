/**
 * Custom error classes for consistent error handling
 */

/**
 * Base error class for all quarry errors
 */
export class QuarryError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  constructor(message: string, code: string, details?: unknown) {
    super(message);
    this.name = 'QuarryError';
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      details: this.details,
    };
  }
}

/**
 * Validation error for invalid import data
 */
export class ValidationError extends QuarryError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

/**
 * Not found error for missing files, migrations and records
 */
export class NotFoundError extends QuarryError {
  public readonly resource: string;
  public readonly id?: string;

  constructor(resource: string, id?: string) {
    const message = id
      ? `${resource} '${id}' not found`
      : `${resource} not found`;
    super(message, 'NOT_FOUND', { resource, id });
    this.name = 'NotFoundError';
    this.resource = resource;
    this.id = id;
  }
}

/**
 * Conflict error for destructive operations blocked by an existing artifact
 */
export class ConflictError extends QuarryError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFLICT', details);
    this.name = 'ConflictError';
  }
}

/**
 * Config error for invalid or empty operation input
 */
export class ConfigError extends QuarryError {
  constructor(message: string, details?: unknown) {
    super(message, 'CONFIG_ERROR', details);
    this.name = 'ConfigError';
  }
}

/**
 * Storage error for database issues
 */
export class StorageError extends QuarryError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

/**
 * Integrity error for structural corruption found by a verify step
 */
export class IntegrityError extends QuarryError {
  public readonly path?: string;

  constructor(message: string, options?: { path?: string; details?: unknown }) {
    super(message, 'INTEGRITY_ERROR', options?.details);
    this.name = 'IntegrityError';
    this.path = options?.path;
  }
}

/**
 * Check if an error is a QuarryError
 */
export function isQuarryError(error: unknown): error is QuarryError {
  return error instanceof QuarryError;
}

/**
 * Extract a message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Wrap an unknown error as a StorageError carrying operation context.
 * QuarryErrors pass through untouched.
 */
export function wrapError(error: unknown, context: string, details?: Record<string, unknown>): QuarryError {
  if (error instanceof QuarryError) return error;
  if (error instanceof Error) {
    return new StorageError(`${context}: ${error.message}`, {
      ...details,
      originalName: error.name,
    });
  }
  return new StorageError(`${context}: ${String(error)}`, { ...details, originalError: error });
}
