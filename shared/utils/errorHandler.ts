// ============================================================================
// ERROR HANDLING UTILITIES (neverthrow)
// ============================================================================

import { Result, Ok, Err, ResultAsync } from 'neverthrow';
import { ExtractCategory } from '../types/index';

// ============================================================================
// ERROR TYPES
// ============================================================================

export type ErrorType = 'LOAD_ERROR' | 'CONFIG_ERROR' | 'UNKNOWN_ERROR';

export interface AppError {
  message: string;
  type: ErrorType;
  category?: ExtractCategory;
  file?: string;
  line?: number;
  isUserFriendly?: boolean;
}

/**
 * Raised when an extract file cannot be read or does not fit its category's schema.
 * Fatal for the whole run: no partial category is ever returned.
 */
export class ExtractLoadError extends Error {
  readonly category: ExtractCategory;
  readonly file: string;
  readonly line: number | undefined;

  constructor(category: ExtractCategory, file: string, reason: string, line?: number) {
    const location = line === undefined ? file : `${file}:${line}`;
    super(`Failed to load ${category} extract ${location}: ${reason}`);
    this.name = 'ExtractLoadError';
    this.category = category;
    this.file = file;
    this.line = line;
  }
}

/**
 * Raised when an environment variable holds a value the pipeline cannot run with.
 */
export class ConfigError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(message);
    this.name = 'ConfigError';
    this.variable = variable;
  }
}

// ============================================================================
// ERROR PARSING UTILITIES
// ============================================================================

/**
 * Parse any error into a structured AppError
 */
export function parseError(error: unknown): AppError {
  if (error instanceof ExtractLoadError) {
    const parsed: AppError = {
      message: error.message,
      type: 'LOAD_ERROR',
      category: error.category,
      file: error.file,
      isUserFriendly: true,
    };
    if (error.line !== undefined) {
      parsed.line = error.line;
    }
    return parsed;
  }

  if (error instanceof ConfigError) {
    return {
      message: error.message,
      type: 'CONFIG_ERROR',
      isUserFriendly: true,
    };
  }

  // Handle regular Error instances
  if (error instanceof Error) {
    return {
      message: error.message,
      type: 'UNKNOWN_ERROR',
      isUserFriendly: true,
    };
  }

  // Handle string errors
  if (typeof error === 'string') {
    return {
      message: error,
      type: 'UNKNOWN_ERROR',
      isUserFriendly: true,
    };
  }

  // Handle unknown errors
  return {
    message: 'An unknown error occurred',
    type: 'UNKNOWN_ERROR',
    isUserFriendly: false,
  };
}

// ============================================================================
// NEVERTHROW UTILITIES
// ============================================================================

/**
 * Wrap a function that might throw into a Result
 */
export function safeCall<T>(fn: () => T): Result<T, AppError> {
  try {
    const result = fn();
    return new Ok(result);
  } catch (error) {
    return new Err(parseError(error));
  }
}

/**
 * Wrap an async function that might throw into a ResultAsync
 */
export function safeCallAsync<T>(fn: () => Promise<T>): ResultAsync<T, AppError> {
  return ResultAsync.fromPromise(fn(), error => parseError(error));
}

/**
 * Create a user-friendly error message
 */
export function createUserFriendlyMessage(error: AppError): string {
  return error.isUserFriendly ? error.message : 'An unexpected error occurred. Please try again.';
}

// ============================================================================
// RE-EXPORT NEVERTHROW TYPES AND UTILITIES
// ============================================================================

export { Result, Ok, Err, ResultAsync } from 'neverthrow';
export type { Result as ResultType } from 'neverthrow';
