/**
 * Error utilities for the Lazarus monitor
 */

import { ZodError } from 'zod';
import { InvalidConfigError } from './types.js';

export * from './types.js';

/**
 * Check if an error is a LazarusError or LazarusError-like
 */
export function isLazarusError(error: unknown): error is Error & { code: string; statusCode: number; details?: unknown } {
  return (
    error instanceof Error &&
    'code' in error &&
    'statusCode' in error &&
    typeof error.code === 'string' &&
    typeof error.statusCode === 'number'
  );
}

/**
 * Get a safe error response for API responses
 */
export function getErrorResponse(error: unknown): {
  error: string;
  code: string;
  statusCode: number;
  details?: unknown;
} {
  if (isLazarusError(error)) {
    return {
      error: error.message,
      code: error.code,
      statusCode: error.statusCode,
      details: error.details,
    };
  }

  if (error instanceof ZodError) {
    return {
      error: 'Validation failed',
      code: 'INVALID_CONFIG',
      statusCode: 400,
      details: formatZodIssues(error),
    };
  }

  if (error instanceof Error) {
    return {
      error: error.message,
      code: 'INTERNAL_ERROR',
      statusCode: 500,
    };
  }

  return {
    error: 'An unknown error occurred',
    code: 'UNKNOWN_ERROR',
    statusCode: 500,
  };
}

/**
 * Flatten zod issues into `path: message` lines
 */
export function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Convert a zod failure into an InvalidConfigError
 */
export function toInvalidConfigError(error: ZodError, context: string): InvalidConfigError {
  const issues = formatZodIssues(error);
  return new InvalidConfigError(`${context}: ${issues.join('; ')}`, issues);
}

/**
 * Render an unknown thrown value as a message
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
