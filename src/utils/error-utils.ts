/**
 * Utility functions for safe error handling with proper TypeScript types
 */

export interface ErrorLike {
  message?: unknown;
  name?: unknown;
  [key: string]: unknown;
}

export function isErrorLike(value: unknown): value is ErrorLike {
  return typeof value === 'object' && value !== null;
}

export function getErrorMessage(error: unknown): string {
  if (isErrorLike(error) && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
