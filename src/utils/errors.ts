/**
 * @fileoverview Error Utilities
 */

/**
 * Extract error message from any error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return 'Unknown error';
}

/**
 * Node system errors (ENOENT, EACCES, EXDEV, ...) carry a string `code`.
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

export function isNotFoundError(error: unknown): boolean {
  return getErrnoCode(error) === 'ENOENT';
}
