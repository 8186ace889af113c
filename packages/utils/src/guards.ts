/**
 * Type Guards
 */

/**
 * Message of a caught value, whatever was thrown
 */
export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
