import type { ZodError } from 'zod';

/**
 * Formats an unknown error into a readable string message.
 * Handles Error objects, strings, and other types safely.
 *
 * @example
 * ```typescript
 * try {
 *   await riskyOperation();
 * } catch (error) {
 *   throw new Error(`Operation failed: ${formatError(error)}`);
 * }
 * ```
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

/**
 * Message of the first issue in a zod error, which is the one the schemas
 * give a human-readable reason for.
 */
export function firstIssueMessage(error: ZodError, fallback = 'invalid input'): string {
  return error.issues[0]?.message ?? fallback;
}
