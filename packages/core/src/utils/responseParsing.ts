import type * as z from 'zod';

import { firstIssueMessage } from './errorFormatting.js';

/**
 * Reads a JSON response body and decodes it with `schema`.
 *
 * @param context - Prefix for the error message, e.g. `[AGS] line item`
 */
export async function readJson<T extends z.ZodType>(
  response: Response,
  schema: T,
  context: string,
): Promise<z.output<T>> {
  const result = schema.safeParse(await response.json());
  if (!result.success) {
    throw new Error(`${context} response improperly formatted: ${firstIssueMessage(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}
