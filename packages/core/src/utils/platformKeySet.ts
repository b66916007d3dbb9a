import { type PlatformKeySet, PlatformKeySetSchema } from '../schemas/jwks.schema.js';

import { firstIssueMessage } from './errorFormatting.js';
import { ltiServiceFetch } from './ltiServiceFetch.js';

/**
 * Downloads and decodes a platform's JSON Web Key Set.
 *
 * @throws {Error} when the platform cannot be reached, answers with a non-2xx
 * status or returns something that is not a key set
 */
export async function fetchPlatformKeySet(
  keysetUrl: string,
  options: { timeoutMs: number; signal?: AbortSignal },
): Promise<PlatformKeySet> {
  const response = await ltiServiceFetch(keysetUrl, {
    method: 'GET',
    headers: { Accept: 'application/json' },
    timeoutMs: options.timeoutMs,
    signal: options.signal,
  });
  if (!response.ok) {
    await response.body?.cancel();
    throw new Error(
      `key set request got response status ${response.status} ${response.statusText}`,
    );
  }
  const result = PlatformKeySetSchema.safeParse(await response.json());
  if (!result.success) {
    throw new Error(`key set improperly formatted: ${firstIssueMessage(result.error)}`, {
      cause: result.error,
    });
  }
  return result.data;
}
