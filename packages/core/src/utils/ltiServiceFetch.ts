/** Sent with every request to a platform unless the caller sets its own. */
export const USER_AGENT = 'lti-bridge/1.0.0 (LTI 1.3 tool toolkit)';

/** Applied when the caller does not give a timeout. */
export const DEFAULT_REQUEST_TIMEOUT_MS = 15_000;

export interface LTIServiceFetchInit extends RequestInit {
  /** Upper bound for the whole request, combined with `signal` if one is given */
  timeoutMs?: number;
}

/**
 * Wrapper around fetch() for calls from the tool to a platform.
 *
 * Adds a User-Agent header (some platforms reject requests without one) and
 * bounds the request with a timeout. A caller-supplied `signal` still cancels
 * the request early.
 *
 * @example
 * ```typescript
 * const response = await ltiServiceFetch('https://lms.example.com/scores', {
 *   method: 'POST',
 *   headers: { 'Content-Type': 'application/json' },
 *   body: JSON.stringify({ score: 95 }),
 *   timeoutMs: 5_000,
 * });
 * ```
 */
// oxlint-disable-next-line require-await
export async function ltiServiceFetch(
  url: string | URL,
  init: LTIServiceFetchInit = {},
): Promise<Response> {
  const { timeoutMs = DEFAULT_REQUEST_TIMEOUT_MS, signal, ...rest } = init;
  const headers = new Headers(rest.headers);
  // Add User-Agent only if not already present (allows override)
  if (!headers.has('User-Agent')) {
    headers.set('User-Agent', USER_AGENT);
  }
  const timeout = AbortSignal.timeout(timeoutMs);
  return fetch(url, {
    ...rest,
    headers,
    signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
  });
}
