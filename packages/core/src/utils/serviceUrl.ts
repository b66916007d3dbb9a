import { MalformedClaimError } from '../errors.js';

/**
 * Appends a path segment to a service URL, keeping its query string.
 *
 * @example
 * ```typescript
 * appendPath('https://lms.example.com/lineitems/1?type=x', 'scores').href;
 * // => 'https://lms.example.com/lineitems/1/scores?type=x'
 * ```
 */
export function appendPath(url: string | URL, segment: string): URL {
  const result = new URL(url);
  result.pathname = `${result.pathname.replace(/\/+$/, '')}/${segment}`;
  return result;
}

/**
 * Parses a URL taken from a launch claim.
 *
 * @throws {MalformedClaimError} when `value` is not an absolute URL
 */
export function parseClaimUrl(value: string, description: string): URL {
  try {
    return new URL(value);
  } catch (error) {
    throw new MalformedClaimError(`${description} is not a valid URL`, { cause: error });
  }
}
