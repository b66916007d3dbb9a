import type { LTITool } from '@lti-bridge/core';
import type { Handler } from 'hono';

import { type LTIRouteOptions, respondWithLTIError } from '../routeOptions.js';

/**
 * Creates a route handler serving the tool's public key set.
 *
 * @param keyId - `kid` to publish (defaults to the tool's configured key ID)
 */
export function jwksRouteHandler(
  tool: LTITool,
  keyId?: string,
  options: LTIRouteOptions = {},
): Handler {
  return async (c) => {
    try {
      return c.json(await tool.getJWKS(keyId));
    } catch (error) {
      return respondWithLTIError(c, error, options);
    }
  };
}
