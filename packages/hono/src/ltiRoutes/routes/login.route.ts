import type { LTITool } from '@lti-bridge/core';
import type { Handler } from 'hono';
import { setCookie } from 'hono/cookie';

import { type LTIRouteOptions, requestParams, respondWithLTIError } from '../routeOptions.js';

/**
 * Creates a route handler for LTI login initiation (GET or form POST).
 * Sets the state cookies and redirects to the platform's authentication endpoint.
 */
export function loginRouteHandler(tool: LTITool, options: LTIRouteOptions = {}): Handler {
  return async (c) => {
    try {
      const { redirectUrl, cookies } = await tool.handleLogin(await requestParams(c));
      for (const cookie of cookies) {
        setCookie(c, cookie.name, cookie.value, {
          path: cookie.path,
          maxAge: cookie.maxAge,
          httpOnly: cookie.httpOnly,
          secure: cookie.secure,
          sameSite: cookie.sameSite,
        });
      }
      return c.redirect(redirectUrl.href, 302);
    } catch (error) {
      return respondWithLTIError(c, error, options);
    }
  };
}
