import { LTI13LaunchSchema, type LTITool } from '@lti-bridge/core';
import type { Context, MiddlewareHandler } from 'hono';
import { getCookie } from 'hono/cookie';

import { type LTIRouteOptions, requestParams, respondWithLTIError } from '../ltiRoutes/routeOptions.js';

/**
 * Context variables available after {@link ltiLaunch} accepted a launch.
 */
export interface LTILaunchVariables {
  ltiLaunchId: string;
}

/**
 * Creates middleware for the launch URL. It validates the posted `id_token`
 * against the state cookie, then exposes the launch ID as `ltiLaunchId` and
 * calls the next handler. A rejected launch is answered with the failure
 * reason and a 400 or 500 status.
 *
 * @example
 * ```typescript
 * app.post('/lti/launch', ltiLaunch(tool), async (c) => {
 *   const connector = await tool.createConnector(getLaunchId(c));
 *   return c.html(renderActivity(connector.claims));
 * });
 * ```
 */
export function ltiLaunch(
  tool: LTITool,
  options: LTIRouteOptions = {},
): MiddlewareHandler<{ Variables: LTILaunchVariables }> {
  return async (c, next) => {
    try {
      const form = LTI13LaunchSchema.parse(await requestParams(c));
      const { launchId } = await tool.verifyLaunch({
        idToken: form.id_token,
        state: form.state,
        cookies: getCookie(c),
        signal: c.req.raw.signal,
      });
      c.set('ltiLaunchId', launchId);
    } catch (error) {
      return respondWithLTIError(c, error, options);
    }
    await next();
  };
}

/** Launch ID set by {@link ltiLaunch}. */
export function getLaunchId(c: Context<{ Variables: LTILaunchVariables }>): string {
  return c.get('ltiLaunchId');
}
