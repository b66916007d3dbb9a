import { LTIError } from '@lti-bridge/core';
import type { Context } from 'hono';
import type { Logger } from 'pino';

export interface LTIRouteOptions {
  /** Receives failures; nothing is logged when absent */
  logger?: Logger;
}

/**
 * Renders a toolkit error as plain text with its status code. Anything else
 * is rethrown for the application's error handler.
 */
export function respondWithLTIError(
  c: Context,
  error: unknown,
  options: LTIRouteOptions,
): Response {
  if (!(error instanceof LTIError)) {
    options.logger?.error({ error, path: c.req.path }, 'LTI endpoint error');
    throw error;
  }
  if (error.statusCode === 500) {
    options.logger?.error({ error, path: c.req.path }, 'LTI endpoint error');
  }
  return c.text(error.message, error.statusCode);
}

/** String fields of a GET query or form POST body. */
export async function requestParams(c: Context): Promise<Record<string, string>> {
  if (c.req.method !== 'POST') {
    return c.req.query();
  }
  const body = await c.req.parseBody().catch((error: unknown) => {
    throw new LTIError(400, 'invalid_request', 'request body could not be parsed', {
      cause: error,
    });
  });
  const params: Record<string, string> = {};
  for (const [key, value] of Object.entries(body)) {
    if (typeof value === 'string') {
      params[key] = value;
    }
  }
  return params;
}
