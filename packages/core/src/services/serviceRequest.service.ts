import type { Logger } from 'pino';

import { ServiceRequestError } from '../errors.js';
import type { AccessTokenProvider, ServiceRequest } from '../interfaces/serviceRequest.js';
import { ltiServiceFetch } from '../utils/ltiServiceFetch.js';

export const JSON_MEDIA_TYPE = 'application/json';

/**
 * Performs one authenticated call to a platform service.
 *
 * There is no retry: a failed request surfaces to the caller. On success the
 * caller owns the response body and must consume or cancel it.
 */
export class ServiceRequestDispatcher {
  constructor(
    private tokens: AccessTokenProvider,
    private timeoutMs: number,
    private logger: Logger,
  ) {}

  /**
   * @throws {ServiceRequestError} when the response status is not one of the expected ones
   */
  async dispatch(request: ServiceRequest): Promise<Response> {
    if (request.scopes.length === 0) {
      throw new Error('[Service] a service request must declare at least one scope');
    }

    const method = request.method.toUpperCase();
    const contentType =
      request.contentType ??
      (method === 'POST' || method === 'PUT' ? JSON_MEDIA_TYPE : undefined);
    const expectedStatus = request.expectedStatus ?? 200;
    const expected: readonly number[] =
      typeof expectedStatus === 'number' ? [expectedStatus] : expectedStatus;

    const token = await this.tokens.getAccessToken(request.scopes, request.signal);

    const headers = new Headers({
      Authorization: `Bearer ${token.token}`,
      Accept: request.accept ?? JSON_MEDIA_TYPE,
    });
    if (contentType) {
      headers.set('Content-Type', contentType);
    }

    const response = await ltiServiceFetch(request.url, {
      method,
      headers,
      body: request.body,
      timeoutMs: this.timeoutMs,
      signal: request.signal,
    });

    if (!expected.includes(response.status)) {
      await response.body?.cancel();
      this.logger.warn(
        { method, url: String(request.url), status: response.status, expected },
        'unexpected service response status',
      );
      throw new ServiceRequestError(response.status, response.statusText);
    }

    this.logger.debug(
      { method, url: String(request.url), status: response.status },
      'service request completed',
    );
    return response;
  }
}
