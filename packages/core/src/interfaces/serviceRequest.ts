import type { AccessToken } from './accessToken.js';

export type ServiceRequestMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

/**
 * Descriptor of one authenticated call from the tool to a platform service.
 * Never persisted.
 */
export interface ServiceRequest {
  /** Scopes the bearer token must carry; must not be empty */
  scopes: string[];
  /** Upper-cased before sending */
  method: ServiceRequestMethod | Lowercase<ServiceRequestMethod>;
  url: string | URL;
  body?: string;
  /** Defaults to application/json for POST and PUT */
  contentType?: string;
  /** Defaults to application/json */
  accept?: string;
  /** Status (or statuses) that count as success, defaults to 200 */
  expectedStatus?: number | readonly number[];
  /** Caller-supplied cancellation, combined with the request timeout */
  signal?: AbortSignal;
}

/** Source of bearer tokens for the dispatcher. */
export interface AccessTokenProvider {
  getAccessToken(scopes: readonly string[], signal?: AbortSignal): Promise<AccessToken>;
}

/** What the AGS and NRPS services call through. */
export interface ServiceRequester {
  serviceRequest(request: ServiceRequest): Promise<Response>;
}
