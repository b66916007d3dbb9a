/**
 * HTTP status a boundary layer should answer with when an error reaches it.
 * 400 means the request itself was rejected, 500 means a dependency or the
 * tool's own configuration failed.
 */
export type LTIErrorStatus = 400 | 500;

/**
 * Base class for every error the toolkit raises on purpose.
 */
export class LTIError extends Error {
  constructor(
    public readonly statusCode: LTIErrorStatus,
    public readonly code: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = 'LTIError';
  }

  toJSON(): { error: { code: string; message: string } } {
    return { error: { code: this.code, message: this.message } };
  }
}

/** Names of the launch validation steps, in the order they run. */
export const LAUNCH_STEPS = [
  'token',
  'registration',
  'signature',
  'state',
  'audience',
  'nonce',
  'deployment',
  'version',
  'resource_link',
  'launch_data',
] as const;

export type LaunchStep = (typeof LAUNCH_STEPS)[number];

/**
 * Raised by the launch validator. `step` identifies the check that failed.
 */
export class LaunchError extends LTIError {
  constructor(
    public readonly step: LaunchStep,
    statusCode: LTIErrorStatus,
    message: string,
    options?: ErrorOptions,
  ) {
    super(statusCode, `launch_${step}`, message, options);
    this.name = 'LaunchError';
  }
}

/**
 * The tool is missing something an operator has to provide (e.g. a signing key).
 * Never retried.
 */
export class ConfigurationError extends LTIError {
  constructor(message: string) {
    super(500, 'configuration_error', message);
    this.name = 'ConfigurationError';
  }
}

/** The platform did not enable a service for this launch. */
export class ServiceUnsupportedError extends LTIError {
  constructor(service: string, detail?: string) {
    super(
      400,
      'service_unsupported',
      detail ? `${service} not available for this launch: ${detail}` : `${service} not available for this launch`,
    );
    this.name = 'ServiceUnsupportedError';
  }
}

/** A claim is present but does not have the expected shape. */
export class MalformedClaimError extends LTIError {
  constructor(message: string, options?: ErrorOptions) {
    super(400, 'malformed_claim', message, options);
    this.name = 'MalformedClaimError';
  }
}

export class TokenRequestError extends LTIError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
  ) {
    super(500, 'token_request_failed', `access token request got response status ${status} ${statusText}`);
    this.name = 'TokenRequestError';
  }
}

export class ServiceRequestError extends LTIError {
  constructor(
    public readonly status: number,
    public readonly statusText: string,
  ) {
    super(500, 'service_request_failed', `service request got response status ${status} ${statusText}`);
    this.name = 'ServiceRequestError';
  }
}

// Storage sentinels

export class NotFoundError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'NotFoundError';
  }
}

export class RegistrationNotFoundError extends NotFoundError {
  constructor(issuer: string, clientId: string) {
    super(`registration not found for iss ${issuer} and client ${clientId}`);
    this.name = 'RegistrationNotFoundError';
  }
}

export class DeploymentNotFoundError extends NotFoundError {
  constructor(issuer: string, deploymentId: string) {
    super(`deployment ${deploymentId} not found for iss ${issuer}`);
    this.name = 'DeploymentNotFoundError';
  }
}

export class NonceNotFoundError extends NotFoundError {
  constructor() {
    super('nonce not found');
    this.name = 'NonceNotFoundError';
  }
}

export class NonceTargetLinkUriMismatchError extends NotFoundError {
  constructor() {
    super('nonce found with mismatched target link uri');
    this.name = 'NonceTargetLinkUriMismatchError';
  }
}

export class LaunchDataNotFoundError extends NotFoundError {
  constructor(launchId: string) {
    super(`launch data not found for launch ${launchId}`);
    this.name = 'LaunchDataNotFoundError';
  }
}

export class AccessTokenNotFoundError extends NotFoundError {
  constructor() {
    super('access token not found');
    this.name = 'AccessTokenNotFoundError';
  }
}

export class AccessTokenExpiredError extends NotFoundError {
  constructor() {
    super('access token has expired');
    this.name = 'AccessTokenExpiredError';
  }
}
