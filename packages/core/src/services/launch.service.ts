import { base64url, createLocalJWKSet, decodeJwt, type JWTPayload, jwtVerify } from 'jose';
import type { Logger } from 'pino';

import {
  DeploymentNotFoundError,
  LaunchError,
  type LaunchStep,
  type LTIErrorStatus,
  NonceNotFoundError,
  NonceTargetLinkUriMismatchError,
  RegistrationNotFoundError,
} from '../errors.js';
import type { LaunchRequest } from '../interfaces/launchRequest.js';
import type { SecuritySettings } from '../interfaces/ltiConfig.js';
import type { LTIStores } from '../interfaces/ltiStorage.js';
import type { Registration } from '../interfaces/registration.js';
import {
  type BaseJwtClaims,
  BaseJwtClaimsSchema,
  UnverifiedClaimsSchema,
} from '../schemas/lti13/claims/baseJwtClaims.schema.js';
import {
  DEPLOYMENT_ID_CLAIM,
  RESOURCE_LINK_CLAIM,
  TARGET_LINK_URI_CLAIM,
} from '../schemas/lti13/claims/claimNames.js';
import { ResourceLinkSchema } from '../schemas/lti13/claims/contextClaims.schema.js';
import {
  DeploymentClaimsSchema,
  NonceClaimsSchema,
  VersionClaimsSchema,
} from '../schemas/lti13/claims/coreLtiClaims.schema.js';
import { firstIssueMessage, formatError } from '../utils/errorFormatting.js';
import { fetchPlatformKeySet } from '../utils/platformKeySet.js';

/** Name of the cookie holding the login state. */
export const STATE_COOKIE_NAME = 'lti1p3-state';
/** Same value, set without SameSite for browsers that reject `SameSite=None`. */
export const LEGACY_STATE_COOKIE_NAME = 'lti1p3-state-legacy';
/** Prefix of every launch identifier. */
export const LAUNCH_ID_PREFIX = 'lti1p3-launch-';

export interface LaunchResult {
  /** Key the raw launch payload was stored under */
  launchId: string;
  /** Verified token claims */
  claims: BaseJwtClaims & JWTPayload;
}

interface VerifiedToken {
  claims: BaseJwtClaims & JWTPayload;
  payload: JWTPayload;
}

/**
 * Validates an LTI 1.3 resource link launch.
 *
 * The checks run in a fixed order and the first failure aborts with a
 * {@link LaunchError} naming the step. Later checks rely on earlier ones:
 * nothing after `signature` reads an unverified claim.
 *
 * @example
 * ```typescript
 * const { launchId } = await validator.validate({
 *   idToken: form.id_token,
 *   state: form.state,
 *   cookies: { 'lti1p3-state': cookieValue },
 * });
 * ```
 */
export class LaunchValidator {
  constructor(
    private stores: Pick<LTIStores, 'registrations' | 'nonces' | 'launchData'>,
    private settings: SecuritySettings,
    private logger: Logger,
  ) {}

  async validate(request: LaunchRequest): Promise<LaunchResult> {
    const { idToken, unverified } = this.intakeToken(request.idToken);
    const registration = await this.lookupRegistration(unverified);
    const { claims, payload } = await this.verifySignature(
      idToken,
      registration,
      request.signal,
    );
    this.checkState(request);
    this.checkAudience(claims, registration);
    await this.checkNonce(payload);
    await this.checkDeployment(claims.iss, payload);
    this.checkVersion(payload);
    this.checkResourceLink(payload);
    const launchId = await this.storeLaunchData(idToken);

    this.logger.debug(
      { launchId, issuer: claims.iss, clientId: registration.clientId },
      'launch validated',
    );
    return { launchId, claims };
  }

  private intakeToken(idToken: string | undefined): {
    idToken: string;
    unverified: JWTPayload;
  } {
    if (!idToken) {
      throw this.reject('token', 400, 'id_token not found in request');
    }
    try {
      return { idToken, unverified: decodeJwt(idToken) };
    } catch (error) {
      throw this.reject('token', 400, 'id_token improperly formatted', error);
    }
  }

  private async lookupRegistration(unverified: JWTPayload): Promise<Registration> {
    const result = UnverifiedClaimsSchema.safeParse(unverified);
    if (!result.success) {
      throw this.reject('registration', 400, firstIssueMessage(result.error), result.error);
    }
    const { iss, aud, azp } = result.data;
    try {
      return await this.stores.registrations.findRegistration(iss, azp ?? aud[0]);
    } catch (error) {
      if (error instanceof RegistrationNotFoundError) {
        throw this.reject('registration', 400, 'registration not found', error);
      }
      throw this.reject('registration', 500, 'registration lookup failed', error);
    }
  }

  private async verifySignature(
    idToken: string,
    registration: Registration,
    signal: AbortSignal | undefined,
  ): Promise<VerifiedToken> {
    let keySet: ReturnType<typeof createLocalJWKSet>;
    try {
      keySet = createLocalJWKSet(
        await fetchPlatformKeySet(registration.keysetUrl, {
          timeoutMs: this.settings.requestTimeoutMs,
          signal,
        }),
      );
    } catch (error) {
      throw this.reject('signature', 500, 'platform key set could not be fetched', error);
    }

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(idToken, keySet, { algorithms: ['RS256'] }));
    } catch (error) {
      throw this.reject('signature', 400, 'token signature verification failed', error);
    }

    const result = BaseJwtClaimsSchema.safeParse(payload);
    if (!result.success) {
      throw this.reject(
        'signature',
        400,
        `token claims improperly formatted: ${firstIssueMessage(result.error)}`,
        result.error,
      );
    }
    return { claims: { ...payload, ...result.data }, payload };
  }

  private checkState(request: LaunchRequest): void {
    const cookie =
      request.cookies[STATE_COOKIE_NAME] ?? request.cookies[LEGACY_STATE_COOKIE_NAME];
    if (!cookie) {
      throw this.reject('state', 400, 'state cookie not found');
    }
    if (!request.state || request.state !== cookie) {
      throw this.reject('state', 400, 'state does not match state cookie');
    }
  }

  private checkAudience(claims: BaseJwtClaims, registration: Registration): void {
    if (!claims.aud.includes(registration.clientId)) {
      throw this.reject('audience', 400, 'client ID not found in token audience');
    }
  }

  private async checkNonce(payload: JWTPayload): Promise<void> {
    const result = NonceClaimsSchema.safeParse(payload);
    if (!result.success) {
      throw this.reject('nonce', 400, firstIssueMessage(result.error), result.error);
    }
    try {
      await this.stores.nonces.testAndClearNonce(
        result.data.nonce,
        result.data[TARGET_LINK_URI_CLAIM],
      );
    } catch (error) {
      if (
        error instanceof NonceNotFoundError ||
        error instanceof NonceTargetLinkUriMismatchError
      ) {
        throw this.reject('nonce', 400, error.message, error);
      }
      throw this.reject('nonce', 500, 'nonce check failed', error);
    }
  }

  private async checkDeployment(issuer: string, payload: JWTPayload): Promise<void> {
    const result = DeploymentClaimsSchema.safeParse(payload);
    if (!result.success) {
      throw this.reject('deployment', 400, firstIssueMessage(result.error), result.error);
    }
    try {
      await this.stores.registrations.findDeployment(issuer, result.data[DEPLOYMENT_ID_CLAIM]);
    } catch (error) {
      if (error instanceof DeploymentNotFoundError) {
        throw this.reject('deployment', 400, 'deployment not found', error);
      }
      throw this.reject('deployment', 500, 'deployment lookup failed', error);
    }
  }

  private checkVersion(payload: JWTPayload): void {
    const result = VersionClaimsSchema.safeParse(payload);
    if (!result.success) {
      throw this.reject('version', 400, firstIssueMessage(result.error), result.error);
    }
  }

  private checkResourceLink(payload: JWTPayload): void {
    const resourceLink = payload[RESOURCE_LINK_CLAIM];
    if (resourceLink === undefined) {
      throw this.reject('resource_link', 400, 'resource link not found in request');
    }
    const result = ResourceLinkSchema.safeParse(resourceLink);
    if (!result.success) {
      throw this.reject('resource_link', 400, firstIssueMessage(result.error), result.error);
    }
  }

  /**
   * Stores the untouched payload segment of the token, not a re-serialization
   * of the parsed claims.
   */
  private async storeLaunchData(idToken: string): Promise<string> {
    const segment = idToken.split('.')[1] ?? '';
    const launchData = new TextDecoder().decode(base64url.decode(segment));
    const launchId = LAUNCH_ID_PREFIX + crypto.randomUUID();
    const expiresAt = new Date(Date.now() + this.settings.launchDataExpirationSeconds * 1000);
    try {
      await this.stores.launchData.storeLaunchData(launchId, launchData, expiresAt);
    } catch (error) {
      throw this.reject('launch_data', 500, 'launch data could not be stored', error);
    }
    return launchId;
  }

  private reject(
    step: LaunchStep,
    statusCode: LTIErrorStatus,
    message: string,
    cause?: unknown,
  ): LaunchError {
    const fields = { step, statusCode, reason: message };
    if (statusCode === 500) {
      this.logger.error(
        { ...fields, error: cause === undefined ? undefined : formatError(cause) },
        'launch failed',
      );
    } else {
      this.logger.warn(fields, 'launch rejected');
    }
    return new LaunchError(step, statusCode, message, cause === undefined ? undefined : { cause });
  }
}
