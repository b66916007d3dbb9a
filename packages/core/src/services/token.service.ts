import { type KeyLike, SignJWT } from 'jose';
import type { Logger } from 'pino';

import {
  AccessTokenExpiredError,
  AccessTokenNotFoundError,
  ConfigurationError,
  TokenRequestError,
} from '../errors.js';
import type { AccessToken } from '../interfaces/accessToken.js';
import type { SecuritySettings } from '../interfaces/ltiConfig.js';
import type { AccessTokenStorage } from '../interfaces/ltiStorage.js';
import type { Registration } from '../interfaces/registration.js';
import { AccessTokenResponseSchema } from '../schemas/oauth/accessTokenResponse.schema.js';
import { firstIssueMessage } from '../utils/errorFormatting.js';
import { ltiServiceFetch } from '../utils/ltiServiceFetch.js';
import { canonicalizeScopes } from '../utils/scopes.js';

/** Client assertions are back-dated by this much to absorb clock drift. */
export const CLOCK_SKEW_ALLOWANCE_SECONDS = 2 * 60;
/** Lifetime of a client assertion. */
export const CLIENT_ASSERTION_LIFETIME_SECONDS = 60 * 60;

const CLIENT_ASSERTION_TYPE = 'urn:ietf:params:oauth:client-assertion-type:jwt-bearer';

/**
 * Service for handling OAuth2 client credentials flow and JWT client assertions.
 * Used for obtaining bearer tokens to access LTI Advantage services (AGS, NRPS, etc.).
 *
 * Tokens are cached in an {@link AccessTokenStorage} keyed by token endpoint,
 * client ID and scope set, and reused until they expire.
 *
 * @see https://www.rfc-editor.org/rfc/rfc7523
 */
export class TokenService {
  constructor(
    private accessTokens: AccessTokenStorage,
    private settings: SecuritySettings,
    private logger: Logger,
  ) {}

  /**
   * Creates a JWT client assertion for OAuth2 client credentials flow.
   *
   * @param signingKey - The tool's RSA private key
   * @returns Signed JWT client assertion
   */
  async createClientAssertion(
    clientId: string,
    tokenUrl: string,
    signingKey: KeyLike,
  ): Promise<string> {
    const now = Math.floor(Date.now() / 1000);
    return await new SignJWT({
      iss: clientId,
      sub: clientId,
      aud: tokenUrl,
      iat: now - CLOCK_SKEW_ALLOWANCE_SECONDS,
      exp: now + CLIENT_ASSERTION_LIFETIME_SECONDS,
      jti: `lti-service-token-${crypto.randomUUID()}`,
    })
      .setProtectedHeader({
        alg: 'RS256',
        kid: this.settings.keyId,
        typ: 'JWT',
      })
      .sign(signingKey);
  }

  /**
   * Returns a usable access token for `scopes`, from the cache when one has
   * not expired, otherwise from the platform's token endpoint.
   *
   * @throws {ConfigurationError} when a new token is needed and no signing key is configured
   * @throws {TokenRequestError} when the token endpoint answers with anything but 200
   */
  async obtain(
    registration: Registration,
    scopes: readonly string[],
    signingKey: KeyLike | undefined,
    signal?: AbortSignal,
  ): Promise<AccessToken> {
    const canonicalScopes = canonicalizeScopes(scopes);
    if (canonicalScopes.length === 0) {
      throw new Error('[Token] at least one scope is required');
    }

    const cached = await this.findCached(registration, canonicalScopes);
    if (cached) {
      return cached;
    }

    if (!signingKey) {
      throw new ConfigurationError('no signing key configured for client assertions');
    }
    const assertion = await this.createClientAssertion(
      registration.clientId,
      registration.authTokenUrl,
      signingKey,
    );

    const response = await ltiServiceFetch(registration.authTokenUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/x-www-form-urlencoded',
        Accept: 'application/json',
      },
      body: new URLSearchParams({
        grant_type: 'client_credentials',
        client_assertion_type: CLIENT_ASSERTION_TYPE,
        client_assertion: assertion,
        scope: canonicalScopes.join(' '),
      }),
      timeoutMs: this.settings.requestTimeoutMs,
      signal,
    });

    if (response.status !== 200) {
      await response.body?.cancel();
      this.logger.warn(
        {
          tokenUrl: registration.authTokenUrl,
          clientId: registration.clientId,
          status: response.status,
        },
        'access token request rejected',
      );
      throw new TokenRequestError(response.status, response.statusText);
    }

    const result = AccessTokenResponseSchema.safeParse(await response.json());
    if (!result.success) {
      throw new Error(
        `[Token] token response improperly formatted: ${firstIssueMessage(result.error)}`,
        { cause: result.error },
      );
    }

    const token: AccessToken = {
      tokenUrl: registration.authTokenUrl,
      clientId: registration.clientId,
      scopes: canonicalScopes,
      token: result.data.access_token,
      expiresAt: new Date(Date.now() + result.data.expires_in * 1000),
    };
    await this.accessTokens.storeAccessToken(token);

    this.logger.debug(
      { tokenUrl: token.tokenUrl, clientId: token.clientId, scopes: token.scopes },
      'access token obtained',
    );
    return token;
  }

  private async findCached(
    registration: Registration,
    scopes: string[],
  ): Promise<AccessToken | undefined> {
    try {
      const token = await this.accessTokens.findAccessToken(
        registration.authTokenUrl,
        registration.clientId,
        scopes,
      );
      return token.expiresAt.getTime() > Date.now() ? token : undefined;
    } catch (error) {
      if (error instanceof AccessTokenNotFoundError || error instanceof AccessTokenExpiredError) {
        return undefined;
      }
      throw error;
    }
  }
}
