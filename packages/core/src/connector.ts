import { importPKCS8, type KeyLike } from 'jose';
import type { Logger } from 'pino';

import { MalformedClaimError } from './errors.js';
import type { AccessToken } from './interfaces/accessToken.js';
import type { SecuritySettings } from './interfaces/ltiConfig.js';
import type { LTIStores } from './interfaces/ltiStorage.js';
import type { Registration } from './interfaces/registration.js';
import type {
  AccessTokenProvider,
  ServiceRequest,
  ServiceRequester,
} from './interfaces/serviceRequest.js';
import { type PlatformKeySet } from './schemas/jwks.schema.js';
import { type LaunchClaims, LaunchClaimsSchema } from './schemas/lti13/launchClaims.schema.js';
import { AGSService } from './services/ags.service.js';
import { NRPSService } from './services/nrps.service.js';
import { ServiceRequestDispatcher } from './services/serviceRequest.service.js';
import { TokenService } from './services/token.service.js';
import { firstIssueMessage } from './utils/errorFormatting.js';
import { fetchPlatformKeySet } from './utils/platformKeySet.js';

export interface ConnectorDependencies {
  stores: Pick<LTIStores, 'registrations' | 'launchData' | 'accessTokens'>;
  settings: SecuritySettings;
  logger: Logger;
  /** Signing key to start with; {@link Connector.setSigningKey} replaces it */
  signingKey?: KeyLike;
}

/**
 * The tool's side of one launched session.
 *
 * Rebuilt from stored launch data, it obtains access tokens for the launch's
 * registration and dispatches service requests with them. Not shared between
 * launches.
 *
 * @example
 * ```typescript
 * const connector = await Connector.create(deps, launchId);
 * const ags = connector.upgradeAGS();
 * await ags.putScore({ scoreGiven: 9, scoreMaximum: 10 });
 * ```
 */
export class Connector implements AccessTokenProvider, ServiceRequester {
  private signingKey?: KeyLike;
  private accessToken?: AccessToken;
  private registration?: Registration;
  private readonly tokenService: TokenService;
  private readonly dispatcher: ServiceRequestDispatcher;

  private constructor(
    private deps: ConnectorDependencies,
    readonly launchId: string,
    readonly claims: LaunchClaims,
  ) {
    this.signingKey = deps.signingKey;
    this.tokenService = new TokenService(deps.stores.accessTokens, deps.settings, deps.logger);
    this.dispatcher = new ServiceRequestDispatcher(
      this,
      deps.settings.requestTimeoutMs,
      deps.logger,
    );
  }

  /**
   * Loads the launch data stored under `launchId`.
   *
   * @throws {LaunchDataNotFoundError} when nothing (or only expired data) is stored under the ID
   * @throws {MalformedClaimError} when the stored data does not decode to launch claims
   */
  static async create(deps: ConnectorDependencies, launchId: string): Promise<Connector> {
    if (!launchId) {
      throw new Error('[Connector] launch ID is required');
    }
    const launchData = await deps.stores.launchData.findLaunchData(launchId);

    let raw: unknown;
    try {
      raw = JSON.parse(launchData);
    } catch (error) {
      throw new MalformedClaimError('stored launch data is not valid JSON', { cause: error });
    }
    const result = LaunchClaimsSchema.safeParse(raw);
    if (!result.success) {
      throw new MalformedClaimError(
        `stored launch data improperly formatted: ${firstIssueMessage(result.error)}`,
        { cause: result.error },
      );
    }
    return new Connector(deps, launchId, result.data);
  }

  /** Imports a PKCS#8 PEM RSA private key and uses it to sign client assertions. */
  async setSigningKey(pkcs8Pem: string): Promise<void> {
    this.signingKey = await importPKCS8(pkcs8Pem, 'RS256');
  }

  /** The token most recently obtained by this connector. */
  get activeAccessToken(): AccessToken | undefined {
    return this.accessToken;
  }

  /**
   * Registration the launch came in through, looked up by issuer and
   * authorized party (or the first audience).
   */
  async getRegistration(): Promise<Registration> {
    if (!this.registration) {
      this.registration = await this.deps.stores.registrations.findRegistration(
        this.claims.iss,
        this.claims.azp ?? this.claims.aud[0],
      );
    }
    return this.registration;
  }

  /** The platform's current public key set. */
  async platformKeySet(signal?: AbortSignal): Promise<PlatformKeySet> {
    const registration = await this.getRegistration();
    return await fetchPlatformKeySet(registration.keysetUrl, {
      timeoutMs: this.deps.settings.requestTimeoutMs,
      signal,
    });
  }

  async getAccessToken(scopes: readonly string[], signal?: AbortSignal): Promise<AccessToken> {
    const registration = await this.getRegistration();
    this.accessToken = await this.tokenService.obtain(
      registration,
      scopes,
      this.signingKey,
      signal,
    );
    return this.accessToken;
  }

  async serviceRequest(request: ServiceRequest): Promise<Response> {
    return await this.dispatcher.dispatch(request);
  }

  /**
   * @throws {ServiceUnsupportedError} when the launch did not include assignment and grade services
   */
  upgradeAGS(): AGSService {
    return AGSService.fromClaims(this, this.claims, this.deps.logger);
  }

  /**
   * @throws {ServiceUnsupportedError} when the launch did not include names and role provisioning
   */
  upgradeNRPS(): NRPSService {
    return NRPSService.fromClaims(this, this.claims, this.deps.logger);
  }
}
