import { exportJWK, type JWK } from 'jose';
import { type Logger, pino } from 'pino';

import { Connector } from './connector.js';
import { ConfigurationError } from './errors.js';
import type { JWKS } from './interfaces/jwks.js';
import type { LaunchRequest } from './interfaces/launchRequest.js';
import {
  type LTIConfig,
  resolveSecuritySettings,
  type SecuritySettings,
} from './interfaces/ltiConfig.js';
import type { Deployment, Registration } from './interfaces/registration.js';
import { DeploymentSchema, RegistrationSchema } from './schemas/registration.schema.js';
import { type LaunchResult, LaunchValidator } from './services/launch.service.js';
import { type LoginRedirect, LoginService } from './services/login.service.js';
import { firstIssueMessage, formatError } from './utils/errorFormatting.js';

/**
 * Main LTI 1.3 Tool implementation: login initiation, launch validation, the
 * tool's key set and connectors for LTI Advantage services.
 *
 * @example
 * ```typescript
 * const storage = new MemoryStorage();
 * const ltiTool = new LTITool({
 *   stores: useSingleStorage(storage),
 *   signingKey: (await generateKeyPair('RS256')).privateKey,
 * });
 *
 * await ltiTool.addRegistration({
 *   issuer: 'https://platform.example.com',
 *   clientId: 'tool-client',
 *   authTokenUrl: 'https://platform.example.com/token',
 *   authLoginUrl: 'https://platform.example.com/auth',
 *   keysetUrl: 'https://platform.example.com/jwks',
 *   targetLinkUri: 'https://tool.example.com/lti/launch',
 * });
 *
 * const { launchId } = await ltiTool.verifyLaunch({ idToken, state, cookies });
 * const connector = await ltiTool.createConnector(launchId);
 * ```
 */
export class LTITool {
  private logger: Logger;
  private settings: SecuritySettings;
  private loginService: LoginService;
  private launchValidator: LaunchValidator;

  /**
   * Creates a new LTI Tool instance.
   *
   * @param config - Stores, signing key and optional logger and security settings
   */
  constructor(private config: LTIConfig) {
    this.logger = config.logger ?? pino({ level: 'silent' });
    this.settings = resolveSecuritySettings(config.security);
    this.loginService = new LoginService(
      config.stores.registrations,
      config.stores.nonces,
      this.settings,
      this.logger,
    );
    this.launchValidator = new LaunchValidator(config.stores, this.settings, this.logger);
  }

  /**
   * Handles LTI 1.3 login initiation: stores a nonce and builds the platform
   * authentication redirect and the state cookies.
   *
   * @param params - `iss`, `login_hint`, `target_link_uri`, `client_id` and the
   * optional `lti_message_hint` and `lti_deployment_id`, as sent by the platform
   * @throws {LTIError} 400 when parameters are missing or no registration matches
   */
  async handleLogin(params: Record<string, string | undefined>): Promise<LoginRedirect> {
    return await this.loginService.buildRedirect(params);
  }

  /**
   * Validates a launch and stores its payload.
   *
   * @returns The launch ID to hand to {@link createConnector}, with the verified claims
   * @throws {LaunchError} naming the failed step, with status 400 or 500
   */
  async verifyLaunch(request: LaunchRequest): Promise<LaunchResult> {
    return await this.launchValidator.validate(request);
  }

  /**
   * Generates JSON Web Key Set (JWKS) containing the tool's public key for platform verification.
   *
   * @param keyId - `kid` of the key (defaults to the configured key ID)
   * @throws {ConfigurationError} when no signing key is configured
   */
  async getJWKS(keyId: string = this.settings.keyId): Promise<JWKS> {
    if (!this.config.signingKey) {
      throw new ConfigurationError('no signing key configured for the key set');
    }
    let jwk: JWK;
    try {
      jwk = await exportJWK(this.config.signingKey);
    } catch (error) {
      throw new Error(`[LTI] JWKS generation failed: ${formatError(error)}`, { cause: error });
    }
    if (jwk.kty !== 'RSA' || !jwk.n || !jwk.e) {
      throw new ConfigurationError('signing key is not an RSA key');
    }
    // Public members only; the exported JWK also carries the private exponent.
    return {
      keys: [{ kty: jwk.kty, n: jwk.n, e: jwk.e, kid: keyId, alg: 'RS256', use: 'sig' }],
    };
  }

  /**
   * Rebuilds the session of a validated launch.
   *
   * @throws {LaunchDataNotFoundError} when the launch is unknown or has expired
   */
  async createConnector(launchId: string): Promise<Connector> {
    return await Connector.create(
      {
        stores: this.config.stores,
        settings: this.settings,
        logger: this.logger,
        signingKey: this.config.signingKey,
      },
      launchId,
    );
  }

  /**
   * Registers a platform. Registrations are normally provisioned out of band;
   * this validates the record before handing it to the registration store.
   */
  async addRegistration(registration: Registration): Promise<void> {
    const result = RegistrationSchema.safeParse(registration);
    if (!result.success) {
      throw new Error(
        `[Registration] invalid registration for issuer '${registration.issuer}': ${firstIssueMessage(result.error)}`,
        { cause: result.error },
      );
    }
    await this.config.stores.registrations.storeRegistration(result.data);
    this.logger.debug(
      { issuer: registration.issuer, clientId: registration.clientId },
      'registration stored',
    );
  }

  /**
   * Adds a deployment under a platform issuer.
   */
  async addDeployment(issuer: string, deployment: Deployment): Promise<void> {
    const result = DeploymentSchema.safeParse(deployment);
    if (!result.success) {
      throw new Error(
        `[Deployment] invalid deployment for issuer '${issuer}': ${firstIssueMessage(result.error)}`,
        { cause: result.error },
      );
    }
    await this.config.stores.registrations.storeDeployment(issuer, result.data);
  }
}
