import type { Logger } from 'pino';

import { LTIError, RegistrationNotFoundError } from '../errors.js';
import type { SecuritySettings } from '../interfaces/ltiConfig.js';
import type { NonceStorage, RegistrationStorage } from '../interfaces/ltiStorage.js';
import type { Registration } from '../interfaces/registration.js';
import { LTI13LoginSchema } from '../schemas/lti13/lti13Login.schema.js';
import { firstIssueMessage } from '../utils/errorFormatting.js';

import { LEGACY_STATE_COOKIE_NAME, STATE_COOKIE_NAME } from './launch.service.js';

export interface StateCookie {
  name: string;
  value: string;
  path: string;
  maxAge: number;
  httpOnly: true;
  secure: true;
  sameSite?: 'None';
}

export interface LoginRedirect {
  /** Platform authentication URL with every OIDC parameter set */
  redirectUrl: URL;
  state: string;
  nonce: string;
  /** State cookies to set on the redirect response */
  cookies: StateCookie[];
}

/**
 * Answers a third-party initiated login with the OIDC authentication request
 * the platform expects, issuing the state and nonce the launch later checks.
 */
export class LoginService {
  constructor(
    private registrations: RegistrationStorage,
    private nonces: NonceStorage,
    private settings: SecuritySettings,
    private logger: Logger,
  ) {}

  /**
   * @param params - Login parameters from the platform (query string or form body)
   * @throws {LTIError} 400 when a parameter is missing or no registration matches
   */
  async buildRedirect(params: Record<string, string | undefined>): Promise<LoginRedirect> {
    const parsed = LTI13LoginSchema.safeParse(params);
    if (!parsed.success) {
      const reason = `invalid login request: ${firstIssueMessage(parsed.error)}`;
      this.logger.warn({ reason }, 'login rejected');
      throw new LTIError(400, 'login_invalid', reason, { cause: parsed.error });
    }
    const login = parsed.data;

    let registration: Registration;
    try {
      registration = await this.registrations.findRegistration(login.iss, login.client_id);
    } catch (error) {
      if (error instanceof RegistrationNotFoundError) {
        this.logger.warn({ issuer: login.iss, clientId: login.client_id }, 'login rejected');
        throw new LTIError(400, 'login_registration', 'registration not found', {
          cause: error,
        });
      }
      throw error;
    }

    const state = `state-${crypto.randomUUID()}`;
    const nonce = crypto.randomUUID();
    const expiresAt = new Date(Date.now() + this.settings.nonceExpirationSeconds * 1000);
    await this.nonces.storeNonce(nonce, registration.targetLinkUri, expiresAt);

    const redirectUrl = new URL(registration.authLoginUrl);
    const query = redirectUrl.searchParams;
    query.set('scope', 'openid');
    query.set('response_type', 'id_token');
    query.set('response_mode', 'form_post');
    query.set('prompt', 'none');
    query.set('client_id', registration.clientId);
    query.set('redirect_uri', registration.targetLinkUri);
    query.set('state', state);
    query.set('nonce', nonce);
    query.set('login_hint', login.login_hint);
    if (login.lti_message_hint) {
      query.set('lti_message_hint', login.lti_message_hint);
    }
    if (login.lti_deployment_id) {
      query.set('lti_deployment_id', login.lti_deployment_id);
    }

    const cookie = {
      value: state,
      path: new URL(registration.targetLinkUri).pathname,
      maxAge: this.settings.nonceExpirationSeconds,
      httpOnly: true,
      secure: true,
    } as const;

    this.logger.debug(
      { issuer: registration.issuer, clientId: registration.clientId },
      'login redirect built',
    );
    return {
      redirectUrl,
      state,
      nonce,
      cookies: [
        { name: STATE_COOKIE_NAME, ...cookie, sameSite: 'None' },
        { name: LEGACY_STATE_COOKIE_NAME, ...cookie },
      ],
    };
  }
}
