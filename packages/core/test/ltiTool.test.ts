import { beforeAll, beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError, LTIError } from '../src/errors.js';
import { useSingleStorage } from '../src/interfaces/index.js';
import { LTITool } from '../src/ltiTool.js';

import {
  CLIENT_ID,
  createTestKeys,
  DEPLOYMENT_ID,
  PLATFORM_ISSUER,
  REGISTRATION,
  TARGET_LINK_URI,
  type TestKeys,
} from './helpers/fixtures.js';
import { TestStores } from './helpers/testStores.js';

const loginParams = {
  iss: PLATFORM_ISSUER,
  login_hint: 'login-hint-1',
  target_link_uri: TARGET_LINK_URI,
  client_id: CLIENT_ID,
};

describe('LTITool', () => {
  let toolKeys: TestKeys;
  let stores: TestStores;
  let tool: LTITool;

  beforeAll(async () => {
    toolKeys = await createTestKeys('tool-key');
  });

  beforeEach(async () => {
    stores = new TestStores();
    tool = new LTITool({ stores: useSingleStorage(stores), signingKey: toolKeys.privateKey });
    await tool.addRegistration(REGISTRATION);
  });

  describe('handleLogin', () => {
    it('redirects to the platform with every OIDC parameter', async () => {
      const login = await tool.handleLogin({
        ...loginParams,
        lti_message_hint: 'message-hint-1',
        lti_deployment_id: DEPLOYMENT_ID,
      });

      const { redirectUrl } = login;
      expect(`${redirectUrl.origin}${redirectUrl.pathname}`).toBe(REGISTRATION.authLoginUrl);
      expect([...redirectUrl.searchParams]).toEqual([
        ['scope', 'openid'],
        ['response_type', 'id_token'],
        ['response_mode', 'form_post'],
        ['prompt', 'none'],
        ['client_id', CLIENT_ID],
        ['redirect_uri', TARGET_LINK_URI],
        ['state', login.state],
        ['nonce', login.nonce],
        ['login_hint', 'login-hint-1'],
        ['lti_message_hint', 'message-hint-1'],
        ['lti_deployment_id', DEPLOYMENT_ID],
      ]);
      expect(login.state).toMatch(/^state-[0-9a-f-]{36}$/);
    });

    it('stores the nonce for the registered target link URI', async () => {
      const { nonce } = await tool.handleLogin(loginParams);

      expect(stores.nonces.get(nonce)?.targetLinkUri).toBe(TARGET_LINK_URI);
    });

    it('returns a SameSite=None state cookie and a legacy one', async () => {
      const { state, cookies } = await tool.handleLogin(loginParams);

      const common = { value: state, path: '/lti/launch', maxAge: 600, httpOnly: true, secure: true };
      expect(cookies).toEqual([
        { name: 'lti1p3-state', ...common, sameSite: 'None' },
        { name: 'lti1p3-state-legacy', ...common },
      ]);
    });

    it('rejects a login without client_id', async () => {
      const error = await tool
        .handleLogin({ ...loginParams, client_id: undefined })
        .catch((reason: unknown) => reason);

      expect(error).toBeInstanceOf(LTIError);
      expect(error).toMatchObject({ statusCode: 400, code: 'login_invalid' });
    });

    it('rejects a login for an unknown client', async () => {
      const error = await tool
        .handleLogin({ ...loginParams, client_id: 'unknown-client' })
        .catch((reason: unknown) => reason);

      expect(error).toMatchObject({
        statusCode: 400,
        code: 'login_registration',
        message: 'registration not found',
      });
      expect(stores.nonces.size).toBe(0);
    });
  });

  describe('getJWKS', () => {
    it('publishes only the public key members', async () => {
      const jwks = await tool.getJWKS();

      expect(jwks).toEqual({
        keys: [
          {
            kty: 'RSA',
            n: toolKeys.publicJwk.n,
            e: toolKeys.publicJwk.e,
            kid: 'main',
            alg: 'RS256',
            use: 'sig',
          },
        ],
      });
    });

    it('uses the given key ID', async () => {
      const jwks = await tool.getJWKS('rotated-key');

      expect(jwks.keys[0]?.kid).toBe('rotated-key');
    });

    it('needs a signing key', async () => {
      const keyless = new LTITool({ stores: useSingleStorage(stores) });

      await expect(keyless.getJWKS()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  describe('registrations', () => {
    it('rejects a registration with an invalid key set URL', async () => {
      await expect(
        tool.addRegistration({ ...REGISTRATION, clientId: 'client456', keysetUrl: 'not-a-url' }),
      ).rejects.toThrow(/^\[Registration\] invalid registration for issuer 'https:\/\/platform\.example\.com'/);
      expect(stores.registrations.has(`${PLATFORM_ISSUER}#client456`)).toBe(false);
    });

    it('rejects an overlong deployment ID', async () => {
      await expect(
        tool.addDeployment(PLATFORM_ISSUER, { deploymentId: 'd'.repeat(256) }),
      ).rejects.toThrow(
        "[Deployment] invalid deployment for issuer 'https://platform.example.com': deployment ID exceeds maximum length (255)",
      );
    });

    it('stores a valid deployment', async () => {
      await tool.addDeployment(PLATFORM_ISSUER, { deploymentId: DEPLOYMENT_ID });

      await expect(stores.findDeployment(PLATFORM_ISSUER, DEPLOYMENT_ID)).resolves.toEqual({
        deploymentId: DEPLOYMENT_ID,
      });
    });
  });
});
