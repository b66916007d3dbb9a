import { pino } from 'pino';
import { beforeAll, beforeEach, describe, expect, it, vi } from 'vitest';

import { LaunchError, type LaunchStep } from '../src/errors.js';
import { resolveSecuritySettings, useSingleStorage } from '../src/interfaces/index.js';
import {
  DEPLOYMENT_ID_CLAIM,
  MESSAGE_TYPE_CLAIM,
  RESOURCE_LINK_CLAIM,
  TARGET_LINK_URI_CLAIM,
  VERSION_CLAIM,
} from '../src/schemas/index.js';
import {
  LAUNCH_ID_PREFIX,
  LEGACY_STATE_COOKIE_NAME,
  LaunchValidator,
  STATE_COOKIE_NAME,
} from '../src/services/launch.service.js';

import { installFakeFetch, jsonResponse } from './helpers/fakeFetch.js';
import {
  CLIENT_ID,
  createMockLTIPayload,
  createTestKeys,
  DEPLOYMENT_ID,
  PLATFORM_ISSUER,
  REGISTRATION,
  signIdToken,
  TARGET_LINK_URI,
  type TestKeys,
} from './helpers/fixtures.js';
import { TestStores } from './helpers/testStores.js';

describe('LaunchValidator', () => {
  let platformKeys: TestKeys;
  let stores: TestStores;
  let validator: LaunchValidator;

  beforeAll(async () => {
    platformKeys = await createTestKeys();
  });

  beforeEach(async () => {
    stores = new TestStores();
    await stores.storeRegistration(REGISTRATION);
    await stores.storeDeployment(PLATFORM_ISSUER, { deploymentId: DEPLOYMENT_ID });
    await stores.storeNonce('test-nonce', TARGET_LINK_URI, new Date(Date.now() + 600_000));
    installFakeFetch((request) =>
      request.url === REGISTRATION.keysetUrl
        ? jsonResponse({ keys: [platformKeys.publicJwk] })
        : new Response('not found', { status: 404 }),
    );
    validator = new LaunchValidator(
      useSingleStorage(stores),
      resolveSecuritySettings(undefined),
      pino({ level: 'silent' }),
    );
  });

  const launch = async (
    payload = createMockLTIPayload(),
    options: { keys?: TestKeys; cookies?: Record<string, string>; state?: string } = {},
  ) =>
    await validator.validate({
      idToken: await signIdToken(payload, options.keys ?? platformKeys),
      state: options.state ?? 'state-abc',
      cookies: options.cookies ?? { [STATE_COOKIE_NAME]: 'state-abc' },
    });

  const expectRejection = async (
    promise: Promise<unknown>,
    step: LaunchStep,
    statusCode: 400 | 500,
    message: string,
  ) => {
    const error = await promise.then(
      () => undefined,
      (reason: unknown) => reason,
    );
    expect(error).toBeInstanceOf(LaunchError);
    expect(error).toMatchObject({ step, statusCode, message, code: `launch_${step}` });
  };

  describe('accepted launches', () => {
    it('stores the raw payload and returns a prefixed launch ID', async () => {
      const payload = createMockLTIPayload();

      const result = await launch(payload);

      expect(result.launchId.startsWith(LAUNCH_ID_PREFIX)).toBe(true);
      const stored = stores.launchData.get(result.launchId);
      expect(stored).toBeDefined();
      expect(JSON.parse(stored ?? '')).toEqual(payload);
      expect(result.claims.iss).toBe(PLATFORM_ISSUER);
      expect(result.claims.aud).toEqual([CLIENT_ID]);
    });

    it('consumes the nonce', async () => {
      await launch();

      expect(stores.nonces.has('test-nonce')).toBe(false);
    });

    it('accepts the legacy state cookie', async () => {
      const result = await launch(createMockLTIPayload(), {
        cookies: { [LEGACY_STATE_COOKIE_NAME]: 'state-abc' },
      });

      expect(result.launchId.startsWith(LAUNCH_ID_PREFIX)).toBe(true);
    });

    it('looks up the registration by authorized party when the audience is a list', async () => {
      const result = await launch(
        createMockLTIPayload({ aud: ['some-other-audience', CLIENT_ID], azp: CLIENT_ID }),
      );

      expect(result.claims.aud).toEqual(['some-other-audience', CLIENT_ID]);
    });
  });

  describe('token', () => {
    it('rejects a request without id_token', async () => {
      await expectRejection(
        validator.validate({ state: 'state-abc', cookies: {} }),
        'token',
        400,
        'id_token not found in request',
      );
    });

    it('rejects a token that is not a JWT', async () => {
      await expectRejection(
        validator.validate({ idToken: 'not-a-jwt', state: 'state-abc', cookies: {} }),
        'token',
        400,
        'id_token improperly formatted',
      );
    });
  });

  describe('registration', () => {
    it('rejects an unknown issuer', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ iss: 'https://unknown.example.com' })),
        'registration',
        400,
        'registration not found',
      );
    });

    it('reports a storage failure as a 500', async () => {
      vi.spyOn(stores, 'findRegistration').mockRejectedValue(new Error('connection refused'));

      await expectRejection(launch(), 'registration', 500, 'registration lookup failed');
    });
  });

  describe('signature', () => {
    it('rejects a token signed with a key the platform does not publish', async () => {
      const otherKeys = await createTestKeys();

      await expectRejection(
        launch(createMockLTIPayload(), { keys: otherKeys }),
        'signature',
        400,
        'token signature verification failed',
      );
      expect(stores.nonces.has('test-nonce')).toBe(true);
    });

    it('rejects an expired token', async () => {
      const now = Math.floor(Date.now() / 1000);

      await expectRejection(
        launch(createMockLTIPayload({ iat: now - 600, exp: now - 300 })),
        'signature',
        400,
        'token signature verification failed',
      );
    });

    it('reports an unreachable key set as a 500', async () => {
      installFakeFetch(() => new Response('unavailable', { status: 503 }));

      await expectRejection(launch(), 'signature', 500, 'platform key set could not be fetched');
    });

    it('is checked before the state', async () => {
      const otherKeys = await createTestKeys();

      await expectRejection(
        launch(createMockLTIPayload(), { keys: otherKeys, cookies: {} }),
        'signature',
        400,
        'token signature verification failed',
      );
    });
  });

  describe('state', () => {
    it('rejects a launch without state cookie', async () => {
      await expectRejection(
        launch(createMockLTIPayload(), { cookies: {} }),
        'state',
        400,
        'state cookie not found',
      );
    });

    it('rejects a state that differs from the cookie', async () => {
      await expectRejection(
        launch(createMockLTIPayload(), { state: 'state-other' }),
        'state',
        400,
        'state does not match state cookie',
      );
    });
  });

  describe('audience', () => {
    it('rejects a token whose audience does not contain the client ID', async () => {
      vi.spyOn(stores, 'findRegistration').mockResolvedValue({
        ...REGISTRATION,
        clientId: 'another-client',
      });

      await expectRejection(launch(), 'audience', 400, 'client ID not found in token audience');
      expect(stores.nonces.has('test-nonce')).toBe(true);
    });
  });

  describe('nonce', () => {
    it('rejects a replayed launch', async () => {
      const payload = createMockLTIPayload();
      await launch(payload);

      await expectRejection(launch(payload), 'nonce', 400, 'nonce not found');
    });

    it('rejects a nonce issued for another target link URI', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [TARGET_LINK_URI_CLAIM]: 'https://tool.example.com/other' })),
        'nonce',
        400,
        'nonce found with mismatched target link uri',
      );
    });

    it('rejects a token without nonce', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ nonce: undefined })),
        'nonce',
        400,
        'nonce not found in request',
      );
    });
  });

  describe('deployment', () => {
    it('rejects an unknown deployment', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [DEPLOYMENT_ID_CLAIM]: 'unknown-deployment' })),
        'deployment',
        400,
        'deployment not found',
      );
    });

    it('rejects an overlong deployment ID', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [DEPLOYMENT_ID_CLAIM]: 'd'.repeat(256) })),
        'deployment',
        400,
        'deployment ID exceeds maximum length (255)',
      );
    });
  });

  describe('version', () => {
    it('rejects LTI 1.2.0 without reaching the resource link or launch data steps', async () => {
      const storeLaunchData = vi.spyOn(stores, 'storeLaunchData');

      await expectRejection(
        launch(createMockLTIPayload({ [VERSION_CLAIM]: '1.2.0', [RESOURCE_LINK_CLAIM]: undefined })),
        'version',
        400,
        'compatible version not found in request',
      );
      expect(storeLaunchData).not.toHaveBeenCalled();
      expect(stores.launchData.size).toBe(0);
    });

    it('rejects other message types', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [MESSAGE_TYPE_CLAIM]: 'LtiDeepLinkingRequest' })),
        'version',
        400,
        'supported message type not found in request',
      );
    });
  });

  describe('resource link', () => {
    it('rejects a launch without resource link', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [RESOURCE_LINK_CLAIM]: undefined })),
        'resource_link',
        400,
        'resource link not found in request',
      );
    });

    it('rejects an overlong resource link ID', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [RESOURCE_LINK_CLAIM]: { id: 'r'.repeat(256) } })),
        'resource_link',
        400,
        'resource link ID exceeds maximum length (255)',
      );
    });

    it('rejects a resource link that is not an object', async () => {
      await expectRejection(
        launch(createMockLTIPayload({ [RESOURCE_LINK_CLAIM]: 'assignment789' })),
        'resource_link',
        400,
        'resource link improperly formatted',
      );
    });
  });

  describe('launch data', () => {
    it('reports a storage failure as a 500', async () => {
      vi.spyOn(stores, 'storeLaunchData').mockRejectedValue(new Error('disk full'));

      await expectRejection(launch(), 'launch_data', 500, 'launch data could not be stored');
    });
  });
});
