import {
  AccessTokenExpiredError,
  AccessTokenNotFoundError,
  DeploymentNotFoundError,
  LaunchDataNotFoundError,
  NonceNotFoundError,
  NonceTargetLinkUriMismatchError,
  type Registration,
  RegistrationNotFoundError,
} from '@lti-bridge/core';
import { beforeEach, describe, expect, it } from 'vitest';

import { MemoryStorage } from '../src/index.js';

const ISSUER = 'https://platform.example.com';
const TARGET_LINK_URI = 'https://tool.example.com/lti/launch';
const TOKEN_URL = 'https://platform.example.com/token';

const registration: Registration = {
  issuer: ISSUER,
  clientId: 'client123',
  authTokenUrl: TOKEN_URL,
  authLoginUrl: 'https://platform.example.com/auth',
  keysetUrl: 'https://platform.example.com/jwks',
  targetLinkUri: TARGET_LINK_URI,
};

const inMinutes = (minutes: number) => new Date(Date.now() + minutes * 60_000);

describe('MemoryStorage', () => {
  let storage: MemoryStorage;

  beforeEach(() => {
    storage = new MemoryStorage();
  });

  describe('registrations', () => {
    it('finds a stored registration by issuer and client ID', async () => {
      await storage.storeRegistration(registration);

      await expect(storage.findRegistration(ISSUER, 'client123')).resolves.toEqual(registration);
      await expect(storage.findRegistration(ISSUER, 'client456')).rejects.toBeInstanceOf(
        RegistrationNotFoundError,
      );
    });

    it('returns copies', async () => {
      await storage.storeRegistration(registration);
      const found = await storage.findRegistration(ISSUER, 'client123');
      found.keysetUrl = 'https://attacker.example.com/jwks';

      const again = await storage.findRegistration(ISSUER, 'client123');
      expect(again.keysetUrl).toBe(registration.keysetUrl);
    });

    it('scopes deployments by issuer', async () => {
      await storage.storeDeployment(ISSUER, { deploymentId: 'deployment1' });

      await expect(storage.findDeployment(ISSUER, 'deployment1')).resolves.toEqual({
        deploymentId: 'deployment1',
      });
      await expect(
        storage.findDeployment('https://other.example.com', 'deployment1'),
      ).rejects.toBeInstanceOf(DeploymentNotFoundError);
    });
  });

  describe('nonces', () => {
    it('consumes a nonce exactly once', async () => {
      await storage.storeNonce('nonce-1', TARGET_LINK_URI, inMinutes(10));

      await expect(storage.testAndClearNonce('nonce-1', TARGET_LINK_URI)).resolves.toBeUndefined();
      await expect(storage.testAndClearNonce('nonce-1', TARGET_LINK_URI)).rejects.toBeInstanceOf(
        NonceNotFoundError,
      );
    });

    it('consumes the nonce even when the target link URI differs', async () => {
      await storage.storeNonce('nonce-1', TARGET_LINK_URI, inMinutes(10));

      await expect(
        storage.testAndClearNonce('nonce-1', 'https://tool.example.com/other'),
      ).rejects.toBeInstanceOf(NonceTargetLinkUriMismatchError);
      await expect(storage.testAndClearNonce('nonce-1', TARGET_LINK_URI)).rejects.toBeInstanceOf(
        NonceNotFoundError,
      );
    });

    it('treats an expired nonce as not found', async () => {
      await storage.storeNonce('nonce-1', TARGET_LINK_URI, inMinutes(-1));

      await expect(storage.testAndClearNonce('nonce-1', TARGET_LINK_URI)).rejects.toBeInstanceOf(
        NonceNotFoundError,
      );
    });

    it('lets only one of two concurrent launches consume a nonce', async () => {
      await storage.storeNonce('nonce-1', TARGET_LINK_URI, inMinutes(10));

      const outcomes = await Promise.allSettled([
        storage.testAndClearNonce('nonce-1', TARGET_LINK_URI),
        storage.testAndClearNonce('nonce-1', TARGET_LINK_URI),
      ]);

      expect(outcomes.map((outcome) => outcome.status).sort()).toEqual(['fulfilled', 'rejected']);
    });
  });

  describe('launch data', () => {
    it('returns stored launch data until it expires', async () => {
      await storage.storeLaunchData('lti1p3-launch-1', '{"sub":"user123"}', inMinutes(10));
      await storage.storeLaunchData('lti1p3-launch-2', '{"sub":"user456"}', inMinutes(-1));

      await expect(storage.findLaunchData('lti1p3-launch-1')).resolves.toBe('{"sub":"user123"}');
      await expect(storage.findLaunchData('lti1p3-launch-2')).rejects.toBeInstanceOf(
        LaunchDataNotFoundError,
      );
    });
  });

  describe('access tokens', () => {
    it('finds a token whatever the scope order', async () => {
      await storage.storeAccessToken({
        tokenUrl: TOKEN_URL,
        clientId: 'client123',
        scopes: ['scope-b', 'scope-a'],
        token: 'token-1',
        expiresAt: inMinutes(60),
      });

      const token = await storage.findAccessToken(TOKEN_URL, 'client123', ['scope-a', 'scope-b']);

      expect(token.token).toBe('token-1');
      expect(token.scopes).toEqual(['scope-a', 'scope-b']);
      await expect(
        storage.findAccessToken(TOKEN_URL, 'client123', ['scope-a']),
      ).rejects.toBeInstanceOf(AccessTokenNotFoundError);
    });

    it('reports an expired token', async () => {
      await storage.storeAccessToken({
        tokenUrl: TOKEN_URL,
        clientId: 'client123',
        scopes: ['scope-a'],
        token: 'token-1',
        expiresAt: inMinutes(-1),
      });

      await expect(
        storage.findAccessToken(TOKEN_URL, 'client123', ['scope-a']),
      ).rejects.toBeInstanceOf(AccessTokenExpiredError);
    });

    it('rejects a token without scopes', async () => {
      await expect(
        storage.storeAccessToken({
          tokenUrl: TOKEN_URL,
          clientId: 'client123',
          scopes: [],
          token: 'token-1',
          expiresAt: inMinutes(60),
        }),
      ).rejects.toThrow('access token has no scopes');
    });
  });

  describe('cleanup', () => {
    it('removes only expired entries', async () => {
      await storage.storeNonce('nonce-old', TARGET_LINK_URI, inMinutes(-5));
      await storage.storeNonce('nonce-new', TARGET_LINK_URI, inMinutes(5));
      await storage.storeLaunchData('lti1p3-launch-old', '{}', inMinutes(-5));
      await storage.storeAccessToken({
        tokenUrl: TOKEN_URL,
        clientId: 'client123',
        scopes: ['scope-a'],
        token: 'token-1',
        expiresAt: inMinutes(5),
      });

      expect(storage.cleanup()).toEqual({ nonces: 1, launchData: 1, accessTokens: 0 });
      await expect(
        storage.testAndClearNonce('nonce-new', TARGET_LINK_URI),
      ).resolves.toBeUndefined();
    });
  });
});
