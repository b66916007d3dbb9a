import {
  type AccessToken,
  AccessTokenExpiredError,
  AccessTokenNotFoundError,
  accessTokenKey,
  canonicalizeScopes,
  type Deployment,
  DeploymentNotFoundError,
  LaunchDataNotFoundError,
  type LTIStorage,
  NonceNotFoundError,
  NonceTargetLinkUriMismatchError,
  type Registration,
  RegistrationNotFoundError,
} from '@lti-bridge/core';
import { type Logger, pino } from 'pino';

import type { MemoryStorageConfig } from './interfaces/memoryStorageConfig.js';

interface Expiring<T> {
  value: T;
  expiresAt: Date;
}

/**
 * In-memory LTI storage implementation.
 *
 * ⚠️  **WARNING: NOT SUITABLE FOR MULTI-INSTANCE DEPLOYMENTS**
 *
 * This storage keeps all data in memory and provides no persistence.
 * It's intended for:
 * - Development and testing
 * - Single-instance server deployments
 * - Reference implementation
 *
 * With several instances each one has its own nonces, so a nonce issued by one
 * instance is unknown to the others and launches fail at random.
 *
 * No method awaits between reading and deleting an entry, so a nonce is
 * consumed by exactly one caller even when launches run concurrently.
 */
export class MemoryStorage implements LTIStorage {
  private registrations = new Map<string, Registration>(); // issuer#clientId
  private deployments = new Map<string, Deployment>(); // issuer#deploymentId
  private nonces = new Map<string, Expiring<string>>(); // nonce -> target link uri
  private launchData = new Map<string, Expiring<string>>();
  private accessTokens = new Map<string, AccessToken>();
  private logger: Logger;

  constructor(config?: MemoryStorageConfig) {
    this.logger = config?.logger ?? pino({ level: 'silent' });
  }

  // oxlint-disable-next-line require-await
  async storeRegistration(registration: Registration): Promise<void> {
    this.registrations.set(`${registration.issuer}#${registration.clientId}`, {
      ...registration,
    });
    this.logger.debug(
      { issuer: registration.issuer, clientId: registration.clientId },
      'registration stored',
    );
  }

  // oxlint-disable-next-line require-await
  async findRegistration(issuer: string, clientId: string): Promise<Registration> {
    const registration = this.registrations.get(`${issuer}#${clientId}`);
    if (!registration) {
      this.logger.warn({ issuer, clientId }, 'registration not found');
      throw new RegistrationNotFoundError(issuer, clientId);
    }
    return { ...registration };
  }

  // oxlint-disable-next-line require-await
  async storeDeployment(issuer: string, deployment: Deployment): Promise<void> {
    this.deployments.set(`${issuer}#${deployment.deploymentId}`, { ...deployment });
    this.logger.debug({ issuer, deploymentId: deployment.deploymentId }, 'deployment stored');
  }

  // oxlint-disable-next-line require-await
  async findDeployment(issuer: string, deploymentId: string): Promise<Deployment> {
    const deployment = this.deployments.get(`${issuer}#${deploymentId}`);
    if (!deployment) {
      this.logger.warn({ issuer, deploymentId }, 'deployment not found');
      throw new DeploymentNotFoundError(issuer, deploymentId);
    }
    return { ...deployment };
  }

  // oxlint-disable-next-line require-await
  async storeNonce(nonce: string, targetLinkUri: string, expiresAt: Date): Promise<void> {
    this.nonces.set(nonce, { value: targetLinkUri, expiresAt });
    this.logger.debug({ expiresAt }, 'nonce stored with expiration');
  }

  // oxlint-disable-next-line require-await
  async testAndClearNonce(nonce: string, targetLinkUri: string): Promise<void> {
    const entry = this.nonces.get(nonce);
    // consumed on every outcome
    this.nonces.delete(nonce);

    if (!entry || entry.expiresAt.getTime() <= Date.now()) {
      this.logger.warn('nonce not found - invalid, used or expired nonce');
      throw new NonceNotFoundError();
    }
    if (entry.value !== targetLinkUri) {
      this.logger.warn({ targetLinkUri }, 'nonce bound to a different target link uri');
      throw new NonceTargetLinkUriMismatchError();
    }
    this.logger.debug('nonce validated and consumed');
  }

  // oxlint-disable-next-line require-await
  async storeLaunchData(launchId: string, launchData: string, expiresAt: Date): Promise<void> {
    this.launchData.set(launchId, { value: launchData, expiresAt });
    this.logger.debug({ launchId, expiresAt }, 'launch data stored');
  }

  // oxlint-disable-next-line require-await
  async findLaunchData(launchId: string): Promise<string> {
    const entry = this.launchData.get(launchId);
    if (!entry || entry.expiresAt.getTime() <= Date.now()) {
      if (entry) {
        this.launchData.delete(launchId);
      }
      this.logger.warn({ launchId }, 'launch data not found');
      throw new LaunchDataNotFoundError(launchId);
    }
    return entry.value;
  }

  // oxlint-disable-next-line require-await
  async storeAccessToken(token: AccessToken): Promise<void> {
    const scopes = canonicalizeScopes(token.scopes);
    if (scopes.length === 0) {
      throw new Error('access token has no scopes');
    }
    this.accessTokens.set(accessTokenKey(token.tokenUrl, token.clientId, scopes), {
      ...token,
      scopes,
    });
  }

  // oxlint-disable-next-line require-await
  async findAccessToken(
    tokenUrl: string,
    clientId: string,
    scopes: string[],
  ): Promise<AccessToken> {
    if (scopes.length === 0) {
      throw new Error('no scopes given for access token lookup');
    }
    const token = this.accessTokens.get(accessTokenKey(tokenUrl, clientId, scopes));
    if (!token) {
      throw new AccessTokenNotFoundError();
    }
    if (token.expiresAt.getTime() <= Date.now()) {
      throw new AccessTokenExpiredError();
    }
    return { ...token, scopes: [...token.scopes] };
  }

  /**
   * Removes expired nonces, launch data and access tokens.
   *
   * @returns Number of removed entries per kind
   */
  cleanup(now: Date = new Date()): { nonces: number; launchData: number; accessTokens: number } {
    const removed = {
      nonces: removeExpired(this.nonces, now),
      launchData: removeExpired(this.launchData, now),
      accessTokens: removeExpired(this.accessTokens, now),
    };
    this.logger.debug(removed, 'expired entries removed');
    return removed;
  }
}

function removeExpired(map: Map<string, { expiresAt: Date }>, now: Date): number {
  let removed = 0;
  for (const [key, entry] of map) {
    if (entry.expiresAt.getTime() <= now.getTime()) {
      map.delete(key);
      removed++;
    }
  }
  return removed;
}
