import type { AccessToken } from './accessToken.js';
import type { Deployment, Registration } from './registration.js';

/**
 * Registrations and their deployments.
 * Lookups throw {@link RegistrationNotFoundError} / {@link DeploymentNotFoundError}
 * when nothing matches; any other error is a storage failure.
 */
export interface RegistrationStorage {
  storeRegistration(registration: Registration): Promise<void>;
  findRegistration(issuer: string, clientId: string): Promise<Registration>;
  storeDeployment(issuer: string, deployment: Deployment): Promise<void>;
  findDeployment(issuer: string, deploymentId: string): Promise<Deployment>;
}

/**
 * Single-use nonces issued at login.
 */
export interface NonceStorage {
  storeNonce(nonce: string, targetLinkUri: string, expiresAt: Date): Promise<void>;

  /**
   * Atomically consumes a nonce. The entry is removed whether or not the
   * target link URI matches, so a second call always fails with
   * {@link NonceNotFoundError}.
   *
   * @throws {NonceNotFoundError} when the nonce was never stored, was already used or has expired
   * @throws {NonceTargetLinkUriMismatchError} when the nonce was stored for another target link URI
   */
  testAndClearNonce(nonce: string, targetLinkUri: string): Promise<void>;
}

/**
 * Verified launch payloads, stored as the raw JSON text of the token claims.
 */
export interface LaunchDataStorage {
  storeLaunchData(launchId: string, launchData: string, expiresAt: Date): Promise<void>;
  /** @throws {LaunchDataNotFoundError} */
  findLaunchData(launchId: string): Promise<string>;
}

/**
 * Cached service access tokens. Scopes are order-independent.
 */
export interface AccessTokenStorage {
  storeAccessToken(token: AccessToken): Promise<void>;
  /**
   * @throws {AccessTokenNotFoundError} when no token exists for the key
   * @throws {AccessTokenExpiredError} when one exists but its expiry has passed
   */
  findAccessToken(tokenUrl: string, clientId: string, scopes: string[]): Promise<AccessToken>;
}

/**
 * A single back end implementing every storage role.
 */
export interface LTIStorage
  extends RegistrationStorage,
    NonceStorage,
    LaunchDataStorage,
    AccessTokenStorage {}

/**
 * The storage roles the toolkit depends on. Each role may live in a different back end.
 */
export interface LTIStores {
  registrations: RegistrationStorage;
  nonces: NonceStorage;
  launchData: LaunchDataStorage;
  accessTokens: AccessTokenStorage;
}

/**
 * Uses one storage object for every role.
 *
 * @example
 * ```typescript
 * const tool = new LTITool({ stores: useSingleStorage(new MemoryStorage()) });
 * ```
 */
export function useSingleStorage(storage: LTIStorage): LTIStores {
  return {
    registrations: storage,
    nonces: storage,
    launchData: storage,
    accessTokens: storage,
  };
}
