import type { KeyLike } from 'jose';
import type { Logger } from 'pino';

import type { LTIStores } from './ltiStorage.js';

/**
 * Configuration options for LTI Tool initialization.
 */
export interface LTIConfig {
  /** Where registrations, nonces, launch data and access tokens are kept */
  stores: LTIStores;

  /**
   * The tool's RSA private key. Signs client assertions and backs the key set
   * endpoint. Operations that need it fail with a ConfigurationError when absent.
   */
  signingKey?: KeyLike;

  /** Optional logger; a silent one is used otherwise */
  logger?: Logger;

  security?: {
    /** Key identifier for the JWKS and JWT headers (default: 'main') */
    keyId?: string;
    /** How long a login nonce stays valid (default: 600 seconds) */
    nonceExpirationSeconds?: number;
    /** How long stored launch data stays valid (default: 86400 seconds) */
    launchDataExpirationSeconds?: number;
    /** Timeout for every outbound request (default: 15000 ms) */
    requestTimeoutMs?: number;
  };
}

/** {@link LTIConfig.security} with every default applied. */
export interface SecuritySettings {
  keyId: string;
  nonceExpirationSeconds: number;
  launchDataExpirationSeconds: number;
  requestTimeoutMs: number;
}

export function resolveSecuritySettings(security: LTIConfig['security']): SecuritySettings {
  return {
    keyId: security?.keyId ?? 'main',
    nonceExpirationSeconds: security?.nonceExpirationSeconds ?? 600,
    launchDataExpirationSeconds: security?.launchDataExpirationSeconds ?? 86_400,
    requestTimeoutMs: security?.requestTimeoutMs ?? 15_000,
  };
}
