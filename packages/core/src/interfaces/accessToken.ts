/**
 * A scoped bearer token obtained from a platform's token endpoint.
 * Cached per (tokenUrl, clientId, sorted scopes).
 */
export interface AccessToken {
  tokenUrl: string;
  clientId: string;
  /** Scopes the token was issued for, sorted */
  scopes: string[];
  token: string;
  /** Absolute instant after which the token must not be used */
  expiresAt: Date;
}
