/** Sorted, de-duplicated copy of a scope list. */
export function canonicalizeScopes(scopes: readonly string[]): string[] {
  return [...new Set(scopes)].sort();
}

/** Cache key of an access token; order of `scopes` does not matter. */
export function accessTokenKey(tokenUrl: string, clientId: string, scopes: readonly string[]): string {
  return JSON.stringify([tokenUrl, clientId, canonicalizeScopes(scopes)]);
}
