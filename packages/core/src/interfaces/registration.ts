/**
 * A trust relationship between one platform and this tool.
 * Unique per (issuer, clientId); created out of band and read-only at runtime.
 */
export interface Registration {
  /** Platform issuer (unique identifier) */
  issuer: string;
  /** The tool's client ID on this platform */
  clientId: string;
  /** Platform's OAuth2 token endpoint */
  authTokenUrl: string;
  /** Platform's OIDC authentication endpoint */
  authLoginUrl: string;
  /** Platform's JWKS endpoint */
  keysetUrl: string;
  /** Tool URL the platform launches into */
  targetLinkUri: string;
}

/**
 * A specific deployment of the tool within a registration.
 * Identified by the platform-provided deployment ID (1-255 characters).
 */
export interface Deployment {
  /** LMS-provided deployment identifier used in LTI launch requests */
  deploymentId: string;
}
