import { exportJWK, generateKeyPair, type JWK, type JWTPayload, type KeyLike, SignJWT } from 'jose';

import type { Registration } from '../../src/interfaces/index.js';
import {
  AGS_ENDPOINT_CLAIM,
  CONTEXT_CLAIM,
  DEPLOYMENT_ID_CLAIM,
  MESSAGE_TYPE_CLAIM,
  NRPS_CLAIM,
  RESOURCE_LINK_CLAIM,
  ROLES_CLAIM,
  TARGET_LINK_URI_CLAIM,
  VERSION_CLAIM,
} from '../../src/schemas/index.js';

export const PLATFORM_ISSUER = 'https://platform.example.com';
export const CLIENT_ID = 'client123';
export const DEPLOYMENT_ID = 'deployment1';
export const TARGET_LINK_URI = 'https://tool.example.com/lti/launch';
export const LINE_ITEM_URL = 'https://platform.example.com/api/ags/lineitems/789';
export const LINE_ITEMS_URL = 'https://platform.example.com/api/ags/lineitems';
export const MEMBERSHIPS_URL = 'https://platform.example.com/api/nrps/course456/memberships';

export const REGISTRATION: Registration = {
  issuer: PLATFORM_ISSUER,
  clientId: CLIENT_ID,
  authTokenUrl: 'https://platform.example.com/token',
  authLoginUrl: 'https://platform.example.com/auth',
  keysetUrl: 'https://platform.example.com/jwks',
  targetLinkUri: TARGET_LINK_URI,
};

export const ALL_AGS_SCOPES = [
  'https://purl.imsglobal.org/spec/lti-ags/scope/lineitem',
  'https://purl.imsglobal.org/spec/lti-ags/scope/lineitem.readonly',
  'https://purl.imsglobal.org/spec/lti-ags/scope/result.readonly',
  'https://purl.imsglobal.org/spec/lti-ags/scope/score',
];

export interface TestKeys {
  kid: string;
  privateKey: KeyLike;
  publicKey: KeyLike;
  publicJwk: JWK;
}

export async function createTestKeys(kid = 'platform-key'): Promise<TestKeys> {
  const { privateKey, publicKey } = await generateKeyPair('RS256', { extractable: true });
  const publicJwk: JWK = { ...(await exportJWK(publicKey)), kid, alg: 'RS256', use: 'sig' };
  return { kid, privateKey, publicKey, publicJwk };
}

export async function signIdToken(payload: JWTPayload, keys: TestKeys): Promise<string> {
  return await new SignJWT(payload)
    .setProtectedHeader({ alg: 'RS256', kid: keys.kid, typ: 'JWT' })
    .sign(keys.privateKey);
}

/** A resource link launch from the test platform. Set a claim to undefined to leave it out. */
export const createMockLTIPayload = (overrides: JWTPayload = {}): JWTPayload => ({
  iss: PLATFORM_ISSUER,
  aud: CLIENT_ID,
  sub: 'user123',
  iat: Math.floor(Date.now() / 1000),
  exp: Math.floor(Date.now() / 1000) + 300,
  nonce: 'test-nonce',
  given_name: 'Jane',
  family_name: 'Smith',
  name: 'Jane Smith',
  email: 'jane.smith@university.edu',
  [MESSAGE_TYPE_CLAIM]: 'LtiResourceLinkRequest',
  [VERSION_CLAIM]: '1.3.0',
  [DEPLOYMENT_ID_CLAIM]: DEPLOYMENT_ID,
  [TARGET_LINK_URI_CLAIM]: TARGET_LINK_URI,
  [ROLES_CLAIM]: ['http://purl.imsglobal.org/vocab/lis/v2/membership#Instructor'],
  [CONTEXT_CLAIM]: {
    id: 'course456',
    label: 'MATH201',
    title: 'Advanced Mathematics',
  },
  [RESOURCE_LINK_CLAIM]: {
    id: 'assignment789',
    title: 'Homework 3',
  },
  [AGS_ENDPOINT_CLAIM]: {
    lineitem: LINE_ITEM_URL,
    lineitems: LINE_ITEMS_URL,
    scope: ALL_AGS_SCOPES,
  },
  [NRPS_CLAIM]: {
    context_memberships_url: MEMBERSHIPS_URL,
    service_versions: ['2.0'],
  },
  ...overrides,
});
