export type { AccessToken } from './accessToken.js';
export type { JWKS } from './jwks.js';
export type { LaunchRequest } from './launchRequest.js';
export { type LTIConfig, resolveSecuritySettings, type SecuritySettings } from './ltiConfig.js';
export {
  type AccessTokenStorage,
  type LaunchDataStorage,
  type LTIStorage,
  type LTIStores,
  type NonceStorage,
  type RegistrationStorage,
  useSingleStorage,
} from './ltiStorage.js';
export type { Deployment, Registration } from './registration.js';
export type {
  AccessTokenProvider,
  ServiceRequest,
  ServiceRequester,
  ServiceRequestMethod,
} from './serviceRequest.js';
export type { Page } from './page.js';
