export { Connector, type ConnectorDependencies } from './connector.js';
export * from './errors.js';
export * from './interfaces/index.js';
export { LTITool } from './ltiTool.js';
export * from './schemas/index.js';
export {
  AGS_MEDIA_TYPES,
  AGS_SCOPES,
  AGSService,
  type ResultPageOptions,
} from './services/ags.service.js';
export {
  LAUNCH_ID_PREFIX,
  LEGACY_STATE_COOKIE_NAME,
  type LaunchResult,
  LaunchValidator,
  STATE_COOKIE_NAME,
} from './services/launch.service.js';
export { type LoginRedirect, LoginService, type StateCookie } from './services/login.service.js';
export {
  type LaunchingMember,
  type MembershipPage,
  NRPS_MEDIA_TYPE,
  NRPS_SCOPE,
  NRPSService,
} from './services/nrps.service.js';
export { JSON_MEDIA_TYPE, ServiceRequestDispatcher } from './services/serviceRequest.service.js';
export {
  CLIENT_ASSERTION_LIFETIME_SECONDS,
  CLOCK_SKEW_ALLOWANCE_SECONDS,
  TokenService,
} from './services/token.service.js';
export { firstIssueMessage, formatError } from './utils/errorFormatting.js';
export { getNextPageUrl } from './utils/linkHeader.js';
export { ltiServiceFetch, USER_AGENT } from './utils/ltiServiceFetch.js';
export { accessTokenKey, canonicalizeScopes } from './utils/scopes.js';
