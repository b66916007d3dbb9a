export {
  CreateLineItemSchema,
  type CreateLineItem,
  type LineItem,
  type LineItemFilters,
  type LineItems,
  LineItemSchema,
  LineItemsSchema,
  type UpdateLineItem,
  UpdateLineItemSchema,
} from './lti13/ags/lineItem.schema.js';
export { type Result, type Results, ResultSchema, ResultsSchema } from './lti13/ags/result.schema.js';
export {
  type ActivityProgress,
  ActivityProgressSchema,
  type GradingProgress,
  GradingProgressSchema,
  type ScoreSubmission,
  type ScoreSubmissionInput,
  ScoreSubmissionSchema,
} from './lti13/ags/scoreSubmission.schema.js';
export * from './lti13/claims/claimNames.js';
export {
  AudienceSchema,
  type BaseJwtClaims,
  BaseJwtClaimsSchema,
  UnverifiedClaimsSchema,
} from './lti13/claims/baseJwtClaims.schema.js';
export {
  ContextSchema,
  MAX_RESOURCE_LINK_ID_LENGTH,
  ResourceLinkSchema,
} from './lti13/claims/contextClaims.schema.js';
export {
  DeploymentClaimsSchema,
  NonceClaimsSchema,
  VersionClaimsSchema,
} from './lti13/claims/coreLtiClaims.schema.js';
export {
  AgsEndpointClaimSchema,
  NrpsServiceClaimSchema,
} from './lti13/claims/serviceClaims.schema.js';
export { type LaunchClaims, LaunchClaimsSchema } from './lti13/launchClaims.schema.js';
export { type LTI13LaunchForm, LTI13LaunchSchema } from './lti13/lti13Launch.schema.js';
export { type LTI13Login, LTI13LoginSchema } from './lti13/lti13Login.schema.js';
export {
  type Context,
  type Member,
  MemberSchema,
  type Membership,
  NRPSContextMembershipResponseSchema,
  type NRPSMemberResponse,
} from './lti13/nrps/contextMembership.schema.js';
export {
  type AccessTokenResponse,
  AccessTokenResponseSchema,
} from './oauth/accessTokenResponse.schema.js';
export {
  DeploymentIdSchema,
  DeploymentSchema,
  MAX_DEPLOYMENT_ID_LENGTH,
  RegistrationSchema,
} from './registration.schema.js';
export { type PlatformKeySet, PlatformKeySetSchema } from './jwks.schema.js';
