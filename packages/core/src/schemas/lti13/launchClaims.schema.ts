import { z } from 'zod';

import { AudienceSchema } from './claims/baseJwtClaims.schema.js';
import {
  AGS_ENDPOINT_CLAIM,
  CONTEXT_CLAIM,
  CUSTOM_CLAIM,
  DEPLOYMENT_ID_CLAIM,
  NRPS_CLAIM,
  RESOURCE_LINK_CLAIM,
  ROLES_CLAIM,
} from './claims/claimNames.js';
import { ContextSchema, ResourceLinkSchema } from './claims/contextClaims.schema.js';

/**
 * Claims a Connector reads back from stored launch data.
 *
 * Unknown claims are kept. Service claims stay `unknown` so the AGS and NRPS
 * services can tell a missing claim from a malformed one.
 */
export const LaunchClaimsSchema = z.looseObject({
  iss: z.string().min(1),
  aud: AudienceSchema,
  azp: z.string().optional(),
  sub: z.string().optional(),
  email: z.string().optional(),
  name: z.string().optional(),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
  [DEPLOYMENT_ID_CLAIM]: z.string().min(1),
  [RESOURCE_LINK_CLAIM]: ResourceLinkSchema.optional(),
  [CONTEXT_CLAIM]: ContextSchema.optional(),
  [ROLES_CLAIM]: z.array(z.string()).optional(),
  [CUSTOM_CLAIM]: z.record(z.string(), z.unknown()).optional(),
  [AGS_ENDPOINT_CLAIM]: z.unknown().optional(),
  [NRPS_CLAIM]: z.unknown().optional(),
});

export type LaunchClaims = z.infer<typeof LaunchClaimsSchema>;
