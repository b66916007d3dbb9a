import * as z from 'zod';

import { DeploymentIdSchema } from '../../registration.schema.js';

import {
  DEPLOYMENT_ID_CLAIM,
  LTI_VERSION,
  MESSAGE_TYPE_CLAIM,
  RESOURCE_LINK_MESSAGE_TYPE,
  TARGET_LINK_URI_CLAIM,
  VERSION_CLAIM,
} from './claimNames.js';

export const NonceClaimsSchema = z.object({
  nonce: z.string({ error: 'nonce not found in request' }).min(1, 'nonce not found in request'),
  [TARGET_LINK_URI_CLAIM]: z
    .string({ error: 'target link uri not found in request' })
    .min(1, 'target link uri not found in request'),
});

export const DeploymentClaimsSchema = z.object({
  [DEPLOYMENT_ID_CLAIM]: DeploymentIdSchema,
});

export const VersionClaimsSchema = z.object({
  [VERSION_CLAIM]: z
    .string({ error: 'LTI version not found in request' })
    .refine((version) => version === LTI_VERSION, 'compatible version not found in request'),
  [MESSAGE_TYPE_CLAIM]: z
    .string({ error: 'message type not found in request' })
    .refine(
      (messageType) => messageType === RESOURCE_LINK_MESSAGE_TYPE,
      'supported message type not found in request',
    ),
});
