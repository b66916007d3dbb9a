import * as z from 'zod';

/** Longest deployment identifier a platform may send. */
export const MAX_DEPLOYMENT_ID_LENGTH = 255;

/**
 * Deployment identifier as sent in `lti_deployment_id` and the deployment_id claim.
 */
export const DeploymentIdSchema = z
  .string({ error: 'deployment ID not found in request' })
  .min(1, 'deployment ID not found in request')
  .max(
    MAX_DEPLOYMENT_ID_LENGTH,
    `deployment ID exceeds maximum length (${MAX_DEPLOYMENT_ID_LENGTH})`,
  );

export const DeploymentSchema = z.object({
  deploymentId: DeploymentIdSchema,
});

/**
 * Validated before a registration reaches a store.
 */
export const RegistrationSchema = z.object({
  issuer: z.string().min(1, 'issuer is required'),
  clientId: z.string().min(1, 'clientId is required'),
  authTokenUrl: z.url(),
  authLoginUrl: z.url(),
  keysetUrl: z.url(),
  targetLinkUri: z.url(),
});
