import { z } from 'zod';

/**
 * Every field is optional here: a missing field means the platform did not
 * enable that part of the service, which is reported separately from a field
 * of the wrong type.
 */
export const AgsEndpointClaimSchema = z.object({
  scope: z.array(z.string()).optional(),
  lineitem: z.string().optional(),
  lineitems: z.string().optional(),
});

export const NrpsServiceClaimSchema = z.object({
  context_memberships_url: z.string().optional(),
  service_versions: z.array(z.string()).optional(),
});
