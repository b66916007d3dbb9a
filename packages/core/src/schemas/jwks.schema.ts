import { z } from 'zod';

/**
 * A platform's published key set. Only the members needed to verify RSA and
 * EC signatures are kept.
 */
export const PlatformKeySetSchema = z.object({
  keys: z.array(
    z.object({
      kty: z.string(),
      kid: z.string().optional(),
      alg: z.string().optional(),
      use: z.string().optional(),
      n: z.string().optional(),
      e: z.string().optional(),
      crv: z.string().optional(),
      x: z.string().optional(),
      y: z.string().optional(),
    }),
  ),
});

export type PlatformKeySet = z.infer<typeof PlatformKeySetSchema>;
