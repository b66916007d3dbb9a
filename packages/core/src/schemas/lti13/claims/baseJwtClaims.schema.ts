import { z } from 'zod';

/** `aud` may be a single string or a list; always decoded to a non-empty list. */
export const AudienceSchema = z.union(
  [
    z
      .string()
      .min(1)
      .transform((aud): [string] => [aud]),
    z.tuple([z.string().min(1)], z.string().min(1)),
  ],
  { error: 'audience not found in request' },
);

/**
 * Claims read from a token before its signature has been checked, only to
 * find the registration whose key set verifies it.
 */
export const UnverifiedClaimsSchema = z.object({
  iss: z.string({ error: 'issuer not found in request' }).min(1, 'issuer not found in request'),
  aud: AudienceSchema,
  azp: z.string().min(1).optional(),
});

export const BaseJwtClaimsSchema = z.object({
  iss: z.string().min(1),
  sub: z.string().optional(),
  aud: AudienceSchema,
  azp: z.string().optional(),
  exp: z.number(),
  iat: z.number(),
  nbf: z.number().optional(),
});

export type BaseJwtClaims = z.infer<typeof BaseJwtClaimsSchema>;
