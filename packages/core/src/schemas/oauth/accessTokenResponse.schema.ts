import { z } from 'zod';

/**
 * Successful response body of an OAuth2 client-credentials grant.
 *
 * @see https://www.rfc-editor.org/rfc/rfc6749#section-5.1
 */
export const AccessTokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive(),
  scope: z.string().optional(),
});

export type AccessTokenResponse = z.infer<typeof AccessTokenResponseSchema>;
