import * as z from 'zod';

/**
 * Third-party login initiation parameters (GET query or POST form).
 */
export const LTI13LoginSchema = z.object({
  iss: z.string().min(1),
  login_hint: z.string().min(1),
  target_link_uri: z.url(),
  client_id: z.string().min(1),
  lti_deployment_id: z.string().min(1).optional(),
  lti_message_hint: z.string().optional(),
});

export type LTI13Login = z.infer<typeof LTI13LoginSchema>;
