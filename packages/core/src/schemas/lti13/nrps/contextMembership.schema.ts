import * as z from 'zod';

/**
 * Schema for individual member in NRPS response
 */
export const NRPSMemberResponseSchema = z.object({
  status: z.string().optional(),
  name: z.string().optional(),
  picture: z.string().optional(),
  given_name: z.string().optional(),
  family_name: z.string().optional(),
  middle_name: z.string().optional(),
  email: z.string().optional(), // Platforms don't force email regexp conformance
  user_id: z.string(),
  lis_person_sourcedid: z.string().optional(),
  roles: z.array(z.string()).default([]),
});

export const NRPSContextResponseSchema = z.object({
  id: z.string(),
  label: z.string().optional(),
  title: z.string().optional(),
});

export const NRPSContextMembershipResponseSchema = z.object({
  id: z.string(),
  context: NRPSContextResponseSchema,
  members: z.array(NRPSMemberResponseSchema),
});

/**
 * Clean public API schemas (camelCase for JS/TS consumers)
 */
export const MemberSchema = z.object({
  status: z.string().optional(),
  name: z.string().optional(),
  picture: z.string().optional(),
  givenName: z.string().optional(),
  familyName: z.string().optional(),
  middleName: z.string().optional(),
  email: z.string().optional(),
  userId: z.string(),
  lisPersonSourcedId: z.string().optional(),
  roles: z.array(z.string()),
});

export type NRPSMemberResponse = z.infer<typeof NRPSMemberResponseSchema>;
export type Member = z.infer<typeof MemberSchema>;
export type Context = z.infer<typeof NRPSContextResponseSchema>;

export interface Membership {
  id: string;
  context: Context;
  members: Member[];
}
