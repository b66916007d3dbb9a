import { z } from 'zod';

/**
 * Form fields a platform posts to the launch URL. Both are optional here;
 * their absence is reported by the launch validator.
 */
export const LTI13LaunchSchema = z.object({
  id_token: z.string().optional(),
  state: z.string().optional(),
});

export type LTI13LaunchForm = z.infer<typeof LTI13LaunchSchema>;
