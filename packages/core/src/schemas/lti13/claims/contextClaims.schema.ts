import { z } from 'zod';

export const MAX_RESOURCE_LINK_ID_LENGTH = 255;

export const ResourceLinkSchema = z.object(
  {
    id: z
      .string({ error: 'resource link ID not found' })
      .max(
        MAX_RESOURCE_LINK_ID_LENGTH,
        `resource link ID exceeds maximum length (${MAX_RESOURCE_LINK_ID_LENGTH})`,
      ),
    title: z.string().optional(),
    description: z.string().optional(),
  },
  { error: 'resource link improperly formatted' },
);

export const ContextSchema = z.object({
  id: z.string(),
  label: z.string().optional(),
  title: z.string().optional(),
});
