import { z } from 'zod';

/**
 * Schema for LTI Assignment and Grade Services (AGS) Line Item.
 * Represents a gradebook column/assignment according to LTI AGS v2.0 specification.
 *
 * @see https://www.imsglobal.org/spec/lti-ags/v2p0/#line-item-service
 */
export const LineItemSchema = z.object({
  /** Unique identifier (and URL) of the line item, assigned by the platform */
  id: z.url(),

  /** Maximum score possible for this line item */
  scoreMaximum: z.number().min(0),

  /** Human-readable label for the line item */
  label: z.string(),

  /** Optional resource identifier that this line item is associated with */
  resourceId: z.string().optional(),

  /** Optional resource link identifier */
  resourceLinkId: z.string().optional(),

  /** Optional tag to identify the line item */
  tag: z.string().optional(),

  startDateTime: z.iso.datetime({ offset: true }).optional(),
  endDateTime: z.iso.datetime({ offset: true }).optional(),
});

export const LineItemsSchema = z.array(LineItemSchema);

/** A line item before the platform has assigned it an id. */
export const CreateLineItemSchema = LineItemSchema.omit({ id: true });

/** Full replacement of a line item; `id` is optional since the URL identifies it. */
export const UpdateLineItemSchema = CreateLineItemSchema.extend({
  id: z.url().optional(),
});

export type LineItem = z.infer<typeof LineItemSchema>;
export type LineItems = z.infer<typeof LineItemsSchema>;
export type CreateLineItem = z.infer<typeof CreateLineItemSchema>;
export type UpdateLineItem = z.infer<typeof UpdateLineItemSchema>;

/**
 * Query filters accepted by the line items container endpoint.
 */
export interface LineItemFilters {
  resourceLinkId?: string;
  resourceId?: string;
  tag?: string;
  limit?: number;
}
