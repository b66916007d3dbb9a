import * as z from 'zod';

import { ActivityProgressSchema, GradingProgressSchema } from './scoreSubmission.schema.js';

/**
 * Schema for LTI Assignment and Grade Services (AGS) Result.
 * Results contain richer metadata than scores, including user info and timestamps.
 *
 * @see https://www.imsglobal.org/spec/lti-ags/v2p0/#result-service
 */
export const ResultSchema = z.object({
  /** Unique identifier for the result */
  id: z.string(),

  /** URL identifying the Line Item to which this result belongs */
  scoreOf: z.string(),

  userId: z.string(),

  /** The score given to the user */
  resultScore: z.number().optional(),

  /** Maximum possible score */
  resultMaximum: z.number().optional(),

  comment: z.string().optional(),

  timestamp: z.iso.datetime({ offset: true }).optional(),

  activityProgress: ActivityProgressSchema.optional(),

  gradingProgress: GradingProgressSchema.optional(),
});

/**
 * Schema for an array of results returned from the results service.
 */
export const ResultsSchema = z.array(ResultSchema);

export type Result = z.infer<typeof ResultSchema>;
export type Results = z.infer<typeof ResultsSchema>;
