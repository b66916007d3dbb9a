import * as z from 'zod';

/**
 * Student's progress on the activity itself.
 * - Initialized: Student has started but not made progress
 * - Started: Student has begun working
 * - InProgress: Student is actively working
 * - Submitted: Student has submitted work for review
 * - Completed: Student has finished the activity
 */
export const ActivityProgressSchema = z.enum([
  'Initialized',
  'Started',
  'InProgress',
  'Submitted',
  'Completed',
]);

/**
 * Instructor's progress on grading the submission.
 * - NotReady: Submission not ready for grading
 * - Failed: Grading failed due to error
 * - Pending: Awaiting automatic grading
 * - PendingManual: Awaiting manual grading
 * - FullyGraded: Grading is complete
 */
export const GradingProgressSchema = z.enum([
  'NotReady',
  'Failed',
  'Pending',
  'PendingManual',
  'FullyGraded',
]);

/**
 * Schema for submitting grades via LTI Assignment and Grade Services (AGS).
 *
 * @see https://www.imsglobal.org/spec/lti-ags/v2p0/#score-publish-service
 */
export const ScoreSubmissionSchema = z.object({
  /** Points awarded to the student (must be non-negative) */
  scoreGiven: z.number().min(0),

  /** Maximum possible points for this assignment (must be non-negative) */
  scoreMaximum: z.number().min(0),

  /** Optional feedback comment to display to the student */
  comment: z.string().optional(),

  /** User ID to submit score for (defaults to the launching user) */
  userId: z.string().min(1).optional(),

  /** Timestamp when score was generated (defaults to current time) */
  timestamp: z.iso.datetime({ offset: true }).optional(),

  activityProgress: ActivityProgressSchema.default('Completed'),

  gradingProgress: GradingProgressSchema.default('FullyGraded'),
});

/** What callers pass in; progress fields fall back to their defaults. */
export type ScoreSubmissionInput = z.input<typeof ScoreSubmissionSchema>;
export type ScoreSubmission = z.infer<typeof ScoreSubmissionSchema>;
export type ActivityProgress = z.infer<typeof ActivityProgressSchema>;
export type GradingProgress = z.infer<typeof GradingProgressSchema>;
