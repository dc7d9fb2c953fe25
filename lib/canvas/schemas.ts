/**
 * Zod schemas for the Canvas payloads the sync engine reads.
 *
 * The client requests `application/json+canvas-string-ids`, but ids are
 * accepted as numbers too and normalised to strings.
 */

import { z } from 'zod';

import type { CanvasRecord } from './types';

export const CanvasIdSchema = z
  .union([z.string().min(1), z.number().int()])
  .transform((id) => String(id));

const optionalText = z.string().nullish();

export const CanvasTermSchema = z.object({
  id: CanvasIdSchema.nullish(),
  name: optionalText,
  start_at: optionalText,
  end_at: optionalText,
});

export type CanvasTerm = z.infer<typeof CanvasTermSchema>;

export const CanvasCourseSchema = z.object({
  id: CanvasIdSchema,
  name: z.string().trim().min(1).catch('Unnamed Course'),
  course_code: optionalText,
  term: CanvasTermSchema.nullish(),
});

export type CanvasCourse = z.infer<typeof CanvasCourseSchema>;

export const CanvasAssignmentGroupSchema = z.object({
  id: CanvasIdSchema,
  name: z.string().trim().min(1).catch('Unnamed Category'),
  /** Percentage of the final grade, 0 - 100 */
  group_weight: z.number().nullish(),
});

export type CanvasAssignmentGroup = z.infer<typeof CanvasAssignmentGroupSchema>;

export const CanvasAssignmentSchema = z.object({
  id: CanvasIdSchema,
  name: z.string().trim().min(1).catch('Unnamed Assignment'),
  points_possible: z.number().nullish(),
  due_at: optionalText,
  assignment_group_id: CanvasIdSchema.nullish(),
});

export type CanvasAssignment = z.infer<typeof CanvasAssignmentSchema>;

export const CanvasSubmissionSchema = z.object({
  assignment_id: CanvasIdSchema.nullish(),
  /** unsubmitted | submitted | graded | pending_review */
  workflow_state: z.string().nullish(),
  score: z.number().nullish(),
  missing: z.boolean().nullish(),
});

export type CanvasSubmission = z.infer<typeof CanvasSubmissionSchema>;

/**
 * Describe a zod failure in one line, for error lists.
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'value'}: ${issue.message}`)
    .join('; ');
}

/**
 * Index bulk submissions by assignment id. Submissions without an
 * assignment id or that fail validation are dropped.
 */
export function indexSubmissions(
  records: CanvasRecord[]
): Map<string, CanvasSubmission> {
  const byAssignment = new Map<string, CanvasSubmission>();

  for (const record of records) {
    const parsed = CanvasSubmissionSchema.safeParse(record);
    if (parsed.success && parsed.data.assignment_id) {
      byAssignment.set(parsed.data.assignment_id, parsed.data);
    }
  }

  return byAssignment;
}
