import type { CanvasSubmission } from '@/lib/canvas/schemas';

/**
 * Canvas workflow states that count as handed in.
 */
export const SUBMITTED_WORKFLOW_STATES: ReadonlySet<string> = new Set([
  'submitted',
  'graded',
  'pending_review',
]);

export interface SubmissionState {
  isSubmitted: boolean;
  completed: boolean;
  isMissing: boolean;
  /** undefined leaves the stored score untouched */
  score?: number;
}

/**
 * Derive local status flags from a Canvas submission.
 *
 * Priority rule: a missing submission is never submitted or completed;
 * otherwise a submitted one is always completed. Without a submission every
 * flag is false and the score is left alone.
 */
export function deriveSubmissionState(
  submission: CanvasSubmission | null | undefined
): SubmissionState {
  if (!submission) {
    return { isSubmitted: false, completed: false, isMissing: false };
  }

  const isMissing = submission.missing === true;
  const handedIn = SUBMITTED_WORKFLOW_STATES.has(submission.workflow_state ?? '');
  const isSubmitted = handedIn && !isMissing;

  const state: SubmissionState = {
    isSubmitted,
    completed: isSubmitted,
    isMissing,
  };

  if (submission.score !== null && submission.score !== undefined) {
    state.score = submission.score;
  }

  return state;
}
