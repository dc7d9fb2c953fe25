export {
  CanvasClient,
  createCanvasClient,
  isCanvasRecord,
  parseRetryAfter,
  RETRYABLE_STATUSES,
  PER_PAGE,
} from './client';
export { parseLinkHeader, expandPageUrls } from './link-header';
export type { PageLinks } from './link-header';
export {
  CanvasIdSchema,
  CanvasTermSchema,
  CanvasCourseSchema,
  CanvasAssignmentGroupSchema,
  CanvasAssignmentSchema,
  CanvasSubmissionSchema,
  describeIssues,
  indexSubmissions,
} from './schemas';
export type {
  CanvasTerm,
  CanvasCourse,
  CanvasAssignmentGroup,
  CanvasAssignment,
  CanvasSubmission,
} from './schemas';
export { CanvasApiError, TransientFetchError } from './types';
export type {
  CanvasRecord,
  CanvasClientOptions,
  CanvasIdentity,
  ConnectionTestResult,
  GetCoursesOptions,
  RemoteCourseClient,
  RequestLog,
} from './types';
