/**
 * Types for the Canvas LMS REST client.
 */

/**
 * A JSON object as returned by the Canvas API, before schema validation.
 */
export type CanvasRecord = Record<string, unknown>;

/**
 * Error thrown for a non-retryable Canvas API failure.
 */
export class CanvasApiError extends Error {
  constructor(
    message: string,
    public readonly code?: string,
    public readonly status?: number,
    public readonly endpoint?: string
  ) {
    super(message);
    this.name = 'CanvasApiError';
  }
}

/**
 * Error thrown when a retryable failure (429, 5xx, network) outlasts the
 * retry budget.
 */
export class TransientFetchError extends CanvasApiError {
  constructor(message: string, status?: number, endpoint?: string) {
    super(message, 'TRANSIENT_FAILURE', status, endpoint);
    this.name = 'TransientFetchError';
  }
}

/**
 * One HTTP attempt, reported to the onRequest hook.
 */
export interface RequestLog {
  method: string;
  /** Path relative to /api/v1 */
  endpoint: string;
  /** HTTP status, or null when the request never got a response */
  status: number | null;
  durationMs: number;
  /** Zero-based attempt number */
  attempt: number;
  error?: string;
}

export interface CanvasIdentity {
  id: string;
  name: string;
}

export type ConnectionTestResult =
  | { success: true; identity: CanvasIdentity }
  | { success: false; error: string };

export interface GetCoursesOptions {
  /** Only courses updated after this time */
  since?: Date;
  /** Canvas enrollment_state filter (default: "active") */
  enrollmentState?: string;
}

/**
 * Read access to one user's Canvas data.
 */
export interface RemoteCourseClient {
  testConnection(): Promise<ConnectionTestResult>;
  getCourses(options?: GetCoursesOptions): Promise<CanvasRecord[]>;
  getAssignmentGroups(courseId: string): Promise<CanvasRecord[]>;
  getAssignments(courseId: string): Promise<CanvasRecord[]>;
  /**
   * Bulk submissions for the course when assignmentId is omitted,
   * otherwise the user's submission for that one assignment.
   */
  getSubmissions(courseId: string, assignmentId?: string): Promise<CanvasRecord[]>;
}

export interface CanvasClientOptions {
  /** Canvas instance URL, e.g. https://canvas.example.edu */
  baseUrl: string;
  accessToken: string;
  /** Total attempts per request, including the first (default: 5) */
  maxAttempts?: number;
  /** Concurrent page fetches per list request (default: 5) */
  pageConcurrency?: number;
  /** Backoff base in milliseconds (default: 1000) */
  retryBaseMs?: number;
  onRequest?: (log: RequestLog) => void;
}
