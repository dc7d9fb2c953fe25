/**
 * Canvas LMS REST client.
 *
 * Read-only access to a user's courses, assignment groups, assignments and
 * submissions, with retry/backoff and concurrent pagination.
 *
 * @see https://canvas.instructure.com/doc/api/
 */

import pLimit, { type LimitFunction } from 'p-limit';

import { expandPageUrls, parseLinkHeader } from './link-header';
import {
  CanvasApiError,
  TransientFetchError,
  type CanvasClientOptions,
  type CanvasRecord,
  type ConnectionTestResult,
  type GetCoursesOptions,
  type RemoteCourseClient,
  type RequestLog,
} from './types';

export const DEFAULT_MAX_ATTEMPTS = 5;
export const DEFAULT_PAGE_CONCURRENCY = 5;
export const DEFAULT_RETRY_BASE_MS = 1000;
export const PER_PAGE = 100;

/**
 * Status codes retried with exponential backoff.
 */
export const RETRYABLE_STATUSES = new Set([429, 500, 502, 503, 504]);

type QueryParams = Record<string, string | string[] | undefined>;

interface Page {
  items: CanvasRecord[];
  next?: string;
}

export function isCanvasRecord(value: unknown): value is CanvasRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRecords(data: unknown): CanvasRecord[] {
  if (Array.isArray(data)) {
    return data.filter(isCanvasRecord);
  }
  return isCanvasRecord(data) ? [data] : [];
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a numeric Retry-After header into milliseconds.
 * HTTP-date values are ignored.
 */
export function parseRetryAfter(header: string | null): number | null {
  if (!header || !/^\d+(\.\d+)?$/.test(header.trim())) {
    return null;
  }
  return Number(header.trim()) * 1000;
}

export class CanvasClient implements RemoteCourseClient {
  private readonly apiBase: string;
  private readonly accessToken: string;
  private readonly maxAttempts: number;
  private readonly retryBaseMs: number;
  private readonly pageLimit: LimitFunction;
  private readonly onRequest?: (log: RequestLog) => void;

  constructor(options: CanvasClientOptions) {
    this.apiBase = `${options.baseUrl.replace(/\/+$/, '')}/api/v1`;
    this.accessToken = options.accessToken;
    this.maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
    this.retryBaseMs = options.retryBaseMs ?? DEFAULT_RETRY_BASE_MS;
    this.pageLimit = pLimit(options.pageConcurrency ?? DEFAULT_PAGE_CONCURRENCY);
    this.onRequest = options.onRequest;
  }

  /**
   * Check the token by fetching the current user.
   */
  async testConnection(): Promise<ConnectionTestResult> {
    try {
      const response = await this.request(this.buildUrl('/users/self'), '/users/self');
      const user: unknown = await response.json();
      if (!isCanvasRecord(user) || user.id === undefined || user.id === null) {
        return { success: false, error: 'Canvas returned an unexpected user payload' };
      }

      const name = typeof user.name === 'string' ? user.name : 'Unknown';
      console.log(`[Canvas] Connected as ${name}`);
      return { success: true, identity: { id: String(user.id), name } };
    } catch (error) {
      console.error('[Canvas] Connection test failed:', errorMessage(error));
      return { success: false, error: errorMessage(error) };
    }
  }

  async getCourses(options: GetCoursesOptions = {}): Promise<CanvasRecord[]> {
    const { since, enrollmentState = 'active' } = options;

    const courses = await this.getPaginated('/courses', {
      enrollment_state: enrollmentState,
      'include[]': ['term', 'total_scores'],
      updated_since: since?.toISOString(),
    });

    console.log(
      `[Canvas] Fetched ${courses.length} courses${since ? ` updated since ${since.toISOString()}` : ''}`
    );
    return courses;
  }

  async getAssignmentGroups(courseId: string): Promise<CanvasRecord[]> {
    return this.getPaginated(
      `/courses/${encodeURIComponent(courseId)}/assignment_groups`,
      {}
    );
  }

  async getAssignments(courseId: string): Promise<CanvasRecord[]> {
    return this.getPaginated(
      `/courses/${encodeURIComponent(courseId)}/assignments`,
      {}
    );
  }

  async getSubmissions(
    courseId: string,
    assignmentId?: string
  ): Promise<CanvasRecord[]> {
    const course = encodeURIComponent(courseId);

    if (assignmentId) {
      const endpoint = `/courses/${course}/assignments/${encodeURIComponent(assignmentId)}/submissions/self`;
      const response = await this.request(this.buildUrl(endpoint), endpoint);
      return toRecords(await response.json());
    }

    return this.getPaginated(`/courses/${course}/students/submissions`, {
      'student_ids[]': ['self'],
    });
  }

  private buildUrl(endpoint: string, params: QueryParams = {}): string {
    const url = new URL(`${this.apiBase}${endpoint}`);
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) {
        continue;
      }
      for (const item of Array.isArray(value) ? value : [value]) {
        url.searchParams.append(key, item);
      }
    }
    return url.toString();
  }

  /**
   * Fetch every page of a list endpoint.
   *
   * When the first page links to a numbered last page, the remaining pages
   * are fetched concurrently and merged in page order. Bookmark pagination,
   * or any failure in the concurrent pass, falls back to following `next`
   * links one at a time.
   */
  private async getPaginated(
    endpoint: string,
    params: QueryParams
  ): Promise<CanvasRecord[]> {
    const firstUrl = this.buildUrl(endpoint, {
      ...params,
      per_page: String(PER_PAGE),
    });
    const response = await this.request(firstUrl, endpoint);
    const items = toRecords(await response.json());
    const links = parseLinkHeader(response.headers.get('Link'));

    if (!links.next) {
      return items;
    }

    const pageUrls = links.last ? expandPageUrls(links.next, links.last) : null;
    if (pageUrls && pageUrls.length > 1) {
      try {
        const pages = await Promise.all(
          pageUrls.map((url) => this.pageLimit(() => this.fetchPage(url, endpoint)))
        );
        return items.concat(...pages.map((page) => page.items));
      } catch (error) {
        console.warn(
          `[Canvas] Concurrent pagination failed for ${endpoint}, fetching sequentially:`,
          errorMessage(error)
        );
      }
    }

    return items.concat(await this.followNextLinks(links.next, endpoint));
  }

  private async followNextLinks(
    startUrl: string,
    endpoint: string
  ): Promise<CanvasRecord[]> {
    const items: CanvasRecord[] = [];
    const visited = new Set<string>();
    let url: string | undefined = startUrl;

    while (url && !visited.has(url)) {
      visited.add(url);
      const page: Page = await this.fetchPage(url, endpoint);
      items.push(...page.items);
      url = page.next;
    }

    return items;
  }

  private async fetchPage(url: string, endpoint: string): Promise<Page> {
    const response = await this.request(url, endpoint);
    return {
      items: toRecords(await response.json()),
      next: parseLinkHeader(response.headers.get('Link')).next,
    };
  }

  /**
   * GET with retries.
   *
   * @throws TransientFetchError when retryable failures exhaust the budget
   * @throws CanvasApiError for any other non-2xx response
   */
  private async request(url: string, endpoint: string): Promise<Response> {
    for (let attempt = 0; attempt < this.maxAttempts; attempt++) {
      const isLastAttempt = attempt === this.maxAttempts - 1;
      const startedAt = Date.now();
      let response: Response;

      try {
        response = await fetch(url, {
          method: 'GET',
          headers: {
            'Authorization': `Bearer ${this.accessToken}`,
            'Accept': 'application/json+canvas-string-ids',
          },
        });
      } catch (error) {
        this.report({
          method: 'GET',
          endpoint,
          status: null,
          durationMs: Date.now() - startedAt,
          attempt,
          error: errorMessage(error),
        });

        if (isLastAttempt) {
          throw new TransientFetchError(
            `Canvas request to ${endpoint} failed after ${this.maxAttempts} attempts: ${errorMessage(error)}`,
            undefined,
            endpoint
          );
        }

        const delay = this.retryBaseMs * Math.pow(2, attempt);
        console.warn(
          `[Canvas] GET ${endpoint} attempt ${attempt + 1} failed, retrying in ${delay}ms...`
        );
        await sleep(delay);
        continue;
      }

      this.report({
        method: 'GET',
        endpoint,
        status: response.status,
        durationMs: Date.now() - startedAt,
        attempt,
        error: response.ok ? undefined : response.statusText,
      });

      if (response.ok) {
        return response;
      }

      if (!RETRYABLE_STATUSES.has(response.status)) {
        throw new CanvasApiError(
          `Canvas API error on ${endpoint}: ${response.status} ${response.statusText}`,
          response.status === 401 || response.status === 403
            ? 'UNAUTHORIZED'
            : response.status === 404
              ? 'NOT_FOUND'
              : 'REQUEST_FAILED',
          response.status,
          endpoint
        );
      }

      if (isLastAttempt) {
        throw new TransientFetchError(
          `Canvas request to ${endpoint} failed after ${this.maxAttempts} attempts: ${response.status} ${response.statusText}`,
          response.status,
          endpoint
        );
      }

      // Retry-After takes precedence over exponential backoff
      const delay =
        parseRetryAfter(response.headers.get('Retry-After')) ??
        this.retryBaseMs * Math.pow(2, attempt);
      console.warn(
        `[Canvas] GET ${endpoint} returned ${response.status}, retrying in ${delay}ms (attempt ${attempt + 1}/${this.maxAttempts})`
      );
      await sleep(delay);
    }

    // Unreachable while maxAttempts >= 1
    throw new TransientFetchError(
      `Canvas request to ${endpoint} was not attempted`,
      undefined,
      endpoint
    );
  }

  private report(log: RequestLog): void {
    console.debug(
      `[Canvas] ${log.method} ${log.endpoint} ${log.status ?? 'ERR'} (${log.durationMs}ms, attempt ${log.attempt + 1})`
    );

    if (!this.onRequest) {
      return;
    }
    try {
      this.onRequest(log);
    } catch (error) {
      console.warn('[Canvas] onRequest hook failed:', errorMessage(error));
    }
  }
}

/**
 * Build a client from stored account settings.
 */
export function createCanvasClient(options: CanvasClientOptions): CanvasClient {
  return new CanvasClient(options);
}
