import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';

import { CanvasClient, parseRetryAfter } from '@/lib/canvas/client';
import { CanvasApiError, TransientFetchError, type RequestLog } from '@/lib/canvas/types';

const API = 'https://canvas.test/api/v1';

function jsonResponse(
  body: unknown,
  init: { status?: number; statusText?: string; headers?: Record<string, string> } = {}
): Response {
  const status = init.status ?? 200;
  return {
    ok: status >= 200 && status < 300,
    status,
    statusText: init.statusText ?? 'OK',
    headers: new Headers(init.headers),
    json: async () => body,
  } as Response;
}

function pageOf(url: string): string | null {
  return new URL(url).searchParams.get('page');
}

describe('CanvasClient', () => {
  const originalFetch = global.fetch;
  const mockFetch = vi.fn();

  const createClient = (overrides: Partial<ConstructorParameters<typeof CanvasClient>[0]> = {}) =>
    new CanvasClient({
      baseUrl: 'https://canvas.test/',
      accessToken: 'test-canvas-token',
      retryBaseMs: 1000,
      ...overrides,
    });

  beforeEach(() => {
    global.fetch = mockFetch;
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    global.fetch = originalFetch;
    mockFetch.mockReset();
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  describe('testConnection', () => {
    it('returns the identity of the token owner', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ id: '42', name: 'Test Student' }));

      const result = await createClient().testConnection();

      expect(result).toEqual({ success: true, identity: { id: '42', name: 'Test Student' } });
      expect(mockFetch).toHaveBeenCalledWith(
        `${API}/users/self`,
        expect.objectContaining({
          method: 'GET',
          headers: {
            'Authorization': 'Bearer test-canvas-token',
            'Accept': 'application/json+canvas-string-ids',
          },
        })
      );
    });

    it('reports an invalid token without throwing', async () => {
      mockFetch.mockResolvedValueOnce(
        jsonResponse({ errors: [] }, { status: 401, statusText: 'Unauthorized' })
      );

      const result = await createClient().testConnection();

      expect(result).toEqual({
        success: false,
        error: 'Canvas API error on /users/self: 401 Unauthorized',
      });
    });
  });

  describe('getCourses', () => {
    it('requests active courses with their term', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([{ id: '1', name: 'Biology' }]));

      const courses = await createClient().getCourses();

      expect(courses).toEqual([{ id: '1', name: 'Biology' }]);
      const url = new URL(mockFetch.mock.calls[0][0]);
      expect(url.pathname).toBe('/api/v1/courses');
      expect(url.searchParams.get('enrollment_state')).toBe('active');
      expect(url.searchParams.getAll('include[]')).toEqual(['term', 'total_scores']);
      expect(url.searchParams.get('per_page')).toBe('100');
      expect(url.searchParams.has('updated_since')).toBe(false);
    });

    it('adds updated_since for incremental syncs', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([]));

      await createClient().getCourses({ since: new Date('2025-01-15T12:00:00Z') });

      const url = new URL(mockFetch.mock.calls[0][0]);
      expect(url.searchParams.get('updated_since')).toBe('2025-01-15T12:00:00.000Z');
    });
  });

  describe('getSubmissions', () => {
    it('uses the bulk endpoint for the current student', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse([{ assignment_id: '7' }]));

      await createClient().getSubmissions('101');

      const url = new URL(mockFetch.mock.calls[0][0]);
      expect(url.pathname).toBe('/api/v1/courses/101/students/submissions');
      expect(url.searchParams.getAll('student_ids[]')).toEqual(['self']);
    });

    it('wraps the single submission in a list', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({ assignment_id: '7', workflow_state: 'graded' }));

      const submissions = await createClient().getSubmissions('101', '7');

      expect(mockFetch.mock.calls[0][0]).toBe(`${API}/courses/101/assignments/7/submissions/self`);
      expect(submissions).toEqual([{ assignment_id: '7', workflow_state: 'graded' }]);
    });
  });

  describe('pagination', () => {
    it('follows next links when pages are bookmarks', async () => {
      const next = `${API}/courses/5/assignments?page=bookmark:abc&per_page=100`;
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse([{ id: 'a1' }], { headers: { Link: `<${next}>; rel="next"` } })
        )
        .mockResolvedValueOnce(jsonResponse([{ id: 'a2' }]));

      const assignments = await createClient().getAssignments('5');

      expect(assignments).toEqual([{ id: 'a1' }, { id: 'a2' }]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
      expect(mockFetch.mock.calls[1][0]).toBe(next);
    });

    it('fetches numbered pages concurrently and keeps page order', async () => {
      const link = (page: number) => `${API}/courses/5/assignments?page=${page}&per_page=100`;
      mockFetch.mockImplementation(async (url: string) => {
        switch (pageOf(url)) {
          case null:
            return jsonResponse([{ id: 'p1' }], {
              headers: { Link: `<${link(2)}>; rel="next", <${link(3)}>; rel="last"` },
            });
          case '2':
            // Resolves after page 3
            await new Promise((resolve) => setTimeout(resolve, 5));
            return jsonResponse([{ id: 'p2' }]);
          default:
            return jsonResponse([{ id: 'p3' }]);
        }
      });

      const assignments = await createClient().getAssignments('5');

      expect(assignments).toEqual([{ id: 'p1' }, { id: 'p2' }, { id: 'p3' }]);
      expect(mockFetch).toHaveBeenCalledTimes(3);
    });

    it('falls back to next links when the concurrent pass fails', async () => {
      const link = (page: number) => `${API}/courses/5/assignments?page=${page}&per_page=100`;
      let pageThreeCalls = 0;
      mockFetch.mockImplementation(async (url: string) => {
        switch (pageOf(url)) {
          case null:
            return jsonResponse([{ id: 'p1' }], {
              headers: { Link: `<${link(2)}>; rel="next", <${link(3)}>; rel="last"` },
            });
          case '2':
            return jsonResponse([{ id: 'p2' }], {
              headers: { Link: `<${link(3)}>; rel="next", <${link(3)}>; rel="last"` },
            });
          default:
            pageThreeCalls++;
            return pageThreeCalls === 1
              ? jsonResponse({}, { status: 400, statusText: 'Bad Request' })
              : jsonResponse([{ id: 'p3' }]);
        }
      });

      const assignments = await createClient().getAssignments('5');

      expect(assignments).toEqual([{ id: 'p1' }, { id: 'p2' }, { id: 'p3' }]);
      expect(console.warn).toHaveBeenCalledWith(
        '[Canvas] Concurrent pagination failed for /courses/5/assignments, fetching sequentially:',
        'Canvas API error on /courses/5/assignments: 400 Bad Request'
      );
    });
  });

  describe('retries', () => {
    it('retries 503 responses with exponential backoff', async () => {
      vi.useFakeTimers();
      const setTimeoutSpy = vi.spyOn(globalThis, 'setTimeout');
      mockFetch
        .mockResolvedValueOnce(jsonResponse({}, { status: 503, statusText: 'Service Unavailable' }))
        .mockResolvedValueOnce(jsonResponse({}, { status: 503, statusText: 'Service Unavailable' }))
        .mockResolvedValueOnce(jsonResponse([{ id: 'g1' }]));

      const promise = createClient().getAssignmentGroups('5');
      await vi.runAllTimersAsync();

      expect(await promise).toEqual([{ id: 'g1' }]);
      expect(mockFetch).toHaveBeenCalledTimes(3);
      expect(setTimeoutSpy.mock.calls.map(([, delay]) => delay)).toEqual([1000, 2000]);
    });

    it('waits for Retry-After on 429', async () => {
      vi.useFakeTimers();
      const setTimeoutSpy = vi.spyOn(globalThis, 'setTimeout');
      mockFetch
        .mockResolvedValueOnce(
          jsonResponse({}, { status: 429, statusText: 'Too Many Requests', headers: { 'Retry-After': '7' } })
        )
        .mockResolvedValueOnce(jsonResponse([]));

      const promise = createClient().getAssignmentGroups('5');
      await vi.runAllTimersAsync();

      expect(await promise).toEqual([]);
      expect(setTimeoutSpy.mock.calls.map(([, delay]) => delay)).toEqual([7000]);
    });

    it('raises TransientFetchError after five attempts', async () => {
      vi.useFakeTimers();
      const logs: RequestLog[] = [];
      mockFetch.mockImplementation(async () =>
        jsonResponse({}, { status: 502, statusText: 'Bad Gateway' })
      );

      const promise = createClient({ onRequest: (log) => logs.push(log) })
        .getAssignments('5')
        .catch((e) => e);
      await vi.runAllTimersAsync();
      const error = await promise;

      expect(error).toBeInstanceOf(TransientFetchError);
      expect(error.message).toBe(
        'Canvas request to /courses/5/assignments failed after 5 attempts: 502 Bad Gateway'
      );
      expect(error.status).toBe(502);
      expect(mockFetch).toHaveBeenCalledTimes(5);
      expect(logs.map((log) => log.attempt)).toEqual([0, 1, 2, 3, 4]);
      expect(logs.every((log) => log.status === 502 && log.endpoint === '/courses/5/assignments')).toBe(true);
    });

    it('retries network failures', async () => {
      vi.useFakeTimers();
      mockFetch
        .mockRejectedValueOnce(new TypeError('fetch failed'))
        .mockResolvedValueOnce(jsonResponse([{ id: 'g1' }]));

      const promise = createClient().getAssignmentGroups('5');
      await vi.runAllTimersAsync();

      expect(await promise).toEqual([{ id: 'g1' }]);
      expect(mockFetch).toHaveBeenCalledTimes(2);
    });

    it('does not retry other client errors', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, { status: 404, statusText: 'Not Found' }));

      const error = await createClient().getAssignments('5').catch((e) => e);

      expect(error).toBeInstanceOf(CanvasApiError);
      expect(error).not.toBeInstanceOf(TransientFetchError);
      expect(error.code).toBe('NOT_FOUND');
      expect(error.endpoint).toBe('/courses/5/assignments');
      expect(mockFetch).toHaveBeenCalledTimes(1);
    });

    it('marks 403 responses as unauthorized', async () => {
      mockFetch.mockResolvedValueOnce(jsonResponse({}, { status: 403, statusText: 'Forbidden' }));

      const error = await createClient().getCourses().catch((e) => e);

      expect(error.code).toBe('UNAUTHORIZED');
      expect(error.status).toBe(403);
    });
  });
});

describe('parseRetryAfter', () => {
  it('converts seconds to milliseconds', () => {
    expect(parseRetryAfter('3')).toBe(3000);
    expect(parseRetryAfter('1.5')).toBe(1500);
  });

  it('ignores missing and HTTP-date values', () => {
    expect(parseRetryAfter(null)).toBeNull();
    expect(parseRetryAfter('Wed, 21 Oct 2015 07:28:00 GMT')).toBeNull();
  });
});
