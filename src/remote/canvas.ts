import { z } from 'zod';
import { Assignment, RemoteSource, Scope, SubmissionState } from '../types/index.js';
import { config } from '../utils/config.js';
import { FetchFailureError, safeErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface CanvasSourceOptions {
  baseUrl?: string;
  accessToken?: string;
  pageSize?: number;
  fetchFn?: FetchFn;
  now?: () => Date;
}

const courseSchema = z.object({
  id: z.number().int(),
  name: z.string().optional(),
  course_code: z.string().optional(),
});

const assignmentSchema = z.object({
  id: z.number().int(),
  course_id: z.number().int(),
  name: z.string(),
  description: z.string().nullish(),
  due_at: z.string().nullish(),
  updated_at: z.string().nullish(),
  html_url: z.string().nullish(),
  points_possible: z.number().nullish(),
  submission: z
    .object({
      workflow_state: z.string().nullish(),
      missing: z.boolean().nullish(),
    })
    .nullish(),
});

type CanvasCourse = z.infer<typeof courseSchema>;
type CanvasAssignment = z.infer<typeof assignmentSchema>;

function parseDate(value: string | null | undefined): Date | null {
  if (!value) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

/** URL of the `rel="next"` entry of a Link header, if any. */
export function nextPageUrl(linkHeader: string | null): string | null {
  if (!linkHeader) return null;

  for (const part of linkHeader.split(',')) {
    const match = part.match(/<([^>]+)>\s*;\s*rel="?next"?/);
    if (match) return match[1];
  }
  return null;
}

export function submissionState(assignment: CanvasAssignment, now: Date): SubmissionState {
  const state = assignment.submission?.workflow_state;
  if (state === 'submitted' || state === 'graded') {
    return 'submitted';
  }

  const dueAt = parseDate(assignment.due_at);
  if (assignment.submission?.missing || (dueAt !== null && dueAt < now)) {
    return 'overdue';
  }
  return 'available';
}

export function toAssignment(raw: CanvasAssignment, courseName: string | undefined, now: Date): Assignment {
  return {
    id: raw.id,
    courseId: raw.course_id,
    courseName,
    name: raw.name,
    description: raw.description ?? undefined,
    dueAt: parseDate(raw.due_at),
    updatedAt: parseDate(raw.updated_at),
    submissionState: submissionState(raw, now),
    isRead: false,
    htmlUrl: raw.html_url ?? undefined,
    pointsPossible: raw.points_possible ?? null,
  };
}

/** Reads the student's courses and assignments from the Canvas REST API. */
export class CanvasSource implements RemoteSource {
  private readonly baseUrl: string;
  private readonly accessToken: string;
  private readonly pageSize: number;
  private readonly fetchFn: FetchFn;
  private readonly now: () => Date;

  constructor(options: CanvasSourceOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.canvas.baseUrl).replace(/\/$/, '');
    this.accessToken = options.accessToken ?? config.canvas.accessToken;
    this.pageSize = options.pageSize ?? config.canvas.pageSize;
    this.fetchFn = options.fetchFn ?? fetch;
    this.now = options.now ?? (() => new Date());
  }

  async fetchAssignments(scope: Scope, signal: AbortSignal): Promise<Assignment[]> {
    if (!this.accessToken) {
      throw new FetchFailureError('auth', 'No Canvas access token configured. Set CANVAS_ACCESS_TOKEN.');
    }

    const courses = await this.getCourses(signal);
    const targets: CanvasCourse[] =
      scope.kind === 'all'
        ? courses
        : [courses.find((c) => c.id === scope.courseId) ?? { id: scope.courseId }];

    const now = this.now();
    const assignments: Assignment[] = [];
    for (const course of targets) {
      const raw = await this.getAll(
        `/api/v1/courses/${course.id}/assignments?include[]=submission`,
        assignmentSchema,
        signal
      );
      const courseName = course.name ?? course.course_code;
      assignments.push(...raw.map((a) => toAssignment(a, courseName, now)));
      logger.debug(`Fetched ${raw.length} assignments for course ${course.id}`);
    }

    logger.info(`Fetched ${assignments.length} assignments from ${targets.length} courses`);
    return assignments;
  }

  async getCourses(signal: AbortSignal): Promise<CanvasCourse[]> {
    return this.getAll('/api/v1/courses?enrollment_state=active', courseSchema, signal);
  }

  private async getAll<T>(pathAndQuery: string, schema: z.ZodType<T>, signal: AbortSignal): Promise<T[]> {
    const separator = pathAndQuery.includes('?') ? '&' : '?';
    let url: string | null = `${this.baseUrl}${pathAndQuery}${separator}per_page=${this.pageSize}`;
    const items: T[] = [];

    while (url) {
      const response = await this.request(url, signal);

      let body: unknown;
      try {
        body = await response.json();
      } catch (error) {
        throw new FetchFailureError('server', `Invalid JSON from Canvas: ${safeErrorMessage(error)}`);
      }

      const parsed = z.array(schema).safeParse(body);
      if (!parsed.success) {
        throw new FetchFailureError('server', `Unexpected Canvas payload: ${parsed.error.issues[0]?.message}`);
      }

      items.push(...parsed.data);
      url = nextPageUrl(response.headers.get('link'));
    }

    return items;
  }

  private async request(url: string, signal: AbortSignal): Promise<Response> {
    let response: Response;
    try {
      response = await this.fetchFn(url, {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          Accept: 'application/json',
        },
        signal,
      });
    } catch (error) {
      throw new FetchFailureError('network', `Canvas request failed: ${safeErrorMessage(error)}`);
    }

    if (response.status === 401 || response.status === 403) {
      throw new FetchFailureError('auth', `Canvas rejected the access token (HTTP ${response.status})`);
    }
    if (response.status >= 500) {
      throw new FetchFailureError('server', `Canvas server error (HTTP ${response.status})`);
    }
    if (!response.ok) {
      throw new FetchFailureError('network', `Canvas request failed (HTTP ${response.status})`);
    }

    return response;
  }
}
