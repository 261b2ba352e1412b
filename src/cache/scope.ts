import { Scope } from '../types/index.js';

export const ALL_SCOPE: Scope = { kind: 'all' };

export function courseScope(courseId: number): Scope {
  return { kind: 'course', courseId };
}

export function scopeKey(scope: Scope): string {
  return scope.kind === 'all' ? 'all' : `course:${scope.courseId}`;
}

/** Accepts `all`, `course:<id>` or a bare course id. */
export function parseScope(value: string | undefined): Scope {
  if (value === undefined || value === '' || value === 'all') {
    return ALL_SCOPE;
  }

  const match = value.match(/^(?:course:)?(\d+)$/);
  if (!match) {
    throw new Error(`Invalid scope "${value}". Use "all" or a course id.`);
  }

  return courseScope(Number(match[1]));
}

export function isCourseInScope(courseId: number | null, scope: Scope): boolean {
  if (scope.kind === 'all') return true;
  return courseId === scope.courseId;
}
