import dayjs from 'dayjs';
import { Assignment } from '../types/index.js';

// Filters over a cached assignment set. None of these fetch.

export function dueWithin(assignments: Assignment[], days: number, now: Date = new Date()): Assignment[] {
  const horizon = dayjs(now).add(days, 'day');
  return sortByDueDate(
    assignments.filter(
      (a) =>
        a.dueAt !== null &&
        a.submissionState !== 'submitted' &&
        !dayjs(a.dueAt).isBefore(now) &&
        !dayjs(a.dueAt).isAfter(horizon)
    )
  );
}

export function overdue(assignments: Assignment[], now: Date = new Date()): Assignment[] {
  return sortByDueDate(
    assignments.filter(
      (a) => a.submissionState === 'overdue' || (a.submissionState === 'available' && a.dueAt !== null && a.dueAt < now)
    )
  );
}

export function unread(assignments: Assignment[]): Assignment[] {
  return assignments.filter((a) => !a.isRead);
}

export function forCourse(assignments: Assignment[], courseId: number): Assignment[] {
  return assignments.filter((a) => a.courseId === courseId);
}

export function search(assignments: Assignment[], query: string): Assignment[] {
  const needle = query.trim().toLowerCase();
  if (!needle) return [];

  return assignments.filter(
    (a) =>
      a.name.toLowerCase().includes(needle) ||
      (a.courseName?.toLowerCase().includes(needle) ?? false) ||
      (a.description?.toLowerCase().includes(needle) ?? false)
  );
}

/** Undated assignments sort last. */
export function sortByDueDate(assignments: Assignment[]): Assignment[] {
  return [...assignments].sort((a, b) => {
    if (a.dueAt === null) return b.dueAt === null ? 0 : 1;
    if (b.dueAt === null) return -1;
    return a.dueAt.getTime() - b.dueAt.getTime();
  });
}
