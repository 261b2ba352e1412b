import dayjs from 'dayjs';
import { Assignment, CalendarEvent, EventDraft } from '../types/index.js';

export function eventTitle(assignment: Assignment): string {
  const course = assignment.courseName ?? `Course ${assignment.courseId}`;
  return `${course}: ${assignment.name}`;
}

function stripHtml(html: string): string {
  return html
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&amp;/g, '&')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function eventDescription(assignment: Assignment, dueAt: Date): string {
  const lines: string[] = [assignment.name];

  if (assignment.description) {
    const clean = stripHtml(assignment.description);
    if (clean) {
      lines.push('', clean);
    }
  }

  lines.push('', `Due: ${dayjs(dueAt).format('MMM D, YYYY h:mm A')}`);

  if (assignment.pointsPossible !== null) {
    lines.push(`Points: ${assignment.pointsPossible}`);
  }
  if (assignment.htmlUrl) {
    lines.push(assignment.htmlUrl);
  }

  lines.push('', `Course ID: ${assignment.courseId}`, `Assignment ID: ${assignment.id}`);
  return lines.join('\n');
}

/**
 * Derives the calendar entry for an assignment: a block that opens the lead
 * time before the deadline and closes at it. Returns null for undated work.
 */
export function buildEventDraft(assignment: Assignment, reminderLeadMinutes: number): EventDraft | null {
  if (assignment.dueAt === null) return null;

  return {
    assignmentId: assignment.id,
    courseId: assignment.courseId,
    title: eventTitle(assignment),
    description: eventDescription(assignment, assignment.dueAt),
    startTime: dayjs(assignment.dueAt).subtract(reminderLeadMinutes, 'minute').toDate(),
    endTime: new Date(assignment.dueAt.getTime()),
  };
}

/** Compares only the fields that follow from the assignment's due time and title. */
export function matchesDraft(event: CalendarEvent, draft: EventDraft): boolean {
  return (
    event.title === draft.title &&
    event.startTime.getTime() === draft.startTime.getTime() &&
    event.endTime.getTime() === draft.endTime.getTime()
  );
}

export function applyDraft(event: CalendarEvent, draft: EventDraft): CalendarEvent {
  return {
    ...event,
    assignmentId: draft.assignmentId,
    courseId: draft.courseId,
    title: draft.title,
    description: draft.description,
    startTime: draft.startTime,
    endTime: draft.endTime,
  };
}
