import { Assignment, CalendarEvent, EventDraft, Scope, SyncSettings } from '../types/index.js';
import { isCourseInScope } from '../cache/scope.js';
import { buildEventDraft, matchesDraft } from './eventBuilder.js';

export type EligibilitySettings = Pick<SyncSettings, 'enabledCourseIds' | 'reminderLeadMinutes'>;

export interface ReconcileOptions {
  scope: Scope;
  settings: EligibilitySettings;
  /** When set, events that were never written to the device are re-emitted as updates. */
  pushToDevice?: boolean;
}

export interface PendingCreate {
  assignment: Assignment;
  draft: EventDraft;
}

export interface PendingUpdate {
  event: CalendarEvent;
  assignment: Assignment;
  draft: EventDraft;
}

export interface SyncDelta {
  toCreate: PendingCreate[];
  toUpdate: PendingUpdate[];
  toDelete: CalendarEvent[];
}

export function isCourseEnabled(courseId: number, settings: EligibilitySettings): boolean {
  return settings.enabledCourseIds.length === 0 || settings.enabledCourseIds.includes(courseId);
}

export function isEligible(assignment: Assignment, scope: Scope, settings: EligibilitySettings): boolean {
  return (
    assignment.dueAt !== null &&
    isCourseInScope(assignment.courseId, scope) &&
    isCourseEnabled(assignment.courseId, settings)
  );
}

/**
 * Whether a sync of `scope` owns the event. Events of other courses are out of
 * reach of a course-scoped pass and must not be mistaken for orphans.
 */
export function isEventInScope(event: CalendarEvent, scope: Scope, fetchedIds: ReadonlySet<number>): boolean {
  if (event.assignmentId === null) return false;
  if (scope.kind === 'all') return true;
  if (event.courseId !== null) return event.courseId === scope.courseId;
  return fetchedIds.has(event.assignmentId);
}

export function reconcile(
  assignments: Assignment[],
  existingEvents: CalendarEvent[],
  options: ReconcileOptions
): SyncDelta {
  const { scope, settings, pushToDevice = false } = options;

  const fetchedIds = new Set<number>();
  const eligible = new Map<number, Assignment>();
  for (const assignment of assignments) {
    if (!isCourseInScope(assignment.courseId, scope)) continue;
    fetchedIds.add(assignment.id);
    if (isEligible(assignment, scope, settings)) {
      eligible.set(assignment.id, assignment);
    }
  }

  const toDelete: CalendarEvent[] = [];
  const eventsByAssignment = new Map<number, CalendarEvent>();
  for (const event of existingEvents) {
    if (event.assignmentId === null || !isEventInScope(event, scope, fetchedIds)) continue;

    const mapped = eventsByAssignment.get(event.assignmentId);
    if (!mapped) {
      eventsByAssignment.set(event.assignmentId, event);
    } else if (mapped.deviceEventId === null && event.deviceEventId !== null) {
      // Keep the copy that exists on the device
      eventsByAssignment.set(event.assignmentId, event);
      toDelete.push(mapped);
    } else {
      toDelete.push(event);
    }
  }

  const toCreate: PendingCreate[] = [];
  const toUpdate: PendingUpdate[] = [];
  for (const [assignmentId, assignment] of eligible) {
    const draft = buildEventDraft(assignment, settings.reminderLeadMinutes);
    if (!draft) continue;

    const event = eventsByAssignment.get(assignmentId);
    if (!event) {
      toCreate.push({ assignment, draft });
    } else if (!matchesDraft(event, draft) || (pushToDevice && event.deviceEventId === null)) {
      toUpdate.push({ event, assignment, draft });
    }
  }

  for (const [assignmentId, event] of eventsByAssignment) {
    if (!eligible.has(assignmentId)) {
      toDelete.push(event);
    }
  }

  return { toCreate, toUpdate, toDelete };
}

export function isEmptyDelta(delta: SyncDelta): boolean {
  return delta.toCreate.length === 0 && delta.toUpdate.length === 0 && delta.toDelete.length === 0;
}
