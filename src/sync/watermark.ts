import { Assignment, SyncWatermark } from '../types/index.js';
import { EligibilitySettings, SyncDelta } from './reconciler.js';

// Incremental change detection. The remote source has no modified-since query,
// so a run remembers each assignment's due timestamp and compares against it.

export interface ChangeSet {
  /** New assignments, moved due dates, or remote updates after the watermark. */
  affected: Set<number>;
  /** Assignments seen by the last run that are gone now. */
  vanished: Set<number>;
}

function dueKey(dueAt: Date | null): string | null {
  return dueAt === null ? null : dueAt.toISOString();
}

export function settingsFingerprint(settings: EligibilitySettings): string {
  const courses = [...settings.enabledCourseIds].sort((a, b) => a - b).join(',');
  return `courses=${courses};lead=${settings.reminderLeadMinutes}`;
}

export function detectChanges(assignments: Assignment[], watermark: SyncWatermark): ChangeSet {
  const affected = new Set<number>();
  const current = new Set<number>();

  for (const assignment of assignments) {
    current.add(assignment.id);
    const key = String(assignment.id);

    if (!(key in watermark.dueDates)) {
      affected.add(assignment.id);
    } else if (watermark.dueDates[key] !== dueKey(assignment.dueAt)) {
      affected.add(assignment.id);
    } else if (assignment.updatedAt !== null && assignment.updatedAt > watermark.syncedAt) {
      affected.add(assignment.id);
    }
  }

  const vanished = new Set<number>();
  for (const key of Object.keys(watermark.dueDates)) {
    const id = Number(key);
    if (!current.has(id)) {
      vanished.add(id);
    }
  }

  return { affected, vanished };
}

/**
 * Keeps the part of a delta that concerns changed assignments. With
 * `pushToDevice`, events still missing their device copy are kept as well.
 */
export function restrictDelta(delta: SyncDelta, changes: ChangeSet, pushToDevice = false): SyncDelta {
  return {
    toCreate: delta.toCreate.filter((item) => changes.affected.has(item.assignment.id)),
    toUpdate: delta.toUpdate.filter(
      (item) => changes.affected.has(item.assignment.id) || (pushToDevice && item.event.deviceEventId === null)
    ),
    toDelete: delta.toDelete.filter(
      (event) =>
        event.assignmentId !== null &&
        (changes.affected.has(event.assignmentId) || changes.vanished.has(event.assignmentId))
    ),
  };
}

/**
 * Snapshot for the next incremental pass. Assignments whose changes were not
 * applied are left out (or, when already gone, carried over) so that the next
 * pass sees them again.
 */
export function buildWatermark(
  scope: string,
  syncedAt: Date,
  assignments: Assignment[],
  settings: EligibilitySettings,
  previous: SyncWatermark | null,
  retryIds: ReadonlySet<number>
): SyncWatermark {
  const dueDates: Record<string, string | null> = {};
  const current = new Set<number>();

  for (const assignment of assignments) {
    current.add(assignment.id);
    if (!retryIds.has(assignment.id)) {
      dueDates[String(assignment.id)] = dueKey(assignment.dueAt);
    }
  }

  for (const id of retryIds) {
    if (!current.has(id)) {
      dueDates[String(id)] = previous?.dueDates[String(id)] ?? null;
    }
  }

  return {
    scope,
    syncedAt,
    dueDates,
    settingsFingerprint: settingsFingerprint(settings),
  };
}
