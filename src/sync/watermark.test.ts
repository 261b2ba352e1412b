import { describe, expect, it } from 'vitest';
import { ALL_SCOPE } from '../cache/scope.js';
import { makeAssignment, makeEvent } from '../testing/fakes.js';
import { SyncWatermark } from '../types/index.js';
import { reconcile } from './reconciler.js';
import { buildWatermark, detectChanges, restrictDelta, settingsFingerprint } from './watermark.js';

const settings = { enabledCourseIds: [], reminderLeadMinutes: 60 };
const syncedAt = new Date('2026-10-10T00:00:00.000Z');

function watermark(dueDates: Record<string, string | null>): SyncWatermark {
  return { scope: 'all', syncedAt, dueDates, settingsFingerprint: settingsFingerprint(settings) };
}

describe('settingsFingerprint', () => {
  it('ignores course order', () => {
    expect(settingsFingerprint({ enabledCourseIds: [3, 1], reminderLeadMinutes: 30 })).toBe('courses=1,3;lead=30');
    expect(settingsFingerprint({ enabledCourseIds: [1, 3], reminderLeadMinutes: 30 })).toBe('courses=1,3;lead=30');
  });
});

describe('detectChanges', () => {
  const due = new Date('2026-11-02T17:00:00.000Z');
  const before = new Date('2026-10-01T00:00:00.000Z');

  it('flags new, moved and remotely updated assignments', () => {
    const changes = detectChanges(
      [
        makeAssignment({ id: 1, dueAt: due, updatedAt: before }),
        makeAssignment({ id: 2, dueAt: new Date('2026-11-05T17:00:00.000Z'), updatedAt: before }),
        makeAssignment({ id: 3, dueAt: due, updatedAt: new Date('2026-10-11T00:00:00.000Z') }),
        makeAssignment({ id: 4, dueAt: due, updatedAt: before }),
      ],
      watermark({ '1': due.toISOString(), '2': due.toISOString(), '3': due.toISOString(), '5': null })
    );

    expect([...changes.affected].sort()).toEqual([2, 3, 4]);
    expect([...changes.vanished]).toEqual([5]);
  });
});

describe('restrictDelta', () => {
  it('keeps only the changed part of a delta', () => {
    const unchanged = makeAssignment({ id: 1 });
    const added = makeAssignment({ id: 2 });
    const orphan = makeEvent({ id: 'E9', assignmentId: 9, courseId: 101 });
    const delta = reconcile([unchanged, added], [orphan], { scope: ALL_SCOPE, settings });

    const restricted = restrictDelta(delta, { affected: new Set([2]), vanished: new Set([9]) });

    expect(restricted.toCreate.map((c) => c.assignment.id)).toEqual([2]);
    expect(restricted.toDelete.map((e) => e.id)).toEqual(['E9']);
  });

  it('keeps local-only events when pushing to the device', () => {
    const a1 = makeAssignment({ id: 1 });
    const delta = reconcile([a1], [makeEvent({ id: 'E1', assignmentId: 1, courseId: 101 })], {
      scope: ALL_SCOPE,
      settings,
    });
    const none = { affected: new Set<number>(), vanished: new Set<number>() };

    expect(restrictDelta(delta, none).toUpdate).toEqual([]);
    expect(restrictDelta(delta, none, true).toUpdate.map((u) => u.event.id)).toEqual(['E1']);
  });
});

describe('buildWatermark', () => {
  it('leaves out assignments that must be retried', () => {
    const due = new Date('2026-11-02T17:00:00.000Z');
    const next = buildWatermark(
      'all',
      syncedAt,
      [makeAssignment({ id: 1, dueAt: due }), makeAssignment({ id: 2, dueAt: null })],
      settings,
      watermark({ '7': '2026-10-20T00:00:00.000Z' }),
      new Set([1, 7])
    );

    expect(next.dueDates).toEqual({ '2': null, '7': '2026-10-20T00:00:00.000Z' });
    expect(next.settingsFingerprint).toBe('courses=;lead=60');
  });
});
