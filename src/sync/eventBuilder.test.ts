import { describe, expect, it } from 'vitest';
import { makeAssignment, makeEvent } from '../testing/fakes.js';
import { applyDraft, buildEventDraft, eventTitle, matchesDraft } from './eventBuilder.js';

describe('eventBuilder', () => {
  it('titles events with the course name, or the course id without one', () => {
    expect(eventTitle(makeAssignment({ id: 1, name: 'Lab 3' }))).toBe('Biology: Lab 3');
    expect(eventTitle(makeAssignment({ id: 1, name: 'Lab 3', courseName: undefined }))).toBe('Course 101: Lab 3');
  });

  it('opens the event the lead time before the deadline', () => {
    const draft = buildEventDraft(makeAssignment({ id: 7, dueAt: new Date('2026-11-02T17:00:00.000Z') }), 90);

    expect(draft?.startTime.toISOString()).toBe('2026-11-02T15:30:00.000Z');
    expect(draft?.endTime.toISOString()).toBe('2026-11-02T17:00:00.000Z');
    expect(draft?.assignmentId).toBe(7);
    expect(draft?.courseId).toBe(101);
  });

  it('returns null for undated assignments', () => {
    expect(buildEventDraft(makeAssignment({ id: 1, dueAt: null }), 60)).toBeNull();
  });

  it('cleans HTML out of the description and lists the ids', () => {
    const draft = buildEventDraft(
      makeAssignment({
        id: 9,
        name: 'Essay',
        description: '<p>Write&nbsp;500 words</p><br/>on <b>cells</b> &amp; tissues',
        pointsPossible: null,
        htmlUrl: 'https://canvas.example.edu/courses/101/assignments/9',
      }),
      60
    );
    const lines = draft?.description.split('\n') ?? [];

    expect(lines[0]).toBe('Essay');
    expect(lines[2]).toBe('Write 500 words');
    expect(lines[3]).toBe('on cells & tissues');
    expect(lines).toContain('https://canvas.example.edu/courses/101/assignments/9');
    expect(lines.some((line) => line.startsWith('Points:'))).toBe(false);
    expect(lines.slice(-2)).toEqual(['Course ID: 101', 'Assignment ID: 9']);
  });

  it('matches on title and times only', () => {
    const draft = buildEventDraft(makeAssignment({ id: 1 }), 60);
    if (!draft) throw new Error('expected a draft');

    const event = applyDraft(makeEvent({ id: 'e1', description: 'stale' }), draft);
    expect(matchesDraft({ ...event, description: 'edited' }, draft)).toBe(true);
    expect(matchesDraft({ ...event, title: 'Renamed' }, draft)).toBe(false);
    expect(matchesDraft({ ...event, endTime: new Date('2026-11-03T17:00:00.000Z') }, draft)).toBe(false);
  });
});
