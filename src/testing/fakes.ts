import {
  Assignment,
  CalendarEvent,
  CalendarEventStore,
  DeviceCalendarAdapter,
  EventDraft,
  PermissionStatus,
  RemoteSource,
  Scope,
  SettingsStore,
  SyncHistoryStore,
  SyncLogEntry,
  SyncResult,
  SyncSettings,
  SyncWatermark,
  WatermarkStore,
} from '../types/index.js';
import { isCourseInScope } from '../cache/scope.js';
import { DEFAULT_SETTINGS } from '../permissions/settings.js';
import { applyDraft, buildEventDraft } from '../sync/eventBuilder.js';
import { DeviceWriteError } from '../utils/errors.js';

// In-process stand-ins for the engine's collaborators, shared by the tests.

export function makeAssignment(overrides: Partial<Assignment> & { id: number }): Assignment {
  return {
    courseId: 101,
    courseName: 'Biology',
    name: `Assignment ${overrides.id}`,
    dueAt: new Date('2026-11-02T17:00:00.000Z'),
    updatedAt: new Date('2026-10-01T09:00:00.000Z'),
    submissionState: 'available',
    isRead: false,
    pointsPossible: 10,
    ...overrides,
  };
}

export function makeEvent(overrides: Partial<CalendarEvent> & { id: string }): CalendarEvent {
  return {
    assignmentId: null,
    courseId: null,
    title: 'Event',
    description: '',
    startTime: new Date('2026-11-02T16:00:00.000Z'),
    endTime: new Date('2026-11-02T17:00:00.000Z'),
    calendarId: null,
    deviceEventId: null,
    ...overrides,
  };
}

/** A ledger event whose derived fields match the assignment. */
export function eventFor(
  assignment: Assignment,
  id: string,
  overrides: Partial<CalendarEvent> = {},
  reminderLeadMinutes = 60
): CalendarEvent {
  const draft = buildEventDraft(assignment, reminderLeadMinutes);
  if (!draft) throw new Error(`Assignment ${assignment.id} has no due date`);
  return { ...applyDraft(makeEvent({ id }), draft), ...overrides };
}

export function enabledSettings(overrides: Partial<SyncSettings> = {}): SyncSettings {
  return { ...DEFAULT_SETTINGS, enabled: true, ...overrides };
}

export class FakeRemoteSource implements RemoteSource {
  assignments: Assignment[];
  calls = 0;
  failure: Error | null = null;
  private gate: Promise<void> | null = null;

  constructor(assignments: Assignment[] = []) {
    this.assignments = assignments;
  }

  /** Holds every fetch until the returned function is called. */
  hold(): () => void {
    let release: () => void = () => undefined;
    this.gate = new Promise<void>((resolve) => {
      release = () => {
        this.gate = null;
        resolve();
      };
    });
    return release;
  }

  async fetchAssignments(scope: Scope, signal: AbortSignal): Promise<Assignment[]> {
    this.calls++;
    if (this.gate) {
      await this.gate;
    }
    if (signal.aborted) {
      throw new Error('aborted');
    }
    if (this.failure) {
      throw this.failure;
    }
    return this.assignments.filter((a) => isCourseInScope(a.courseId, scope)).map((a) => ({ ...a }));
  }
}

export interface DeviceCall {
  op: 'create' | 'update' | 'delete';
  calendarId: string | null;
  deviceEventId?: string;
  title?: string;
}

export class FakeDeviceCalendar implements DeviceCalendarAdapter {
  readonly events = new Map<string, { calendarId: string | null; draft: EventDraft }>();
  readonly calls: DeviceCall[] = [];
  permission: PermissionStatus = 'granted';
  /** Answers to successive permission prompts; falls back to `permission`. */
  requestAnswers: PermissionStatus[] = [];
  /** Writes for these assignment ids fail. */
  readonly failingAssignments = new Map<number, DeviceWriteError>();
  private nextId = 1;

  async createEvent(calendarId: string | null, draft: EventDraft): Promise<string> {
    this.calls.push({ op: 'create', calendarId, title: draft.title });
    this.throwIfFailing(draft.assignmentId);

    const uid = `device-${this.nextId++}`;
    this.events.set(uid, { calendarId, draft });
    return uid;
  }

  async updateEvent(calendarId: string | null, deviceEventId: string, draft: EventDraft): Promise<void> {
    this.calls.push({ op: 'update', calendarId, deviceEventId, title: draft.title });
    this.throwIfFailing(draft.assignmentId);

    if (!this.events.has(deviceEventId)) {
      throw new DeviceWriteError('notFound', `No event ${deviceEventId}`);
    }
    this.events.set(deviceEventId, { calendarId, draft });
  }

  async deleteEvent(calendarId: string | null, deviceEventId: string): Promise<void> {
    this.calls.push({ op: 'delete', calendarId, deviceEventId });
    const existing = this.events.get(deviceEventId);
    if (existing) {
      this.throwIfFailing(existing.draft.assignmentId);
    }

    if (!this.events.delete(deviceEventId)) {
      throw new DeviceWriteError('notFound', `No event ${deviceEventId}`);
    }
  }

  async queryPermission(): Promise<PermissionStatus> {
    return this.permission;
  }

  async requestPermission(): Promise<PermissionStatus> {
    const answer = this.requestAnswers.shift();
    if (answer) {
      this.permission = answer;
    }
    return this.permission;
  }

  private throwIfFailing(assignmentId: number): void {
    const failure = this.failingAssignments.get(assignmentId);
    if (failure) throw failure;
  }
}

export class MemoryEventStore implements CalendarEventStore {
  readonly events = new Map<string, CalendarEvent>();

  constructor(events: CalendarEvent[] = []) {
    for (const event of events) {
      this.events.set(event.id, { ...event });
    }
  }

  async list(): Promise<CalendarEvent[]> {
    return [...this.events.values()].map((e) => ({ ...e }));
  }

  async save(event: CalendarEvent): Promise<void> {
    this.events.set(event.id, { ...event });
  }

  async remove(eventId: string): Promise<void> {
    this.events.delete(eventId);
  }

  async clear(): Promise<void> {
    this.events.clear();
  }
}

export class MemorySettingsStore implements SettingsStore {
  stored: SyncSettings | null;
  saveFailure: Error | null = null;
  saves = 0;

  constructor(stored: SyncSettings | null = null) {
    this.stored = stored;
  }

  async load(): Promise<SyncSettings | null> {
    return this.stored ? { ...this.stored, enabledCourseIds: [...this.stored.enabledCourseIds] } : null;
  }

  async save(settings: SyncSettings): Promise<void> {
    if (this.saveFailure) throw this.saveFailure;
    this.saves++;
    this.stored = { ...settings, enabledCourseIds: [...settings.enabledCourseIds] };
  }
}

export class MemoryWatermarkStore implements WatermarkStore {
  readonly watermarks = new Map<string, SyncWatermark>();

  async load(scope: string): Promise<SyncWatermark | null> {
    return this.watermarks.get(scope) ?? null;
  }

  async save(watermark: SyncWatermark): Promise<void> {
    this.watermarks.set(watermark.scope, watermark);
  }

  async clear(): Promise<void> {
    this.watermarks.clear();
  }
}

export class MemoryHistoryStore implements SyncHistoryStore {
  readonly results: SyncResult[] = [];

  async record(result: SyncResult): Promise<void> {
    this.results.push(result);
  }

  async recent(limit: number): Promise<SyncLogEntry[]> {
    return this.results
      .slice(-limit)
      .reverse()
      .map((result, index) => ({
        id: this.results.length - index,
        scope: result.scope,
        mode: result.mode,
        outcome: result.outcome,
        startedAt: result.syncTime.toISOString(),
        durationMs: result.syncDurationMs,
        eventsCreated: result.eventsCreated,
        eventsUpdated: result.eventsUpdated,
        eventsDeleted: result.eventsDeleted,
        errorsEncountered: result.errorsEncountered,
        errorMessage: result.errorMessages.length > 0 ? result.errorMessages.join('\n') : null,
      }));
  }
}
