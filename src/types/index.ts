// Core data types used throughout the application

export type SubmissionState = 'available' | 'submitted' | 'overdue';

export interface Assignment {
  id: number;
  courseId: number;
  courseName?: string;
  name: string;
  description?: string;
  dueAt: Date | null;
  updatedAt: Date | null;
  submissionState: SubmissionState;
  isRead: boolean;
  htmlUrl?: string;
  pointsPossible: number | null;
}

export interface CalendarEvent {
  id: string;
  assignmentId: number | null;
  courseId: number | null;
  title: string;
  description: string;
  startTime: Date;
  endTime: Date;
  calendarId: string | null;
  /** Identity assigned by the device calendar once the event was written there. */
  deviceEventId: string | null;
}

/** The fields of a CalendarEvent that are derived from its assignment. */
export interface EventDraft {
  assignmentId: number;
  courseId: number;
  title: string;
  description: string;
  startTime: Date;
  endTime: Date;
}

export type Scope = { kind: 'all' } | { kind: 'course'; courseId: number };

export interface CacheStatus {
  scope: string;
  lastFetchedAt: Date | null;
  itemCount: number;
  isRefreshing: boolean;
  isExpired: boolean;
  isStale: boolean;
  ageMs: number | null;
  lastError: string | null;
}

export type PermissionStatus =
  | 'granted'
  | 'denied'
  | 'restricted'
  | 'permanently-denied'
  | 'unknown';

export interface SyncSettings {
  enabled: boolean;
  /** Courses opted into sync. Empty means every course. */
  enabledCourseIds: number[];
  reminderLeadMinutes: number;
  syncToDeviceCalendar: boolean;
  deviceCalendarId: string | null;
  autoSync: boolean;
  autoSyncIntervalMinutes: number;
}

export type SyncMode = 'full' | 'incremental';

export type SyncOutcome = 'completed' | 'disabled' | 'aborted';

export interface SyncResult {
  readonly scope: string;
  readonly mode: SyncMode;
  readonly outcome: SyncOutcome;
  readonly eventsCreated: number;
  readonly eventsUpdated: number;
  readonly eventsDeleted: number;
  /** Device writes short-circuited because permission was not granted. */
  readonly itemsSkipped: number;
  readonly deviceWrites: number;
  readonly errorsEncountered: number;
  readonly errorMessages: readonly string[];
  readonly syncTime: Date;
  readonly syncDurationMs: number;
  readonly hasErrors: boolean;
  readonly hasChanges: boolean;
  readonly totalChanges: number;
}

export interface SyncWatermark {
  scope: string;
  syncedAt: Date;
  /** Due timestamp (ISO) of every in-scope assignment seen by the last run. */
  dueDates: Record<string, string | null>;
  settingsFingerprint: string;
}

export interface SyncLogEntry {
  id: number;
  scope: string;
  mode: SyncMode;
  outcome: SyncOutcome;
  startedAt: string;
  durationMs: number;
  eventsCreated: number;
  eventsUpdated: number;
  eventsDeleted: number;
  errorsEncountered: number;
  errorMessage: string | null;
}

// Contracts of the collaborators the engine consumes

export interface RemoteSource {
  fetchAssignments(scope: Scope, signal: AbortSignal): Promise<Assignment[]>;
}

export interface DeviceCalendarAdapter {
  createEvent(calendarId: string | null, draft: EventDraft): Promise<string>;
  updateEvent(calendarId: string | null, deviceEventId: string, draft: EventDraft): Promise<void>;
  deleteEvent(calendarId: string | null, deviceEventId: string): Promise<void>;
  queryPermission(): Promise<PermissionStatus>;
  requestPermission(): Promise<PermissionStatus>;
}

export interface SettingsStore {
  load(): Promise<SyncSettings | null>;
  save(settings: SyncSettings): Promise<void>;
}

export interface CalendarEventStore {
  list(): Promise<CalendarEvent[]>;
  save(event: CalendarEvent): Promise<void>;
  remove(eventId: string): Promise<void>;
  clear(): Promise<void>;
}

export interface WatermarkStore {
  load(scope: string): Promise<SyncWatermark | null>;
  save(watermark: SyncWatermark): Promise<void>;
  clear(): Promise<void>;
}

export interface SyncHistoryStore {
  record(result: SyncResult): Promise<void>;
  recent(limit: number): Promise<SyncLogEntry[]>;
}

export interface Config {
  canvas: {
    baseUrl: string;
    accessToken: string;
    pageSize: number;
  };
  cache: {
    ttl: number;
    fetchTimeout: number;
  };
  calendar: {
    defaultCalendarName: string;
  };
  paths: {
    dataDir: string;
    database: string;
    logFile: string;
  };
  logging: {
    level: string;
  };
}
