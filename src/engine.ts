import {
  Assignment,
  CacheStatus,
  CalendarEvent,
  CalendarEventStore,
  DeviceCalendarAdapter,
  PermissionStatus,
  RemoteSource,
  Scope,
  SettingsStore,
  SyncHistoryStore,
  SyncLogEntry,
  SyncResult,
  SyncSettings,
  WatermarkStore,
} from './types/index.js';
import { CachePolicy, CacheRead, CacheStore } from './cache/cacheStore.js';
import { dueWithin, overdue, search } from './cache/queries.js';
import { ALL_SCOPE, courseScope, isCourseInScope, scopeKey } from './cache/scope.js';
import { PermissionGate } from './permissions/gate.js';
import { SyncCoordinator } from './sync/coordinator.js';
import { SyncDelta, reconcile } from './sync/reconciler.js';
import { config } from './utils/config.js';
import { logger } from './utils/logger.js';

export interface CalendarSyncEngineDeps {
  remote: RemoteSource;
  device: DeviceCalendarAdapter;
  events: CalendarEventStore;
  settings: SettingsStore;
  watermarks: WatermarkStore;
  history?: SyncHistoryStore;
  cachePolicy?: CachePolicy;
  now?: () => Date;
  newEventId?: () => string;
}

/** Entry point for everything outside the core: CLI, scheduler and embedders. */
export class CalendarSyncEngine {
  private readonly cache: CacheStore<Assignment>;
  private readonly gate: PermissionGate;
  private readonly coordinator: SyncCoordinator;
  private readonly events: CalendarEventStore;
  private readonly watermarks: WatermarkStore;
  private readonly history: SyncHistoryStore | null;
  private readonly now: () => Date;

  constructor(deps: CalendarSyncEngineDeps) {
    this.now = deps.now ?? (() => new Date());
    this.events = deps.events;
    this.watermarks = deps.watermarks;
    this.history = deps.history ?? null;

    this.cache = new CacheStore<Assignment>((scope, signal) => deps.remote.fetchAssignments(scope, signal), {
      name: 'assignments',
      policy: deps.cachePolicy ?? config.cache,
      now: () => this.now().getTime(),
    });
    this.gate = new PermissionGate(deps.device, deps.settings);
    this.coordinator = new SyncCoordinator({
      cache: this.cache,
      events: deps.events,
      device: deps.device,
      gate: this.gate,
      watermarks: deps.watermarks,
      history: deps.history,
      now: this.now,
      newEventId: deps.newEventId,
    });
  }

  // Cache

  getEntities(scope: Scope, forceRefresh = false): Promise<CacheRead<Assignment>> {
    return this.cache.get(scope, { forceRefresh });
  }

  getCacheStatus(scope: Scope): CacheStatus {
    return this.cache.status(scope);
  }

  clearCache(scope?: Scope): void {
    if (scope) {
      this.cache.clear(scope);
    } else {
      this.cache.clearAll();
    }
  }

  async getDueSoon(scope: Scope, days = 7): Promise<Assignment[]> {
    const { entities } = await this.cache.get(scope);
    return dueWithin(entities, days, this.now());
  }

  async getOverdue(scope: Scope): Promise<Assignment[]> {
    const { entities } = await this.cache.get(scope);
    return overdue(entities, this.now());
  }

  async searchAssignments(scope: Scope, query: string): Promise<Assignment[]> {
    const { entities } = await this.cache.get(scope);
    return search(entities, query);
  }

  /** Sets the local read flag in every cached scope holding the assignment. */
  markAssignmentRead(scope: Scope, assignmentId: number): boolean {
    const assignment = this.cache.peek(scope).find((a) => a.id === assignmentId);
    if (!assignment) return false;

    const markRead = (entities: Assignment[]): Assignment[] =>
      entities.map((a) => (a.id === assignmentId ? { ...a, isRead: true } : a));
    this.cache.update(ALL_SCOPE, markRead);
    this.cache.update(courseScope(assignment.courseId), markRead);
    return true;
  }

  // Sync

  performFullSync(scope: Scope): Promise<SyncResult> {
    return this.coordinator.performFullSync(scope);
  }

  performIncrementalSync(scope: Scope): Promise<SyncResult> {
    return this.coordinator.performIncrementalSync(scope);
  }

  /** Assignments a sync of the scope would create or update events for. */
  async getEntitiesNeedingSync(scope: Scope): Promise<Assignment[]> {
    const delta = await this.preview(scope);
    return [
      ...delta.toCreate.map((item) => item.assignment),
      ...delta.toUpdate.map((item) => item.assignment),
    ];
  }

  /** Events a sync of the scope would delete. */
  async getOrphanedEvents(scope: Scope): Promise<CalendarEvent[]> {
    const delta = await this.preview(scope);
    return delta.toDelete;
  }

  /** Full delta of the scope against the cached assignments, without applying it. */
  async preview(scope: Scope): Promise<SyncDelta> {
    const settings = await this.gate.getSettings();
    const { entities } = await this.cache.get(scope);
    const existing = await this.events.list();

    return reconcile(
      entities.filter((a) => isCourseInScope(a.courseId, scope)),
      existing,
      {
        scope,
        settings,
        pushToDevice: settings.syncToDeviceCalendar && this.gate.permissionStatus === 'granted',
      }
    );
  }

  getEvents(): Promise<CalendarEvent[]> {
    return this.events.list();
  }

  isSyncRunning(scope: Scope): boolean {
    return this.coordinator.isRunning(scope);
  }

  getLastSyncResult(scope: Scope): SyncResult | null {
    return this.coordinator.lastResult(scope);
  }

  /** Whether auto-sync is on and its interval has passed since the scope was last synced. */
  async isSyncNeeded(scope: Scope): Promise<boolean> {
    const settings = await this.gate.getSettings();
    if (!settings.enabled || !settings.autoSync) return false;

    const last = this.coordinator.lastResult(scope);
    if (last && last.outcome === 'aborted') return true;

    let lastSyncedAt = last?.syncTime ?? null;
    if (!lastSyncedAt) {
      const watermark = await this.watermarks.load(scopeKey(scope));
      lastSyncedAt = watermark?.syncedAt ?? null;
    }
    if (!lastSyncedAt) return true;

    const elapsed = this.now().getTime() - lastSyncedAt.getTime();
    return elapsed >= settings.autoSyncIntervalMinutes * 60 * 1000;
  }

  async getSyncHistory(limit = 10): Promise<SyncLogEntry[]> {
    return this.history ? this.history.recent(limit) : [];
  }

  /**
   * Forgets local sync state: the event ledger, watermarks, cached assignments
   * and the in-process permission state. Device calendar events are left alone.
   */
  async resetSyncState(): Promise<void> {
    await this.coordinator.reset();
    await this.events.clear();
    this.cache.clearAll();
    this.gate.resetPermissionState();
    logger.info('Sync state reset');
  }

  // Permission and settings

  get permissionStatus(): PermissionStatus {
    return this.gate.permissionStatus;
  }

  checkPermission(): Promise<PermissionStatus> {
    return this.gate.checkPermission();
  }

  requestPermission(): Promise<PermissionStatus> {
    return this.gate.requestPermission();
  }

  getSettings(): Promise<SyncSettings> {
    return this.gate.getSettings();
  }

  updateSettings(settings: SyncSettings): Promise<SyncSettings> {
    return this.gate.updateSettings(settings);
  }
}
