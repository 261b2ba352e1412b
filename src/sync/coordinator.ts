import { randomUUID } from 'crypto';
import {
  Assignment,
  CalendarEvent,
  CalendarEventStore,
  DeviceCalendarAdapter,
  EventDraft,
  Scope,
  SyncHistoryStore,
  SyncMode,
  SyncOutcome,
  SyncResult,
  SyncSettings,
  WatermarkStore,
} from '../types/index.js';
import { CacheStore } from '../cache/cacheStore.js';
import { isCourseInScope, scopeKey } from '../cache/scope.js';
import { DeviceAccess, PermissionGate } from '../permissions/gate.js';
import {
  ConcurrentSyncRejectedError,
  DeviceWriteError,
  PermissionDeniedError,
  safeErrorMessage,
} from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { applyDraft } from './eventBuilder.js';
import { PendingCreate, PendingUpdate, SyncDelta, reconcile } from './reconciler.js';
import { SyncResultBuilder, formatSyncResult } from './result.js';
import { buildWatermark, detectChanges, restrictDelta, settingsFingerprint } from './watermark.js';

export interface SyncCoordinatorDeps {
  cache: CacheStore<Assignment>;
  events: CalendarEventStore;
  device: DeviceCalendarAdapter;
  gate: PermissionGate;
  watermarks: WatermarkStore;
  history?: SyncHistoryStore;
  now?: () => Date;
  newEventId?: () => string;
}

interface RunContext {
  settings: SyncSettings;
  access: DeviceAccess;
  result: SyncResultBuilder;
  /** Assignments whose changes were not applied and must be revisited. */
  retryIds: Set<number>;
}

type DeviceWrite<T> = { skipped: true } | { skipped: false; value: T };

/**
 * Runs full and incremental sync passes. One pass per scope at a time; every
 * per-item failure ends up in the returned result rather than aborting the pass.
 */
export class SyncCoordinator {
  private readonly cache: CacheStore<Assignment>;
  private readonly events: CalendarEventStore;
  private readonly device: DeviceCalendarAdapter;
  private readonly gate: PermissionGate;
  private readonly watermarks: WatermarkStore;
  private readonly history: SyncHistoryStore | null;
  private readonly now: () => Date;
  private readonly newEventId: () => string;
  private readonly running = new Set<string>();
  private readonly lastResults = new Map<string, SyncResult>();
  /** Tail of the queue of runs reconciling against the shared event ledger. */
  private ledgerQueue: Promise<void> = Promise.resolve();

  constructor(deps: SyncCoordinatorDeps) {
    this.cache = deps.cache;
    this.events = deps.events;
    this.device = deps.device;
    this.gate = deps.gate;
    this.watermarks = deps.watermarks;
    this.history = deps.history ?? null;
    this.now = deps.now ?? (() => new Date());
    this.newEventId = deps.newEventId ?? randomUUID;
  }

  performFullSync(scope: Scope): Promise<SyncResult> {
    return this.run(scope, 'full');
  }

  performIncrementalSync(scope: Scope): Promise<SyncResult> {
    return this.run(scope, 'incremental');
  }

  isRunning(scope: Scope): boolean {
    return this.running.has(scopeKey(scope));
  }

  lastResult(scope: Scope): SyncResult | null {
    return this.lastResults.get(scopeKey(scope)) ?? null;
  }

  /** Forgets run history and watermarks so the next incremental pass reconciles everything. */
  async reset(): Promise<void> {
    this.lastResults.clear();
    await this.watermarks.clear();
  }

  private async run(scope: Scope, mode: SyncMode): Promise<SyncResult> {
    const key = scopeKey(scope);
    if (this.running.has(key)) {
      throw new ConcurrentSyncRejectedError(key);
    }
    this.running.add(key);

    try {
      const startedAt = this.now();
      const builder = new SyncResultBuilder(key, mode, startedAt);
      logger.info(`Starting ${mode} sync of ${key}`);

      let outcome: SyncOutcome;
      try {
        outcome = await this.execute(scope, key, mode, startedAt, builder);
      } catch (error) {
        outcome = 'aborted';
        builder.recordError(`Sync aborted: ${safeErrorMessage(error)}`);
        logger.error(`${mode} sync of ${key} aborted: ${safeErrorMessage(error)}`);
      }

      const result = builder.build(outcome, this.now());
      this.lastResults.set(key, result);
      await this.recordHistory(result);
      logger.info(formatSyncResult(result));
      return result;
    } finally {
      this.running.delete(key);
    }
  }

  private async execute(
    scope: Scope,
    key: string,
    mode: SyncMode,
    startedAt: Date,
    builder: SyncResultBuilder
  ): Promise<SyncOutcome> {
    const settings = await this.gate.getSettings();
    if (!settings.enabled) {
      logger.info('Calendar sync is disabled; nothing to do');
      return 'disabled';
    }

    const read = await this.cache.get(scope, { forceRefresh: mode === 'full' });
    if (read.failure) {
      const reason = `Remote fetch failed (${read.failure.kind}): ${read.failure.message}`;
      if (read.status.lastFetchedAt === null) {
        builder.recordError(reason);
        return 'aborted';
      }
      builder.recordError(`${reason}; using cached assignments from ${read.status.lastFetchedAt.toISOString()}`);
    }

    const assignments = read.entities.filter((a) => isCourseInScope(a.courseId, scope));

    // Scopes overlap on the ledger, so reconcile and apply one run at a time
    return this.withLedger(() => this.reconcileAndApply(scope, key, mode, startedAt, assignments, settings, builder));
  }

  private async reconcileAndApply(
    scope: Scope,
    key: string,
    mode: SyncMode,
    startedAt: Date,
    assignments: Assignment[],
    settings: SyncSettings,
    builder: SyncResultBuilder
  ): Promise<SyncOutcome> {
    const existing = await this.events.list();
    const access = await this.gate.authorizeDeviceWrites(settings);
    if (access === 'blocked') {
      logger.warn(`Device calendar writes blocked (permission: ${this.gate.permissionStatus})`);
    }

    let delta: SyncDelta = reconcile(assignments, existing, {
      scope,
      settings,
      pushToDevice: access === 'allowed',
    });

    const previous = await this.watermarks.load(key);
    if (mode === 'incremental' && previous && previous.settingsFingerprint === settingsFingerprint(settings)) {
      delta = restrictDelta(delta, detectChanges(assignments, previous), access === 'allowed');
    }

    logger.info(
      `Delta for ${key}: ${delta.toCreate.length} to create, ${delta.toUpdate.length} to update, ${delta.toDelete.length} to delete`
    );

    const context: RunContext = { settings, access, result: builder, retryIds: new Set() };
    for (const item of delta.toCreate) {
      await this.applyCreate(item, context);
    }
    for (const item of delta.toUpdate) {
      await this.applyUpdate(item, context);
    }
    for (const event of delta.toDelete) {
      await this.applyDelete(event, context);
    }

    await this.watermarks.save(buildWatermark(key, startedAt, assignments, settings, previous, context.retryIds));
    return 'completed';
  }

  private withLedger<T>(work: () => Promise<T>): Promise<T> {
    const run = this.ledgerQueue.then(work);
    this.ledgerQueue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async applyCreate({ assignment, draft }: PendingCreate, context: RunContext): Promise<void> {
    const { settings, result } = context;

    try {
      let deviceEventId: string | null = null;
      if (context.access !== 'disabled') {
        const write = await this.deviceWrite(() => this.device.createEvent(settings.deviceCalendarId, draft), context);
        if (write.skipped) {
          context.retryIds.add(assignment.id);
        } else {
          deviceEventId = write.value;
        }
      }

      await this.events.save({
        id: this.newEventId(),
        ...draft,
        calendarId: deviceEventId === null ? null : settings.deviceCalendarId,
        deviceEventId,
      });
      result.eventsCreated++;
    } catch (error) {
      this.recordFailure(`Assignment ${assignment.id}`, error, context);
      context.retryIds.add(assignment.id);
    }
  }

  private async applyUpdate({ event, assignment, draft }: PendingUpdate, context: RunContext): Promise<void> {
    const { settings, result } = context;

    try {
      let deviceEventId = event.deviceEventId;
      let calendarId = event.calendarId;
      if (context.access !== 'disabled') {
        const write = await this.deviceWrite(() => this.pushUpdate(event, draft, settings), context);
        if (write.skipped) {
          context.retryIds.add(assignment.id);
          // The local copy waits for the device copy
          if (event.deviceEventId !== null) return;
        } else {
          deviceEventId = write.value;
          calendarId = event.deviceEventId === write.value ? event.calendarId : settings.deviceCalendarId;
        }
      }

      await this.events.save({ ...applyDraft(event, draft), deviceEventId, calendarId });
      result.eventsUpdated++;
    } catch (error) {
      this.recordFailure(`Assignment ${assignment.id}`, error, context);
      context.retryIds.add(assignment.id);
    }
  }

  private async applyDelete(event: CalendarEvent, context: RunContext): Promise<void> {
    const { result } = context;
    const deviceEventId = event.deviceEventId;

    try {
      if (deviceEventId !== null && context.access !== 'disabled') {
        const write = await this.deviceWrite(() => this.pushDelete(event, deviceEventId, context.settings), context);
        if (write.skipped) {
          if (event.assignmentId !== null) context.retryIds.add(event.assignmentId);
          return;
        }
      }

      await this.events.remove(event.id);
      result.eventsDeleted++;
    } catch (error) {
      this.recordFailure(`Event ${event.id}`, error, context);
      if (event.assignmentId !== null) context.retryIds.add(event.assignmentId);
    }
  }

  /** Resolves to the device id of the written event. */
  private async pushUpdate(event: CalendarEvent, draft: EventDraft, settings: SyncSettings): Promise<string> {
    if (event.deviceEventId === null) {
      return this.device.createEvent(settings.deviceCalendarId, draft);
    }

    try {
      await this.device.updateEvent(event.calendarId ?? settings.deviceCalendarId, event.deviceEventId, draft);
      return event.deviceEventId;
    } catch (error) {
      if (error instanceof DeviceWriteError && error.kind === 'notFound') {
        logger.info(`Device event ${event.deviceEventId} is gone; recreating it`);
        return this.device.createEvent(settings.deviceCalendarId, draft);
      }
      throw error;
    }
  }

  private async pushDelete(event: CalendarEvent, deviceEventId: string, settings: SyncSettings): Promise<void> {
    try {
      await this.device.deleteEvent(event.calendarId ?? settings.deviceCalendarId, deviceEventId);
    } catch (error) {
      if (error instanceof DeviceWriteError && error.kind === 'notFound') {
        // Already removed on the device
        return;
      }
      throw error;
    }
  }

  /** Runs a device write behind the permission gate. */
  private async deviceWrite<T>(write: () => Promise<T>, context: RunContext): Promise<DeviceWrite<T>> {
    try {
      this.gate.assertDeviceWrite();
    } catch (error) {
      if (error instanceof PermissionDeniedError) {
        context.result.itemsSkipped++;
        return { skipped: true };
      }
      throw error;
    }

    try {
      const value = await write();
      context.result.deviceWrites++;
      return { skipped: false, value };
    } catch (error) {
      if (error instanceof DeviceWriteError && error.kind === 'permission') {
        this.gate.recordPermissionFailure();
      }
      throw error;
    }
  }

  private recordFailure(subject: string, error: unknown, context: RunContext): void {
    const message = `${subject}: ${safeErrorMessage(error)}`;
    context.result.recordError(message);
    logger.error(`Sync item failed - ${message}`);
  }

  private async recordHistory(result: SyncResult): Promise<void> {
    if (!this.history) return;

    try {
      await this.history.record(result);
    } catch (error) {
      logger.warn(`Failed to record sync history: ${safeErrorMessage(error)}`);
    }
  }
}
