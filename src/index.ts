export { CalendarSyncEngine } from './engine.js';
export type { CalendarSyncEngineDeps } from './engine.js';
export { CacheStore } from './cache/cacheStore.js';
export type { CachePolicy, CacheRead, CacheReadOptions, Fetcher } from './cache/cacheStore.js';
export { ALL_SCOPE, courseScope, parseScope, scopeKey } from './cache/scope.js';
export * as queries from './cache/queries.js';
export { reconcile, isEmptyDelta } from './sync/reconciler.js';
export type { SyncDelta, PendingCreate, PendingUpdate, ReconcileOptions } from './sync/reconciler.js';
export { buildEventDraft } from './sync/eventBuilder.js';
export { SyncCoordinator } from './sync/coordinator.js';
export { AutoSyncScheduler } from './sync/scheduler.js';
export type { SchedulerOptions, SchedulerTarget, TickOutcome } from './sync/scheduler.js';
export { formatSyncResult } from './sync/result.js';
export {
  PermissionGate,
  permissionGuidance,
  transitionPermission,
  MAX_CONSECUTIVE_DENIALS,
} from './permissions/gate.js';
export { DEFAULT_SETTINGS, syncSettingsSchema } from './permissions/settings.js';
export { SyncDatabase } from './storage/database.js';
export { CanvasSource } from './remote/canvas.js';
export { AppleCalendarAdapter } from './calendar/apple.js';
export * from './utils/errors.js';
export type * from './types/index.js';
