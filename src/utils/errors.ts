import { PermissionStatus } from '../types/index.js';

export type FetchFailureKind = 'network' | 'auth' | 'server' | 'timeout';

export type DeviceFailureKind = 'permission' | 'notFound' | 'platformError';

export class SyncError extends Error {
  readonly code: string;

  constructor(message: string, code = 'sync_error') {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The remote source could not deliver assignments. Callers fall back to cached data. */
export class FetchFailureError extends SyncError {
  readonly kind: FetchFailureKind;

  constructor(kind: FetchFailureKind, message: string) {
    super(message, `fetch_${kind}`);
    this.kind = kind;
  }
}

export class DeviceWriteError extends SyncError {
  readonly kind: DeviceFailureKind;

  constructor(kind: DeviceFailureKind, message: string) {
    super(message, `device_${kind}`);
    this.kind = kind;
  }
}

export class PermissionDeniedError extends SyncError {
  readonly status: PermissionStatus;

  constructor(status: PermissionStatus) {
    super(`Calendar permission not granted (status: ${status})`, 'permission_denied');
    this.status = status;
  }
}

export class ConcurrentSyncRejectedError extends SyncError {
  readonly scope: string;

  constructor(scope: string) {
    super(`Sync already in progress for scope "${scope}"`, 'sync_in_progress');
    this.scope = scope;
  }
}

export class SettingsPersistenceError extends SyncError {
  constructor(message: string) {
    super(message, 'settings_persistence');
  }
}

export function isSyncError(error: unknown): error is SyncError {
  return error instanceof SyncError;
}

export function safeErrorMessage(error: unknown): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }

  if (typeof error === 'string' && error.length > 0) {
    return error;
  }

  return 'unexpected error';
}
