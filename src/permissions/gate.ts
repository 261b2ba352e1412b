import { DeviceCalendarAdapter, PermissionStatus, SettingsStore, SyncSettings } from '../types/index.js';
import { PermissionDeniedError, SettingsPersistenceError, safeErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import { DEFAULT_SETTINGS, copySettings, parseSettings, syncSettingsSchema } from './settings.js';

/** Denied prompts in a row after which the platform will no longer ask the user. */
export const MAX_CONSECUTIVE_DENIALS = 2;

export interface PermissionState {
  status: PermissionStatus;
  consecutiveDenials: number;
}

export interface PermissionObservation {
  source: 'query' | 'request';
  status: PermissionStatus;
}

export const INITIAL_PERMISSION_STATE: PermissionState = { status: 'unknown', consecutiveDenials: 0 };

export function transitionPermission(state: PermissionState, observation: PermissionObservation): PermissionState {
  const { source, status } = observation;
  if (status === 'granted') {
    return { status: 'granted', consecutiveDenials: 0 };
  }

  // Only an out-of-band grant leaves this state
  if (state.status === 'permanently-denied') {
    return state;
  }

  switch (status) {
    case 'permanently-denied':
      return { status: 'permanently-denied', consecutiveDenials: state.consecutiveDenials };
    case 'denied': {
      if (source === 'query') {
        return { status: 'denied', consecutiveDenials: state.consecutiveDenials };
      }
      const denials = state.consecutiveDenials + 1;
      return {
        status: denials >= MAX_CONSECUTIVE_DENIALS ? 'permanently-denied' : 'denied',
        consecutiveDenials: denials,
      };
    }
    case 'restricted':
    case 'unknown':
      return { status, consecutiveDenials: state.consecutiveDenials };
  }
}

export function permissionGuidance(status: PermissionStatus): string {
  switch (status) {
    case 'granted':
      return 'Calendar access is granted. Assignments can be synced to your calendar.';
    case 'denied':
      return 'Calendar access was denied. Run "duesync permission --request" to allow calendar access.';
    case 'restricted':
      return 'Calendar access is restricted by system policy. Check your device restrictions.';
    case 'permanently-denied':
      return 'Calendar access was denied. Enable it in System Settings > Privacy & Security > Calendars.';
    case 'unknown':
      return 'Calendar permission status is unknown. Try requesting permission again.';
  }
}

export type DeviceAccess = 'allowed' | 'disabled' | 'blocked';

/**
 * Owns the device-calendar permission state and the user's sync settings.
 * Every device write consults it first.
 */
export class PermissionGate {
  private readonly device: DeviceCalendarAdapter;
  private readonly store: SettingsStore;
  private state: PermissionState = INITIAL_PERMISSION_STATE;
  private settings: SyncSettings | null = null;
  private settingsLoad: Promise<SyncSettings> | null = null;
  private settingsQueue: Promise<unknown> = Promise.resolve();

  constructor(device: DeviceCalendarAdapter, store: SettingsStore) {
    this.device = device;
    this.store = store;
  }

  get permissionStatus(): PermissionStatus {
    return this.state.status;
  }

  async checkPermission(): Promise<PermissionStatus> {
    let status: PermissionStatus;
    try {
      status = await this.device.queryPermission();
    } catch (error) {
      logger.warn(`Failed to query calendar permission: ${safeErrorMessage(error)}`);
      status = 'unknown';
    }

    return this.observe({ source: 'query', status });
  }

  async requestPermission(): Promise<PermissionStatus> {
    if (this.state.status === 'permanently-denied') {
      logger.info('Calendar permission is permanently denied; re-checking instead of prompting');
      return this.checkPermission();
    }

    let status: PermissionStatus;
    try {
      status = await this.device.requestPermission();
    } catch (error) {
      logger.warn(`Failed to request calendar permission: ${safeErrorMessage(error)}`);
      status = 'unknown';
    }

    return this.observe({ source: 'request', status });
  }

  /** Refreshes the permission state and decides whether this run may write to the device. */
  async authorizeDeviceWrites(settings: SyncSettings): Promise<DeviceAccess> {
    if (!settings.syncToDeviceCalendar) {
      return 'disabled';
    }

    const status = await this.checkPermission();
    return status === 'granted' ? 'allowed' : 'blocked';
  }

  assertDeviceWrite(): void {
    if (this.state.status !== 'granted') {
      throw new PermissionDeniedError(this.state.status);
    }
  }

  /** The device rejected a write for lack of permission. */
  recordPermissionFailure(): void {
    this.observe({ source: 'query', status: 'denied' });
  }

  async getSettings(): Promise<SyncSettings> {
    if (this.settings) {
      return copySettings(this.settings);
    }

    const loaded = await this.loadOnce();
    return copySettings(this.settings ?? loaded);
  }

  /** Validates and persists the settings; the in-memory copy changes only after the save succeeded. */
  updateSettings(next: SyncSettings): Promise<SyncSettings> {
    const run = this.settingsQueue.then(async () => {
      const parsed = parseSettings(next);

      try {
        await this.store.save(parsed);
      } catch (error) {
        throw new SettingsPersistenceError(`Failed to save sync settings: ${safeErrorMessage(error)}`);
      }

      const previous = this.settings;
      this.settings = parsed;
      logSettingsChange(previous, parsed);
      return copySettings(parsed);
    });

    this.settingsQueue = run.catch(() => undefined);
    return run;
  }

  resetPermissionState(): void {
    this.state = INITIAL_PERMISSION_STATE;
  }

  private observe(observation: PermissionObservation): PermissionStatus {
    const next = transitionPermission(this.state, observation);
    if (next.status !== this.state.status) {
      logger.info(`Calendar permission: ${this.state.status} -> ${next.status}`);
    }
    this.state = next;
    return next.status;
  }

  /** One store read shared by concurrent callers; an update that lands first wins over it. */
  private loadOnce(): Promise<SyncSettings> {
    if (!this.settingsLoad) {
      this.settingsLoad = this.loadSettings().then(
        (loaded) => {
          if (!this.settings) {
            this.settings = loaded;
          }
          return loaded;
        },
        (error: unknown) => {
          this.settingsLoad = null;
          throw error;
        }
      );
    }
    return this.settingsLoad;
  }

  private async loadSettings(): Promise<SyncSettings> {
    let stored: SyncSettings | null;
    try {
      stored = await this.store.load();
    } catch (error) {
      throw new SettingsPersistenceError(`Failed to load sync settings: ${safeErrorMessage(error)}`);
    }

    if (!stored) {
      return copySettings(DEFAULT_SETTINGS);
    }

    const parsed = syncSettingsSchema.safeParse(stored);
    if (!parsed.success) {
      logger.warn(`Stored sync settings are invalid, using defaults: ${parsed.error.issues[0]?.message}`);
      return copySettings(DEFAULT_SETTINGS);
    }

    return parsed.data;
  }
}

function logSettingsChange(previous: SyncSettings | null, next: SyncSettings): void {
  if (!previous) {
    logger.info('Sync settings saved');
    return;
  }

  const removed = previous.enabledCourseIds.filter((id) => !next.enabledCourseIds.includes(id));
  if (removed.length > 0 && next.enabledCourseIds.length > 0) {
    logger.info(`Courses ${removed.join(', ')} excluded from sync; their events are removed on the next run`);
  }
}
