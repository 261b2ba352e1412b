import { describe, expect, it } from 'vitest';
import { FakeDeviceCalendar, MemorySettingsStore, enabledSettings } from '../testing/fakes.js';
import { PermissionDeniedError, SettingsPersistenceError } from '../utils/errors.js';
import {
  INITIAL_PERMISSION_STATE,
  PermissionGate,
  PermissionState,
  permissionGuidance,
  transitionPermission,
} from './gate.js';
import { DEFAULT_SETTINGS } from './settings.js';

describe('transitionPermission', () => {
  it('moves to permanently-denied on the second denied prompt', () => {
    const once = transitionPermission(INITIAL_PERMISSION_STATE, { source: 'request', status: 'denied' });
    const twice = transitionPermission(once, { source: 'request', status: 'denied' });

    expect(once).toEqual({ status: 'denied', consecutiveDenials: 1 });
    expect(twice).toEqual({ status: 'permanently-denied', consecutiveDenials: 2 });
  });

  it('does not count denied query results', () => {
    const state = transitionPermission(INITIAL_PERMISSION_STATE, { source: 'query', status: 'denied' });
    expect(state).toEqual({ status: 'denied', consecutiveDenials: 0 });
  });

  it('stays permanently denied until a grant is observed', () => {
    const stuck: PermissionState = { status: 'permanently-denied', consecutiveDenials: 2 };

    expect(transitionPermission(stuck, { source: 'query', status: 'unknown' })).toBe(stuck);
    expect(transitionPermission(stuck, { source: 'request', status: 'denied' })).toBe(stuck);
    expect(transitionPermission(stuck, { source: 'query', status: 'granted' })).toEqual({
      status: 'granted',
      consecutiveDenials: 0,
    });
  });

  it('resets the denial counter on a grant', () => {
    const denied: PermissionState = { status: 'denied', consecutiveDenials: 1 };
    const granted = transitionPermission(denied, { source: 'request', status: 'granted' });
    const deniedAgain = transitionPermission(granted, { source: 'request', status: 'denied' });

    expect(deniedAgain).toEqual({ status: 'denied', consecutiveDenials: 1 });
  });
});

describe('permissionGuidance', () => {
  it('points permanently denied users at the system settings', () => {
    expect(permissionGuidance('permanently-denied')).toBe(
      'Calendar access was denied. Enable it in System Settings > Privacy & Security > Calendars.'
    );
  });
});

describe('PermissionGate', () => {
  it('stops prompting once permission is permanently denied', async () => {
    const device = new FakeDeviceCalendar();
    device.permission = 'denied';
    device.requestAnswers = ['denied', 'denied', 'granted'];
    const gate = new PermissionGate(device, new MemorySettingsStore());

    expect(await gate.requestPermission()).toBe('denied');
    expect(await gate.requestPermission()).toBe('permanently-denied');
    expect(await gate.requestPermission()).toBe('permanently-denied');
    // The third answer was never asked for
    expect(device.requestAnswers).toEqual(['granted']);
  });

  it('leaves permanently-denied when the platform reports a grant', async () => {
    const device = new FakeDeviceCalendar();
    device.requestAnswers = ['denied', 'denied'];
    const gate = new PermissionGate(device, new MemorySettingsStore());
    await gate.requestPermission();
    await gate.requestPermission();

    device.permission = 'granted';
    expect(await gate.checkPermission()).toBe('granted');
  });

  it('authorizes device writes only when wanted and granted', async () => {
    const device = new FakeDeviceCalendar();
    const gate = new PermissionGate(device, new MemorySettingsStore());

    expect(await gate.authorizeDeviceWrites(enabledSettings())).toBe('disabled');
    expect(await gate.authorizeDeviceWrites(enabledSettings({ syncToDeviceCalendar: true }))).toBe('allowed');

    device.permission = 'restricted';
    expect(await gate.authorizeDeviceWrites(enabledSettings({ syncToDeviceCalendar: true }))).toBe('blocked');
    expect(() => gate.assertDeviceWrite()).toThrow(PermissionDeniedError);
    expect(() => gate.assertDeviceWrite()).toThrow('Calendar permission not granted (status: restricted)');
  });

  it('marks permission denied after a rejected write', async () => {
    const gate = new PermissionGate(new FakeDeviceCalendar(), new MemorySettingsStore());
    await gate.checkPermission();

    gate.recordPermissionFailure();

    expect(gate.permissionStatus).toBe('denied');
  });

  it('falls back to defaults when nothing is stored', async () => {
    const gate = new PermissionGate(new FakeDeviceCalendar(), new MemorySettingsStore());
    expect(await gate.getSettings()).toEqual(DEFAULT_SETTINGS);
  });

  it('validates and persists settings', async () => {
    const store = new MemorySettingsStore();
    const gate = new PermissionGate(new FakeDeviceCalendar(), store);

    const saved = await gate.updateSettings(enabledSettings({ enabledCourseIds: [7, 3, 7] }));

    expect(saved.enabledCourseIds).toEqual([3, 7]);
    expect(store.stored?.enabledCourseIds).toEqual([3, 7]);
    await expect(gate.updateSettings(enabledSettings({ autoSyncIntervalMinutes: 1 }))).rejects.toThrow(
      'auto-sync interval must be at least 5 minutes'
    );
    expect((await gate.getSettings()).autoSyncIntervalMinutes).toBe(360);
  });

  it('keeps the old settings when saving fails', async () => {
    const store = new MemorySettingsStore(enabledSettings({ reminderLeadMinutes: 30 }));
    const gate = new PermissionGate(new FakeDeviceCalendar(), store);
    await gate.getSettings();
    store.saveFailure = new Error('disk full');

    const update = gate.updateSettings(enabledSettings({ reminderLeadMinutes: 120 }));

    await expect(update).rejects.toBeInstanceOf(SettingsPersistenceError);
    await expect(update).rejects.toThrow('Failed to save sync settings: disk full');
    expect((await gate.getSettings()).reminderLeadMinutes).toBe(30);
  });

  it('keeps an update that lands while the first load is pending', async () => {
    const store = new MemorySettingsStore(enabledSettings({ reminderLeadMinutes: 60 }));
    const readStored = store.load.bind(store);
    let releaseLoad: () => void = () => undefined;
    const loadReleased = new Promise<void>((resolve) => {
      releaseLoad = resolve;
    });
    store.load = async () => {
      const stored = await readStored();
      await loadReleased;
      return stored;
    };
    const gate = new PermissionGate(new FakeDeviceCalendar(), store);

    const pending = gate.getSettings();
    await gate.updateSettings(enabledSettings({ reminderLeadMinutes: 15 }));
    releaseLoad();

    expect((await pending).reminderLeadMinutes).toBe(15);
    expect((await gate.getSettings()).reminderLeadMinutes).toBe(15);
    expect(store.stored?.reminderLeadMinutes).toBe(15);
  });

  it('returns copies of the settings', async () => {
    const gate = new PermissionGate(new FakeDeviceCalendar(), new MemorySettingsStore());
    const settings = await gate.getSettings();
    settings.enabledCourseIds.push(5);

    expect((await gate.getSettings()).enabledCourseIds).toEqual([]);
  });
});
