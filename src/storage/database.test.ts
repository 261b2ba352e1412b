import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, describe, expect, it } from 'vitest';
import { enabledSettings, makeEvent } from '../testing/fakes.js';
import { SyncResultBuilder } from '../sync/result.js';
import { SyncDatabase } from './database.js';

describe('SyncDatabase', () => {
  const tempDirs: string[] = [];

  afterEach(() => {
    for (const dir of tempDirs.splice(0)) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  });

  it('stores and replaces calendar events', async () => {
    const db = await SyncDatabase.open(null);
    const event = makeEvent({
      id: 'E1',
      assignmentId: 11,
      courseId: 101,
      title: 'Biology: Lab 3',
      description: 'Due soon',
      calendarId: 'Coursework',
      deviceEventId: 'device-1',
    });

    await db.events.save(event);
    await db.events.save({ ...event, title: 'Biology: Lab 3 (revised)' });
    await db.events.save(makeEvent({ id: 'E2', endTime: new Date('2026-11-01T17:00:00.000Z') }));

    const events = await db.events.list();
    expect(events.map((e) => e.id)).toEqual(['E2', 'E1']);
    expect(events[1]).toEqual({ ...event, title: 'Biology: Lab 3 (revised)' });

    await db.events.remove('E2');
    expect((await db.events.list()).map((e) => e.id)).toEqual(['E1']);
    db.close();
  });

  it('returns null when no settings were saved', async () => {
    const db = await SyncDatabase.open(null);
    expect(await db.settings.load()).toBeNull();
    db.close();
  });

  it('round-trips settings and watermarks', async () => {
    const db = await SyncDatabase.open(null);
    const settings = enabledSettings({ enabledCourseIds: [3, 7], deviceCalendarId: 'Coursework' });
    const watermark = {
      scope: 'course:7',
      syncedAt: new Date('2026-10-18T12:00:00.000Z'),
      dueDates: { '1': '2026-11-02T17:00:00.000Z', '2': null },
      settingsFingerprint: 'courses=3,7;lead=60',
    };

    await db.settings.save(settings);
    await db.watermarks.save(watermark);

    expect(await db.settings.load()).toEqual(settings);
    expect(await db.watermarks.load('course:7')).toEqual(watermark);
    expect(await db.watermarks.load('all')).toBeNull();
    db.close();
  });

  it('keeps the sync log newest first', async () => {
    const db = await SyncDatabase.open(null);
    const startedAt = new Date('2026-10-18T12:00:00.000Z');

    const full = new SyncResultBuilder('all', 'full', startedAt);
    full.eventsCreated = 2;
    await db.history.record(full.build('completed', new Date(startedAt.getTime() + 250)));

    const failed = new SyncResultBuilder('all', 'incremental', startedAt);
    failed.recordError('Assignment 4: Calendar is busy');
    failed.recordError('Event E2: Calendar is busy');
    await db.history.record(failed.build('completed', startedAt));

    const entries = await db.history.recent(10);
    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({
      mode: 'incremental',
      errorsEncountered: 2,
      errorMessage: 'Assignment 4: Calendar is busy\nEvent E2: Calendar is busy',
    });
    expect(entries[1]).toMatchObject({
      scope: 'all',
      mode: 'full',
      outcome: 'completed',
      startedAt: '2026-10-18T12:00:00.000Z',
      durationMs: 250,
      eventsCreated: 2,
      errorMessage: null,
    });
    db.close();
  });

  it('persists to disk', async () => {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'duesync-'));
    tempDirs.push(dir);
    const file = path.join(dir, 'nested', 'sync.db');

    const first = await SyncDatabase.open(file);
    await first.events.save(makeEvent({ id: 'E1', assignmentId: 1 }));
    await first.settings.save(enabledSettings());
    first.close();
    expect(fs.existsSync(file)).toBe(true);

    const second = await SyncDatabase.open(file);
    expect((await second.events.list()).map((e) => e.id)).toEqual(['E1']);
    expect(await second.settings.load()).toEqual(enabledSettings());
    second.close();
  });
});
