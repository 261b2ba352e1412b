import initSqlJs, { type Database, type SqlValue } from 'sql.js';
import { z } from 'zod';
import fs from 'fs';
import path from 'path';
import { config } from '../utils/config.js';
import { logger } from '../utils/logger.js';
import { syncSettingsSchema } from '../permissions/settings.js';
import {
  CalendarEvent,
  CalendarEventStore,
  SettingsStore,
  SyncHistoryStore,
  SyncLogEntry,
  SyncResult,
  SyncSettings,
  SyncWatermark,
  WatermarkStore,
} from '../types/index.js';

type Row = Record<string, SqlValue>;

const SETTINGS_KEY = 'sync_settings';

const dueDatesSchema = z.record(z.string(), z.string().nullable());
const syncModeSchema = z.enum(['full', 'incremental']);
const syncOutcomeSchema = z.enum(['completed', 'disabled', 'aborted']);

function text(row: Row, column: string): string {
  const value = row[column];
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  throw new Error(`Column "${column}" is not text`);
}

function nullableText(row: Row, column: string): string | null {
  return row[column] === null || row[column] === undefined ? null : text(row, column);
}

function integer(row: Row, column: string): number {
  const value = row[column];
  if (typeof value === 'number') return value;
  if (typeof value === 'string' && /^-?\d+$/.test(value)) return Number(value);
  throw new Error(`Column "${column}" is not an integer`);
}

function nullableInteger(row: Row, column: string): number | null {
  return row[column] === null || row[column] === undefined ? null : integer(row, column);
}

function initializeSchema(database: Database): void {
  database.run(`
    CREATE TABLE IF NOT EXISTS calendar_events (
      id TEXT PRIMARY KEY,
      assignment_id INTEGER,
      course_id INTEGER,
      title TEXT NOT NULL,
      description TEXT NOT NULL,
      start_time TEXT NOT NULL,
      end_time TEXT NOT NULL,
      calendar_id TEXT,
      device_event_id TEXT
    )
  `);

  database.run(`
    CREATE TABLE IF NOT EXISTS sync_logs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      scope TEXT NOT NULL,
      mode TEXT NOT NULL,
      status TEXT NOT NULL,
      started_at TEXT NOT NULL,
      duration_ms INTEGER NOT NULL,
      events_created INTEGER DEFAULT 0,
      events_updated INTEGER DEFAULT 0,
      events_deleted INTEGER DEFAULT 0,
      errors_encountered INTEGER DEFAULT 0,
      error_message TEXT
    )
  `);

  database.run(`
    CREATE TABLE IF NOT EXISTS sync_state (
      scope TEXT PRIMARY KEY,
      synced_at TEXT NOT NULL,
      due_dates TEXT NOT NULL,
      settings_fingerprint TEXT NOT NULL
    )
  `);

  database.run(`
    CREATE TABLE IF NOT EXISTS settings (
      key TEXT PRIMARY KEY,
      value TEXT NOT NULL
    )
  `);
}

/**
 * sql.js database holding the local event ledger, settings, watermarks and
 * the sync log. With a filename, every write is flushed to disk.
 */
export class SyncDatabase {
  readonly events: CalendarEventStore;
  readonly settings: SettingsStore;
  readonly watermarks: WatermarkStore;
  readonly history: SyncHistoryStore;

  private readonly database: Database;
  private readonly filename: string | null;

  private constructor(database: Database, filename: string | null) {
    this.database = database;
    this.filename = filename;
    this.events = new SqlEventStore(this);
    this.settings = new SqlSettingsStore(this);
    this.watermarks = new SqlWatermarkStore(this);
    this.history = new SqlHistoryStore(this);
  }

  /** Opens (or creates) the database file. `null` keeps everything in memory. */
  static async open(filename: string | null = config.paths.database): Promise<SyncDatabase> {
    const SQL = await initSqlJs();

    let database: Database;
    if (filename && fs.existsSync(filename)) {
      database = new SQL.Database(fs.readFileSync(filename));
    } else {
      database = new SQL.Database();
    }

    initializeSchema(database);
    const opened = new SyncDatabase(database, filename);
    opened.persist();
    return opened;
  }

  query(sql: string, params: SqlValue[] = []): Row[] {
    const statement = this.database.prepare(sql);
    try {
      statement.bind(params);
      const rows: Row[] = [];
      while (statement.step()) {
        rows.push(statement.getAsObject());
      }
      return rows;
    } finally {
      statement.free();
    }
  }

  execute(sql: string, params: SqlValue[] = []): void {
    this.database.run(sql, params);
    this.persist();
  }

  close(): void {
    this.persist();
    this.database.close();
  }

  private persist(): void {
    if (!this.filename) return;

    const dataDir = path.dirname(this.filename);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    fs.writeFileSync(this.filename, Buffer.from(this.database.export()));
  }
}

class SqlEventStore implements CalendarEventStore {
  private readonly db: SyncDatabase;

  constructor(db: SyncDatabase) {
    this.db = db;
  }

  async list(): Promise<CalendarEvent[]> {
    return this.db.query('SELECT * FROM calendar_events ORDER BY end_time ASC').map((row) => ({
      id: text(row, 'id'),
      assignmentId: nullableInteger(row, 'assignment_id'),
      courseId: nullableInteger(row, 'course_id'),
      title: text(row, 'title'),
      description: text(row, 'description'),
      startTime: new Date(text(row, 'start_time')),
      endTime: new Date(text(row, 'end_time')),
      calendarId: nullableText(row, 'calendar_id'),
      deviceEventId: nullableText(row, 'device_event_id'),
    }));
  }

  async save(event: CalendarEvent): Promise<void> {
    this.db.execute(
      `INSERT OR REPLACE INTO calendar_events
        (id, assignment_id, course_id, title, description, start_time, end_time, calendar_id, device_event_id)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        event.id,
        event.assignmentId,
        event.courseId,
        event.title,
        event.description,
        event.startTime.toISOString(),
        event.endTime.toISOString(),
        event.calendarId,
        event.deviceEventId,
      ]
    );
  }

  async remove(eventId: string): Promise<void> {
    this.db.execute('DELETE FROM calendar_events WHERE id = ?', [eventId]);
  }

  async clear(): Promise<void> {
    this.db.execute('DELETE FROM calendar_events');
  }
}

class SqlSettingsStore implements SettingsStore {
  private readonly db: SyncDatabase;

  constructor(db: SyncDatabase) {
    this.db = db;
  }

  async load(): Promise<SyncSettings | null> {
    const rows = this.db.query('SELECT value FROM settings WHERE key = ?', [SETTINGS_KEY]);
    if (rows.length === 0) return null;

    const parsed = syncSettingsSchema.safeParse(JSON.parse(text(rows[0], 'value')));
    if (!parsed.success) {
      logger.warn(`Ignoring invalid stored settings: ${parsed.error.issues[0]?.message}`);
      return null;
    }
    return parsed.data;
  }

  async save(settings: SyncSettings): Promise<void> {
    this.db.execute('INSERT OR REPLACE INTO settings (key, value) VALUES (?, ?)', [
      SETTINGS_KEY,
      JSON.stringify(settings),
    ]);
  }
}

class SqlWatermarkStore implements WatermarkStore {
  private readonly db: SyncDatabase;

  constructor(db: SyncDatabase) {
    this.db = db;
  }

  async load(scope: string): Promise<SyncWatermark | null> {
    const rows = this.db.query('SELECT * FROM sync_state WHERE scope = ?', [scope]);
    if (rows.length === 0) return null;

    const row = rows[0];
    return {
      scope: text(row, 'scope'),
      syncedAt: new Date(text(row, 'synced_at')),
      dueDates: dueDatesSchema.parse(JSON.parse(text(row, 'due_dates'))),
      settingsFingerprint: text(row, 'settings_fingerprint'),
    };
  }

  async save(watermark: SyncWatermark): Promise<void> {
    this.db.execute(
      'INSERT OR REPLACE INTO sync_state (scope, synced_at, due_dates, settings_fingerprint) VALUES (?, ?, ?, ?)',
      [
        watermark.scope,
        watermark.syncedAt.toISOString(),
        JSON.stringify(watermark.dueDates),
        watermark.settingsFingerprint,
      ]
    );
  }

  async clear(): Promise<void> {
    this.db.execute('DELETE FROM sync_state');
  }
}

class SqlHistoryStore implements SyncHistoryStore {
  private readonly db: SyncDatabase;

  constructor(db: SyncDatabase) {
    this.db = db;
  }

  async record(result: SyncResult): Promise<void> {
    this.db.execute(
      `INSERT INTO sync_logs
        (scope, mode, status, started_at, duration_ms, events_created, events_updated, events_deleted, errors_encountered, error_message)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`,
      [
        result.scope,
        result.mode,
        result.outcome,
        result.syncTime.toISOString(),
        result.syncDurationMs,
        result.eventsCreated,
        result.eventsUpdated,
        result.eventsDeleted,
        result.errorsEncountered,
        result.errorMessages.length > 0 ? result.errorMessages.join('\n') : null,
      ]
    );
  }

  async recent(limit: number): Promise<SyncLogEntry[]> {
    return this.db.query('SELECT * FROM sync_logs ORDER BY id DESC LIMIT ?', [limit]).map((row) => ({
      id: integer(row, 'id'),
      scope: text(row, 'scope'),
      mode: syncModeSchema.parse(text(row, 'mode')),
      outcome: syncOutcomeSchema.parse(text(row, 'status')),
      startedAt: text(row, 'started_at'),
      durationMs: integer(row, 'duration_ms'),
      eventsCreated: integer(row, 'events_created'),
      eventsUpdated: integer(row, 'events_updated'),
      eventsDeleted: integer(row, 'events_deleted'),
      errorsEncountered: integer(row, 'errors_encountered'),
      errorMessage: nullableText(row, 'error_message'),
    }));
  }
}
