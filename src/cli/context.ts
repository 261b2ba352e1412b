import { CalendarSyncEngine } from '../engine.js';
import { AppleCalendarAdapter } from '../calendar/apple.js';
import { CanvasSource } from '../remote/canvas.js';
import { SyncDatabase } from '../storage/database.js';

export interface CliContext {
  engine: CalendarSyncEngine;
  database: SyncDatabase;
}

export async function openContext(): Promise<CliContext> {
  const database = await SyncDatabase.open();
  const engine = new CalendarSyncEngine({
    remote: new CanvasSource(),
    device: new AppleCalendarAdapter(),
    events: database.events,
    settings: database.settings,
    watermarks: database.watermarks,
    history: database.history,
  });

  return { engine, database };
}

/** Opens the database and engine for one command and closes them afterwards. */
export async function withContext<T>(action: (context: CliContext) => Promise<T>): Promise<T> {
  const context = await openContext();
  try {
    return await action(context);
  } finally {
    context.database.close();
  }
}
