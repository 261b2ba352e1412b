import { execFileSync } from 'child_process';
import dayjs from 'dayjs';
import { DeviceCalendarAdapter, EventDraft, PermissionStatus } from '../types/index.js';
import { config } from '../utils/config.js';
import { DeviceWriteError, safeErrorMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

export type ScriptRunner = (script: string) => string;

export interface AppleCalendarOptions {
  defaultCalendarName?: string;
  platform?: NodeJS.Platform;
  run?: ScriptRunner;
}

// AppleScript error numbers
const NOT_AUTHORIZED = '-1743';
const NO_SUCH_OBJECT = '-1728';

function runOsascript(script: string): string {
  return execFileSync('osascript', ['-e', script], { encoding: 'utf8' });
}

export function escapeForAppleScript(str: string): string {
  return str
    .replace(/\\/g, '\\\\')
    .replace(/"/g, '\\"')
    .replace(/\n/g, '\\n');
}

export function formatDateForAppleScript(date: Date): string {
  return dayjs(date).format('MMMM D, YYYY [at] h:mm A');
}

function errorOutput(error: unknown): string {
  const message = safeErrorMessage(error);
  if (typeof error === 'object' && error !== null && 'stderr' in error && typeof error.stderr === 'string') {
    return `${message}\n${error.stderr}`;
  }
  return message;
}

export function classifyScriptError(error: unknown): DeviceWriteError {
  const output = errorOutput(error);
  const detail = output.trim().split('\n').pop() ?? output;

  if (output.includes(NOT_AUTHORIZED)) {
    return new DeviceWriteError('permission', 'Not authorized to control Calendar');
  }
  if (output.includes(NO_SUCH_OBJECT)) {
    return new DeviceWriteError('notFound', `Calendar event not found: ${detail}`);
  }
  return new DeviceWriteError('platformError', `Calendar script failed: ${detail}`);
}

function eventProperties(draft: EventDraft): string {
  return (
    `{summary:"${escapeForAppleScript(draft.title)}", ` +
    `description:"${escapeForAppleScript(draft.description)}", ` +
    `start date:date "${formatDateForAppleScript(draft.startTime)}", ` +
    `end date:date "${formatDateForAppleScript(draft.endTime)}"}`
  );
}

/**
 * Writes events to Calendar.app through osascript. Calendars are addressed by
 * name; events by their uid.
 */
export class AppleCalendarAdapter implements DeviceCalendarAdapter {
  private readonly defaultCalendarName: string;
  private readonly platform: NodeJS.Platform;
  private readonly run: ScriptRunner;
  private readonly ensuredCalendars = new Set<string>();

  constructor(options: AppleCalendarOptions = {}) {
    this.defaultCalendarName = options.defaultCalendarName ?? config.calendar.defaultCalendarName;
    this.platform = options.platform ?? process.platform;
    this.run = options.run ?? runOsascript;
  }

  async createEvent(calendarId: string | null, draft: EventDraft): Promise<string> {
    const calendar = this.ensureCalendarExists(calendarId);

    const script = `
      tell application "Calendar"
        tell calendar "${escapeForAppleScript(calendar)}"
          set newEvent to make new event with properties ${eventProperties(draft)}
          return uid of newEvent
        end tell
      end tell
    `;

    const uid = this.execute(script).trim();
    if (!uid) {
      throw new DeviceWriteError('platformError', `Calendar returned no uid for "${draft.title}"`);
    }

    logger.info(`Created calendar event: ${draft.title}`);
    return uid;
  }

  async updateEvent(calendarId: string | null, deviceEventId: string, draft: EventDraft): Promise<void> {
    const calendar = calendarId ?? this.defaultCalendarName;

    const script = `
      tell application "Calendar"
        tell calendar "${escapeForAppleScript(calendar)}"
          set theEvent to first event whose uid is "${escapeForAppleScript(deviceEventId)}"
          set summary of theEvent to "${escapeForAppleScript(draft.title)}"
          set description of theEvent to "${escapeForAppleScript(draft.description)}"
          set start date of theEvent to date "${formatDateForAppleScript(draft.startTime)}"
          set end date of theEvent to date "${formatDateForAppleScript(draft.endTime)}"
        end tell
      end tell
    `;

    this.execute(script);
    logger.info(`Updated calendar event: ${draft.title}`);
  }

  async deleteEvent(calendarId: string | null, deviceEventId: string): Promise<void> {
    const calendar = calendarId ?? this.defaultCalendarName;

    const script = `
      tell application "Calendar"
        tell calendar "${escapeForAppleScript(calendar)}"
          delete (first event whose uid is "${escapeForAppleScript(deviceEventId)}")
        end tell
      end tell
    `;

    this.execute(script);
    logger.info(`Deleted calendar event ${deviceEventId}`);
  }

  async queryPermission(): Promise<PermissionStatus> {
    return this.probe();
  }

  /** Any scripting access to Calendar raises the system prompt the first time. */
  async requestPermission(): Promise<PermissionStatus> {
    return this.probe();
  }

  private probe(): PermissionStatus {
    if (this.platform !== 'darwin') {
      return 'restricted';
    }

    try {
      this.run('tell application "Calendar" to get name of calendars');
      return 'granted';
    } catch (error) {
      const failure = classifyScriptError(error);
      if (failure.kind === 'permission') {
        return 'denied';
      }
      logger.warn(`Calendar permission probe failed: ${failure.message}`);
      return 'unknown';
    }
  }

  private ensureCalendarExists(calendarId: string | null): string {
    const calendar = calendarId ?? this.defaultCalendarName;
    if (this.ensuredCalendars.has(calendar)) return calendar;

    const name = escapeForAppleScript(calendar);
    const script = `
      tell application "Calendar"
        if not (exists calendar "${name}") then
          make new calendar with properties {name:"${name}"}
        end if
      end tell
    `;

    this.execute(script);
    this.ensuredCalendars.add(calendar);
    logger.info(`Ensured "${calendar}" calendar exists`);
    return calendar;
  }

  private execute(script: string): string {
    if (this.platform !== 'darwin') {
      throw new DeviceWriteError('platformError', 'Calendar.app is only available on macOS');
    }

    try {
      return this.run(script);
    } catch (error) {
      const failure = classifyScriptError(error);
      logger.error(`Calendar script failed (${failure.kind}): ${failure.message}`);
      throw failure;
    }
  }
}
