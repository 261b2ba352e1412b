import { Command } from 'commander';
import { ZodError } from 'zod';
import { SyncSettings } from '../../types/index.js';
import { safeErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { withContext } from '../context.js';

export interface SettingsChanges {
  enable?: boolean;
  disable?: boolean;
  courses?: string;
  lead?: string;
  device?: boolean;
  calendar?: string;
  autoSync?: boolean;
  interval?: string;
}

function parseCourseList(value: string): number[] {
  if (value.trim() === 'all') return [];
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
}

/** Applies command-line flags to the current settings. Validation happens on save. */
export function applySettingsChanges(current: SyncSettings, changes: SettingsChanges): SyncSettings {
  const next: SyncSettings = { ...current, enabledCourseIds: [...current.enabledCourseIds] };

  if (changes.enable) next.enabled = true;
  if (changes.disable) next.enabled = false;
  if (changes.courses !== undefined) next.enabledCourseIds = parseCourseList(changes.courses);
  if (changes.lead !== undefined) next.reminderLeadMinutes = Number(changes.lead);
  if (changes.device !== undefined) next.syncToDeviceCalendar = changes.device;
  if (changes.calendar !== undefined) next.deviceCalendarId = changes.calendar === 'default' ? null : changes.calendar;
  if (changes.autoSync !== undefined) next.autoSync = changes.autoSync;
  if (changes.interval !== undefined) next.autoSyncIntervalMinutes = Number(changes.interval);

  return next;
}

export function printSettings(settings: SyncSettings): void {
  console.log('\n=== Sync Settings ===');
  console.log(`Enabled: ${settings.enabled ? 'yes' : 'no'}`);
  console.log(`Courses: ${settings.enabledCourseIds.length > 0 ? settings.enabledCourseIds.join(', ') : 'all'}`);
  console.log(`Lead time: ${settings.reminderLeadMinutes} minutes`);
  console.log(`Device calendar: ${settings.syncToDeviceCalendar ? 'on' : 'off'}`);
  console.log(`Calendar: ${settings.deviceCalendarId ?? 'default'}`);
  console.log(`Auto-sync: ${settings.autoSync ? `every ${settings.autoSyncIntervalMinutes} minutes` : 'off'}`);
  console.log('');
}

const showCommand = new Command('show').description('Show the current settings').action(async () => {
  await withContext(async ({ engine }) => {
    printSettings(await engine.getSettings());
  });
});

const setCommand = new Command('set')
  .description('Change sync settings')
  .option('--enable', 'Turn calendar sync on')
  .option('--disable', 'Turn calendar sync off')
  .option('--courses <ids>', 'Comma-separated course ids to sync, or "all"')
  .option('--lead <minutes>', 'Minutes before the deadline the event starts')
  .option('--device', 'Write events to the device calendar')
  .option('--no-device', 'Keep events in the local ledger only')
  .option('--calendar <name>', 'Device calendar to write to, or "default"')
  .option('--auto-sync', 'Sync automatically while watching')
  .option('--no-auto-sync', 'Only sync on demand')
  .option('--interval <minutes>', 'Auto-sync interval in minutes')
  .action(async (options: SettingsChanges) => {
    if (options.enable && options.disable) {
      console.error('Use either --enable or --disable, not both.');
      process.exitCode = 1;
      return;
    }

    try {
      await withContext(async ({ engine }) => {
        const next = applySettingsChanges(await engine.getSettings(), options);
        const saved = await engine.updateSettings(next);
        console.log('Settings saved.');
        printSettings(saved);
      });
    } catch (error) {
      if (error instanceof ZodError) {
        for (const issue of error.issues) {
          console.error(`Invalid ${issue.path.join('.')}: ${issue.message}`);
        }
      } else {
        logger.error(`Saving settings failed: ${safeErrorMessage(error)}`);
        console.error(`\nSaving settings failed: ${safeErrorMessage(error)}`);
      }
      process.exitCode = 1;
    }
  });

export const settingsCommand = new Command('settings')
  .description('Show or change sync settings')
  .addCommand(showCommand, { isDefault: true })
  .addCommand(setCommand);
