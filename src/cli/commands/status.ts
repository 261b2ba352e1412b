import { Command } from 'commander';
import dayjs from 'dayjs';
import { permissionGuidance } from '../../permissions/gate.js';
import { withContext } from '../context.js';

interface StatusOptions {
  events?: boolean;
  history?: string;
}

export const statusCommand = new Command('status')
  .description('Show sync status')
  .option('--events', 'List all calendar events in the local ledger')
  .option('--history <count>', 'Number of past sync runs to show', '5')
  .action(async (options: StatusOptions) => {
    await withContext(async ({ engine }) => {
      const settings = await engine.getSettings();
      const permission = await engine.checkPermission();

      console.log('\n=== Settings ===');
      console.log(`Sync: ${settings.enabled ? 'Enabled' : 'Disabled'}`);
      console.log(
        `Courses: ${settings.enabledCourseIds.length > 0 ? settings.enabledCourseIds.join(', ') : 'All'}`
      );
      console.log(`Device calendar: ${settings.syncToDeviceCalendar ? settings.deviceCalendarId ?? 'Default' : 'Off'}`);
      console.log(`Calendar permission: ${permission}`);
      if (settings.syncToDeviceCalendar && permission !== 'granted') {
        console.log(`  ${permissionGuidance(permission)}`);
      }

      const events = await engine.getEvents();
      const now = new Date();
      const upcoming = events.filter((e) => e.endTime > now);

      console.log('\n=== Sync Statistics ===');
      console.log(`Tracked events: ${events.length}`);
      console.log(`On device calendar: ${events.filter((e) => e.deviceEventId !== null).length}`);
      console.log(`Upcoming: ${upcoming.length}`);

      const limit = Number.parseInt(options.history ?? '5', 10);
      const history = await engine.getSyncHistory(Number.isNaN(limit) ? 5 : limit);
      if (history.length > 0) {
        console.log('\n=== Recent Syncs ===');
        for (const entry of history) {
          const when = dayjs(entry.startedAt).format('MMM D, YYYY h:mm A');
          console.log(
            `  ${when} ${entry.mode} ${entry.scope} ${entry.outcome}: ` +
              `+${entry.eventsCreated} ~${entry.eventsUpdated} -${entry.eventsDeleted}` +
              (entry.errorsEncountered > 0 ? ` (${entry.errorsEncountered} errors)` : '')
          );
        }
      }

      if (options.events && events.length > 0) {
        console.log('\n=== Calendar Events ===');
        for (const event of events) {
          const due = dayjs(event.endTime).format('MMM D, YYYY');
          const isPast = event.endTime < now;
          const status = isPast ? '[PAST]' : '';
          console.log(`  ${status} ${due} - ${event.title}`);
        }
      }

      console.log('');
    });
  });
