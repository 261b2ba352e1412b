import { Command } from 'commander';
import { scopeKey } from '../../cache/scope.js';
import { AutoSyncScheduler } from '../../sync/scheduler.js';
import { formatSyncResult } from '../../sync/result.js';
import { safeErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { openContext } from '../context.js';
import { scopeOption } from './sync.js';

interface WatchOptions {
  course?: string;
  check?: string;
}

export const watchCommand = new Command('watch')
  .description('Keep running and sync on the auto-sync interval')
  .option('--course <id>', 'Only sync one course')
  .option('--check <seconds>', 'How often to check whether a sync is due', '60')
  .action(async (options: WatchOptions) => {
    const scope = scopeOption(options.course);
    if (!scope) return;

    const seconds = Number.parseInt(options.check ?? '60', 10);
    const context = await openContext();
    const settings = await context.engine.getSettings();
    if (!settings.enabled || !settings.autoSync) {
      console.log('Auto-sync is off. Run "duesync settings set --enable --auto-sync" first.');
      context.database.close();
      process.exitCode = 1;
      return;
    }

    const scheduler = new AutoSyncScheduler(context.engine, scope, {
      checkInterval: (Number.isNaN(seconds) || seconds < 1 ? 60 : seconds) * 1000,
      keepAlive: true,
      onResult: (result) => console.log(formatSyncResult(result)),
    });

    const shutdown = (): void => {
      scheduler.stop();
      scheduler
        .idle()
        .then(() => {
          context.database.close();
          console.log('\nStopped watching.');
        })
        .catch((error: unknown) => {
          logger.error(`Failed to stop watching: ${safeErrorMessage(error)}`);
          process.exitCode = 1;
        });
    };
    process.once('SIGINT', shutdown);
    process.once('SIGTERM', shutdown);

    console.log(
      `Watching ${scopeKey(scope)}: syncing every ${settings.autoSyncIntervalMinutes} minutes. Press Ctrl+C to stop.`
    );

    const first = await scheduler.tick();
    logger.debug(`Initial auto-sync tick: ${first}`);
    scheduler.start();
  });
