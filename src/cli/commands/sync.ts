import { Command } from 'commander';
import dayjs from 'dayjs';
import { parseScope, scopeKey } from '../../cache/scope.js';
import { Scope, SyncResult } from '../../types/index.js';
import { ConcurrentSyncRejectedError, safeErrorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { withContext } from '../context.js';

interface SyncOptions {
  full?: boolean;
  course?: string;
  dryRun?: boolean;
}

/** 0 on a clean run, 2 when Canvas rejected the token, 1 for anything else that went wrong. */
export function exitCodeFor(result: SyncResult): number {
  if (result.errorMessages.some((m) => m.startsWith('Remote fetch failed (auth)'))) {
    return 2;
  }
  return result.outcome === 'aborted' || result.hasErrors ? 1 : 0;
}

export function printSyncResult(result: SyncResult): void {
  if (result.outcome === 'disabled') {
    console.log('Calendar sync is disabled. Run "duesync settings set --enable" to turn it on.');
    return;
  }

  const label = result.outcome === 'aborted' ? 'Sync aborted' : 'Sync complete';
  console.log(`\n${label} (${result.mode}, ${result.scope}, ${result.syncDurationMs}ms)`);
  console.log(`  Created: ${result.eventsCreated}`);
  console.log(`  Updated: ${result.eventsUpdated}`);
  console.log(`  Deleted: ${result.eventsDeleted}`);
  if (result.itemsSkipped > 0) {
    console.log(`  Skipped device writes: ${result.itemsSkipped} (calendar permission not granted)`);
  }

  if (result.hasErrors) {
    console.log(`\n${result.errorsEncountered} error(s):`);
    for (const message of result.errorMessages) {
      console.log(`  - ${message}`);
    }
  }
}

/** Parses a `--course` value, reporting a bad one and setting the exit code. */
export function scopeOption(value: string | undefined): Scope | null {
  try {
    return parseScope(value);
  } catch (error) {
    console.error(safeErrorMessage(error));
    process.exitCode = 1;
    return null;
  }
}

export const syncCommand = new Command('sync')
  .description('Sync Canvas assignments to the calendar')
  .option('--full', 'Refetch everything and reconcile every assignment')
  .option('--course <id>', 'Only sync one course')
  .option('--dry-run', 'Show what would change without writing anything')
  .action(async (options: SyncOptions) => {
    const scope = scopeOption(options.course);
    if (!scope) return;

    try {
      await withContext(async ({ engine }) => {
        if (options.dryRun) {
          const delta = await engine.preview(scope);
          console.log(`DRY RUN for ${scopeKey(scope)}\n`);

          for (const { draft } of delta.toCreate) {
            console.log(`  + ${draft.title} (due ${dayjs(draft.endTime).format('MMM D, YYYY h:mm A')})`);
          }
          for (const { draft } of delta.toUpdate) {
            console.log(`  ~ ${draft.title} (due ${dayjs(draft.endTime).format('MMM D, YYYY h:mm A')})`);
          }
          for (const event of delta.toDelete) {
            console.log(`  - ${event.title}`);
          }

          console.log(
            `\nWould create ${delta.toCreate.length}, update ${delta.toUpdate.length}, delete ${delta.toDelete.length}`
          );
          return;
        }

        console.log(`Starting ${options.full ? 'full' : 'incremental'} sync of ${scopeKey(scope)}...`);
        const result = options.full
          ? await engine.performFullSync(scope)
          : await engine.performIncrementalSync(scope);

        printSyncResult(result);
        process.exitCode = exitCodeFor(result);
        if (process.exitCode === 2) {
          console.error('\nCanvas rejected the access token. Check CANVAS_ACCESS_TOKEN.');
        }
      });
    } catch (error) {
      if (error instanceof ConcurrentSyncRejectedError) {
        console.error(error.message);
      } else {
        logger.error(`Sync failed: ${safeErrorMessage(error)}`);
        console.error(`\nSync failed: ${safeErrorMessage(error)}`);
      }
      process.exitCode = 1;
    }
  });
