import { Command } from 'commander';
import { logger } from '../../utils/logger.js';
import { safeErrorMessage } from '../../utils/errors.js';
import { withContext } from '../context.js';
import * as readline from 'readline';

async function confirmReset(): Promise<boolean> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    rl.question('Type "RESET" to confirm: ', (answer) => {
      rl.close();
      resolve(answer === 'RESET');
    });
  });
}

interface ResetOptions {
  force?: boolean;
}

export const resetCommand = new Command('reset')
  .description('Forget the local event ledger and sync watermarks (DESTRUCTIVE)')
  .option('--force', 'Skip confirmation prompt')
  .action(async (options: ResetOptions) => {
    console.log('\n========================================');
    console.log('         WARNING: DESTRUCTIVE ACTION');
    console.log('========================================\n');
    console.log('This command will clear the local calendar event ledger.\n');
    console.log('Consequences:');
    console.log('  - The next sync will re-create events for ALL assignments');
    console.log('  - You may end up with DUPLICATE events in Calendar');
    console.log('  - This does NOT delete existing events from Calendar\n');
    console.log('Settings and sync history are kept.\n');

    if (!options.force) {
      const confirmed = await confirmReset();
      if (!confirmed) {
        console.log('\nReset cancelled.');
        return;
      }
    }

    try {
      await withContext(({ engine }) => engine.resetSyncState());
      console.log('\nSync state has been reset.');
      console.log('The next sync will create events for all eligible assignments.');
    } catch (error) {
      logger.error(`Reset failed: ${safeErrorMessage(error)}`);
      console.error(`\nReset failed: ${safeErrorMessage(error)}`);
      process.exitCode = 1;
    }
  });
