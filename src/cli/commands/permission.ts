import { Command } from 'commander';
import { permissionGuidance } from '../../permissions/gate.js';
import { withContext } from '../context.js';

interface PermissionOptions {
  request?: boolean;
}

export const permissionCommand = new Command('permission')
  .description('Check or request access to the device calendar')
  .option('--request', 'Ask the system for calendar access')
  .action(async (options: PermissionOptions) => {
    await withContext(async ({ engine }) => {
      const status = options.request ? await engine.requestPermission() : await engine.checkPermission();

      console.log(`\nCalendar permission: ${status}`);
      console.log(permissionGuidance(status));
      console.log('');

      if (status !== 'granted') {
        process.exitCode = 1;
      }
    });
  });
