import { Command } from 'commander';
import { syncCommand } from './commands/sync.js';
import { statusCommand } from './commands/status.js';
import { settingsCommand } from './commands/settings.js';
import { permissionCommand } from './commands/permission.js';
import { watchCommand } from './commands/watch.js';
import { resetCommand } from './commands/reset.js';

export function createCLI(): Command {
  const program = new Command();

  program
    .name('duesync')
    .description('Sync Canvas assignment deadlines to your calendar')
    .version('1.0.0');

  program.addCommand(syncCommand);
  program.addCommand(statusCommand);
  program.addCommand(settingsCommand);
  program.addCommand(permissionCommand);
  program.addCommand(watchCommand);
  program.addCommand(resetCommand);

  return program;
}
