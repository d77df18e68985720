import { Command } from 'commander';

import { setHome } from './context.js';
import { createBackupsCommand } from './commands/backups.js';
import { createGamesCommand } from './commands/games.js';
import { createServerCommand } from './commands/server.js';
import { createTokenCommand } from './commands/token.js';
import { createWatchCommand } from './commands/watch.js';

interface GlobalOptions {
  home?: string;
  verbose?: boolean;
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('mnemy')
    .description('Back up and synchronise game saves with a mnemy-server')
    .version('1.0.0')
    .option('--home <dir>', 'Data directory (default: MNEMY_HOME or ~/.mnemy)')
    .option('-v, --verbose', 'Print log output')
    .hook('preAction', (thisCommand) => {
      const options = thisCommand.opts<GlobalOptions>();
      setHome(options.home);
    });

  program.addCommand(createServerCommand());
  program.addCommand(createTokenCommand());
  program.addCommand(createGamesCommand());
  program.addCommand(createBackupsCommand());
  program.addCommand(createWatchCommand());

  return program;
}

/**
 * `-v`/`--verbose` is read before parsing so logging is configured before
 * any service starts.
 */
export function hasVerboseFlag(argv: readonly string[]): boolean {
  return argv.includes('-v') || argv.includes('--verbose');
}
