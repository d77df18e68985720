import { Command } from 'commander';

import { withServices } from '../context.js';
import { wrapCommand } from '../utils/errorHandler.js';
import { printFailure, printSuccess, printWarning } from '../utils/output.js';

export function createServerCommand(): Command {
  const serverCommand = new Command('server')
    .description('mnemy-server address and connectivity');

  serverCommand
    .command('set <host>')
    .description('Save the server address, e.g. http://192.168.1.10:8000')
    .action(wrapCommand('setting server address', async (host: string) => {
      await withServices(async ({ settings }) => {
        const saved = settings.setHost(host);
        printSuccess(`Server address saved: ${saved}`);
        if (settings.isHostOverridden()) {
          printWarning(`MNEMY_HOST is set and takes precedence: ${settings.getHost()}`);
        }
      });
    }));

  serverCommand
    .command('show')
    .description('Show the configured server address')
    .action(wrapCommand('showing server address', async () => {
      await withServices(async ({ settings }) => {
        const host = settings.getHost();
        if (!host) {
          printWarning('Server address is not configured');
          return;
        }
        console.log(`Server: ${host}${settings.isHostOverridden() ? ' (from MNEMY_HOST)' : ''}`);
      });
    }));

  serverCommand
    .command('check [host]')
    .description('Check that the server answers its health endpoint')
    .action(wrapCommand('checking server', async (host: string | undefined) => {
      await withServices(async ({ settings, api }) => {
        const target = host ?? settings.getHost();
        if (target && await api.checkServerHealth(target)) {
          printSuccess('Server is reachable');
        } else {
          printFailure('Server is unreachable');
          process.exitCode = 1;
        }
      });
    }));

  return serverCommand;
}
