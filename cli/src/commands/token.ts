import { Command } from 'commander';

import { withServices } from '../context.js';
import { wrapCommand } from '../utils/errorHandler.js';
import { printFailure, printSuccess } from '../utils/output.js';

export function createTokenCommand(): Command {
  const tokenCommand = new Command('token')
    .description('API token used to authenticate with mnemy-server');

  tokenCommand
    .command('set <token>')
    .description('Store the API token (encrypted)')
    .action(wrapCommand('saving token', async (token: string) => {
      await withServices(async ({ tokens }) => {
        tokens.saveToken(token);
        printSuccess('API token saved');
      });
    }));

  tokenCommand
    .command('test')
    .description('Check the stored token against the server')
    .action(wrapCommand('testing token', async () => {
      await withServices(async ({ api }) => {
        if (await api.testToken()) {
          printSuccess('Token is valid');
        } else {
          printFailure('Token is invalid');
          process.exitCode = 1;
        }
      });
    }));

  tokenCommand
    .command('clear')
    .description('Remove the stored token')
    .action(wrapCommand('clearing token', async () => {
      await withServices(async ({ tokens }) => {
        tokens.clearToken();
        printSuccess('API token removed');
      });
    }));

  return tokenCommand;
}
