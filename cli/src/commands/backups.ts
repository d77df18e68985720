import { Command } from 'commander';
import { formatBytes } from '@mnemy/shared';
import type { BackupsByGame } from '@mnemy/shared';

import { withServices } from '../context.js';
import { wrapCommand } from '../utils/errorHandler.js';
import { printFailure, printJson, printSuccess, printWarning } from '../utils/output.js';

interface ListOptions {
  json?: boolean;
}

function selectGame(backups: BackupsByGame, gameName: string | undefined): BackupsByGame {
  if (gameName === undefined) {
    return backups;
  }
  return Object.hasOwn(backups, gameName) ? { [gameName]: backups[gameName] } : {};
}

export function createBackupsCommand(): Command {
  const backupsCommand = new Command('backups')
    .description('Backup history kept by the server');

  backupsCommand
    .command('list [game]')
    .description('List backups, optionally for one game')
    .option('--json', 'Output as JSON')
    .action(wrapCommand('listing backups', async (game: string | undefined, options: ListOptions) => {
      await withServices(async ({ sync }) => {
        const backups = selectGame(await sync.listBackups(), game);

        if (options.json) {
          printJson(backups);
          return;
        }

        const entries = Object.entries(backups);
        if (entries.length === 0) {
          console.log(game === undefined ? 'No backups found.' : `No backups found for ${game}.`);
          return;
        }

        for (const [gameName, items] of entries) {
          console.log(`${gameName} (${items.length} backups)`);
          for (const item of items) {
            console.log(`  ${item.filename} (${formatBytes(item.size_bytes)})`);
          }
        }
      });
    }, (_game: string | undefined, options: ListOptions) => ({ json: options.json })));

  backupsCommand
    .command('restore <game> <backup>')
    .description('Restore a backup on the server and download it')
    .action(wrapCommand('restoring backup', async (game: string, backup: string) => {
      await withServices(async ({ sync }) => {
        if (await sync.restoreBackup(game, backup)) {
          printSuccess(`Backup ${backup} restored for ${game}`);
        } else {
          printFailure(`Server did not restore backup ${backup}`);
          process.exitCode = 1;
        }
      });
    }));

  backupsCommand
    .command('delete <game> <backup>')
    .description('Delete a backup on the server')
    .action(wrapCommand('deleting backup', async (game: string, backup: string) => {
      await withServices(async ({ sync }) => {
        const deleted = await sync.deleteBackup(game, backup);
        if (deleted === null) {
          printWarning('Backup not found on server');
        } else if (deleted) {
          printSuccess(`Backup deleted: ${backup}`);
        } else {
          printFailure(`Server refused to delete backup ${backup}`);
          process.exitCode = 1;
        }
      });
    }));

  return backupsCommand;
}
