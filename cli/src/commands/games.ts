import * as path from 'path';
import { Command } from 'commander';
import {
  ConfigError,
  ErrorCode,
  formatSyncDate,
  validateGamePaths,
} from '@mnemy/shared';
import type { Game, SyncDirection, SyncResult } from '@mnemy/shared';

import { withServices } from '../context.js';
import { wrapCommand } from '../utils/errorHandler.js';
import { printJson, printSuccess, printTable, printWarning } from '../utils/output.js';

interface ListOptions {
  json?: boolean;
}

interface AddOptions {
  saves: string;
  exe: string;
  image?: string;
}

interface EditOptions {
  name?: string;
  saves?: string;
  exe?: string;
  image?: string;
}

interface RemoveOptions {
  server?: boolean;
}

interface SyncOptions {
  download?: boolean;
  upload?: boolean;
}

interface ImportOptions {
  covers?: boolean;
  steam?: boolean;
}

function toJson(game: Game): Record<string, unknown> {
  return {
    id: game.id,
    gameName: game.gameName,
    savesPath: game.savesPath,
    gamePath: game.gamePath,
    imagePath: game.imagePath,
    lastSyncDate: game.lastSyncDate ? game.lastSyncDate.toISOString() : null,
  };
}

function resolveOptional(value: string | undefined): string | undefined {
  return value === undefined ? undefined : path.resolve(value);
}

function directionOf(options: SyncOptions): SyncDirection | undefined {
  if (options.download && options.upload) {
    throw new ConfigError(ErrorCode.VALIDATION_FAILED, 'Choose either --download or --upload, not both');
  }
  if (options.download) return 'download';
  if (options.upload) return 'upload';
  return undefined;
}

function describeSync(result: SyncResult): string {
  if (result.direction === 'download') {
    return `Saves of ${result.gameName} downloaded from server`;
  }
  if (result.uploadedFiles === 0) {
    return `Saves of ${result.gameName} are up to date on server`;
  }
  return `Uploaded ${result.uploadedFiles} file(s) for ${result.gameName}`;
}

export function createGamesCommand(): Command {
  const gamesCommand = new Command('games')
    .description('Games registered on this machine');

  gamesCommand
    .command('list')
    .description('List registered games')
    .option('--json', 'Output as JSON')
    .action(wrapCommand('listing games', async (options: ListOptions) => {
      await withServices(async ({ registry }) => {
        const games = await registry.getAllGames();

        if (options.json) {
          printJson(games.map(toJson));
          return;
        }

        if (games.length === 0) {
          console.log('No games registered.');
          return;
        }

        printTable(
          [
            { header: 'ID', width: 6 },
            { header: 'Name', width: 30 },
            { header: 'Last sync', width: 24 },
            { header: 'Saves path', width: 40 },
          ],
          games.map((game) => [
            String(game.id),
            game.gameName,
            formatSyncDate(game.lastSyncDate),
            game.savesPath ?? '',
          ])
        );
        console.log(`Total: ${games.length} game(s)`);
      });
    }, (options: ListOptions) => ({ json: options.json })));

  gamesCommand
    .command('add <name>')
    .description('Register a game by its save directory and executable')
    .requiredOption('--saves <dir>', 'Save directory')
    .requiredOption('--exe <file>', 'Game executable')
    .option('--image <file>', 'Cover image')
    .action(wrapCommand('adding game', async (name: string, options: AddOptions) => {
      await withServices(async ({ registry }) => {
        const savesPath = path.resolve(options.saves);
        const gamePath = path.resolve(options.exe);
        validateGamePaths({ savesPath, gamePath });

        const game = await registry.addGame({
          gameName: name,
          savesPath,
          gamePath,
          imagePath: resolveOptional(options.image),
        });
        printSuccess(`Game added: ${game.gameName} (#${game.id})`);
      });
    }));

  gamesCommand
    .command('edit <name>')
    .description('Change a game; a new name is also sent to the server')
    .option('--name <newName>', 'New game name')
    .option('--saves <dir>', 'Save directory')
    .option('--exe <file>', 'Game executable')
    .option('--image <file>', 'Cover image')
    .action(wrapCommand('editing game', async (name: string, options: EditOptions) => {
      await withServices(async ({ registry, sync }) => {
        let game = await registry.requireGame(name);
        const savesPath = resolveOptional(options.saves);
        const gamePath = resolveOptional(options.exe);
        const imagePath = resolveOptional(options.image);

        if (options.name === undefined && savesPath === undefined && gamePath === undefined && imagePath === undefined) {
          printWarning('Nothing to update');
          return;
        }

        validateGamePaths({ savesPath, gamePath });

        if (options.name !== undefined && options.name.trim() !== game.gameName) {
          game = await sync.renameGame(game.gameName, options.name);
        }
        game = await registry.updateGame(game.id, { savesPath, gamePath, imagePath });
        printSuccess(`Game updated: ${game.gameName}`);
      });
    }));

  gamesCommand
    .command('remove <name>')
    .description('Remove a game from this machine')
    .option('--server', 'Also delete the game and its backups on the server')
    .action(wrapCommand('removing game', async (name: string, options: RemoveOptions) => {
      await withServices(async ({ sync }) => {
        await sync.deleteGame(name, { fromServer: options.server });
        printSuccess(`Game removed: ${name}${options.server ? ' (also deleted on server)' : ''}`);
      });
    }));

  gamesCommand
    .command('sync <name>')
    .description('Synchronise the saves of a game now')
    .option('--download', 'Replace local saves with the server copy')
    .option('--upload', 'Send local saves to the server')
    .action(wrapCommand('synchronising saves', async (name: string, options: SyncOptions) => {
      const direction = directionOf(options);
      await withServices(async ({ sync }) => {
        const result = await sync.syncGame(name, { direction });
        printSuccess(describeSync(result));
      });
    }));

  gamesCommand
    .command('import')
    .description('Register the games stored on the server')
    .option('--covers', 'Download missing cover images')
    .option('--steam', 'Look covers up in the Steam store (implies --covers)')
    .action(wrapCommand('importing games', async (options: ImportOptions) => {
      await withServices(async ({ sync }) => {
        const added = await sync.importServerGames();
        printSuccess(`Imported ${added.length} game(s)`);
        for (const gameName of added) {
          console.log(`  + ${gameName}`);
        }

        if (options.covers || options.steam) {
          const covers = await sync.fetchCovers({ steam: options.steam });
          printSuccess(`Downloaded ${covers.length} cover(s)`);
        }
      });
    }));

  return gamesCommand;
}
