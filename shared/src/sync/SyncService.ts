/**
 * Save synchronisation
 *
 * Compares a game's save directory with the server copy and moves data in
 * whichever direction mnemy-server decides:
 *
 * 1. Hash every file of the save directory
 * 2. POST the manifest to `/files/check_files`
 * 3. 307: the server copy wins, download it and replace the local saves
 * 4. 200: archive the missing and changed files and upload them
 *
 * Temporary archives live under `<home>/temp_data/` and are removed afterwards.
 */

import { existsSync, statSync } from 'fs';
import { mkdir, rename, rm, writeFile } from 'fs/promises';
import * as path from 'path';

import { AService } from '../services/abstracts/AService.js';
import { coverPathFor } from '../config/paths.js';
import { createArchive, extractArchive } from '../files/archive.js';
import { cleanGameName } from '../registry/GameRegistry.js';
import { hashDirectory } from '../files/manifest.js';
import { downloadImage, findSteamCoverUrl } from '../api/steamCovers.js';
import { ApiError, ErrorCode, FileSystemError, RegistryError, fromNodeFsError } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';

import type { AMnemyApiClient } from '../api/AMnemyApiClient.js';
import type { BackupsByGame, DeleteBackupResult } from '../api/types.js';
import type { AGameRegistry } from '../registry/AGameRegistry.js';
import type { Game } from '../db/schema.js';
import type {
  CoverSource,
  DeleteGameOptions,
  FetchCoversOptions,
  ISyncService,
  SyncGameOptions,
  SyncPaths,
  SyncResult,
} from './types.js';

export interface SyncServiceConfig {
  registry: AGameRegistry;
  api: AMnemyApiClient;
  paths: SyncPaths;
  /** Cover lookup used by `fetchCovers({ steam: true })` */
  steam?: CoverSource;
  /** Time source for sync timestamps */
  clock?: () => Date;
}

const steamCoverSource: CoverSource = {
  findCoverUrl: findSteamCoverUrl,
  download: downloadImage,
};

export class SyncService extends AService implements ISyncService {
  override readonly order = 50;

  private readonly registry: AGameRegistry;
  private readonly api: AMnemyApiClient;
  private readonly paths: SyncPaths;
  private readonly steam: CoverSource;
  private readonly clock: () => Date;
  private tempCounter = 0;

  constructor(config: SyncServiceConfig) {
    super();
    this.registry = config.registry;
    this.api = config.api;
    this.paths = config.paths;
    this.steam = config.steam ?? steamCoverSource;
    this.clock = config.clock ?? (() => new Date());
  }

  async syncSaves(game: Game): Promise<SyncResult> {
    const savesPath = this.requireSavesDirectory(game);
    logger.info('Synchronising saves', { component: 'SyncService', gameName: game.gameName, path: savesPath });

    const manifest = await hashDirectory(savesPath);
    const verdict = await this.api.checkFiles(game.gameName, manifest, game.lastSyncDate);

    if (verdict.action === 'download') {
      return this.downloadSaves(game);
    }

    let uploadedFiles = 0;
    if (verdict.files.length > 0) {
      const archiveFile = this.tempFile('upload');
      try {
        uploadedFiles = await createArchive(savesPath, verdict.files, archiveFile);
        if (uploadedFiles > 0) {
          await this.api.uploadArchive(game.gameName, archiveFile);
        }
      } finally {
        await rm(archiveFile, { force: true });
      }
    } else {
      logger.info('Server copy is up to date', { component: 'SyncService', gameName: game.gameName });
    }

    await this.registry.updateSyncTime(game.id, this.clock());
    logger.info('Saves uploaded', { component: 'SyncService', gameName: game.gameName, uploadedFiles });
    return { gameName: game.gameName, direction: 'upload', uploadedFiles };
  }

  /**
   * Replace the local saves with the server copy. The archive is fully
   * downloaded before the save directory is touched.
   */
  async downloadSaves(game: Game): Promise<SyncResult> {
    if (!game.savesPath) {
      throw this.noSavesPath(game);
    }

    const archiveFile = this.tempFile('download');
    try {
      await this.api.downloadArchive(game.gameName, archiveFile);
      await extractArchive(archiveFile, game.savesPath);
    } finally {
      await rm(archiveFile, { force: true });
    }

    await this.registry.updateSyncTime(game.id, this.clock());
    logger.info('Saves downloaded', { component: 'SyncService', gameName: game.gameName, path: game.savesPath });
    return { gameName: game.gameName, direction: 'download' };
  }

  /**
   * Sync a game by name. A game that was never synchronised from this
   * machine needs an explicit direction, since either side may hold the
   * only copy of the saves.
   */
  async syncGame(gameName: string, options: SyncGameOptions = {}): Promise<SyncResult> {
    const game = await this.registry.requireGame(gameName);

    if (options.direction === 'download') {
      return this.downloadSaves(game);
    }
    if (game.lastSyncDate === null && options.direction === undefined) {
      throw new RegistryError(ErrorCode.VALIDATION_FAILED, `First sync of ${game.gameName} needs a direction`, {
        context: { gameName: game.gameName },
        recoveryActions: [
          { description: `Keep the server copy: mnemy games sync "${game.gameName}" --download`, automatic: false },
          { description: `Keep the local saves: mnemy games sync "${game.gameName}" --upload`, automatic: false },
        ],
      });
    }
    return this.syncSaves(game);
  }

  /**
   * Ask the server to restore a backup, then pull the restored saves.
   *
   * @returns false when the server did not restore the backup
   */
  async restoreBackup(gameName: string, backupName: string): Promise<boolean> {
    const game = await this.registry.requireGame(gameName);

    const restored = await this.api.restoreBackup(game.gameName, backupName);
    if (!restored) {
      logger.warn('Server did not restore backup', { component: 'SyncService', gameName, backupName });
      return false;
    }

    await this.downloadSaves(game);
    return true;
  }

  async deleteBackup(gameName: string, backupName: string): Promise<DeleteBackupResult> {
    return this.api.deleteBackup(gameName, backupName);
  }

  async listBackups(): Promise<BackupsByGame> {
    return this.api.getBackupsData();
  }

  /**
   * Register every server game that is not known locally.
   *
   * @returns names of the games added
   */
  async importServerGames(): Promise<string[]> {
    const serverGames = await this.api.getGamesData();
    const known = new Set((await this.registry.getAllGames()).map((game) => game.gameName));
    const added: string[] = [];

    for (const { game_name: gameName } of serverGames) {
      if (known.has(gameName)) {
        continue;
      }
      await this.registry.addGame({ gameName, imagePath: coverPathFor(this.paths.coversDir, gameName) });
      known.add(gameName);
      added.push(gameName);
    }

    logger.info('Server games imported', { component: 'SyncService', added: added.length, total: serverGames.length });
    return added;
  }

  /**
   * Fetch missing cover images. A failure for one game is logged and the
   * remaining games are still processed. An image path the user pointed
   * outside the covers directory is left as it is.
   *
   * @returns names of the games whose cover was written
   */
  async fetchCovers(options: FetchCoversOptions = {}): Promise<string[]> {
    const written: string[] = [];

    for (const game of await this.registry.getAllGames()) {
      const coverFile = coverPathFor(this.paths.coversDir, game.gameName);
      if (existsSync(coverFile)) {
        continue;
      }

      try {
        const image = options.steam ? await this.steamCover(game.gameName) : await this.api.getGameImage(game.gameName);
        if (!image) {
          logger.debug('No cover found', { component: 'SyncService', gameName: game.gameName });
          continue;
        }

        await mkdir(this.paths.coversDir, { recursive: true });
        await writeFile(coverFile, image);
        if (game.imagePath !== coverFile && this.followsCoversDir(game.imagePath)) {
          await this.registry.updateGame(game.id, { imagePath: coverFile });
        }
        written.push(game.gameName);
      } catch (error) {
        logger.error('Failed to fetch cover', error, { component: 'SyncService', gameName: game.gameName });
      }
    }

    return written;
  }

  /**
   * Remove a game locally, and with `fromServer` on mnemy-server together
   * with its backups. The server is asked first so a refused delete leaves
   * the local entry in place.
   */
  async deleteGame(gameName: string, options: DeleteGameOptions = {}): Promise<void> {
    const game = await this.registry.requireGame(gameName);

    if (options.fromServer) {
      await this.api.deleteGame(game.gameName, true);
    }

    await this.registry.deleteGame(game.id);
    await rm(coverPathFor(this.paths.coversDir, game.gameName), { force: true });
    logger.info('Game removed', { component: 'SyncService', gameName: game.gameName, fromServer: Boolean(options.fromServer) });
  }

  /**
   * Rename a game locally and on the server. A game the server has never
   * seen (404) is renamed locally only. The new name is checked before the
   * server is asked.
   */
  async renameGame(gameName: string, newGameName: string): Promise<Game> {
    const game = await this.registry.requireGame(gameName);
    const newName = cleanGameName(newGameName);
    if (newName === game.gameName) {
      return game;
    }
    if (await this.registry.getGameByName(newName)) {
      throw new RegistryError(ErrorCode.GAME_ALREADY_EXISTS, `Game already exists: ${newName}`, {
        context: { gameName: newName },
      });
    }

    try {
      await this.api.renameGame(game.gameName, newName);
    } catch (error) {
      if (!(error instanceof ApiError && error.statusCode === 404)) {
        throw error;
      }
      logger.warn('Game is not on the server, renaming locally only', { component: 'SyncService', gameName });
    }

    const oldCover = coverPathFor(this.paths.coversDir, game.gameName);
    const newCover = coverPathFor(this.paths.coversDir, newName);
    let imagePath = game.imagePath;
    if (existsSync(oldCover)) {
      try {
        await rename(oldCover, newCover);
      } catch (error) {
        throw fromNodeFsError(error, oldCover, 'renameCover');
      }
      if (this.followsCoversDir(game.imagePath)) {
        imagePath = newCover;
      }
    } else if (game.imagePath === oldCover) {
      imagePath = newCover;
    }

    return this.registry.updateGame(game.id, { gameName: newName, imagePath });
  }

  /** A game with no image, or one kept in the covers directory, takes the fetched cover. */
  private followsCoversDir(imagePath: string | null): boolean {
    return imagePath === null || path.resolve(path.dirname(imagePath)) === path.resolve(this.paths.coversDir);
  }

  private async steamCover(gameName: string): Promise<Buffer | null> {
    const url = await this.steam.findCoverUrl(gameName);
    return url ? this.steam.download(url) : null;
  }

  private requireSavesDirectory(game: Game): string {
    if (!game.savesPath) {
      throw this.noSavesPath(game);
    }

    let isDirectory = false;
    try {
      isDirectory = statSync(game.savesPath).isDirectory();
    } catch (error) {
      throw fromNodeFsError(error, game.savesPath, 'syncSaves');
    }
    if (!isDirectory) {
      throw new FileSystemError(ErrorCode.SAVES_DIR_NOT_FOUND, `Not a directory: ${game.savesPath}`, {
        path: game.savesPath,
        context: { gameName: game.gameName },
      });
    }
    return game.savesPath;
  }

  private noSavesPath(game: Game): FileSystemError {
    return new FileSystemError(ErrorCode.SAVES_DIR_NOT_FOUND, `No save directory registered for ${game.gameName}`, {
      context: { gameName: game.gameName },
    });
  }

  private tempFile(kind: 'upload' | 'download'): string {
    this.tempCounter++;
    return path.join(this.paths.tempDir, `${kind}-${process.pid}-${Date.now()}-${this.tempCounter}.tar.gz`);
  }
}
