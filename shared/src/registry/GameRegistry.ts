import { statSync, type Stats } from 'fs';
import { asc, eq } from 'drizzle-orm';

import { AGameRegistry } from './AGameRegistry.js';
import { games } from '../db/schema.js';
import { ErrorCode, RegistryError, getErrorCode } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';

import type { DatabaseHandle } from '../db/index.js';
import type { Game } from '../db/schema.js';
import type { AddGameParams, GamePathsToValidate, UpdateGameParams } from './AGameRegistry.js';

/**
 * Trimmed game name; blank names are rejected.
 */
export function cleanGameName(gameName: string): string {
  const name = gameName.trim();
  if (!name) {
    throw new RegistryError(ErrorCode.VALIDATION_FAILED, 'Game name must not be empty');
  }
  return name;
}

function alreadyExists(gameName: string): RegistryError {
  return new RegistryError(ErrorCode.GAME_ALREADY_EXISTS, `Game already exists: ${gameName}`, {
    context: { gameName },
    recoveryActions: [{ description: 'Choose another name or edit the existing game', automatic: false }],
  });
}

/**
 * Check that a save directory and an executable exist before registering them.
 */
export function validateGamePaths(paths: GamePathsToValidate): void {
  if (paths.savesPath) {
    if (!statOrUndefined(paths.savesPath)?.isDirectory()) {
      throw new RegistryError(ErrorCode.VALIDATION_FAILED, `Saves path is not a directory: ${paths.savesPath}`, {
        context: { field: 'savesPath', path: paths.savesPath },
      });
    }
  }

  if (paths.gamePath) {
    if (!statOrUndefined(paths.gamePath)?.isFile()) {
      throw new RegistryError(ErrorCode.VALIDATION_FAILED, `Game executable is not a file: ${paths.gamePath}`, {
        context: { field: 'gamePath', path: paths.gamePath },
      });
    }
  }
}

function statOrUndefined(path: string): Stats | undefined {
  try {
    return statSync(path);
  } catch (error) {
    logger.debug('Path is not accessible', { component: 'GameRegistry', path, code: getErrorCode(error) });
    return undefined;
  }
}

export class GameRegistry extends AGameRegistry {
  constructor(private readonly database: DatabaseHandle) {
    super();
  }

  async addGame(params: AddGameParams): Promise<Game> {
    const gameName = cleanGameName(params.gameName);

    if (await this.getGameByName(gameName)) {
      throw alreadyExists(gameName);
    }

    const game = this.database.db
      .insert(games)
      .values({
        gameName,
        savesPath: params.savesPath ?? null,
        gamePath: params.gamePath ?? null,
        imagePath: params.imagePath ?? null,
        lastSyncDate: null,
      })
      .returning()
      .get();

    logger.info('Game added', { component: 'GameRegistry', gameName, id: game.id });
    return game;
  }

  async updateGame(id: number, params: UpdateGameParams): Promise<Game> {
    const existing = await this.getGameById(id);
    if (!existing) {
      throw new RegistryError(ErrorCode.GAME_NOT_FOUND, `Game not found: #${id}`, { context: { id } });
    }

    const changes: Partial<Game> = {};
    if (params.gameName !== undefined) {
      const gameName = cleanGameName(params.gameName);
      if (gameName !== existing.gameName) {
        const other = await this.getGameByName(gameName);
        if (other && other.id !== id) {
          throw alreadyExists(gameName);
        }
      }
      changes.gameName = gameName;
    }
    if (params.savesPath !== undefined) changes.savesPath = params.savesPath;
    if (params.gamePath !== undefined) changes.gamePath = params.gamePath;
    if (params.imagePath !== undefined) changes.imagePath = params.imagePath;

    if (Object.keys(changes).length === 0) {
      return existing;
    }

    const game = this.database.db.update(games).set(changes).where(eq(games.id, id)).returning().get();
    logger.info('Game updated', { component: 'GameRegistry', gameName: game.gameName, id });
    return game;
  }

  async updateSyncTime(id: number, date: Date): Promise<void> {
    this.database.db.update(games).set({ lastSyncDate: date }).where(eq(games.id, id)).run();
  }

  async deleteGame(id: number): Promise<boolean> {
    const deleted = this.database.db.delete(games).where(eq(games.id, id)).returning({ id: games.id }).all();
    if (deleted.length > 0) {
      logger.info('Game deleted', { component: 'GameRegistry', id });
    }
    return deleted.length > 0;
  }

  async getAllGames(): Promise<Game[]> {
    return this.database.db.select().from(games).orderBy(asc(games.id)).all();
  }

  async getGameById(id: number): Promise<Game | undefined> {
    return this.database.db.select().from(games).where(eq(games.id, id)).get();
  }

  async getGameByName(gameName: string): Promise<Game | undefined> {
    return this.database.db.select().from(games).where(eq(games.gameName, gameName.trim())).get();
  }

  async requireGame(gameName: string): Promise<Game> {
    const game = await this.getGameByName(gameName);
    if (!game) {
      throw new RegistryError(ErrorCode.GAME_NOT_FOUND, `Game not found: ${gameName}`, {
        context: { gameName },
      });
    }
    return game;
  }

  override async dispose(): Promise<void> {
    this.database.close();
  }
}
