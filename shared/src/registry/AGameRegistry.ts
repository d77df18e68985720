import { AService } from '../services/abstracts/AService.js';

import type { Game } from '../db/schema.js';

export interface AddGameParams {
  gameName: string;
  savesPath?: string | null;
  gamePath?: string | null;
  imagePath?: string | null;
}

/**
 * Fields left undefined keep their value; `null` clears a path.
 */
export interface UpdateGameParams {
  gameName?: string;
  savesPath?: string | null;
  gamePath?: string | null;
  imagePath?: string | null;
}

export interface GamePathsToValidate {
  savesPath?: string | null;
  gamePath?: string | null;
}

export abstract class AGameRegistry extends AService {
  abstract addGame(params: AddGameParams): Promise<Game>;

  abstract updateGame(id: number, params: UpdateGameParams): Promise<Game>;

  abstract updateSyncTime(id: number, date: Date): Promise<void>;

  abstract deleteGame(id: number): Promise<boolean>;

  abstract getAllGames(): Promise<Game[]>;

  abstract getGameById(id: number): Promise<Game | undefined>;

  abstract getGameByName(gameName: string): Promise<Game | undefined>;

  abstract requireGame(gameName: string): Promise<Game>;
}
