import type { BackupsByGame, DeleteBackupResult } from '../api/types.js';
import type { Game } from '../db/schema.js';

export type SyncDirection = 'download' | 'upload';

export type SyncResult =
  | { gameName: string; direction: 'download' }
  | { gameName: string; direction: 'upload'; uploadedFiles: number };

export interface SyncGameOptions {
  /** Required when the game has never been synchronised from this machine */
  direction?: SyncDirection;
}

export interface FetchCoversOptions {
  /** Look covers up in the Steam store instead of asking mnemy-server */
  steam?: boolean;
}

export interface DeleteGameOptions {
  /** Also delete the game and its backups on mnemy-server */
  fromServer?: boolean;
}

export interface CoverSource {
  findCoverUrl(gameName: string): Promise<string | null>;
  download(url: string): Promise<Buffer | null>;
}

export interface SyncPaths {
  tempDir: string;
  coversDir: string;
}

export interface ISyncService {
  syncSaves(game: Game): Promise<SyncResult>;
  downloadSaves(game: Game): Promise<SyncResult>;
  syncGame(gameName: string, options?: SyncGameOptions): Promise<SyncResult>;
  restoreBackup(gameName: string, backupName: string): Promise<boolean>;
  deleteBackup(gameName: string, backupName: string): Promise<DeleteBackupResult>;
  listBackups(): Promise<BackupsByGame>;
  importServerGames(): Promise<string[]>;
  fetchCovers(options?: FetchCoversOptions): Promise<string[]>;
  deleteGame(gameName: string, options?: DeleteGameOptions): Promise<void>;
  renameGame(gameName: string, newGameName: string): Promise<Game>;
}
