import { AService } from '../services/abstracts/AService.js';

import type { FileManifest } from '../files/manifest.js';
import type {
  BackupsByGame,
  CheckFilesResult,
  DeleteBackupResult,
  ServerGame,
  ServerMessage,
} from './types.js';

/**
 * HTTP surface of mnemy-server used by the client.
 *
 * @see MnemyApiClient for the fetch implementation
 */
export abstract class AMnemyApiClient extends AService {
  /**
   * `true` when `{host}/manage/health` answers 200. Never throws.
   */
  abstract checkServerHealth(host?: string): Promise<boolean>;

  abstract testToken(): Promise<boolean>;

  abstract checkFiles(gameName: string, manifest: FileManifest, lastSyncDate: Date | null): Promise<CheckFilesResult>;

  abstract uploadArchive(gameName: string, archiveFile: string): Promise<ServerMessage>;

  abstract downloadArchive(gameName: string, destFile: string): Promise<void>;

  abstract deleteGame(gameName: string, deleteBackups: boolean): Promise<ServerMessage>;

  abstract renameGame(gameName: string, newGameName: string): Promise<ServerMessage>;

  abstract getGamesData(): Promise<ServerGame[]>;

  abstract getBackupsData(): Promise<BackupsByGame>;

  abstract restoreBackup(gameName: string, backupName: string): Promise<boolean>;

  abstract deleteBackup(gameName: string, backupName: string): Promise<DeleteBackupResult>;

  abstract getGameImage(gameName: string): Promise<Buffer | null>;
}
