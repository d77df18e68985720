import * as path from 'path';

import { FILE_NAMES } from './constants.js';
import { MNEMY_HOME } from './env.js';

/**
 * Locations of every file the client keeps under its data directory.
 */
export interface MnemyPaths {
  home: string;
  settingsFile: string;
  credentialsFile: string;
  secretKeyFile: string;
  databaseFile: string;
  logDir: string;
  coversDir: string;
  tempDir: string;
}

export function resolvePaths(home: string = MNEMY_HOME): MnemyPaths {
  const root = path.resolve(home);
  return {
    home: root,
    settingsFile: path.join(root, FILE_NAMES.SETTINGS),
    credentialsFile: path.join(root, FILE_NAMES.CREDENTIALS),
    secretKeyFile: path.join(root, FILE_NAMES.SECRET_KEY),
    databaseFile: path.join(root, FILE_NAMES.DATABASE),
    logDir: path.join(root, FILE_NAMES.LOG_DIR),
    coversDir: path.join(root, FILE_NAMES.COVERS_DIR),
    tempDir: path.join(root, FILE_NAMES.TEMP_DIR),
  };
}

/**
 * Cover images are stored by game name, as the server and the Steam
 * lookup both key covers by name. The name is percent-encoded so that
 * distinct names never share a file.
 */
export function coverPathFor(coversDir: string, gameName: string): string {
  const safeName = encodeURIComponent(gameName).replace(/\*/g, '%2A');
  return path.join(coversDir, `${safeName}.jpg`);
}
