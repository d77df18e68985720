/**
 * Local database - SQLite with Drizzle ORM
 *
 * The games registry lives in a single SQLite file under the client's data
 * directory. The table is created on open, so a fresh data directory needs no
 * migration step. Pass ':memory:' for a throwaway database.
 */

import { mkdirSync } from 'fs';
import { dirname } from 'path';
import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';

import * as schema from './schema.js';
import { fromNodeFsError } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';

export * from './schema.js';

export type MnemyDatabase = BetterSQLite3Database<typeof schema>;

export interface DatabaseHandle {
  db: MnemyDatabase;
  sqlite: Database.Database;
  close(): void;
}

const CREATE_GAMES_TABLE = `
  CREATE TABLE IF NOT EXISTS games (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    game_name TEXT NOT NULL UNIQUE,
    saves_path TEXT,
    game_path TEXT,
    image_path TEXT,
    last_sync_date INTEGER
  )
`;

export const IN_MEMORY_DATABASE = ':memory:';

export function openDatabase(file: string): DatabaseHandle {
  if (file !== IN_MEMORY_DATABASE) {
    try {
      mkdirSync(dirname(file), { recursive: true });
    } catch (error) {
      throw fromNodeFsError(error, dirname(file), 'openDatabase');
    }
  }

  const sqlite = new Database(file);
  sqlite.pragma('journal_mode = WAL');
  sqlite.exec(CREATE_GAMES_TABLE);
  logger.debug('Database opened', { component: 'Database', file });

  return {
    db: drizzle(sqlite, { schema }),
    sqlite,
    close: () => {
      if (sqlite.open) {
        sqlite.close();
      }
    },
  };
}
