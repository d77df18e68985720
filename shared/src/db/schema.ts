import { sqliteTable, integer, text } from 'drizzle-orm/sqlite-core';

export const games = sqliteTable('games', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  gameName: text('game_name').notNull().unique(),
  savesPath: text('saves_path'),
  gamePath: text('game_path'),
  imagePath: text('image_path'),
  // null until the game has been synchronised from this machine
  lastSyncDate: integer('last_sync_date', { mode: 'timestamp_ms' }),
});

export type Game = typeof games.$inferSelect;
export type NewGame = typeof games.$inferInsert;
