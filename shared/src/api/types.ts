import { z } from 'zod';

import type { FileManifest } from '../files/manifest.js';

// =============================================================================
// Response bodies
// =============================================================================

export const TokenStatusResponseSchema = z.object({
  token_status: z.boolean(),
});

export const CheckFilesResponseSchema = z.object({
  files_data: z.object({
    missing_on_server: z.array(z.string()),
    mismatched_hashes: z.array(z.string()),
  }),
});

export const ServerGameSchema = z
  .object({
    game_name: z.string(),
  })
  .passthrough();

export const GamesDataResponseSchema = z.object({
  games_list: z.array(ServerGameSchema),
});

export const BackupInfoSchema = z
  .object({
    filename: z.string(),
    size_bytes: z.number(),
  })
  .passthrough();

export const BackupsDataResponseSchema = z.record(z.string(), z.array(BackupInfoSchema));

export const ServerMessageSchema = z.record(z.string(), z.unknown());

export const SteamSearchResponseSchema = z.object({
  items: z.array(
    z
      .object({
        id: z.number(),
      })
      .passthrough()
  ),
});

export type ServerGame = z.infer<typeof ServerGameSchema>;
export type BackupInfo = z.infer<typeof BackupInfoSchema>;
export type BackupsByGame = z.infer<typeof BackupsDataResponseSchema>;
export type ServerMessage = z.infer<typeof ServerMessageSchema>;

// =============================================================================
// Client-side types
// =============================================================================

/**
 * Server verdict for a manifest: fetch the server copy, or send the listed files.
 */
export type CheckFilesResult =
  | { action: 'download' }
  | { action: 'upload'; files: string[] };

export interface CheckFilesRequest {
  game_name: string;
  files_data: FileManifest;
  last_sync_date: string | null;
}

/**
 * `true` deleted, `null` the backup was not on the server, `false` refused.
 */
export type DeleteBackupResult = boolean | null;

export interface HostProvider {
  getHost(): string;
}

export interface TokenProvider {
  getToken(): string | undefined;
}
