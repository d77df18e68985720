/**
 * mnemy-server HTTP client
 *
 * ## API Endpoints Used
 *
 * - `GET /manage/health` - Server liveness (no token)
 * - `GET /manage/check_x_token` - Token check
 * - `POST /files/check_files` - Compare a manifest with the server copy
 * - `POST /files/upload_data` - Upload a tar.gz of changed files
 * - `GET /files/download_data` - Download the server copy as tar.gz
 * - `GET /files/get_backups_data` - Backups per game
 * - `POST /files/restore_backup` / `DELETE /files/delete_backup`
 * - `GET /files/get_image/{name}` - Cover image
 * - `GET /manage/get_games_data` - Games known to the server
 * - `DELETE /manage/delete/game/{name}` / `PATCH /manage/update_game/{name}`
 *
 * Every authenticated request carries the `x-api-token` header. The host is
 * read from settings on each request, so `mnemy server set` takes effect
 * without restarting the watcher.
 *
 * Archives are streamed from and to disk under the transfer timeout; every
 * other request runs under the request timeout.
 */

import { createWriteStream, openAsBlob } from 'fs';
import { mkdir, rm } from 'fs/promises';
import { dirname } from 'path';
import { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { z } from 'zod';

import { AMnemyApiClient } from './AMnemyApiClient.js';
import {
  BackupsDataResponseSchema,
  CheckFilesResponseSchema,
  GamesDataResponseSchema,
  ServerMessageSchema,
  TokenStatusResponseSchema,
} from './types.js';
import { FILE_NAMES, TIMEOUTS } from '../config/constants.js';
import { ApiError, ErrorCode, fromNodeFsError } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';
import { retryWithBackoff } from '../utils/retry.js';

import type { FileManifest } from '../files/manifest.js';
import type {
  BackupsByGame,
  CheckFilesRequest,
  CheckFilesResult,
  DeleteBackupResult,
  HostProvider,
  ServerGame,
  ServerMessage,
  TokenProvider,
} from './types.js';
import type { RetryConfig } from '../utils/retry.js';

export interface MnemyApiClientConfig {
  settings: HostProvider;
  tokens: TokenProvider;
  /** Per-request timeout (default: TIMEOUTS.HTTP.REQUEST) */
  requestTimeoutMs?: number;
  /** Health check timeout (default: TIMEOUTS.HTTP.HEALTH_CHECK) */
  healthCheckTimeoutMs?: number;
  /** Whole archive upload or download (default: TIMEOUTS.HTTP.TRANSFER) */
  transferTimeoutMs?: number;
  /** Retry settings for idempotent reads */
  retry?: Partial<RetryConfig>;
}

interface RequestOptions {
  method: string;
  query?: Record<string, string>;
  json?: unknown;
  body?: FormData;
  redirect?: 'follow' | 'manual';
  timeoutMs?: number;
}

const MAX_ERROR_DETAIL_LENGTH = 200;

function isTimeoutError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
}

function isFileSystemError(error: unknown): boolean {
  return error instanceof Error && 'syscall' in error;
}

function encodeName(gameName: string): string {
  return encodeURIComponent(gameName);
}

export class MnemyApiClient extends AMnemyApiClient {
  private readonly settings: HostProvider;
  private readonly tokens: TokenProvider;
  private readonly requestTimeoutMs: number;
  private readonly healthCheckTimeoutMs: number;
  private readonly transferTimeoutMs: number;
  private readonly retryConfig: Partial<RetryConfig>;

  constructor(config: MnemyApiClientConfig) {
    super();
    this.settings = config.settings;
    this.tokens = config.tokens;
    this.requestTimeoutMs = config.requestTimeoutMs ?? TIMEOUTS.HTTP.REQUEST;
    this.healthCheckTimeoutMs = config.healthCheckTimeoutMs ?? TIMEOUTS.HTTP.HEALTH_CHECK;
    this.transferTimeoutMs = config.transferTimeoutMs ?? TIMEOUTS.HTTP.TRANSFER;
    this.retryConfig = config.retry ?? {};
  }

  async checkServerHealth(host?: string): Promise<boolean> {
    const target = (host ?? this.settings.getHost()).replace(/\/+$/, '');
    if (!target) {
      return false;
    }

    try {
      const response = await fetch(`${target}/manage/health`, {
        signal: AbortSignal.timeout(this.healthCheckTimeoutMs),
      });
      logger.debug('Health check finished', { component: 'ApiClient', host: target, status: response.status });
      return response.status === 200;
    } catch (error) {
      logger.debug('Health check failed', {
        component: 'ApiClient',
        host: target,
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }

  async testToken(): Promise<boolean> {
    const endpoint = '/manage/check_x_token';
    let response: Response;
    try {
      response = await this.request(endpoint, { method: 'GET' });
    } catch (error) {
      if (error instanceof ApiError && error.code === ErrorCode.AUTH_FAILED) {
        return false;
      }
      throw error;
    }

    await this.ensureOk(response, endpoint);
    if (response.status !== 200) {
      return false;
    }
    const body = await this.readJson(response, endpoint, TokenStatusResponseSchema);
    return body.token_status;
  }

  async checkFiles(gameName: string, manifest: FileManifest, lastSyncDate: Date | null): Promise<CheckFilesResult> {
    const endpoint = '/files/check_files';
    const payload: CheckFilesRequest = {
      game_name: gameName,
      files_data: manifest,
      last_sync_date: lastSyncDate ? lastSyncDate.toISOString() : null,
    };

    const response = await this.request(endpoint, { method: 'POST', json: payload, redirect: 'manual' });
    if (response.status === 307) {
      logger.info('Server copy is newer, download required', { component: 'ApiClient', gameName });
      return { action: 'download' };
    }

    await this.ensureOk(response, endpoint);
    const body = await this.readJson(response, endpoint, CheckFilesResponseSchema);
    const files = [...body.files_data.missing_on_server, ...body.files_data.mismatched_hashes];
    logger.info('Files to upload', { component: 'ApiClient', gameName, count: files.length });
    return { action: 'upload', files };
  }

  async uploadArchive(gameName: string, archiveFile: string): Promise<ServerMessage> {
    const endpoint = '/files/upload_data';

    let archive: Blob;
    try {
      archive = await openAsBlob(archiveFile, { type: 'application/gzip' });
    } catch (error) {
      throw fromNodeFsError(error, archiveFile, 'uploadArchive');
    }

    const form = new FormData();
    form.append('file', archive, FILE_NAMES.UPLOAD_ARCHIVE);
    form.append('game_name', gameName);

    const response = await this.request(endpoint, { method: 'POST', body: form, timeoutMs: this.transferTimeoutMs });
    await this.ensureOk(response, endpoint);
    logger.info('Archive uploaded', { component: 'ApiClient', gameName, bytes: archive.size });
    return this.readJson(response, endpoint, ServerMessageSchema);
  }

  /**
   * Stream the server copy into `destFile`. A partly written file is removed
   * when the transfer fails.
   */
  async downloadArchive(gameName: string, destFile: string): Promise<void> {
    const endpoint = '/files/download_data';
    const response = await this.request(endpoint, {
      method: 'GET',
      query: { game_name: gameName },
      timeoutMs: this.transferTimeoutMs,
    });
    await this.ensureOk(response, endpoint);

    try {
      await mkdir(dirname(destFile), { recursive: true });
    } catch (error) {
      throw fromNodeFsError(error, destFile, 'downloadArchive');
    }

    const body = response.body ? Readable.fromWeb(response.body) : Readable.from([]);
    try {
      await pipeline(body, createWriteStream(destFile));
    } catch (error) {
      await rm(destFile, { force: true });
      if (isFileSystemError(error)) {
        throw fromNodeFsError(error, destFile, 'downloadArchive');
      }
      throw this.transportError(error, endpoint, this.settings.getHost(), this.transferTimeoutMs);
    }
    logger.info('Archive downloaded', { component: 'ApiClient', gameName, path: destFile });
  }

  async deleteGame(gameName: string, deleteBackups: boolean): Promise<ServerMessage> {
    const endpoint = `/manage/delete/game/${encodeName(gameName)}`;
    const response = await this.request(endpoint, {
      method: 'DELETE',
      query: deleteBackups ? { delete_backups: 'true' } : undefined,
    });
    await this.ensureOk(response, endpoint);
    logger.info('Game deleted on server', { component: 'ApiClient', gameName, deleteBackups });
    return this.readJson(response, endpoint, ServerMessageSchema);
  }

  async renameGame(gameName: string, newGameName: string): Promise<ServerMessage> {
    const endpoint = `/manage/update_game/${encodeName(gameName)}`;
    const response = await this.request(endpoint, {
      method: 'PATCH',
      query: { new_game_name: newGameName },
    });
    await this.ensureOk(response, endpoint);
    logger.info('Game renamed on server', { component: 'ApiClient', gameName, newGameName });
    return this.readJson(response, endpoint, ServerMessageSchema);
  }

  async getGamesData(): Promise<ServerGame[]> {
    const endpoint = '/manage/get_games_data';
    return retryWithBackoff(
      async () => {
        const response = await this.request(endpoint, { method: 'GET' });
        await this.ensureOk(response, endpoint);

        const contentType = response.headers.get('content-type') ?? '';
        if (!contentType.startsWith('application/json')) {
          throw new ApiError(ErrorCode.INVALID_RESPONSE, 'Server returned non-JSON response', {
            endpoint,
            statusCode: response.status,
            context: { contentType },
          });
        }

        const body = await this.readJson(response, endpoint, GamesDataResponseSchema);
        return body.games_list;
      },
      { ...this.retryConfig, operationName: 'getGamesData' }
    );
  }

  async getBackupsData(): Promise<BackupsByGame> {
    const endpoint = '/files/get_backups_data';
    return retryWithBackoff(
      async () => {
        const response = await this.request(endpoint, { method: 'GET' });
        await this.ensureOk(response, endpoint);
        return this.readJson(response, endpoint, BackupsDataResponseSchema);
      },
      { ...this.retryConfig, operationName: 'getBackupsData' }
    );
  }

  async restoreBackup(gameName: string, backupName: string): Promise<boolean> {
    const endpoint = '/files/restore_backup';
    const response = await this.request(endpoint, {
      method: 'POST',
      json: { game_name: gameName, backup_name: backupName },
    });
    await this.ensureOk(response, endpoint);
    logger.info('Backup restore requested', { component: 'ApiClient', gameName, backupName, status: response.status });
    return response.status === 200;
  }

  async deleteBackup(gameName: string, backupName: string): Promise<DeleteBackupResult> {
    const endpoint = '/files/delete_backup';
    const response = await this.request(endpoint, {
      method: 'DELETE',
      json: { game_name: gameName, backup_name: backupName },
    });
    await this.ensureOk(response, endpoint);
    logger.info('Backup delete requested', { component: 'ApiClient', gameName, backupName, status: response.status });

    if (response.status === 200) return true;
    if (response.status === 204) return null;
    return false;
  }

  async getGameImage(gameName: string): Promise<Buffer | null> {
    const endpoint = `/files/get_image/${encodeName(gameName)}`;
    const response = await this.request(endpoint, { method: 'GET' });
    if (response.status === 404) {
      return null;
    }
    await this.ensureOk(response, endpoint);
    try {
      return Buffer.from(await response.arrayBuffer());
    } catch (error) {
      throw this.transportError(error, endpoint, this.settings.getHost(), this.requestTimeoutMs);
    }
  }

  // ===========================================================================
  // Request plumbing
  // ===========================================================================

  private async request(endpoint: string, options: RequestOptions): Promise<Response> {
    const host = this.settings.getHost().replace(/\/+$/, '');
    if (!host) {
      throw new ApiError(ErrorCode.SERVER_NOT_CONFIGURED, 'Server host not configured', { endpoint });
    }

    const token = this.tokens.getToken();
    if (!token) {
      throw new ApiError(ErrorCode.TOKEN_MISSING, 'API token not found', { endpoint, host });
    }

    const url = new URL(`${host}${endpoint}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = { 'x-api-token': token };
    let body: string | FormData | undefined = options.body;
    if (options.json !== undefined) {
      headers['Content-Type'] = 'application/json';
      body = JSON.stringify(options.json);
    }

    logger.debug(`${options.method} ${endpoint}`, { component: 'ApiClient', host });

    const timeoutMs = options.timeoutMs ?? this.requestTimeoutMs;
    let response: Response;
    try {
      response = await fetch(url, {
        method: options.method,
        headers,
        body,
        redirect: options.redirect ?? 'follow',
        signal: AbortSignal.timeout(timeoutMs),
      });
    } catch (error) {
      throw this.transportError(error, endpoint, host, timeoutMs);
    }

    if (response.status === 401 || response.status === 403) {
      throw new ApiError(ErrorCode.AUTH_FAILED, 'Server rejected the API token', {
        endpoint,
        host,
        statusCode: response.status,
      });
    }

    return response;
  }

  private transportError(error: unknown, endpoint: string, host: string, timeoutMs: number): ApiError {
    if (isTimeoutError(error)) {
      return new ApiError(ErrorCode.REQUEST_TIMEOUT, `Request to ${endpoint} timed out after ${timeoutMs}ms`, {
        endpoint,
        host,
        cause: error,
      });
    }
    return new ApiError(ErrorCode.SERVER_UNREACHABLE, `Cannot reach server at ${host}`, {
      endpoint,
      host,
      cause: error,
    });
  }

  private async ensureOk(response: Response, endpoint: string): Promise<void> {
    if (response.ok) {
      return;
    }

    const detail = (await response.text()).slice(0, MAX_ERROR_DETAIL_LENGTH);
    throw new ApiError(ErrorCode.SERVER_ERROR, `Server returned ${response.status} for ${endpoint}`, {
      endpoint,
      host: this.settings.getHost(),
      statusCode: response.status,
      context: detail ? { detail } : undefined,
    });
  }

  private async readJson<T extends z.ZodTypeAny>(response: Response, endpoint: string, schema: T): Promise<z.infer<T>> {
    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      throw this.transportError(error, endpoint, this.settings.getHost(), this.requestTimeoutMs);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new ApiError(ErrorCode.INVALID_RESPONSE, `Invalid response format from ${endpoint}`, {
        endpoint,
        statusCode: response.status,
        cause: error,
      });
    }

    const parsed = schema.safeParse(raw);
    if (!parsed.success) {
      throw new ApiError(ErrorCode.INVALID_RESPONSE, `Unexpected response from ${endpoint}`, {
        endpoint,
        statusCode: response.status,
        context: { issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`) },
      });
    }
    return parsed.data;
  }
}
