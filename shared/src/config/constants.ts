/**
 * Centralized Constants Configuration
 *
 * Namespaced access to the timeouts, intervals, limits and retry settings used
 * throughout the client. Values marked as overridable come from env.ts.
 *
 * Usage:
 *   import { TIMEOUTS, INTERVALS, RETRY } from '../config/constants.js';
 *
 *   await fetch(url, { signal: AbortSignal.timeout(TIMEOUTS.HTTP.REQUEST) });
 */

import {
  HTTP_REQUEST_TIMEOUT_MS,
  HTTP_HEALTH_CHECK_TIMEOUT_MS,
  HTTP_TRANSFER_TIMEOUT_MS,
  WATCHER_START_POLL_MS,
  WATCHER_EXIT_POLL_MS,
  RETRY_MAX_ATTEMPTS,
  RETRY_BASE_DELAY_MS,
  RETRY_MAX_DELAY_MS,
} from './env.js';

export const TIMEOUTS = {
  /**
   * HTTP timeout configuration
   */
  HTTP: {
    /** Default timeout for server requests (default: 30s) */
    REQUEST: HTTP_REQUEST_TIMEOUT_MS,
    /** Timeout for the server health endpoint (default: 5s) */
    HEALTH_CHECK: HTTP_HEALTH_CHECK_TIMEOUT_MS,
    /** Whole upload or download of a saves archive (default: 10min) */
    TRANSFER: HTTP_TRANSFER_TIMEOUT_MS,
  },
} as const;

export const INTERVALS = {
  /**
   * Process watcher polling
   */
  WATCHER: {
    /** Poll interval while waiting for any registered game to start (default: 10s) */
    START_POLL: WATCHER_START_POLL_MS,
    /** Poll interval while waiting for a running game to exit (default: 1s) */
    EXIT_POLL: WATCHER_EXIT_POLL_MS,
  },
} as const;

export const RETRY = {
  /**
   * Default retry configuration
   */
  DEFAULT: {
    /** Maximum retry attempts (default: 3) */
    MAX_ATTEMPTS: RETRY_MAX_ATTEMPTS,
    /** Base delay between retries in ms (default: 1000) */
    BASE_DELAY_MS: RETRY_BASE_DELAY_MS,
    /** Upper bound for a single delay in ms (default: 10000) */
    MAX_DELAY_MS: RETRY_MAX_DELAY_MS,
    /** Exponential growth factor */
    BACKOFF_MULTIPLIER: 2,
    /** Jitter as a fraction of the delay */
    JITTER_FACTOR: 0.3,
  },
} as const;

export const LIMITS = {
  /**
   * Linux truncates process names reported by `ps -o comm` to 15 characters
   */
  PROCESS_NAME_TRUNCATION: 15,
} as const;

export const FILE_NAMES = {
  SETTINGS: 'settings.json',
  CREDENTIALS: 'credentials.json',
  SECRET_KEY: '.secret',
  DATABASE: 'mnemy.db',
  LOG_DIR: 'logs',
  COVERS_DIR: 'covers',
  TEMP_DIR: 'temp_data',
  UPLOAD_ARCHIVE: 'files.tar.gz',
} as const;

export const STEAM = {
  STORE_SEARCH_URL: 'https://store.steampowered.com/api/storesearch/',
  COVER_URL_TEMPLATE: 'https://cdn.cloudflare.steamstatic.com/steam/apps/{appId}/header.jpg',
} as const;
