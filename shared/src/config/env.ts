/**
 * Centralized Environment Configuration
 *
 * This module is the SINGLE SOURCE OF TRUTH for all environment variables.
 * All environment variable access MUST go through this module.
 *
 * Features:
 * - Zod schema validation with type safety
 * - Default values for every optional setting
 * - Clear error messages for invalid config
 *
 * Usage:
 *   import { MNEMY_HOME, LOG_LEVEL } from '@mnemy/shared';
 *
 * DO NOT use process.env directly elsewhere in the codebase.
 */

import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';

// =============================================================================
// SCHEMA DEFINITIONS
// =============================================================================

/**
 * Helper to parse optional boolean env vars with default
 */
const optionalBoolean = (defaultValue: boolean) =>
  z
    .enum(['true', 'false', ''])
    .optional()
    .transform((val) => (val === undefined || val === '' ? defaultValue : val === 'true'));

/**
 * Helper to parse integer env vars with default
 */
const integerWithDefault = (defaultValue: number) =>
  z
    .string()
    .optional()
    .transform((val) => (val ? parseInt(val, 10) : defaultValue))
    .refine((val) => !isNaN(val), { message: 'Must be a valid integer' });

/**
 * Helper for optional string with default
 */
const optionalString = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => val || defaultValue);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

/**
 * Main environment configuration schema
 */
const envSchema = z.object({
  // -------------------------------------------------------------------------
  // Client Data Directory
  // -------------------------------------------------------------------------
  MNEMY_HOME: optionalString(path.join(os.homedir(), '.mnemy')),

  // -------------------------------------------------------------------------
  // Server Connection (overrides settings.json / credentials.json)
  // -------------------------------------------------------------------------
  MNEMY_HOST: z.string().optional(),
  MNEMY_API_TOKEN: z.string().optional(),
  MNEMY_SECRET: z.string().optional(),

  // -------------------------------------------------------------------------
  // Logging
  // -------------------------------------------------------------------------
  LOG_LEVEL: logLevelSchema.optional(),
  VERBOSE_MODE: optionalBoolean(false),
  LOG_TO_FILE: optionalBoolean(true),

  // -------------------------------------------------------------------------
  // Timeouts
  // -------------------------------------------------------------------------
  HTTP_REQUEST_TIMEOUT_MS: integerWithDefault(30000),
  HTTP_HEALTH_CHECK_TIMEOUT_MS: integerWithDefault(5000),
  HTTP_TRANSFER_TIMEOUT_MS: integerWithDefault(600000),

  // -------------------------------------------------------------------------
  // Process Watcher
  // -------------------------------------------------------------------------
  WATCHER_START_POLL_MS: integerWithDefault(10000),
  WATCHER_EXIT_POLL_MS: integerWithDefault(1000),

  // -------------------------------------------------------------------------
  // Retry Configuration
  // -------------------------------------------------------------------------
  RETRY_MAX_ATTEMPTS: integerWithDefault(3),
  RETRY_BASE_DELAY_MS: integerWithDefault(1000),
  RETRY_MAX_DELAY_MS: integerWithDefault(10000),
});

export type EnvConfig = z.infer<typeof envSchema>;

// =============================================================================
// PARSE AND VALIDATE
// =============================================================================

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Environment validation failed:');
  for (const error of parseResult.error.errors) {
    console.error(`  ${error.path.join('.')}: ${error.message}`);
  }
}

// Every field is optional, so an empty object always parses to the defaults
const parsedEnv: EnvConfig = parseResult.success ? parseResult.data : envSchema.parse({});

// =============================================================================
// EXPORTED CONFIGURATION VALUES
// =============================================================================

export const MNEMY_HOME = parsedEnv.MNEMY_HOME;
export const MNEMY_HOST = parsedEnv.MNEMY_HOST ?? '';
export const MNEMY_API_TOKEN = parsedEnv.MNEMY_API_TOKEN;
export const MNEMY_SECRET = parsedEnv.MNEMY_SECRET;

export const VERBOSE_MODE = parsedEnv.VERBOSE_MODE;
export const LOG_LEVEL = parsedEnv.LOG_LEVEL ?? (VERBOSE_MODE ? 'debug' : 'info');
export const LOG_TO_FILE = parsedEnv.LOG_TO_FILE;

export const HTTP_REQUEST_TIMEOUT_MS = parsedEnv.HTTP_REQUEST_TIMEOUT_MS;
export const HTTP_HEALTH_CHECK_TIMEOUT_MS = parsedEnv.HTTP_HEALTH_CHECK_TIMEOUT_MS;
export const HTTP_TRANSFER_TIMEOUT_MS = parsedEnv.HTTP_TRANSFER_TIMEOUT_MS;

export const WATCHER_START_POLL_MS = parsedEnv.WATCHER_START_POLL_MS;
export const WATCHER_EXIT_POLL_MS = parsedEnv.WATCHER_EXIT_POLL_MS;

export const RETRY_MAX_ATTEMPTS = parsedEnv.RETRY_MAX_ATTEMPTS;
export const RETRY_BASE_DELAY_MS = parsedEnv.RETRY_BASE_DELAY_MS;
export const RETRY_MAX_DELAY_MS = parsedEnv.RETRY_MAX_DELAY_MS;

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

export function isVerbose(): boolean {
  return VERBOSE_MODE;
}

/**
 * Validate derived configuration relationships that zod cannot express
 * field by field.
 */
export function validateEnv(): { valid: boolean; errors: string[]; warnings: string[] } {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (HTTP_REQUEST_TIMEOUT_MS <= 0) {
    errors.push('HTTP_REQUEST_TIMEOUT_MS must be a positive number');
  }
  if (HTTP_HEALTH_CHECK_TIMEOUT_MS <= 0) {
    errors.push('HTTP_HEALTH_CHECK_TIMEOUT_MS must be a positive number');
  }
  if (HTTP_TRANSFER_TIMEOUT_MS < HTTP_REQUEST_TIMEOUT_MS) {
    errors.push('HTTP_TRANSFER_TIMEOUT_MS must not be shorter than HTTP_REQUEST_TIMEOUT_MS');
  }
  if (WATCHER_START_POLL_MS <= 0) {
    errors.push('WATCHER_START_POLL_MS must be a positive number');
  }
  if (WATCHER_EXIT_POLL_MS <= 0) {
    errors.push('WATCHER_EXIT_POLL_MS must be a positive number');
  }
  if (RETRY_MAX_ATTEMPTS < 0) {
    errors.push('RETRY_MAX_ATTEMPTS must be non-negative');
  }
  if (RETRY_BASE_DELAY_MS > RETRY_MAX_DELAY_MS) {
    warnings.push(`RETRY_BASE_DELAY_MS (${RETRY_BASE_DELAY_MS}) should not exceed RETRY_MAX_DELAY_MS (${RETRY_MAX_DELAY_MS})`);
  }
  if (MNEMY_HOST && !/^https?:\/\//.test(MNEMY_HOST)) {
    warnings.push('MNEMY_HOST should start with http:// or https://');
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
