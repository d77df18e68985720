import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import { z } from 'zod';

import { AService } from '../services/abstracts/AService.js';
import { ConfigError, ErrorCode } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';
import { MNEMY_HOST } from './env.js';

/**
 * settings.json layout. Unknown keys are kept when the file is rewritten.
 */
export const SettingsFileSchema = z
  .object({
    host: z.string().optional(),
  })
  .passthrough();

export type SettingsFile = z.infer<typeof SettingsFileSchema>;

export interface SettingsStoreOptions {
  /** Overrides the host stored in the file (MNEMY_HOST) */
  hostOverride?: string;
}

/**
 * Strip trailing slashes and check that the host is an http(s) URL.
 */
export function normalizeHost(host: string): string {
  const trimmed = host.trim().replace(/\/+$/, '');

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch (error) {
    throw new ConfigError(ErrorCode.VALIDATION_FAILED, `Invalid server address: ${host}`, {
      cause: error,
      recoveryActions: [{ description: 'Use a full URL such as http://192.168.1.10:8000', automatic: false }],
    });
  }

  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new ConfigError(ErrorCode.VALIDATION_FAILED, `Server address must use http or https: ${host}`, {
      recoveryActions: [{ description: 'Use a full URL such as http://192.168.1.10:8000', automatic: false }],
    });
  }

  return trimmed;
}

/**
 * Client settings persisted in `<home>/settings.json`.
 */
export class SettingsStore extends AService {
  private readonly hostOverride: string;

  constructor(
    private readonly settingsFile: string,
    options: SettingsStoreOptions = {}
  ) {
    super();
    this.hostOverride = options.hostOverride ?? MNEMY_HOST;
  }

  get filePath(): string {
    return this.settingsFile;
  }

  /**
   * Read the file; a missing, unreadable or malformed file yields `{}`.
   */
  read(): SettingsFile {
    if (!existsSync(this.settingsFile)) {
      return {};
    }

    try {
      const raw: unknown = JSON.parse(readFileSync(this.settingsFile, 'utf-8'));
      const parsed = SettingsFileSchema.safeParse(raw);
      if (!parsed.success) {
        logger.error('Invalid settings file', parsed.error.issues, {
          component: 'SettingsStore',
          path: this.settingsFile,
        });
        return {};
      }
      return parsed.data;
    } catch (error) {
      logger.error('Failed to read settings file', error, {
        component: 'SettingsStore',
        path: this.settingsFile,
      });
      return {};
    }
  }

  getHost(): string {
    if (this.hostOverride) {
      return this.hostOverride.replace(/\/+$/, '');
    }
    return this.read().host ?? '';
  }

  /**
   * Whether the host comes from the environment rather than the file.
   */
  isHostOverridden(): boolean {
    return this.hostOverride !== '';
  }

  setHost(host: string): string {
    const normalized = normalizeHost(host);
    this.write({ ...this.read(), host: normalized });
    logger.info('Server address saved', { component: 'SettingsStore', host: normalized });
    return normalized;
  }

  private write(settings: SettingsFile): void {
    mkdirSync(dirname(this.settingsFile), { recursive: true });
    writeFileSync(this.settingsFile, JSON.stringify(settings, null, 2) + '\n', 'utf-8');
  }
}
