/**
 * Service Bootstrap
 *
 * Builds the client's services for one data directory and initializes them
 * in order of their `order` property. `dispose()` tears them down in reverse.
 *
 * @example
 * ```typescript
 * const services = await createMnemyServices({ home: '/tmp/mnemy' });
 * try {
 *   await services.sync.syncGame('Hollow Knight');
 * } finally {
 *   await services.dispose();
 * }
 * ```
 */
import { resolvePaths } from '../config/paths.js';
import { LOG_TO_FILE } from '../config/env.js';
import { SettingsStore } from '../config/settings.js';
import { TokenStore } from '../credentials/TokenStore.js';
import { openDatabase } from '../db/index.js';
import { GameRegistry } from '../registry/GameRegistry.js';
import { MnemyApiClient } from '../api/MnemyApiClient.js';
import { SyncService } from '../sync/SyncService.js';
import { logger } from '../utils/logging/logger.js';

import type { AService } from './abstracts/AService.js';
import type { MnemyPaths } from '../config/paths.js';
import type { SettingsStoreOptions } from '../config/settings.js';
import type { TokenStoreOptions } from '../credentials/TokenStore.js';
import type { AGameRegistry } from '../registry/AGameRegistry.js';
import type { AMnemyApiClient } from '../api/AMnemyApiClient.js';

export interface MnemyServicesOptions {
  /** Data directory (default: MNEMY_HOME) */
  home?: string;
  /** Write daily log files under `<home>/logs` (default: LOG_TO_FILE) */
  logToFile?: boolean;
  settings?: SettingsStoreOptions;
  tokens?: TokenStoreOptions;
  /** Database file; ':memory:' for a throwaway registry (default: `<home>/mnemy.db`) */
  databaseFile?: string;
}

export interface MnemyServices {
  paths: MnemyPaths;
  settings: SettingsStore;
  tokens: TokenStore;
  registry: AGameRegistry;
  api: AMnemyApiClient;
  sync: SyncService;
  dispose(): Promise<void>;
}

export async function createMnemyServices(options: MnemyServicesOptions = {}): Promise<MnemyServices> {
  const paths = resolvePaths(options.home);

  if (options.logToFile ?? LOG_TO_FILE) {
    logger.configure({ logDir: paths.logDir });
  }

  const settings = new SettingsStore(paths.settingsFile, options.settings);
  const tokens = new TokenStore(paths.credentialsFile, paths.secretKeyFile, options.tokens);
  const registry = new GameRegistry(openDatabase(options.databaseFile ?? paths.databaseFile));
  const api = new MnemyApiClient({ settings, tokens });
  const sync = new SyncService({ registry, api, paths });

  const services: AService[] = [settings, tokens, registry, api, sync].sort((a, b) => a.order - b.order);
  for (const service of services) {
    await service.initialize();
  }
  logger.debug('Services initialized', { component: 'Bootstrap', home: paths.home });

  let disposed = false;
  return {
    paths,
    settings,
    tokens,
    registry,
    api,
    sync,
    dispose: async () => {
      if (disposed) return;
      disposed = true;
      for (const service of [...services].reverse()) {
        await service.dispose();
      }
    },
  };
}
