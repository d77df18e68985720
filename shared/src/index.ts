/**
 * Shared core of the Mnemy client: configuration, logging, errors, the local
 * games registry, the mnemy-server API client, save synchronisation and the
 * process watcher.
 */

// =============================================================================
// UTILITIES - Logging, errors, encryption, retry, formatting
// =============================================================================
export * from './utils/index.js';

// =============================================================================
// DOMAIN MODULES
// =============================================================================

// Configuration and settings.json
export * from './config/index.js';

// API token storage
export * from './credentials/index.js';

// Local database
export { openDatabase, IN_MEMORY_DATABASE, games } from './db/index.js';
export type { DatabaseHandle, MnemyDatabase, Game, NewGame } from './db/index.js';

// Games registry
export * from './registry/index.js';

// Save manifests and archives
export * from './files/index.js';

// mnemy-server HTTP client
export * from './api/index.js';

// Save synchronisation
export * from './sync/index.js';

// Process watcher
export * from './watcher/index.js';

// =============================================================================
// SERVICES - Lifecycle and bootstrap
// =============================================================================
export { AService, createMnemyServices } from './services/index.js';
export type { MnemyServices, MnemyServicesOptions } from './services/index.js';
