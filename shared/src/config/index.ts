export * from './env.js';
export * from './constants.js';
export { resolvePaths, coverPathFor } from './paths.js';
export type { MnemyPaths } from './paths.js';
export { SettingsStore, SettingsFileSchema, normalizeHost } from './settings.js';
export type { SettingsFile, SettingsStoreOptions } from './settings.js';
