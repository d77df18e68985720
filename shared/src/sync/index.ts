export { SyncService } from './SyncService.js';
export type { SyncServiceConfig } from './SyncService.js';
export type * from './types.js';
