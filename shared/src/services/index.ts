export * from './abstracts/index.js';
export { createMnemyServices } from './bootstrap.js';
export type { MnemyServices, MnemyServicesOptions } from './bootstrap.js';
