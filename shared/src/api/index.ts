export { AMnemyApiClient } from './AMnemyApiClient.js';
export { MnemyApiClient } from './MnemyApiClient.js';
export type { MnemyApiClientConfig } from './MnemyApiClient.js';
export { findSteamCoverUrl, downloadImage, steamSearchUrl, steamCoverUrl } from './steamCovers.js';
export * from './types.js';
