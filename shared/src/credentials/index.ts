export { TokenStore } from './TokenStore.js';
export type { TokenStoreOptions, CredentialsFile } from './TokenStore.js';
