export { AGameRegistry } from './AGameRegistry.js';
export type { AddGameParams, UpdateGameParams, GamePathsToValidate } from './AGameRegistry.js';
export { GameRegistry, cleanGameName, validateGamePaths } from './GameRegistry.js';
