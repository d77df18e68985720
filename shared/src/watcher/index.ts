export { ProcessWatcher, WATCHER_EVENTS } from './ProcessWatcher.js';
export type { ProcessWatcherConfig } from './ProcessWatcher.js';
export {
  SystemProcessLister,
  normalizeProcessName,
  executableName,
  processMatches,
  parseTasklistCsv,
  parsePsOutput,
} from './processes.js';
export type { ProcessLister } from './processes.js';
