/**
 * Process watcher
 *
 * Waits for any registered game to start, waits for it to exit, then
 * synchronises its saves. Loops until stopped.
 *
 * Events:
 * - `game-started` (game, processName)
 * - `game-exited` (game)
 * - `sync-completed` (game, result)
 * - `sync-failed` (game, error)
 */

import { EventEmitter } from 'events';

import { INTERVALS } from '../config/constants.js';
import { logger } from '../utils/logging/logger.js';
import { sleepUnlessAborted } from '../utils/timing.js';
import { SystemProcessLister, executableName, processMatches } from './processes.js';

import type { AGameRegistry } from '../registry/AGameRegistry.js';
import type { Game } from '../db/schema.js';
import type { ISyncService } from '../sync/types.js';
import type { ProcessLister } from './processes.js';

export const WATCHER_EVENTS = {
  GAME_STARTED: 'game-started',
  GAME_EXITED: 'game-exited',
  SYNC_COMPLETED: 'sync-completed',
  SYNC_FAILED: 'sync-failed',
} as const;

export interface ProcessWatcherConfig {
  registry: AGameRegistry;
  sync: Pick<ISyncService, 'syncSaves'>;
  lister?: ProcessLister;
  /** Poll interval while waiting for a game to start (default: INTERVALS.WATCHER.START_POLL) */
  startPollMs?: number;
  /** Poll interval while waiting for a game to exit (default: INTERVALS.WATCHER.EXIT_POLL) */
  exitPollMs?: number;
}

interface RunningGame {
  game: Game;
  processName: string;
}

export class ProcessWatcher extends EventEmitter {
  private readonly registry: AGameRegistry;
  private readonly sync: Pick<ISyncService, 'syncSaves'>;
  private readonly lister: ProcessLister;
  private readonly startPollMs: number;
  private readonly exitPollMs: number;
  private abortController: AbortController | null = null;

  constructor(config: ProcessWatcherConfig) {
    super();
    this.registry = config.registry;
    this.sync = config.sync;
    this.lister = config.lister ?? new SystemProcessLister();
    this.startPollMs = config.startPollMs ?? INTERVALS.WATCHER.START_POLL;
    this.exitPollMs = config.exitPollMs ?? INTERVALS.WATCHER.EXIT_POLL;
  }

  get isRunning(): boolean {
    return this.abortController !== null;
  }

  /**
   * Run the watch loop. Resolves once `stop()` has been called.
   */
  async start(): Promise<void> {
    if (this.abortController) {
      throw new Error('Process watcher is already running');
    }

    const controller = new AbortController();
    this.abortController = controller;
    const { signal } = controller;
    logger.info('Process watcher started', { component: 'ProcessWatcher' });

    try {
      while (!signal.aborted) {
        const running = await this.waitForAnyGameStart(signal);
        if (!running) break;

        const { game, processName } = running;
        logger.info(`Process "${processName}" detected, waiting for it to exit`, {
          component: 'ProcessWatcher',
          gameName: game.gameName,
        });
        this.emit(WATCHER_EVENTS.GAME_STARTED, game, processName);

        const exited = await this.waitForExit(processName, signal);
        if (!exited) break;

        logger.info(`Process "${processName}" exited`, { component: 'ProcessWatcher', gameName: game.gameName });
        this.emit(WATCHER_EVENTS.GAME_EXITED, game);

        await this.syncAfterSession(game);
      }
    } finally {
      this.abortController = null;
      logger.info('Process watcher stopped', { component: 'ProcessWatcher' });
    }
  }

  stop(): void {
    this.abortController?.abort();
  }

  /**
   * Games the watcher can act on: both an executable and a save directory.
   */
  async loadCandidates(): Promise<Game[]> {
    const games = (await this.registry.getAllGames()).filter((game) => game.gamePath && game.savesPath);
    const processNames = games.map((game) => executableName(game.gamePath ?? ''));
    logger.info(`Processes to monitor: [${processNames.join(', ')}]`, { component: 'ProcessWatcher' });
    return games;
  }

  private async waitForAnyGameStart(signal: AbortSignal): Promise<RunningGame | null> {
    logger.info('Waiting for any game to start', { component: 'ProcessWatcher' });

    while (!signal.aborted) {
      const candidates = await this.loadCandidates();
      const listed = await this.listProcesses();

      for (const game of candidates) {
        const processName = executableName(game.gamePath ?? '');
        if (listed.some((name) => processMatches(processName, name))) {
          return { game, processName };
        }
      }

      logger.debug('Still waiting for any game to start', { component: 'ProcessWatcher' });
      if (!(await sleepUnlessAborted(this.startPollMs, signal))) {
        return null;
      }
    }
    return null;
  }

  /**
   * @returns false when stopped before the process exited
   */
  private async waitForExit(processName: string, signal: AbortSignal): Promise<boolean> {
    while (!signal.aborted) {
      const listed = await this.listProcesses();
      if (!listed.some((name) => processMatches(processName, name))) {
        return true;
      }
      if (!(await sleepUnlessAborted(this.exitPollMs, signal))) {
        return false;
      }
    }
    return false;
  }

  private async syncAfterSession(game: Game): Promise<void> {
    logger.info('Starting saves synchronisation', { component: 'ProcessWatcher', gameName: game.gameName });
    try {
      const result = await this.sync.syncSaves(game);
      logger.info('Synchronisation done', { component: 'ProcessWatcher', gameName: game.gameName, direction: result.direction });
      this.emit(WATCHER_EVENTS.SYNC_COMPLETED, game, result);
    } catch (error) {
      logger.error('Synchronisation failed', error, { component: 'ProcessWatcher', gameName: game.gameName });
      this.emit(WATCHER_EVENTS.SYNC_FAILED, game, error);
    }
  }

  /**
   * A failed listing counts as "nothing running".
   */
  private async listProcesses(): Promise<string[]> {
    try {
      return await this.lister.list();
    } catch (error) {
      logger.error('Failed to list processes', error, { component: 'ProcessWatcher' });
      return [];
    }
  }
}

