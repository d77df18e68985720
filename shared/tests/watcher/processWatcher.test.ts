/**
 * Tests for the process watcher loop with a scripted process list.
 */

import { describe, it, before, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';

import { ProcessWatcher, WATCHER_EVENTS } from '../../src/watcher/ProcessWatcher.js';
import { GameRegistry } from '../../src/registry/GameRegistry.js';
import { IN_MEMORY_DATABASE, openDatabase } from '../../src/db/index.js';
import { ApiError, ErrorCode } from '../../src/utils/errors.js';
import { logger } from '../../src/utils/logging/logger.js';

import type { Game } from '../../src/db/schema.js';
import type { ProcessLister } from '../../src/watcher/processes.js';
import type { SyncResult } from '../../src/sync/types.js';

/**
 * Returns the scripted listings in order, then the last one forever.
 */
class ScriptedLister implements ProcessLister {
  calls = 0;

  constructor(private readonly script: Array<string[] | Error>) {}

  async list(): Promise<string[]> {
    const step = this.script[Math.min(this.calls, this.script.length - 1)];
    this.calls++;
    if (step instanceof Error) {
      throw step;
    }
    return step;
  }
}

describe('ProcessWatcher', () => {
  let registry: GameRegistry;
  let synced: string[];
  let syncError: Error | null;
  const sync = {
    syncSaves: async (game: Game): Promise<SyncResult> => {
      synced.push(game.gameName);
      if (syncError) {
        throw syncError;
      }
      return { gameName: game.gameName, direction: 'upload', uploadedFiles: 2 };
    },
  };

  before(() => {
    logger.configure({ console: false, logDir: null });
  });

  beforeEach(async () => {
    registry = new GameRegistry(openDatabase(IN_MEMORY_DATABASE));
    synced = [];
    syncError = null;
    await registry.addGame({ gameName: 'Celeste', savesPath: '/saves/celeste', gamePath: 'C:\\Games\\Celeste.exe' });
  });

  afterEach(async () => {
    await registry.dispose();
  });

  function createWatcher(lister: ProcessLister): ProcessWatcher {
    return new ProcessWatcher({ registry, sync, lister, startPollMs: 1, exitPollMs: 1 });
  }

  it('should sync a game after it exits', async () => {
    const watcher = createWatcher(new ScriptedLister([[], ['explorer.exe', 'Celeste.exe'], ['Celeste.exe'], ['explorer.exe']]));
    const events: string[] = [];

    watcher.on(WATCHER_EVENTS.GAME_STARTED, (game: Game, processName: string) => {
      events.push(`started ${game.gameName} ${processName}`);
    });
    watcher.on(WATCHER_EVENTS.GAME_EXITED, (game: Game) => {
      events.push(`exited ${game.gameName}`);
    });
    watcher.on(WATCHER_EVENTS.SYNC_COMPLETED, (game: Game, result: SyncResult) => {
      events.push(`synced ${game.gameName} ${result.direction}`);
      watcher.stop();
    });

    await watcher.start();

    assert.deepStrictEqual(events, ['started Celeste Celeste.exe', 'exited Celeste', 'synced Celeste upload']);
    assert.deepStrictEqual(synced, ['Celeste']);
    assert.strictEqual(watcher.isRunning, false);
  });

  it('should report a failed sync and keep watching', async () => {
    syncError = new ApiError(ErrorCode.SERVER_UNREACHABLE, 'down');
    const lister = new ScriptedLister([['Celeste.exe'], [], ['Celeste.exe'], []]);
    const watcher = createWatcher(lister);
    const failures: string[] = [];

    watcher.on(WATCHER_EVENTS.SYNC_FAILED, (game: Game, error: unknown) => {
      failures.push(`${game.gameName}: ${error instanceof Error ? error.message : String(error)}`);
      if (failures.length === 2) {
        watcher.stop();
      }
    });

    await watcher.start();

    assert.deepStrictEqual(failures, ['Celeste: down', 'Celeste: down']);
    assert.deepStrictEqual(synced, ['Celeste', 'Celeste']);
  });

  it('should treat a failed listing as nothing running', async () => {
    const watcher = createWatcher(new ScriptedLister([new Error('ps failed'), ['Celeste.exe'], []]));
    watcher.on(WATCHER_EVENTS.SYNC_COMPLETED, () => watcher.stop());

    await watcher.start();

    assert.deepStrictEqual(synced, ['Celeste']);
  });

  it('should ignore games without a saves path or executable', async () => {
    await registry.addGame({ gameName: 'Hades', gamePath: '/opt/hades/Hades' });
    const lister = new ScriptedLister([['Hades']]);
    const watcher = createWatcher(lister);
    let started = 0;
    watcher.on(WATCHER_EVENTS.GAME_STARTED, () => started++);

    const running = watcher.start();
    while (lister.calls < 5) {
      await new Promise((resolve) => setTimeout(resolve, 1));
    }
    watcher.stop();
    await running;

    assert.strictEqual(started, 0);
    assert.deepStrictEqual(synced, []);
  });

  it('should stop while waiting for a game to start', async () => {
    const watcher = createWatcher(new ScriptedLister([[]]));

    const running = watcher.start();
    assert.strictEqual(watcher.isRunning, true);
    setTimeout(() => watcher.stop(), 10);
    await running;

    assert.strictEqual(watcher.isRunning, false);
  });

  it('should stop while a game is running without syncing', async () => {
    const watcher = createWatcher(new ScriptedLister([['Celeste.exe']]));
    watcher.on(WATCHER_EVENTS.GAME_STARTED, () => {
      setTimeout(() => watcher.stop(), 5);
    });

    await watcher.start();

    assert.deepStrictEqual(synced, []);
  });

  it('should refuse to start twice', async () => {
    const watcher = createWatcher(new ScriptedLister([[]]));

    const running = watcher.start();
    await assert.rejects(watcher.start(), { message: 'Process watcher is already running' });
    watcher.stop();
    await running;
  });

  it('should list only games it can act on as candidates', async () => {
    await registry.addGame({ gameName: 'Hades', gamePath: '/opt/hades/Hades' });
    const watcher = createWatcher(new ScriptedLister([[]]));

    assert.deepStrictEqual((await watcher.loadCandidates()).map((game) => game.gameName), ['Celeste']);
  });
});
