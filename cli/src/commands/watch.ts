import { Command } from 'commander';
import chalk from 'chalk';
import { ProcessWatcher, WATCHER_EVENTS, formatError } from '@mnemy/shared';
import type { Game, MnemyServices, ProcessLister, SyncResult } from '@mnemy/shared';

import { withServices } from '../context.js';
import { wrapCommand } from '../utils/errorHandler.js';

export interface RunWatchOptions {
  lister?: ProcessLister;
  startPollMs?: number;
  exitPollMs?: number;
  /** Stops the watcher when aborted */
  signal?: AbortSignal;
}

function stamp(): string {
  return chalk.dim(new Date().toLocaleTimeString());
}

/**
 * Run the process watcher until the signal aborts, printing one line per event.
 */
export async function runWatch(services: Pick<MnemyServices, 'registry' | 'sync'>, options: RunWatchOptions = {}): Promise<void> {
  if (options.signal?.aborted) {
    return;
  }

  const watcher = new ProcessWatcher({
    registry: services.registry,
    sync: services.sync,
    lister: options.lister,
    startPollMs: options.startPollMs,
    exitPollMs: options.exitPollMs,
  });

  watcher.on(WATCHER_EVENTS.GAME_STARTED, (game: Game) => {
    console.log(`${stamp()} ${chalk.cyan(`${game.gameName} started`)}`);
  });
  watcher.on(WATCHER_EVENTS.GAME_EXITED, (game: Game) => {
    console.log(`${stamp()} ${game.gameName} exited, synchronising saves...`);
  });
  watcher.on(WATCHER_EVENTS.SYNC_COMPLETED, (game: Game, result: SyncResult) => {
    console.log(`${stamp()} ${chalk.green(`${game.gameName} synchronised (${result.direction})`)}`);
  });
  watcher.on(WATCHER_EVENTS.SYNC_FAILED, (game: Game, error: unknown) => {
    console.log(`${stamp()} ${chalk.red(`Sync failed for ${game.gameName}: ${formatError(error)}`)}`);
  });

  const stop = (): void => watcher.stop();
  options.signal?.addEventListener('abort', stop, { once: true });
  try {
    await watcher.start();
  } finally {
    options.signal?.removeEventListener('abort', stop);
  }
}

export function createWatchCommand(): Command {
  return new Command('watch')
    .description('Watch for registered games and sync their saves after each session')
    .action(wrapCommand('watching games', async () => {
      await withServices(async (services) => {
        const controller = new AbortController();
        const stop = (): void => controller.abort();
        process.once('SIGINT', stop);
        process.once('SIGTERM', stop);

        console.log('Watching for games. Press Ctrl+C to stop.');
        try {
          await runWatch(services, { signal: controller.signal });
        } finally {
          process.removeListener('SIGINT', stop);
          process.removeListener('SIGTERM', stop);
        }
        console.log('Watcher stopped.');
      });
    }));
}
