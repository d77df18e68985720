import { describe, it, before, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { createMnemyServices } from '../../src/services/bootstrap.js';
import { AService } from '../../src/services/abstracts/AService.js';
import { logger } from '../../src/utils/logging/logger.js';

describe('createMnemyServices', () => {
  let home: string;

  before(() => {
    logger.configure({ console: false, logDir: null });
  });

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'mnemy-home-'));
  });

  afterEach(() => {
    rmSync(home, { recursive: true, force: true });
  });

  async function create() {
    return createMnemyServices({
      home,
      logToFile: false,
      settings: { hostOverride: '' },
      tokens: { secret: 'test-secret', tokenOverride: '' },
    });
  }

  it('should resolve paths below the data directory', async () => {
    const services = await create();
    try {
      assert.strictEqual(services.paths.home, home);
      assert.strictEqual(services.paths.databaseFile, join(home, 'mnemy.db'));
      assert.strictEqual(existsSync(services.paths.databaseFile), true);
    } finally {
      await services.dispose();
    }
  });

  it('should wire settings and tokens into the API client', async () => {
    const services = await create();
    try {
      services.settings.setHost('http://localhost:8000');
      services.tokens.saveToken('test-token');

      assert.strictEqual(services.settings.getHost(), 'http://localhost:8000');
      assert.strictEqual(services.tokens.getToken(), 'test-token');
    } finally {
      await services.dispose();
    }
  });

  it('should keep the registry between runs', async () => {
    const first = await create();
    await first.registry.addGame({ gameName: 'Celeste' });
    await first.dispose();

    const second = await create();
    try {
      assert.deepStrictEqual((await second.registry.getAllGames()).map((game) => game.gameName), ['Celeste']);
    } finally {
      await second.dispose();
    }
  });

  it('should use a throwaway database when asked to', async () => {
    const services = await createMnemyServices({ home, logToFile: false, databaseFile: ':memory:' });
    try {
      await services.registry.addGame({ gameName: 'Celeste' });
      assert.strictEqual(existsSync(join(home, 'mnemy.db')), false);
    } finally {
      await services.dispose();
    }
  });

  it('should close the database on dispose, once', async () => {
    const services = await create();
    await services.dispose();
    await services.dispose();

    await assert.rejects(services.registry.getAllGames());
  });

  it('should write log files when enabled', async () => {
    const services = await createMnemyServices({ home, logToFile: true, databaseFile: ':memory:' });
    try {
      logger.info('bootstrap test entry');
      assert.ok(logger.currentLogFile()?.startsWith(join(home, 'logs')));
    } finally {
      await services.dispose();
      logger.configure({ logDir: null });
    }
  });
});

describe('AService', () => {
  class ExampleService extends AService {
    override readonly order = 7;
  }

  it('should default to no-op lifecycle hooks', async () => {
    const service = new ExampleService();

    assert.strictEqual(service.order, 7);
    await service.initialize();
    await service.dispose();
  });
});
