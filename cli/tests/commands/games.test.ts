/**
 * Tests for the games command
 *
 * - games list / add / edit / remove
 * - games sync <name> [--download|--upload]
 * - games import [--covers]
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';

import { createGamesCommand } from '../../src/commands/games.js';
import { createTestHome, jsonResponse, mockServer } from '../helpers/mocks.js';
import { runCli, setupTestEnvironment, teardownTestEnvironment } from '../helpers/testSetup.js';

import type { TestHome } from '../helpers/mocks.js';

const DASHES = '-'.repeat(100);

function tableRow(id: string, name: string, lastSync: string, savesPath: string): string {
  return id.padEnd(6) + name.padEnd(30) + lastSync.padEnd(24) + savesPath;
}

describe('Games Command', () => {
  let home: TestHome;
  let savesDir: string;
  let exeFile: string;
  let server: ReturnType<typeof mockServer> | undefined;

  beforeEach(() => {
    home = createTestHome();
    setupTestEnvironment(home.dir);

    savesDir = join(home.dir, 'saves', 'celeste');
    mkdirSync(savesDir, { recursive: true });
    writeFileSync(join(savesDir, 'slot1.sav'), 'level 3');
    exeFile = join(home.dir, 'Celeste.exe');
    writeFileSync(exeFile, '');
  });

  afterEach(() => {
    server?.restore();
    server = undefined;
    teardownTestEnvironment();
    home.cleanup();
  });

  async function addCeleste(): Promise<void> {
    await runCli(['games', 'add', 'Celeste', '--saves', savesDir, '--exe', exeFile]);
  }

  async function connect(): Promise<void> {
    await runCli(['server', 'set', 'http://localhost:8000']);
    await runCli(['token', 'set', 'test-token']);
  }

  describe('Command Structure', () => {
    it('should have all subcommands', () => {
      assert.deepStrictEqual(
        createGamesCommand().commands.map((sub) => sub.name()),
        ['list', 'add', 'edit', 'remove', 'sync', 'import']
      );
    });
  });

  describe('games list', () => {
    it('should report an empty registry', async () => {
      const result = await runCli(['games', 'list']);

      assert.deepStrictEqual(result.logs, ['No games registered.']);
    });

    it('should print registered games as a table', async () => {
      await addCeleste();

      const result = await runCli(['games', 'list']);

      assert.deepStrictEqual(result.logs, [
        DASHES,
        tableRow('ID', 'Name', 'Last sync', 'Saves path'),
        DASHES,
        tableRow('1', 'Celeste', 'never', savesDir),
        DASHES,
        'Total: 1 game(s)',
      ]);
    });

    it('should print JSON with --json', async () => {
      await addCeleste();

      const result = await runCli(['games', 'list', '--json']);

      assert.deepStrictEqual(JSON.parse(result.output), [
        {
          id: 1,
          gameName: 'Celeste',
          savesPath: savesDir,
          gamePath: exeFile,
          imagePath: null,
          lastSyncDate: null,
        },
      ]);
    });
  });

  describe('games add', () => {
    it('should register the game', async () => {
      const result = await runCli(['games', 'add', 'Celeste', '--saves', savesDir, '--exe', exeFile]);

      assert.deepStrictEqual(result.logs, ['Game added: Celeste (#1)']);
      assert.strictEqual(result.exitCode, null);
    });

    it('should reject a missing save directory', async () => {
      const missing = join(home.dir, 'nowhere');

      const result = await runCli(['games', 'add', 'Celeste', '--saves', missing, '--exe', exeFile]);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(result.errors, [`Error adding game: Saves path is not a directory: ${missing}`]);
    });

    it('should reject a duplicate name', async () => {
      await addCeleste();

      const result = await runCli(['games', 'add', 'Celeste', '--saves', savesDir, '--exe', exeFile]);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(result.errors, [
        'Error adding game: Game already exists: Celeste',
        '  - Choose another name or edit the existing game',
      ]);
    });
  });

  describe('games edit', () => {
    it('should warn when nothing changes', async () => {
      await addCeleste();

      const result = await runCli(['games', 'edit', 'Celeste']);

      assert.deepStrictEqual(result.logs, ['Nothing to update']);
    });

    it('should change the save directory', async () => {
      await addCeleste();
      const otherSaves = join(home.dir, 'saves', 'other');
      mkdirSync(otherSaves);

      const result = await runCli(['games', 'edit', 'Celeste', '--saves', otherSaves]);

      assert.deepStrictEqual(result.logs, ['Game updated: Celeste']);
      const listed = await runCli(['games', 'list', '--json']);
      assert.strictEqual(JSON.parse(listed.output)[0].savesPath, otherSaves);
    });

    it('should rename the game on the server', async () => {
      await addCeleste();
      await connect();
      server = mockServer({
        'PATCH /manage/update_game/Celeste': () => jsonResponse({ message: 'Game updated' }),
      });

      const result = await runCli(['games', 'edit', 'Celeste', '--name', 'Celeste Classic']);

      assert.deepStrictEqual(result.logs, ['Game updated: Celeste Classic']);
      assert.strictEqual(server.calls[0].url.searchParams.get('new_game_name'), 'Celeste Classic');
    });

    it('should refuse a blank name without contacting the server', async () => {
      await addCeleste();
      await connect();
      server = mockServer({
        'PATCH /manage/update_game/Celeste': () => jsonResponse({ message: 'Game updated' }),
      });

      const result = await runCli(['games', 'edit', 'Celeste', '--name', '   ']);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(result.errors, ['Error editing game: Game name must not be empty']);
      assert.strictEqual(server.calls.length, 0);
    });

    it('should fail for an unknown game', async () => {
      const result = await runCli(['games', 'edit', 'Hades', '--saves', savesDir]);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(result.errors, [
        'Error editing game: Game not found: Hades',
        '  - List registered games with: mnemy games list',
      ]);
    });
  });

  describe('games remove', () => {
    it('should remove the game locally', async () => {
      await addCeleste();

      const result = await runCli(['games', 'remove', 'Celeste']);

      assert.deepStrictEqual(result.logs, ['Game removed: Celeste']);
      const listed = await runCli(['games', 'list']);
      assert.deepStrictEqual(listed.logs, ['No games registered.']);
    });

    it('should delete the game and its backups on the server with --server', async () => {
      await addCeleste();
      await connect();
      server = mockServer({
        'DELETE /manage/delete/game/Celeste': () => jsonResponse({ message: 'Game deleted' }),
      });

      const result = await runCli(['games', 'remove', 'Celeste', '--server']);

      assert.deepStrictEqual(result.logs, ['Game removed: Celeste (also deleted on server)']);
      assert.strictEqual(server.calls[0].url.search, '?delete_backups=true');
    });
  });

  describe('games sync', () => {
    beforeEach(async () => {
      await addCeleste();
      await connect();
    });

    it('should reject both directions at once', async () => {
      server = mockServer({});

      const result = await runCli(['games', 'sync', 'Celeste', '--download', '--upload']);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(result.errors, [
        'Error synchronising saves: Choose either --download or --upload, not both',
      ]);
      assert.strictEqual(server.calls.length, 0);
    });

    it('should ask for a direction on the first sync', async () => {
      const result = await runCli(['games', 'sync', 'Celeste']);

      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(result.errors, [
        'Error synchronising saves: First sync of Celeste needs a direction',
        '  - Keep the server copy: mnemy games sync "Celeste" --download',
        '  - Keep the local saves: mnemy games sync "Celeste" --upload',
      ]);
    });

    it('should upload the files the server is missing', async () => {
      server = mockServer({
        'POST /files/check_files': () =>
          jsonResponse({ files_data: { missing_on_server: ['/slot1.sav'], mismatched_hashes: [] } }),
        'POST /files/upload_data': () => jsonResponse({ message: 'Files uploaded' }),
      });

      const result = await runCli(['games', 'sync', 'Celeste', '--upload']);

      assert.deepStrictEqual(result.logs, ['Uploaded 1 file(s) for Celeste']);
      assert.deepStrictEqual(server.calls.map((call) => call.url.pathname), ['/files/check_files', '/files/upload_data']);

      const listed = await runCli(['games', 'list', '--json']);
      assert.notStrictEqual(JSON.parse(listed.output)[0].lastSyncDate, null);
    });

    it('should report saves that are already up to date', async () => {
      server = mockServer({
        'POST /files/check_files': () =>
          jsonResponse({ files_data: { missing_on_server: [], mismatched_hashes: [] } }),
      });

      const result = await runCli(['games', 'sync', 'Celeste', '--upload']);

      assert.deepStrictEqual(result.logs, ['Saves of Celeste are up to date on server']);
      assert.strictEqual(server.calls.length, 1);
    });
  });

  describe('games import', () => {
    beforeEach(async () => {
      await addCeleste();
      await connect();
    });

    it('should register games known only to the server', async () => {
      server = mockServer({
        'GET /manage/get_games_data': () => jsonResponse({ games_list: [{ game_name: 'Hades' }, { game_name: 'Celeste' }] }),
      });

      const result = await runCli(['games', 'import']);

      assert.deepStrictEqual(result.logs, ['Imported 1 game(s)', '  + Hades']);
    });

    it('should download covers with --covers', async () => {
      server = mockServer({
        'GET /manage/get_games_data': () => jsonResponse({ games_list: [{ game_name: 'Hades' }] }),
        'GET /files/get_image/Celeste': () => new Response('', { status: 404 }),
        'GET /files/get_image/Hades': () => new Response('hades-cover'),
      });

      const result = await runCli(['games', 'import', '--covers']);

      assert.deepStrictEqual(result.logs, ['Imported 1 game(s)', '  + Hades', 'Downloaded 1 cover(s)']);
      const cover = join(home.dir, 'covers', 'Hades.jpg');
      assert.ok(existsSync(cover));
      assert.strictEqual(readFileSync(cover, 'utf-8'), 'hades-cover');
    });
  });
});
