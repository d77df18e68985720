/**
 * Tests for the backups command
 *
 * - backups list [game] [--json]
 * - backups restore <game> <backup>
 * - backups delete <game> <backup>
 */

import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { createArchive } from '@mnemy/shared';

import { createBackupsCommand } from '../../src/commands/backups.js';
import { createTestHome, jsonResponse, mockServer } from '../helpers/mocks.js';
import { runCli, setupTestEnvironment, teardownTestEnvironment } from '../helpers/testSetup.js';

import type { TestHome } from '../helpers/mocks.js';

const BACKUPS = {
  Celeste: [
    { filename: 'backup_2024-05-02.tar.gz', size_bytes: 1536 },
    { filename: 'backup_2024-05-01.tar.gz', size_bytes: 512 },
  ],
  Hades: [],
};

describe('Backups Command', () => {
  let home: TestHome;
  let server: ReturnType<typeof mockServer> | undefined;

  beforeEach(async () => {
    home = createTestHome();
    setupTestEnvironment(home.dir);
    await runCli(['server', 'set', 'http://localhost:8000']);
    await runCli(['token', 'set', 'test-token']);
  });

  afterEach(() => {
    server?.restore();
    server = undefined;
    teardownTestEnvironment();
    home.cleanup();
  });

  it('should have list, restore and delete subcommands', () => {
    assert.deepStrictEqual(createBackupsCommand().commands.map((sub) => sub.name()), ['list', 'restore', 'delete']);
  });

  describe('backups list', () => {
    beforeEach(() => {
      server = mockServer({ 'GET /files/get_backups_data': () => jsonResponse(BACKUPS) });
    });

    it('should list the backups of every game', async () => {
      const result = await runCli(['backups', 'list']);

      assert.deepStrictEqual(result.logs, [
        'Celeste (2 backups)',
        '  backup_2024-05-02.tar.gz (1.50 KB)',
        '  backup_2024-05-01.tar.gz (512 B)',
        'Hades (0 backups)',
      ]);
    });

    it('should list the backups of one game', async () => {
      const result = await runCli(['backups', 'list', 'Hades']);

      assert.deepStrictEqual(result.logs, ['Hades (0 backups)']);
    });

    it('should report a game without backups on the server', async () => {
      const result = await runCli(['backups', 'list', 'Celeste Classic']);

      assert.deepStrictEqual(result.logs, ['No backups found for Celeste Classic.']);
    });

    it('should not match names inherited from Object', async () => {
      const result = await runCli(['backups', 'list', 'constructor']);

      assert.strictEqual(result.exitCode, null);
      assert.deepStrictEqual(result.logs, ['No backups found for constructor.']);
    });

    it('should print JSON with --json', async () => {
      const result = await runCli(['backups', 'list', 'Celeste', '--json']);

      assert.deepStrictEqual(JSON.parse(result.output), { Celeste: BACKUPS.Celeste });
    });
  });

  it('should report an empty backup history', async () => {
    server = mockServer({ 'GET /files/get_backups_data': () => jsonResponse({}) });

    const result = await runCli(['backups', 'list']);

    assert.deepStrictEqual(result.logs, ['No backups found.']);
  });

  describe('backups restore', () => {
    let savesDir: string;
    let archive: Buffer;

    beforeEach(async () => {
      savesDir = join(home.dir, 'saves');
      mkdirSync(savesDir);
      writeFileSync(join(savesDir, 'slot1.sav'), 'level 9');
      const exeFile = join(home.dir, 'Celeste.exe');
      writeFileSync(exeFile, '');
      await runCli(['games', 'add', 'Celeste', '--saves', savesDir, '--exe', exeFile]);

      const backupDir = join(home.dir, 'backup');
      mkdirSync(backupDir);
      writeFileSync(join(backupDir, 'slot1.sav'), 'level 2');
      const archiveFile = join(home.dir, 'backup.tar.gz');
      await createArchive(backupDir, ['/slot1.sav'], archiveFile);
      archive = readFileSync(archiveFile);
    });

    it('should restore the backup and download the saves', async () => {
      server = mockServer({
        'POST /files/restore_backup': () => jsonResponse({ message: 'Backup restored' }),
        'GET /files/download_data': () => new Response(new Uint8Array(archive)),
      });

      const result = await runCli(['backups', 'restore', 'Celeste', 'backup_2024-05-01.tar.gz']);

      assert.deepStrictEqual(result.logs, ['Backup backup_2024-05-01.tar.gz restored for Celeste']);
      assert.strictEqual(readFileSync(join(savesDir, 'slot1.sav'), 'utf-8'), 'level 2');
      assert.strictEqual(server.calls[1].url.searchParams.get('game_name'), 'Celeste');
    });

    it('should keep local saves when the server does not restore', async () => {
      server = mockServer({
        'POST /files/restore_backup': () => new Response(null, { status: 204 }),
      });

      const result = await runCli(['backups', 'restore', 'Celeste', 'backup_2024-05-01.tar.gz']);

      assert.deepStrictEqual(result.errors, ['Server did not restore backup backup_2024-05-01.tar.gz']);
      assert.strictEqual(result.exitCode, 1);
      assert.deepStrictEqual(readdirSync(savesDir), ['slot1.sav']);
      assert.strictEqual(readFileSync(join(savesDir, 'slot1.sav'), 'utf-8'), 'level 9');
    });

    it('should fail for an unregistered game', async () => {
      server = mockServer({});

      const result = await runCli(['backups', 'restore', 'Hades', 'backup.tar.gz']);

      assert.strictEqual(result.exitCode, 1);
      assert.strictEqual(result.errors[0], 'Error restoring backup: Game not found: Hades');
      assert.strictEqual(server.calls.length, 0);
    });
  });

  describe('backups delete', () => {
    it('should confirm a deleted backup', async () => {
      server = mockServer({ 'DELETE /files/delete_backup': () => jsonResponse({ message: 'Backup deleted' }) });

      const result = await runCli(['backups', 'delete', 'Celeste', 'backup_2024-05-01.tar.gz']);

      assert.deepStrictEqual(result.logs, ['Backup deleted: backup_2024-05-01.tar.gz']);
      assert.strictEqual(result.exitCode, null);
    });

    it('should warn about a backup the server does not have', async () => {
      server = mockServer({ 'DELETE /files/delete_backup': () => new Response(null, { status: 204 }) });

      const result = await runCli(['backups', 'delete', 'Celeste', 'backup_2024-05-01.tar.gz']);

      assert.deepStrictEqual(result.logs, ['Backup not found on server']);
      assert.strictEqual(result.exitCode, null);
    });

    it('should fail when the server refuses', async () => {
      server = mockServer({ 'DELETE /files/delete_backup': () => new Response(null, { status: 202 }) });

      const result = await runCli(['backups', 'delete', 'Celeste', 'backup_2024-05-01.tar.gz']);

      assert.deepStrictEqual(result.errors, ['Server refused to delete backup backup_2024-05-01.tar.gz']);
      assert.strictEqual(result.exitCode, 1);
    });
  });
});
