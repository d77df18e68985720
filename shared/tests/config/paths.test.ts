import { describe, it } from 'node:test';
import assert from 'node:assert';
import * as path from 'path';
import { coverPathFor, resolvePaths } from '../../src/config/paths.js';

describe('resolvePaths', () => {
  it('should place every file under the data directory', () => {
    const paths = resolvePaths('/data/mnemy');

    assert.deepStrictEqual(paths, {
      home: path.resolve('/data/mnemy'),
      settingsFile: path.join(path.resolve('/data/mnemy'), 'settings.json'),
      credentialsFile: path.join(path.resolve('/data/mnemy'), 'credentials.json'),
      secretKeyFile: path.join(path.resolve('/data/mnemy'), '.secret'),
      databaseFile: path.join(path.resolve('/data/mnemy'), 'mnemy.db'),
      logDir: path.join(path.resolve('/data/mnemy'), 'logs'),
      coversDir: path.join(path.resolve('/data/mnemy'), 'covers'),
      tempDir: path.join(path.resolve('/data/mnemy'), 'temp_data'),
    });
  });
});

describe('coverPathFor', () => {
  it('should name covers after the game', () => {
    assert.strictEqual(coverPathFor('/covers', 'Celeste'), path.join('/covers', 'Celeste.jpg'));
  });

  it('should encode characters that are not valid in file names', () => {
    assert.strictEqual(coverPathFor('/covers', 'Half-Life: Alyx?'), path.join('/covers', 'Half-Life%3A%20Alyx%3F.jpg'));
    assert.strictEqual(coverPathFor('/covers', 'Star*Fox / 64'), path.join('/covers', 'Star%2AFox%20%2F%2064.jpg'));
  });

  it('should give names that differ only in reserved characters their own files', () => {
    assert.notStrictEqual(coverPathFor('/covers', 'Doom: Eternal'), coverPathFor('/covers', 'Doom_ Eternal'));
    assert.notStrictEqual(coverPathFor('/covers', 'A/B'), coverPathFor('/covers', 'A_B'));
  });
});
