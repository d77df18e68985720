import { existsSync, statSync } from 'fs';
import { mkdir, readdir, rename, rm } from 'fs/promises';
import * as path from 'path';
import * as tar from 'tar';

import { resolveManifestKey } from './manifest.js';
import { ErrorCode, FileSystemError, fromNodeFsError } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';

/**
 * Write a gzip tarball of the listed manifest keys, relative to `baseDir`.
 * Keys whose file no longer exists are left out.
 *
 * @returns number of archived files; no archive is written when it is 0
 */
export async function createArchive(baseDir: string, files: string[], destFile: string): Promise<number> {
  const entries: string[] = [];
  for (const key of files) {
    const relative = key.replace(/^\/+/, '');
    const source = resolveManifestKey(baseDir, key);
    if (existsSync(source) && statSync(source).isFile()) {
      entries.push(relative);
    } else {
      logger.warn('File vanished before archiving', { component: 'Files', path: source });
    }
  }

  if (entries.length === 0) {
    return 0;
  }

  try {
    await mkdir(path.dirname(destFile), { recursive: true });
    await tar.create(
      {
        gzip: true,
        file: destFile,
        cwd: baseDir,
        portable: true,
      },
      entries
    );
  } catch (error) {
    throw fromNodeFsError(error, baseDir, 'createArchive');
  }

  logger.debug('Archive created', { component: 'Files', file: destFile, entries: entries.length });
  return entries.length;
}

function escapesRoot(entryPath: string): boolean {
  return path.isAbsolute(entryPath) || /^[a-zA-Z]:/.test(entryPath) || entryPath.split(/[\\/]/).includes('..');
}

/**
 * Replace the contents of `targetDir` with those of a gzip tarball.
 *
 * The archive is unpacked beside the target first, so an unreadable archive
 * leaves the target untouched. An archive holding an absolute path or a
 * `..` segment is rejected and nothing of it is kept.
 */
export async function extractArchive(archiveFile: string, targetDir: string): Promise<void> {
  const target = path.resolve(targetDir);
  const staging = `${target}.mnemy-extract`;

  try {
    await rm(staging, { recursive: true, force: true });
    await mkdir(staging, { recursive: true });
    const escaping: string[] = [];
    await tar.extract({
      file: archiveFile,
      cwd: staging,
      strict: true,
      filter: (entryPath) => {
        if (escapesRoot(entryPath)) {
          escaping.push(entryPath);
          return false;
        }
        return true;
      },
    });
    if (escaping.length > 0) {
      throw new FileSystemError(ErrorCode.FILE_OPERATION_FAILED, `Archive entry outside the saves directory: ${escaping[0]}`, {
        path: target,
        context: { operation: 'extractArchive' },
      });
    }

    await mkdir(target, { recursive: true });
    for (const entry of await readdir(target)) {
      await rm(path.join(target, entry), { recursive: true, force: true });
    }
    for (const entry of await readdir(staging)) {
      await rename(path.join(staging, entry), path.join(target, entry));
    }
  } catch (error) {
    if (error instanceof FileSystemError) {
      throw error;
    }
    throw fromNodeFsError(error, target, 'extractArchive');
  } finally {
    await rm(staging, { recursive: true, force: true });
  }

  logger.debug('Archive extracted', { component: 'Files', file: archiveFile, path: target });
}
