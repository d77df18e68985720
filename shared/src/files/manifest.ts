import { createReadStream } from 'fs';
import { readdir, stat } from 'fs/promises';
import { createHash } from 'crypto';
import * as path from 'path';

import { ErrorCode, FileSystemError, StructuredError, fromNodeFsError } from '../utils/errors.js';
import { logger } from '../utils/logging/logger.js';

/**
 * Relative POSIX path (leading `/`) -> md5 hex digest.
 */
export type FileManifest = Record<string, string>;

export function md5File(file: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const hash = createHash('md5');
    createReadStream(file)
      .on('data', (chunk) => hash.update(chunk))
      .on('error', reject)
      .on('end', () => resolve(hash.digest('hex')));
  });
}

/**
 * Manifest key for a file below `baseDir`: `/profiles/a.dat`.
 */
export function manifestKey(baseDir: string, file: string): string {
  return '/' + path.relative(baseDir, file).split(path.sep).join('/');
}

/**
 * File below `baseDir` for a manifest key.
 */
export function resolveManifestKey(baseDir: string, key: string): string {
  return path.join(baseDir, ...key.replace(/^\/+/, '').split('/'));
}

async function walk(dir: string, baseDir: string, manifest: FileManifest): Promise<void> {
  const entries = await readdir(dir, { withFileTypes: true });
  for (const entry of entries) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      await walk(full, baseDir, manifest);
    } else if (entry.isFile()) {
      manifest[manifestKey(baseDir, full)] = await md5File(full);
    }
  }
}

/**
 * Hash every regular file below `baseDir`, recursively.
 */
export async function hashDirectory(baseDir: string): Promise<FileManifest> {
  try {
    const info = await stat(baseDir);
    if (!info.isDirectory()) {
      throw new FileSystemError(ErrorCode.SAVES_DIR_NOT_FOUND, `Not a directory: ${baseDir}`, { path: baseDir });
    }

    const manifest: FileManifest = {};
    await walk(baseDir, baseDir, manifest);
    logger.debug('Directory hashed', { component: 'Files', path: baseDir, files: Object.keys(manifest).length });
    return manifest;
  } catch (error) {
    if (error instanceof StructuredError) {
      throw error;
    }
    throw fromNodeFsError(error, baseDir, 'hashDirectory');
  }
}
