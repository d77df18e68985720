import { execFile } from 'child_process';
import { promisify } from 'util';

import { LIMITS } from '../config/constants.js';

const execFileAsync = promisify(execFile);

/**
 * Lower-case process name without a trailing `.exe` or `.`.
 */
export function normalizeProcessName(name: string): string {
  const lower = name.toLowerCase();
  if (lower.endsWith('.exe')) {
    return lower.slice(0, -4);
  }
  if (lower.endsWith('.')) {
    return lower.slice(0, -1);
  }
  return lower;
}

/**
 * File name of an executable path, for `/` and `\` separators alike.
 */
export function executableName(gamePath: string): string {
  const segments = gamePath.split(/[\\/]/);
  return segments[segments.length - 1];
}

/**
 * Whether a listed process is the target executable. Linux reports at most
 * 15 characters of a process name, so a listed name of exactly that length
 * matches any target it is a prefix of.
 */
export function processMatches(target: string, listed: string): boolean {
  const normalizedTarget = normalizeProcessName(target);
  if (normalizedTarget === normalizeProcessName(listed)) {
    return true;
  }
  return listed.length === LIMITS.PROCESS_NAME_TRUNCATION && normalizedTarget.startsWith(listed.toLowerCase());
}

export interface ProcessLister {
  /** Names of the running processes */
  list(): Promise<string[]>;
}

export function parseTasklistCsv(output: string): string[] {
  const names: string[] = [];
  for (const line of output.split(/\r?\n/)) {
    const match = /^"([^"]*)"/.exec(line.trim());
    if (match) {
      names.push(match[1]);
    }
  }
  return names;
}

export function parsePsOutput(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0)
    .map(executableName);
}

/**
 * Lists processes with `tasklist` on Windows and `ps` elsewhere.
 */
export class SystemProcessLister implements ProcessLister {
  constructor(private readonly platform: NodeJS.Platform = process.platform) {}

  async list(): Promise<string[]> {
    if (this.platform === 'win32') {
      const { stdout } = await execFileAsync('tasklist', ['/FO', 'CSV', '/NH'], { windowsHide: true, maxBuffer: 16 * 1024 * 1024 });
      return parseTasklistCsv(stdout);
    }

    const { stdout } = await execFileAsync('ps', ['-A', '-o', 'comm='], { maxBuffer: 16 * 1024 * 1024 });
    return parsePsOutput(stdout);
  }
}
