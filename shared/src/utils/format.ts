const BYTE_UNITS = ['KB', 'MB', 'GB', 'TB'] as const;

/**
 * Human-readable size, 1024-based: `512 B`, `1.50 KB`, `3.00 MB`.
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }

  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit++;
  }

  return `${value.toFixed(2)} ${BYTE_UNITS[unit]}`;
}

/**
 * Last sync column of the games table: `never`, or ISO time to the second.
 */
export function formatSyncDate(date: Date | null): string {
  return date ? date.toISOString().replace(/\.\d{3}Z$/, 'Z') : 'never';
}
