/**
 * Utility Functions Module
 *
 * Shared utility functions used across all packages.
 */

import path from 'path';
import { homedir } from 'os';

/**
 * Expand a leading `~` to the current user's home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return homedir();
  }
  if (filePath.startsWith('~/') || filePath.startsWith(`~${path.sep}`)) {
    return path.join(homedir(), filePath.slice(2));
  }
  return filePath;
}

/**
 * Narrow an unknown value to a plain (non-array) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Human-readable byte count, e.g. `1.5 KB`
 */
export function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  const units = ['KB', 'MB', 'GB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}
