/**
 * Filename Pattern Search
 *
 * Minimal `*` / `?` filename patterns, matched case-insensitively since the
 * only patterns searched are Windows executable names.
 */

import * as path from 'path';
import type { HostSystem, DirEntry } from './host.js';

/**
 * Convert a filename pattern (`vncviewer-*.*.*.exe`) to a RegExp
 */
export function patternToRegExp(pattern: string): RegExp {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '[^/\\\\]*';
    else if (ch === '?') source += '[^/\\\\]';
    else source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
  }
  return new RegExp('^' + source + '$', 'i');
}

function listSorted(host: HostSystem, dir: string): DirEntry[] {
  try {
    return host.listDir(dir).sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  } catch {
    // Unreadable directories contribute no matches
    return [];
  }
}

/**
 * Find the first file matching a pattern in rootDir, then below it.
 *
 * Files directly in rootDir are checked before any subdirectory is entered.
 * Hidden directories are not descended into. The walk stops at the first hit.
 */
export function findFirstMatch(host: HostSystem, rootDir: string, pattern: string): string | null {
  const regex = patternToRegExp(pattern);

  const walk = (dir: string): string | null => {
    const entries = listSorted(host, dir);

    for (const entry of entries) {
      if (!entry.isDirectory && regex.test(entry.name)) {
        return path.join(dir, entry.name);
      }
    }

    for (const entry of entries) {
      if (!entry.isDirectory || entry.name.startsWith('.')) continue;
      const found = walk(path.join(dir, entry.name));
      if (found) return found;
    }

    return null;
  };

  return walk(rootDir);
}
