/**
 * Platform detection and Cursor storage path conventions
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import type { Platform } from '../core/types.js';

/**
 * Cursor-relative locations that may hold state databases, under every base directory
 */
export const CURSOR_RELATIVE_PATHS = [
  join('Cursor', 'User', 'workspaceStorage'),
  join('Cursor', 'User', 'globalStorage'),
  join('Cursor', 'Storage'),
  join('Cursor', 'User', 'state.vscdb'),
] as const;

/**
 * Detect the current operating system platform
 */
export function detectPlatform(): Platform {
  switch (process.platform) {
    case 'win32':
      return 'windows';
    case 'darwin':
      return 'macos';
    default:
      return 'linux';
  }
}

/**
 * Application data base directories for a platform
 */
export function getBaseDirectories(platform: Platform, env: NodeJS.ProcessEnv = process.env): string[] {
  const home = homedir();

  switch (platform) {
    case 'windows':
      return [
        env['APPDATA'] || join(home, 'AppData', 'Roaming'),
        env['LOCALAPPDATA'] || join(home, 'AppData', 'Local'),
        join(home, 'AppData', 'LocalLow'),
      ];
    case 'macos':
      return [
        join(home, 'Library', 'Application Support'),
        join(home, 'Library', 'Caches'),
        join(home, 'Library', 'Preferences'),
      ];
    case 'linux':
      return [
        env['XDG_CONFIG_HOME'] || join(home, '.config'),
        join(home, '.local', 'share'),
        join(home, '.cache'),
      ];
  }
}

/**
 * Every location where Cursor may keep databases on a platform, existing or not
 *
 * @example
 * getCandidateStoragePaths('linux');
 * // ['~/.config/Cursor/User/workspaceStorage', '~/.config/Cursor/User/globalStorage', ...]
 */
export function getCandidateStoragePaths(
  platform: Platform,
  env: NodeJS.ProcessEnv = process.env
): string[] {
  const candidates: string[] = [];
  for (const base of getBaseDirectories(platform, env)) {
    for (const relative of CURSOR_RELATIVE_PATHS) {
      candidates.push(join(base, relative));
    }
  }
  return candidates;
}

/**
 * Expand ~ to home directory in paths
 */
export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/') || path.startsWith('~\\')) {
    return join(homedir(), path.slice(1));
  }
  return path;
}

/**
 * Contract a path by replacing home directory with ~
 */
export function contractPath(path: string): string {
  const home = homedir();
  if (path === home || path.startsWith(home + '/') || path.startsWith(home + '\\')) {
    return '~' + path.slice(home.length);
  }
  return path;
}
