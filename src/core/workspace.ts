/**
 * Workspace resolution for database files
 *
 * Cursor keeps one directory per opened project under workspaceStorage/<id>/,
 * holding state.vscdb next to a workspace.json that names the project folder.
 */

import { existsSync, readFileSync } from 'node:fs';
import { basename, dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';

export const UNKNOWN_WORKSPACE = 'unknown';
export const GLOBAL_WORKSPACE = 'global';

/**
 * Convert a workspace.json folder URI to a filesystem path
 */
export function folderUriToPath(uri: string): string {
  if (uri.startsWith('file://')) {
    try {
      return fileURLToPath(uri);
    } catch {
      // Malformed file URI: fall back to a plain strip
      return decodeURIComponent(uri.replace(/^file:\/\//, ''));
    }
  }
  return uri;
}

/**
 * Read workspace.json to get the original workspace path
 */
export function readWorkspaceJson(workspaceDir: string): string | null {
  const jsonPath = join(workspaceDir, 'workspace.json');
  if (!existsSync(jsonPath)) {
    return null;
  }

  try {
    const content = readFileSync(jsonPath, 'utf-8');
    const data = JSON.parse(content) as { folder?: unknown; workspace?: unknown };
    const uri = typeof data.folder === 'string' ? data.folder : data.workspace;
    return typeof uri === 'string' && uri !== '' ? folderUriToPath(uri) : null;
  } catch {
    return null;
  }
}

/**
 * Get a workspace label for a database file
 *
 * Never throws; returns 'unknown' when the directory layout is not recognized.
 */
export function resolveWorkspace(dbPath: string): string {
  const dir = dirname(dbPath);

  const folder = readWorkspaceJson(dir);
  if (folder) {
    return folder;
  }

  if (basename(dirname(dir)) === 'workspaceStorage') {
    return basename(dir);
  }

  if (basename(dir) === 'globalStorage') {
    return GLOBAL_WORKSPACE;
  }

  return UNKNOWN_WORKSPACE;
}
