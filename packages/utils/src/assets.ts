/**
 * Asset and data directory utilities
 *
 * Resolves where picstore keeps its database, configuration and media
 * files when nothing more specific is configured.
 */

import * as path from 'node:path';
import * as os from 'node:os';

export const APP_DIR_NAME = 'picstore';

/**
 * Platform-specific data directory, e.g. ~/.local/share/picstore on Linux.
 */
export function getAssetDir(): string {
  const platform = os.platform();
  let baseDir: string;

  if (platform === 'win32') {
    baseDir = process.env.APPDATA || path.join(os.homedir(), 'AppData', 'Roaming');
  } else if (platform === 'darwin') {
    baseDir = path.join(os.homedir(), 'Library', 'Application Support');
  } else {
    baseDir = process.env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share');
  }

  return path.join(baseDir, APP_DIR_NAME);
}

export function getDbPath(dataDir: string): string {
  return path.join(dataDir, 'picstore.sqlite');
}

export function getConfigPath(dataDir: string): string {
  return path.join(dataDir, 'config.json');
}

/** Directory holding picture files when pictures are not stored in the database */
export function getImagesDir(dataDir: string): string {
  return path.join(dataDir, 'media', 'images');
}

/** Directory holding generated thumbnails */
export function getThumbsDir(dataDir: string): string {
  return path.join(dataDir, 'media', 'thumbs');
}
