/**
 * Picture file store
 *
 * Filesystem side of picture storage: picture files (used when bytes are
 * not kept in the database) and generated thumbnails.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { randomUUID } from 'node:crypto';
import { padId } from '@picstore/utils';

import type { ConfigService } from './config.js';
import { PictureError } from './picture-error.js';

export const PICTURE_ID_WIDTH = 7;
export const THUMB_DIRECTORY_LENGTH = 3;

/**
 * File extension for a MIME type: the subtype with the usual aliases
 * folded (`jpeg`/`pjpeg` to `jpg`, `x-png` to `png`).
 */
export function getExtensionFromMime(mimeType: string): string {
  const subtype = mimeType.split(';')[0]?.split('/').pop()?.trim().toLowerCase() ?? '';
  switch (subtype) {
    case 'jpeg':
    case 'pjpeg':
      return 'jpg';
    case 'x-png':
      return 'png';
    case 'x-icon':
      return 'ico';
    case 'svg+xml':
      return 'svg';
    case '':
      return 'bin';
    default:
      return subtype;
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export class PictureFileStore {
  constructor(private config: ConfigService) {}

  get imagesDir(): string {
    return this.config.imagesDir;
  }

  get thumbsDir(): string {
    return this.config.thumbsDir;
  }

  // ─── Picture files ────────────────────────────────────────────────

  getPictureFileName(pictureId: number, mimeType: string): string {
    return `${padId(pictureId, PICTURE_ID_WIDTH)}-0.${getExtensionFromMime(mimeType)}`;
  }

  getPictureFilePath(pictureId: number, mimeType: string): string {
    return path.join(this.imagesDir, this.getPictureFileName(pictureId, mimeType));
  }

  async savePictureFile(pictureId: number, mimeType: string, data: Buffer): Promise<void> {
    try {
      await fs.mkdir(this.imagesDir, { recursive: true });
      await fs.writeFile(this.getPictureFilePath(pictureId, mimeType), data);
    } catch (err) {
      throw PictureError.io(err);
    }
  }

  /** Bytes of a picture file; empty when the file does not exist */
  async loadPictureFile(pictureId: number, mimeType: string): Promise<Buffer> {
    try {
      return await fs.readFile(this.getPictureFilePath(pictureId, mimeType));
    } catch (err) {
      if (isNotFound(err)) {
        return Buffer.alloc(0);
      }
      throw PictureError.io(err);
    }
  }

  async deletePictureFile(pictureId: number, mimeType: string): Promise<void> {
    try {
      await fs.rm(this.getPictureFilePath(pictureId, mimeType), { force: true });
    } catch (err) {
      throw PictureError.io(err);
    }
  }

  // ─── Thumbnails ───────────────────────────────────────────────────

  /** Thumb path relative to the thumbs directory, using `/` separators */
  getThumbRelativePath(thumbFileName: string): string {
    if (this.config.get('multipleThumbDirectories')) {
      return `${thumbFileName.substring(0, THUMB_DIRECTORY_LENGTH)}/${thumbFileName}`;
    }
    return thumbFileName;
  }

  getThumbLocalPath(thumbFileName: string): string {
    return path.join(this.thumbsDir, ...this.getThumbRelativePath(thumbFileName).split('/'));
  }

  /**
   * Absolute path for a path relative to the thumbs directory, or
   * `undefined` when it would leave that directory.
   */
  resolveThumbPath(relativePath: string): string | undefined {
    return resolveInside(this.thumbsDir, relativePath);
  }

  async exists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /** Write through a temporary file so readers never see a partial thumb */
  async writeThumb(localPath: string, data: Buffer): Promise<void> {
    const tmpPath = `${localPath}.${randomUUID()}.tmp`;
    try {
      await fs.mkdir(path.dirname(localPath), { recursive: true });
      await fs.writeFile(tmpPath, data);
      await fs.rename(tmpPath, localPath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw PictureError.io(err);
    }
  }

  /**
   * Delete every thumb generated for a picture, in the thumbs directory and
   * in its sub-directory. Returns the number of files removed.
   */
  async deleteThumbs(pictureId: number): Promise<number> {
    const prefix = padId(pictureId, PICTURE_ID_WIDTH);
    const dirs = [this.thumbsDir, path.join(this.thumbsDir, prefix.substring(0, THUMB_DIRECTORY_LENGTH))];
    let deleted = 0;

    for (const dir of dirs) {
      let entries: string[];
      try {
        entries = await fs.readdir(dir);
      } catch (err) {
        if (isNotFound(err)) continue;
        throw PictureError.io(err);
      }

      for (const entry of entries) {
        if (entry.startsWith(`${prefix}.`) || entry.startsWith(`${prefix}_`)) {
          try {
            await fs.rm(path.join(dir, entry), { force: true });
            deleted++;
          } catch (err) {
            throw PictureError.io(err);
          }
        }
      }
    }

    return deleted;
  }
}

/**
 * Join `relativePath` onto `baseDir`, refusing anything that resolves
 * outside of it.
 */
export function resolveInside(baseDir: string, relativePath: string): string | undefined {
  const base = path.resolve(baseDir);
  const target = path.resolve(base, relativePath);
  if (target === base || !target.startsWith(base + path.sep)) {
    return undefined;
  }
  return target;
}
