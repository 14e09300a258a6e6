/**
 * Picture model
 */

import type { DBService } from '../connection.js';

// --- Types ---

/** Selects the fallback image used when a picture is missing */
export type PictureType = 'entity' | 'avatar';

export const PICTURE_TYPES: readonly PictureType[] = ['entity', 'avatar'];

export interface Picture {
  id: number;
  /** Image bytes; empty when the bytes live on the filesystem */
  pictureBinary: Buffer;
  mimeType: string;
  seoFilename?: string;
  /** Thumbnails must be rebuilt on the next URL resolution */
  isNew: boolean;
  /** Uploaded but not attached to an owner yet */
  isTransient: boolean;
  sizeBytes: number;
  hash: string;
  createdAt: string;
  updatedAt: string;
}

export interface CreatePicture {
  pictureBinary: Buffer;
  mimeType: string;
  seoFilename?: string;
  isNew: boolean;
  isTransient: boolean;
  sizeBytes: number;
  hash: string;
}

export type UpdatePicture = CreatePicture;

/** Stays well below SQLite's bound-parameter limit */
export const MAX_IDS_PER_QUERY = 500;

// --- Row mapping ---

interface PictureRow {
  id: number;
  picture_binary: Buffer | null;
  mime_type: string;
  seo_filename: string | null;
  is_new: number;
  is_transient: number;
  size_bytes: number;
  hash: string;
  created_at: string;
  updated_at: string;
}

const PICTURE_COLUMNS = `
  id, picture_binary, mime_type, seo_filename, is_new, is_transient,
  size_bytes, hash, created_at, updated_at
`;

function rowToPicture(row: PictureRow): Picture {
  return {
    id: row.id,
    pictureBinary: row.picture_binary ?? Buffer.alloc(0),
    mimeType: row.mime_type,
    seoFilename: row.seo_filename ?? undefined,
    isNew: row.is_new !== 0,
    isTransient: row.is_transient !== 0,
    sizeBytes: row.size_bytes,
    hash: row.hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
}

// --- Picture Repository ---

export class PictureRepository {
  constructor(private db: DBService) {}

  create(data: CreatePicture): Picture {
    const now = new Date().toISOString();
    const info = this.db.database.prepare(`
      INSERT INTO pictures (
        picture_binary, mime_type, seo_filename, is_new, is_transient,
        size_bytes, hash, created_at, updated_at
      )
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      data.pictureBinary,
      data.mimeType,
      data.seoFilename ?? null,
      data.isNew ? 1 : 0,
      data.isTransient ? 1 : 0,
      data.sizeBytes,
      data.hash,
      now,
      now
    );

    const created = this.findById(Number(info.lastInsertRowid));
    if (!created) {
      throw new Error(`Picture ${info.lastInsertRowid} missing after insert`);
    }
    return created;
  }

  findById(id: number): Picture | undefined {
    const row = this.db.database.prepare<[number], PictureRow>(`
      SELECT ${PICTURE_COLUMNS}
      FROM pictures
      WHERE id = ?
    `).get(id);

    return row ? rowToPicture(row) : undefined;
  }

  /**
   * Find pictures by id. Order is unspecified; callers reorder as needed.
   */
  findByIds(ids: number[]): Picture[] {
    const result: Picture[] = [];

    for (let start = 0; start < ids.length; start += MAX_IDS_PER_QUERY) {
      const chunk = ids.slice(start, start + MAX_IDS_PER_QUERY);
      const placeholders = chunk.map(() => '?').join(', ');
      const rows = this.db.database.prepare<number[], PictureRow>(`
        SELECT ${PICTURE_COLUMNS}
        FROM pictures
        WHERE id IN (${placeholders})
      `).all(...chunk);
      result.push(...rows.map(rowToPicture));
    }

    return result;
  }

  /** All pictures, newest first */
  findAll(): Picture[] {
    const rows = this.db.database.prepare<[], PictureRow>(`
      SELECT ${PICTURE_COLUMNS}
      FROM pictures
      ORDER BY id DESC
    `).all();

    return rows.map(rowToPicture);
  }

  /** One page of pictures, newest first */
  findPage(offset: number, limit: number): Picture[] {
    const rows = this.db.database.prepare<[number, number], PictureRow>(`
      SELECT ${PICTURE_COLUMNS}
      FROM pictures
      ORDER BY id DESC
      LIMIT ? OFFSET ?
    `).all(limit, offset);

    return rows.map(rowToPicture);
  }

  count(): number {
    const row = this.db.database
      .prepare<[], { total: number }>('SELECT COUNT(*) AS total FROM pictures')
      .get();
    return row?.total ?? 0;
  }

  /**
   * Pictures mapped to a product, by display order. `limit` 0 returns all.
   */
  findByProductId(productId: number, limit = 0): Picture[] {
    const columns = PICTURE_COLUMNS.split(',').map((c) => `p.${c.trim()}`).join(', ');
    const sql = `
      SELECT ${columns}
      FROM pictures p
      JOIN product_pictures pp ON p.id = pp.picture_id
      WHERE pp.product_id = ?
      ORDER BY pp.display_order, pp.id
    `;

    const rows = limit > 0
      ? this.db.database.prepare<[number, number], PictureRow>(`${sql} LIMIT ?`).all(productId, limit)
      : this.db.database.prepare<[number], PictureRow>(sql).all(productId);

    return rows.map(rowToPicture);
  }

  /** Transient pictures last updated before `updatedBefore` (ISO timestamp) */
  findTransient(updatedBefore: string): Picture[] {
    const rows = this.db.database.prepare<[string], PictureRow>(`
      SELECT ${PICTURE_COLUMNS}
      FROM pictures
      WHERE is_transient = 1 AND updated_at < ?
      ORDER BY id
    `).all(updatedBefore);

    return rows.map(rowToPicture);
  }

  update(id: number, data: UpdatePicture): Picture | undefined {
    this.db.database.prepare(`
      UPDATE pictures
      SET picture_binary = ?, mime_type = ?, seo_filename = ?, is_new = ?,
          is_transient = ?, size_bytes = ?, hash = ?, updated_at = ?
      WHERE id = ?
    `).run(
      data.pictureBinary,
      data.mimeType,
      data.seoFilename ?? null,
      data.isNew ? 1 : 0,
      data.isTransient ? 1 : 0,
      data.sizeBytes,
      data.hash,
      new Date().toISOString(),
      id
    );

    return this.findById(id);
  }

  /** Replace only the stored bytes, leaving the update timestamp alone */
  setBinary(id: number, pictureBinary: Buffer): void {
    this.db.database
      .prepare('UPDATE pictures SET picture_binary = ? WHERE id = ?')
      .run(pictureBinary, id);
  }

  setTransient(id: number, isTransient: boolean): void {
    this.db.database
      .prepare('UPDATE pictures SET is_transient = ?, updated_at = ? WHERE id = ?')
      .run(isTransient ? 1 : 0, new Date().toISOString(), id);
  }

  delete(id: number): boolean {
    const info = this.db.database.prepare('DELETE FROM pictures WHERE id = ?').run(id);
    return info.changes > 0;
  }
}
