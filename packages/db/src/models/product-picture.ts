/**
 * ProductPicture model
 *
 * Maps pictures to the products that show them.
 */

import type { DBService } from '../connection.js';

export interface ProductPicture {
  id: number;
  productId: number;
  pictureId: number;
  displayOrder: number;
  createdAt: string;
}

export interface CreateProductPicture {
  productId: number;
  pictureId: number;
  displayOrder: number;
}

interface ProductPictureRow {
  id: number;
  product_id: number;
  picture_id: number;
  display_order: number;
  created_at: string;
}

function rowToProductPicture(row: ProductPictureRow): ProductPicture {
  return {
    id: row.id,
    productId: row.product_id,
    pictureId: row.picture_id,
    displayOrder: row.display_order,
    createdAt: row.created_at
  };
}

export class ProductPictureRepository {
  constructor(private db: DBService) {}

  /**
   * Map a picture to a product. An existing mapping keeps its id and gets
   * the new display order.
   */
  associate(data: CreateProductPicture): ProductPicture {
    this.db.database.prepare(`
      INSERT INTO product_pictures (product_id, picture_id, display_order, created_at)
      VALUES (?, ?, ?, ?)
      ON CONFLICT(product_id, picture_id) DO UPDATE SET display_order = excluded.display_order
    `).run(data.productId, data.pictureId, data.displayOrder, new Date().toISOString());

    const mapping = this.find(data.productId, data.pictureId);
    if (!mapping) {
      throw new Error(`Mapping of picture ${data.pictureId} to product ${data.productId} missing after insert`);
    }
    return mapping;
  }

  find(productId: number, pictureId: number): ProductPicture | undefined {
    const row = this.db.database.prepare<[number, number], ProductPictureRow>(`
      SELECT id, product_id, picture_id, display_order, created_at
      FROM product_pictures
      WHERE product_id = ? AND picture_id = ?
    `).get(productId, pictureId);

    return row ? rowToProductPicture(row) : undefined;
  }

  remove(productId: number, pictureId: number): boolean {
    const info = this.db.database
      .prepare('DELETE FROM product_pictures WHERE product_id = ? AND picture_id = ?')
      .run(productId, pictureId);
    return info.changes > 0;
  }

  deleteByPictureId(pictureId: number): void {
    this.db.database.prepare('DELETE FROM product_pictures WHERE picture_id = ?').run(pictureId);
  }
}
