import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DBService } from '../src/connection.js';
import { PictureRepository, type CreatePicture } from '../src/models/picture.js';
import { ProductPictureRepository } from '../src/models/product-picture.js';

function pictureData(overrides: Partial<CreatePicture> = {}): CreatePicture {
  const bytes = overrides.pictureBinary ?? Buffer.from([1, 2, 3]);
  return {
    pictureBinary: bytes,
    mimeType: 'image/png',
    isNew: true,
    isTransient: true,
    sizeBytes: bytes.length,
    hash: 'hash-a',
    ...overrides
  };
}

describe('PictureRepository', () => {
  let db: DBService;
  let pictures: PictureRepository;
  let productPictures: ProductPictureRepository;

  beforeEach(async () => {
    db = await DBService.create({ dbPath: ':memory:' });
    pictures = new PictureRepository(db);
    productPictures = new ProductPictureRepository(db);
  });

  afterEach(() => {
    db.close();
  });

  it('creates and reads back a picture', () => {
    const created = pictures.create(pictureData({ seoFilename: 'red-shoe' }));

    expect(created.id).toBe(1);
    expect(created.pictureBinary.equals(Buffer.from([1, 2, 3]))).toBe(true);
    expect(created.seoFilename).toBe('red-shoe');
    expect(created.isNew).toBe(true);
    expect(created.isTransient).toBe(true);
    expect(pictures.findById(1)).toEqual(created);
  });

  it('maps a missing SEO filename to undefined', () => {
    const created = pictures.create(pictureData());
    expect(created.seoFilename).toBeUndefined();
  });

  it('returns undefined for unknown ids', () => {
    expect(pictures.findById(99)).toBeUndefined();
  });

  it('pages newest first and counts', () => {
    pictures.create(pictureData());
    pictures.create(pictureData());
    pictures.create(pictureData());

    expect(pictures.findPage(0, 2).map((p) => p.id)).toEqual([3, 2]);
    expect(pictures.findPage(2, 2).map((p) => p.id)).toEqual([1]);
    expect(pictures.count()).toBe(3);
  });

  it('finds by ids', () => {
    pictures.create(pictureData({ hash: 'x' }));
    pictures.create(pictureData({ hash: 'y' }));

    expect(pictures.findByIds([2, 1]).map((p) => p.id).sort()).toEqual([1, 2]);
    expect(pictures.findByIds([])).toEqual([]);
  });

  it('finds by more ids than one statement can bind', () => {
    pictures.create(pictureData());
    pictures.create(pictureData());
    const ids = Array.from({ length: 40000 }, (_, i) => 40000 - i);

    expect(pictures.findByIds(ids).map((p) => p.id).sort()).toEqual([1, 2]);
  });

  it('updates fields and bumps the timestamp', () => {
    const created = pictures.create(pictureData());
    const updated = pictures.update(created.id, pictureData({
      pictureBinary: Buffer.from([9]),
      mimeType: 'image/jpeg',
      seoFilename: 'blue',
      isNew: false,
      isTransient: false,
      sizeBytes: 1,
      hash: 'hash-b'
    }));

    expect(updated?.mimeType).toBe('image/jpeg');
    expect(updated?.seoFilename).toBe('blue');
    expect(updated?.isNew).toBe(false);
    expect(updated?.hash).toBe('hash-b');
    expect(updated?.pictureBinary.equals(Buffer.from([9]))).toBe(true);
  });

  it('finds transient pictures updated before a moment', () => {
    pictures.create(pictureData());
    pictures.create(pictureData({ isTransient: false }));

    expect(pictures.findTransient('9999-01-01T00:00:00.000Z').map((p) => p.id)).toEqual([1]);
    expect(pictures.findTransient('2000-01-01T00:00:00.000Z')).toEqual([]);
  });

  it('lists product pictures by display order and limit', () => {
    const a = pictures.create(pictureData());
    const b = pictures.create(pictureData());
    const c = pictures.create(pictureData());
    productPictures.associate({ productId: 7, pictureId: a.id, displayOrder: 2 });
    productPictures.associate({ productId: 7, pictureId: b.id, displayOrder: 0 });
    productPictures.associate({ productId: 7, pictureId: c.id, displayOrder: 1 });
    productPictures.associate({ productId: 8, pictureId: a.id, displayOrder: 0 });

    expect(pictures.findByProductId(7).map((p) => p.id)).toEqual([2, 3, 1]);
    expect(pictures.findByProductId(7, 2).map((p) => p.id)).toEqual([2, 3]);
    expect(pictures.findByProductId(9)).toEqual([]);
  });

  it('updates the display order of an existing mapping', () => {
    const a = pictures.create(pictureData());
    const first = productPictures.associate({ productId: 7, pictureId: a.id, displayOrder: 0 });
    const second = productPictures.associate({ productId: 7, pictureId: a.id, displayOrder: 5 });

    expect(second.id).toBe(first.id);
    expect(second.displayOrder).toBe(5);
    expect(productPictures.find(7, a.id)?.displayOrder).toBe(5);
  });

  it('removes mappings when the picture is deleted', () => {
    const a = pictures.create(pictureData());
    productPictures.associate({ productId: 7, pictureId: a.id, displayOrder: 0 });

    expect(pictures.delete(a.id)).toBe(true);
    expect(productPictures.find(7, a.id)).toBeUndefined();
    expect(pictures.delete(a.id)).toBe(false);
  });

  it('removes a single mapping', () => {
    const a = pictures.create(pictureData());
    productPictures.associate({ productId: 7, pictureId: a.id, displayOrder: 0 });

    expect(productPictures.remove(7, a.id)).toBe(true);
    expect(productPictures.remove(7, a.id)).toBe(false);
  });
});
