/**
 * Picture service
 *
 * Stores picture bytes (in the database or as files, depending on the
 * `storeInDb` setting), deduplicates uploads, derives SEO names and
 * resolves picture URLs, generating resized thumbnails on demand.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { createHash } from 'node:crypto';

import {
  PictureRepository,
  ProductPictureRepository,
  type DBService,
  type Picture,
  type PictureType
} from '@picstore/db';
import {
  createPagedList,
  ensureMaximumLength,
  getSeName,
  normalizePage,
  padId,
  type PagedList
} from '@picstore/utils';

import type { ConfigService } from './config.js';
import type { EventsService } from './events.js';
import { ImageProcessor, isSupportedFormat, mimeTypeForFormat, type ImageFormat, type Size } from './image-processor.js';
import { PictureError } from './picture-error.js';
import { PictureFileStore, PICTURE_ID_WIDTH, getExtensionFromMime, resolveInside } from './picture-storage.js';

export const MAX_MIME_TYPE_LENGTH = 20;
export const MAX_SEO_FILENAME_LENGTH = 100;

export const DEFAULT_PICTURE_FILES: Record<PictureType, string> = {
  entity: 'default-image.png',
  avatar: 'default-avatar.png'
};

export const THUMBS_URL_PATH = 'media/thumbs/';
export const DEFAULT_IMAGES_URL_PATH = 'media/default/';

// ── Types ──

export interface PictureUrlOptions {
  /** Longest side in pixels; 0 keeps the original size */
  targetSize?: number;
  /** Fall back to the default picture when the picture is missing */
  showDefaultPicture?: boolean;
  /** Base URL ending in `/`; defaults to the configured store URL */
  storeLocation?: string;
  defaultPictureType?: PictureType;
}

export interface DefaultPictureUrlOptions {
  targetSize?: number;
  defaultPictureType?: PictureType;
  storeLocation?: string;
}

/**
 * Outcome of a duplicate search: the id of the equal picture, or the bytes
 * to store when nothing matched.
 */
export type EqualPictureResult =
  | { equalPictureId: number; pictureBinary: undefined }
  | { equalPictureId: 0; pictureBinary: Buffer };

export interface ProductPictureResult {
  picture: Picture;
  /** An equal picture was already mapped to the product */
  duplicate: boolean;
}

export interface IPictureService {
  validatePicture(pictureBinary: Buffer): Promise<Buffer>;
  findEqualPicture(pictureBinary: Buffer, pictures: Iterable<Picture>): Promise<EqualPictureResult>;
  getPictureSeName(name: string): string;
  setSeoFilename(pictureId: number, seoFilename: string): Promise<Picture | undefined>;
  loadPictureBinary(picture: Picture): Promise<Buffer>;
  getPictureSize(picture: Picture): Promise<Size>;
  getPictureUrl(picture: Picture | number | undefined, options?: PictureUrlOptions): Promise<string>;
  getDefaultPictureUrl(options?: DefaultPictureUrlOptions): Promise<string>;
  getPictureById(pictureId: number): Picture | undefined;
  getPictures(pageIndex: number, pageSize: number): PagedList<Picture>;
  getPicturesByProductId(productId: number, recordsToReturn?: number): Picture[];
  getPicturesByIds(pictureIds: number[]): Picture[];
  deletePicture(picture: Picture): Promise<void>;
  insertPicture(
    pictureBinary: Buffer,
    mimeType: string,
    seoFilename: string | undefined,
    isNew: boolean,
    isTransient?: boolean,
    validateBinary?: boolean
  ): Promise<Picture>;
  updatePicture(
    picture: Picture,
    pictureBinary: Buffer,
    mimeType: string,
    seoFilename: string | undefined,
    isNew: boolean,
    validateBinary?: boolean
  ): Promise<Picture>;
}

// ── Helpers ──

export function hashBinary(data: Buffer): string {
  return createHash('sha256').update(data).digest('hex');
}

/** Ensure a store location ends with exactly one `/` */
export function normalizeStoreLocation(location: string): string {
  return location.endsWith('/') ? location : `${location}/`;
}

/**
 * Thumb file name: `<id>[_<seo>][_<size>].<ext>`, with the id padded to
 * seven digits.
 */
export function buildThumbFileName(
  pictureId: number,
  seoFilename: string | undefined,
  targetSize: number,
  extension: string
): string {
  let name = padId(pictureId, PICTURE_ID_WIDTH);
  if (seoFilename) {
    name += `_${seoFilename}`;
  }
  if (targetSize > 0) {
    name += `_${targetSize}`;
  }
  return `${name}.${extension}`;
}

/**
 * SEO filenames end up in thumb file names, so they are reduced to the
 * characters `getSeName` keeps. Empty results become `undefined`.
 */
export function normalizeSeoFilename(seoFilename: string | undefined): string | undefined {
  const seName = ensureMaximumLength(getSeName(seoFilename), MAX_SEO_FILENAME_LENGTH);
  return seName || undefined;
}

// ── PictureService ──

export class PictureService implements IPictureService {
  private pictures: PictureRepository;
  private productPictures: ProductPictureRepository;
  private db: DBService;
  private thumbJobs = new Map<string, Promise<void>>();

  constructor(
    db: DBService,
    private config: ConfigService,
    private events: EventsService,
    private processor: ImageProcessor = new ImageProcessor(),
    private fileStore: PictureFileStore = new PictureFileStore(config)
  ) {
    this.db = db;
    this.pictures = new PictureRepository(db);
    this.productPictures = new ProductPictureRepository(db);
  }

  // ─── Validation and dedup ─────────────────────────────────────────

  /**
   * Return the bytes unchanged when they decode to a supported format
   * within the configured byte and pixel limits; throw a PictureError
   * otherwise.
   */
  async validatePicture(pictureBinary: Buffer): Promise<Buffer> {
    await this.checkPicture(pictureBinary);
    return pictureBinary;
  }

  /** Validate like `validatePicture` and return the decoded format */
  private async checkPicture(pictureBinary: Buffer): Promise<ImageFormat> {
    if (pictureBinary.length === 0) {
      throw PictureError.invalidFormat('empty picture');
    }

    const maxBytes = this.config.get('maximumFileSizeBytes');
    if (pictureBinary.length > maxBytes) {
      throw PictureError.tooLarge(pictureBinary.length, maxBytes);
    }

    const probe = await this.processor.probe(pictureBinary).catch((err: unknown) => {
      throw PictureError.invalidFormat(err instanceof Error ? err.message : String(err));
    });

    const { format } = probe;
    if (!isSupportedFormat(format)) {
      throw PictureError.invalidFormat(`unsupported format ${probe.rawFormat ?? 'unknown'}`);
    }

    const maxSize = this.config.get('maximumImageSize');
    if (probe.width > maxSize || probe.height > maxSize) {
      throw PictureError.dimensionsExceeded(probe.width, probe.height, maxSize);
    }

    return format;
  }

  /**
   * MIME type to store: the decoded format when the bytes were validated,
   * else the given type, trimmed and cut to length.
   */
  private async resolveMimeType(pictureBinary: Buffer, mimeType: string, validateBinary: boolean): Promise<string> {
    if (validateBinary) {
      return mimeTypeForFormat(await this.checkPicture(pictureBinary));
    }
    return ensureMaximumLength(mimeType.trim(), MAX_MIME_TYPE_LENGTH);
  }

  async findEqualPicture(pictureBinary: Buffer, pictures: Iterable<Picture>): Promise<EqualPictureResult> {
    const hash = hashBinary(pictureBinary);

    for (const picture of pictures) {
      if (picture.hash && picture.hash !== hash) {
        continue;
      }
      const existing = await this.loadPictureBinary(picture);
      if (existing.equals(pictureBinary)) {
        console.debug(`Picture bytes equal picture ${picture.id}`);
        return { equalPictureId: picture.id, pictureBinary: undefined };
      }
    }

    return { equalPictureId: 0, pictureBinary };
  }

  // ─── SEO names ────────────────────────────────────────────────────

  getPictureSeName(name: string): string {
    return getSeName(name);
  }

  async setSeoFilename(pictureId: number, seoFilename: string): Promise<Picture | undefined> {
    const picture = this.getPictureById(pictureId);
    if (!picture) {
      return undefined;
    }

    const seo = normalizeSeoFilename(seoFilename);
    if (picture.seoFilename === seo) {
      return picture;
    }

    const binary = await this.loadPictureBinary(picture);
    return this.updatePicture(picture, binary, picture.mimeType, seo, true, false);
  }

  // ─── Bytes and size ───────────────────────────────────────────────

  async loadPictureBinary(picture: Picture): Promise<Buffer> {
    if (this.config.get('storeInDb')) {
      return picture.pictureBinary;
    }
    return this.fileStore.loadPictureFile(picture.id, picture.mimeType);
  }

  async getPictureSize(picture: Picture): Promise<Size> {
    const binary = await this.loadPictureBinary(picture);
    const size = await this.processor.tryGetSize(binary);
    if (!size) {
      console.warn(`Picture ${picture.id} has no readable size`);
      return { width: 0, height: 0 };
    }
    return size;
  }

  // ─── URLs ─────────────────────────────────────────────────────────

  async getPictureUrl(
    pictureOrId: Picture | number | undefined,
    options: PictureUrlOptions = {}
  ): Promise<string> {
    const {
      targetSize = 0,
      showDefaultPicture = true,
      storeLocation,
      defaultPictureType = 'entity'
    } = options;

    const fallback = (): Promise<string> =>
      showDefaultPicture
        ? this.getDefaultPictureUrl({ targetSize, defaultPictureType, storeLocation })
        : Promise.resolve('');

    let picture = typeof pictureOrId === 'number' ? this.getPictureById(pictureOrId) : pictureOrId;
    if (!picture) {
      return fallback();
    }

    if (picture.isNew) {
      const current = await this.loadPictureBinary(picture);
      picture = await this.updatePicture(picture, current, picture.mimeType, picture.seoFilename, false, false);
    }

    const binary = await this.loadPictureBinary(picture);
    if (binary.length === 0) {
      return fallback();
    }

    const extension = getExtensionFromMime(picture.mimeType);
    const thumbFileName = buildThumbFileName(picture.id, picture.seoFilename, targetSize, extension);
    const localPath = this.fileStore.getThumbLocalPath(thumbFileName);

    await this.ensureThumb(localPath, () =>
      targetSize === 0 ? Promise.resolve(binary) : this.resizePicture(binary, targetSize)
    );

    return this.getThumbUrl(thumbFileName, storeLocation);
  }

  async getDefaultPictureUrl(options: DefaultPictureUrlOptions = {}): Promise<string> {
    const { targetSize = 0, defaultPictureType = 'entity', storeLocation } = options;

    const fileName = DEFAULT_PICTURE_FILES[defaultPictureType];
    const filePath = path.join(this.config.get('defaultImagesDir'), fileName);
    if (!(await this.fileStore.exists(filePath))) {
      console.warn(`Default picture ${filePath} not found`);
      return '';
    }

    if (targetSize === 0) {
      return `${this.resolveStoreLocation(storeLocation)}${DEFAULT_IMAGES_URL_PATH}${fileName}`;
    }

    const { name, ext } = path.parse(fileName);
    const thumbFileName = `${name}_${targetSize}${ext}`;
    const localPath = this.fileStore.getThumbLocalPath(thumbFileName);

    await this.ensureThumb(localPath, async () => {
      const source = await fs.readFile(filePath);
      return this.resizePicture(source, targetSize);
    });

    return this.getThumbUrl(thumbFileName, storeLocation);
  }

  /** Absolute path of a generated thumb, or `undefined` outside the thumbs directory */
  getThumbFilePath(relativePath: string): string | undefined {
    return this.fileStore.resolveThumbPath(relativePath);
  }

  /** Absolute path of a default image, or `undefined` outside its directory */
  getDefaultPictureFilePath(fileName: string): string | undefined {
    return resolveInside(this.config.get('defaultImagesDir'), fileName);
  }

  // ─── Queries ──────────────────────────────────────────────────────

  getPictureById(pictureId: number): Picture | undefined {
    if (pictureId === 0) {
      return undefined;
    }
    return this.pictures.findById(pictureId);
  }

  getPictures(pageIndex: number, pageSize: number): PagedList<Picture> {
    const page = normalizePage(pageIndex, pageSize);
    const items = this.pictures.findPage(page.offset, page.pageSize);
    return createPagedList(items, this.pictures.count(), page.pageIndex, page.pageSize);
  }

  getPicturesByProductId(productId: number, recordsToReturn = 0): Picture[] {
    if (productId === 0) {
      return [];
    }
    return this.pictures.findByProductId(productId, Math.max(0, recordsToReturn));
  }

  /** Pictures in the order of `pictureIds`; unknown ids are skipped */
  getPicturesByIds(pictureIds: number[]): Picture[] {
    const ids = [...new Set(pictureIds)];
    if (ids.length === 0) {
      return [];
    }

    const byId = new Map(this.pictures.findByIds(ids).map((picture) => [picture.id, picture]));
    const result: Picture[] = [];
    for (const id of ids) {
      const picture = byId.get(id);
      if (picture) {
        result.push(picture);
      }
    }
    return result;
  }

  // ─── Mutations ────────────────────────────────────────────────────

  async deletePicture(picture: Picture): Promise<void> {
    await this.fileStore.deleteThumbs(picture.id);

    if (!this.config.get('storeInDb')) {
      await this.fileStore.deletePictureFile(picture.id, picture.mimeType);
    }

    this.deletePictureRecord(picture.id);

    console.debug(`Deleted picture ${picture.id}`);
    await this.events.emit('picture.deleted', picture);
  }

  async insertPicture(
    pictureBinary: Buffer,
    mimeType: string,
    seoFilename: string | undefined,
    isNew: boolean,
    isTransient = true,
    validateBinary = true
  ): Promise<Picture> {
    const mime = await this.resolveMimeType(pictureBinary, mimeType, validateBinary);
    const seo = normalizeSeoFilename(seoFilename);
    const storeInDb = this.config.get('storeInDb');

    const picture = this.pictures.create({
      pictureBinary: storeInDb ? pictureBinary : Buffer.alloc(0),
      mimeType: mime,
      seoFilename: seo,
      isNew,
      isTransient,
      sizeBytes: pictureBinary.length,
      hash: hashBinary(pictureBinary)
    });

    if (!storeInDb) {
      try {
        await this.fileStore.savePictureFile(picture.id, mime, pictureBinary);
      } catch (err) {
        this.pictures.delete(picture.id);
        throw err;
      }
    }

    console.debug(`Inserted picture ${picture.id} (${mime}, ${pictureBinary.length} bytes)`);
    await this.events.emit('picture.inserted', picture);
    return picture;
  }

  async updatePicture(
    picture: Picture,
    pictureBinary: Buffer,
    mimeType: string,
    seoFilename: string | undefined,
    isNew: boolean,
    validateBinary = true
  ): Promise<Picture> {
    const mime = await this.resolveMimeType(pictureBinary, mimeType, validateBinary);
    const seo = normalizeSeoFilename(seoFilename);
    const storeInDb = this.config.get('storeInDb');

    await this.fileStore.deleteThumbs(picture.id);

    if (!storeInDb) {
      if (getExtensionFromMime(picture.mimeType) !== getExtensionFromMime(mime)) {
        await this.fileStore.deletePictureFile(picture.id, picture.mimeType);
      }
      await this.fileStore.savePictureFile(picture.id, mime, pictureBinary);
    }

    const updated = this.pictures.update(picture.id, {
      pictureBinary: storeInDb ? pictureBinary : Buffer.alloc(0),
      mimeType: mime,
      seoFilename: seo,
      isNew,
      isTransient: picture.isTransient,
      sizeBytes: pictureBinary.length,
      hash: hashBinary(pictureBinary)
    });
    if (!updated) {
      throw PictureError.notFound(picture.id);
    }

    await this.events.emit('picture.updated', updated);
    return updated;
  }

  /** Update by id; `undefined` when the picture does not exist */
  async updatePictureById(
    pictureId: number,
    pictureBinary: Buffer,
    mimeType: string,
    seoFilename: string | undefined,
    isNew: boolean,
    validateBinary = true
  ): Promise<Picture | undefined> {
    const picture = this.getPictureById(pictureId);
    if (!picture) {
      return undefined;
    }
    return this.updatePicture(picture, pictureBinary, mimeType, seoFilename, isNew, validateBinary);
  }

  // ─── Product pictures ─────────────────────────────────────────────

  /**
   * Add a picture to a product unless the product already shows an equal
   * one, in which case that picture is returned.
   */
  async addPictureToProduct(
    productId: number,
    pictureBinary: Buffer,
    mimeType: string,
    seoFilename: string | undefined,
    displayOrder = 0
  ): Promise<ProductPictureResult> {
    const existing = this.pictures.findByProductId(productId);
    const equal = await this.findEqualPicture(pictureBinary, existing);

    if (equal.pictureBinary === undefined) {
      const duplicate = existing.find((picture) => picture.id === equal.equalPictureId);
      if (duplicate) {
        return { picture: duplicate, duplicate: true };
      }
    }

    const picture = await this.insertPicture(pictureBinary, mimeType, seoFilename, true, false, true);
    this.productPictures.associate({ productId, pictureId: picture.id, displayOrder });
    return { picture, duplicate: false };
  }

  /**
   * Map an existing picture to a product and make it permanent. Returns
   * `undefined` when the picture does not exist.
   */
  attachPictureToProduct(productId: number, pictureId: number, displayOrder = 0): Picture | undefined {
    const picture = this.getPictureById(pictureId);
    if (!picture) {
      return undefined;
    }

    this.db.transaction(() => {
      this.productPictures.associate({ productId, pictureId, displayOrder });
      if (picture.isTransient) {
        this.pictures.setTransient(pictureId, false);
      }
    });

    return this.getPictureById(pictureId);
  }

  removePictureFromProduct(productId: number, pictureId: number): boolean {
    return this.productPictures.remove(productId, pictureId);
  }

  // ─── Maintenance ──────────────────────────────────────────────────

  /**
   * Move every picture's bytes between database and files and switch the
   * `storeInDb` setting. Bytes are copied before the setting flips and the
   * old copies are cleared afterwards.
   */
  async setIsStoreInDb(isStoreInDb: boolean): Promise<void> {
    if (this.config.get('storeInDb') === isStoreInDb) {
      return;
    }

    const pictures = this.pictures.findAll();

    for (const picture of pictures) {
      const binary = await this.loadPictureBinary(picture);
      if (isStoreInDb) {
        this.pictures.setBinary(picture.id, binary);
      } else {
        await this.fileStore.savePictureFile(picture.id, picture.mimeType, binary);
      }
    }

    this.config.set('storeInDb', isStoreInDb);

    for (const picture of pictures) {
      if (isStoreInDb) {
        await this.fileStore.deletePictureFile(picture.id, picture.mimeType);
      } else {
        this.pictures.setBinary(picture.id, Buffer.alloc(0));
      }
    }

    console.log(`Moved ${pictures.length} pictures to ${isStoreInDb ? 'the database' : 'the filesystem'}`);
  }

  /**
   * Delete transient pictures last updated before `olderThan`. Returns the
   * number deleted.
   */
  async clearTransientPictures(olderThan: Date): Promise<number> {
    const transient = this.pictures.findTransient(olderThan.toISOString());

    if (transient.length === 0) {
      console.debug('No transient pictures to clear');
      return 0;
    }

    let deletedCount = 0;
    let failedCount = 0;

    for (const picture of transient) {
      try {
        await this.deletePicture(picture);
        deletedCount++;
      } catch (e) {
        failedCount++;
        console.error(`Failed to delete transient picture ${picture.id}: ${e}`);
      }
    }

    console.log(`Transient picture cleanup completed: ${deletedCount} deleted, ${failedCount} failed`);
    return deletedCount;
  }

  // ─── Internals ────────────────────────────────────────────────────

  private deletePictureRecord(pictureId: number): void {
    this.db.transaction(() => {
      this.productPictures.deleteByPictureId(pictureId);
      this.pictures.delete(pictureId);
    });
  }

  private resolveStoreLocation(storeLocation: string | undefined): string {
    return normalizeStoreLocation(storeLocation ?? this.config.get('storeUrl') ?? '/');
  }

  private getThumbUrl(thumbFileName: string, storeLocation: string | undefined): string {
    const relative = this.fileStore.getThumbRelativePath(thumbFileName);
    return `${this.resolveStoreLocation(storeLocation)}${THUMBS_URL_PATH}${relative}`;
  }

  private async resizePicture(binary: Buffer, targetSize: number): Promise<Buffer> {
    try {
      return await this.processor.resize(binary, targetSize, this.config.get('defaultImageQuality'));
    } catch (err) {
      throw PictureError.invalidFormat(err instanceof Error ? err.message : String(err));
    }
  }

  /**
   * Create the thumb at `localPath` unless it exists. Concurrent calls for
   * the same path share one generation.
   */
  private async ensureThumb(localPath: string, produce: () => Promise<Buffer>): Promise<void> {
    if (await this.fileStore.exists(localPath)) {
      return;
    }

    const pending = this.thumbJobs.get(localPath);
    if (pending) {
      return pending;
    }

    const job = (async () => {
      const data = await produce();
      await this.fileStore.writeThumb(localPath, data);
    })().finally(() => {
      this.thumbJobs.delete(localPath);
    });

    this.thumbJobs.set(localPath, job);
    return job;
  }
}
