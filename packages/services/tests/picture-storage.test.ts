import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigService } from '../src/config.js';
import { getExtensionFromMime, PictureFileStore, resolveInside } from '../src/picture-storage.js';
import { createTempDir, fileExists } from './helpers.js';

describe('getExtensionFromMime', () => {
  it.each([
    ['image/jpeg', 'jpg'],
    ['image/pjpeg', 'jpg'],
    ['image/x-png', 'png'],
    ['image/png', 'png'],
    ['image/svg+xml', 'svg'],
    ['image/x-icon', 'ico'],
    ['IMAGE/WEBP; charset=binary', 'webp'],
    ['', 'bin']
  ])('maps %s to %s', (mimeType, extension) => {
    expect(getExtensionFromMime(mimeType)).toBe(extension);
  });
});

describe('resolveInside', () => {
  const base = path.resolve('/srv/thumbs');

  it('resolves paths inside the base directory', () => {
    expect(resolveInside(base, '000/0000001.png')).toBe(path.join(base, '000', '0000001.png'));
  });

  it('rejects paths that leave the base directory', () => {
    expect(resolveInside(base, '../secret.txt')).toBeUndefined();
    expect(resolveInside(base, '/etc/passwd')).toBeUndefined();
    expect(resolveInside(base, '.')).toBeUndefined();
    expect(resolveInside(base, '../thumbs-old/x.png')).toBeUndefined();
  });
});

describe('PictureFileStore', () => {
  let tmpDir: string;
  let config: ConfigService;
  let store: PictureFileStore;

  beforeEach(async () => {
    tmpDir = await createTempDir();
    config = new ConfigService({ dataDir: tmpDir });
    store = new PictureFileStore(config);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('names picture files by padded id and extension', () => {
    expect(store.getPictureFileName(42, 'image/jpeg')).toBe('0000042-0.jpg');
  });

  it('saves, loads and deletes picture files', async () => {
    const data = Buffer.from('picture-bytes');
    await store.savePictureFile(5, 'image/png', data);

    expect((await store.loadPictureFile(5, 'image/png')).equals(data)).toBe(true);

    await store.deletePictureFile(5, 'image/png');
    expect((await store.loadPictureFile(5, 'image/png')).length).toBe(0);
  });

  it('places thumbs in sub-directories when configured', () => {
    expect(store.getThumbRelativePath('0000042_10.png')).toBe('0000042_10.png');

    config.set('multipleThumbDirectories', true);
    expect(store.getThumbRelativePath('0000042_10.png')).toBe('000/0000042_10.png');
    expect(store.getThumbLocalPath('0000042_10.png')).toBe(path.join(config.thumbsDir, '000', '0000042_10.png'));
  });

  it('deletes only the thumbs of the given picture', async () => {
    const sub = path.join(config.thumbsDir, '123');
    await fs.mkdir(sub, { recursive: true });
    const files = [
      path.join(config.thumbsDir, '1234567.png'),
      path.join(config.thumbsDir, '1234567_shoe_100.png'),
      path.join(sub, '1234567_80.jpg'),
      path.join(config.thumbsDir, '12345678_80.png'),
      path.join(sub, '12345678.png')
    ];
    for (const file of files) {
      await fs.writeFile(file, 'x');
    }

    expect(await store.deleteThumbs(1234567)).toBe(3);

    expect(await fileExists(path.join(config.thumbsDir, '12345678_80.png'))).toBe(true);
    expect(await fileExists(path.join(sub, '12345678.png'))).toBe(true);
    expect(await fileExists(path.join(sub, '1234567_80.jpg'))).toBe(false);
  });

  it('returns 0 when the thumbs directory does not exist', async () => {
    expect(await store.deleteThumbs(1)).toBe(0);
  });

  it('writes thumbs without leaving temporary files', async () => {
    const target = store.getThumbLocalPath('0000001_20.png');
    await store.writeThumb(target, Buffer.from('thumb'));

    expect(await fs.readFile(target, 'utf-8')).toBe('thumb');
    expect(await fs.readdir(config.thumbsDir)).toEqual(['0000001_20.png']);
  });
});
