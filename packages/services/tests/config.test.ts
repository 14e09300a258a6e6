import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigService, DEFAULT_CONFIG, parseConfigEnv, parseConfigObject } from '../src/config.js';
import { createTempDir } from './helpers.js';

describe('parseConfigObject', () => {
  it('picks known settings', () => {
    expect(parseConfigObject({ port: 8080, storeInDb: false, logLevel: 'debug', unknown: 1 })).toEqual({
      port: 8080,
      storeInDb: false,
      logLevel: 'debug'
    });
  });

  it('reports settings of the wrong type', () => {
    const errors: string[] = [];
    expect(parseConfigObject({ port: 'x', logLevel: 'loud' }, errors)).toEqual({});
    expect(errors).toEqual(['port must be a number', 'logLevel must be one of debug, info, warn, error']);
  });

  it('rejects non-objects', () => {
    const errors: string[] = [];
    parseConfigObject([1, 2], errors);
    expect(errors).toEqual(['configuration must be a JSON object']);
  });
});

describe('parseConfigEnv', () => {
  it('reads PICSTORE_ variables', () => {
    expect(parseConfigEnv({
      PICSTORE_PORT: '8081',
      PICSTORE_STORE_IN_DB: 'no',
      PICSTORE_MULTIPLE_THUMB_DIRECTORIES: '1',
      PICSTORE_STORE_URL: 'https://shop.test/'
    })).toEqual({
      port: 8081,
      storeInDb: false,
      multipleThumbDirectories: true,
      storeUrl: 'https://shop.test/'
    });
  });

  it('reports unparseable values', () => {
    const errors: string[] = [];
    parseConfigEnv({ PICSTORE_MAXIMUM_IMAGE_SIZE: 'big', PICSTORE_STORE_IN_DB: 'maybe' }, errors);
    expect(errors).toEqual([
      'PICSTORE_MAXIMUM_IMAGE_SIZE must be an integer',
      'PICSTORE_STORE_IN_DB must be a boolean'
    ]);
  });
});

describe('ConfigService', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('starts from the defaults', () => {
    const config = new ConfigService();
    expect(config.getAll()).toEqual(DEFAULT_CONFIG);
    expect(config.validate()).toEqual([]);
  });

  it('layers the config file under environment variables', async () => {
    await fs.writeFile(path.join(tmpDir, 'config.json'), JSON.stringify({ maximumImageSize: 640, port: 3500 }));

    const config = ConfigService.load({ PICSTORE_DATA_DIR: tmpDir, PICSTORE_PORT: '4000' });

    expect(config.get('maximumImageSize')).toBe(640);
    expect(config.get('port')).toBe(4000);
    expect(config.get('dataDir')).toBe(tmpDir);
  });

  it('fails on a malformed config file', async () => {
    await fs.writeFile(path.join(tmpDir, 'config.json'), '{ not json');
    expect(() => ConfigService.load({ PICSTORE_DATA_DIR: tmpDir })).toThrow(/Failed to parse config/);
  });

  it('fails on malformed environment values', () => {
    expect(() => ConfigService.load({ PICSTORE_PORT: 'eighty' })).toThrow(
      'Invalid environment configuration: PICSTORE_PORT must be an integer'
    );
  });

  it('validates ranges', () => {
    const config = new ConfigService({ defaultImageQuality: 0, port: 70000, storeUrl: 'not a url' });
    expect(config.validate()).toEqual([
      'port must be between 1 and 65535',
      'defaultImageQuality must be between 1 and 100',
      'storeUrl must be an absolute URL'
    ]);
  });

  it('derives media directories from the data directory', () => {
    const config = new ConfigService({ dataDir: tmpDir });
    expect(config.imagesDir).toBe(path.join(tmpDir, 'media', 'images'));
    expect(config.thumbsDir).toBe(path.join(tmpDir, 'media', 'thumbs'));
  });

  it('saves and reloads settings', async () => {
    const file = path.join(tmpDir, 'nested', 'config.json');
    const config = new ConfigService({ dataDir: tmpDir, storeInDb: false });
    config.saveToFile(file);

    const reloaded = new ConfigService();
    reloaded.loadFromFile(file);
    expect(reloaded.get('storeInDb')).toBe(false);
    expect(reloaded.get('dataDir')).toBe(tmpDir);
  });
});
