import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { ConfigService } from '@picstore/services';
import { LocalDeployment } from '../src/index.js';

describe('LocalDeployment', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'picstore-deploy-'));
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  it('creates the database and media directories', async () => {
    const deployment = new LocalDeployment(new ConfigService({ dataDir: tmpDir }));
    await deployment.initialize();

    const stat = await fs.stat(path.join(tmpDir, 'media', 'thumbs'));
    expect(stat.isDirectory()).toBe(true);
    expect(deployment.db().path).toBe(path.join(tmpDir, 'picstore.sqlite'));
    expect(deployment.pictures()).toBe(deployment.pictures());

    await deployment.cleanup();
    expect(() => deployment.db()).toThrow('Database not initialized');
  });

  it('refuses an invalid configuration', async () => {
    const deployment = new LocalDeployment(new ConfigService({ dataDir: tmpDir, port: 0 }));

    await expect(deployment.initialize()).rejects.toThrow('Invalid configuration: port must be between 1 and 65535');
  });
});
