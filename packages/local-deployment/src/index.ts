/**
 * @picstore/local-deployment
 *
 * Single-process deployment: SQLite database and media files under the
 * configured data directory.
 */

import * as fs from 'node:fs/promises';
import type { Deployment } from '@picstore/deployment';
import { DBService } from '@picstore/db';
import { ConfigService, EventsService, PictureService } from '@picstore/services';
import { getDbPath } from '@picstore/utils';

export interface LocalDeploymentConfig {
  /** Database file; defaults to `<dataDir>/picstore.sqlite` */
  dbPath?: string;
  walMode?: boolean;
}

export class LocalDeployment implements Deployment {
  private _db: DBService | null = null;
  private _events: EventsService | null = null;
  private _pictures: PictureService | null = null;

  constructor(
    private _config: ConfigService,
    private deploymentConfig: LocalDeploymentConfig = {}
  ) {}

  async initialize(): Promise<void> {
    const errors = this._config.validate();
    if (errors.length > 0) {
      throw new Error(`Invalid configuration: ${errors.join('; ')}`);
    }

    const dbPath = this.deploymentConfig.dbPath ?? getDbPath(this._config.get('dataDir'));

    this._db = await DBService.create({
      dbPath,
      walMode: this.deploymentConfig.walMode ?? true
    });

    await fs.mkdir(this._config.imagesDir, { recursive: true });
    await fs.mkdir(this._config.thumbsDir, { recursive: true });
  }

  db(): DBService {
    if (!this._db) {
      throw new Error('Database not initialized. Call initialize() first.');
    }
    return this._db;
  }

  config(): ConfigService {
    return this._config;
  }

  events(): EventsService {
    if (!this._events) {
      this._events = new EventsService();
    }
    return this._events;
  }

  pictures(): PictureService {
    if (!this._pictures) {
      this._pictures = new PictureService(this.db(), this._config, this.events());
    }
    return this._pictures;
  }

  async cleanup(): Promise<void> {
    this._pictures = null;
    if (this._db) {
      this._db.close();
      this._db = null;
    }
  }
}
