/**
 * Database connection management
 */

import Database, { type Database as DatabaseType } from 'better-sqlite3';
import * as path from 'node:path';
import * as fs from 'node:fs';
import { getAssetDir, getDbPath } from '@picstore/utils';

export type { DatabaseType };

export const MEMORY_DB_PATH = ':memory:';

export interface DbConfig {
  /** Path to the SQLite database file, or `:memory:`. Defaults to the asset directory */
  dbPath?: string;
  /** Log every statement through console.log */
  verbose?: boolean;
  /** Enable WAL mode for better concurrency */
  walMode?: boolean;
}

interface Migration {
  version: number;
  name: string;
  sql: string;
}

/**
 * Database service that wraps better-sqlite3
 */
export class DBService {
  private db: DatabaseType;
  private dbPath: string;

  private constructor(db: DatabaseType, dbPath: string) {
    this.db = db;
    this.dbPath = dbPath;
  }

  /**
   * Open the database and apply pending migrations
   */
  static async create(config: DbConfig = {}): Promise<DBService> {
    const dbPath = config.dbPath ?? getDbPath(getAssetDir());

    if (dbPath !== MEMORY_DB_PATH) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    const db = new Database(dbPath, {
      verbose: config.verbose ? console.log : undefined
    });

    if (config.walMode !== false && dbPath !== MEMORY_DB_PATH) {
      db.pragma('journal_mode = WAL');
    }

    db.pragma('foreign_keys = ON');

    const service = new DBService(db, dbPath);
    await service.runMigrations();

    return service;
  }

  /**
   * Underlying database instance for direct queries
   */
  get database(): DatabaseType {
    return this.db;
  }

  get path(): string {
    return this.dbPath;
  }

  /**
   * Run `fn` inside a transaction; it is rolled back if `fn` throws.
   */
  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private async runMigrations(): Promise<void> {
    this.db.exec(`
      CREATE TABLE IF NOT EXISTS _migrations (
        version INTEGER PRIMARY KEY,
        name TEXT NOT NULL,
        applied_at TEXT NOT NULL DEFAULT (datetime('now'))
      )
    `);

    const appliedVersions = new Set(
      this.db
        .prepare<[], { version: number }>('SELECT version FROM _migrations')
        .all()
        .map((row) => row.version)
    );

    for (const migration of this.getMigrations()) {
      if (appliedVersions.has(migration.version)) {
        continue;
      }

      console.debug(`Applying migration ${migration.version}: ${migration.name}`);

      const apply = this.db.transaction(() => {
        this.db.exec(migration.sql);
        this.db
          .prepare('INSERT INTO _migrations (version, name) VALUES (?, ?)')
          .run(migration.version, migration.name);
      });

      apply();
    }
  }

  private getMigrations(): Migration[] {
    return [
      {
        version: 1,
        name: 'create_pictures',
        sql: `
          CREATE TABLE IF NOT EXISTS pictures (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            picture_binary BLOB,
            mime_type TEXT NOT NULL,
            seo_filename TEXT,
            is_new INTEGER NOT NULL DEFAULT 1,
            is_transient INTEGER NOT NULL DEFAULT 1,
            size_bytes INTEGER NOT NULL DEFAULT 0,
            hash TEXT NOT NULL,
            created_at TEXT NOT NULL DEFAULT (datetime('now')),
            updated_at TEXT NOT NULL DEFAULT (datetime('now'))
          );
          CREATE INDEX IF NOT EXISTS idx_pictures_transient ON pictures(is_transient, updated_at);
        `
      },
      {
        version: 2,
        name: 'create_product_pictures',
        sql: `
          CREATE TABLE IF NOT EXISTS product_pictures (
            id INTEGER PRIMARY KEY AUTOINCREMENT,
            product_id INTEGER NOT NULL,
            picture_id INTEGER NOT NULL REFERENCES pictures(id) ON DELETE CASCADE,
            display_order INTEGER NOT NULL DEFAULT 0,
            created_at TEXT NOT NULL DEFAULT (datetime('now')),
            UNIQUE(product_id, picture_id)
          );
          CREATE INDEX IF NOT EXISTS idx_product_pictures_product_id ON product_pictures(product_id);
          CREATE INDEX IF NOT EXISTS idx_product_pictures_picture_id ON product_pictures(picture_id);
        `
      }
    ];
  }
}
