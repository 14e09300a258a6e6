/**
 * Configuration service
 *
 * Media settings plus the server's own settings. Values come from the
 * defaults, then a JSON file, then `PICSTORE_*` environment variables.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getConfigPath, getImagesDir, getThumbsDir } from '@picstore/utils';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface PicstoreConfig {
  dataDir: string;
  port: number;
  host: string;
  logLevel: LogLevel;
  /** Public base URL of the store; when unset the request's origin is used */
  storeUrl?: string;
  /** Keep picture bytes in the database instead of files */
  storeInDb: boolean;
  /** Largest accepted width or height in pixels */
  maximumImageSize: number;
  maximumFileSizeBytes: number;
  /** JPEG quality for generated thumbnails (1-100) */
  defaultImageQuality: number;
  /** Spread thumbnails over sub-directories named after their first characters */
  multipleThumbDirectories: boolean;
  /** Directory with default-image.png and default-avatar.png */
  defaultImagesDir: string;
}

export const BUNDLED_DEFAULT_IMAGES_DIR = fileURLToPath(new URL('../assets/images', import.meta.url));

export const DEFAULT_CONFIG: PicstoreConfig = {
  dataDir: './data',
  port: 3000,
  host: '0.0.0.0',
  logLevel: 'info',
  storeInDb: true,
  maximumImageSize: 1280,
  maximumFileSizeBytes: 20 * 1024 * 1024,
  defaultImageQuality: 90,
  multipleThumbDirectories: false,
  defaultImagesDir: BUNDLED_DEFAULT_IMAGES_DIR
};

// ─── Parsing ──────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

function parseBoolean(value: string): boolean | undefined {
  switch (value.trim().toLowerCase()) {
    case '1': case 'true': case 'yes': case 'on': return true;
    case '0': case 'false': case 'no': case 'off': return false;
    default: return undefined;
  }
}

function parseInteger(value: string): number | undefined {
  const parsed = Number(value.trim());
  return Number.isInteger(parsed) ? parsed : undefined;
}

/**
 * Pick the known settings out of a parsed JSON object. Keys with the wrong
 * type are reported in `errors` and skipped.
 */
export function parseConfigObject(
  source: unknown,
  errors: string[] = []
): Partial<PicstoreConfig> {
  const result: Partial<PicstoreConfig> = {};
  if (!isRecord(source)) {
    errors.push('configuration must be a JSON object');
    return result;
  }

  const str = (key: keyof PicstoreConfig): string | undefined => {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'string') return value;
    errors.push(`${key} must be a string`);
    return undefined;
  };
  const num = (key: keyof PicstoreConfig): number | undefined => {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'number' && Number.isFinite(value)) return value;
    errors.push(`${key} must be a number`);
    return undefined;
  };
  const bool = (key: keyof PicstoreConfig): boolean | undefined => {
    const value = source[key];
    if (value === undefined) return undefined;
    if (typeof value === 'boolean') return value;
    errors.push(`${key} must be a boolean`);
    return undefined;
  };

  const dataDir = str('dataDir');
  if (dataDir !== undefined) result.dataDir = dataDir;
  const port = num('port');
  if (port !== undefined) result.port = port;
  const host = str('host');
  if (host !== undefined) result.host = host;
  const logLevel = source['logLevel'];
  if (logLevel !== undefined) {
    if (isLogLevel(logLevel)) {
      result.logLevel = logLevel;
    } else {
      errors.push(`logLevel must be one of ${LOG_LEVELS.join(', ')}`);
    }
  }
  const storeUrl = str('storeUrl');
  if (storeUrl !== undefined) result.storeUrl = storeUrl;
  const storeInDb = bool('storeInDb');
  if (storeInDb !== undefined) result.storeInDb = storeInDb;
  const maximumImageSize = num('maximumImageSize');
  if (maximumImageSize !== undefined) result.maximumImageSize = maximumImageSize;
  const maximumFileSizeBytes = num('maximumFileSizeBytes');
  if (maximumFileSizeBytes !== undefined) result.maximumFileSizeBytes = maximumFileSizeBytes;
  const defaultImageQuality = num('defaultImageQuality');
  if (defaultImageQuality !== undefined) result.defaultImageQuality = defaultImageQuality;
  const multipleThumbDirectories = bool('multipleThumbDirectories');
  if (multipleThumbDirectories !== undefined) result.multipleThumbDirectories = multipleThumbDirectories;
  const defaultImagesDir = str('defaultImagesDir');
  if (defaultImagesDir !== undefined) result.defaultImagesDir = defaultImagesDir;

  return result;
}

/**
 * Read `PICSTORE_*` variables. Unparseable values are reported in `errors`.
 */
export function parseConfigEnv(
  env: NodeJS.ProcessEnv,
  errors: string[] = []
): Partial<PicstoreConfig> {
  const result: Partial<PicstoreConfig> = {};

  const int = (name: string): number | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = parseInteger(raw);
    if (value === undefined) errors.push(`${name} must be an integer`);
    return value;
  };
  const flag = (name: string): boolean | undefined => {
    const raw = env[name];
    if (raw === undefined || raw === '') return undefined;
    const value = parseBoolean(raw);
    if (value === undefined) errors.push(`${name} must be a boolean`);
    return value;
  };

  if (env.PICSTORE_DATA_DIR) result.dataDir = env.PICSTORE_DATA_DIR;
  if (env.PICSTORE_HOST) result.host = env.PICSTORE_HOST;
  if (env.PICSTORE_STORE_URL) result.storeUrl = env.PICSTORE_STORE_URL;
  if (env.PICSTORE_DEFAULT_IMAGES_DIR) result.defaultImagesDir = env.PICSTORE_DEFAULT_IMAGES_DIR;

  const logLevel = env.PICSTORE_LOG_LEVEL;
  if (logLevel) {
    if (isLogLevel(logLevel)) {
      result.logLevel = logLevel;
    } else {
      errors.push(`PICSTORE_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
    }
  }

  const port = int('PICSTORE_PORT');
  if (port !== undefined) result.port = port;
  const maximumImageSize = int('PICSTORE_MAXIMUM_IMAGE_SIZE');
  if (maximumImageSize !== undefined) result.maximumImageSize = maximumImageSize;
  const maximumFileSizeBytes = int('PICSTORE_MAXIMUM_FILE_SIZE_BYTES');
  if (maximumFileSizeBytes !== undefined) result.maximumFileSizeBytes = maximumFileSizeBytes;
  const defaultImageQuality = int('PICSTORE_DEFAULT_IMAGE_QUALITY');
  if (defaultImageQuality !== undefined) result.defaultImageQuality = defaultImageQuality;
  const storeInDb = flag('PICSTORE_STORE_IN_DB');
  if (storeInDb !== undefined) result.storeInDb = storeInDb;
  const multipleThumbDirectories = flag('PICSTORE_MULTIPLE_THUMB_DIRECTORIES');
  if (multipleThumbDirectories !== undefined) result.multipleThumbDirectories = multipleThumbDirectories;

  return result;
}

// ─── Service ──────────────────────────────────────────────────────

export class ConfigService {
  private config: PicstoreConfig;
  private configPath: string | undefined;

  constructor(initialConfig: Partial<PicstoreConfig> = {}) {
    this.config = { ...DEFAULT_CONFIG, ...initialConfig };
  }

  /**
   * Defaults, then the JSON file (`PICSTORE_CONFIG` or `<dataDir>/config.json`),
   * then environment variables.
   */
  static load(env: NodeJS.ProcessEnv = process.env): ConfigService {
    const envErrors: string[] = [];
    const fromEnv = parseConfigEnv(env, envErrors);
    if (envErrors.length > 0) {
      throw new Error(`Invalid environment configuration: ${envErrors.join('; ')}`);
    }

    const service = new ConfigService();
    const dataDir = fromEnv.dataDir ?? DEFAULT_CONFIG.dataDir;
    service.loadFromFile(env.PICSTORE_CONFIG ?? getConfigPath(dataDir));
    service.merge(fromEnv);
    return service;
  }

  get<K extends keyof PicstoreConfig>(key: K): PicstoreConfig[K] {
    return this.config[key];
  }

  set<K extends keyof PicstoreConfig>(key: K, value: PicstoreConfig[K]): void {
    this.config[key] = value;
  }

  getAll(): PicstoreConfig {
    return { ...this.config };
  }

  merge(partial: Partial<PicstoreConfig>): void {
    Object.assign(this.config, partial);
  }

  get imagesDir(): string {
    return path.resolve(getImagesDir(this.config.dataDir));
  }

  get thumbsDir(): string {
    return path.resolve(getThumbsDir(this.config.dataDir));
  }

  validate(): string[] {
    const errors: string[] = [];

    if (!this.config.dataDir) {
      errors.push('dataDir is required');
    }
    if (!Number.isInteger(this.config.port) || this.config.port < 1 || this.config.port > 65535) {
      errors.push('port must be between 1 and 65535');
    }
    if (!Number.isInteger(this.config.maximumImageSize) || this.config.maximumImageSize < 1) {
      errors.push('maximumImageSize must be a positive integer');
    }
    if (!Number.isInteger(this.config.maximumFileSizeBytes) || this.config.maximumFileSizeBytes < 1) {
      errors.push('maximumFileSizeBytes must be a positive integer');
    }
    if (
      !Number.isInteger(this.config.defaultImageQuality) ||
      this.config.defaultImageQuality < 1 ||
      this.config.defaultImageQuality > 100
    ) {
      errors.push('defaultImageQuality must be between 1 and 100');
    }
    if (this.config.storeUrl !== undefined && !URL.canParse(this.config.storeUrl)) {
      errors.push('storeUrl must be an absolute URL');
    }

    return errors;
  }

  // ─── File Persistence ─────────────────────────────────────────────

  /** Merge settings from a JSON file; a missing file is not an error */
  loadFromFile(configPath: string): void {
    this.configPath = configPath;
    if (!fs.existsSync(configPath)) return;

    const content = fs.readFileSync(configPath, 'utf-8');
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new Error(`Failed to parse config ${configPath}: ${err instanceof Error ? err.message : String(err)}`);
    }

    const errors: string[] = [];
    const fileConfig = parseConfigObject(parsed, errors);
    if (errors.length > 0) {
      throw new Error(`Invalid config ${configPath}: ${errors.join('; ')}`);
    }
    this.merge(fileConfig);
  }

  saveToFile(configPath?: string): void {
    const targetPath = configPath ?? this.configPath;
    if (!targetPath) {
      throw new Error('No config file path specified');
    }

    fs.mkdirSync(path.dirname(targetPath), { recursive: true });
    fs.writeFileSync(targetPath, JSON.stringify(this.config, null, 2), 'utf-8');
  }
}
