/**
 * Version utilities
 */

import * as fs from 'node:fs';
import * as path from 'node:path';

let cachedVersion: string | undefined;

interface PackageManifest {
  name?: string;
  version?: string;
}

function readManifest(filePath: string): PackageManifest | undefined {
  const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  if (typeof parsed !== 'object' || parsed === null) {
    return undefined;
  }
  const manifest: PackageManifest = {};
  if ('name' in parsed && typeof parsed.name === 'string') {
    manifest.name = parsed.name;
  }
  if ('version' in parsed && typeof parsed.version === 'string') {
    manifest.version = parsed.version;
  }
  return manifest;
}

/**
 * The current application version, read from the nearest package.json
 * above the working directory. Falls back to npm's environment, then 0.0.0.
 */
export function getAppVersion(): string {
  if (cachedVersion !== undefined) {
    return cachedVersion;
  }

  let currentDir = process.cwd();
  for (let i = 0; i < 10; i++) {
    const packagePath = path.join(currentDir, 'package.json');
    if (fs.existsSync(packagePath)) {
      const manifest = readManifest(packagePath);
      if (manifest?.version) {
        cachedVersion = manifest.version;
        return cachedVersion;
      }
    }
    const parent = path.dirname(currentDir);
    if (parent === currentDir) {
      break;
    }
    currentDir = parent;
  }

  cachedVersion = process.env['npm_package_version'] ?? '0.0.0';
  return cachedVersion;
}
