/**
 * @picstore/utils
 *
 * Shared utilities for picstore:
 * - assets (data, media and database locations)
 * - paged-list
 * - text (SE names, padding, truncation)
 * - version
 */

export * from './assets.js';
export * from './paged-list.js';
export * from './text.js';
export * from './version.js';
