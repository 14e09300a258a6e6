/**
 * @picstore/server
 *
 * HTTP API server for picstore.
 *
 * Routes:
 * - /api/health - Health checks
 * - /api/pictures - Picture CRUD, URLs, sizes and SEO names
 * - /api/products/:productId/pictures - Product pictures with dedup
 * - /media - Thumbnails and default pictures
 */

export * from './app.js';
export * from './error.js';
export * from './routes/index.js';
