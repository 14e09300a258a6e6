export * from './health.js';
export * from './media.js';
export * from './pictures.js';
export * from './products.js';
