export * from './picture.js';
export * from './product-picture.js';
