/**
 * @picstore/services
 *
 * Business services for picstore: configuration, events, image
 * processing, picture file storage and the picture service itself.
 */

export * from './config.js';
export * from './events.js';
export * from './image-processor.js';
export * from './picture-error.js';
export * from './picture-storage.js';
export * from './picture.js';
