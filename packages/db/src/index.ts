/**
 * @picstore/db
 *
 * SQLite persistence for picstore: the connection with its migrations and
 * the picture repositories.
 */

export * from './models/index.js';
export * from './connection.js';
