/**
 * Request parsing helpers shared by the routes
 */

import type { FastifyInstance, FastifyRequest } from 'fastify';
import { PICTURE_TYPES, type PictureType } from '@picstore/db';
import { ApiError } from '../error.js';

/** Non-negative integer path or query value */
export function parseId(value: string | undefined, name: string): number {
  const parsed = Number(value);
  if (value === undefined || value.trim() === '' || !Number.isInteger(parsed) || parsed < 0) {
    throw ApiError.badRequest(`${name} must be a non-negative integer`);
  }
  return parsed;
}

export function parseOptionalInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value === '') {
    return fallback;
  }
  return parseId(value, name);
}

export function parseOptionalBoolean(value: string | undefined, name: string, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback;
  }
  if (value === 'true' || value === '1') {
    return true;
  }
  if (value === 'false' || value === '0') {
    return false;
  }
  throw ApiError.badRequest(`${name} must be true or false`);
}

export function parsePictureType(value: string | undefined): PictureType {
  if (value === undefined || value === '') {
    return 'entity';
  }
  const type = PICTURE_TYPES.find((t) => t === value);
  if (!type) {
    throw ApiError.badRequest(`defaultPictureType must be one of ${PICTURE_TYPES.join(', ')}`);
  }
  return type;
}

/** Comma-separated list of ids, e.g. `3,1,2` */
export function parseIdList(value: string | undefined): number[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map((part) => parseId(part, 'ids'));
}

/**
 * Base URL for generated links: the configured store URL, else the origin
 * the request came in on.
 */
export function storeLocationFor(fastify: FastifyInstance, request: FastifyRequest): string {
  const configured = fastify.deployment.config().get('storeUrl');
  if (configured) {
    return configured.endsWith('/') ? configured : `${configured}/`;
  }
  return `${request.protocol}://${request.hostname}/`;
}

export interface UploadedFile {
  filename: string;
  mimeType: string;
  data: Buffer;
}

/**
 * Read the single multipart file of a request, enforcing `maxBytes`.
 */
export async function readUploadedFile(request: FastifyRequest, maxBytes: number): Promise<UploadedFile> {
  const part = await request.file();
  if (!part) {
    throw ApiError.badRequest('No file uploaded');
  }

  const { filename, mimetype, file } = part;
  const chunks: Buffer[] = [];
  let totalSize = 0;

  for await (const chunk of file) {
    const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(chunk);
    totalSize += buffer.length;
    if (totalSize > maxBytes) {
      throw ApiError.payloadTooLarge('File too large', { maxSize: maxBytes });
    }
    chunks.push(buffer);
  }

  return { filename, mimeType: mimetype, data: Buffer.concat(chunks) };
}
