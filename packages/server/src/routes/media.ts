/**
 * Media routes
 *
 * Serve generated thumbnails and the default images under `/media`.
 */

import type { FastifyInstance, FastifyPluginAsync, FastifyReply } from 'fastify';
import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { ApiError } from '../error.js';

const CONTENT_TYPES: Record<string, string> = {
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
  '.png': 'image/png',
  '.gif': 'image/gif',
  '.webp': 'image/webp',
  '.svg': 'image/svg+xml',
  '.ico': 'image/x-icon'
};

export function contentTypeFor(filePath: string): string {
  return CONTENT_TYPES[path.extname(filePath).toLowerCase()] ?? 'application/octet-stream';
}

async function sendMediaFile(reply: FastifyReply, filePath: string | undefined): Promise<FastifyReply> {
  if (!filePath) {
    throw ApiError.notFound('File not found');
  }

  let buffer: Buffer;
  try {
    buffer = await fs.readFile(filePath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && (err.code === 'ENOENT' || err.code === 'EISDIR')) {
      throw ApiError.notFound('File not found');
    }
    throw err;
  }

  return reply
    .header('Content-Type', contentTypeFor(filePath))
    .header('Cache-Control', 'public, max-age=31536000') // 1 year cache
    .send(buffer);
}

export const mediaRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  const pictures = () => fastify.deployment.pictures();

  // GET /media/thumbs/* - Generated thumbnails
  fastify.get<{ Params: { '*': string } }>('/media/thumbs/*', async (request, reply) => {
    return sendMediaFile(reply, pictures().getThumbFilePath(request.params['*']));
  });

  // GET /media/default/:fileName - Default pictures
  fastify.get<{ Params: { fileName: string } }>('/media/default/:fileName', async (request, reply) => {
    return sendMediaFile(reply, pictures().getDefaultPictureFilePath(request.params.fileName));
  });
};
