/**
 * Picture routes
 *
 * Route pattern: fastify.deployment → deployment.pictures() → PictureService
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import type { Picture } from '@picstore/db';
import type { PagedList } from '@picstore/utils';
import { mapPagedList } from '@picstore/utils';
import { ApiError } from '../error.js';
import {
  parseId,
  parseIdList,
  parseOptionalBoolean,
  parseOptionalInt,
  parsePictureType,
  readUploadedFile,
  storeLocationFor
} from './params.js';

/** Picture as returned by the API; the bytes are never included */
export interface PictureResponse {
  id: number;
  mimeType: string;
  seoFilename?: string;
  isNew: boolean;
  isTransient: boolean;
  sizeBytes: number;
  createdAt: string;
  updatedAt: string;
  url?: string;
}

export function toPictureResponse(picture: Picture, url?: string): PictureResponse {
  const response: PictureResponse = {
    id: picture.id,
    mimeType: picture.mimeType,
    seoFilename: picture.seoFilename,
    isNew: picture.isNew,
    isTransient: picture.isTransient,
    sizeBytes: picture.sizeBytes,
    createdAt: picture.createdAt,
    updatedAt: picture.updatedAt
  };
  if (url !== undefined) {
    response.url = url;
  }
  return response;
}

interface PictureParams {
  pictureId: string;
}

interface UrlQuery {
  targetSize?: string;
  showDefaultPicture?: string;
  defaultPictureType?: string;
}

interface UploadQuery {
  seoFilename?: string;
  isTransient?: string;
}

export interface SeoFilenameBody {
  seoFilename: string;
}

export const pictureRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  const pictures = () => fastify.deployment.pictures();
  const maxBytes = () => fastify.deployment.config().get('maximumFileSizeBytes');

  const requirePicture = (pictureId: string): Picture => {
    const picture = pictures().getPictureById(parseId(pictureId, 'pictureId'));
    if (!picture) {
      throw ApiError.notFound('Picture not found');
    }
    return picture;
  };

  // GET /api/pictures - One page of pictures, newest first
  fastify.get<{ Querystring: { pageIndex?: string; pageSize?: string } }>(
    '/pictures',
    async (request): Promise<PagedList<PictureResponse>> => {
      const pageIndex = parseOptionalInt(request.query.pageIndex, 'pageIndex', 0);
      const pageSize = parseOptionalInt(request.query.pageSize, 'pageSize', 20);
      return mapPagedList(pictures().getPictures(pageIndex, pageSize), (p) => toPictureResponse(p));
    }
  );

  // GET /api/pictures/by-ids?ids=3,1 - Pictures in the requested order
  fastify.get<{ Querystring: { ids?: string } }>('/pictures/by-ids', async (request) => {
    const found = pictures().getPicturesByIds(parseIdList(request.query.ids));
    return {
      pictures: found.map((p) => toPictureResponse(p)),
      total: found.length
    };
  });

  // GET /api/pictures/default-url - URL of the fallback picture
  fastify.get<{ Querystring: Omit<UrlQuery, 'showDefaultPicture'> }>(
    '/pictures/default-url',
    async (request) => {
      const url = await pictures().getDefaultPictureUrl({
        targetSize: parseOptionalInt(request.query.targetSize, 'targetSize', 0),
        defaultPictureType: parsePictureType(request.query.defaultPictureType),
        storeLocation: storeLocationFor(fastify, request)
      });
      return { url };
    }
  );

  // GET /api/pictures/:pictureId - Picture metadata with its original-size URL
  fastify.get<{ Params: PictureParams }>('/pictures/:pictureId', async (request) => {
    const picture = requirePicture(request.params.pictureId);
    const url = await pictures().getPictureUrl(picture, {
      showDefaultPicture: false,
      storeLocation: storeLocationFor(fastify, request)
    });
    // URL resolution clears the isNew flag
    const current = pictures().getPictureById(picture.id) ?? picture;
    return toPictureResponse(current, url);
  });

  // GET /api/pictures/:pictureId/url - URL for a target size, falling back to the default picture
  fastify.get<{ Params: PictureParams; Querystring: UrlQuery }>(
    '/pictures/:pictureId/url',
    async (request) => {
      const pictureId = parseId(request.params.pictureId, 'pictureId');
      const url = await pictures().getPictureUrl(pictureId, {
        targetSize: parseOptionalInt(request.query.targetSize, 'targetSize', 0),
        showDefaultPicture: parseOptionalBoolean(request.query.showDefaultPicture, 'showDefaultPicture', true),
        defaultPictureType: parsePictureType(request.query.defaultPictureType),
        storeLocation: storeLocationFor(fastify, request)
      });
      return { pictureId, url };
    }
  );

  // GET /api/pictures/:pictureId/size - Pixel size
  fastify.get<{ Params: PictureParams }>('/pictures/:pictureId/size', async (request) => {
    const picture = requirePicture(request.params.pictureId);
    return pictures().getPictureSize(picture);
  });

  // GET /api/pictures/:pictureId/binary - Raw bytes
  fastify.get<{ Params: PictureParams }>('/pictures/:pictureId/binary', async (request, reply) => {
    const picture = requirePicture(request.params.pictureId);
    const binary = await pictures().loadPictureBinary(picture);
    if (binary.length === 0) {
      throw ApiError.notFound('Picture binary not found');
    }
    return reply.header('Content-Type', picture.mimeType).send(binary);
  });

  // POST /api/pictures - Upload a picture (multipart)
  fastify.post<{ Querystring: UploadQuery }>('/pictures', async (request, reply) => {
    const upload = await readUploadedFile(request, maxBytes());
    const seoFilename = pictures().getPictureSeName(request.query.seoFilename ?? '') || undefined;
    const isTransient = parseOptionalBoolean(request.query.isTransient, 'isTransient', true);

    const picture = await pictures().insertPicture(upload.data, upload.mimeType, seoFilename, true, isTransient);

    fastify.log.info(`Picture uploaded: ${picture.id} (${upload.filename}, ${upload.data.length} bytes)`);

    return reply.status(201).send(toPictureResponse(picture));
  });

  // PUT /api/pictures/:pictureId - Replace a picture's bytes (multipart)
  fastify.put<{ Params: PictureParams; Querystring: UploadQuery }>(
    '/pictures/:pictureId',
    async (request) => {
      const pictureId = parseId(request.params.pictureId, 'pictureId');
      const existing = pictures().getPictureById(pictureId);
      if (!existing) {
        throw ApiError.notFound('Picture not found');
      }

      const upload = await readUploadedFile(request, maxBytes());
      const seoFilename = request.query.seoFilename === undefined
        ? existing.seoFilename
        : pictures().getPictureSeName(request.query.seoFilename) || undefined;

      const updated = await pictures().updatePictureById(pictureId, upload.data, upload.mimeType, seoFilename, true);
      if (!updated) {
        throw ApiError.notFound('Picture not found');
      }

      fastify.log.info(`Picture updated: ${pictureId}`);

      return toPictureResponse(updated);
    }
  );

  // PUT /api/pictures/:pictureId/seo-filename - Rename a picture for URLs
  fastify.put<{ Params: PictureParams; Body: SeoFilenameBody }>(
    '/pictures/:pictureId/seo-filename',
    async (request) => {
      const pictureId = parseId(request.params.pictureId, 'pictureId');
      const body = request.body;
      if (typeof body?.seoFilename !== 'string') {
        throw ApiError.badRequest('seoFilename is required');
      }

      const picture = await pictures().setSeoFilename(pictureId, pictures().getPictureSeName(body.seoFilename));
      if (!picture) {
        throw ApiError.notFound('Picture not found');
      }
      return toPictureResponse(picture);
    }
  );

  // DELETE /api/pictures/:pictureId - Delete a picture and its thumbnails
  fastify.delete<{ Params: PictureParams }>('/pictures/:pictureId', async (request, reply) => {
    const picture = requirePicture(request.params.pictureId);
    await pictures().deletePicture(picture);

    fastify.log.info(`Picture deleted: ${picture.id}`);

    return reply.status(204).send();
  });

  // GET /api/seo-names?name= - SEO name for a display name
  fastify.get<{ Querystring: { name?: string } }>('/seo-names', async (request) => {
    const name = request.query.name ?? '';
    return { name, seName: pictures().getPictureSeName(name) };
  });
};
