/**
 * Product picture routes
 */

import type { FastifyInstance, FastifyPluginAsync } from 'fastify';
import { ApiError } from '../error.js';
import { parseId, parseOptionalInt, readUploadedFile } from './params.js';
import { toPictureResponse } from './pictures.js';

interface ProductParams {
  productId: string;
}

export const productRoutes: FastifyPluginAsync = async (fastify: FastifyInstance) => {
  const pictures = () => fastify.deployment.pictures();

  // GET /api/products/:productId/pictures - Pictures of a product by display order
  fastify.get<{ Params: ProductParams; Querystring: { recordsToReturn?: string } }>(
    '/products/:productId/pictures',
    async (request) => {
      const productId = parseId(request.params.productId, 'productId');
      const recordsToReturn = parseOptionalInt(request.query.recordsToReturn, 'recordsToReturn', 0);
      const found = pictures().getPicturesByProductId(productId, recordsToReturn);

      return {
        productId,
        pictures: found.map((p) => toPictureResponse(p)),
        total: found.length
      };
    }
  );

  // POST /api/products/:productId/pictures - Upload a product picture, skipping duplicates
  fastify.post<{ Params: ProductParams; Querystring: { displayOrder?: string; seoFilename?: string } }>(
    '/products/:productId/pictures',
    async (request, reply) => {
      const productId = parseId(request.params.productId, 'productId');
      if (productId === 0) {
        throw ApiError.badRequest('productId must be positive');
      }
      const displayOrder = parseOptionalInt(request.query.displayOrder, 'displayOrder', 0);
      const upload = await readUploadedFile(request, fastify.deployment.config().get('maximumFileSizeBytes'));
      const seoFilename = pictures().getPictureSeName(request.query.seoFilename ?? '') || undefined;

      const result = await pictures().addPictureToProduct(
        productId,
        upload.data,
        upload.mimeType,
        seoFilename,
        displayOrder
      );

      if (result.duplicate) {
        fastify.log.info(`Product ${productId} already has picture ${result.picture.id}`);
      } else {
        fastify.log.info(`Picture ${result.picture.id} added to product ${productId}`);
      }

      return reply.status(result.duplicate ? 200 : 201).send({
        productId,
        duplicate: result.duplicate,
        picture: toPictureResponse(result.picture)
      });
    }
  );

  // POST /api/products/:productId/pictures/:pictureId - Attach an uploaded picture and keep it
  fastify.post<{ Params: ProductParams & { pictureId: string }; Querystring: { displayOrder?: string } }>(
    '/products/:productId/pictures/:pictureId',
    async (request) => {
      const productId = parseId(request.params.productId, 'productId');
      if (productId === 0) {
        throw ApiError.badRequest('productId must be positive');
      }
      const pictureId = parseId(request.params.pictureId, 'pictureId');
      const displayOrder = parseOptionalInt(request.query.displayOrder, 'displayOrder', 0);

      const picture = pictures().attachPictureToProduct(productId, pictureId, displayOrder);
      if (!picture) {
        throw ApiError.notFound('Picture not found');
      }

      fastify.log.info(`Picture ${pictureId} attached to product ${productId}`);

      return { productId, picture: toPictureResponse(picture) };
    }
  );

  // DELETE /api/products/:productId/pictures/:pictureId - Detach a picture from a product
  fastify.delete<{ Params: ProductParams & { pictureId: string } }>(
    '/products/:productId/pictures/:pictureId',
    async (request, reply) => {
      const productId = parseId(request.params.productId, 'productId');
      const pictureId = parseId(request.params.pictureId, 'pictureId');

      if (!pictures().removePictureFromProduct(productId, pictureId)) {
        throw ApiError.notFound('Product picture not found');
      }

      return reply.status(204).send();
    }
  );
};
