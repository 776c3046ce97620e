import type { FastifyInstance } from 'fastify';
import type { OpenAPIV3 } from 'openapi-types';
import { z } from 'zod';

import {
  JWT_SECURITY_SCHEME,
  manualCollection,
  type RouteCollection,
  type RouteCollector,
  type RouteDescriptor
} from '@routedoc/openapi';

import { mapErrorToResponse } from '../errors';
import type { AppContext } from '../types';

export const ALBUM_LOOKUP_SOURCE = 'album-lookup';

export const albumInputSchema = z.object({
  title: z.string().trim().min(1).max(200),
  rating: z.number().int().min(0).max(10)
});

const albumParamsSchema = z.object({ id: z.string().min(1) });

const jsonContent = (ref: string): Record<string, OpenAPIV3.MediaTypeObject> => ({
  'application/json': {
    schema: { $ref: `#/components/schemas/${ref}` }
  }
});

const errorResponse = (description: string): OpenAPIV3.ResponseObject => ({
  description,
  content: jsonContent('ErrorResponse')
});

const albumLookupRoutes: RouteDescriptor[] = [
  {
    method: 'get',
    path: '/api/albums/:id',
    operationId: 'getAlbum',
    summary: 'Fetch an album',
    tags: ['album'],
    parameters: [
      {
        name: 'id',
        in: 'path',
        required: true,
        description: 'Album identifier.',
        schema: { type: 'string' }
      }
    ],
    responses: {
      200: { description: 'The album.', content: jsonContent('Album') },
      404: errorResponse('No album has this identifier.')
    },
    security: 'none'
  }
];

/** Descriptors for routes registered without the collector. */
export const albumLookupCollection = (): RouteCollection =>
  manualCollection(ALBUM_LOOKUP_SOURCE, albumLookupRoutes);

export const registerAlbumRoutes = (app: FastifyInstance, ctx: AppContext, collector: RouteCollector) => {
  collector.route(app, {
    method: 'get',
    url: '/albums',
    operationId: 'listAlbums',
    summary: 'List albums',
    tags: ['album'],
    responses: {
      200: {
        description: 'All stored albums.',
        content: {
          'application/json': {
            schema: {
              type: 'object',
              required: ['albums'],
              properties: {
                albums: { type: 'array', items: { $ref: '#/components/schemas/Album' } }
              }
            }
          }
        }
      }
    },
    security: { scheme: JWT_SECURITY_SCHEME },
    handler: async () => ({ albums: ctx.store.list() })
  });

  collector.route(app, {
    method: 'post',
    url: '/albums',
    operationId: 'createAlbum',
    summary: 'Create an album',
    tags: ['album'],
    requestBody: {
      required: true,
      content: jsonContent('AlbumInput')
    },
    responses: {
      201: { description: 'Album created.', content: jsonContent('Album') },
      400: errorResponse('The request body failed validation.')
    },
    security: { scheme: JWT_SECURITY_SCHEME },
    handler: async (request, reply) => {
      const parseResult = albumInputSchema.safeParse(request.body ?? {});
      if (!parseResult.success) {
        const mapped = mapErrorToResponse(parseResult.error);
        return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
      }

      const album = ctx.store.create(parseResult.data);
      return reply.status(201).send(album);
    }
  });

  app.get('/albums/:id', async (request, reply) => {
    const parseResult = albumParamsSchema.safeParse(request.params);
    if (!parseResult.success) {
      const mapped = mapErrorToResponse(parseResult.error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }

    try {
      return ctx.store.get(parseResult.data.id);
    } catch (error) {
      const mapped = mapErrorToResponse(error);
      return reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
    }
  });
};
