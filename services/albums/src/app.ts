import fastify, { type FastifyInstance } from 'fastify';

import { RouteCollector, registerOpenApiDocs } from '@routedoc/openapi';

import type { AlbumsConfig } from './config';
import { mapErrorToResponse } from './errors';
import { createLogger } from './logger';
import { buildApiDocument } from './openapi/document';
import { albumLookupCollection, registerAlbumRoutes } from './routes/albums';
import { registerHealthRoutes } from './routes/health';
import { AlbumStore, seedAlbums } from './store';
import type { AppContext } from './types';

interface CreateAppResult {
  app: FastifyInstance;
  ctx: AppContext;
}

export const createApp = async (config: AlbumsConfig): Promise<CreateAppResult> => {
  const logger = createLogger(config);
  const app = fastify({ logger });

  const ctx: AppContext = {
    config,
    store: new AlbumStore(seedAlbums)
  };

  app.setErrorHandler((error, request, reply) => {
    const mapped = mapErrorToResponse(error);
    if (mapped.statusCode >= 500) {
      request.log.error({ err: error }, 'Unhandled error');
    }
    reply.status(mapped.statusCode).send({ message: mapped.message, details: mapped.details });
  });

  registerHealthRoutes(app);

  const collector = new RouteCollector();
  await app.register(
    async (api) => {
      registerAlbumRoutes(api, ctx, collector);
    },
    { prefix: '/api' }
  );

  await registerOpenApiDocs(app, {
    context: ctx,
    build: buildApiDocument,
    collector,
    collections: [albumLookupCollection()],
    visualizers: config.openApi
  });

  return { app, ctx };
};
