import type { OpenAPIV3 } from 'openapi-types';

import { ApiDocument, addAuthSecuritySchemes } from '@routedoc/openapi';

import type { AppContext } from '../types';

export const SERVICE_VERSION = '0.1.0';

const albumSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['id', 'title', 'rating'],
  properties: {
    id: { type: 'string' },
    title: { type: 'string' },
    rating: { type: 'integer', minimum: 0, maximum: 10 }
  }
};

const albumInputSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['title', 'rating'],
  properties: {
    title: { type: 'string', minLength: 1, maxLength: 200 },
    rating: { type: 'integer', minimum: 0, maximum: 10 }
  },
  additionalProperties: false
};

const errorResponseSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['message'],
  properties: {
    message: { type: 'string' },
    details: { type: 'object', additionalProperties: true, nullable: true }
  }
};

/** Base document for the albums service. Routes arrive through the merge. */
export const buildApiDocument = (ctx: Readonly<AppContext>): ApiDocument => {
  const document = new ApiDocument({
    info: {
      title: 'Albums API',
      version: SERVICE_VERSION,
      description: 'Catalog of albums and their ratings'
    },
    servers: [
      {
        url: `http://127.0.0.1:${ctx.config.port}`,
        description: 'Local development'
      }
    ],
    tags: [{ name: 'album', description: 'Album listing and lookup' }],
    schemas: {
      Album: albumSchema,
      AlbumInput: albumInputSchema,
      ErrorResponse: errorResponseSchema
    }
  });

  return addAuthSecuritySchemes(document, ctx.config.jwtLocation);
};
