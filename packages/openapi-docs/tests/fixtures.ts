import type { OpenAPIV3 } from 'openapi-types';
import { ApiDocument, type RouteDescriptor } from '../src';

export const albumSchema: OpenAPIV3.SchemaObject = {
  type: 'object',
  required: ['title', 'rating'],
  properties: {
    title: { type: 'string' },
    rating: { type: 'integer', minimum: 0 }
  }
};

export const okResponse = (description: string): Record<string, OpenAPIV3.ResponseObject> => ({
  200: {
    description,
    content: {
      'application/json': {
        schema: { $ref: '#/components/schemas/Album' }
      }
    }
  }
});

export function listAlbumsRoute(overrides: Partial<RouteDescriptor> = {}): RouteDescriptor {
  return {
    method: 'get',
    path: '/album',
    summary: 'List albums',
    tags: ['album'],
    responses: okResponse('Albums found'),
    security: { scheme: 'jwt_token' },
    ...overrides
  };
}

export function getAlbumRoute(overrides: Partial<RouteDescriptor> = {}): RouteDescriptor {
  return {
    method: 'get',
    path: '/album/:id',
    summary: 'Get album',
    parameters: [{ name: 'id', in: 'path', required: true, schema: { type: 'string' } }],
    responses: okResponse('Album found'),
    security: 'none',
    ...overrides
  };
}

export function buildBaseDocument(routes: RouteDescriptor[] = [listAlbumsRoute()]): ApiDocument {
  return new ApiDocument({
    info: { title: 'Album API', version: '1.0.0', description: 'Albums for tests' },
    schemas: { Album: albumSchema },
    securitySchemes: {
      jwt_token: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' }
    },
    routes
  });
}
