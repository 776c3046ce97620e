import assert from 'node:assert/strict';
import { test } from 'node:test';
import { InvalidRouteError, normalizeMethod, normalizePath, routeKey } from '../src';

test('normalizes fastify parameters into openapi templates', () => {
  assert.equal(normalizePath('/album/:id'), '/album/{id}');
  assert.equal(normalizePath('/album/:id(^\\d+)/tracks/:trackId'), '/album/{id}/tracks/{trackId}');
  assert.equal(normalizePath('/album/{id}'), '/album/{id}');
});

test('drops empty segments and trailing slashes', () => {
  assert.equal(normalizePath('  //api//album/  '), '/api/album');
  assert.equal(normalizePath('/'), '/');
});

test('rejects empty paths', () => {
  assert.throws(() => normalizePath('   '), InvalidRouteError);
});

test('treats method case and parameter syntax as the same route', () => {
  assert.equal(routeKey('get', '/album/:id/'), 'GET /album/{id}');
  assert.equal(routeKey('GET', '/album/{id}'), 'GET /album/{id}');
});

test('rejects unsupported methods', () => {
  assert.equal(normalizeMethod(' PATCH '), 'patch');
  assert.throws(() => normalizeMethod('connect'), (error: unknown) => {
    assert(error instanceof InvalidRouteError);
    assert.equal(error.code, 'INVALID_ROUTE');
    assert.equal(error.message, 'Unsupported HTTP method "connect"');
    return true;
  });
});
