import assert from 'node:assert/strict';
import { test } from 'node:test';

import { documentationLinks, publicOrigin } from '../src/server';

test('links every configured documentation page', () => {
  const links = documentationLinks(
    {
      swagger: { url: '/swagger', specJsonUrl: '/api-docs/openapi.json' },
      redoc: { url: '/redoc' }
    },
    'http://127.0.0.1:5150'
  );

  assert.deepEqual(links, [
    { kind: 'redoc', url: 'http://127.0.0.1:5150/redoc' },
    { kind: 'swagger', url: 'http://127.0.0.1:5150/swagger' }
  ]);
});

test('returns no links when no visualizer is configured', () => {
  assert.deepEqual(documentationLinks({}, 'http://127.0.0.1:5150'), []);
});

test('maps the wildcard host to loopback', () => {
  assert.equal(publicOrigin('0.0.0.0', 5150), 'http://127.0.0.1:5150');
  assert.equal(publicOrigin('albums.internal', 8080), 'http://albums.internal:8080');
});
