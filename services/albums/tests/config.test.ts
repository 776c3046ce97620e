import assert from 'node:assert/strict';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { test } from 'node:test';

import { OpenApiConfigError } from '@routedoc/openapi';

import { loadConfig } from '../src/config';

const writeOpenApiConfig = async (contents: string) => {
  const dir = await mkdtemp(path.join(os.tmpdir(), 'albums-config-'));
  const filePath = path.join(dir, 'openapi.yaml');
  await writeFile(filePath, contents, 'utf8');
  return { dir, filePath };
};

test('loads defaults and the bundled visualizer config', () => {
  const config = loadConfig({});

  assert.equal(config.host, '0.0.0.0');
  assert.equal(config.port, 5150);
  assert.equal(config.logLevel, 'info');
  assert.deepEqual(config.jwtLocation, { kind: 'bearer' });
  assert.deepEqual(config.openApi, {
    redoc: { url: '/redoc', specJsonUrl: '/redoc/openapi.json', specYamlUrl: '/redoc/openapi.yaml' },
    scalar: { url: '/scalar', specJsonUrl: '/scalar/openapi.json', specYamlUrl: '/scalar/openapi.yaml' },
    swagger: { url: '/swagger', specJsonUrl: '/api-docs/openapi.json', specYamlUrl: '/api-docs/openapi.yaml' }
  });
});

test('reads overrides from the environment', () => {
  const config = loadConfig({
    ALBUMS_HOST: ' 127.0.0.1 ',
    ALBUMS_PORT: '8080',
    ALBUMS_LOG_LEVEL: 'debug',
    ALBUMS_JWT_LOCATION: 'cookie:session'
  });

  assert.equal(config.host, '127.0.0.1');
  assert.equal(config.port, 8080);
  assert.equal(config.logLevel, 'debug');
  assert.deepEqual(config.jwtLocation, { kind: 'cookie', name: 'session' });
});

test('rejects an invalid port', () => {
  assert.throws(() => loadConfig({ ALBUMS_PORT: 'abc' }), /ALBUMS_PORT must be a positive integer/);
  assert.throws(() => loadConfig({ ALBUMS_PORT: '0' }), /ALBUMS_PORT must be a positive integer/);
});

test('rejects an unknown JWT location', () => {
  assert.throws(
    () => loadConfig({ ALBUMS_JWT_LOCATION: 'header' }),
    /ALBUMS_JWT_LOCATION must be "bearer", "query:<name>" or "cookie:<name>"/
  );
});

test('reads the visualizer config from ALBUMS_OPENAPI_CONFIG', async (t) => {
  const { dir, filePath } = await writeOpenApiConfig('openapi:\n  scalar:\n    url: /docs\n');
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  const config = loadConfig({ ALBUMS_OPENAPI_CONFIG: filePath });
  assert.deepEqual(config.openApi, { scalar: { url: '/docs' } });
});

test('treats a file without an openapi section as no visualizers', async (t) => {
  const { dir, filePath } = await writeOpenApiConfig('server:\n  port: 5150\n');
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  assert.deepEqual(loadConfig({ ALBUMS_OPENAPI_CONFIG: filePath }).openApi, {});
});

test('fails when the swagger entry has no spec json url', async (t) => {
  const { dir, filePath } = await writeOpenApiConfig('openapi:\n  swagger:\n    url: /swagger\n');
  t.after(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  assert.throws(
    () => loadConfig({ ALBUMS_OPENAPI_CONFIG: filePath }),
    (error: unknown) =>
      error instanceof OpenApiConfigError &&
      error.message === 'Invalid OpenAPI configuration: swagger.spec_json_url is required'
  );
});

test('fails when the config file is missing', () => {
  const missing = path.join(os.tmpdir(), 'albums-config-missing', 'openapi.yaml');
  assert.throws(
    () => loadConfig({ ALBUMS_OPENAPI_CONFIG: missing }),
    { message: `OpenAPI config file not found: ${missing}` }
  );
});
