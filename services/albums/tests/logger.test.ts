import assert from 'node:assert/strict';
import { test } from 'node:test';

import pino from 'pino';

import { createLogger, SERVICE_NAME } from '../src/logger';

test('tags every line with the service name', () => {
  const options = createLogger({ logLevel: 'debug' });

  assert.equal(options.level, 'debug');
  assert.deepEqual(options.base, { service: SERVICE_NAME });
});

test('redacts credential headers from request logs', () => {
  const lines: string[] = [];
  const logger = pino(createLogger({ logLevel: 'info' }), {
    write(message: string) {
      lines.push(message);
    }
  });

  logger.info(
    { req: { method: 'GET', headers: { authorization: 'Bearer test-token', apikey: 'test-key', accept: '*/*' } } },
    'request completed'
  );

  assert.equal(lines.length, 1);
  const entry = JSON.parse(lines[0] ?? '{}');
  assert.equal(entry.service, 'albums-service');
  assert.equal(entry.msg, 'request completed');
  assert.deepEqual(entry.req.headers, { authorization: '[redacted]', apikey: '[redacted]', accept: '*/*' });
});
