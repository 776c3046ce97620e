import type { LoggerOptions } from 'pino';
import { stdTimeFunctions } from 'pino';

import type { AlbumsConfig } from './config';

export const SERVICE_NAME = 'albums-service';

// Headers that carry the jwt_token and api_key credentials.
export const REDACTED_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  'req.headers.apikey'
];

export const createLogger = (config: Pick<AlbumsConfig, 'logLevel'>): LoggerOptions => ({
  level: config.logLevel,
  base: { service: SERVICE_NAME },
  timestamp: stdTimeFunctions.isoTime,
  redact: {
    paths: REDACTED_PATHS,
    censor: '[redacted]'
  }
});
