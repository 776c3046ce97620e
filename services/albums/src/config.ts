import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';

import {
  DEFAULT_JWT_LOCATION,
  parseJwtLocation,
  parseOpenApiConfig,
  type JwtLocation,
  type OpenApiConfig
} from '@routedoc/openapi';
import { parse as parseYaml } from 'yaml';

export interface AlbumsConfig {
  host: string;
  port: number;
  logLevel: string;
  jwtLocation: JwtLocation;
  openApi: OpenApiConfig;
}

export const DEFAULT_OPENAPI_CONFIG_PATH = path.resolve(__dirname, '..', 'config', 'openapi.yaml');

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export const loadOpenApiConfigFile = (filePath: string): OpenApiConfig => {
  if (!existsSync(filePath)) {
    throw new Error(`OpenAPI config file not found: ${filePath}`);
  }

  const parsed: unknown = parseYaml(readFileSync(filePath, 'utf8'));
  return parseOpenApiConfig(isRecord(parsed) ? parsed.openapi : undefined);
};

const resolveJwtLocation = (raw: string | undefined): JwtLocation => {
  if (!raw?.trim()) {
    return DEFAULT_JWT_LOCATION;
  }

  const location = parseJwtLocation(raw);
  if (!location) {
    throw new Error('ALBUMS_JWT_LOCATION must be "bearer", "query:<name>" or "cookie:<name>"');
  }
  return location;
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AlbumsConfig => {
  const port = Number.parseInt(env.ALBUMS_PORT ?? '5150', 10);

  if (Number.isNaN(port) || port <= 0) {
    throw new Error('ALBUMS_PORT must be a positive integer');
  }

  const host = env.ALBUMS_HOST?.trim() || '0.0.0.0';
  const logLevel = env.ALBUMS_LOG_LEVEL?.trim() || 'info';
  const jwtLocation = resolveJwtLocation(env.ALBUMS_JWT_LOCATION);
  const openApiConfigEnv = env.ALBUMS_OPENAPI_CONFIG?.trim();
  const openApiConfigPath = openApiConfigEnv
    ? path.resolve(process.cwd(), openApiConfigEnv)
    : DEFAULT_OPENAPI_CONFIG_PATH;

  return {
    host,
    port,
    logLevel,
    jwtLocation,
    openApi: loadOpenApiConfigFile(openApiConfigPath)
  };
};
