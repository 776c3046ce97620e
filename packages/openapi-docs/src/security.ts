import type { OpenAPIV3 } from 'openapi-types';
import type { ApiDocument } from './document';

export const JWT_SECURITY_SCHEME = 'jwt_token';
export const API_KEY_SECURITY_SCHEME = 'api_key';
export const API_KEY_HEADER = 'apikey';

export type JwtLocation =
  | { kind: 'bearer' }
  | { kind: 'query'; name: string }
  | { kind: 'cookie'; name: string };

export const DEFAULT_JWT_LOCATION: JwtLocation = { kind: 'bearer' };

/**
 * Parses `bearer`, `query:<name>` or `cookie:<name>`. Returns null for
 * anything else.
 */
export function parseJwtLocation(raw: string | undefined): JwtLocation | null {
  const value = raw?.trim();
  if (!value) {
    return null;
  }
  if (value.toLowerCase() === 'bearer') {
    return { kind: 'bearer' };
  }
  const separator = value.indexOf(':');
  if (separator <= 0) {
    return null;
  }
  const kind = value.slice(0, separator).toLowerCase();
  const name = value.slice(separator + 1).trim();
  if (!name) {
    return null;
  }
  if (kind === 'query' || kind === 'cookie') {
    return { kind, name };
  }
  return null;
}

export function jwtSecurityScheme(location: JwtLocation): OpenAPIV3.SecuritySchemeObject {
  switch (location.kind) {
    case 'bearer':
      return { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' };
    case 'query':
      return { type: 'apiKey', in: 'query', name: location.name };
    case 'cookie':
      return { type: 'apiKey', in: 'cookie', name: location.name };
  }
}

export function apiKeySecurityScheme(): OpenAPIV3.SecuritySchemeObject {
  return { type: 'apiKey', in: 'header', name: API_KEY_HEADER };
}

export function addAuthSecuritySchemes(
  document: ApiDocument,
  location: JwtLocation = DEFAULT_JWT_LOCATION
): ApiDocument {
  return document
    .addSecurityScheme(JWT_SECURITY_SCHEME, jwtSecurityScheme(location))
    .addSecurityScheme(API_KEY_SECURITY_SCHEME, apiKeySecurityScheme());
}
