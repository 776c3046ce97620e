import { InvalidRouteError } from './errors';
import { HTTP_METHODS, type HttpMethod } from './types';

export type RouteKey = `${Uppercase<HttpMethod>} ${string}`;

const UPPERCASE_METHODS = {
  get: 'GET',
  put: 'PUT',
  post: 'POST',
  delete: 'DELETE',
  options: 'OPTIONS',
  head: 'HEAD',
  patch: 'PATCH'
} as const satisfies Record<HttpMethod, Uppercase<HttpMethod>>;

const FASTIFY_PARAM_PATTERN = /:([A-Za-z_][A-Za-z0-9_]*)(\([^)]*\))?/g;

function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

export function normalizeMethod(method: string): HttpMethod {
  const normalized = method.trim().toLowerCase();
  if (!isHttpMethod(normalized)) {
    throw new InvalidRouteError(`Unsupported HTTP method "${method}"`);
  }
  return normalized;
}

export function upperCaseMethod(method: HttpMethod): Uppercase<HttpMethod> {
  return UPPERCASE_METHODS[method];
}

/**
 * Canonical OpenAPI form of a route path. Empty segments are dropped and
 * Fastify parameters (`:id`, `:id(^\\d+)`) become `{id}`.
 */
export function normalizePath(path: string): string {
  const trimmed = path.trim();
  if (trimmed.length === 0) {
    throw new InvalidRouteError('Route path must not be empty');
  }
  const segments = trimmed
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.replace(FASTIFY_PARAM_PATTERN, (_match, name: string) => `{${name}}`));
  return `/${segments.join('/')}`;
}

export function routeKey(method: string, path: string): RouteKey {
  return `${upperCaseMethod(normalizeMethod(method))} ${normalizePath(path)}`;
}
