import type { OpenAPIV3 } from 'openapi-types';

export const HTTP_METHODS = ['get', 'put', 'post', 'delete', 'options', 'head', 'patch'] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export type HttpMethodInput = HttpMethod | Uppercase<HttpMethod>;

/**
 * A named security scheme (optionally with scopes), or `'none'` for a route
 * that is explicitly public.
 */
export type RouteSecurity = { scheme: string; scopes?: string[] } | 'none';

export type RouteDescriptor = {
  method: HttpMethodInput;
  path: string;
  operationId?: string;
  summary?: string;
  description?: string;
  tags?: string[];
  parameters?: OpenAPIV3.ParameterObject[];
  requestBody?: OpenAPIV3.RequestBodyObject;
  responses: Record<string, OpenAPIV3.ResponseObject>;
  security?: RouteSecurity;
  deprecated?: boolean;
};

export type RouteCollection = {
  source: string;
  routes: readonly RouteDescriptor[];
};

export type DocumentInfo = {
  title: string;
  version: string;
  description?: string;
};
