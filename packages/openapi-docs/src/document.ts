import type { OpenAPIV3 } from 'openapi-types';
import { DocumentFrozenError, DuplicateRouteError, DuplicateSecuritySchemeError } from './errors';
import { deepFreeze } from './freeze';
import { normalizeMethod, normalizePath, routeKey, type RouteKey } from './routeKey';
import type { DocumentInfo, HttpMethod, RouteDescriptor, RouteSecurity } from './types';

export const OPENAPI_VERSION = '3.0.3';

export const BASE_SOURCE = 'base';

export type ApiDocumentOptions = {
  info: DocumentInfo;
  servers?: OpenAPIV3.ServerObject[];
  tags?: OpenAPIV3.TagObject[];
  schemas?: Record<string, OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject>;
  securitySchemes?: Record<string, OpenAPIV3.SecuritySchemeObject>;
  routes?: RouteDescriptor[];
};

export type DocumentRoute = {
  readonly key: RouteKey;
  readonly method: HttpMethod;
  readonly path: string;
  readonly source: string;
  readonly descriptor: RouteDescriptor;
};

function toSecurityRequirements(security: RouteSecurity | undefined): OpenAPIV3.SecurityRequirementObject[] {
  if (!security || security === 'none') {
    return [];
  }
  return [{ [security.scheme]: security.scopes ?? [] }];
}

function toOperation(descriptor: RouteDescriptor): OpenAPIV3.OperationObject {
  return {
    ...(descriptor.operationId ? { operationId: descriptor.operationId } : {}),
    ...(descriptor.summary ? { summary: descriptor.summary } : {}),
    ...(descriptor.description ? { description: descriptor.description } : {}),
    ...(descriptor.tags && descriptor.tags.length > 0 ? { tags: descriptor.tags } : {}),
    ...(descriptor.parameters && descriptor.parameters.length > 0 ? { parameters: descriptor.parameters } : {}),
    ...(descriptor.requestBody ? { requestBody: descriptor.requestBody } : {}),
    responses: descriptor.responses,
    security: toSecurityRequirements(descriptor.security),
    ...(descriptor.deprecated ? { deprecated: true } : {})
  };
}

/**
 * In-memory OpenAPI specification: document metadata plus routes keyed by
 * `METHOD /path`, kept in insertion order. Mutable until {@link freeze}.
 */
export class ApiDocument {
  readonly info: DocumentInfo;
  private readonly servers: OpenAPIV3.ServerObject[];
  private readonly tags: OpenAPIV3.TagObject[];
  private readonly schemas = new Map<string, OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject>();
  private readonly securitySchemes = new Map<string, OpenAPIV3.SecuritySchemeObject>();
  private readonly routes = new Map<RouteKey, DocumentRoute>();
  private frozen = false;

  constructor(options: ApiDocumentOptions) {
    this.info = { ...options.info };
    this.servers = structuredClone(options.servers ?? []);
    this.tags = [];
    for (const tag of options.tags ?? []) {
      this.addTag(tag);
    }
    for (const [name, schema] of Object.entries(options.schemas ?? {})) {
      this.addSchema(name, schema);
    }
    for (const [name, scheme] of Object.entries(options.securitySchemes ?? {})) {
      this.addSecurityScheme(name, scheme);
    }
    for (const route of options.routes ?? []) {
      this.addRoute(route);
    }
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  get routeCount(): number {
    return this.routes.size;
  }

  addRoute(descriptor: RouteDescriptor, source: string = BASE_SOURCE): RouteKey {
    this.assertMutable('add a route');
    const method = normalizeMethod(descriptor.method);
    const path = normalizePath(descriptor.path);
    const key = routeKey(method, path);
    const existing = this.routes.get(key);
    if (existing) {
      throw new DuplicateRouteError(key, existing.source, source);
    }
    this.routes.set(key, {
      key,
      method,
      path,
      source,
      descriptor: { ...structuredClone(descriptor), method, path }
    });
    return key;
  }

  hasRoute(method: string, path: string): boolean {
    return this.routes.has(routeKey(method, path));
  }

  /** Returns a copy; edits to it do not reach the document. */
  getRoute(method: string, path: string): RouteDescriptor | undefined {
    const route = this.routes.get(routeKey(method, path));
    return route ? structuredClone(route.descriptor) : undefined;
  }

  routeKeys(): RouteKey[] {
    return Array.from(this.routes.keys());
  }

  routeSource(key: RouteKey): string | undefined {
    return this.routes.get(key)?.source;
  }

  listRoutes(): DocumentRoute[] {
    return Array.from(this.routes.values(), (route) => structuredClone(route));
  }

  addSecurityScheme(name: string, scheme: OpenAPIV3.SecuritySchemeObject): this {
    this.assertMutable(`add security scheme ${name}`);
    if (this.securitySchemes.has(name)) {
      throw new DuplicateSecuritySchemeError(name);
    }
    this.securitySchemes.set(name, structuredClone(scheme));
    return this;
  }

  hasSecurityScheme(name: string): boolean {
    return this.securitySchemes.has(name);
  }

  securitySchemeNames(): string[] {
    return Array.from(this.securitySchemes.keys());
  }

  addSchema(name: string, schema: OpenAPIV3.SchemaObject | OpenAPIV3.ReferenceObject): this {
    this.assertMutable(`add schema ${name}`);
    this.schemas.set(name, structuredClone(schema));
    return this;
  }

  addTag(tag: OpenAPIV3.TagObject): this {
    this.assertMutable(`add tag ${tag.name}`);
    if (!this.tags.some((existing) => existing.name === tag.name)) {
      this.tags.push(structuredClone(tag));
    }
    return this;
  }

  /**
   * Unfrozen deep copy. Routes keep the source they were registered from.
   */
  clone(): ApiDocument {
    const copy = new ApiDocument({
      info: this.info,
      servers: this.servers,
      tags: this.tags,
      schemas: Object.fromEntries(this.schemas),
      securitySchemes: Object.fromEntries(this.securitySchemes)
    });
    for (const route of this.routes.values()) {
      copy.addRoute(route.descriptor, route.source);
    }
    return copy;
  }

  freeze(): this {
    if (!this.frozen) {
      this.frozen = true;
      Object.freeze(this.info);
      for (const route of this.routes.values()) {
        deepFreeze(route);
      }
    }
    return this;
  }

  toOpenApi(): OpenAPIV3.Document {
    const paths: OpenAPIV3.PathsObject = {};
    for (const route of this.routes.values()) {
      const pathItem: OpenAPIV3.PathItemObject = paths[route.path] ?? {};
      pathItem[route.method] = toOperation(route.descriptor);
      paths[route.path] = pathItem;
    }

    const components: OpenAPIV3.ComponentsObject = {
      ...(this.schemas.size > 0 ? { schemas: Object.fromEntries(this.schemas) } : {}),
      ...(this.securitySchemes.size > 0 ? { securitySchemes: Object.fromEntries(this.securitySchemes) } : {})
    };

    const document: OpenAPIV3.Document = {
      openapi: OPENAPI_VERSION,
      info: { ...this.info },
      ...(this.servers.length > 0 ? { servers: this.servers } : {}),
      ...(this.tags.length > 0 ? { tags: this.tags } : {}),
      paths,
      ...(Object.keys(components).length > 0 ? { components } : {})
    };
    return structuredClone(document);
  }

  private assertMutable(operation: string): void {
    if (this.frozen) {
      throw new DocumentFrozenError(operation);
    }
  }
}
