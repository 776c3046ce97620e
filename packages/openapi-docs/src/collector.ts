import type { FastifyInstance, RouteHandlerMethod } from 'fastify';
import { CollectorSealedError } from './errors';
import { normalizeMethod, routeKey, upperCaseMethod } from './routeKey';
import type { RouteCollection, RouteDescriptor } from './types';

export const AUTOMATIC_SOURCE = 'automatic';

export type DocumentedRouteOptions = Omit<RouteDescriptor, 'path'> & {
  url: string;
  handler: RouteHandlerMethod;
};

/**
 * Accumulates route descriptors while routes are registered. Owned by the
 * startup sequence and handed to the merge once registration is over.
 */
export class RouteCollector {
  readonly source: string;
  private readonly routes: RouteDescriptor[] = [];
  private isSealed = false;

  constructor(source: string = AUTOMATIC_SOURCE) {
    this.source = source;
  }

  get size(): number {
    return this.routes.length;
  }

  get sealed(): boolean {
    return this.isSealed;
  }

  add(descriptor: RouteDescriptor): this {
    if (this.isSealed) {
      throw new CollectorSealedError(this.source, routeKey(descriptor.method, descriptor.path));
    }
    this.routes.push(structuredClone(descriptor));
    return this;
  }

  /**
   * Registers the handler on `app` and records its descriptor. The recorded
   * path includes the plugin prefix of `app`.
   */
  route(app: FastifyInstance, options: DocumentedRouteOptions): this {
    const { url, handler, ...operation } = options;
    const method = normalizeMethod(options.method);
    const descriptor: RouteDescriptor = { ...operation, method, path: `${app.prefix}${url}` };

    this.add(descriptor);
    app.route({ method: upperCaseMethod(method), url, handler });
    return this;
  }

  toCollection(): RouteCollection {
    this.isSealed = true;
    return { source: this.source, routes: this.routes.map((route) => structuredClone(route)) };
  }
}

export function manualCollection(source: string, routes: readonly RouteDescriptor[]): RouteCollection {
  return { source, routes: routes.map((route) => structuredClone(route)) };
}
