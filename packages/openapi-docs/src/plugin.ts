import type { FastifyInstance } from 'fastify';
import type { RouteCollector } from './collector';
import type { OpenApiConfig } from './config';
import type { ApiDocument } from './document';
import { RegistryStateError } from './errors';
import { finalizeDocument } from './merge';
import { SpecRegistry, type SpecHandle } from './registry';
import type { RouteCollection } from './types';
import { mountVisualizers } from './visualizers';

declare module 'fastify' {
  interface FastifyInstance {
    openApi: SpecHandle;
  }
}

export type DocumentBuilder<TContext> = (context: Readonly<TContext>) => ApiDocument;

export type OpenApiDocsOptions<TContext> = {
  context: TContext;
  build: DocumentBuilder<TContext>;
  collector?: RouteCollector;
  collections?: readonly RouteCollection[];
  visualizers: OpenApiConfig;
};

/**
 * Builds the base document, merges the collector's routes and then every
 * manual collection, caches the result on `app.openApi` and mounts the
 * configured visualizers. Call once per instance, after all documented routes
 * are registered and before the server starts listening.
 */
export async function registerOpenApiDocs<TContext>(
  app: FastifyInstance,
  options: OpenApiDocsOptions<TContext>
): Promise<SpecHandle> {
  if (app.hasDecorator('openApi')) {
    throw new RegistryStateError(
      'REGISTRY_ALREADY_INITIALIZED',
      'OpenAPI docs have already been registered on this instance'
    );
  }

  const base = options.build(options.context);
  const collections: RouteCollection[] = [
    ...(options.collector ? [options.collector.toCollection()] : []),
    ...(options.collections ?? [])
  ];

  const { document, warnings } = finalizeDocument(base, collections);
  for (const warning of warnings) {
    app.log.warn(
      { routeKey: warning.routeKey, scheme: warning.scheme, source: warning.source },
      'Route references an undefined security scheme'
    );
  }
  app.log.info({ routes: document.routeCount, warnings: warnings.length }, 'OpenAPI document finalized');

  const handle = new SpecRegistry().initialize(document);
  app.decorate('openApi', handle);

  const mounted = await mountVisualizers(app, options.visualizers, handle);
  for (const visualizer of mounted) {
    app.log.info(visualizer, 'Mounted OpenAPI visualizer');
  }

  return handle;
}
