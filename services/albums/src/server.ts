import process from 'node:process';

import { VISUALIZER_KINDS, type OpenApiConfig, type VisualizerKind } from '@routedoc/openapi';
import type { FastifyInstance } from 'fastify';

import { createApp } from './app';
import { loadConfig, type AlbumsConfig } from './config';

export interface DocumentationLink {
  kind: VisualizerKind;
  url: string;
}

export const publicOrigin = (host: string, port: number) =>
  `http://${host === '0.0.0.0' ? '127.0.0.1' : host}:${port}`;

/** Browser links for every mounted documentation page. */
export const documentationLinks = (openApi: OpenApiConfig, origin: string): DocumentationLink[] =>
  VISUALIZER_KINDS.flatMap((kind) => {
    const visualizer = openApi[kind];
    return visualizer ? [{ kind, url: `${origin}${visualizer.url}` }] : [];
  });

export const startServer = async (config: AlbumsConfig): Promise<FastifyInstance> => {
  const { app } = await createApp(config);

  await app.listen({ port: config.port, host: config.host });
  app.log.info({ port: config.port, host: config.host }, 'Albums service listening');

  for (const link of documentationLinks(config.openApi, publicOrigin(config.host, config.port))) {
    app.log.info(link, 'OpenAPI documentation available');
  }

  const shutdown = async (signal: NodeJS.Signals) => {
    app.log.info({ signal }, 'Shutting down albums service');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.once('SIGTERM', () => void shutdown('SIGTERM'));
  process.once('SIGINT', () => void shutdown('SIGINT'));

  return app;
};

if (require.main === module) {
  startServer(loadConfig()).catch((error) => {
    // eslint-disable-next-line no-console
    console.error('Albums service failed to start', error);
    process.exit(1);
  });
}
