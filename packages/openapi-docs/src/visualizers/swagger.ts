import fastifyStatic from '@fastify/static';
import type { FastifyInstance } from 'fastify';
import { getAbsoluteFSPath } from 'swagger-ui-dist';
import type { SwaggerConfig } from '../config';
import type { SpecHandle } from '../registry';
import { HTML_CONTENT_TYPE } from './contentTypes';
import { escapeHtml, toScriptJson, type VisualizerPageOptions } from './html';

export const SWAGGER_UI_ASSETS: ReadonlySet<string> = new Set([
  'swagger-ui.css',
  'swagger-ui-bundle.js',
  'swagger-ui-standalone-preset.js',
  'favicon-16x16.png',
  'favicon-32x32.png'
]);

export type SwaggerPageOptions = VisualizerPageOptions & {
  assetsUrl: string;
};

export function renderSwaggerPage({ title, specUrl, assetsUrl }: SwaggerPageOptions): string {
  const assets = escapeHtml(assetsUrl);
  const uiConfig = {
    url: specUrl,
    dom_id: '#swagger-ui',
    docExpansion: 'list',
    deepLinking: true,
    layout: 'StandaloneLayout'
  };

  return `
<!DOCTYPE html>
<html>
  <head>
    <title>${escapeHtml(title)}</title>
    <meta charset="utf-8"/>
    <meta name="viewport" content="width=device-width, initial-scale=1">
    <link rel="stylesheet" href="${assets}/swagger-ui.css">
    <link rel="icon" type="image/png" href="${assets}/favicon-32x32.png" sizes="32x32">
  </head>
  <body>
    <div id="swagger-ui"></div>
    <script src="${assets}/swagger-ui-bundle.js"></script>
    <script src="${assets}/swagger-ui-standalone-preset.js"></script>
    <script>
      window.ui = SwaggerUIBundle(Object.assign(${toScriptJson(uiConfig)}, {
        presets: [SwaggerUIBundle.presets.apis, SwaggerUIStandalonePreset]
      }));
    </script>
  </body>
</html>
  `.trim();
}

/**
 * Serves the Swagger UI page at `url` and its bundled assets under `url/`.
 * The page fetches the spec from `specJsonUrl`.
 */
export async function mountSwaggerUi(
  app: FastifyInstance,
  config: SwaggerConfig,
  handle: SpecHandle
): Promise<void> {
  const assetsUrl = config.url.replace(/\/$/, '');

  await app.register(fastifyStatic, {
    root: getAbsoluteFSPath(),
    prefix: `${assetsUrl}/`,
    index: false,
    decorateReply: false,
    allowedPath: (pathName) => SWAGGER_UI_ASSETS.has(pathName.replace(/^\//, ''))
  });

  const page = renderSwaggerPage({ title: handle.spec.info.title, specUrl: config.specJsonUrl, assetsUrl });
  app.get(config.url, async (_request, reply) => {
    reply.type(HTML_CONTENT_TYPE);
    return page;
  });
}
