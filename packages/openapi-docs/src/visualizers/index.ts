import type { FastifyInstance } from 'fastify';
import { DEFAULT_SPEC_JSON_URL, type OpenApiConfig, type VisualizerConfig, type VisualizerKind } from '../config';
import { OpenApiConfigError } from '../errors';
import type { SpecHandle } from '../registry';
import { HTML_CONTENT_TYPE, JSON_CONTENT_TYPE, YAML_CONTENT_TYPE } from './contentTypes';
import type { VisualizerPageRenderer } from './html';
import { renderRedocPage } from './redoc';
import { renderScalarPage } from './scalar';
import { mountSwaggerUi } from './swagger';

export { HTML_CONTENT_TYPE, JSON_CONTENT_TYPE, YAML_CONTENT_TYPE } from './contentTypes';

export type MountedVisualizer = {
  kind: VisualizerKind;
  url: string;
  specUrl: string;
  specJsonUrl?: string;
  specYamlUrl?: string;
};

type SpecRoutes = {
  json: (url: string) => void;
  yaml: (url: string) => void;
};

type SpecFormat = 'json' | 'yaml';

function createSpecRoutes(app: FastifyInstance, handle: SpecHandle): SpecRoutes {
  const registered = new Map<string, SpecFormat>();

  const register = (url: string, format: SpecFormat) => {
    const existing = registered.get(url);
    if (existing === format) {
      return;
    }
    if (existing) {
      throw new OpenApiConfigError(
        `Invalid OpenAPI configuration: ${url} is configured to serve both ${existing} and ${format}`
      );
    }
    registered.set(url, format);

    const contentType = format === 'json' ? JSON_CONTENT_TYPE : YAML_CONTENT_TYPE;
    const body = format === 'json' ? handle.json : handle.yaml;
    app.get(url, async (_request, reply) => {
      reply.type(contentType);
      return body;
    });
  };

  return {
    json: (url) => register(url, 'json'),
    yaml: (url) => register(url, 'yaml')
  };
}

function mountSpecUrls(config: VisualizerConfig, specRoutes: SpecRoutes): void {
  if (config.specJsonUrl) {
    specRoutes.json(config.specJsonUrl);
  }
  if (config.specYamlUrl) {
    specRoutes.yaml(config.specYamlUrl);
  }
}

function mountHtmlVisualizer(
  app: FastifyInstance,
  kind: VisualizerKind,
  config: VisualizerConfig,
  render: VisualizerPageRenderer,
  handle: SpecHandle,
  specRoutes: SpecRoutes
): MountedVisualizer {
  const specUrl = config.specJsonUrl ?? config.specYamlUrl ?? DEFAULT_SPEC_JSON_URL;
  if (!config.specJsonUrl && !config.specYamlUrl) {
    specRoutes.json(DEFAULT_SPEC_JSON_URL);
  }
  mountSpecUrls(config, specRoutes);

  const page = render({ title: handle.spec.info.title, specUrl });
  app.get(config.url, async (_request, reply) => {
    reply.type(HTML_CONTENT_TYPE);
    return page;
  });

  return { kind, url: config.url, specUrl, ...pickSpecUrls(config) };
}

function pickSpecUrls(config: VisualizerConfig): Pick<VisualizerConfig, 'specJsonUrl' | 'specYamlUrl'> {
  return {
    ...(config.specJsonUrl ? { specJsonUrl: config.specJsonUrl } : {}),
    ...(config.specYamlUrl ? { specYamlUrl: config.specYamlUrl } : {})
  };
}

/**
 * Mounts every configured visualizer. Kinds are independent: an absent kind
 * is skipped. Spec URLs shared between kinds are registered once.
 */
export async function mountVisualizers(
  app: FastifyInstance,
  config: OpenApiConfig,
  handle: SpecHandle
): Promise<MountedVisualizer[]> {
  const specRoutes = createSpecRoutes(app, handle);
  const mounted: MountedVisualizer[] = [];

  if (config.redoc) {
    mounted.push(mountHtmlVisualizer(app, 'redoc', config.redoc, renderRedocPage, handle, specRoutes));
  }

  if (config.scalar) {
    mounted.push(mountHtmlVisualizer(app, 'scalar', config.scalar, renderScalarPage, handle, specRoutes));
  }

  if (config.swagger) {
    mountSpecUrls(config.swagger, specRoutes);
    await mountSwaggerUi(app, config.swagger, handle);
    mounted.push({
      kind: 'swagger',
      url: config.swagger.url,
      specUrl: config.swagger.specJsonUrl,
      ...pickSpecUrls(config.swagger)
    });
  }

  return mounted;
}

export { renderRedocPage } from './redoc';
export { renderScalarPage } from './scalar';
export { renderSwaggerPage, SWAGGER_UI_ASSETS } from './swagger';
export { escapeHtml, toScriptJson } from './html';
