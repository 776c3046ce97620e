import { z, type ZodIssue } from 'zod';
import { OpenApiConfigError } from './errors';

export const VISUALIZER_KINDS = ['redoc', 'scalar', 'swagger'] as const;

export type VisualizerKind = (typeof VISUALIZER_KINDS)[number];

export const DEFAULT_SPEC_JSON_URL = '/api-docs/openapi.json';

export type VisualizerConfig = {
  url: string;
  specJsonUrl?: string;
  specYamlUrl?: string;
};

export type SwaggerConfig = VisualizerConfig & {
  specJsonUrl: string;
};

export type OpenApiConfig = {
  redoc?: VisualizerConfig;
  scalar?: VisualizerConfig;
  swagger?: SwaggerConfig;
};

const mountPathSchema = z.string().trim().startsWith('/', 'must start with "/"');

const visualizerEntrySchema = z
  .object({
    url: mountPathSchema,
    spec_json_url: mountPathSchema.optional(),
    spec_yaml_url: mountPathSchema.optional()
  })
  .strict();

const swaggerEntrySchema = visualizerEntrySchema.extend({
  spec_json_url: mountPathSchema
});

const openApiConfigSchema = z
  .object({
    redoc: visualizerEntrySchema.optional(),
    scalar: visualizerEntrySchema.optional(),
    swagger: swaggerEntrySchema.optional()
  })
  .strict();

type VisualizerEntry = z.infer<typeof visualizerEntrySchema>;

function toVisualizerConfig(entry: VisualizerEntry): VisualizerConfig {
  return {
    url: entry.url,
    ...(entry.spec_json_url ? { specJsonUrl: entry.spec_json_url } : {}),
    ...(entry.spec_yaml_url ? { specYamlUrl: entry.spec_yaml_url } : {})
  };
}

function describeIssue(issue: ZodIssue): string {
  const field = issue.path.length > 0 ? issue.path.join('.') : 'openapi';
  if (issue.code === 'invalid_type' && issue.received === 'undefined') {
    return `${field} is required`;
  }
  if (issue.code === 'unrecognized_keys') {
    return `${field} has unknown keys: ${issue.keys.join(', ')}`;
  }
  return `${field} ${issue.message}`;
}

/**
 * Validates the visualizer configuration surface
 * (`{ redoc?, scalar?, swagger? }` with `url`, `spec_json_url`,
 * `spec_yaml_url`). Absent kinds stay absent; an enabled kind needs `url`.
 */
export function parseOpenApiConfig(raw: unknown): OpenApiConfig {
  const result = openApiConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const summary = result.error.issues.map(describeIssue).join('; ');
    throw new OpenApiConfigError(`Invalid OpenAPI configuration: ${summary}`, result.error.issues);
  }

  const { redoc, scalar, swagger } = result.data;
  return {
    ...(redoc ? { redoc: toVisualizerConfig(redoc) } : {}),
    ...(scalar ? { scalar: toVisualizerConfig(scalar) } : {}),
    ...(swagger
      ? { swagger: { ...toVisualizerConfig(swagger), specJsonUrl: swagger.spec_json_url } }
      : {})
  };
}
