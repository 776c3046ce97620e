import type { OpenAPIV3 } from 'openapi-types';
import { stringify as stringifyYaml } from 'yaml';
import type { ApiDocument } from './document';
import { RegistryStateError } from './errors';
import { deepFreeze } from './freeze';

export type SpecHandle = {
  readonly document: ApiDocument;
  readonly spec: OpenAPIV3.Document;
  readonly json: string;
  readonly yaml: string;
};

export function serializeSpecJson(spec: OpenAPIV3.Document): string {
  return JSON.stringify(spec, null, 2);
}

export function serializeSpecYaml(spec: OpenAPIV3.Document): string {
  return stringifyYaml(spec, { aliasDuplicateObjects: false });
}

/**
 * Holds one finalized document and its serialized forms. Written once during
 * startup; every read afterwards returns the cached values.
 */
export class SpecRegistry {
  private handle: SpecHandle | null = null;

  get isInitialized(): boolean {
    return this.handle !== null;
  }

  initialize(document: ApiDocument): SpecHandle {
    if (this.handle) {
      throw new RegistryStateError(
        'REGISTRY_ALREADY_INITIALIZED',
        'OpenAPI spec registry has already been initialized'
      );
    }
    if (!document.isFrozen) {
      throw new RegistryStateError(
        'DOCUMENT_NOT_FINALIZED',
        'OpenAPI spec registry only accepts finalized documents'
      );
    }

    const spec = deepFreeze(document.toOpenApi());
    this.handle = Object.freeze({
      document,
      spec,
      json: serializeSpecJson(spec),
      yaml: serializeSpecYaml(spec)
    });
    return this.handle;
  }

  get(): ApiDocument {
    return this.requireHandle().document;
  }

  getSpec(): OpenAPIV3.Document {
    return this.requireHandle().spec;
  }

  getJson(): string {
    return this.requireHandle().json;
  }

  getYaml(): string {
    return this.requireHandle().yaml;
  }

  private requireHandle(): SpecHandle {
    if (!this.handle) {
      throw new RegistryStateError(
        'REGISTRY_NOT_INITIALIZED',
        'OpenAPI spec registry has not been initialized'
      );
    }
    return this.handle;
  }
}
