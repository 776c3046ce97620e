import type { ZodIssue } from 'zod';

export class OpenApiDocsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OpenApiDocsError';
  }
}

export class DuplicateRouteError extends OpenApiDocsError {
  readonly code = 'DUPLICATE_ROUTE';
  readonly routeKey: string;
  readonly existingSource: string;
  readonly incomingSource: string;

  constructor(routeKey: string, existingSource: string, incomingSource: string) {
    super(
      `Route ${routeKey} from "${incomingSource}" is already registered by "${existingSource}"`
    );
    this.name = 'DuplicateRouteError';
    this.routeKey = routeKey;
    this.existingSource = existingSource;
    this.incomingSource = incomingSource;
  }
}

export class DocumentFrozenError extends OpenApiDocsError {
  readonly code = 'DOCUMENT_FROZEN';

  constructor(operation: string) {
    super(`Cannot ${operation}: the OpenAPI document has been finalized`);
    this.name = 'DocumentFrozenError';
  }
}

export class DuplicateSecuritySchemeError extends OpenApiDocsError {
  readonly code = 'DUPLICATE_SECURITY_SCHEME';

  constructor(name: string) {
    super(`Security scheme ${name} is already defined`);
    this.name = 'DuplicateSecuritySchemeError';
  }
}

export class InvalidRouteError extends OpenApiDocsError {
  readonly code = 'INVALID_ROUTE';

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRouteError';
  }
}

export class CollectorSealedError extends OpenApiDocsError {
  readonly code = 'COLLECTOR_SEALED';

  constructor(source: string, routeKey: string) {
    super(`Cannot record ${routeKey}: route collection "${source}" has already been handed to the merge`);
    this.name = 'CollectorSealedError';
  }
}

export class OpenApiConfigError extends OpenApiDocsError {
  readonly code = 'INVALID_CONFIG';
  readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = 'OpenApiConfigError';
    this.issues = issues;
  }
}

export type RegistryStateCode =
  | 'REGISTRY_ALREADY_INITIALIZED'
  | 'REGISTRY_NOT_INITIALIZED'
  | 'DOCUMENT_NOT_FINALIZED';

export class RegistryStateError extends OpenApiDocsError {
  readonly code: RegistryStateCode;

  constructor(code: RegistryStateCode, message: string) {
    super(message);
    this.name = 'RegistryStateError';
    this.code = code;
  }
}
