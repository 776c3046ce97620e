import type { ApiDocument } from './document';
import type { RouteKey } from './routeKey';
import type { RouteCollection } from './types';

export type MergeWarning = {
  kind: 'dangling_security_reference';
  routeKey: RouteKey;
  scheme: string;
  source: string;
};

export type FinalizeResult = {
  document: ApiDocument;
  warnings: MergeWarning[];
};

export function findDanglingSecurityReferences(document: ApiDocument): MergeWarning[] {
  const warnings: MergeWarning[] = [];
  for (const route of document.listRoutes()) {
    const security = route.descriptor.security;
    if (!security || security === 'none') {
      continue;
    }
    if (!document.hasSecurityScheme(security.scheme)) {
      warnings.push({
        kind: 'dangling_security_reference',
        routeKey: route.key,
        scheme: security.scheme,
        source: route.source
      });
    }
  }
  return warnings;
}

/**
 * Merges route collections into a copy of `base`, in order, and freezes the
 * result. A route key seen twice throws `DuplicateRouteError`; `base` is
 * never modified, so a failed merge leaves nothing behind.
 */
export function finalizeDocument(
  base: ApiDocument,
  collections: readonly RouteCollection[] = []
): FinalizeResult {
  const document = base.clone();
  for (const collection of collections) {
    for (const descriptor of collection.routes) {
      document.addRoute(descriptor, collection.source);
    }
  }

  const warnings = findDanglingSecurityReferences(document);
  document.freeze();
  return { document, warnings };
}
