import assert from 'node:assert/strict';
import { test } from 'node:test';
import { parse as parseYaml } from 'yaml';
import { RegistryStateError, SpecRegistry, finalizeDocument } from '../src';
import { buildBaseDocument, getAlbumRoute } from './fixtures';

function finalizedDocument() {
  return finalizeDocument(buildBaseDocument([getAlbumRoute()])).document;
}

test('caches json and yaml serializations of the finalized document', () => {
  const registry = new SpecRegistry();
  const handle = registry.initialize(finalizedDocument());

  const firstJson = registry.getJson();
  const secondJson = registry.getJson();
  const firstYaml = registry.getYaml();
  const secondYaml = registry.getYaml();

  assert.equal(firstJson, secondJson);
  assert.equal(firstYaml, secondYaml);
  assert.equal(handle.json, firstJson);
  assert.deepEqual(JSON.parse(firstJson), registry.getSpec());
  assert.deepEqual(parseYaml(firstYaml), registry.getSpec());
  assert.equal(firstYaml.split('\n')[0], 'openapi: 3.0.3');
});

test('exposes the finalized document and a frozen spec', () => {
  const registry = new SpecRegistry();
  const document = finalizedDocument();
  registry.initialize(document);

  assert.equal(registry.isInitialized, true);
  assert.equal(registry.get(), document);
  assert.equal(Object.isFrozen(registry.getSpec()), true);
  assert.equal(Object.isFrozen(registry.getSpec().paths), true);
  assert.equal(Object.isFrozen(registry.getSpec().info), true);
});

test('fails fast when initialized twice', () => {
  const registry = new SpecRegistry();
  registry.initialize(finalizedDocument());

  assert.throws(
    () => registry.initialize(finalizedDocument()),
    (error: unknown) => error instanceof RegistryStateError && error.code === 'REGISTRY_ALREADY_INITIALIZED'
  );
});

test('rejects documents that have not been finalized', () => {
  const registry = new SpecRegistry();
  assert.throws(
    () => registry.initialize(buildBaseDocument()),
    (error: unknown) => error instanceof RegistryStateError && error.code === 'DOCUMENT_NOT_FINALIZED'
  );
  assert.equal(registry.isInitialized, false);
});

test('reads before initialization throw', () => {
  const registry = new SpecRegistry();
  for (const read of [() => registry.get(), () => registry.getJson(), () => registry.getYaml()]) {
    assert.throws(read, (error: unknown) => {
      assert(error instanceof RegistryStateError);
      assert.equal(error.code, 'REGISTRY_NOT_INITIALIZED');
      return true;
    });
  }
});
