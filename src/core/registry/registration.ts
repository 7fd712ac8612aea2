/**
 * @arch hexgraph.core.domain
 *
 * Composition root helpers. Every part of a program contributes its
 * components through a ComponentModule; no central list of entries exists.
 */
import { ComponentRegistry } from './component-registry.js';
import type { ComponentEntryInput } from './schema.js';
import type { ComponentModule, EntryCandidate, LoadedManifest } from './types.js';

/**
 * Run every module against a fresh registry and seal it.
 */
export function composeRegistry(modules: Iterable<ComponentModule>): ComponentRegistry {
  const registry = new ComponentRegistry();
  for (const register of modules) {
    register(registry);
  }
  return registry.seal();
}

/**
 * Module that registers a fixed set of typed entries.
 *
 * @example
 * const domain = defineComponents(
 *   { typeName: 'User', layer: 'domain', role: 'entity' },
 * );
 */
export function defineComponents(...entries: ComponentEntryInput[]): ComponentModule {
  return (registry) => {
    registry.registerAll(entries);
  };
}

/**
 * Module that replays untyped candidates (e.g. from an external source).
 */
export function candidatesModule(candidates: Iterable<EntryCandidate>): ComponentModule {
  return (registry) => {
    registry.registerAll(candidates);
  };
}

/**
 * Module that re-registers everything from another registry.
 * The source is re-enumerated on every call.
 */
export function registryModule(source: ComponentRegistry): ComponentModule {
  return (registry) => {
    registry.registerAll(source.collectAll());
  };
}

/**
 * Module that registers the components of loaded manifests, in file order.
 */
export function manifestModule(manifests: readonly LoadedManifest[]): ComponentModule {
  return (registry) => {
    for (const manifest of manifests) {
      registry.registerAll(manifest.components);
    }
  };
}
