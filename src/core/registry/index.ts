/**
 * @arch hexgraph.core.barrel
 */
export { ComponentRegistry } from './component-registry.js';
export {
  composeRegistry,
  defineComponents,
  candidatesModule,
  registryModule,
  manifestModule,
} from './registration.js';
export {
  loadManifest,
  loadManifests,
  toEntryCandidate,
  DEFAULT_MANIFEST_PATTERNS,
} from './loader.js';
export {
  LAYERS,
  ROLES,
  LayerSchema,
  RoleSchema,
  ComponentEntrySchema,
  ComponentManifestSchema,
} from './schema.js';
export type {
  Layer,
  Role,
  ComponentEntry,
  ComponentEntryInput,
  ComponentManifest,
} from './schema.js';
export type {
  EntryCandidate,
  ComponentModule,
  LoadedManifest,
  ManifestPatterns,
} from './types.js';
