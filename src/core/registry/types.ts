/**
 * @arch hexgraph.core.types
 *
 * Registry type definitions.
 */
import type { ComponentEntryInput } from './schema.js';
import type { ComponentRegistry } from './component-registry.js';

/**
 * Anything offered to the registry as a component entry.
 * Typed callers pass ComponentEntryInput; manifests and untyped callers pass
 * plain records, which the graph builder validates.
 */
export type EntryCandidate = ComponentEntryInput | Readonly<Record<string, unknown>>;

/**
 * A unit of self-registration: called once per registry during startup.
 */
export type ComponentModule = (registry: ComponentRegistry) => void;

/**
 * A component manifest loaded from disk.
 */
export interface LoadedManifest {
  /** Absolute path of the manifest file */
  filePath: string;
  /** Entry candidates in file order, keys mapped to camelCase */
  components: EntryCandidate[];
}

/**
 * Manifest discovery patterns (glob, relative to the project root).
 */
export interface ManifestPatterns {
  include: string[];
  exclude: string[];
}
