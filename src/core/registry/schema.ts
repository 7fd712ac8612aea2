/**
 * @arch hexgraph.core.domain.schema
 *
 * Component metadata schemas. The builder validates every entry candidate
 * against ComponentEntrySchema; manifests and config reuse the enums.
 */
import { z } from 'zod';

/** Architectural layers, innermost first. */
export const LAYERS = ['domain', 'port', 'application', 'adapter', 'infrastructure'] as const;

/** Structural roles a component can play within its layer. */
export const ROLES = [
  'entity',
  'value_object',
  'repository',
  'adapter',
  'directive',
  'query',
  'use_case',
  'service',
  'aggregate',
  'other',
] as const;

export const LayerSchema = z.enum(LAYERS);

export const RoleSchema = z.enum(ROLES);

/** Dependency names follow the same rules as type names. */
const TypeNameSchema = z.string().trim().min(1, 'must be a non-empty type name');

/**
 * A single component's declared metadata.
 * `modulePath` is informational; `dependencies` name other components by type name.
 */
export const ComponentEntrySchema = z.object({
  typeName: TypeNameSchema,
  layer: LayerSchema,
  role: RoleSchema,
  modulePath: z.string().default(''),
  dependencies: z.array(TypeNameSchema).default([]),
});

/**
 * Component manifest file shape (snake_case, like the config file).
 * Component records are left unvalidated here; the builder reports malformed ones.
 */
export const ComponentManifestSchema = z.object({
  components: z.array(z.record(z.string(), z.unknown())),
});

export type Layer = z.infer<typeof LayerSchema>;
export type Role = z.infer<typeof RoleSchema>;
export type ComponentEntry = z.infer<typeof ComponentEntrySchema>;
export type ComponentEntryInput = z.input<typeof ComponentEntrySchema>;
export type ComponentManifest = z.infer<typeof ComponentManifestSchema>;
