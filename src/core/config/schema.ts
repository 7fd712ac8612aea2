/**
 * @arch hexgraph.core.domain.schema
 */
import { z } from 'zod';
import { LayerSchema, LAYERS } from '../registry/schema.js';
import { GRAPH_RULE_IDS } from '../validation/types.js';

/**
 * Zod 4 does not apply inner defaults through `.default({})` on objects,
 * so missing (or null) sections are replaced with {} before parsing.
 */
function withDefaults<T extends z.ZodType>(schema: T) {
  return z.preprocess((val) => val ?? {}, schema);
}

/** Where component manifests are discovered. */
export const ManifestPatternsSchema = z.object({
  include: z.array(z.string()).min(1).default(['**/*.components.yaml', '**/*.components.yml']),
  exclude: z.array(z.string()).default(['**/node_modules/**', '**/dist/**']),
});

export const ExitCodesSchema = z.object({
  success: z.number().int().default(0),
  error: z.number().int().default(1),
});

export const GraphRuleIdSchema = z.enum(GRAPH_RULE_IDS);

/** Validation settings, mapped onto ValidationOptions. */
export const ValidationSettingsSchema = z.object({
  rules: z.array(GraphRuleIdSchema).default([...GRAPH_RULE_IDS]),
  expected_layers: z.array(LayerSchema).default([...LAYERS]),
  strict: z.boolean().default(false),
  god_component_threshold: z.number().int().min(1).default(10),
  exit_codes: withDefaults(ExitCodesSchema),
});

/** Output format for validation results. */
export const OutputFormatSchema = z.enum(['human', 'json', 'compact']);

export const OutputSettingsSchema = z.object({
  format: OutputFormatSchema.default('human'),
});

/**
 * `.hexgraph/config.yaml`
 */
export const ConfigSchema = z.object({
  version: z.string().default('1.0'),
  /** Description carried by every built graph */
  description: z.string().optional(),
  manifests: withDefaults(ManifestPatternsSchema),
  validation: withDefaults(ValidationSettingsSchema),
  output: withDefaults(OutputSettingsSchema),
});

export type Config = z.infer<typeof ConfigSchema>;
export type ValidationSettings = z.infer<typeof ValidationSettingsSchema>;
export type OutputFormat = z.infer<typeof OutputFormatSchema>;
export type ExitCodes = z.infer<typeof ExitCodesSchema>;
