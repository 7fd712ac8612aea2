/**
 * @arch hexgraph.core.barrel
 */
export {
  loadConfig,
  getDefaultConfig,
  getConfigPath,
  toValidationOptions,
  toManifestPatterns,
  DEFAULT_CONFIG_PATH,
} from './loader.js';
export {
  ConfigSchema,
  ManifestPatternsSchema,
  ValidationSettingsSchema,
  OutputSettingsSchema,
  OutputFormatSchema,
  ExitCodesSchema,
  GraphRuleIdSchema,
} from './schema.js';
export type { Config, ValidationSettings, OutputFormat, ExitCodes } from './schema.js';
