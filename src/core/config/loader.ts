/**
 * @arch hexgraph.core.domain
 */
import * as path from 'node:path';
import { ConfigSchema, type Config } from './schema.js';
import { loadYamlWithSchema, fileExists } from '../../utils/index.js';
import { ConfigError, ErrorCodes } from '../../utils/errors.js';
import type { ValidationOptions } from '../validation/types.js';
import type { ManifestPatterns } from '../registry/types.js';

export const DEFAULT_CONFIG_PATH = '.hexgraph/config.yaml';

export function getDefaultConfig(): Config {
  return ConfigSchema.parse({});
}

/**
 * Load configuration, falling back to defaults when the file is absent.
 */
export async function loadConfig(projectRoot: string, configPath?: string): Promise<Config> {
  const fullPath = path.resolve(projectRoot, configPath ?? DEFAULT_CONFIG_PATH);

  if (!(await fileExists(fullPath))) {
    return getDefaultConfig();
  }

  try {
    return await loadYamlWithSchema(fullPath, ConfigSchema);
  } catch (error) {
    if (error instanceof Error) {
      throw new ConfigError(
        ErrorCodes.CONFIG_LOAD_ERROR,
        `Failed to load config from ${fullPath}: ${error.message}`,
        { path: fullPath, originalError: error.message }
      );
    }
    throw error;
  }
}

export function getConfigPath(projectRoot: string): string {
  return path.resolve(projectRoot, DEFAULT_CONFIG_PATH);
}

export function toValidationOptions(config: Config): ValidationOptions {
  const settings = config.validation;
  return {
    rules: settings.rules,
    expectedLayers: settings.expected_layers,
    godComponentThreshold: settings.god_component_threshold,
    strict: settings.strict,
  };
}

export function toManifestPatterns(config: Config): ManifestPatterns {
  return {
    include: config.manifests.include,
    exclude: config.manifests.exclude,
  };
}
