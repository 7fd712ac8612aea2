/**
 * @arch hexgraph.cli.helpers
 *
 * Loads config and manifests for a project and wires them into an engine.
 */
import { loadConfig, toManifestPatterns, toValidationOptions } from '../../core/config/loader.js';
import type { Config } from '../../core/config/schema.js';
import { ArchitectureEngine, type ArchitectureSnapshot } from '../../core/engine/index.js';
import { loadManifests } from '../../core/registry/loader.js';
import { manifestModule } from '../../core/registry/registration.js';
import type { ValidationOptions } from '../../core/validation/types.js';
import { logger } from '../../utils/logger.js';
import { pluralize } from '../../utils/format.js';

export interface ProjectOptions {
  config?: string;
  /** Overrides applied on top of the config's validation settings */
  validation?: ValidationOptions;
}

export interface LoadedProject {
  projectRoot: string;
  config: Config;
  engine: ArchitectureEngine;
  snapshot: ArchitectureSnapshot;
}

export async function loadProject(
  projectRoot: string,
  options: ProjectOptions = {}
): Promise<LoadedProject> {
  const config = await loadConfig(projectRoot, options.config);
  const manifests = await loadManifests(projectRoot, toManifestPatterns(config));

  if (manifests.length === 0) {
    logger.warn(`No component manifests found (patterns: ${config.manifests.include.join(', ')})`);
  }

  const engine = new ArchitectureEngine([manifestModule(manifests)], {
    description: config.description,
    validation: { ...toValidationOptions(config), ...options.validation },
  });
  const snapshot = engine.rebuild();

  logger.debug(
    `Built graph: ${pluralize(snapshot.graph.nodeCount, 'node')}, ${pluralize(snapshot.graph.edgeCount, 'edge')} ` +
    `from ${pluralize(manifests.length, 'manifest')}`
  );

  return { projectRoot, config, engine, snapshot };
}

/** Split a comma-separated option value. */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}
