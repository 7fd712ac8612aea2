/**
 * @arch hexgraph.core.domain
 * @intent:registry-infrastructure
 *
 * Loads component manifests (`*.components.yaml`) from a project.
 */
import * as path from 'node:path';
import { ComponentManifestSchema } from './schema.js';
import type { EntryCandidate, LoadedManifest, ManifestPatterns } from './types.js';
import { globFiles, loadYamlWithSchema, logger } from '../../utils/index.js';
import { ErrorCodes } from '../../utils/errors.js';

export const DEFAULT_MANIFEST_PATTERNS: ManifestPatterns = {
  include: ['**/*.components.yaml', '**/*.components.yml'],
  exclude: ['**/node_modules/**', '**/dist/**'],
};

const log = logger.child('manifests');

/**
 * Map a snake_case manifest record to an entry candidate.
 * Values are passed through untouched so the builder can report bad ones.
 */
export function toEntryCandidate(record: Readonly<Record<string, unknown>>, source?: string): EntryCandidate {
  const candidate: Record<string, unknown> = {
    typeName: record.type_name,
    layer: record.layer,
    role: record.role,
    modulePath: record.module_path,
    dependencies: record.dependencies,
  };
  if (source) {
    candidate.source = source;
  }
  return candidate;
}

/**
 * Load a single manifest file.
 */
export async function loadManifest(filePath: string, projectRoot?: string): Promise<LoadedManifest> {
  const manifest = await loadYamlWithSchema(filePath, ComponentManifestSchema, ErrorCodes.INVALID_MANIFEST);
  const source = projectRoot ? path.relative(projectRoot, filePath) : filePath;
  return {
    filePath,
    components: manifest.components.map((record) => toEntryCandidate(record, source)),
  };
}

/**
 * Discover and load every manifest under a project root, in sorted path order.
 */
export async function loadManifests(
  projectRoot: string,
  patterns: ManifestPatterns = DEFAULT_MANIFEST_PATTERNS
): Promise<LoadedManifest[]> {
  const files = await globFiles(patterns.include, {
    cwd: projectRoot,
    ignore: patterns.exclude,
    absolute: true,
  });

  log.debug(`Found ${files.length} manifest file(s)`, { projectRoot });

  const manifests: LoadedManifest[] = [];
  for (const filePath of files) {
    const manifest = await loadManifest(filePath, projectRoot);
    log.debug(`Loaded ${manifest.components.length} component(s) from ${path.relative(projectRoot, filePath)}`);
    manifests.push(manifest);
  }
  return manifests;
}
