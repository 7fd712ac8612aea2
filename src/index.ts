/**
 * @arch hexgraph.barrel
 *
 * hexgraph: component registry, architecture graph, validation and export.
 * Main library exports barrel file.
 */

// Configuration
export * from './core/config/index.js';

// Registry
export * from './core/registry/index.js';

// Graph
export * from './core/graph/index.js';

// Validation
export * from './core/validation/index.js';

// Rebuild entry point
export * from './core/engine/index.js';

// Export adapters
export * from './core/export/index.js';

// Utilities
export * from './utils/index.js';

// CLI
export { createCli } from './cli/index.js';
