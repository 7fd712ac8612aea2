/**
 * @arch hexgraph.core.barrel
 */
export { ArchitectureEngine } from './architecture-engine.js';
export type { ArchitectureSnapshot, ArchitectureEngineOptions } from './architecture-engine.js';
